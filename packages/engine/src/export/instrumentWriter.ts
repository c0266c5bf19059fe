/**
 * Featural instrument encoder.
 *
 * Instruments decoded from the legacy layout are written in the featural
 * form too; the legacy layout is read-only.
 */

import { BinaryWriter } from '../io/binaryWriter.js';
import { Instrument } from '../model/instrument.js';
import { writeFeature } from '../format/features.js';
import {
  INSTRUMENT_FEATURAL_FILE_MAGIC,
  INSTRUMENT_FEATURAL_MAGIC,
  VERSION,
} from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const log = createLogger('instrument');

const FEATURE_END = 'EN';

export type InstrumentContainer = 'embed' | 'file';

export interface EncodeInstrumentOptions {
  /** `embed` writes an `INS2` block, `file` a standalone `FINS` file (default `embed`) */
  container?: InstrumentContainer;
}

/** Version written for an instrument: never older than the featural format. */
export function featuralVersion(instrument: Instrument): number {
  return Math.max(instrument.meta.version, VERSION.FEATURAL_INSTRUMENTS);
}

function writeFeaturalBody(w: BinaryWriter, instrument: Instrument): void {
  const version = featuralVersion(instrument);
  w.writeU16(version);
  w.writeU16(instrument.meta.type);
  for (const feature of instrument.features) writeFeature(w, feature, { version });
  w.writeAscii(FEATURE_END);
}

/** Append an `INS2` block to `w`. */
export function writeInstrument(w: BinaryWriter, instrument: Instrument): void {
  const start = w.position;
  w.writeBlock(INSTRUMENT_FEATURAL_MAGIC, body => writeFeaturalBody(body, instrument));
  log.debug(`INS2 at 0x${start.toString(16)}: ${instrument.features.map(f => f.code).join(' ')}`);
}

export function encodeInstrument(instrument: Instrument, options: EncodeInstrumentOptions = {}): Uint8Array {
  const w = new BinaryWriter();
  if (options.container === 'file') {
    w.writeAscii(INSTRUMENT_FEATURAL_FILE_MAGIC);
    writeFeaturalBody(w, instrument);
  } else {
    writeInstrument(w, instrument);
  }
  return w.toUint8Array();
}
