/**
 * Instrument decoding entry points.
 *
 * Four containers carry an instrument:
 *  - `legacy-file`    `-Furnace instr.-` file wrapping an `INST` block
 *  - `legacy-embed`   `INST` block inside a module
 *  - `featural-file`  `FINS` file
 *  - `featural-embed` `INS2` block inside a module
 */

import { BinaryReader } from '../io/binaryReader.js';
import { UnknownEnumValueError } from '../errors.js';
import { decodeEnum, InstrumentType } from '../model/enums.js';
import { Feature, Instrument, isFeatureCode } from '../model/instrument.js';
import { Sample } from '../model/sample.js';
import { Wavetable } from '../model/wavetable.js';
import { readFeature } from '../format/features.js';
import { enterBlock } from '../format/block.js';
import {
  INSTRUMENT_FEATURAL_FILE_MAGIC,
  INSTRUMENT_FEATURAL_MAGIC,
  INSTRUMENT_FILE_MAGIC,
} from '../format/signatures.js';
import { readLegacyInstrument } from './legacyInstrument.reader.js';
import { readWavetable } from './wavetable.reader.js';
import { readSample } from './sample.reader.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'instrument';
const log = createLogger(COMPONENT);

const FEATURE_END = 'EN';

export type InstrumentImportKind = 'legacy-file' | 'legacy-embed' | 'featural-file' | 'featural-embed';

/** Version, type, then feature blocks up to `EN` or the end of the data. */
function readFeatural(r: BinaryReader): Instrument {
  const version = r.u16();
  const typeAt = r.absolutePosition;
  const type = decodeEnum(InstrumentType, r.u16(), 'instrument type', COMPONENT, typeAt);
  const features: Feature[] = [];
  while (!r.eof()) {
    const at = r.absolutePosition;
    const code = r.ascii(2);
    if (code === FEATURE_END) break;
    if (!isFeatureCode(code)) {
      throw new UnknownEnumValueError(COMPONENT, at, 'feature code', code);
    }
    const length = r.u16();
    features.push(readFeature(r.subReader(length, COMPONENT), code, { version }));
  }
  log.debug(`featural instrument v${version}: ${features.map(f => f.code).join(' ')}`);
  return { meta: { version, type, format: 'featural' }, features };
}

export function readFeaturalInstrument(r: BinaryReader): Instrument {
  return readFeatural(enterBlock(r, INSTRUMENT_FEATURAL_MAGIC, COMPONENT));
}

export interface LegacyInstrumentFile {
  /** version from the file header; the instrument block carries its own */
  version: number;
  instrument: Instrument;
  wavetables: Wavetable[];
  samples: Sample[];
}

function readPointers(r: BinaryReader, count: number): number[] {
  const out: number[] = [];
  for (let i = 0; i < count; i++) out.push(r.u32());
  return out;
}

/** A legacy instrument file together with the wavetables and samples it bundles. */
export function decodeLegacyInstrumentFile(bytes: Uint8Array): LegacyInstrumentFile {
  const r = new BinaryReader(bytes, 0, COMPONENT);
  r.expectMagic(INSTRUMENT_FILE_MAGIC);
  const version = r.u16();
  r.u16(); // reserved
  const instrumentAt = r.u32();
  const waveCount = r.u16();
  const sampleCount = r.u16();
  r.u32(); // reserved
  const wavePointers = readPointers(r, waveCount);
  const samplePointers = readPointers(r, sampleCount);

  const instrument = readLegacyInstrument(r.fork(instrumentAt));
  // a zero pointer is an empty slot
  const wavetables = wavePointers.filter(at => at !== 0).map(at => readWavetable(r.fork(at, 'wavetable')));
  const samples = samplePointers.filter(at => at !== 0).map(at => readSample(r.fork(at, 'sample')));
  return { version, instrument, wavetables, samples };
}

export function decodeInstrument(input: Uint8Array | BinaryReader, kind: InstrumentImportKind): Instrument {
  if (kind === 'legacy-file') {
    const bytes = input instanceof BinaryReader ? input.bytes(input.remaining) : input;
    return decodeLegacyInstrumentFile(bytes).instrument;
  }
  const r = input instanceof BinaryReader ? input : new BinaryReader(input, 0, COMPONENT);
  switch (kind) {
    case 'legacy-embed':
      return readLegacyInstrument(r);
    case 'featural-file':
      r.expectMagic(INSTRUMENT_FEATURAL_FILE_MAGIC);
      return readFeatural(r);
    case 'featural-embed':
      return readFeaturalInstrument(r);
  }
}

/** Which standalone container `bytes` holds, judged by its signature. */
export function sniffInstrumentFile(bytes: Uint8Array): 'legacy-file' | 'featural-file' {
  const r = new BinaryReader(bytes, 0, COMPONENT);
  if (r.peekAscii(INSTRUMENT_FEATURAL_FILE_MAGIC.length) === INSTRUMENT_FEATURAL_FILE_MAGIC) return 'featural-file';
  // anything else must carry the legacy signature
  r.expectMagic(INSTRUMENT_FILE_MAGIC);
  return 'legacy-file';
}
