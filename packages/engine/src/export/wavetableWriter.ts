import { BinaryWriter } from '../io/binaryWriter.js';
import { InvalidFieldValueError } from '../errors.js';
import { Wavetable } from '../model/wavetable.js';
import { WAVETABLE_FILE_MAGIC, WAVETABLE_MAGIC } from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'wavetable';
const log = createLogger(COMPONENT);

/** Append a `WAVE` block. Width is taken from the data; height is stored minus one. */
export function writeWavetable(w: BinaryWriter, wavetable: Wavetable): void {
  const { name, height } = wavetable.meta;
  if (height < 1) {
    throw new InvalidFieldValueError(COMPONENT, w.position, 'height', height, 'wavetable height must be at least 1');
  }
  const start = w.position;
  w.writeBlock(WAVETABLE_MAGIC, body => {
    body.writeCString(name);
    body.writeU32(wavetable.data.length);
    body.writeU32(0);
    body.writeU32(height - 1);
    for (const value of wavetable.data) body.writeU32(value);
  });
  log.debug(`WAVE at 0x${start.toString(16)}: ${wavetable.data.length}x${height} "${name}"`);
}

export function encodeWavetable(wavetable: Wavetable): Uint8Array {
  const w = new BinaryWriter();
  writeWavetable(w, wavetable);
  return w.toUint8Array();
}

/** Standalone `-Furnace waveta-` file. */
export function encodeWavetableFile(wavetable: Wavetable, version: number): Uint8Array {
  const w = new BinaryWriter();
  w.writeAscii(WAVETABLE_FILE_MAGIC);
  w.writeU16(version);
  w.writeU16(0);
  writeWavetable(w, wavetable);
  return w.toUint8Array();
}
