/**
 * Wavetable decoding: the `WAVE` block found inside modules and instrument
 * files, and the standalone `-Furnace waveta-` file that wraps one.
 */

import { BinaryReader } from '../io/binaryReader.js';
import { enterBlock } from '../format/block.js';
import { WAVETABLE_FILE_MAGIC, WAVETABLE_MAGIC } from '../format/signatures.js';
import { Wavetable } from '../model/wavetable.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'wavetable';
const log = createLogger(COMPONENT);

export function readWavetable(r: BinaryReader): Wavetable {
  const start = r.absolutePosition;
  const body = enterBlock(r, WAVETABLE_MAGIC, COMPONENT);
  const name = body.cString();
  const width = body.u32();
  body.u32(); // reserved
  const height = body.u32() + 1;
  const data: number[] = [];
  for (let i = 0; i < width; i++) data.push(body.u32());
  log.debug(`WAVE at 0x${start.toString(16)}: ${width}x${height} "${name}"`);
  return { meta: { name, width, height }, data };
}

export function decodeWavetable(bytes: Uint8Array): Wavetable {
  return readWavetable(new BinaryReader(bytes, 0, COMPONENT));
}

export interface WavetableFile {
  version: number;
  wavetable: Wavetable;
}

export function decodeWavetableFile(bytes: Uint8Array): WavetableFile {
  const r = new BinaryReader(bytes, 0, COMPONENT);
  r.expectMagic(WAVETABLE_FILE_MAGIC);
  const version = r.u16();
  r.u16(); // reserved
  return { version, wavetable: readWavetable(r) };
}
