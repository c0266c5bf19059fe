import { BinaryReader } from '../io/binaryReader.js';
import { enterBlock } from '../format/block.js';
import { SAMPLE_MAGIC } from '../format/signatures.js';
import { Sample, SAMPLE_PRESENCE_BYTES } from '../model/sample.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'sample';
const log = createLogger(COMPONENT);

/** One `SMP2` block. The payload is `length` raw bytes whatever the depth. */
export function readSample(r: BinaryReader): Sample {
  const start = r.absolutePosition;
  const body = enterBlock(r, SAMPLE_MAGIC, COMPONENT);
  const name = body.cString();
  const length = body.u32();
  const compatRate = body.u32();
  const c4Rate = body.u32();
  const depth = body.u8();
  const loopDirection = body.u8();
  const flags = body.u8();
  const flags2 = body.u8();
  const loopStart = body.i32();
  const loopEnd = body.i32();
  const presence = Array.from(body.bytes(SAMPLE_PRESENCE_BYTES));
  const data = body.bytes(length);
  log.debug(`SMP2 at 0x${start.toString(16)}: "${name}" ${length} bytes, depth ${depth}`);
  return {
    meta: { name, length, compatRate, c4Rate, depth, loopDirection, flags, flags2, loopStart, loopEnd, presence },
    data,
  };
}

export function decodeSample(bytes: Uint8Array): Sample {
  return readSample(new BinaryReader(bytes, 0, COMPONENT));
}
