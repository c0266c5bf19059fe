import { BinaryWriter } from '../io/binaryWriter.js';
import { InvalidFieldValueError } from '../errors.js';
import { Sample, SAMPLE_PRESENCE_BYTES } from '../model/sample.js';
import { SAMPLE_MAGIC } from '../format/signatures.js';
import { createLogger } from '../util/logger.js';

const COMPONENT = 'sample';
const log = createLogger(COMPONENT);

/** Append an `SMP2` block. `meta.length` must match the payload size. */
export function writeSample(w: BinaryWriter, sample: Sample): void {
  const { meta, data } = sample;
  if (meta.length !== data.byteLength) {
    throw new InvalidFieldValueError(COMPONENT, w.position, 'length', meta.length, `payload holds ${data.byteLength} bytes`);
  }
  const start = w.position;
  w.writeBlock(SAMPLE_MAGIC, body => {
    body.writeCString(meta.name);
    body.writeU32(meta.length);
    body.writeU32(meta.compatRate);
    body.writeU32(meta.c4Rate);
    body.writeU8(meta.depth);
    body.writeU8(meta.loopDirection);
    body.writeU8(meta.flags);
    body.writeU8(meta.flags2);
    body.writeI32(meta.loopStart);
    body.writeI32(meta.loopEnd);
    for (let i = 0; i < SAMPLE_PRESENCE_BYTES; i++) body.writeU8(meta.presence[i] ?? 0);
    body.writeBytes(data);
  });
  log.debug(`SMP2 at 0x${start.toString(16)}: "${meta.name}" ${meta.length} bytes`);
}

export function encodeSample(sample: Sample): Uint8Array {
  const w = new BinaryWriter();
  writeSample(w, sample);
  return w.toUint8Array();
}
