import { BinaryReader } from '../io/binaryReader.js';

/**
 * Enter a `MAGIC + u32 length` block and return a reader bounded to its
 * body. A zero length means the body runs to the end of the stream, which
 * is how the oldest revisions wrote it.
 */
export function enterBlock(r: BinaryReader, magic: string, component: string): BinaryReader {
  r.expectMagic(magic, component);
  const size = r.u32();
  return r.subReader(size === 0 ? r.remaining : size, component);
}
