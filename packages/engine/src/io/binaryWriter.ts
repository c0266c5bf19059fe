/**
 * Growable little-endian byte sink; the symmetric counterpart of BinaryReader.
 */

const textEncoder = new TextEncoder();
const scratch = new DataView(new ArrayBuffer(4));

export class BinaryWriter {
  private buffer: number[] = [];

  get position(): number {
    return this.buffer.length;
  }

  writeU8(val: number): void {
    this.buffer.push(val & 0xff);
  }

  writeI8(val: number): void {
    this.writeU8(val);
  }

  writeU16(val: number): void {
    this.buffer.push(val & 0xff);
    this.buffer.push((val >> 8) & 0xff);
  }

  writeI16(val: number): void {
    this.writeU16(val);
  }

  writeU32(val: number): void {
    this.buffer.push(val & 0xff);
    this.buffer.push((val >>> 8) & 0xff);
    this.buffer.push((val >>> 16) & 0xff);
    this.buffer.push((val >>> 24) & 0xff);
  }

  writeI32(val: number): void {
    this.writeU32(val >>> 0);
  }

  writeF32(val: number): void {
    scratch.setFloat32(0, val, true);
    for (let i = 0; i < 4; i++) this.buffer.push(scratch.getUint8(i));
  }

  writeBool(val: boolean): void {
    this.writeU8(val ? 1 : 0);
  }

  /** UTF-8 bytes followed by a single NUL. */
  writeCString(s: string): void {
    this.writeBytes(textEncoder.encode(s));
    this.buffer.push(0);
  }

  /** Raw ASCII, no terminator; used for block signatures. */
  writeAscii(s: string): void {
    for (let i = 0; i < s.length; i++) this.buffer.push(s.charCodeAt(i) & 0xff);
  }

  writeBytes(bytes: ArrayLike<number>): void {
    for (let i = 0; i < bytes.length; i++) this.buffer.push(bytes[i] & 0xff);
  }

  fill(count: number, val = 0): void {
    for (let i = 0; i < count; i++) this.buffer.push(val & 0xff);
  }

  /** Overwrite a u32 written earlier, e.g. a pointer or a block length. */
  patchU32(at: number, val: number): void {
    this.buffer[at] = val & 0xff;
    this.buffer[at + 1] = (val >>> 8) & 0xff;
    this.buffer[at + 2] = (val >>> 16) & 0xff;
    this.buffer[at + 3] = (val >>> 24) & 0xff;
  }

  /**
   * Write a 4-byte signature and a u32 length covering everything written
   * by `body`. Returns whatever `body` returns.
   */
  writeBlock<T>(magic: string, body: (w: BinaryWriter) => T): T {
    this.writeAscii(magic);
    const sizeAt = this.position;
    this.writeU32(0);
    const result = body(this);
    this.patchU32(sizeAt, this.position - sizeAt - 4);
    return result;
  }

  toUint8Array(): Uint8Array {
    return Uint8Array.from(this.buffer);
  }

  toBuffer(): Buffer {
    return Buffer.from(this.buffer);
  }
}

export default BinaryWriter;
