/**
 * Little-endian cursor over an in-memory buffer.
 *
 * Every read checks the remaining length first and raises
 * `TruncatedInputError` with the absolute offset of the failed read.
 * A reader produced by `subReader` shares the parent's bytes and keeps
 * reporting offsets relative to the start of the whole container.
 */

import { BadMagicError, TruncatedInputError } from '../errors.js';

const textDecoder = new TextDecoder('utf-8');

export class BinaryReader {
  private readonly data: Uint8Array;
  private readonly view: DataView;
  private offset = 0;

  /**
   * @param base - absolute offset of `data[0]` inside the original container
   * @param component - name reported in errors raised by this reader
   */
  constructor(data: Uint8Array, readonly base = 0, readonly component = 'reader') {
    this.data = data;
    this.view = new DataView(data.buffer, data.byteOffset, data.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  /** Offset of the cursor inside the original container. */
  get absolutePosition(): number {
    return this.base + this.offset;
  }

  get length(): number {
    return this.data.byteLength;
  }

  get remaining(): number {
    return this.data.byteLength - this.offset;
  }

  eof(): boolean {
    return this.offset >= this.data.byteLength;
  }

  seek(position: number): void {
    if (position < 0 || position > this.data.byteLength) {
      throw new TruncatedInputError(this.component, this.base + position, 0, this.data.byteLength - position);
    }
    this.offset = position;
  }

  private ensure(count: number): void {
    if (count > this.remaining) {
      throw new TruncatedInputError(this.component, this.absolutePosition, count, Math.max(0, this.remaining));
    }
  }

  skip(count: number): void {
    this.ensure(count);
    this.offset += count;
  }

  u8(): number {
    this.ensure(1);
    return this.data[this.offset++];
  }

  i8(): number {
    this.ensure(1);
    const v = this.view.getInt8(this.offset);
    this.offset += 1;
    return v;
  }

  u16(): number {
    this.ensure(2);
    const v = this.view.getUint16(this.offset, true);
    this.offset += 2;
    return v;
  }

  i16(): number {
    this.ensure(2);
    const v = this.view.getInt16(this.offset, true);
    this.offset += 2;
    return v;
  }

  u32(): number {
    this.ensure(4);
    const v = this.view.getUint32(this.offset, true);
    this.offset += 4;
    return v;
  }

  i32(): number {
    this.ensure(4);
    const v = this.view.getInt32(this.offset, true);
    this.offset += 4;
    return v;
  }

  f32(): number {
    this.ensure(4);
    const v = this.view.getFloat32(this.offset, true);
    this.offset += 4;
    return v;
  }

  bool(): boolean {
    return this.u8() !== 0;
  }

  /** Copy of the next `count` bytes. */
  bytes(count: number): Uint8Array {
    this.ensure(count);
    const out = this.data.slice(this.offset, this.offset + count);
    this.offset += count;
    return out;
  }

  /** Bytes up to (not including) the next NUL, decoded as UTF-8. */
  cString(): string {
    const start = this.offset;
    let end = start;
    while (end < this.data.byteLength && this.data[end] !== 0) end++;
    if (end >= this.data.byteLength) {
      throw new TruncatedInputError(this.component, this.base + start, end - start + 1, end - start);
    }
    this.offset = end + 1;
    return textDecoder.decode(this.data.subarray(start, end));
  }

  /** Read `count` bytes as ASCII without validating them. */
  ascii(count: number): string {
    const raw = this.bytes(count);
    let out = '';
    for (const b of raw) out += String.fromCharCode(b);
    return out;
  }

  peekAscii(count: number): string {
    const end = Math.min(this.data.byteLength, this.offset + count);
    let out = '';
    for (let i = this.offset; i < end; i++) out += String.fromCharCode(this.data[i]);
    return out;
  }

  /**
   * Consume a signature and fail with `BadMagicError` when it differs.
   */
  expectMagic(expected: string, component = this.component): void {
    const at = this.absolutePosition;
    if (this.remaining < expected.length) {
      throw new BadMagicError(component, at, expected, this.peekAscii(expected.length));
    }
    const actual = this.ascii(expected.length);
    if (actual !== expected) {
      throw new BadMagicError(component, at, expected, actual);
    }
  }

  /**
   * Carve the next `count` bytes into their own reader. Reads past the end
   * of the sub-reader fail even when the parent has more data.
   */
  subReader(count: number, component = this.component): BinaryReader {
    this.ensure(count);
    const sub = new BinaryReader(this.data.subarray(this.offset, this.offset + count), this.absolutePosition, component);
    this.offset += count;
    return sub;
  }

  /** A reader over the same bytes, positioned at `position`. */
  fork(position: number, component = this.component): BinaryReader {
    const r = new BinaryReader(this.data, this.base, component);
    r.seek(position);
    return r;
  }
}

export default BinaryReader;
