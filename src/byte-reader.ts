// Seekable big-endian reader over an in-memory EDM file

import { StreamTruncatedError } from './errors';

export class ByteReader {
  readonly bytes: Uint8Array;
  private view: DataView;
  private pos: number = 0;

  constructor(bytes: Uint8Array, offset: number = 0) {
    this.bytes = bytes;
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    this.seek(offset);
  }

  get offset(): number {
    return this.pos;
  }

  get length(): number {
    return this.bytes.length;
  }

  get remaining(): number {
    return this.bytes.length - this.pos;
  }

  seek(offset: number): void {
    if (offset < 0 || offset > this.bytes.length) {
      throw new StreamTruncatedError(
        `Cannot seek to ${offset}, file is ${this.bytes.length} bytes`,
        { offset }
      );
    }
    this.pos = offset;
  }

  readUint8(): number {
    this.require(1);
    return this.view.getUint8(this.pos++);
  }

  /** Network byte order */
  readUint16(): number {
    this.require(2);
    const value = this.view.getUint16(this.pos, false);
    this.pos += 2;
    return value;
  }

  /** Byte at an absolute offset, or null past the end */
  peekUint8(offset: number): number | null {
    if (offset < 0 || offset >= this.bytes.length) return null;
    return this.view.getUint8(offset);
  }

  private require(count: number): void {
    if (this.pos + count > this.bytes.length) {
      throw new StreamTruncatedError(
        `Needed ${count} byte(s), ${this.remaining} left`,
        { offset: this.pos }
      );
    }
  }
}
