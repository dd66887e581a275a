// src/bytes.ts
// Little-endian cursor reader/writer and VT string encoding

import { DeserializationError, DesignerError } from '@vtpool/core';

const UTF16_BOM = [0xff, 0xfe];

export class ByteReader {
  private offset = 0;
  private readonly view: DataView;

  constructor(private readonly bytes: Uint8Array) {
    this.view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  }

  get position(): number {
    return this.offset;
  }

  get remaining(): number {
    return this.bytes.byteLength - this.offset;
  }

  private take(length: number, what: string): number {
    if (length > this.remaining) {
      throw new DeserializationError(
        'object pool',
        `truncated at byte ${this.offset}: ${what} needs ${length} bytes, ${this.remaining} left`,
      );
    }
    const start = this.offset;
    this.offset += length;
    return start;
  }

  u8(what = 'u8'): number {
    return this.view.getUint8(this.take(1, what));
  }

  u16(what = 'u16'): number {
    return this.view.getUint16(this.take(2, what), true);
  }

  i16(what = 'i16'): number {
    return this.view.getInt16(this.take(2, what), true);
  }

  u32(what = 'u32'): number {
    return this.view.getUint32(this.take(4, what), true);
  }

  i32(what = 'i32'): number {
    return this.view.getInt32(this.take(4, what), true);
  }

  f32(what = 'f32'): number {
    return this.view.getFloat32(this.take(4, what), true);
  }

  raw(length: number, what = 'bytes'): Uint8Array {
    const start = this.take(length, what);
    return this.bytes.subarray(start, start + length);
  }
}

export class ByteWriter {
  private chunks: number[] = [];
  private readonly scratch = new DataView(new ArrayBuffer(4));

  u8(value: number): void {
    this.chunks.push(value & 0xff);
  }

  u16(value: number): void {
    this.scratch.setUint16(0, value, true);
    this.copy(2);
  }

  i16(value: number): void {
    this.scratch.setInt16(0, value, true);
    this.copy(2);
  }

  u32(value: number): void {
    this.scratch.setUint32(0, value, true);
    this.copy(4);
  }

  i32(value: number): void {
    this.scratch.setInt32(0, value, true);
    this.copy(4);
  }

  f32(value: number): void {
    this.scratch.setFloat32(0, value, true);
    this.copy(4);
  }

  raw(bytes: ArrayLike<number>): void {
    for (let i = 0; i < bytes.length; i++) this.chunks.push(bytes[i] & 0xff);
  }

  toBytes(): Uint8Array {
    return Uint8Array.from(this.chunks);
  }

  private copy(length: number): void {
    for (let i = 0; i < length; i++) this.chunks.push(this.scratch.getUint8(i));
  }
}

// ============ Strings ============

/** Latin-1 unless the bytes open with a UTF-16LE byte order mark. */
export function decodeVtString(bytes: Uint8Array): string {
  if (bytes.length >= 2 && bytes[0] === UTF16_BOM[0] && bytes[1] === UTF16_BOM[1]) {
    return Buffer.from(bytes.subarray(2)).toString('utf16le');
  }
  return Buffer.from(bytes).toString('latin1');
}

/** Latin-1 when every character fits and the text does not itself open like a byte order mark. */
export function encodeVtString(value: string): Uint8Array {
  const wide =
    value.startsWith('\u00ff\u00fe') || [...value].some((char) => (char.codePointAt(0) ?? 0) > 0xff);
  if (!wide) {
    return new Uint8Array(Buffer.from(value, 'latin1'));
  }
  return Uint8Array.from([...UTF16_BOM, ...Buffer.from(value, 'utf16le')]);
}

/** Fixed-size Latin-1 text such as a two-letter language code. */
export function encodeFixedChars(value: string, size: number): Uint8Array {
  const bytes = new Uint8Array(size).fill(0x20);
  bytes.set(Buffer.from(value, 'latin1').subarray(0, size));
  return bytes;
}

export class EncodingError extends DesignerError {
  constructor(message: string) {
    super(message);
    this.name = 'EncodingError';
  }
}
