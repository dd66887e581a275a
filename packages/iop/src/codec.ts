// src/codec.ts
// Object pool <-> ISO 11783-6 binary (.iop)

import {
  DeserializationError,
  NULL_OBJECT_ID,
  ObjectPool,
  failure,
  isObjectType,
  objectTypeName,
  success,
  vtObjectSchema,
  type ObjectPoolCodec,
  type Outcome,
  type PoolView,
  type VtObject,
} from '@vtpool/core';
import { ByteReader, ByteWriter, EncodingError, decodeVtString, encodeFixedChars, encodeVtString } from './bytes.js';
import { LAYOUTS, type CountWidth, type Field, type Layout, type ValueSpec } from './layouts.js';

type Fields = Record<string, unknown>;

// ============ Decoding ============

function readCount(reader: ByteReader, width: CountWidth, what: string): number {
  if (width === 1) return reader.u8(what);
  if (width === 2) return reader.u16(what);
  return reader.u32(what);
}

function readValue(reader: ByteReader, spec: ValueSpec, what: string): unknown {
  switch (spec.kind) {
    case 'u8':
      return reader.u8(what);
    case 'u16':
    case 'id':
      return reader.u16(what);
    case 'i16':
      return reader.i16(what);
    case 'u32':
      return reader.u32(what);
    case 'i32':
      return reader.i32(what);
    case 'f32':
      return reader.f32(what);
    case 'bool':
      return reader.u8(what) !== 0;
    case 'nullableId': {
      const value = reader.u16(what);
      return value === NULL_OBJECT_ID ? null : value;
    }
    case 'chars':
      return Buffer.from(reader.raw(spec.size, what)).toString('latin1');
    case 'bytes':
      return [...reader.raw(spec.size, what)];
    case 'record':
      return readLayout(reader, spec.layout);
  }
}

function readLayout(reader: ByteReader, layout: Layout): Fields {
  const fields: Fields = {};
  const counts = new Map<string, number>();

  for (const field of layout) {
    switch (field.kind) {
      case 'count':
        counts.set(field.list, readCount(reader, field.width, `${field.list} count`));
        break;
      case 'list': {
        const length = counts.get(field.name) ?? 0;
        const items: unknown[] = [];
        for (let i = 0; i < length; i++) items.push(readValue(reader, field.item, `${field.name}[${i}]`));
        fields[field.name] = items;
        break;
      }
      case 'string': {
        const length = readCount(reader, field.width, `${field.name} length`);
        fields[field.name] = decodeVtString(reader.raw(length, field.name));
        break;
      }
      default:
        fields[field.name] = readValue(reader, field, field.name);
    }
  }
  return fields;
}

function readObject(reader: ByteReader): VtObject {
  const start = reader.position;
  const id = reader.u16('object id');
  const typeCode = reader.u8('object type');
  if (!isObjectType(typeCode)) {
    throw new DeserializationError('object pool', `object ${id} at byte ${start} has unknown type ${typeCode}`);
  }

  const fields = readLayout(reader, LAYOUTS[typeCode]);
  const parsed = vtObjectSchema.safeParse({ ...fields, type: typeCode, id });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new DeserializationError(
      'object pool',
      `${objectTypeName(typeCode)} ${id} is malformed (${detail})`,
      parsed.error,
    );
  }
  return parsed.data;
}

/**
 * Decode a binary object pool.
 * @throws DeserializationError on truncated input, unknown types, malformed
 * records and duplicate ids
 */
export function parseIop(bytes: Uint8Array): ObjectPool {
  const reader = new ByteReader(bytes);
  const pool = new ObjectPool();
  while (reader.remaining > 0) {
    const object = readObject(reader);
    const added = pool.add(object);
    if (!added.ok) {
      throw new DeserializationError('object pool', `duplicate object id ${object.id}`, added.error);
    }
  }
  return pool;
}

/** `parseIop` with the failure returned instead of thrown. */
export function decodeIop(bytes: Uint8Array): Outcome<ObjectPool, DeserializationError> {
  try {
    return success(parseIop(bytes));
  } catch (err) {
    if (err instanceof DeserializationError) return failure(err);
    const error = err instanceof Error ? err : new Error(String(err));
    return failure(new DeserializationError('object pool', error.message, error));
  }
}

// ============ Encoding ============

function asNumber(value: unknown, what: string): number {
  if (typeof value !== 'number') throw new EncodingError(`${what} is not a number`);
  return value;
}

function asList(value: unknown, what: string): unknown[] {
  if (!Array.isArray(value)) throw new EncodingError(`${what} is not a list`);
  return value;
}

function isFields(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function writeCount(writer: ByteWriter, width: CountWidth, length: number, what: string): void {
  const max = width === 1 ? 0xff : width === 2 ? 0xffff : 0xffffffff;
  if (length > max) throw new EncodingError(`${what} has ${length} entries, at most ${max} fit`);
  if (width === 1) writer.u8(length);
  else if (width === 2) writer.u16(length);
  else writer.u32(length);
}

function writeValue(writer: ByteWriter, spec: ValueSpec, value: unknown, what: string): void {
  switch (spec.kind) {
    case 'bool':
      writer.u8(value === true ? 1 : 0);
      return;
    case 'nullableId':
      writer.u16(value === null ? NULL_OBJECT_ID : asNumber(value, what));
      return;
    case 'chars':
      if (typeof value !== 'string') throw new EncodingError(`${what} is not text`);
      writer.raw(encodeFixedChars(value, spec.size));
      return;
    case 'bytes': {
      const bytes = asList(value, what);
      if (bytes.length !== spec.size) throw new EncodingError(`${what} must be ${spec.size} bytes`);
      writer.raw(bytes.map((byte, i) => asNumber(byte, `${what}[${i}]`)));
      return;
    }
    case 'record':
      if (!isFields(value)) throw new EncodingError(`${what} is not a record`);
      writeLayout(writer, spec.layout, value);
      return;
    default: {
      const number = asNumber(value, what);
      if (spec.kind === 'u8') writer.u8(number);
      else if (spec.kind === 'u16' || spec.kind === 'id') writer.u16(number);
      else if (spec.kind === 'i16') writer.i16(number);
      else if (spec.kind === 'u32') writer.u32(number);
      else if (spec.kind === 'i32') writer.i32(number);
      else writer.f32(number);
    }
  }
}

function writeField(writer: ByteWriter, field: Field, fields: Fields): void {
  switch (field.kind) {
    case 'count':
      writeCount(writer, field.width, asList(fields[field.list], field.list).length, field.list);
      return;
    case 'list':
      asList(fields[field.name], field.name).forEach((item, i) => writeValue(writer, field.item, item, `${field.name}[${i}]`));
      return;
    case 'string': {
      const value = fields[field.name];
      if (typeof value !== 'string') throw new EncodingError(`field ${field.name} is not text`);
      const bytes = encodeVtString(value);
      writeCount(writer, field.width, bytes.length, field.name);
      writer.raw(bytes);
      return;
    }
    default:
      writeValue(writer, field, fields[field.name], field.name);
  }
}

function writeLayout(writer: ByteWriter, layout: Layout, fields: Fields): void {
  for (const field of layout) writeField(writer, field, fields);
}

/** Encode every object of `pool`, in pool order. */
export function encodeIop(pool: PoolView): Uint8Array {
  const writer = new ByteWriter();
  for (const object of pool.objects()) {
    writer.u16(object.id);
    writer.u8(object.type);
    const fields: Fields = { ...object };
    writeLayout(writer, LAYOUTS[object.type], fields);
  }
  return writer.toBytes();
}

/** The codec project files use for their embedded pool. */
export const iopCodec: ObjectPoolCodec = {
  decode: decodeIop,
  encode: encodeIop,
};
