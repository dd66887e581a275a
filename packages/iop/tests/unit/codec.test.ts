import { describe, expect, test } from 'vitest';
import {
  DeserializationError,
  OBJECT_TYPES,
  ObjectPool,
  defaultObject,
  objectTypeName,
} from '@vtpool/core';
import { EncodingError, decodeIop, encodeIop, iopCodec, parseIop } from '../../src/index.js';
import {
  fontAttributes,
  macro,
  numberVariable,
  objectPointer,
  outputNumber,
  poolOf,
  samplePool,
  stringVariable,
} from '../../../core/tests/fixtures.js';

function decodeError(bytes: number[]): string {
  const result = decodeIop(Uint8Array.from(bytes));
  if (result.ok) throw new Error('expected the pool to be rejected');
  expect(result.error).toBeInstanceOf(DeserializationError);
  return result.error.message;
}

describe('iop codec', () => {
  test('writes records as id, type and little-endian fields', () => {
    expect([...encodeIop(poolOf(numberVariable(21, 42)))]).toEqual([0x15, 0x00, 0x15, 0x2a, 0x00, 0x00, 0x00]);
    expect([...encodeIop(poolOf(macro(7, [0xa8, 0xff])))]).toEqual([0x07, 0x00, 0x1c, 0x02, 0x00, 0xa8, 0xff]);
  });

  test('null references travel as 0xFFFF', () => {
    const bytes = encodeIop(poolOf(objectPointer(0x0102, null)));
    expect([...bytes]).toEqual([0x02, 0x01, 0x1b, 0xff, 0xff]);
    expect(parseIop(bytes).objectById(0x0102)).toEqual(objectPointer(0x0102, null));
  });

  test('reads a pool back unchanged', () => {
    const pool = samplePool();
    const decoded = iopCodec.decode(iopCodec.encode(pool));
    expect(decoded.ok && decoded.value.equals(pool)).toBe(true);
  });

  test('every default object survives the wire format', () => {
    const pool = new ObjectPool(OBJECT_TYPES.map((type) => defaultObject(type, type + 1)));
    const decoded = parseIop(encodeIop(pool));
    for (const object of pool.objects()) {
      expect(decoded.objectById(object.id), objectTypeName(object.type)).toEqual(object);
    }
  });

  test('strings outside Latin-1 are written as UTF-16 with a byte order mark', () => {
    const wide = poolOf(stringVariable(1, 'Ω'));
    expect([...encodeIop(wide)]).toEqual([0x01, 0x00, 0x16, 0x04, 0x00, 0xff, 0xfe, 0xa9, 0x03]);
    expect(parseIop(encodeIop(wide)).objectById(1)).toMatchObject({ value: 'Ω' });

    const latin = poolOf(stringVariable(1, 'é'));
    expect([...encodeIop(latin)]).toEqual([0x01, 0x00, 0x16, 0x01, 0x00, 0xe9]);
  });

  test('Latin-1 text that opens like a byte order mark is written as UTF-16', () => {
    const pool = poolOf(stringVariable(1, '\u00ff\u00feAB'));
    expect([...encodeIop(pool)]).toEqual([
      0x01, 0x00, 0x16, 0x0a, 0x00, 0xff, 0xfe, 0xff, 0x00, 0xfe, 0x00, 0x41, 0x00, 0x42, 0x00,
    ]);
    expect(parseIop(encodeIop(pool)).equals(pool)).toBe(true);
  });

  test('single-precision scales read back exactly', () => {
    const pool = poolOf(outputNumber(1, 0.5, 2), outputNumber(3, Math.fround(0.1), 2), fontAttributes(2));
    expect(parseIop(encodeIop(pool)).equals(pool)).toBe(true);
  });

  test('an empty input is an empty pool', () => {
    expect(parseIop(new Uint8Array()).size).toBe(0);
  });

  describe('rejects', () => {
    test('truncated records', () => {
      expect(decodeError([0x15, 0x00, 0x15, 0x2a])).toBe(
        'object pool: truncated at byte 3: value needs 4 bytes, 1 left',
      );
    });

    test('unknown object types', () => {
      expect(decodeError([0x01, 0x00, 0x63])).toBe('object pool: object 1 at byte 0 has unknown type 99');
    });

    test('duplicate ids', () => {
      const record = [0x15, 0x00, 0x15, 0x2a, 0x00, 0x00, 0x00];
      expect(decodeError([...record, ...record])).toBe('object pool: duplicate object id 21');
    });

    test('records whose fields are out of range', () => {
      const workingSet = [0x00, 0x00, 0x00, 0x01, 0x01, 0xff, 0xff, 0x00, 0x00, 0x00];
      expect(decodeError(workingSet)).toContain('object pool: WorkingSet 0 is malformed (activeMask:');
    });
  });

  test('refuses to encode lists longer than their count field', () => {
    const pool = poolOf(macro(7, new Array<number>(0x10000).fill(0)));
    expect(() => encodeIop(pool)).toThrow(EncodingError);
    expect(() => encodeIop(pool)).toThrow('commands has 65536 entries, at most 65535 fit');
  });
});
