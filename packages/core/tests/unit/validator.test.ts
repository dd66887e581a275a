import { describe, expect, test } from 'vitest';
import { VtEvent, VtVersion, validatePool, vtObjectSchema } from '../../src/index.js';
import { dataMask, fontAttributes, key, macro, onShow, outputNumber, poolOf, ref, samplePool, workingSet } from '../fixtures.js';

describe('validatePool', () => {
  test('accepts a consistent pool', () => {
    expect(validatePool(samplePool(), VtVersion.Version3)).toEqual({ valid: true, errors: [] });
  });

  test('requires exactly one working set', () => {
    expect(validatePool(poolOf(dataMask(5)), VtVersion.Version3).errors).toEqual([
      { path: 'workingSet', message: 'pool has no WorkingSet object' },
    ]);
    expect(validatePool(poolOf(workingSet(0, 5), workingSet(1, 5), dataMask(5)), VtVersion.Version3).errors).toEqual([
      { path: 'workingSet', message: 'pool has 2 WorkingSet objects (ids 0, 1)' },
    ]);
  });

  test('reports each missing reference once', () => {
    const pool = samplePool();
    pool.remove(11001);
    const result = validatePool(pool, VtVersion.Version3);
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual([
      { path: 'objects.1000', message: 'DataMask references missing object 11001' },
      { path: 'objects.3000', message: 'Container references missing object 11001' },
    ]);
  });

  test('reports children the VT version does not allow', () => {
    const pool = poolOf(workingSet(0, 1), dataMask(1, [ref(2)]), key(2, 0));
    expect(validatePool(pool, VtVersion.Version3).errors).toEqual([
      { path: 'objects.1.children.2', message: 'Key is not allowed as a child of DataMask on VT version 3' },
    ]);
  });

  test('checks macro bindings', () => {
    const pool = poolOf(
      { ...workingSet(0, 1), macroRefs: [onShow(7)] },
      dataMask(1, [], [onShow(9), { event: VtEvent.OnHide, macroId: 2 }]),
      key(2, 0),
      macro(7),
    );
    const errors = validatePool(pool, VtVersion.Version3).errors;
    expect(errors).toContainEqual({ path: 'objects.0.macroRefs.0', message: 'WorkingSet cannot raise event 3' });
    expect(errors).toContainEqual({ path: 'objects.1.macroRefs.0', message: 'macro 9 does not exist' });
    expect(errors).toContainEqual({ path: 'objects.1.macroRefs.1', message: 'object 2 is a Key, not a Macro' });
  });

  test('reports scales a single-precision float cannot hold', () => {
    const pool = poolOf(workingSet(0, 1), dataMask(1, [ref(2)]), outputNumber(2, 0.1, 3), fontAttributes(3));
    expect(validatePool(pool, VtVersion.Version3).errors).toEqual([
      { path: 'objects.2.scale', message: 'OutputNumber Number must be representable as a 32-bit float' },
    ]);

    expect(vtObjectSchema.safeParse(outputNumber(2, 0.1, 3)).success).toBe(false);
    expect(vtObjectSchema.safeParse(outputNumber(2, 0.5, 3)).success).toBe(true);
    expect(vtObjectSchema.safeParse(outputNumber(2, Math.fround(0.1), 3)).success).toBe(true);
  });
});
