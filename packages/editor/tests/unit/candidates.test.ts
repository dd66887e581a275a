import { describe, expect, test } from 'vitest';
import { VtVersion, type VtObject } from '@vtpool/core';
import { childCandidates, pointerCandidates } from '../../src/index.js';
import {
  container,
  fontAttributes,
  key,
  objectPointer,
  outputString,
  poolOf,
  ref,
  samplePool,
} from '../../../core/tests/fixtures.js';

const ids = (objects: VtObject[]): number[] => objects.map((object) => object.id);

describe('childCandidates', () => {
  test('offers objects of the types the parent accepts', () => {
    const pool = samplePool();
    expect(ids(childCandidates(pool, 1000, VtVersion.Version3))).toEqual([0, 3000, 11000, 11001]);
    expect(ids(childCandidates(pool, 4000, VtVersion.Version3))).toEqual([5000, 5001]);
  });

  test('an unknown parent has no candidates', () => {
    expect(childCandidates(samplePool(), 42, VtVersion.Version3)).toEqual([]);
  });
});

describe('pointerCandidates', () => {
  const pool = poolOf(
    container(1, 100, 100, [ref(2)]),
    objectPointer(2, null),
    outputString(3, 'Label', 5),
    key(4, 0),
    fontAttributes(5),
  );

  test('offers what every parent of the pointer accepts', () => {
    expect(ids(pointerCandidates(pool, 2, VtVersion.Version3))).toEqual([1, 3]);
  });

  test('an unreferenced pointer may point anywhere', () => {
    const loose = poolOf(objectPointer(2, null), key(4, 0), fontAttributes(5));
    expect(ids(pointerCandidates(loose, 2, VtVersion.Version3))).toEqual([4, 5]);
  });

  test('only object pointers have pointer candidates', () => {
    expect(pointerCandidates(pool, 3, VtVersion.Version3)).toEqual([]);
  });
});
