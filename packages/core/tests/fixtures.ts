// tests/fixtures.ts
// Small object builders shared by the test suites

import { z } from 'zod';
import { ObjectType, VtEvent } from '../src/object-type.js';
import { vtObjectSchema, type MacroRef, type ObjectId, type ObjectOf, type ObjectRef } from '../src/objects.js';
import type { VtObject } from '../src/objects.js';
import { ObjectPool } from '../src/object-pool.js';
import type { ObjectPoolCodec } from '../src/project-file.js';
import { DeserializationError, failure, success } from '../src/errors.js';

export const ref = (id: ObjectId, x = 0, y = 0): ObjectRef => ({ id, offset: { x, y } });

export function workingSet(
  id: ObjectId,
  activeMask: ObjectId,
  objectRefs: ObjectRef[] = [],
): ObjectOf<ObjectType.WorkingSet> {
  return {
    type: ObjectType.WorkingSet,
    id,
    backgroundColour: 1,
    selectable: true,
    activeMask,
    objectRefs,
    macroRefs: [],
    languageCodes: ['en'],
  };
}

export function dataMask(
  id: ObjectId,
  objectRefs: ObjectRef[] = [],
  macroRefs: MacroRef[] = [],
  softKeyMask: ObjectId | null = null,
): ObjectOf<ObjectType.DataMask> {
  return { type: ObjectType.DataMask, id, backgroundColour: 1, softKeyMask, objectRefs, macroRefs };
}

export function container(
  id: ObjectId,
  width: number,
  height: number,
  objectRefs: ObjectRef[] = [],
): ObjectOf<ObjectType.Container> {
  return { type: ObjectType.Container, id, width, height, hidden: false, objectRefs, macroRefs: [] };
}

export function softKeyMask(id: ObjectId, objects: ObjectId[] = []): ObjectOf<ObjectType.SoftKeyMask> {
  return { type: ObjectType.SoftKeyMask, id, backgroundColour: 1, objects, macroRefs: [] };
}

export function key(id: ObjectId, keyCode: number, objectRefs: ObjectRef[] = []): ObjectOf<ObjectType.Key> {
  return { type: ObjectType.Key, id, backgroundColour: 1, keyCode, objectRefs, macroRefs: [] };
}

export function button(id: ObjectId, keyCode: number, width = 80, height = 40): ObjectOf<ObjectType.Button> {
  return {
    type: ObjectType.Button,
    id,
    width,
    height,
    backgroundColour: 1,
    borderColour: 0,
    keyCode,
    options: 0,
    objectRefs: [],
    macroRefs: [],
  };
}

export function outputString(
  id: ObjectId,
  value: string,
  fontAttributes: ObjectId,
  width = 100,
  height = 20,
): ObjectOf<ObjectType.OutputString> {
  return {
    type: ObjectType.OutputString,
    id,
    width,
    height,
    backgroundColour: 1,
    fontAttributes,
    options: 0,
    variableReference: null,
    justification: 0,
    value,
    macroRefs: [],
  };
}

export function fontAttributes(id: ObjectId): ObjectOf<ObjectType.FontAttributes> {
  return { type: ObjectType.FontAttributes, id, fontColour: 0, fontSize: 2, fontType: 0, fontStyle: 0, macroRefs: [] };
}

export function numberVariable(id: ObjectId, value: number): ObjectOf<ObjectType.NumberVariable> {
  return { type: ObjectType.NumberVariable, id, value };
}

export function outputNumber(id: ObjectId, scale: number, fontAttributes: ObjectId): ObjectOf<ObjectType.OutputNumber> {
  return {
    type: ObjectType.OutputNumber,
    id,
    width: 100,
    height: 20,
    backgroundColour: 1,
    fontAttributes,
    options: 0,
    variableReference: null,
    value: 0,
    offset: 0,
    scale,
    numberOfDecimals: 1,
    format: 0,
    justification: 0,
    macroRefs: [],
  };
}

export function stringVariable(id: ObjectId, value: string): ObjectOf<ObjectType.StringVariable> {
  return { type: ObjectType.StringVariable, id, value };
}

export function objectPointer(id: ObjectId, value: ObjectId | null): ObjectOf<ObjectType.ObjectPointer> {
  return { type: ObjectType.ObjectPointer, id, value };
}

export function macro(id: ObjectId, commands: number[] = []): ObjectOf<ObjectType.Macro> {
  return { type: ObjectType.Macro, id, commands };
}

export function pictureGraphic(
  id: ObjectId,
  width: number,
  actualWidth: number,
  actualHeight: number,
): ObjectOf<ObjectType.PictureGraphic> {
  return {
    type: ObjectType.PictureGraphic,
    id,
    width,
    actualWidth,
    actualHeight,
    format: 0,
    options: 0,
    transparencyColour: 0,
    data: [],
    macroRefs: [],
  };
}

export const onShow = (macroId: number): MacroRef => ({ event: VtEvent.OnShow, macroId });

export function poolOf(...objects: VtObject[]): ObjectPool {
  return new ObjectPool(objects);
}

/**
 * A small but complete pool: working set 0 showing data mask 1000, which
 * holds a header container with a label and references soft key mask 4000.
 */
export function samplePool(): ObjectPool {
  return poolOf(
    workingSet(0, 1000, [ref(11000, 0, 0)]),
    dataMask(1000, [ref(3000, 0, 0), ref(11001, 10, 250)], [onShow(7)], 4000),
    container(3000, 240, 60, [ref(11001, 5, 5)]),
    outputString(11000, 'Demo', 23000),
    outputString(11001, 'Speed', 23000, 120, 30),
    softKeyMask(4000, [5000, 5001]),
    key(5000, 2),
    key(5001, 3),
    fontAttributes(23000),
    macro(7, [0xa8, 0xff]),
  );
}

/** Codec storing the pool as a JSON array, for project tests that do not care about .iop. */
export const jsonCodec: ObjectPoolCodec = {
  decode: (bytes) => {
    try {
      const objects = z.array(vtObjectSchema).parse(JSON.parse(new TextDecoder().decode(bytes)));
      return success(new ObjectPool(objects));
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      return failure(new DeserializationError('object pool', error.message, error));
    }
  },
  encode: (pool) => new TextEncoder().encode(JSON.stringify(pool.objects())),
};
