// src/candidates.ts
// Objects the editor may offer as a reference target

import {
  ObjectType,
  allowedChildTypes,
  type ObjectId,
  type PoolView,
  type VtObject,
  type VtVersion,
} from '@vtpool/core';

/** Objects that may be added as children of `parentId` on a VT of `version`. */
export function childCandidates(pool: PoolView, parentId: ObjectId, version: VtVersion): VtObject[] {
  const parent = pool.objectById(parentId);
  if (!parent) return [];
  const allowed = allowedChildTypes(parent.type, version);
  return pool.objects().filter((object) => object.id !== parentId && allowed.includes(object.type));
}

/**
 * Objects an object pointer may point at: types every parent of the pointer
 * accepts as a child. A pointer nobody references may point at anything.
 */
export function pointerCandidates(pool: PoolView, pointerId: ObjectId, version: VtVersion): VtObject[] {
  const pointer = pool.objectById(pointerId);
  if (!pointer || pointer.type !== ObjectType.ObjectPointer) return [];

  const parents = pool.parentObjects(pointerId);
  const accepted = (type: ObjectType): boolean =>
    parents.every((parent) => allowedChildTypes(parent.type, version).includes(type));

  return pool.objects().filter((object) => object.id !== pointerId && accepted(object.type));
}
