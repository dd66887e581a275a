// src/object-info.ts
// Per-object metadata keyed by a stable identity that outlives id renumbering

import { objectTypeName } from './object-type.js';
import type { ObjectId, VtObject } from './objects.js';

/** Identity assigned once, the first time an object is observed. */
export type StableId = string;

/** Numeric object id -> stable identity, for one pool snapshot. */
export type IdentityKeys = Map<ObjectId, StableId>;

/** Fallback name shown for an object nobody has named, e.g. `5: DataMask`. */
export function defaultObjectName(object: Pick<VtObject, 'id' | 'type'>): string {
  return `${object.id}: ${objectTypeName(object.type)}`;
}

export class ObjectInfo {
  readonly stableId: StableId;
  private name: string | undefined;

  constructor(stableId: StableId = crypto.randomUUID(), name?: string) {
    this.stableId = stableId;
    if (name !== undefined) this.setName(name);
  }

  /** The user's name for the object, if one was given. */
  get customName(): string | undefined {
    return this.name;
  }

  getName(object: Pick<VtObject, 'id' | 'type'>): string {
    return this.name ?? defaultObjectName(object);
  }

  /** Blank names are ignored; use `clearName` to drop a name. */
  setName(name: string): void {
    if (name.trim() === '') return;
    this.name = name;
  }

  clearName(): void {
    this.name = undefined;
  }

  clone(): ObjectInfo {
    return new ObjectInfo(this.stableId, this.name);
  }
}
