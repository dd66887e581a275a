// src/object-pool.ts
// The object pool: insertion-ordered objects, id index, graph queries and geometry

import { isDeepStrictEqual } from 'util';
import { ObjectType } from './object-type.js';
import type { ObjectId, ObjectOf, VtObject, WorkingSet } from './objects.js';
import { MAX_OBJECT_ID } from './objects.js';
import { positionedChildren, referencedObjects, replaceReference } from './references.js';
import {
  IdConflictError,
  InvalidObjectIdError,
  UnknownObjectError,
  failure,
  success,
  type Outcome,
} from './errors.js';

// ============ Geometry Types ============

export interface Size {
  width: number;
  height: number;
}

export interface MaskSizes {
  /** Edge length of the square data/alarm mask area, in pixels. */
  maskSize: number;
  softKeySize: Size;
}

/** ISO 11783-6 lower bounds: 200 px data mask, 60x32 px soft key designator. */
export const MIN_MASK_SIZE = 200;
export const MIN_SOFT_KEY_SIZE: Readonly<Size> = { width: 60, height: 32 };

/** Reference chains deeper than this are treated as empty (cycle guard). */
export const MAX_TRAVERSAL_DEPTH = 32;

// ============ Read-only View ============

/** Query surface of a pool, handed out where callers must not mutate. */
export interface PoolView {
  readonly size: number;
  objects(): readonly VtObject[];
  objectById(id: ObjectId): VtObject | undefined;
  has(id: ObjectId): boolean;
  objectsByType<T extends ObjectType>(type: T): ObjectOf<T>[];
  objectsByTypes(types: readonly ObjectType[]): VtObject[];
  parentObjects(id: ObjectId): VtObject[];
  workingSetObject(): WorkingSet | undefined;
  contentSize(object: VtObject): Size;
  minimumMaskSizes(): MaskSizes;
  maxId(): ObjectId | undefined;
  equals(other: PoolView): boolean;
  clone(): ObjectPool;
}

export interface RenumberOptions {
  /** Rewrite every reference to the old id (and macro bindings, for macros). */
  updateReferences?: boolean;
}

// ============ Pool ============

export class ObjectPool implements PoolView {
  private items: VtObject[] = [];
  private index = new Map<ObjectId, VtObject>();

  constructor(objects: Iterable<VtObject> = []) {
    for (const object of objects) {
      const added = this.add(object);
      if (!added.ok) {
        throw added.error;
      }
    }
  }

  get size(): number {
    return this.items.length;
  }

  objects(): readonly VtObject[] {
    return this.items;
  }

  objectById(id: ObjectId): VtObject | undefined {
    return this.index.get(id);
  }

  has(id: ObjectId): boolean {
    return this.index.has(id);
  }

  objectsByType<T extends ObjectType>(type: T): ObjectOf<T>[] {
    return this.items.filter((object): object is ObjectOf<T> => object.type === type);
  }

  objectsByTypes(types: readonly ObjectType[]): VtObject[] {
    return this.items.filter((object) => types.includes(object.type));
  }

  /** Every object that references `id` (reverse-edge scan). */
  parentObjects(id: ObjectId): VtObject[] {
    return this.items.filter((object) => referencedObjects(object).includes(id));
  }

  workingSetObject(): WorkingSet | undefined {
    return this.objectsByType(ObjectType.WorkingSet)[0];
  }

  maxId(): ObjectId | undefined {
    let max: ObjectId | undefined;
    for (const id of this.index.keys()) {
      if (max === undefined || id > max) max = id;
    }
    return max;
  }

  // ============ Mutation ============

  add(object: VtObject): Outcome<void, IdConflictError> {
    if (this.index.has(object.id)) {
      return failure(new IdConflictError(object.id));
    }
    this.items.push(object);
    this.index.set(object.id, object);
    return success(undefined);
  }

  /**
   * Remove an object. References to it elsewhere are left in place; readers
   * resolve them to "missing object".
   */
  remove(id: ObjectId): VtObject | undefined {
    const removed = this.index.get(id);
    if (!removed) return undefined;
    this.items = this.items.filter((object) => object.id !== id);
    this.index.delete(id);
    return removed;
  }

  /** Replace the object carrying `object.id`. Returns false if there is none. */
  replace(object: VtObject): boolean {
    const position = this.items.findIndex((candidate) => candidate.id === object.id);
    if (position === -1) return false;
    this.items[position] = object;
    this.index.set(object.id, object);
    return true;
  }

  update(id: ObjectId, updater: (object: VtObject) => VtObject): boolean {
    const current = this.index.get(id);
    if (!current) return false;
    const next = updater(current);
    if (next.id !== id) {
      throw new Error(`update() must not change the object id (${id} -> ${next.id}), use renumber()`);
    }
    return this.replace(next);
  }

  renumber(oldId: ObjectId, newId: ObjectId, options: RenumberOptions = {}): Outcome<void> {
    if (!Number.isInteger(newId) || newId < 0 || newId > MAX_OBJECT_ID) {
      return failure(new InvalidObjectIdError(newId));
    }
    const object = this.index.get(oldId);
    if (!object) {
      return failure(new UnknownObjectError(oldId));
    }
    if (oldId === newId) {
      return success(undefined);
    }
    if (this.index.has(newId)) {
      return failure(new IdConflictError(newId));
    }

    const renumbered = { ...object, id: newId };
    this.items = this.items.map((candidate) => (candidate.id === oldId ? renumbered : candidate));

    if (options.updateReferences) {
      const rebindMacros = object.type === ObjectType.Macro && oldId <= 0xff && newId <= 0xff;
      this.items = this.items.map((candidate) => {
        let next = replaceReference(candidate, oldId, newId);
        if (rebindMacros && 'macroRefs' in next) {
          next = {
            ...next,
            macroRefs: next.macroRefs.map((ref) =>
              ref.macroId === oldId ? { ...ref, macroId: newId } : ref,
            ),
          };
        }
        return next;
      });
    }
    this.reindex();
    return success(undefined);
  }

  /** Stable reorder of the objects. */
  sortBy(compare: (a: VtObject, b: VtObject) => number): void {
    this.items = [...this.items].sort(compare);
  }

  clone(): ObjectPool {
    const copy = new ObjectPool();
    copy.items = structuredClone(this.items);
    copy.reindex();
    return copy;
  }

  /** Structural equality: same objects, same order. */
  equals(other: PoolView): boolean {
    return isDeepStrictEqual(this.items, other.objects());
  }

  private reindex(): void {
    this.index = new Map(this.items.map((object) => [object.id, object]));
  }

  // ============ Geometry ============

  /** Pixel extent of an object, derived through its children where it has no size of its own. */
  contentSize(object: VtObject): Size {
    return this.measure(object, new Set(), 0);
  }

  /**
   * Smallest viewport that fits every data/alarm mask and every key, never
   * below the ISO minimum sizes. Seeds the geometry of a freshly imported project.
   */
  minimumMaskSizes(): MaskSizes {
    let maskSize = MIN_MASK_SIZE;
    for (const mask of this.objectsByTypes([ObjectType.DataMask, ObjectType.AlarmMask])) {
      const { width, height } = this.contentSize(mask);
      maskSize = Math.max(maskSize, width, height);
    }

    const softKeySize: Size = { ...MIN_SOFT_KEY_SIZE };
    for (const key of this.objectsByType(ObjectType.Key)) {
      const { width, height } = this.contentSize(key);
      softKeySize.width = Math.max(softKeySize.width, width);
      softKeySize.height = Math.max(softKeySize.height, height);
    }

    return { maskSize, softKeySize };
  }

  private measure(object: VtObject, path: Set<ObjectId>, depth: number): Size {
    if (depth > MAX_TRAVERSAL_DEPTH || path.has(object.id)) {
      return { width: 0, height: 0 };
    }

    switch (object.type) {
      case ObjectType.Container:
      case ObjectType.Button:
      case ObjectType.InputString:
      case ObjectType.InputNumber:
      case ObjectType.InputList:
      case ObjectType.OutputString:
      case ObjectType.OutputNumber:
      case ObjectType.OutputList:
      case ObjectType.OutputLine:
      case ObjectType.OutputRectangle:
      case ObjectType.OutputEllipse:
      case ObjectType.OutputPolygon:
      case ObjectType.OutputLinearBarGraph:
      case ObjectType.OutputArchedBarGraph:
      case ObjectType.Animation:
      case ObjectType.ScaledGraphic:
        return { width: object.width, height: object.height };
      case ObjectType.InputBoolean:
      case ObjectType.OutputMeter:
        return { width: object.width, height: object.width };
      case ObjectType.PictureGraphic:
        return {
          width: object.width,
          height: object.actualWidth === 0 ? 0 : Math.round((object.width * object.actualHeight) / object.actualWidth),
        };
      case ObjectType.GraphicsContext:
        return { width: object.viewportWidth, height: object.viewportHeight };
      case ObjectType.ObjectPointer: {
        const target = object.value === null ? undefined : this.index.get(object.value);
        return target ? this.measureWithin(target, object.id, path, depth) : { width: 0, height: 0 };
      }
      default:
        return this.childrenExtent(object, path, depth);
    }
  }

  private measureWithin(child: VtObject, parentId: ObjectId, path: Set<ObjectId>, depth: number): Size {
    path.add(parentId);
    const size = this.measure(child, path, depth + 1);
    path.delete(parentId);
    return size;
  }

  private childrenExtent(object: VtObject, path: Set<ObjectId>, depth: number): Size {
    let width = 0;
    let height = 0;
    for (const ref of positionedChildren(object)) {
      const child = this.index.get(ref.id);
      if (!child) continue;
      const size = this.measureWithin(child, object.id, path, depth);
      width = Math.max(width, ref.offset.x + size.width);
      height = Math.max(height, ref.offset.y + size.height);
    }
    return { width, height };
  }
}
