// src/editor-project.ts
// The editing transaction engine: committed vs staged pool and selection,
// bounded undo/redo, object metadata and id allocation

import { ObjectType, VtVersion, objectTypeName } from './object-type.js';
import type { ObjectId, VtObject } from './objects.js';
import { ObjectPool, type PoolView, type Size } from './object-pool.js';
import { ObjectInfo, type IdentityKeys, type StableId } from './object-info.js';
import { NameRegistry, generateName, smartDefaultName, suggestNameForChild, validateName } from './naming.js';
import { IdAllocator } from './id-allocator.js';
import { defaultObject } from './object-defaults.js';
import { isChildAllowed } from './relationships.js';
import { childReferences } from './references.js';
import {
  type ObjectPoolCodec,
  PROJECT_FORMAT,
  PROJECT_FORMAT_VERSION,
  decodeBase64,
  encodeBase64,
  projectFromBytes,
  projectToBytes,
} from './project-file.js';
import {
  ChildNotAllowedError,
  DeserializationError,
  UnknownObjectError,
  failure,
  success,
  type Outcome,
} from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('editor-project');

export const MAX_UNDO_HISTORY = 10;
export const MAX_SELECTION_HISTORY = 20;

export type Selection = ObjectId | null;

interface PoolSnapshot {
  pool: ObjectPool;
  keys: IdentityKeys;
}

export interface EditorProjectOptions {
  vtVersion?: VtVersion;
  maskSize?: number;
  softKeySize?: Size;
  selected?: Selection;
}

export interface CreateObjectOptions {
  /** Explicit name; falls back to a generated one when blank or taken. */
  name?: string;
  /** Attach the new object to this parent (at offset 0,0 where children are positioned). */
  parentId?: ObjectId;
}

function pushBounded<T>(stack: T[], entry: T, limit: number): void {
  stack.push(entry);
  while (stack.length > limit) stack.shift();
}

function attachChild(parent: VtObject, childId: ObjectId): VtObject {
  switch (parent.type) {
    case ObjectType.SoftKeyMask:
    case ObjectType.KeyGroup:
      return { ...parent, objects: [...parent.objects, childId] };
    case ObjectType.InputList:
    case ObjectType.OutputList:
      return { ...parent, listItems: [...parent.listItems, childId] };
    default:
      if ('objectRefs' in parent) {
        return { ...parent, objectRefs: [...parent.objectRefs, { id: childId, offset: { x: 0, y: 0 } }] };
      }
      return parent;
  }
}

export class EditorProject {
  vtVersion: VtVersion;
  maskSize: number;
  softKeySize: Size;

  private committed: ObjectPool;
  private staged: ObjectPool;
  private committedKeys: IdentityKeys = new Map();
  private stagedKeys: IdentityKeys = new Map();
  private committedSelection: Selection;
  private stagedSelection: Selection;

  private undoPools: PoolSnapshot[] = [];
  private redoPools: PoolSnapshot[] = [];
  private undoSelections: Selection[] = [];
  private redoSelections: Selection[] = [];

  private infos = new Map<StableId, ObjectInfo>();
  private allocator: IdAllocator;

  constructor(pool: ObjectPool, options: EditorProjectOptions = {}) {
    const minimum = pool.minimumMaskSizes();
    this.vtVersion = options.vtVersion ?? VtVersion.Version3;
    this.maskSize = options.maskSize ?? minimum.maskSize;
    this.softKeySize = options.softKeySize ?? minimum.softKeySize;
    this.committed = pool.clone();
    this.staged = pool.clone();
    this.committedSelection = options.selected ?? null;
    this.stagedSelection = this.committedSelection;
    this.allocator = new IdAllocator(this.staged);
    for (const object of pool.objects()) {
      const info = this.register(new ObjectInfo());
      this.committedKeys.set(object.id, info.stableId);
      this.stagedKeys.set(object.id, info.stableId);
    }
  }

  /** Project for a freshly imported pool; geometry comes from the pool's largest mask and key. */
  static fromPool(pool: ObjectPool, vtVersion?: VtVersion): EditorProject {
    const project = new EditorProject(pool, { vtVersion });
    logger.info(
      { objects: pool.size, maskSize: project.maskSize, softKeySize: project.softKeySize },
      'Created project from object pool',
    );
    return project;
  }

  /**
   * Restore a saved project. Names stored under their save-time ids are
   * re-attached to the objects' stable identities.
   */
  static load(
    bytes: Uint8Array,
    codec: ObjectPoolCodec,
    options: Pick<EditorProjectOptions, 'vtVersion'> = {},
  ): Outcome<EditorProject, DeserializationError> {
    const file = projectFromBytes(bytes);
    if (!file.ok) return file;

    const decoded = codec.decode(decodeBase64(file.value.objectPool));
    if (!decoded.ok) return decoded;
    const pool = decoded.value;

    const project = new EditorProject(pool, {
      vtVersion: file.value.vtVersion ?? options.vtVersion,
      maskSize: file.value.maskSize,
      softKeySize: file.value.softKeySize,
      selected: file.value.lastSelected,
    });
    for (const [key, name] of Object.entries(file.value.objectInfo)) {
      const object = pool.objectById(Number(key));
      if (object) project.getObjectInfo(object).setName(name);
    }
    logger.info({ objects: pool.size, named: Object.keys(file.value.objectInfo).length }, 'Loaded project');
    return success(project);
  }

  save(codec: ObjectPoolCodec): Uint8Array {
    const objectInfo: Record<string, string> = {};
    for (const object of this.staged.objects()) {
      const name = this.getObjectInfo(object).customName;
      if (name !== undefined) objectInfo[String(object.id)] = name;
    }
    return projectToBytes({
      format: PROJECT_FORMAT,
      version: PROJECT_FORMAT_VERSION,
      vtVersion: this.vtVersion,
      objectPool: encodeBase64(codec.encode(this.staged)),
      objectInfo,
      maskSize: this.maskSize,
      softKeySize: { ...this.softKeySize },
      lastSelected: this.stagedSelection,
    });
  }

  // ============ Pools ============

  get committedPool(): PoolView {
    return this.committed;
  }

  get stagedPool(): PoolView {
    return this.staged;
  }

  /**
   * The one mutation entry point for the staged pool. Renumbering must go
   * through `renumberObject` so metadata follows the object.
   */
  editPool<T>(edit: (pool: ObjectPool) => T): T {
    const result = edit(this.staged);
    for (const id of [...this.stagedKeys.keys()]) {
      if (!this.staged.has(id)) this.stagedKeys.delete(id);
    }
    for (const object of this.staged.objects()) {
      if (this.stagedKeys.has(object.id)) continue;
      this.stagedKeys.set(object.id, this.register(new ObjectInfo()).stableId);
    }
    return result;
  }

  /** Commit the staged pool if it differs from the committed one. */
  updatePool(): boolean {
    if (this.staged.equals(this.committed) && this.sameIdentities()) {
      return false;
    }
    this.redoPools = [];
    pushBounded(this.undoPools, { pool: this.committed, keys: this.committedKeys }, MAX_UNDO_HISTORY);
    this.committed = this.staged.clone();
    this.committedKeys = new Map(this.stagedKeys);
    logger.debug({ undo: this.undoPools.length }, 'Committed pool');
    return true;
  }

  get undoAvailable(): boolean {
    return this.undoPools.length > 0;
  }

  get redoAvailable(): boolean {
    return this.redoPools.length > 0;
  }

  undo(): boolean {
    const snapshot = this.undoPools.pop();
    if (!snapshot) return false;
    this.redoPools.push({ pool: this.committed, keys: this.committedKeys });
    this.adopt(snapshot);
    logger.debug({ undo: this.undoPools.length, redo: this.redoPools.length }, 'Undo');
    return true;
  }

  redo(): boolean {
    const snapshot = this.redoPools.pop();
    if (!snapshot) return false;
    this.undoPools.push({ pool: this.committed, keys: this.committedKeys });
    this.adopt(snapshot);
    logger.debug({ undo: this.undoPools.length, redo: this.redoPools.length }, 'Redo');
    return true;
  }

  private adopt(snapshot: PoolSnapshot): void {
    this.committed = snapshot.pool;
    this.committedKeys = snapshot.keys;
    this.staged = snapshot.pool.clone();
    this.stagedKeys = new Map(snapshot.keys);
    this.allocator.resync(this.staged);
  }

  private sameIdentities(): boolean {
    return this.staged.objects().every((object) => this.stagedKeys.get(object.id) === this.committedKeys.get(object.id));
  }

  // ============ Selection ============

  get selected(): Selection {
    return this.stagedSelection;
  }

  get committedSelected(): Selection {
    return this.committedSelection;
  }

  select(id: Selection): void {
    this.stagedSelection = id;
  }

  /**
   * Commit the staged selection. Only a change to a non-null selection is
   * recorded, so deselecting is not an undo step of its own.
   */
  updateSelected(): boolean {
    if (this.stagedSelection === this.committedSelection) return false;
    this.redoSelections = [];
    if (this.stagedSelection !== null) {
      pushBounded(this.undoSelections, this.committedSelection, MAX_SELECTION_HISTORY);
    }
    this.committedSelection = this.stagedSelection;
    return true;
  }

  get previousSelectedAvailable(): boolean {
    return this.undoSelections.length > 0;
  }

  get nextSelectedAvailable(): boolean {
    return this.redoSelections.length > 0;
  }

  previousSelected(): boolean {
    const previous = this.undoSelections.pop();
    if (previous === undefined) return false;
    this.redoSelections.push(this.committedSelection);
    this.committedSelection = previous;
    this.stagedSelection = previous;
    return true;
  }

  nextSelected(): boolean {
    const next = this.redoSelections.pop();
    if (next === undefined) return false;
    this.undoSelections.push(this.committedSelection);
    this.committedSelection = next;
    this.stagedSelection = next;
    return true;
  }

  // ============ Metadata ============

  /**
   * Metadata of a staged object. Every object has an identity from the
   * moment it enters the staged pool; an id in neither pool gets a detached
   * default.
   */
  getObjectInfo(object: Pick<VtObject, 'id'>): ObjectInfo {
    const key = this.stagedKeys.get(object.id) ?? this.committedKeys.get(object.id);
    const known = key === undefined ? undefined : this.infos.get(key);
    return known ?? new ObjectInfo();
  }

  private register(info: ObjectInfo): ObjectInfo {
    this.infos.set(info.stableId, info);
    return info;
  }

  objectName(object: VtObject): string {
    return this.getObjectInfo(object).getName(object);
  }

  /** Displayed names of every staged object, optionally leaving one object out. */
  displayedNames(except?: ObjectId): NameRegistry {
    const names = new NameRegistry();
    for (const object of this.staged.objects()) {
      if (object.id !== except) names.add(this.objectName(object));
    }
    return names;
  }

  /**
   * Give every listed object (all staged objects by default) that has no
   * name of its own a contextual or smart default name. Names stay unique
   * across the pool. Returns how many objects were named.
   */
  applySmartNaming(ids?: readonly ObjectId[]): number {
    const targets = ids === undefined ? undefined : new Set(ids);
    const names = this.displayedNames();
    const ordinals = new Map<ObjectType, number>();
    let named = 0;

    for (const object of this.staged.objects()) {
      const ordinal = ordinals.get(object.type) ?? 0;
      ordinals.set(object.type, ordinal + 1);

      const info = this.getObjectInfo(object);
      if ((targets && !targets.has(object.id)) || info.customName !== undefined) continue;

      names.delete(info.getName(object));
      const name = generateName(object, ordinal, names);
      info.setName(name);
      names.add(name);
      named++;
    }
    logger.debug({ named }, 'Applied smart naming');
    return named;
  }

  generateSmartNameForNewObject(type: ObjectType): string {
    return smartDefaultName(type, this.staged.objectsByType(type).length, this.displayedNames());
  }

  // ============ Structural Edits ============

  allocateId(): ObjectId {
    return this.allocator.allocate(this.staged);
  }

  /** Add a default object of `type` to the staged pool, name it and select it. */
  createObject(type: ObjectType, options: CreateObjectOptions = {}): Outcome<VtObject> {
    const parent = options.parentId === undefined ? undefined : this.staged.objectById(options.parentId);
    if (options.parentId !== undefined && !parent) {
      return failure(new UnknownObjectError(options.parentId));
    }
    if (parent && !isChildAllowed(parent.type, type, this.vtVersion)) {
      return failure(new ChildNotAllowedError(parent.id, objectTypeName(parent.type), objectTypeName(type)));
    }

    const ordinal = this.staged.objectsByType(type).length;
    const names = this.displayedNames();
    const object = defaultObject(type, this.allocateId());

    let name: string | undefined;
    if (options.name !== undefined) {
      const valid = validateName(options.name, names);
      if (valid.ok) name = valid.value;
    }
    if (name === undefined && parent) {
      const siblings = childReferences(parent).flatMap((childId) => this.staged.objectById(childId) ?? []);
      const suggestion = suggestNameForChild(parent, type, siblings);
      if (suggestion !== undefined) name = names.uniqueName(suggestion);
    }
    name ??= generateName(object, ordinal, names);

    this.editPool((pool) => {
      pool.add(object);
      if (parent) pool.replace(attachChild(parent, object.id));
    });
    this.getObjectInfo(object).setName(name);
    this.stagedSelection = object.id;

    logger.debug({ objectId: object.id, type: objectTypeName(type), name }, 'Created object');
    return success(object);
  }

  /** Remove an object from the staged pool. References to it stay and read as missing. */
  deleteObject(id: ObjectId): boolean {
    const removed = this.editPool((pool) => pool.remove(id));
    if (!removed) return false;
    if (this.stagedSelection === id) this.stagedSelection = null;
    logger.debug({ objectId: id }, 'Deleted object');
    return true;
  }

  renameObject(id: ObjectId, name: string): Outcome<string> {
    const object = this.staged.objectById(id);
    if (!object) return failure(new UnknownObjectError(id));
    const valid = validateName(name, this.displayedNames(id));
    if (!valid.ok) return valid;
    this.getObjectInfo(object).setName(valid.value);
    return success(valid.value);
  }

  /** Change an object's id. References follow it, and so does its metadata. */
  renumberObject(oldId: ObjectId, newId: ObjectId): Outcome<void> {
    if (oldId === newId && this.staged.has(oldId)) return success(undefined);
    const object = this.staged.objectById(oldId);
    const info = object ? this.getObjectInfo(object) : undefined;

    const result = this.staged.renumber(oldId, newId, { updateReferences: true });
    if (!result.ok) {
      logger.warn({ oldId, newId, reason: result.error.message }, 'Rejected renumber');
      return result;
    }
    this.stagedKeys.delete(oldId);
    if (info) this.stagedKeys.set(newId, info.stableId);
    if (this.stagedSelection === oldId) this.stagedSelection = newId;
    return success(undefined);
  }
}
