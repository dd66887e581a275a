// src/naming.ts
// Naming engine: contextual names, smart defaults and pool-wide uniqueness

import { z } from 'zod';
import labelsJson from './data/object-type-labels.json' with { type: 'json' };
import { ObjectType, objectTypeName } from './object-type.js';
import type { VtObject } from './objects.js';
import { InvalidNameError, failure, success, type Outcome } from './errors.js';

export const MAX_NAME_LENGTH = 100;

const typeLabels = z.record(z.string()).parse(labelsJson);

/** Human label for an object type, e.g. `Number Display` for OutputNumber. */
export function objectTypeLabel(type: ObjectType): string {
  const name = objectTypeName(type);
  return typeLabels[name] ?? name;
}

// ============ Name Registry ============

/**
 * Multiset of the names currently displayed in a pool. Two objects may
 * display the same string (e.g. after loading a hand-edited project), so
 * names are counted rather than stored once.
 */
export class NameRegistry {
  private counts = new Map<string, number>();

  constructor(names: Iterable<string> = []) {
    for (const name of names) this.add(name);
  }

  has(name: string): boolean {
    return this.counts.has(name);
  }

  add(name: string): void {
    this.counts.set(name, (this.counts.get(name) ?? 0) + 1);
  }

  delete(name: string): void {
    const count = this.counts.get(name);
    if (count === undefined) return;
    if (count <= 1) {
      this.counts.delete(name);
    } else {
      this.counts.set(name, count - 1);
    }
  }

  /** `base` itself if free, otherwise `base N` for the first free N >= `firstSuffix`. */
  uniqueName(base: string, firstSuffix = 2): string {
    if (!this.has(base)) return base;
    return this.suffixed(base, firstSuffix);
  }

  suffixed(base: string, firstSuffix: number): string {
    let suffix = firstSuffix;
    while (this.has(`${base} ${suffix}`)) suffix++;
    return `${base} ${suffix}`;
  }
}

// ============ Contextual Names ============

/** Name suggested by what the object is configured to do, if anything. */
export function contextualName(object: VtObject): string | undefined {
  switch (object.type) {
    case ObjectType.Key:
      if (object.keyCode === 0) return 'ACK/Enter Key';
      if (object.keyCode === 1) return 'ESC Key';
      if (object.keyCode >= 2 && object.keyCode <= 7) return `Soft Key ${object.keyCode - 1}`;
      return undefined;
    case ObjectType.Button:
      if (object.keyCode === 0) return 'OK Button';
      if (object.keyCode === 1) return 'Cancel Button';
      return undefined;
    case ObjectType.Container:
      if (object.height < 100) return 'Header Container';
      if (object.height > 300) return 'Main Container';
      return undefined;
    default:
      return undefined;
  }
}

// ============ Smart Defaults ============

function baseLabel(type: ObjectType, ordinal: number): string {
  if (type === ObjectType.DataMask) {
    return ordinal === 0 ? 'Main Screen' : 'Data Screen';
  }
  return objectTypeLabel(type);
}

/**
 * Default name for the `ordinal`-th (0-based) object of `type`. The first
 * instance gets the bare label when it is free; later instances, or a taken
 * label, count up from `ordinal + 1`.
 */
export function smartDefaultName(type: ObjectType, ordinal: number, taken: NameRegistry): string {
  const base = baseLabel(type, ordinal);
  if (ordinal === 0 && !taken.has(base)) return base;
  return taken.suffixed(base, ordinal + 1);
}

/** Contextual name made unique, or else the smart default. */
export function generateName(object: VtObject, ordinal: number, taken: NameRegistry): string {
  const contextual = contextualName(object);
  if (contextual !== undefined) return taken.uniqueName(contextual);
  return smartDefaultName(object.type, ordinal, taken);
}

// ============ Child Names ============

/**
 * Name for a child about to be attached to `parent`, from the parent's
 * layout. `siblings` are the parent's children that resolve to objects.
 */
export function suggestNameForChild(
  parent: VtObject,
  childType: ObjectType,
  siblings: readonly VtObject[],
): string | undefined {
  if (parent.type === ObjectType.SoftKeyMask && childType === ObjectType.Key) {
    const keys = siblings.filter((sibling) => sibling.type === ObjectType.Key).length;
    return `F${keys + 1} Key`;
  }
  if (parent.type === ObjectType.Container) {
    if (childType === ObjectType.Button) return 'Container Button';
    if (childType === ObjectType.OutputString) return 'Container Label';
  }
  if (parent.type === ObjectType.DataMask && childType === ObjectType.Container) {
    const containers = siblings.filter((sibling) => sibling.type === ObjectType.Container).length;
    if (containers === 0) return 'Header Container';
    if (containers === 1) return 'Main Container';
    if (containers === 2) return 'Footer Container';
  }
  return undefined;
}

// ============ Validation ============

/**
 * Check a user-entered name. `taken` must not contain the name the object
 * currently displays. Returns the trimmed name.
 */
export function validateName(name: string, taken: NameRegistry): Outcome<string, InvalidNameError> {
  const trimmed = name.trim();
  if (trimmed === '') {
    return failure(new InvalidNameError('Name cannot be empty'));
  }
  if (trimmed.length > MAX_NAME_LENGTH) {
    return failure(new InvalidNameError(`Name cannot be longer than ${MAX_NAME_LENGTH} characters`));
  }
  if (taken.has(trimmed)) {
    return failure(
      new InvalidNameError(`Name '${trimmed}' is already used by another object`, taken.suffixed(trimmed, 2)),
    );
  }
  return success(trimmed);
}
