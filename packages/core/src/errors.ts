// src/errors.ts
// Designer error classes and the explicit failure value structural operations return

import type { ObjectId } from './objects.js';

export class DesignerError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DesignerError';
  }
}

/** Another object already uses the requested id. */
export class IdConflictError extends DesignerError {
  readonly objectId: ObjectId;

  constructor(objectId: ObjectId) {
    super(`Object ID ${objectId} is already in use`);
    this.name = 'IdConflictError';
    this.objectId = objectId;
  }
}

export class UnknownObjectError extends DesignerError {
  readonly objectId: number;

  constructor(objectId: number) {
    super(`No object with ID ${objectId} in the pool`);
    this.name = 'UnknownObjectError';
    this.objectId = objectId;
  }
}

export class InvalidObjectIdError extends DesignerError {
  constructor(value: number) {
    super(`${value} is not a valid object ID (expected 0-65534)`);
    this.name = 'InvalidObjectIdError';
  }
}

/** The relationship schema does not let `parentType` hold `childType`. */
export class ChildNotAllowedError extends DesignerError {
  constructor(parentId: ObjectId, parentType: string, childType: string) {
    super(`${parentType} ${parentId} cannot hold a ${childType} child`);
    this.name = 'ChildNotAllowedError';
  }
}

/** Every id in the 16-bit space is taken. Not recoverable. */
export class IdSpaceExhaustedError extends DesignerError {
  constructor() {
    super('No free object ID left in the pool');
    this.name = 'IdSpaceExhaustedError';
  }
}

/** A pool or project file could not be decoded. */
export class DeserializationError extends DesignerError {
  readonly label: string;
  readonly originalError?: Error;

  constructor(label: string, message: string, originalError?: Error) {
    super(`${label}: ${message}`);
    this.name = 'DeserializationError';
    this.label = label;
    this.originalError = originalError;
  }
}

export class InvalidNameError extends DesignerError {
  readonly suggestion?: string;

  constructor(message: string, suggestion?: string) {
    super(suggestion ? `${message}. Try '${suggestion}'` : message);
    this.name = 'InvalidNameError';
    this.suggestion = suggestion;
  }
}

// ============ Outcome ============

export type Outcome<T, E extends DesignerError = DesignerError> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function success<T>(value: T): Outcome<T, never> {
  return { ok: true, value };
}

export function failure<E extends DesignerError>(error: E): Outcome<never, E> {
  return { ok: false, error };
}
