// src/index.ts
// Main entry point for @vtpool/core

// Object model
export {
  ObjectType,
  OBJECT_TYPES,
  objectTypeName,
  isObjectType,
  VtVersion,
  VT_VERSIONS,
  VtEvent,
} from './object-type.js';
export * from './objects.js';
export {
  type ReferenceMapper,
  mapReferences,
  referencedObjects,
  childReferences,
  positionedChildren,
  macroReferences,
  replaceReference,
} from './references.js';
export { defaultObject } from './object-defaults.js';

// Schemas
export { allowedChildTypes, isChildAllowed, canHaveChildren } from './relationships.js';
export { possibleEvents, isEventPossible } from './events.js';
export { validatePool, type ValidationError, type ValidationResult } from './validator.js';

// Pool
export {
  ObjectPool,
  type PoolView,
  type RenumberOptions,
  type Size,
  type MaskSizes,
  MIN_MASK_SIZE,
  MIN_SOFT_KEY_SIZE,
  MAX_TRAVERSAL_DEPTH,
} from './object-pool.js';
export { findObjectAt, type Hit } from './hit-test.js';

// Metadata, naming, ids
export { ObjectInfo, defaultObjectName, type StableId, type IdentityKeys } from './object-info.js';
export {
  NameRegistry,
  MAX_NAME_LENGTH,
  objectTypeLabel,
  contextualName,
  smartDefaultName,
  generateName,
  suggestNameForChild,
  validateName,
} from './naming.js';
export { IdAllocator, FIRST_ALLOCATABLE_ID } from './id-allocator.js';

// Project
export {
  EditorProject,
  MAX_UNDO_HISTORY,
  MAX_SELECTION_HISTORY,
  type Selection,
  type EditorProjectOptions,
  type CreateObjectOptions,
} from './editor-project.js';
export {
  type ObjectPoolCodec,
  type ProjectFile,
  projectFileSchema,
  projectFromBytes,
  projectToBytes,
  encodeBase64,
  decodeBase64,
  PROJECT_FORMAT,
  PROJECT_FORMAT_VERSION,
} from './project-file.js';

// Errors and logging
export * from './errors.js';
export { createLogger, setLogLevel, type Logger } from './logger.js';
