// src/index.ts
// Main entry point for @vtpool/editor

export {
  createDesignerStore,
  type DesignerState,
  type DesignerStore,
  type DesignerStoreOptions,
} from './stores/designer-store.js';
export {
  FileChannel,
  FileAccessError,
  nodeFileSystem,
  type FileEvent,
  type FileReason,
  type FileSystem,
} from './services/file-channel.js';
export { buildHierarchy, type Hierarchy, type HierarchyNode } from './hierarchy.js';
export { filterObjectsByName, sortObjects, compareObjects, type SortKey } from './object-list.js';
export { childCandidates, pointerCandidates } from './candidates.js';
export { loadDesignerConfig, designerConfigSchema, ConfigError, type DesignerConfig } from './config.js';
