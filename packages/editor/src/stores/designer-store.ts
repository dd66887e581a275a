// stores/designer-store.ts
// Session state for the designer UI: the open project, the per-tick
// commit protocol and the file channel it drains.

import { createStore, type StoreApi } from 'zustand/vanilla';
import {
  EditorProject,
  createLogger,
  setLogLevel,
  type CreateObjectOptions,
  type DesignerError,
  type ObjectId,
  type ObjectPool,
  type ObjectPoolCodec,
  type ObjectType,
  type Size,
  type VtObject,
} from '@vtpool/core';
import { iopCodec } from '@vtpool/iop';
import { loadDesignerConfig, type DesignerConfig } from '../config.js';
import { FileChannel, type FileEvent } from '../services/file-channel.js';

const logger = createLogger('designer-store');

export interface DesignerState {
  project: EditorProject | null;
  /** Bumped whenever a tick, undo or redo changes what should be drawn. */
  revision: number;
  lastError: DesignerError | null;
  applySmartNamingOnImport: boolean;

  // Project lifecycle
  importPool: (bytes: Uint8Array) => boolean;
  loadProject: (bytes: Uint8Array) => boolean;
  saveProject: () => Uint8Array | null;
  exportPool: () => Uint8Array | null;
  openFile: (path: string, reason: 'importPool' | 'loadProject') => void;
  saveFile: (path: string, what: 'saveProject' | 'exportPool') => void;
  closeProject: () => void;

  // Per-tick protocol
  edit: <T>(fn: (pool: ObjectPool) => T) => T | undefined;
  select: (id: ObjectId | null) => void;
  tick: () => boolean;

  // History
  undo: () => boolean;
  redo: () => boolean;
  previousSelected: () => boolean;
  nextSelected: () => boolean;

  // Object actions
  createObject: (type: ObjectType, options?: CreateObjectOptions) => VtObject | null;
  deleteObject: (id: ObjectId) => boolean;
  renameObject: (id: ObjectId, name: string) => boolean;
  renumberObject: (oldId: ObjectId, newId: ObjectId) => boolean;
  setMaskSize: (maskSize: number, softKeySize?: Size) => void;
  clearError: () => void;
}

export interface DesignerStoreOptions {
  config?: DesignerConfig;
  codec?: ObjectPoolCodec;
  files?: FileChannel;
}

export type DesignerStore = StoreApi<DesignerState>;

export function createDesignerStore(options: DesignerStoreOptions = {}): DesignerStore {
  const config = options.config ?? loadDesignerConfig();
  const codec = options.codec ?? iopCodec;
  const files = options.files ?? new FileChannel();
  setLogLevel(config.logLevel);

  return createStore<DesignerState>()((set, get) => {
    const fail = (error: DesignerError): false => {
      set({ lastError: error });
      return false;
    };

    /** Adopt a new project; the previous one is dropped along with its history. */
    const open = (project: EditorProject): void => {
      set((state) => ({ project, lastError: null, revision: state.revision + 1 }));
    };

    const redraw = (changed: boolean): boolean => {
      if (changed) set((state) => ({ revision: state.revision + 1 }));
      return changed;
    };

    const handleFileEvent = (event: FileEvent): void => {
      if (event.kind === 'failed') {
        fail(event.error);
        return;
      }
      if (event.kind === 'written') {
        logger.info({ path: event.path, reason: event.reason }, 'File written');
        return;
      }
      if (event.reason === 'importPool') get().importPool(event.bytes);
      else if (event.reason === 'loadProject') get().loadProject(event.bytes);
    };

    return {
      project: null,
      revision: 0,
      lastError: null,
      applySmartNamingOnImport: config.smartNamingOnImport,

      importPool: (bytes) => {
        const decoded = codec.decode(bytes);
        if (!decoded.ok) {
          logger.error({ err: decoded.error }, 'Object pool import failed');
          return fail(decoded.error);
        }
        const project = EditorProject.fromPool(decoded.value, config.vtVersion);
        if (get().applySmartNamingOnImport) {
          project.applySmartNaming();
        }
        open(project);
        return true;
      },

      loadProject: (bytes) => {
        const loaded = EditorProject.load(bytes, codec, { vtVersion: config.vtVersion });
        if (!loaded.ok) {
          logger.error({ err: loaded.error }, 'Project load failed');
          return fail(loaded.error);
        }
        open(loaded.value);
        return true;
      },

      saveProject: () => get().project?.save(codec) ?? null,

      exportPool: () => {
        const project = get().project;
        return project ? codec.encode(project.stagedPool) : null;
      },

      openFile: (path, reason) => files.requestRead(path, reason),

      saveFile: (path, what) => {
        const bytes = what === 'saveProject' ? get().saveProject() : get().exportPool();
        if (bytes) files.requestWrite(path, bytes, what);
      },

      closeProject: () => set((state) => ({ project: null, revision: state.revision + 1 })),

      edit: (fn) => get().project?.editPool(fn),

      select: (id) => get().project?.select(id),

      tick: () => {
        const event = files.poll();
        if (event) handleFileEvent(event);

        const project = get().project;
        if (!project) return false;
        const poolChanged = project.updatePool();
        const selectionChanged = project.updateSelected();
        return redraw(poolChanged || selectionChanged);
      },

      undo: () => redraw(get().project?.undo() ?? false),
      redo: () => redraw(get().project?.redo() ?? false),
      previousSelected: () => redraw(get().project?.previousSelected() ?? false),
      nextSelected: () => redraw(get().project?.nextSelected() ?? false),

      createObject: (type, createOptions) => {
        const project = get().project;
        if (!project) return null;
        const created = project.createObject(type, createOptions);
        if (!created.ok) {
          fail(created.error);
          return null;
        }
        return created.value;
      },

      deleteObject: (id) => get().project?.deleteObject(id) ?? false,

      renameObject: (id, name) => {
        const project = get().project;
        if (!project) return false;
        const renamed = project.renameObject(id, name);
        return renamed.ok ? redraw(true) : fail(renamed.error);
      },

      renumberObject: (oldId, newId) => {
        const project = get().project;
        if (!project) return false;
        const renumbered = project.renumberObject(oldId, newId);
        return renumbered.ok || fail(renumbered.error);
      },

      setMaskSize: (maskSize, softKeySize) => {
        const project = get().project;
        if (!project) return;
        project.maskSize = maskSize;
        if (softKeySize) project.softKeySize = { ...softKeySize };
        redraw(true);
      },

      clearError: () => set({ lastError: null }),
    };
  });
}
