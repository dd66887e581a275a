// src/services/file-channel.ts
// Fire-and-forget file reads/writes whose results land in a single slot
// that the session polls once per tick

import { readFile, writeFile } from 'fs/promises';
import { DesignerError, createLogger } from '@vtpool/core';

const logger = createLogger('file-channel');

/** What the session will do with a file once it arrives. */
export type FileReason = 'importPool' | 'loadProject' | 'saveProject' | 'exportPool';

export type FileEvent =
  | { kind: 'read'; reason: FileReason; path: string; bytes: Uint8Array }
  | { kind: 'written'; reason: FileReason; path: string }
  | { kind: 'failed'; reason: FileReason; path: string; error: FileAccessError };

export class FileAccessError extends DesignerError {
  readonly path: string;
  readonly originalError?: Error;

  constructor(path: string, message: string, originalError?: Error) {
    super(`${path}: ${message}`);
    this.name = 'FileAccessError';
    this.path = path;
    this.originalError = originalError;
  }
}

export interface FileSystem {
  read(path: string): Promise<Uint8Array>;
  write(path: string, bytes: Uint8Array): Promise<void>;
}

export const nodeFileSystem: FileSystem = {
  read: async (path) => new Uint8Array(await readFile(path)),
  write: (path, bytes) => writeFile(path, bytes),
};

export class FileChannel {
  private slot: FileEvent | undefined;
  private inFlight = new Set<Promise<void>>();

  constructor(private readonly fileSystem: FileSystem = nodeFileSystem) {}

  get pending(): number {
    return this.inFlight.size;
  }

  requestRead(path: string, reason: FileReason): void {
    this.track(
      this.fileSystem.read(path).then(
        (bytes) => this.deliver({ kind: 'read', reason, path, bytes }),
        (err: unknown) => this.fail(path, reason, err),
      ),
    );
  }

  requestWrite(path: string, bytes: Uint8Array, reason: FileReason): void {
    this.track(
      this.fileSystem.write(path, bytes).then(
        () => this.deliver({ kind: 'written', reason, path }),
        (err: unknown) => this.fail(path, reason, err),
      ),
    );
  }

  /** Take the latest delivery, if any. */
  poll(): FileEvent | undefined {
    const event = this.slot;
    this.slot = undefined;
    return event;
  }

  /** Resolves once every request issued so far has delivered. */
  async settled(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  private track(request: Promise<void>): void {
    const tracked = request.finally(() => this.inFlight.delete(tracked));
    this.inFlight.add(tracked);
  }

  private deliver(event: FileEvent): void {
    if (this.slot) {
      logger.debug({ dropped: this.slot.path, reason: this.slot.reason }, 'Unread file delivery replaced');
    }
    this.slot = event;
  }

  private fail(path: string, reason: FileReason, err: unknown): void {
    const error = err instanceof Error ? err : new Error(String(err));
    logger.error({ path, reason, err: error }, 'File access failed');
    this.deliver({ kind: 'failed', reason, path, error: new FileAccessError(path, error.message, error) });
  }
}
