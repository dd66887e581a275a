// src/id-allocator.ts
// Hands out object ids that are free in the pool, from a forward-moving cursor

import { MAX_OBJECT_ID, type ObjectId } from './objects.js';
import type { PoolView } from './object-pool.js';
import { IdSpaceExhaustedError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('id-allocator');

/** Lowest id handed out. */
export const FIRST_ALLOCATABLE_ID = 1;

export class IdAllocator {
  private cursor = FIRST_ALLOCATABLE_ID;

  constructor(pool?: PoolView) {
    if (pool) this.resync(pool);
  }

  /** Next id the allocator will try. */
  get nextCandidate(): ObjectId {
    return this.cursor;
  }

  /** Move the cursor past the highest id in `pool`. Call after undo, redo and load. */
  resync(pool: PoolView): void {
    const max = pool.maxId();
    this.cursor = max === undefined ? FIRST_ALLOCATABLE_ID : Math.max(max + 1, FIRST_ALLOCATABLE_ID);
  }

  /**
   * An id in [1, 65534] not present in `pool`. Scans forward from the cursor
   * and, once past the top of the id space, for the first gap from the bottom.
   * @throws IdSpaceExhaustedError when every id is taken
   */
  allocate(pool: PoolView): ObjectId {
    for (let id = this.cursor; id <= MAX_OBJECT_ID; id++) {
      if (!pool.has(id)) {
        this.cursor = id + 1;
        return id;
      }
    }

    logger.warn({ cursor: this.cursor }, 'Object id cursor wrapped around, scanning for a free id');
    for (let id = FIRST_ALLOCATABLE_ID; id <= MAX_OBJECT_ID; id++) {
      if (!pool.has(id)) {
        this.cursor = id + 1;
        return id;
      }
    }

    throw new IdSpaceExhaustedError();
  }
}
