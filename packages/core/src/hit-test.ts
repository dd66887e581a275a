// src/hit-test.ts
// Which object occupies a point of a rendered mask

import type { ObjectId, Point, VtObject } from './objects.js';
import { MAX_TRAVERSAL_DEPTH, type PoolView } from './object-pool.js';
import { positionedChildren } from './references.js';

export interface Hit {
  object: VtObject;
  /** Ids from `root` down to the hit object. */
  path: ObjectId[];
}

/**
 * Topmost object under `point` (relative to `root`'s origin). Children are
 * tried last-drawn first, then the object's own rectangle.
 */
export function findObjectAt(pool: PoolView, root: VtObject, point: Point): Hit | undefined {
  return hitTest(pool, root, point, []);
}

function hitTest(pool: PoolView, object: VtObject, point: Point, trail: ObjectId[]): Hit | undefined {
  if (trail.length > MAX_TRAVERSAL_DEPTH || trail.includes(object.id)) return undefined;
  const path = [...trail, object.id];

  const children = positionedChildren(object);
  for (let i = children.length - 1; i >= 0; i--) {
    const ref = children[i];
    const child = pool.objectById(ref.id);
    if (!child) continue;
    const hit = hitTest(pool, child, { x: point.x - ref.offset.x, y: point.y - ref.offset.y }, path);
    if (hit) return hit;
  }

  const { width, height } = pool.contentSize(object);
  if (point.x >= 0 && point.y >= 0 && point.x < width && point.y < height) {
    return { object, path };
  }
  return undefined;
}
