// src/object-list.ts
// Flat object list: name filter and pool ordering

import type { EditorProject, VtObject } from '@vtpool/core';

export type SortKey = 'type' | 'id' | 'name';

/** Staged objects whose displayed name contains `query` (case-insensitive). */
export function filterObjectsByName(project: EditorProject, query: string): VtObject[] {
  const needle = query.trim().toLowerCase();
  const objects = project.stagedPool.objects();
  if (needle === '') return [...objects];
  return objects.filter((object) => project.objectName(object).toLowerCase().includes(needle));
}

export function compareObjects(
  by: SortKey,
  nameOf: (object: VtObject) => string,
): (a: VtObject, b: VtObject) => number {
  switch (by) {
    case 'type':
      return (a, b) => a.type - b.type || a.id - b.id;
    case 'id':
      return (a, b) => a.id - b.id;
    case 'name':
      return (a, b) => nameOf(a).localeCompare(nameOf(b)) || a.id - b.id;
  }
}

/** Reorder the staged pool. The new order is committed (and undoable) like any edit. */
export function sortObjects(project: EditorProject, by: SortKey): void {
  const compare = compareObjects(by, (object) => project.objectName(object));
  project.editPool((pool) => pool.sortBy(compare));
}
