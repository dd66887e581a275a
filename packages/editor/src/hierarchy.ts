// src/hierarchy.ts
// Object tree for the hierarchy panel, rooted at the working set

import {
  MAX_TRAVERSAL_DEPTH,
  ObjectType,
  referencedObjects,
  type EditorProject,
  type ObjectId,
  type VtObject,
} from '@vtpool/core';

export type HierarchyNode =
  | {
      kind: 'object';
      id: ObjectId;
      type: ObjectType;
      name: string;
      children: HierarchyNode[];
      /** The object already appears above this node; its children are not repeated. */
      cyclic: boolean;
      /** The object's children are shown where it first appears in the tree. */
      repeated: boolean;
    }
  | { kind: 'missing'; id: ObjectId };

export interface Hierarchy {
  root: HierarchyNode | null;
  missingWorkingSet: boolean;
  /** Auxiliary function/input objects, which live outside the working set tree. */
  auxiliary: HierarchyNode[];
  /** Objects reachable from neither the working set nor an auxiliary object. */
  unreferenced: VtObject[];
}

const AUXILIARY_TYPES: readonly ObjectType[] = [
  ObjectType.AuxiliaryFunctionType1,
  ObjectType.AuxiliaryInputType1,
  ObjectType.AuxiliaryFunctionType2,
  ObjectType.AuxiliaryInputType2,
];

export function buildHierarchy(project: EditorProject, maxDepth = MAX_TRAVERSAL_DEPTH): Hierarchy {
  const pool = project.stagedPool;
  const reached = new Set<ObjectId>();
  const expanded = new Set<ObjectId>();

  const visit = (id: ObjectId, path: readonly ObjectId[]): HierarchyNode => {
    const object = pool.objectById(id);
    if (!object) return { kind: 'missing', id };
    reached.add(id);

    const node = { kind: 'object' as const, id, type: object.type, name: project.objectName(object) };
    const references = [...new Set(referencedObjects(object))];
    const cyclic = path.includes(id);
    const repeated = !cyclic && references.length > 0 && expanded.has(id);
    if (cyclic || repeated || path.length >= maxDepth) {
      return { ...node, children: [], cyclic, repeated };
    }

    expanded.add(id);
    const children = references.map((childId) => visit(childId, [...path, id]));
    return { ...node, children, cyclic, repeated };
  };

  const workingSet = pool.workingSetObject();
  const root = workingSet ? visit(workingSet.id, []) : null;
  const auxiliary = pool.objectsByTypes(AUXILIARY_TYPES).map((object) => visit(object.id, []));

  return {
    root,
    missingWorkingSet: !workingSet,
    auxiliary,
    unreferenced: pool.objects().filter((object) => !reached.has(object.id)),
  };
}
