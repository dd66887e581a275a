import { describe, expect, test } from 'vitest';
import { EditorProject, ObjectType, type VtObject } from '@vtpool/core';
import { buildHierarchy, type HierarchyNode } from '../../src/index.js';
import { container, dataMask, poolOf, ref, samplePool, workingSet } from '../../../core/tests/fixtures.js';

/** `id(child, child...)` outline of a node, `!id` for missing objects and `id*` for repeats. */
function outline(node: HierarchyNode): string {
  if (node.kind === 'missing') return `!${node.id}`;
  if (node.cyclic || node.repeated) return `${node.id}*`;
  return node.children.length === 0 ? `${node.id}` : `${node.id}(${node.children.map(outline).join(' ')})`;
}

function countNodes(node: HierarchyNode): number {
  return node.kind === 'missing' ? 1 : 1 + node.children.reduce((sum, child) => sum + countNodes(child), 0);
}

describe('buildHierarchy', () => {
  test('walks the pool from the working set', () => {
    const hierarchy = buildHierarchy(new EditorProject(samplePool()));
    expect(hierarchy.missingWorkingSet).toBe(false);
    expect(hierarchy.root && outline(hierarchy.root)).toBe(
      '0(1000(4000(5000 5001) 3000(11001(23000)) 11001*) 11000(23000))',
    );
    expect(hierarchy.root).toMatchObject({ kind: 'object', type: ObjectType.WorkingSet, name: '0: WorkingSet' });
    expect(hierarchy.unreferenced.map((object) => object.id)).toEqual([7]);
  });

  test('shows the names the project displays', () => {
    const project = new EditorProject(samplePool());
    project.applySmartNaming();
    expect(buildHierarchy(project).root).toMatchObject({
      name: 'Working Set',
      children: [{ name: 'Main Screen' }, { name: 'Text Display' }],
    });
  });

  test('a pool without a working set has no root', () => {
    const hierarchy = buildHierarchy(new EditorProject(poolOf(dataMask(5))));
    expect(hierarchy.root).toBeNull();
    expect(hierarchy.missingWorkingSet).toBe(true);
    expect(hierarchy.unreferenced.map((object) => object.id)).toEqual([5]);
  });

  test('marks missing objects and stops at cycles', () => {
    const pool = poolOf(
      workingSet(0, 1),
      dataMask(1, [ref(2), ref(99)]),
      container(2, 10, 10, [ref(3)]),
      container(3, 10, 10, [ref(2)]),
    );
    const hierarchy = buildHierarchy(new EditorProject(pool));
    expect(hierarchy.root && outline(hierarchy.root)).toBe('0(1(2(3(2*)) !99))');
    expect(hierarchy.unreferenced).toEqual([]);
  });

  test('expands a shared object once', () => {
    const pool = poolOf(
      workingSet(0, 1),
      dataMask(1, [ref(2), ref(3)]),
      container(2, 10, 10, [ref(4)]),
      container(3, 10, 10, [ref(4)]),
      container(4, 10, 10, [ref(5)]),
      container(5, 10, 10),
    );
    const hierarchy = buildHierarchy(new EditorProject(pool));
    expect(hierarchy.root && outline(hierarchy.root)).toBe('0(1(2(4(5)) 3(4*)))');
    expect(hierarchy.root?.kind === 'object' && hierarchy.root.repeated).toBe(false);
  });

  test('layered shared references grow the tree linearly', () => {
    const layers = 20;
    const objects: VtObject[] = [workingSet(0, 1), dataMask(1, [ref(100), ref(200)])];
    for (let layer = 0; layer < layers; layer++) {
      const next = layer + 1 < layers ? [ref(101 + layer), ref(201 + layer)] : [];
      objects.push(container(100 + layer, 10, 10, next), container(200 + layer, 10, 10, next));
    }
    const hierarchy = buildHierarchy(new EditorProject(poolOf(...objects)));
    expect(hierarchy.root && countNodes(hierarchy.root)).toBe(4 + 4 * (layers - 1));
  });

  test('depth limit', () => {
    const hierarchy = buildHierarchy(new EditorProject(samplePool()), 2);
    expect(hierarchy.root && outline(hierarchy.root)).toBe('0(1000(4000 3000 11001) 11000(23000))');
  });
});
