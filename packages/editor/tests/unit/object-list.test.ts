import { describe, expect, test } from 'vitest';
import { EditorProject } from '@vtpool/core';
import { filterObjectsByName, sortObjects } from '../../src/index.js';
import { macro, poolOf, samplePool } from '../../../core/tests/fixtures.js';

const stagedIds = (project: EditorProject): number[] => project.stagedPool.objects().map((object) => object.id);

describe('object list', () => {
  test('filters by displayed name, ignoring case', () => {
    const project = new EditorProject(samplePool());
    project.applySmartNaming();
    expect(filterObjectsByName(project, 'text').map((object) => object.id)).toEqual([11000, 11001]);
    expect(filterObjectsByName(project, '  SOFT KEY ').map((object) => object.id)).toEqual([4000, 5000, 5001]);
    expect(filterObjectsByName(project, '')).toHaveLength(10);
  });

  test('sorts by type, then id', () => {
    const project = new EditorProject(samplePool());
    sortObjects(project, 'type');
    expect(stagedIds(project)).toEqual([0, 1000, 3000, 4000, 5000, 5001, 11000, 11001, 23000, 7]);
  });

  test('sorts by name, and the new order is an undoable edit', () => {
    const project = new EditorProject(poolOf(macro(3), macro(1), macro(2)));
    project.renameObject(3, 'Alpha');
    project.renameObject(1, 'Charlie');
    project.renameObject(2, 'Bravo');
    sortObjects(project, 'name');
    expect(stagedIds(project)).toEqual([3, 2, 1]);

    sortObjects(project, 'id');
    expect(project.updatePool()).toBe(true);
    expect(stagedIds(project)).toEqual([1, 2, 3]);
    project.undo();
    expect(stagedIds(project)).toEqual([3, 1, 2]);
  });
});
