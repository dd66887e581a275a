import { describe, expect, test } from 'vitest';
import {
  EditorProject,
  InvalidNameError,
  NameRegistry,
  ObjectInfo,
  ObjectType,
  contextualName,
  defaultObjectName,
  objectTypeLabel,
  suggestNameForChild,
  validateName,
} from '../../src/index.js';
import { button, container, dataMask, key, objectPointer, poolOf, samplePool, softKeyMask } from '../fixtures.js';

function displayedNames(project: EditorProject): string[] {
  return project.stagedPool.objects().map((object) => project.objectName(object));
}

describe('ObjectInfo', () => {
  test('falls back to "{id}: {type}"', () => {
    const info = new ObjectInfo();
    expect(info.getName(dataMask(5))).toBe('5: DataMask');
    expect(defaultObjectName(key(12, 0))).toBe('12: Key');
  });

  test('ignores blank names', () => {
    const info = new ObjectInfo();
    info.setName('Engine');
    info.setName('');
    info.setName('   ');
    expect(info.getName(dataMask(5))).toBe('Engine');
  });

  test('every info gets its own stable identity', () => {
    expect(new ObjectInfo().stableId).not.toBe(new ObjectInfo().stableId);
  });
});

describe('NameRegistry', () => {
  test('counts duplicate names', () => {
    const names = new NameRegistry(['A', 'A']);
    names.delete('A');
    expect(names.has('A')).toBe(true);
    names.delete('A');
    expect(names.has('A')).toBe(false);
  });

  test('uniqueName counts up from 2', () => {
    const names = new NameRegistry(['Macro', 'Macro 2']);
    expect(names.uniqueName('Macro')).toBe('Macro 3');
    expect(names.uniqueName('Line')).toBe('Line');
  });
});

describe('contextualName', () => {
  test('names keys after their key code', () => {
    expect(contextualName(key(1, 0))).toBe('ACK/Enter Key');
    expect(contextualName(key(1, 1))).toBe('ESC Key');
    expect(contextualName(key(1, 2))).toBe('Soft Key 1');
    expect(contextualName(key(1, 7))).toBe('Soft Key 6');
    expect(contextualName(key(1, 8))).toBeUndefined();
  });

  test('names OK and Cancel buttons', () => {
    expect(contextualName(button(1, 0))).toBe('OK Button');
    expect(contextualName(button(1, 1))).toBe('Cancel Button');
    expect(contextualName(button(1, 9))).toBeUndefined();
  });

  test('names containers by height', () => {
    expect(contextualName(container(1, 200, 60))).toBe('Header Container');
    expect(contextualName(container(1, 200, 400))).toBe('Main Container');
    expect(contextualName(container(1, 200, 200))).toBeUndefined();
  });
});

describe('suggestNameForChild', () => {
  test('numbers soft keys after the keys already in the mask', () => {
    expect(suggestNameForChild(softKeyMask(1, [2, 3]), ObjectType.Key, [key(2, 1), key(3, 2)])).toBe('F3 Key');
  });

  test('counts only the keys that resolve', () => {
    const mask = softKeyMask(1, [2, 3, 99]);
    expect(suggestNameForChild(mask, ObjectType.Key, [key(2, 1), objectPointer(3, 2)])).toBe('F2 Key');
  });

  test('lays out data mask containers top to bottom', () => {
    const mask = dataMask(1);
    expect(suggestNameForChild(mask, ObjectType.Container, [])).toBe('Header Container');
    expect(suggestNameForChild(mask, ObjectType.Container, [container(2, 10, 10)])).toBe('Main Container');
    expect(
      suggestNameForChild(mask, ObjectType.Container, [container(2, 10, 10), container(3, 10, 10)]),
    ).toBe('Footer Container');
    expect(
      suggestNameForChild(mask, ObjectType.Container, [
        container(2, 10, 10),
        container(3, 10, 10),
        container(4, 10, 10),
      ]),
    ).toBeUndefined();
  });

  test('container buttons and labels', () => {
    expect(suggestNameForChild(container(1, 10, 10), ObjectType.Button, [])).toBe('Container Button');
    expect(suggestNameForChild(container(1, 10, 10), ObjectType.OutputString, [])).toBe('Container Label');
    expect(suggestNameForChild(container(1, 10, 10), ObjectType.Macro, [])).toBeUndefined();
  });
});

describe('validateName', () => {
  const taken = new NameRegistry(['Main Screen', 'Main Screen 2']);

  test('trims accepted names', () => {
    const result = validateName('  Fuel Gauge ', taken);
    expect(result).toEqual({ ok: true, value: 'Fuel Gauge' });
  });

  test('rejects empty and overlong names', () => {
    const empty = validateName('   ', taken);
    const long = validateName('x'.repeat(101), taken);
    expect(!empty.ok && empty.error.message).toBe('Name cannot be empty');
    expect(!long.ok && long.error.message).toBe('Name cannot be longer than 100 characters');
    expect(validateName('x'.repeat(100), taken).ok).toBe(true);
  });

  test('rejects taken names with a suggestion', () => {
    const result = validateName('Main Screen', taken);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidNameError);
      expect(result.error.suggestion).toBe('Main Screen 3');
    }
  });
});

describe('smart naming', () => {
  test('objectTypeLabel', () => {
    expect(objectTypeLabel(ObjectType.OutputNumber)).toBe('Number Display');
    expect(objectTypeLabel(ObjectType.InputBoolean)).toBe('Checkbox');
  });

  test('two data masks become "Main Screen" and "Data Screen 2"', () => {
    const project = new EditorProject(poolOf(dataMask(5), dataMask(6)));
    expect(project.applySmartNaming()).toBe(2);
    expect(displayedNames(project)).toEqual(['Main Screen', 'Data Screen 2']);
  });

  test('names a whole pool uniquely', () => {
    const project = new EditorProject(samplePool());
    project.applySmartNaming();
    expect(displayedNames(project)).toEqual([
      'Working Set',
      'Main Screen',
      'Header Container',
      'Text Display',
      'Text Display 2',
      'Soft Key Mask',
      'Soft Key 1',
      'Soft Key 2',
      'Font Style',
      'Macro',
    ]);
  });

  test('colliding contextual names get a suffix', () => {
    const project = new EditorProject(poolOf(key(1, 0), key(2, 0), key(3, 0)));
    project.applySmartNaming();
    expect(displayedNames(project)).toEqual(['ACK/Enter Key', 'ACK/Enter Key 2', 'ACK/Enter Key 3']);
  });

  test('leaves named objects alone and only names the listed ones', () => {
    const project = new EditorProject(poolOf(dataMask(5), dataMask(6), key(7, 1)));
    project.renameObject(6, 'Settings');
    expect(project.applySmartNaming([5, 6])).toBe(1);
    expect(displayedNames(project)).toEqual(['Main Screen', 'Settings', '7: Key']);
  });

  test('generateSmartNameForNewObject continues the numbering', () => {
    const project = new EditorProject(poolOf(dataMask(5)));
    project.applySmartNaming();
    expect(project.generateSmartNameForNewObject(ObjectType.DataMask)).toBe('Data Screen 2');
    expect(project.generateSmartNameForNewObject(ObjectType.Macro)).toBe('Macro');
  });
});
