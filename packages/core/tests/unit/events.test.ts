import { describe, expect, test } from 'vitest';
import { ObjectType, VtEvent, isEventPossible, possibleEvents } from '../../src/index.js';

describe('possibleEvents', () => {
  test('working set events', () => {
    expect(possibleEvents(ObjectType.WorkingSet)).toEqual([
      VtEvent.OnActivate,
      VtEvent.OnDeactivate,
      VtEvent.OnChangeActiveMask,
      VtEvent.OnChangeBackgroundColour,
      VtEvent.OnChangeChildLocation,
      VtEvent.OnChangeChildPosition,
    ]);
  });

  test('input strings and numbers share the boolean input events', () => {
    expect(possibleEvents(ObjectType.InputString)).toEqual(possibleEvents(ObjectType.InputBoolean));
    expect(possibleEvents(ObjectType.InputNumber)).toEqual(possibleEvents(ObjectType.InputBoolean));
  });

  test('output numbers share the output string events', () => {
    expect(possibleEvents(ObjectType.OutputNumber)).toEqual(possibleEvents(ObjectType.OutputString));
  });

  test('types without macro support have no events', () => {
    expect(possibleEvents(ObjectType.Macro)).toEqual([]);
    expect(possibleEvents(ObjectType.ColourMap)).toEqual([]);
  });

  test('isEventPossible', () => {
    expect(isEventPossible(ObjectType.Key, VtEvent.OnKeyPress)).toBe(true);
    expect(isEventPossible(ObjectType.NumberVariable, VtEvent.OnKeyPress)).toBe(false);
  });
});
