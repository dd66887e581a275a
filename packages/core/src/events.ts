// src/events.ts
// Events each object type can bind macros to

import { ObjectType, VtEvent } from './object-type.js';

const INPUT_FIELD_EVENTS: readonly VtEvent[] = [
  VtEvent.OnEnable,
  VtEvent.OnDisable,
  VtEvent.OnInputFieldSelection,
  VtEvent.OnInputFieldDeselection,
  VtEvent.OnESC,
  VtEvent.OnChangeBackgroundColour,
  VtEvent.OnChangeValue,
  VtEvent.OnEntryOfValue,
  VtEvent.OnEntryOfNewValue,
  VtEvent.OnChangeAttribute,
  VtEvent.OnChangeSize,
];

const OUTPUT_FIELD_EVENTS: readonly VtEvent[] = [
  VtEvent.OnChangeBackgroundColour,
  VtEvent.OnChangeValue,
  VtEvent.OnChangeAttribute,
  VtEvent.OnChangeSize,
];

const VALUE_GRAPH_EVENTS: readonly VtEvent[] = [
  VtEvent.OnChangeValue,
  VtEvent.OnChangeAttribute,
  VtEvent.OnChangeSize,
];

const POSSIBLE_EVENTS: Partial<Record<ObjectType, readonly VtEvent[]>> = {
  [ObjectType.WorkingSet]: [
    VtEvent.OnActivate,
    VtEvent.OnDeactivate,
    VtEvent.OnChangeActiveMask,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
  ],
  [ObjectType.DataMask]: [
    VtEvent.OnShow,
    VtEvent.OnHide,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangeSoftKeyMask,
    VtEvent.OnChangeAttribute,
    VtEvent.OnPointingEventPress,
    VtEvent.OnPointingEventRelease,
  ],
  [ObjectType.AlarmMask]: [
    VtEvent.OnShow,
    VtEvent.OnHide,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangePriority,
    VtEvent.OnChangeSoftKeyMask,
    VtEvent.OnChangeAttribute,
  ],
  [ObjectType.Container]: [
    VtEvent.OnShow,
    VtEvent.OnHide,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangeSize,
  ],
  [ObjectType.SoftKeyMask]: [
    VtEvent.OnShow,
    VtEvent.OnHide,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeAttribute,
  ],
  [ObjectType.Key]: [
    VtEvent.OnKeyPress,
    VtEvent.OnKeyRelease,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangeAttribute,
    VtEvent.OnInputFieldSelection,
    VtEvent.OnInputFieldDeselection,
  ],
  [ObjectType.Button]: [
    VtEvent.OnEnable,
    VtEvent.OnDisable,
    VtEvent.OnInputFieldSelection,
    VtEvent.OnInputFieldDeselection,
    VtEvent.OnKeyPress,
    VtEvent.OnKeyRelease,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeSize,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangeAttribute,
  ],
  [ObjectType.InputBoolean]: INPUT_FIELD_EVENTS,
  [ObjectType.InputString]: INPUT_FIELD_EVENTS,
  [ObjectType.InputNumber]: INPUT_FIELD_EVENTS,
  [ObjectType.InputList]: INPUT_FIELD_EVENTS.filter((event) => event !== VtEvent.OnChangeBackgroundColour),
  [ObjectType.OutputString]: OUTPUT_FIELD_EVENTS,
  [ObjectType.OutputNumber]: OUTPUT_FIELD_EVENTS,
  [ObjectType.OutputList]: VALUE_GRAPH_EVENTS,
  [ObjectType.OutputLine]: [VtEvent.OnChangeEndPoint, VtEvent.OnChangeAttribute, VtEvent.OnChangeSize],
  [ObjectType.OutputRectangle]: [VtEvent.OnChangeSize, VtEvent.OnChangeAttribute],
  [ObjectType.OutputEllipse]: [VtEvent.OnChangeSize, VtEvent.OnChangeAttribute],
  [ObjectType.OutputPolygon]: [VtEvent.OnChangeAttribute, VtEvent.OnChangeSize],
  [ObjectType.OutputMeter]: VALUE_GRAPH_EVENTS,
  [ObjectType.OutputLinearBarGraph]: VALUE_GRAPH_EVENTS,
  [ObjectType.OutputArchedBarGraph]: VALUE_GRAPH_EVENTS,
  [ObjectType.PictureGraphic]: [VtEvent.OnChangeAttribute],
  [ObjectType.NumberVariable]: [VtEvent.OnChangeValue],
  [ObjectType.StringVariable]: [VtEvent.OnChangeValue],
  [ObjectType.FontAttributes]: [VtEvent.OnChangeFontAttributes, VtEvent.OnChangeAttribute],
  [ObjectType.LineAttributes]: [VtEvent.OnChangeLineAttributes, VtEvent.OnChangeAttribute],
  [ObjectType.FillAttributes]: [VtEvent.OnChangeFillAttributes, VtEvent.OnChangeAttribute],
  [ObjectType.InputAttributes]: [VtEvent.OnChangeValue],
  [ObjectType.ObjectPointer]: [VtEvent.OnChangeValue],
  [ObjectType.GraphicsContext]: [VtEvent.OnChangeAttribute, VtEvent.OnChangeBackgroundColour],
  [ObjectType.KeyGroup]: [VtEvent.OnChangeAttribute],
  [ObjectType.ExternalObjectDefinition]: [VtEvent.OnChangeAttribute],
  [ObjectType.WindowMask]: [
    VtEvent.OnShow,
    VtEvent.OnHide,
    VtEvent.OnChangeBackgroundColour,
    VtEvent.OnChangeChildLocation,
    VtEvent.OnChangeChildPosition,
    VtEvent.OnChangeAttribute,
    VtEvent.OnPointingEventPress,
    VtEvent.OnPointingEventRelease,
  ],
  [ObjectType.ExternalReferenceName]: [VtEvent.OnChangeAttribute],
  [ObjectType.ExternalObjectPointer]: [VtEvent.OnChangeValue],
  [ObjectType.Animation]: [
    VtEvent.OnEnable,
    VtEvent.OnDisable,
    VtEvent.OnChangeValue,
    VtEvent.OnChangeAttribute,
    VtEvent.OnChangeSize,
  ],
  [ObjectType.ScaledGraphic]: [VtEvent.OnChangeAttribute, VtEvent.OnChangeValue],
};

/** Events a macro can be bound to on an object of `type`. */
export function possibleEvents(type: ObjectType): readonly VtEvent[] {
  return POSSIBLE_EVENTS[type] ?? [];
}

export function isEventPossible(type: ObjectType, event: VtEvent): boolean {
  return possibleEvents(type).includes(event);
}
