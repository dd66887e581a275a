// src/object-type.ts
// Object type codes, VT versions and macro events of the ISO 11783-6 object model

// ============ Object Types ============

/** Object type codes as they appear on the wire. */
export enum ObjectType {
  WorkingSet = 0,
  DataMask = 1,
  AlarmMask = 2,
  Container = 3,
  SoftKeyMask = 4,
  Key = 5,
  Button = 6,
  InputBoolean = 7,
  InputString = 8,
  InputNumber = 9,
  InputList = 10,
  OutputString = 11,
  OutputNumber = 12,
  OutputLine = 13,
  OutputRectangle = 14,
  OutputEllipse = 15,
  OutputPolygon = 16,
  OutputMeter = 17,
  OutputLinearBarGraph = 18,
  OutputArchedBarGraph = 19,
  PictureGraphic = 20,
  NumberVariable = 21,
  StringVariable = 22,
  FontAttributes = 23,
  LineAttributes = 24,
  FillAttributes = 25,
  InputAttributes = 26,
  ObjectPointer = 27,
  Macro = 28,
  AuxiliaryFunctionType1 = 29,
  AuxiliaryInputType1 = 30,
  AuxiliaryFunctionType2 = 31,
  AuxiliaryInputType2 = 32,
  AuxiliaryControlDesignatorType2 = 33,
  WindowMask = 34,
  KeyGroup = 35,
  GraphicsContext = 36,
  OutputList = 37,
  ExtendedInputAttributes = 38,
  ColourMap = 39,
  ObjectLabelReferenceList = 40,
  ExternalObjectDefinition = 41,
  ExternalReferenceName = 42,
  ExternalObjectPointer = 43,
  Animation = 44,
  ColourPalette = 45,
  GraphicData = 46,
  WorkingSetSpecialControls = 47,
  ScaledGraphic = 48,
}

/** Every object type, in type-code order. */
export const OBJECT_TYPES: readonly ObjectType[] = Object.values(ObjectType).filter(
  (value): value is ObjectType => typeof value === 'number',
);

/** Enum member name of a type, e.g. `DataMask`. */
export function objectTypeName(type: ObjectType): string {
  return ObjectType[type];
}

export function isObjectType(code: number): code is ObjectType {
  return Number.isInteger(code) && code in ObjectType;
}

// ============ VT Versions ============

export enum VtVersion {
  Version2 = 2,
  Version3 = 3,
  Version4 = 4,
  Version5 = 5,
  Version6 = 6,
}

export const VT_VERSIONS: readonly VtVersion[] = [
  VtVersion.Version2,
  VtVersion.Version3,
  VtVersion.Version4,
  VtVersion.Version5,
  VtVersion.Version6,
];

// ============ Events ============

/** Events an object can bind a macro to. */
export enum VtEvent {
  Reserved = 0,
  OnActivate = 1,
  OnDeactivate = 2,
  OnShow = 3,
  OnHide = 4,
  OnEnable = 5,
  OnDisable = 6,
  OnChangeActiveMask = 7,
  OnChangeSoftKeyMask = 8,
  OnChangeAttribute = 9,
  OnChangeBackgroundColour = 10,
  OnChangeFontAttributes = 11,
  OnChangeLineAttributes = 12,
  OnChangeFillAttributes = 13,
  OnChangeChildLocation = 14,
  OnChangeSize = 15,
  OnChangeValue = 16,
  OnChangePriority = 17,
  OnChangeEndPoint = 18,
  OnInputFieldSelection = 19,
  OnInputFieldDeselection = 20,
  OnESC = 21,
  OnEntryOfValue = 22,
  OnEntryOfNewValue = 23,
  OnKeyPress = 24,
  OnKeyRelease = 25,
  OnChangeChildPosition = 26,
  OnPointingEventPress = 27,
  OnPointingEventRelease = 28,
}
