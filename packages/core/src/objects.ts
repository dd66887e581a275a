// src/objects.ts
// Object schemas for every VT object type (zod), and the inferred object types

import { z } from 'zod';
import { ObjectType, VtEvent } from './object-type.js';

// ============ Identifiers ============

export const MAX_OBJECT_ID = 0xfffe;
/** Wire value of a null object reference. */
export const NULL_OBJECT_ID = 0xffff;

export const objectIdSchema = z.number().int().min(0).max(MAX_OBJECT_ID);
export const nullableObjectIdSchema = objectIdSchema.nullable();

export type ObjectId = number;
export type NullableObjectId = ObjectId | null;

// ============ Scalars ============

const u8 = z.number().int().min(0).max(0xff);
const u16 = z.number().int().min(0).max(0xffff);
const i16 = z.number().int().min(-0x8000).max(0x7fff);
const u32 = z.number().int().min(0).max(0xffffffff);
const i32 = z.number().int().min(-0x80000000).max(0x7fffffff);
// Single precision on the wire
const f32 = z
  .number()
  .finite()
  .refine((value) => Math.fround(value) === value, 'Number must be representable as a 32-bit float');
const colour = u8;
const bytes = z.array(u8);

// ============ Shared Pieces ============

export const pointSchema = z.object({ x: i16, y: i16 });
export type Point = z.infer<typeof pointSchema>;

export const objectRefSchema = z.object({
  id: objectIdSchema,
  offset: pointSchema,
});
export type ObjectRef = z.infer<typeof objectRefSchema>;

export const macroRefSchema = z.object({
  event: z.nativeEnum(VtEvent),
  macroId: u8,
});
export type MacroRef = z.infer<typeof macroRefSchema>;

const objectRefs = z.array(objectRefSchema);
const macroRefs = z.array(macroRefSchema);

function objectSchema<T extends ObjectType, S extends z.ZodRawShape>(type: T, shape: S) {
  return z.object({ type: z.literal(type), id: objectIdSchema, ...shape });
}

// ============ Top Level Objects ============

export const workingSetSchema = objectSchema(ObjectType.WorkingSet, {
  backgroundColour: colour,
  selectable: z.boolean(),
  activeMask: objectIdSchema,
  objectRefs,
  macroRefs,
  languageCodes: z.array(z.string().length(2)),
});

export const dataMaskSchema = objectSchema(ObjectType.DataMask, {
  backgroundColour: colour,
  softKeyMask: nullableObjectIdSchema,
  objectRefs,
  macroRefs,
});

export const alarmMaskSchema = objectSchema(ObjectType.AlarmMask, {
  backgroundColour: colour,
  softKeyMask: nullableObjectIdSchema,
  priority: u8,
  acousticSignal: u8,
  objectRefs,
  macroRefs,
});

export const containerSchema = objectSchema(ObjectType.Container, {
  width: u16,
  height: u16,
  hidden: z.boolean(),
  objectRefs,
  macroRefs,
});

export const softKeyMaskSchema = objectSchema(ObjectType.SoftKeyMask, {
  backgroundColour: colour,
  objects: z.array(objectIdSchema),
  macroRefs,
});

export const keySchema = objectSchema(ObjectType.Key, {
  backgroundColour: colour,
  keyCode: u8,
  objectRefs,
  macroRefs,
});

export const buttonSchema = objectSchema(ObjectType.Button, {
  width: u16,
  height: u16,
  backgroundColour: colour,
  borderColour: colour,
  keyCode: u8,
  options: u8,
  objectRefs,
  macroRefs,
});

// ============ Input Fields ============

export const inputBooleanSchema = objectSchema(ObjectType.InputBoolean, {
  backgroundColour: colour,
  width: u16,
  foregroundColour: objectIdSchema,
  variableReference: nullableObjectIdSchema,
  value: z.boolean(),
  enabled: z.boolean(),
  macroRefs,
});

export const inputStringSchema = objectSchema(ObjectType.InputString, {
  width: u16,
  height: u16,
  backgroundColour: colour,
  fontAttributes: objectIdSchema,
  inputAttributes: nullableObjectIdSchema,
  options: u8,
  variableReference: nullableObjectIdSchema,
  justification: u8,
  value: z.string(),
  enabled: z.boolean(),
  macroRefs,
});

export const inputNumberSchema = objectSchema(ObjectType.InputNumber, {
  width: u16,
  height: u16,
  backgroundColour: colour,
  fontAttributes: objectIdSchema,
  options: u8,
  variableReference: nullableObjectIdSchema,
  value: u32,
  minValue: u32,
  maxValue: u32,
  offset: i32,
  scale: f32,
  numberOfDecimals: u8,
  format: u8,
  justification: u8,
  options2: u8,
  macroRefs,
});

export const inputListSchema = objectSchema(ObjectType.InputList, {
  width: u16,
  height: u16,
  variableReference: nullableObjectIdSchema,
  value: u8,
  options: u8,
  listItems: z.array(nullableObjectIdSchema),
  macroRefs,
});

// ============ Output Fields ============

export const outputStringSchema = objectSchema(ObjectType.OutputString, {
  width: u16,
  height: u16,
  backgroundColour: colour,
  fontAttributes: objectIdSchema,
  options: u8,
  variableReference: nullableObjectIdSchema,
  justification: u8,
  value: z.string(),
  macroRefs,
});

export const outputNumberSchema = objectSchema(ObjectType.OutputNumber, {
  width: u16,
  height: u16,
  backgroundColour: colour,
  fontAttributes: objectIdSchema,
  options: u8,
  variableReference: nullableObjectIdSchema,
  value: u32,
  offset: i32,
  scale: f32,
  numberOfDecimals: u8,
  format: u8,
  justification: u8,
  macroRefs,
});

export const outputListSchema = objectSchema(ObjectType.OutputList, {
  width: u16,
  height: u16,
  variableReference: nullableObjectIdSchema,
  value: u8,
  listItems: z.array(nullableObjectIdSchema),
  macroRefs,
});

// ============ Output Shapes ============

export const outputLineSchema = objectSchema(ObjectType.OutputLine, {
  lineAttributes: objectIdSchema,
  width: u16,
  height: u16,
  lineDirection: u8,
  macroRefs,
});

export const outputRectangleSchema = objectSchema(ObjectType.OutputRectangle, {
  lineAttributes: objectIdSchema,
  width: u16,
  height: u16,
  lineSuppression: u8,
  fillAttributes: nullableObjectIdSchema,
  macroRefs,
});

export const outputEllipseSchema = objectSchema(ObjectType.OutputEllipse, {
  lineAttributes: objectIdSchema,
  width: u16,
  height: u16,
  ellipseType: u8,
  startAngle: u8,
  endAngle: u8,
  fillAttributes: nullableObjectIdSchema,
  macroRefs,
});

export const outputPolygonSchema = objectSchema(ObjectType.OutputPolygon, {
  width: u16,
  height: u16,
  lineAttributes: objectIdSchema,
  fillAttributes: nullableObjectIdSchema,
  polygonType: u8,
  points: z.array(z.object({ x: u16, y: u16 })),
  macroRefs,
});

// ============ Output Graphics ============

export const outputMeterSchema = objectSchema(ObjectType.OutputMeter, {
  width: u16,
  needleColour: colour,
  borderColour: colour,
  arcAndTickColour: colour,
  options: u8,
  numberOfTicks: u8,
  startAngle: u8,
  endAngle: u8,
  minValue: u16,
  maxValue: u16,
  variableReference: nullableObjectIdSchema,
  value: u16,
  macroRefs,
});

export const outputLinearBarGraphSchema = objectSchema(ObjectType.OutputLinearBarGraph, {
  width: u16,
  height: u16,
  colour,
  targetLineColour: colour,
  options: u8,
  numberOfTicks: u8,
  minValue: u16,
  maxValue: u16,
  variableReference: nullableObjectIdSchema,
  value: u16,
  targetValueVariableReference: nullableObjectIdSchema,
  targetValue: u16,
  macroRefs,
});

export const outputArchedBarGraphSchema = objectSchema(ObjectType.OutputArchedBarGraph, {
  width: u16,
  height: u16,
  colour,
  targetLineColour: colour,
  options: u8,
  startAngle: u8,
  endAngle: u8,
  barGraphWidth: u16,
  minValue: u16,
  maxValue: u16,
  variableReference: nullableObjectIdSchema,
  value: u16,
  targetValueVariableReference: nullableObjectIdSchema,
  targetValue: u16,
  macroRefs,
});

export const pictureGraphicSchema = objectSchema(ObjectType.PictureGraphic, {
  width: u16,
  actualWidth: u16,
  actualHeight: u16,
  format: u8,
  options: u8,
  transparencyColour: colour,
  data: bytes,
  macroRefs,
});

export const scaledGraphicSchema = objectSchema(ObjectType.ScaledGraphic, {
  width: u16,
  height: u16,
  scaleType: u8,
  options: u8,
  value: nullableObjectIdSchema,
  macroRefs,
});

export const graphicDataSchema = objectSchema(ObjectType.GraphicData, {
  format: u8,
  data: bytes,
});

export const graphicsContextSchema = objectSchema(ObjectType.GraphicsContext, {
  viewportWidth: u16,
  viewportHeight: u16,
  viewportX: i16,
  viewportY: i16,
  canvasWidth: u16,
  canvasHeight: u16,
  viewportZoom: f32,
  graphicsCursorX: i16,
  graphicsCursorY: i16,
  foregroundColour: colour,
  backgroundColour: colour,
  fontAttributes: nullableObjectIdSchema,
  lineAttributes: nullableObjectIdSchema,
  fillAttributes: nullableObjectIdSchema,
  format: u8,
  options: u8,
  transparencyColour: colour,
});

export const animationSchema = objectSchema(ObjectType.Animation, {
  width: u16,
  height: u16,
  refreshInterval: u16,
  value: u8,
  enabled: z.boolean(),
  firstChildIndex: u8,
  lastChildIndex: u8,
  defaultChildIndex: u8,
  options: u8,
  objectRefs,
  macroRefs,
});

// ============ Variables ============

export const numberVariableSchema = objectSchema(ObjectType.NumberVariable, {
  value: u32,
});

export const stringVariableSchema = objectSchema(ObjectType.StringVariable, {
  value: z.string(),
});

// ============ Attributes ============

export const fontAttributesSchema = objectSchema(ObjectType.FontAttributes, {
  fontColour: colour,
  fontSize: u8,
  fontType: u8,
  fontStyle: u8,
  macroRefs,
});

export const lineAttributesSchema = objectSchema(ObjectType.LineAttributes, {
  lineColour: colour,
  lineWidth: u8,
  lineArt: u16,
  macroRefs,
});

export const fillAttributesSchema = objectSchema(ObjectType.FillAttributes, {
  fillType: u8,
  fillColour: colour,
  fillPattern: nullableObjectIdSchema,
  macroRefs,
});

export const inputAttributesSchema = objectSchema(ObjectType.InputAttributes, {
  validationType: u8,
  validationString: z.string(),
  macroRefs,
});

export const extendedInputAttributesSchema = objectSchema(ObjectType.ExtendedInputAttributes, {
  validationType: u8,
  codePlanes: z.array(
    z.object({
      number: u8,
      ranges: z.array(z.object({ first: u16, last: u16 })),
    }),
  ),
});

export const colourMapSchema = objectSchema(ObjectType.ColourMap, {
  colourMap: bytes,
});

export const colourPaletteSchema = objectSchema(ObjectType.ColourPalette, {
  options: u16,
  colours: z.array(z.object({ b: u8, g: u8, r: u8, a: u8 })),
});

// ============ Pointers, Macros, Labels ============

export const objectPointerSchema = objectSchema(ObjectType.ObjectPointer, {
  value: nullableObjectIdSchema,
});

export const macroSchema = objectSchema(ObjectType.Macro, {
  commands: bytes,
});

export const objectLabelReferenceListSchema = objectSchema(ObjectType.ObjectLabelReferenceList, {
  labels: z.array(
    z.object({
      id: objectIdSchema,
      stringVariable: nullableObjectIdSchema,
      fontType: u8,
      graphicRepresentation: nullableObjectIdSchema,
    }),
  ),
});

// ============ Auxiliary Control ============

export const auxiliaryFunctionType1Schema = objectSchema(ObjectType.AuxiliaryFunctionType1, {
  backgroundColour: colour,
  functionType: u8,
  objectRefs,
});

export const auxiliaryInputType1Schema = objectSchema(ObjectType.AuxiliaryInputType1, {
  backgroundColour: colour,
  functionType: u8,
  inputId: u8,
  objectRefs,
});

export const auxiliaryFunctionType2Schema = objectSchema(ObjectType.AuxiliaryFunctionType2, {
  backgroundColour: colour,
  functionAttributes: u8,
  objectRefs,
});

export const auxiliaryInputType2Schema = objectSchema(ObjectType.AuxiliaryInputType2, {
  backgroundColour: colour,
  functionAttributes: u8,
  objectRefs,
});

export const auxiliaryControlDesignatorType2Schema = objectSchema(
  ObjectType.AuxiliaryControlDesignatorType2,
  {
    pointerType: u8,
    auxiliaryObjectId: nullableObjectIdSchema,
  },
);

// ============ Windows, Key Groups, External Objects ============

export const windowMaskSchema = objectSchema(ObjectType.WindowMask, {
  /** Width and height are in window cells, not pixels. */
  width: u8,
  height: u8,
  windowType: u8,
  backgroundColour: colour,
  options: u8,
  name: objectIdSchema,
  windowTitle: nullableObjectIdSchema,
  windowIcon: nullableObjectIdSchema,
  objects: z.array(nullableObjectIdSchema),
  objectRefs,
  macroRefs,
});

export const keyGroupSchema = objectSchema(ObjectType.KeyGroup, {
  options: u8,
  name: objectIdSchema,
  keyGroupIcon: nullableObjectIdSchema,
  objects: z.array(objectIdSchema),
  macroRefs,
});

export const externalObjectDefinitionSchema = objectSchema(ObjectType.ExternalObjectDefinition, {
  options: u8,
  name: bytes.length(8),
  objects: z.array(nullableObjectIdSchema),
});

export const externalReferenceNameSchema = objectSchema(ObjectType.ExternalReferenceName, {
  options: u8,
  name: bytes.length(8),
});

export const externalObjectPointerSchema = objectSchema(ObjectType.ExternalObjectPointer, {
  defaultObjectId: nullableObjectIdSchema,
  externalReferenceNameId: nullableObjectIdSchema,
  externalObjectId: nullableObjectIdSchema,
});

export const workingSetSpecialControlsSchema = objectSchema(ObjectType.WorkingSetSpecialControls, {
  colourMap: nullableObjectIdSchema,
  colourPalette: nullableObjectIdSchema,
  languagePairs: z.array(
    z.object({
      language: z.string().length(2),
      country: z.string().length(2),
    }),
  ),
});

// ============ Union ============

export const vtObjectSchema = z.discriminatedUnion('type', [
  workingSetSchema,
  dataMaskSchema,
  alarmMaskSchema,
  containerSchema,
  softKeyMaskSchema,
  keySchema,
  buttonSchema,
  inputBooleanSchema,
  inputStringSchema,
  inputNumberSchema,
  inputListSchema,
  outputStringSchema,
  outputNumberSchema,
  outputLineSchema,
  outputRectangleSchema,
  outputEllipseSchema,
  outputPolygonSchema,
  outputMeterSchema,
  outputLinearBarGraphSchema,
  outputArchedBarGraphSchema,
  pictureGraphicSchema,
  numberVariableSchema,
  stringVariableSchema,
  fontAttributesSchema,
  lineAttributesSchema,
  fillAttributesSchema,
  inputAttributesSchema,
  objectPointerSchema,
  macroSchema,
  auxiliaryFunctionType1Schema,
  auxiliaryInputType1Schema,
  auxiliaryFunctionType2Schema,
  auxiliaryInputType2Schema,
  auxiliaryControlDesignatorType2Schema,
  windowMaskSchema,
  keyGroupSchema,
  graphicsContextSchema,
  outputListSchema,
  extendedInputAttributesSchema,
  colourMapSchema,
  objectLabelReferenceListSchema,
  externalObjectDefinitionSchema,
  externalReferenceNameSchema,
  externalObjectPointerSchema,
  animationSchema,
  colourPaletteSchema,
  graphicDataSchema,
  workingSetSpecialControlsSchema,
  scaledGraphicSchema,
]);

export type VtObject = z.infer<typeof vtObjectSchema>;

/** The object variant carrying a given type code. */
export type ObjectOf<T extends ObjectType> = Extract<VtObject, { type: T }>;

export type WorkingSet = ObjectOf<ObjectType.WorkingSet>;
export type DataMask = ObjectOf<ObjectType.DataMask>;
export type AlarmMask = ObjectOf<ObjectType.AlarmMask>;
export type Container = ObjectOf<ObjectType.Container>;
export type SoftKeyMask = ObjectOf<ObjectType.SoftKeyMask>;
export type Key = ObjectOf<ObjectType.Key>;
export type Button = ObjectOf<ObjectType.Button>;
export type ObjectPointer = ObjectOf<ObjectType.ObjectPointer>;
export type Macro = ObjectOf<ObjectType.Macro>;
