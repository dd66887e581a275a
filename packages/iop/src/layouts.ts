// src/layouts.ts
// Declarative wire layouts of the ISO 11783-6 object records.
// Every record starts with object id (u16) and type (u8); the layouts below
// describe what follows. Counts come before the lists they size.

import { ObjectType } from '@vtpool/core';

export type ScalarKind = 'u8' | 'u16' | 'i16' | 'u32' | 'i32' | 'f32' | 'bool' | 'id' | 'nullableId';
export type CountWidth = 1 | 2 | 4;

export type ValueSpec =
  | { kind: ScalarKind }
  | { kind: 'chars'; size: number }
  | { kind: 'bytes'; size: number }
  | { kind: 'record'; layout: Layout };

export type Field =
  | (ValueSpec & { name: string })
  | { kind: 'count'; list: string; width: CountWidth }
  | { kind: 'list'; name: string; item: ValueSpec }
  | { kind: 'string'; name: string; width: CountWidth };

export type Layout = readonly Field[];

// ============ Builders ============

const scalar = (kind: ScalarKind) => (name: string): Field => ({ kind, name });
const u8 = scalar('u8');
const u16 = scalar('u16');
const i16 = scalar('i16');
const u32 = scalar('u32');
const i32 = scalar('i32');
const f32 = scalar('f32');
const bool = scalar('bool');
const id = scalar('id');
const nullableId = scalar('nullableId');

const count = (list: string, width: CountWidth = 1): Field => ({ kind: 'count', list, width });
const list = (name: string, item: ValueSpec): Field => ({ kind: 'list', name, item });
const string = (name: string, width: CountWidth): Field => ({ kind: 'string', name, width });
const record = (name: string, layout: Layout): Field => ({ kind: 'record', name, layout });

const BYTE: ValueSpec = { kind: 'u8' };
const ID: ValueSpec = { kind: 'id' };
const NULLABLE_ID: ValueSpec = { kind: 'nullableId' };
const LANGUAGE_CODE: ValueSpec = { kind: 'chars', size: 2 };
const OBJECT_REF: ValueSpec = { kind: 'record', layout: [id('id'), record('offset', [i16('x'), i16('y')])] };
const MACRO_REF: ValueSpec = { kind: 'record', layout: [u8('event'), u8('macroId')] };

const objectRefs = list('objectRefs', OBJECT_REF);
const macroRefs = list('macroRefs', MACRO_REF);

/** `numMacros` followed by the macro list, the tail of most records. */
const MACROS: Layout = [count('macroRefs'), macroRefs];

// ============ Records ============

export const LAYOUTS: Record<ObjectType, Layout> = {
  [ObjectType.WorkingSet]: [
    u8('backgroundColour'),
    bool('selectable'),
    id('activeMask'),
    count('objectRefs'),
    count('macroRefs'),
    count('languageCodes'),
    objectRefs,
    macroRefs,
    list('languageCodes', LANGUAGE_CODE),
  ],
  [ObjectType.DataMask]: [
    u8('backgroundColour'),
    nullableId('softKeyMask'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.AlarmMask]: [
    u8('backgroundColour'),
    nullableId('softKeyMask'),
    u8('priority'),
    u8('acousticSignal'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.Container]: [
    u16('width'),
    u16('height'),
    bool('hidden'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.SoftKeyMask]: [
    u8('backgroundColour'),
    count('objects'),
    count('macroRefs'),
    list('objects', ID),
    macroRefs,
  ],
  [ObjectType.Key]: [
    u8('backgroundColour'),
    u8('keyCode'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.Button]: [
    u16('width'),
    u16('height'),
    u8('backgroundColour'),
    u8('borderColour'),
    u8('keyCode'),
    u8('options'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.InputBoolean]: [
    u8('backgroundColour'),
    u16('width'),
    id('foregroundColour'),
    nullableId('variableReference'),
    bool('value'),
    bool('enabled'),
    ...MACROS,
  ],
  [ObjectType.InputString]: [
    u16('width'),
    u16('height'),
    u8('backgroundColour'),
    id('fontAttributes'),
    nullableId('inputAttributes'),
    u8('options'),
    nullableId('variableReference'),
    u8('justification'),
    string('value', 1),
    bool('enabled'),
    ...MACROS,
  ],
  [ObjectType.InputNumber]: [
    u16('width'),
    u16('height'),
    u8('backgroundColour'),
    id('fontAttributes'),
    u8('options'),
    nullableId('variableReference'),
    u32('value'),
    u32('minValue'),
    u32('maxValue'),
    i32('offset'),
    f32('scale'),
    u8('numberOfDecimals'),
    u8('format'),
    u8('justification'),
    u8('options2'),
    ...MACROS,
  ],
  [ObjectType.InputList]: [
    u16('width'),
    u16('height'),
    nullableId('variableReference'),
    u8('value'),
    count('listItems'),
    u8('options'),
    count('macroRefs'),
    list('listItems', NULLABLE_ID),
    macroRefs,
  ],
  [ObjectType.OutputString]: [
    u16('width'),
    u16('height'),
    u8('backgroundColour'),
    id('fontAttributes'),
    u8('options'),
    nullableId('variableReference'),
    u8('justification'),
    string('value', 2),
    ...MACROS,
  ],
  [ObjectType.OutputNumber]: [
    u16('width'),
    u16('height'),
    u8('backgroundColour'),
    id('fontAttributes'),
    u8('options'),
    nullableId('variableReference'),
    u32('value'),
    i32('offset'),
    f32('scale'),
    u8('numberOfDecimals'),
    u8('format'),
    u8('justification'),
    ...MACROS,
  ],
  [ObjectType.OutputLine]: [id('lineAttributes'), u16('width'), u16('height'), u8('lineDirection'), ...MACROS],
  [ObjectType.OutputRectangle]: [
    id('lineAttributes'),
    u16('width'),
    u16('height'),
    u8('lineSuppression'),
    nullableId('fillAttributes'),
    ...MACROS,
  ],
  [ObjectType.OutputEllipse]: [
    id('lineAttributes'),
    u16('width'),
    u16('height'),
    u8('ellipseType'),
    u8('startAngle'),
    u8('endAngle'),
    nullableId('fillAttributes'),
    ...MACROS,
  ],
  [ObjectType.OutputPolygon]: [
    u16('width'),
    u16('height'),
    id('lineAttributes'),
    nullableId('fillAttributes'),
    u8('polygonType'),
    count('points'),
    count('macroRefs'),
    list('points', { kind: 'record', layout: [u16('x'), u16('y')] }),
    macroRefs,
  ],
  [ObjectType.OutputMeter]: [
    u16('width'),
    u8('needleColour'),
    u8('borderColour'),
    u8('arcAndTickColour'),
    u8('options'),
    u8('numberOfTicks'),
    u8('startAngle'),
    u8('endAngle'),
    u16('minValue'),
    u16('maxValue'),
    nullableId('variableReference'),
    u16('value'),
    ...MACROS,
  ],
  [ObjectType.OutputLinearBarGraph]: [
    u16('width'),
    u16('height'),
    u8('colour'),
    u8('targetLineColour'),
    u8('options'),
    u8('numberOfTicks'),
    u16('minValue'),
    u16('maxValue'),
    nullableId('variableReference'),
    u16('value'),
    nullableId('targetValueVariableReference'),
    u16('targetValue'),
    ...MACROS,
  ],
  [ObjectType.OutputArchedBarGraph]: [
    u16('width'),
    u16('height'),
    u8('colour'),
    u8('targetLineColour'),
    u8('options'),
    u8('startAngle'),
    u8('endAngle'),
    u16('barGraphWidth'),
    u16('minValue'),
    u16('maxValue'),
    nullableId('variableReference'),
    u16('value'),
    nullableId('targetValueVariableReference'),
    u16('targetValue'),
    ...MACROS,
  ],
  [ObjectType.PictureGraphic]: [
    u16('width'),
    u16('actualWidth'),
    u16('actualHeight'),
    u8('format'),
    u8('options'),
    u8('transparencyColour'),
    count('data', 4),
    count('macroRefs'),
    list('data', BYTE),
    macroRefs,
  ],
  [ObjectType.NumberVariable]: [u32('value')],
  [ObjectType.StringVariable]: [string('value', 2)],
  [ObjectType.FontAttributes]: [u8('fontColour'), u8('fontSize'), u8('fontType'), u8('fontStyle'), ...MACROS],
  [ObjectType.LineAttributes]: [u8('lineColour'), u8('lineWidth'), u16('lineArt'), ...MACROS],
  [ObjectType.FillAttributes]: [u8('fillType'), u8('fillColour'), nullableId('fillPattern'), ...MACROS],
  [ObjectType.InputAttributes]: [u8('validationType'), string('validationString', 1), ...MACROS],
  [ObjectType.ObjectPointer]: [nullableId('value')],
  [ObjectType.Macro]: [count('commands', 2), list('commands', BYTE)],
  [ObjectType.AuxiliaryFunctionType1]: [
    u8('backgroundColour'),
    u8('functionType'),
    count('objectRefs'),
    objectRefs,
  ],
  [ObjectType.AuxiliaryInputType1]: [
    u8('backgroundColour'),
    u8('functionType'),
    u8('inputId'),
    count('objectRefs'),
    objectRefs,
  ],
  [ObjectType.AuxiliaryFunctionType2]: [
    u8('backgroundColour'),
    u8('functionAttributes'),
    count('objectRefs'),
    objectRefs,
  ],
  [ObjectType.AuxiliaryInputType2]: [
    u8('backgroundColour'),
    u8('functionAttributes'),
    count('objectRefs'),
    objectRefs,
  ],
  [ObjectType.AuxiliaryControlDesignatorType2]: [u8('pointerType'), nullableId('auxiliaryObjectId')],
  [ObjectType.WindowMask]: [
    u8('width'),
    u8('height'),
    u8('windowType'),
    u8('backgroundColour'),
    u8('options'),
    id('name'),
    nullableId('windowTitle'),
    nullableId('windowIcon'),
    count('objects'),
    count('objectRefs'),
    count('macroRefs'),
    list('objects', NULLABLE_ID),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.KeyGroup]: [
    u8('options'),
    id('name'),
    nullableId('keyGroupIcon'),
    count('objects'),
    count('macroRefs'),
    list('objects', ID),
    macroRefs,
  ],
  [ObjectType.GraphicsContext]: [
    u16('viewportWidth'),
    u16('viewportHeight'),
    i16('viewportX'),
    i16('viewportY'),
    u16('canvasWidth'),
    u16('canvasHeight'),
    f32('viewportZoom'),
    i16('graphicsCursorX'),
    i16('graphicsCursorY'),
    u8('foregroundColour'),
    u8('backgroundColour'),
    nullableId('fontAttributes'),
    nullableId('lineAttributes'),
    nullableId('fillAttributes'),
    u8('format'),
    u8('options'),
    u8('transparencyColour'),
  ],
  [ObjectType.OutputList]: [
    u16('width'),
    u16('height'),
    nullableId('variableReference'),
    u8('value'),
    count('listItems'),
    count('macroRefs'),
    list('listItems', NULLABLE_ID),
    macroRefs,
  ],
  [ObjectType.ExtendedInputAttributes]: [
    u8('validationType'),
    count('codePlanes'),
    list('codePlanes', {
      kind: 'record',
      layout: [
        u8('number'),
        count('ranges'),
        list('ranges', { kind: 'record', layout: [u16('first'), u16('last')] }),
      ],
    }),
  ],
  [ObjectType.ColourMap]: [count('colourMap', 2), list('colourMap', BYTE)],
  [ObjectType.ObjectLabelReferenceList]: [
    count('labels', 2),
    list('labels', {
      kind: 'record',
      layout: [id('id'), nullableId('stringVariable'), u8('fontType'), nullableId('graphicRepresentation')],
    }),
  ],
  [ObjectType.ExternalObjectDefinition]: [
    u8('options'),
    { kind: 'bytes', name: 'name', size: 8 },
    count('objects'),
    list('objects', NULLABLE_ID),
  ],
  [ObjectType.ExternalReferenceName]: [u8('options'), { kind: 'bytes', name: 'name', size: 8 }],
  [ObjectType.ExternalObjectPointer]: [
    nullableId('defaultObjectId'),
    nullableId('externalReferenceNameId'),
    nullableId('externalObjectId'),
  ],
  [ObjectType.Animation]: [
    u16('width'),
    u16('height'),
    u16('refreshInterval'),
    u8('value'),
    bool('enabled'),
    u8('firstChildIndex'),
    u8('lastChildIndex'),
    u8('defaultChildIndex'),
    u8('options'),
    count('objectRefs'),
    count('macroRefs'),
    objectRefs,
    macroRefs,
  ],
  [ObjectType.ColourPalette]: [
    u16('options'),
    count('colours', 2),
    list('colours', { kind: 'record', layout: [u8('b'), u8('g'), u8('r'), u8('a')] }),
  ],
  [ObjectType.GraphicData]: [u8('format'), count('data', 4), list('data', BYTE)],
  [ObjectType.WorkingSetSpecialControls]: [
    nullableId('colourMap'),
    nullableId('colourPalette'),
    count('languagePairs'),
    list('languagePairs', {
      kind: 'record',
      layout: [
        { kind: 'chars', name: 'language', size: 2 },
        { kind: 'chars', name: 'country', size: 2 },
      ],
    }),
  ],
  [ObjectType.ScaledGraphic]: [
    u16('width'),
    u16('height'),
    u8('scaleType'),
    u8('options'),
    nullableId('value'),
    ...MACROS,
  ],
};
