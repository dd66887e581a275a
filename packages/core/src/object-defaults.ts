// src/object-defaults.ts
// Fresh objects for the "create object" action: schema-valid, no references

import { ObjectType } from './object-type.js';
import type { ObjectId, VtObject } from './objects.js';

const WHITE = 1;
const BLACK = 0;

// Mandatory (non-nullable) reference fields start out at id 0 until they are wired
const NO_REFERENCE: ObjectId = 0;

export function defaultObject(type: ObjectType, id: ObjectId): VtObject {
  switch (type) {
    case ObjectType.WorkingSet:
      return {
        type,
        id,
        backgroundColour: WHITE,
        selectable: true,
        activeMask: 0,
        objectRefs: [],
        macroRefs: [],
        languageCodes: ['en'],
      };
    case ObjectType.DataMask:
      return { type, id, backgroundColour: WHITE, softKeyMask: null, objectRefs: [], macroRefs: [] };
    case ObjectType.AlarmMask:
      return {
        type,
        id,
        backgroundColour: WHITE,
        softKeyMask: null,
        priority: 2,
        acousticSignal: 3,
        objectRefs: [],
        macroRefs: [],
      };
    case ObjectType.Container:
      return { type, id, width: 100, height: 100, hidden: false, objectRefs: [], macroRefs: [] };
    case ObjectType.SoftKeyMask:
      return { type, id, backgroundColour: WHITE, objects: [], macroRefs: [] };
    case ObjectType.Key:
      return { type, id, backgroundColour: WHITE, keyCode: 0, objectRefs: [], macroRefs: [] };
    case ObjectType.Button:
      return {
        type,
        id,
        width: 80,
        height: 40,
        backgroundColour: WHITE,
        borderColour: BLACK,
        keyCode: 0,
        options: 0,
        objectRefs: [],
        macroRefs: [],
      };
    case ObjectType.InputBoolean:
      return {
        type,
        id,
        backgroundColour: WHITE,
        width: 20,
        foregroundColour: NO_REFERENCE,
        variableReference: null,
        value: false,
        enabled: true,
        macroRefs: [],
      };
    case ObjectType.InputString:
      return {
        type,
        id,
        width: 100,
        height: 20,
        backgroundColour: WHITE,
        fontAttributes: NO_REFERENCE,
        inputAttributes: null,
        options: 0,
        variableReference: null,
        justification: 0,
        value: '',
        enabled: true,
        macroRefs: [],
      };
    case ObjectType.InputNumber:
      return {
        type,
        id,
        width: 100,
        height: 20,
        backgroundColour: WHITE,
        fontAttributes: NO_REFERENCE,
        options: 0,
        variableReference: null,
        value: 0,
        minValue: 0,
        maxValue: 100,
        offset: 0,
        scale: 1,
        numberOfDecimals: 0,
        format: 0,
        justification: 0,
        options2: 1,
        macroRefs: [],
      };
    case ObjectType.InputList:
      return {
        type,
        id,
        width: 100,
        height: 20,
        variableReference: null,
        value: 0,
        options: 1,
        listItems: [],
        macroRefs: [],
      };
    case ObjectType.OutputString:
      return {
        type,
        id,
        width: 100,
        height: 20,
        backgroundColour: WHITE,
        fontAttributes: NO_REFERENCE,
        options: 0,
        variableReference: null,
        justification: 0,
        value: '',
        macroRefs: [],
      };
    case ObjectType.OutputNumber:
      return {
        type,
        id,
        width: 100,
        height: 20,
        backgroundColour: WHITE,
        fontAttributes: NO_REFERENCE,
        options: 0,
        variableReference: null,
        value: 0,
        offset: 0,
        scale: 1,
        numberOfDecimals: 0,
        format: 0,
        justification: 0,
        macroRefs: [],
      };
    case ObjectType.OutputList:
      return { type, id, width: 100, height: 20, variableReference: null, value: 0, listItems: [], macroRefs: [] };
    case ObjectType.OutputLine:
      return { type, id, lineAttributes: NO_REFERENCE, width: 50, height: 0, lineDirection: 0, macroRefs: [] };
    case ObjectType.OutputRectangle:
      return {
        type,
        id,
        lineAttributes: NO_REFERENCE,
        width: 50,
        height: 50,
        lineSuppression: 0,
        fillAttributes: null,
        macroRefs: [],
      };
    case ObjectType.OutputEllipse:
      return {
        type,
        id,
        lineAttributes: NO_REFERENCE,
        width: 50,
        height: 50,
        ellipseType: 0,
        startAngle: 0,
        endAngle: 180,
        fillAttributes: null,
        macroRefs: [],
      };
    case ObjectType.OutputPolygon:
      return {
        type,
        id,
        width: 50,
        height: 50,
        lineAttributes: NO_REFERENCE,
        fillAttributes: null,
        polygonType: 0,
        points: [
          { x: 0, y: 50 },
          { x: 25, y: 0 },
          { x: 50, y: 50 },
        ],
        macroRefs: [],
      };
    case ObjectType.OutputMeter:
      return {
        type,
        id,
        width: 100,
        needleColour: BLACK,
        borderColour: BLACK,
        arcAndTickColour: BLACK,
        options: 0,
        numberOfTicks: 5,
        startAngle: 0,
        endAngle: 180,
        minValue: 0,
        maxValue: 100,
        variableReference: null,
        value: 0,
        macroRefs: [],
      };
    case ObjectType.OutputLinearBarGraph:
      return {
        type,
        id,
        width: 20,
        height: 100,
        colour: BLACK,
        targetLineColour: BLACK,
        options: 0,
        numberOfTicks: 0,
        minValue: 0,
        maxValue: 100,
        variableReference: null,
        value: 0,
        targetValueVariableReference: null,
        targetValue: 0,
        macroRefs: [],
      };
    case ObjectType.OutputArchedBarGraph:
      return {
        type,
        id,
        width: 100,
        height: 100,
        colour: BLACK,
        targetLineColour: BLACK,
        options: 0,
        startAngle: 0,
        endAngle: 180,
        barGraphWidth: 10,
        minValue: 0,
        maxValue: 100,
        variableReference: null,
        value: 0,
        targetValueVariableReference: null,
        targetValue: 0,
        macroRefs: [],
      };
    case ObjectType.PictureGraphic:
      return {
        type,
        id,
        width: 0,
        actualWidth: 0,
        actualHeight: 0,
        format: 0,
        options: 0,
        transparencyColour: 0,
        data: [],
        macroRefs: [],
      };
    case ObjectType.NumberVariable:
      return { type, id, value: 0 };
    case ObjectType.StringVariable:
      return { type, id, value: '' };
    case ObjectType.FontAttributes:
      return { type, id, fontColour: BLACK, fontSize: 0, fontType: 0, fontStyle: 0, macroRefs: [] };
    case ObjectType.LineAttributes:
      return { type, id, lineColour: BLACK, lineWidth: 1, lineArt: 0xffff, macroRefs: [] };
    case ObjectType.FillAttributes:
      return { type, id, fillType: 0, fillColour: WHITE, fillPattern: null, macroRefs: [] };
    case ObjectType.InputAttributes:
      return { type, id, validationType: 0, validationString: '', macroRefs: [] };
    case ObjectType.ObjectPointer:
      return { type, id, value: null };
    case ObjectType.Macro:
      return { type, id, commands: [] };
    case ObjectType.AuxiliaryFunctionType1:
      return { type, id, backgroundColour: WHITE, functionType: 0, objectRefs: [] };
    case ObjectType.AuxiliaryInputType1:
      return { type, id, backgroundColour: WHITE, functionType: 0, inputId: 0, objectRefs: [] };
    case ObjectType.AuxiliaryFunctionType2:
      return { type, id, backgroundColour: WHITE, functionAttributes: 0, objectRefs: [] };
    case ObjectType.AuxiliaryInputType2:
      return { type, id, backgroundColour: WHITE, functionAttributes: 0, objectRefs: [] };
    case ObjectType.AuxiliaryControlDesignatorType2:
      return { type, id, pointerType: 0, auxiliaryObjectId: null };
    case ObjectType.WindowMask:
      return {
        type,
        id,
        width: 1,
        height: 1,
        windowType: 0,
        backgroundColour: WHITE,
        options: 0,
        name: NO_REFERENCE,
        windowTitle: null,
        windowIcon: null,
        objects: [],
        objectRefs: [],
        macroRefs: [],
      };
    case ObjectType.KeyGroup:
      return { type, id, options: 0, name: NO_REFERENCE, keyGroupIcon: null, objects: [], macroRefs: [] };
    case ObjectType.GraphicsContext:
      return {
        type,
        id,
        viewportWidth: 100,
        viewportHeight: 100,
        viewportX: 0,
        viewportY: 0,
        canvasWidth: 100,
        canvasHeight: 100,
        viewportZoom: 1,
        graphicsCursorX: 0,
        graphicsCursorY: 0,
        foregroundColour: BLACK,
        backgroundColour: WHITE,
        fontAttributes: null,
        lineAttributes: null,
        fillAttributes: null,
        format: 0,
        options: 0,
        transparencyColour: 0,
      };
    case ObjectType.ExtendedInputAttributes:
      return { type, id, validationType: 0, codePlanes: [] };
    case ObjectType.ColourMap:
      return { type, id, colourMap: [] };
    case ObjectType.ObjectLabelReferenceList:
      return { type, id, labels: [] };
    case ObjectType.ExternalObjectDefinition:
      return { type, id, options: 0, name: [0, 0, 0, 0, 0, 0, 0, 0], objects: [] };
    case ObjectType.ExternalReferenceName:
      return { type, id, options: 0, name: [0, 0, 0, 0, 0, 0, 0, 0] };
    case ObjectType.ExternalObjectPointer:
      return { type, id, defaultObjectId: null, externalReferenceNameId: null, externalObjectId: null };
    case ObjectType.Animation:
      return {
        type,
        id,
        width: 50,
        height: 50,
        refreshInterval: 100,
        value: 0,
        enabled: true,
        firstChildIndex: 0,
        lastChildIndex: 0,
        defaultChildIndex: 0,
        options: 0,
        objectRefs: [],
        macroRefs: [],
      };
    case ObjectType.ColourPalette:
      return { type, id, options: 0, colours: [] };
    case ObjectType.GraphicData:
      return { type, id, format: 0, data: [] };
    case ObjectType.WorkingSetSpecialControls:
      return { type, id, colourMap: null, colourPalette: null, languagePairs: [] };
    case ObjectType.ScaledGraphic:
      return { type, id, width: 50, height: 50, scaleType: 0, options: 0, value: null, macroRefs: [] };
    default: {
      const unreachable: never = type;
      return unreachable;
    }
  }
}
