// src/references.ts
// Reference edges of an object: visiting, listing and rewriting object ids

import { ObjectType } from './object-type.js';
import type { MacroRef, NullableObjectId, ObjectId, ObjectRef, VtObject } from './objects.js';

export type ReferenceMapper = (id: ObjectId) => ObjectId;

function mapRefs(refs: ObjectRef[], fn: ReferenceMapper): ObjectRef[] {
  return refs.map((ref) => ({ id: fn(ref.id), offset: { ...ref.offset } }));
}

function mapNullable(id: NullableObjectId, fn: ReferenceMapper): NullableObjectId {
  return id === null ? null : fn(id);
}

function mapNullableList(ids: NullableObjectId[], fn: ReferenceMapper): NullableObjectId[] {
  return ids.map((id) => mapNullable(id, fn));
}

/**
 * Return a copy of `object` with every object-id reference passed through `fn`.
 * Macro bindings are not object references and are left untouched.
 * `fn` is called in declaration order, which `referencedObjects` relies on.
 */
export function mapReferences(object: VtObject, fn: ReferenceMapper): VtObject {
  switch (object.type) {
    case ObjectType.WorkingSet:
      return { ...object, activeMask: fn(object.activeMask), objectRefs: mapRefs(object.objectRefs, fn) };
    case ObjectType.DataMask:
    case ObjectType.AlarmMask:
      return {
        ...object,
        softKeyMask: mapNullable(object.softKeyMask, fn),
        objectRefs: mapRefs(object.objectRefs, fn),
      };
    case ObjectType.Container:
    case ObjectType.Key:
    case ObjectType.Button:
    case ObjectType.Animation:
    case ObjectType.AuxiliaryFunctionType1:
    case ObjectType.AuxiliaryInputType1:
    case ObjectType.AuxiliaryFunctionType2:
    case ObjectType.AuxiliaryInputType2:
      return { ...object, objectRefs: mapRefs(object.objectRefs, fn) };
    case ObjectType.SoftKeyMask:
      return { ...object, objects: object.objects.map(fn) };
    case ObjectType.InputBoolean:
      return {
        ...object,
        foregroundColour: fn(object.foregroundColour),
        variableReference: mapNullable(object.variableReference, fn),
      };
    case ObjectType.InputString:
      return {
        ...object,
        fontAttributes: fn(object.fontAttributes),
        inputAttributes: mapNullable(object.inputAttributes, fn),
        variableReference: mapNullable(object.variableReference, fn),
      };
    case ObjectType.InputNumber:
    case ObjectType.OutputString:
    case ObjectType.OutputNumber:
      return {
        ...object,
        fontAttributes: fn(object.fontAttributes),
        variableReference: mapNullable(object.variableReference, fn),
      };
    case ObjectType.InputList:
    case ObjectType.OutputList:
      return {
        ...object,
        variableReference: mapNullable(object.variableReference, fn),
        listItems: mapNullableList(object.listItems, fn),
      };
    case ObjectType.OutputLine:
      return { ...object, lineAttributes: fn(object.lineAttributes) };
    case ObjectType.OutputRectangle:
    case ObjectType.OutputEllipse:
    case ObjectType.OutputPolygon:
      return {
        ...object,
        lineAttributes: fn(object.lineAttributes),
        fillAttributes: mapNullable(object.fillAttributes, fn),
      };
    case ObjectType.OutputMeter:
      return { ...object, variableReference: mapNullable(object.variableReference, fn) };
    case ObjectType.OutputLinearBarGraph:
    case ObjectType.OutputArchedBarGraph:
      return {
        ...object,
        variableReference: mapNullable(object.variableReference, fn),
        targetValueVariableReference: mapNullable(object.targetValueVariableReference, fn),
      };
    case ObjectType.FillAttributes:
      return { ...object, fillPattern: mapNullable(object.fillPattern, fn) };
    case ObjectType.ObjectPointer:
    case ObjectType.ScaledGraphic:
      return { ...object, value: mapNullable(object.value, fn) };
    case ObjectType.AuxiliaryControlDesignatorType2:
      return { ...object, auxiliaryObjectId: mapNullable(object.auxiliaryObjectId, fn) };
    case ObjectType.WindowMask:
      return {
        ...object,
        name: fn(object.name),
        windowTitle: mapNullable(object.windowTitle, fn),
        windowIcon: mapNullable(object.windowIcon, fn),
        objects: mapNullableList(object.objects, fn),
        objectRefs: mapRefs(object.objectRefs, fn),
      };
    case ObjectType.KeyGroup:
      return {
        ...object,
        name: fn(object.name),
        keyGroupIcon: mapNullable(object.keyGroupIcon, fn),
        objects: object.objects.map(fn),
      };
    case ObjectType.GraphicsContext:
      return {
        ...object,
        fontAttributes: mapNullable(object.fontAttributes, fn),
        lineAttributes: mapNullable(object.lineAttributes, fn),
        fillAttributes: mapNullable(object.fillAttributes, fn),
      };
    case ObjectType.ObjectLabelReferenceList:
      return {
        ...object,
        labels: object.labels.map((label) => ({
          ...label,
          id: fn(label.id),
          stringVariable: mapNullable(label.stringVariable, fn),
          graphicRepresentation: mapNullable(label.graphicRepresentation, fn),
        })),
      };
    case ObjectType.ExternalObjectDefinition:
      return { ...object, objects: mapNullableList(object.objects, fn) };
    case ObjectType.ExternalObjectPointer:
      return {
        ...object,
        defaultObjectId: mapNullable(object.defaultObjectId, fn),
        externalReferenceNameId: mapNullable(object.externalReferenceNameId, fn),
        externalObjectId: mapNullable(object.externalObjectId, fn),
      };
    case ObjectType.WorkingSetSpecialControls:
      return {
        ...object,
        colourMap: mapNullable(object.colourMap, fn),
        colourPalette: mapNullable(object.colourPalette, fn),
      };
    case ObjectType.PictureGraphic:
    case ObjectType.NumberVariable:
    case ObjectType.StringVariable:
    case ObjectType.FontAttributes:
    case ObjectType.LineAttributes:
    case ObjectType.InputAttributes:
    case ObjectType.Macro:
    case ObjectType.ExtendedInputAttributes:
    case ObjectType.ColourMap:
    case ObjectType.ExternalReferenceName:
    case ObjectType.ColourPalette:
    case ObjectType.GraphicData:
      return { ...object };
    default: {
      const unreachable: never = object;
      return unreachable;
    }
  }
}

/** Every object id `object` references, in declaration order (duplicates kept). */
export function referencedObjects(object: VtObject): ObjectId[] {
  const ids: ObjectId[] = [];
  mapReferences(object, (id) => {
    ids.push(id);
    return id;
  });
  return ids;
}

/**
 * The nesting references the relationship schema governs: positioned object
 * refs and the key/list/window object lists. Attribute, variable and mask
 * links are references but not children.
 */
export function childReferences(object: VtObject): ObjectId[] {
  const present = (ids: NullableObjectId[]): ObjectId[] =>
    ids.filter((id): id is ObjectId => id !== null);

  switch (object.type) {
    case ObjectType.SoftKeyMask:
    case ObjectType.KeyGroup:
      return [...object.objects];
    case ObjectType.InputList:
    case ObjectType.OutputList:
      return present(object.listItems);
    case ObjectType.WindowMask:
      return [...present(object.objects), ...object.objectRefs.map((ref) => ref.id)];
    default:
      return 'objectRefs' in object ? object.objectRefs.map((ref) => ref.id) : [];
  }
}

/** Positioned children, for types that place children at pixel offsets. */
export function positionedChildren(object: VtObject): ObjectRef[] {
  return 'objectRefs' in object ? object.objectRefs : [];
}

export function macroReferences(object: VtObject): MacroRef[] {
  return 'macroRefs' in object ? object.macroRefs : [];
}

/** Copy of `object` with every reference to `from` pointing at `to`. */
export function replaceReference(object: VtObject, from: ObjectId, to: ObjectId): VtObject {
  return mapReferences(object, (id) => (id === from ? to : id));
}
