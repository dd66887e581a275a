// src/relationships.ts
// Which object types may be nested as children of which, per VT version.
// Later versions only ever add types to a rule; several rules reuse another type's rule.

import { ObjectType, VtVersion } from './object-type.js';

type ChildRule = (version: VtVersion) => ObjectType[];

const BASIC_OUTPUT_SHAPES: readonly ObjectType[] = [
  ObjectType.OutputString,
  ObjectType.OutputNumber,
  ObjectType.OutputLine,
  ObjectType.OutputRectangle,
  ObjectType.OutputEllipse,
  ObjectType.OutputPolygon,
];

const OUTPUT_GRAPHS: readonly ObjectType[] = [
  ObjectType.OutputMeter,
  ObjectType.OutputLinearBarGraph,
  ObjectType.OutputArchedBarGraph,
];

// ============ Rules ============

function workingSetChildren(version: VtVersion): ObjectType[] {
  const allowed = [...BASIC_OUTPUT_SHAPES, ObjectType.PictureGraphic];
  if (version >= VtVersion.Version4) {
    allowed.push(ObjectType.OutputList, ...OUTPUT_GRAPHS, ObjectType.GraphicsContext, ObjectType.ObjectPointer);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

function maskChildren(version: VtVersion, interactive: boolean): ObjectType[] {
  const allowed = [ObjectType.Container];
  if (interactive) {
    allowed.push(
      ObjectType.Button,
      ObjectType.InputBoolean,
      ObjectType.InputString,
      ObjectType.InputNumber,
      ObjectType.InputList,
    );
  }
  allowed.push(...BASIC_OUTPUT_SHAPES, ...OUTPUT_GRAPHS, ObjectType.PictureGraphic, ObjectType.ObjectPointer);
  if (version >= VtVersion.Version3) {
    allowed.push(ObjectType.WorkingSet);
  }
  if (version >= VtVersion.Version4) {
    allowed.push(ObjectType.OutputList, ObjectType.GraphicsContext);
  }
  if (version >= VtVersion.Version5) {
    allowed.push(ObjectType.Animation, ObjectType.ExternalObjectPointer);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

function dataMaskChildren(version: VtVersion): ObjectType[] {
  return maskChildren(version, true);
}

function alarmMaskChildren(version: VtVersion): ObjectType[] {
  return maskChildren(version, false);
}

// As of VT version 6 a container takes the same children as a data mask
function containerChildren(version: VtVersion): ObjectType[] {
  return dataMaskChildren(version);
}

function softKeyMaskChildren(version: VtVersion): ObjectType[] {
  const allowed = [ObjectType.Key, ObjectType.ObjectPointer];
  if (version >= VtVersion.Version5) {
    allowed.push(ObjectType.ExternalObjectPointer);
  }
  return allowed;
}

function keyChildren(version: VtVersion): ObjectType[] {
  const allowed = [ObjectType.Container, ...BASIC_OUTPUT_SHAPES, ObjectType.PictureGraphic, ObjectType.ObjectPointer];
  if (version >= VtVersion.Version4) {
    allowed.push(ObjectType.WorkingSet, ObjectType.OutputList, ...OUTPUT_GRAPHS, ObjectType.GraphicsContext);
  }
  if (version >= VtVersion.Version5) {
    allowed.push(ObjectType.Animation, ObjectType.ExternalObjectPointer);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

// As of VT version 6 a button takes the same children as a key
function buttonChildren(version: VtVersion): ObjectType[] {
  return keyChildren(version);
}

function inputListChildren(version: VtVersion): ObjectType[] {
  const allowed = [ObjectType.OutputString, ObjectType.OutputNumber, ObjectType.PictureGraphic];
  if (version >= VtVersion.Version4) {
    allowed.push(
      ObjectType.WorkingSet,
      ObjectType.Container,
      ObjectType.OutputList,
      ObjectType.OutputLine,
      ObjectType.OutputRectangle,
      ObjectType.OutputEllipse,
      ObjectType.OutputPolygon,
      ...OUTPUT_GRAPHS,
      ObjectType.GraphicsContext,
      ObjectType.ObjectPointer,
    );
  }
  if (version >= VtVersion.Version5) {
    allowed.push(ObjectType.ExternalObjectPointer);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

function windowMaskChildren(version: VtVersion): ObjectType[] {
  const allowed: ObjectType[] = [];
  if (version >= VtVersion.Version4) {
    allowed.push(
      ObjectType.WorkingSet,
      ObjectType.Container,
      ObjectType.Button,
      ObjectType.InputBoolean,
      ObjectType.InputString,
      ObjectType.InputNumber,
      ObjectType.InputList,
      ObjectType.OutputString,
      ObjectType.OutputNumber,
      ObjectType.OutputList,
      ObjectType.OutputLine,
      ObjectType.OutputRectangle,
      ObjectType.OutputEllipse,
      ObjectType.OutputPolygon,
      ...OUTPUT_GRAPHS,
      ObjectType.GraphicsContext,
      ObjectType.PictureGraphic,
      ObjectType.ObjectPointer,
    );
  }
  if (version >= VtVersion.Version5) {
    allowed.push(ObjectType.Animation, ObjectType.ExternalObjectPointer);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

// As of VT version 6 an output list takes the same children as a window mask
function outputListChildren(version: VtVersion): ObjectType[] {
  return windowMaskChildren(version);
}

function auxiliaryType1Children(): ObjectType[] {
  return [...BASIC_OUTPUT_SHAPES, ObjectType.PictureGraphic];
}

function auxiliaryType2Children(version: VtVersion): ObjectType[] {
  const allowed: ObjectType[] = [];
  if (version >= VtVersion.Version3) {
    allowed.push(
      ObjectType.Container,
      ...BASIC_OUTPUT_SHAPES,
      ...OUTPUT_GRAPHS,
      ObjectType.PictureGraphic,
      ObjectType.ObjectPointer,
    );
  }
  if (version >= VtVersion.Version4) {
    allowed.push(ObjectType.OutputList, ObjectType.GraphicsContext);
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

function keyGroupChildren(version: VtVersion): ObjectType[] {
  return version >= VtVersion.Version4 ? [ObjectType.Key] : [];
}

function animationChildren(version: VtVersion): ObjectType[] {
  const allowed: ObjectType[] = [];
  if (version >= VtVersion.Version5) {
    allowed.push(
      ObjectType.Container,
      ObjectType.OutputString,
      ObjectType.OutputNumber,
      ObjectType.OutputList,
      ObjectType.OutputLine,
      ObjectType.OutputRectangle,
      ObjectType.OutputEllipse,
      ObjectType.OutputPolygon,
      ...OUTPUT_GRAPHS,
      ObjectType.GraphicsContext,
      ObjectType.PictureGraphic,
      ObjectType.ObjectPointer,
    );
  }
  if (version >= VtVersion.Version6) {
    allowed.push(ObjectType.ScaledGraphic);
  }
  return allowed;
}

function noChildren(): ObjectType[] {
  return [];
}

// ============ Table ============

const CHILD_RULES: Partial<Record<ObjectType, ChildRule>> = {
  [ObjectType.WorkingSet]: workingSetChildren,
  [ObjectType.DataMask]: dataMaskChildren,
  [ObjectType.AlarmMask]: alarmMaskChildren,
  [ObjectType.Container]: containerChildren,
  [ObjectType.SoftKeyMask]: softKeyMaskChildren,
  [ObjectType.Key]: keyChildren,
  [ObjectType.Button]: buttonChildren,
  [ObjectType.InputList]: inputListChildren,
  [ObjectType.OutputList]: outputListChildren,
  [ObjectType.AuxiliaryFunctionType1]: auxiliaryType1Children,
  [ObjectType.AuxiliaryInputType1]: auxiliaryType1Children,
  [ObjectType.AuxiliaryFunctionType2]: auxiliaryType2Children,
  [ObjectType.AuxiliaryInputType2]: auxiliaryType2Children,
  [ObjectType.WindowMask]: windowMaskChildren,
  [ObjectType.KeyGroup]: keyGroupChildren,
  [ObjectType.Animation]: animationChildren,
  [ObjectType.ObjectLabelReferenceList]: noChildren,
};

/**
 * Object types that may legally be nested as children of `type` on a VT of
 * `version`. Types without children yield an empty list.
 */
export function allowedChildTypes(type: ObjectType, version: VtVersion): ObjectType[] {
  const rule = CHILD_RULES[type];
  return rule ? rule(version) : [];
}

export function isChildAllowed(parent: ObjectType, child: ObjectType, version: VtVersion): boolean {
  return allowedChildTypes(parent, version).includes(child);
}

/** Types that can hold children at all (on the newest VT version). */
export function canHaveChildren(type: ObjectType): boolean {
  return allowedChildTypes(type, VtVersion.Version6).length > 0;
}
