// src/validator.ts
// Validates an object pool against the relationship and event schemas

import { ObjectType, VtVersion, objectTypeName } from './object-type.js';
import { vtObjectSchema, type VtObject } from './objects.js';
import type { PoolView } from './object-pool.js';
import { childReferences, macroReferences, referencedObjects } from './references.js';
import { isChildAllowed } from './relationships.js';
import { isEventPossible } from './events.js';

export interface ValidationError {
  path: string;
  message: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Check a pool for fields out of range, broken references, children the VT
 * version does not allow, unusable macro bindings and a missing or
 * duplicated working set.
 * Never throws: every finding is reported as an error entry.
 */
export function validatePool(pool: PoolView, version: VtVersion): ValidationResult {
  const errors: ValidationError[] = [];

  const workingSets = pool.objectsByType(ObjectType.WorkingSet);
  if (workingSets.length === 0) {
    errors.push({ path: 'workingSet', message: 'pool has no WorkingSet object' });
  } else if (workingSets.length > 1) {
    errors.push({
      path: 'workingSet',
      message: `pool has ${workingSets.length} WorkingSet objects (ids ${workingSets.map((ws) => ws.id).join(', ')})`,
    });
  }

  for (const object of pool.objects()) {
    validateObject(pool, object, version, errors);
  }

  return { valid: errors.length === 0, errors };
}

function validateObject(pool: PoolView, object: VtObject, version: VtVersion, errors: ValidationError[]): void {
  const path = `objects.${object.id}`;
  const typeName = objectTypeName(object.type);

  const shape = vtObjectSchema.safeParse(object);
  if (!shape.success) {
    for (const issue of shape.error.issues) {
      errors.push({ path: [path, ...issue.path].join('.'), message: `${typeName} ${issue.message}` });
    }
  }

  // Missing targets are reported once per referenced id
  const missing = new Set(referencedObjects(object).filter((id) => !pool.has(id)));
  for (const id of missing) {
    errors.push({ path, message: `${typeName} references missing object ${id}` });
  }

  for (const childId of new Set(childReferences(object))) {
    const child = pool.objectById(childId);
    if (!child) continue;
    if (!isChildAllowed(object.type, child.type, version)) {
      errors.push({
        path: `${path}.children.${childId}`,
        message: `${objectTypeName(child.type)} is not allowed as a child of ${typeName} on VT version ${version}`,
      });
    }
  }

  macroReferences(object).forEach((binding, index) => {
    const bindingPath = `${path}.macroRefs.${index}`;
    if (!isEventPossible(object.type, binding.event)) {
      errors.push({ path: bindingPath, message: `${typeName} cannot raise event ${binding.event}` });
    }
    const macro = pool.objectById(binding.macroId);
    if (!macro) {
      errors.push({ path: bindingPath, message: `macro ${binding.macroId} does not exist` });
    } else if (macro.type !== ObjectType.Macro) {
      errors.push({ path: bindingPath, message: `object ${binding.macroId} is a ${objectTypeName(macro.type)}, not a Macro` });
    }
  });
}
