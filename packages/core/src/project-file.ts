// src/project-file.ts
// Project file container: the binary pool plus designer metadata, as JSON

import { z } from 'zod';
import { VtVersion } from './object-type.js';
import { objectIdSchema } from './objects.js';
import type { ObjectPool, PoolView } from './object-pool.js';
import { DeserializationError, failure, success, type Outcome } from './errors.js';

export const PROJECT_FORMAT = 'vt-pool-designer/project';
export const PROJECT_FORMAT_VERSION = 1;

/** Binary pool codec the container delegates to (see @vtpool/iop). */
export interface ObjectPoolCodec {
  decode(bytes: Uint8Array): Outcome<ObjectPool, DeserializationError>;
  encode(pool: PoolView): Uint8Array;
}

const sizeSchema = z.object({
  width: z.number().int().positive(),
  height: z.number().int().positive(),
});

export const projectFileSchema = z.object({
  format: z.literal(PROJECT_FORMAT),
  version: z.literal(PROJECT_FORMAT_VERSION),
  vtVersion: z.nativeEnum(VtVersion).optional(),
  /** Base64 of the ISO 11783-6 binary pool. */
  objectPool: z.string().base64(),
  /** Object names keyed by the numeric id at save time. */
  objectInfo: z.record(z.string().regex(/^\d+$/), z.string().min(1)),
  maskSize: z.number().int().positive(),
  softKeySize: sizeSchema,
  lastSelected: objectIdSchema.nullable(),
});

export type ProjectFile = z.infer<typeof projectFileSchema>;

export function projectToBytes(file: ProjectFile): Uint8Array {
  return new TextEncoder().encode(JSON.stringify(file, null, 2));
}

export function projectFromBytes(bytes: Uint8Array): Outcome<ProjectFile, DeserializationError> {
  let json: unknown;
  try {
    json = JSON.parse(new TextDecoder('utf-8', { fatal: true }).decode(bytes));
  } catch (err) {
    const error = err instanceof Error ? err : new Error(String(err));
    return failure(new DeserializationError('project file', `not valid JSON (${error.message})`, error));
  }

  const parsed = projectFileSchema.safeParse(json);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    return failure(new DeserializationError('project file', detail, parsed.error));
  }
  return success(parsed.data);
}

export function encodeBase64(bytes: Uint8Array): string {
  return Buffer.from(bytes).toString('base64');
}

export function decodeBase64(text: string): Uint8Array {
  return new Uint8Array(Buffer.from(text, 'base64'));
}
