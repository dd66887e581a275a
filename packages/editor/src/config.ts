// src/config.ts
// Designer settings from the environment (and a .env file, when present)

import * as dotenv from 'dotenv';
import { z } from 'zod';
import { DesignerError, VtVersion } from '@vtpool/core';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

export const designerConfigSchema = z.object({
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  VT_VERSION: z.coerce
    .number()
    .int()
    .min(VtVersion.Version3)
    .max(VtVersion.Version6)
    .pipe(z.nativeEnum(VtVersion))
    .default(VtVersion.Version3),
  SMART_NAMING_ON_IMPORT: booleanFlag.default('true'),
});

export interface DesignerConfig {
  logLevel: string;
  vtVersion: VtVersion;
  smartNamingOnImport: boolean;
}

export class ConfigError extends DesignerError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid designer configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * Read the designer configuration. Without an explicit `env`, `.env` is
 * loaded into `process.env` first.
 * @throws ConfigError when a variable has an unusable value
 */
export function loadDesignerConfig(env?: Record<string, string | undefined>): DesignerConfig {
  if (env === undefined) dotenv.config();
  const source = env ?? process.env;

  const parsed = designerConfigSchema.safeParse({
    LOG_LEVEL: source.LOG_LEVEL || undefined,
    VT_VERSION: source.VT_VERSION || undefined,
    SMART_NAMING_ON_IMPORT: source.SMART_NAMING_ON_IMPORT || undefined,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  return {
    logLevel: parsed.data.LOG_LEVEL,
    vtVersion: parsed.data.VT_VERSION,
    smartNamingOnImport: parsed.data.SMART_NAMING_ON_IMPORT,
  };
}
