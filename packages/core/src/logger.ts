// src/logger.ts
// Structured logging shared by every package

import { pino, type Logger } from 'pino';

const root = pino({
  name: 'vt-pool-designer',
  level: process.env.LOG_LEVEL || 'info',
});

const children: Logger[] = [];

/** Child logger tagged with the module it logs for. */
export function createLogger(module: string): Logger {
  const child = root.child({ module });
  children.push(child);
  return child;
}

/** Change the level of the root logger and every module logger. */
export function setLogLevel(level: string): void {
  root.level = level;
  for (const child of children) child.level = level;
}

export type { Logger };
