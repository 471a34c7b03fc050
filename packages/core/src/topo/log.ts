import type { LogLevel } from './config.js';

const LEVEL_RANK: Record<LogLevel, number> = { silent: 0, warn: 1, debug: 2 };

export function logDebug(level: LogLevel, scope: string, message: string, ...extra: unknown[]): void {
  if (LEVEL_RANK[level] >= LEVEL_RANK.debug) {
    console.debug(`[meshweave:${scope}] ${message}`, ...extra);
  }
}

export function logWarn(level: LogLevel, scope: string, message: string, ...extra: unknown[]): void {
  if (LEVEL_RANK[level] >= LEVEL_RANK.warn) {
    console.warn(`[meshweave:${scope}] ${message}`, ...extra);
  }
}
