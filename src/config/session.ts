import path from 'node:path';
import type { EnvironmentConfig } from '@/config/environment';

export interface SessionPaths {
  stateDir: string;
  argsFile: (label: string) => string;
  logFile: (label: string) => string;
}

/**
 * Flattens anything in a device label that could climb out of the state directory.
 */
export function sanitizeLabel(label: string): string {
  const cleaned = label.replace(/[^A-Za-z0-9._-]+/g, '_').replace(/^\.+/, '_');
  return cleaned || '_';
}

export function buildSessionPaths(env: Pick<EnvironmentConfig, 'stateDir'>): SessionPaths {
  return {
    stateDir: env.stateDir,
    argsFile: (label) => path.join(env.stateDir, `${sanitizeLabel(label)}-args.json`),
    logFile: (label) => path.join(env.stateDir, `${sanitizeLabel(label)}.log`),
  };
}
