import os from 'node:os';
import path from 'node:path';
import { parseLogLevel, type LogLevel } from '@/shared/logging/logger';

export const APP_NAME = 'cast_bridge';
export const DEFAULT_NAME = 'Cast Bridge';

/**
 * Canonical view of the process environment consumed by the bridge.
 */
export interface EnvironmentConfig {
  logLevel: LogLevel;
  logJson: boolean;
  /** Append log lines here instead of stdout/stderr. */
  logFile: string | null;
  /** Session records and service logs. */
  stateDir: string;
  /** Generated desktop entries. */
  applicationsDir: string;
  assetsDir: string;
  /** Seconds between discovery sweeps; null disables retrying. */
  wait: number | null;
  /** Seconds between connection attempts inside one sweep. */
  retryWait: number | null;
  connectTries: number;
  discoveryTimeoutMs: number;
  /** Decimal places used when deciding whether playback has a current time. */
  timeResolution: number;
}

const DEFAULT_WAIT_SEC = 30;
const DEFAULT_RETRY_WAIT_SEC = 5;
const DEFAULT_CONNECT_TRIES = 3;
const DEFAULT_DISCOVERY_TIMEOUT_MS = 5000;
const DEFAULT_TIME_RESOLUTION = 1;

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const parsed = Number(raw);
  return Number.isFinite(parsed) && parsed >= 0 ? parsed : fallback;
}

/**
 * `none`/`off`/`-1` switch a wait off entirely.
 */
export function readOptionalSeconds(raw: string | undefined, fallback: number | null): number | null {
  if (raw === undefined || raw.trim() === '') return fallback;
  const normalized = raw.trim().toLowerCase();
  if (normalized === 'none' || normalized === 'off' || normalized === '-1') return null;
  return readNumber(raw, fallback ?? 0);
}

/**
 * Defaults overridable through `CAST_BRIDGE_*` variables.
 */
export function loadEnvironment(env: NodeJS.ProcessEnv = process.env): EnvironmentConfig {
  const home = env.HOME ?? os.homedir();
  const stateHome = env.XDG_STATE_HOME || path.join(home, '.local', 'state');
  const dataHome = env.XDG_DATA_HOME || path.join(home, '.local', 'share');
  return {
    logLevel: parseLogLevel(env.CAST_BRIDGE_LOG_LEVEL, 'info'),
    logJson: env.CAST_BRIDGE_LOG_JSON === '1' || env.CAST_BRIDGE_LOG_JSON === 'true',
    logFile: env.CAST_BRIDGE_LOG_FILE || null,
    stateDir: env.CAST_BRIDGE_STATE_DIR || path.join(stateHome, APP_NAME),
    applicationsDir: path.join(dataHome, 'applications'),
    assetsDir: env.CAST_BRIDGE_ASSETS_DIR || path.resolve(__dirname, '..', '..', 'assets'),
    wait: readOptionalSeconds(env.CAST_BRIDGE_WAIT, DEFAULT_WAIT_SEC),
    retryWait: readOptionalSeconds(env.CAST_BRIDGE_RETRY_WAIT, DEFAULT_RETRY_WAIT_SEC),
    connectTries: Math.max(1, Math.floor(readNumber(env.CAST_BRIDGE_CONNECT_TRIES, DEFAULT_CONNECT_TRIES))),
    discoveryTimeoutMs: readNumber(env.CAST_BRIDGE_DISCOVERY_TIMEOUT_MS, DEFAULT_DISCOVERY_TIMEOUT_MS),
    timeResolution: Math.floor(readNumber(env.CAST_BRIDGE_TIME_RESOLUTION, DEFAULT_TIME_RESOLUTION)),
  };
}
