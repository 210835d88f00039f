import { isLogLevel, type LogLevel } from '@/types/logLevel';

export const NO_DEVICE = 'Device';

export interface DeviceIdentifiers {
  name: string | null;
  host: string | null;
  uuid: string | null;
}

/**
 * Everything needed to start the same session again later.
 * `wait === null` disables retrying between discovery sweeps.
 */
export interface DaemonArgs extends DeviceIdentifiers {
  wait: number | null;
  retryWait: number | null;
  icon: boolean;
  logLevel: LogLevel;
}

export type SessionStatus = 'not-started' | 'running' | 'stopped';

export interface SessionRecord {
  id: string;
  status: SessionStatus;
  pid: number | null;
  args: DaemonArgs;
  updatedAt: string;
}

/**
 * Human label and store key for a set of identifiers.
 */
export function deviceLabel(ids: DeviceIdentifiers): string {
  return ids.name || ids.host || ids.uuid || NO_DEVICE;
}

const isNullableString = (value: unknown): value is string | null =>
  value === null || typeof value === 'string';

const isNullableNumber = (value: unknown): value is number | null =>
  value === null || (typeof value === 'number' && Number.isFinite(value));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function parseDaemonArgs(raw: unknown): DaemonArgs | null {
  if (!isRecord(raw)) return null;
  const { name, host, uuid, wait, retryWait, icon, logLevel } = raw;
  if (
    !isNullableString(name) ||
    !isNullableString(host) ||
    !isNullableString(uuid) ||
    !isNullableNumber(wait) ||
    !isNullableNumber(retryWait) ||
    typeof icon !== 'boolean' ||
    !isLogLevel(logLevel)
  ) {
    return null;
  }
  return { name, host, uuid, wait, retryWait, icon, logLevel };
}

export function parseSessionRecord(raw: unknown): SessionRecord | null {
  if (!isRecord(raw)) return null;
  const args = parseDaemonArgs(raw.args);
  const { id, status, pid, updatedAt } = raw;
  if (
    !args ||
    typeof id !== 'string' ||
    (status !== 'not-started' && status !== 'running' && status !== 'stopped') ||
    !isNullableNumber(pid) ||
    typeof updatedAt !== 'string'
  ) {
    return null;
  }
  return { id, status, pid, args, updatedAt };
}
