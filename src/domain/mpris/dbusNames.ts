import { NO_TRACK } from '@/domain/mpris/types';

/** D-Bus caps names and object paths at 255 bytes. */
export const MAX_DBUS_LENGTH = 255;

const TRACK_PREFIX = '/track/';

/**
 * Maps arbitrary text onto the D-Bus element alphabet `[A-Za-z0-9_]`.
 * Elements may not start with a digit.
 */
export function getDbusName(name: string | null | undefined): string {
  if (!name) {
    return '';
  }
  const replaced = name.replace(/[^A-Za-z0-9_]/g, '_');
  return /^[0-9]/.test(replaced) ? `_${replaced}` : replaced;
}

export function enforceDbusLength(value: string): string {
  return value.length > MAX_DBUS_LENGTH ? value.slice(0, MAX_DBUS_LENGTH) : value;
}

export function getTrackId(title: string | null): string {
  const element = getDbusName(title);
  if (!element) {
    return NO_TRACK;
  }
  return enforceDbusLength(`${TRACK_PREFIX}${element}`);
}

/**
 * Bus-name suffix for one device, e.g. `Living_Room_TV`.
 */
export function getPlayerBusName(deviceName: string): string {
  const element = getDbusName(deviceName) || 'device';
  return enforceDbusLength(element);
}
