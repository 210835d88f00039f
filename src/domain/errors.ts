/**
 * Failures that cross module boundaries. Everything else a device call throws
 * propagates from the transport as-is.
 */

export class NoDeviceFoundError extends Error {
  constructor(public readonly device: string) {
    super(`${device} not found`);
    this.name = 'NoDeviceFoundError';
  }
}

export class SessionNotRunningError extends Error {
  constructor(public readonly device: string) {
    super(`no running session for ${device}`);
    this.name = 'SessionNotRunningError';
  }
}

export class SessionAlreadyRunningError extends Error {
  constructor(
    public readonly device: string,
    public readonly pid: number | null,
  ) {
    super(`session for ${device} already running${pid === null ? '' : ` (pid ${pid})`}`);
    this.name = 'SessionAlreadyRunningError';
  }
}

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
