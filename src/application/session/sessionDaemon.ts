import { createLogger, type ComponentLogger } from '@/shared/logging/logger';
import { SessionAlreadyRunningError, SessionNotRunningError } from '@/domain/errors';
import {
  deviceLabel,
  type DaemonArgs,
  type DeviceIdentifiers,
  type SessionRecord,
} from '@/domain/session/types';
import type { ClockPort } from '@/ports/ClockPort';
import type { ProcessSupervisorPort } from '@/ports/ProcessPort';
import type { SessionStorePort } from '@/ports/SessionStorePort';

export interface SessionDaemonDependencies {
  store: SessionStorePort;
  supervisor: ProcessSupervisorPort;
  clock: ClockPort;
  /** Command line that runs one session in the foreground. */
  buildCommand: (args: DaemonArgs) => string[];
  logFile: (label: string) => string;
  log?: ComponentLogger;
}

/**
 * Background session lifecycle: not-started → running → stopped.
 * The saved record lets later `stop`/`status` calls find the session from
 * its identifiers alone.
 */
export class SessionDaemon {
  private readonly log: ComponentLogger;

  constructor(private readonly deps: SessionDaemonDependencies) {
    this.log = deps.log ?? createLogger('Session');
  }

  public async status(ids: DeviceIdentifiers): Promise<SessionRecord> {
    const label = deviceLabel(ids);
    const record = await this.deps.store.load(label);
    if (!record) {
      return this.notStarted(label, ids);
    }
    if (record.status === 'running' && (record.pid === null || !this.deps.supervisor.isAlive(record.pid))) {
      return { ...record, status: 'stopped' };
    }
    return record;
  }

  public async start(args: DaemonArgs): Promise<SessionRecord> {
    const label = deviceLabel(args);
    const current = await this.status(args);
    if (current.status === 'running') {
      throw new SessionAlreadyRunningError(label, current.pid);
    }

    const pid = await this.deps.supervisor.spawnDetached(
      this.deps.buildCommand(args),
      this.deps.logFile(label),
    );
    const record: SessionRecord = {
      id: label,
      status: 'running',
      pid,
      args,
      updatedAt: this.timestamp(),
    };
    await this.deps.store.save(record);
    this.log.info('session started', { device: label, pid });
    return record;
  }

  /**
   * Signals the session's process and forgets its record.
   */
  public async stop(ids: DeviceIdentifiers): Promise<SessionRecord> {
    const label = deviceLabel(ids);
    const record = await this.deps.store.load(label);
    if (!record) {
      throw new SessionNotRunningError(label);
    }

    if (record.pid !== null && this.deps.supervisor.isAlive(record.pid)) {
      this.deps.supervisor.terminate(record.pid);
      this.log.info('session stopped', { device: label, pid: record.pid });
    } else {
      this.log.info('session was not alive; clearing record', { device: label, pid: record.pid });
    }
    await this.deps.store.delete(label);
    return { ...record, status: 'stopped', updatedAt: this.timestamp() };
  }

  /**
   * Stops the running session if there is one and starts it again with the
   * saved arguments, or with `args` when given.
   */
  public async restart(ids: DeviceIdentifiers, args?: DaemonArgs): Promise<SessionRecord> {
    const label = deviceLabel(ids);
    const saved = await this.deps.store.load(label);
    const nextArgs = args ?? saved?.args;
    if (!nextArgs) {
      throw new SessionNotRunningError(label);
    }
    if (saved) {
      await this.stop(ids);
    }
    return this.start(nextArgs);
  }

  private notStarted(label: string, ids: DeviceIdentifiers): SessionRecord {
    return {
      id: label,
      status: 'not-started',
      pid: null,
      args: {
        name: ids.name,
        host: ids.host,
        uuid: ids.uuid,
        wait: null,
        retryWait: null,
        icon: false,
        logLevel: 'info',
      },
      updatedAt: this.timestamp(),
    };
  }

  private timestamp(): string {
    return new Date(this.deps.clock.now()).toISOString();
  }
}
