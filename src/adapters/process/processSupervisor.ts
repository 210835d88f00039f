import { spawn, type ChildProcess, type SpawnOptions } from 'node:child_process';
import { closeSync, mkdirSync, openSync } from 'node:fs';
import path from 'node:path';
import { createLogger } from '@/shared/logging/logger';
import { hasErrorCode } from '@/shared/utils/file';
import type { ProcessSupervisorPort } from '@/ports/ProcessPort';

export type SpawnFn = (command: string, args: string[], options: SpawnOptions) => ChildProcess;
export type KillFn = (pid: number, signal?: NodeJS.Signals | 0) => boolean;

export interface ProcessSupervisorOptions {
  /** Executable the session runs under; defaults to the current Node binary. */
  execPath?: string;
  spawn?: SpawnFn;
  kill?: KillFn;
}

/**
 * Detached child processes whose output goes to a per-session log file.
 */
export class ProcessSupervisor implements ProcessSupervisorPort {
  private readonly log = createLogger('Session', 'Process');
  private readonly execPath: string;
  private readonly spawnFn: SpawnFn;
  private readonly killFn: KillFn;

  constructor(options: ProcessSupervisorOptions = {}) {
    this.execPath = options.execPath ?? process.execPath;
    this.spawnFn = options.spawn ?? spawn;
    this.killFn = options.kill ?? ((pid, signal) => process.kill(pid, signal));
  }

  public async spawnDetached(args: string[], logFile: string): Promise<number> {
    mkdirSync(path.dirname(logFile), { recursive: true });
    const fd = openSync(logFile, 'a');
    try {
      const child = this.spawnFn(this.execPath, args, {
        detached: true,
        stdio: ['ignore', fd, fd],
        env: process.env,
      });
      const pid = await new Promise<number>((resolve, reject) => {
        child.once('error', reject);
        child.once('spawn', () => {
          if (child.pid === undefined) {
            reject(new Error('spawned session has no pid'));
            return;
          }
          resolve(child.pid);
        });
      });
      child.unref();
      this.log.debug('session process spawned', { pid, logFile });
      return pid;
    } finally {
      closeSync(fd);
    }
  }

  public isAlive(pid: number): boolean {
    try {
      this.killFn(pid, 0);
      return true;
    } catch (error) {
      // EPERM: the pid exists but belongs to someone else.
      return hasErrorCode(error, 'EPERM');
    }
  }

  public terminate(pid: number): boolean {
    try {
      return this.killFn(pid, 'SIGTERM');
    } catch (error) {
      if (hasErrorCode(error, 'ESRCH')) {
        return false;
      }
      throw error;
    }
  }
}
