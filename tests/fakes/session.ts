import type { SessionRecord } from '../../src/domain/session/types';
import type { ProcessSupervisorPort } from '../../src/ports/ProcessPort';
import type { SessionStorePort } from '../../src/ports/SessionStorePort';

export class InMemorySessionStore implements SessionStorePort {
  public readonly records = new Map<string, SessionRecord>();

  public async load(label: string): Promise<SessionRecord | null> {
    return this.records.get(label) ?? null;
  }

  public async save(record: SessionRecord): Promise<void> {
    this.records.set(record.id, record);
  }

  public async delete(label: string): Promise<void> {
    this.records.delete(label);
  }
}

export class FakeSupervisor implements ProcessSupervisorPort {
  public readonly spawned: Array<{ args: string[]; logFile: string; pid: number }> = [];
  public readonly terminated: number[] = [];
  public readonly alive = new Set<number>();
  private nextPid = 4000;

  public async spawnDetached(args: string[], logFile: string): Promise<number> {
    this.nextPid += 1;
    const pid = this.nextPid;
    this.spawned.push({ args, logFile, pid });
    this.alive.add(pid);
    return pid;
  }

  public isAlive(pid: number): boolean {
    return this.alive.has(pid);
  }

  public terminate(pid: number): boolean {
    this.terminated.push(pid);
    return this.alive.delete(pid);
  }
}
