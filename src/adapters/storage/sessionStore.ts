import { createLogger } from '@/shared/logging/logger';
import { readJson, removeFile, writeJson } from '@/shared/utils/file';
import { parseSessionRecord, type SessionRecord } from '@/domain/session/types';
import type { SessionPaths } from '@/config/session';
import type { SessionStorePort } from '@/ports/SessionStorePort';

/**
 * One JSON file per device label under the state directory.
 */
export class SessionStore implements SessionStorePort {
  private readonly log = createLogger('Session', 'Store');

  constructor(private readonly paths: Pick<SessionPaths, 'argsFile' | 'stateDir'>) {}

  public async load(label: string): Promise<SessionRecord | null> {
    const filePath = this.paths.argsFile(label);
    const raw = await readJson(filePath);
    if (raw === undefined) {
      return null;
    }
    const record = parseSessionRecord(raw);
    if (!record) {
      this.log.warn('ignoring malformed session record', { filePath });
    }
    return record;
  }

  public async save(record: SessionRecord): Promise<void> {
    await writeJson(this.paths.argsFile(record.id), record);
  }

  public async delete(label: string): Promise<void> {
    const removed = await removeFile(this.paths.argsFile(label));
    this.log.debug('session record deleted', { label, removed });
  }
}
