import type { SessionRecord } from '@/domain/session/types';

export interface SessionStorePort {
  load(label: string): Promise<SessionRecord | null>;
  save(record: SessionRecord): Promise<void>;
  delete(label: string): Promise<void>;
}
