import path from 'node:path';
import { JsonlStore } from './jsonlStore.js';
import type { RetentionPolicy } from './jsonlStore.js';
import type { LinkStats, StorageDriver } from '../types.js';

export type LinkHistoryRecord = LinkStats & { closedAt: string };

export function createLinkHistoryStore(
  storagePath: string,
  retention?: RetentionPolicy
): StorageDriver<LinkHistoryRecord> {
  return new JsonlStore<LinkHistoryRecord>(path.resolve(storagePath, 'links.jsonl'), retention);
}
