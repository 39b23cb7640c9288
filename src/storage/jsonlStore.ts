import { appendFile, mkdir, readFile, rename, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { randomUUID } from 'node:crypto';
import type { StorageDriver } from '../types.js';

export interface RetentionPolicy {
  retentionMs?: number;
  maxRows?: number;
  pruneIntervalMs?: number;
}

const TIMESTAMP_KEYS = ['closedAt', 'createdAt', 'openedAt'] as const;

export class JsonlStore<T extends object> implements StorageDriver<T> {
  private readonly retentionMs: number | undefined;
  private readonly maxRows: number | undefined;
  private readonly pruneIntervalMs: number;
  private lastPruned = 0;

  constructor(private filepath: string, retention?: RetentionPolicy) {
    this.retentionMs = retention?.retentionMs;
    this.maxRows = retention?.maxRows;
    this.pruneIntervalMs = retention?.pruneIntervalMs ?? 5 * 60 * 1000; // 5 minutes
  }

  async init(): Promise<void> {
    await mkdir(path.dirname(this.filepath), { recursive: true });
  }

  async append(record: T): Promise<void> {
    await appendFile(this.filepath, `${JSON.stringify(record)}\n`);
    await this.maybePrune();
  }

  async readAll(): Promise<T[]> {
    try {
      const data = await readFile(this.filepath, 'utf-8');
      return data
        .split('\n')
        .filter(Boolean)
        .map((line): T => JSON.parse(line));
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') return [];
      throw error;
    }
  }

  async readRecent(limit: number): Promise<T[]> {
    const all = await this.readAll();
    if (limit <= 0) return all.reverse();
    return all.slice(-limit).reverse();
  }

  private async maybePrune(): Promise<void> {
    if (!this.retentionMs && !this.maxRows) return;
    const now = Date.now();
    if (now - this.lastPruned < this.pruneIntervalMs) return;
    this.lastPruned = now;

    const all = await this.readAll();
    if (all.length === 0) return;

    const cutoff = this.retentionMs ? now - this.retentionMs : null;

    const filtered = all
      .map((row) => ({ row, ts: extractTimestamp(row) }))
      .filter(({ ts }) => {
        if (cutoff === null) return true;
        return ts !== null ? ts >= cutoff : false;
      })
      .sort((a, b) => (a.ts ?? 0) - (b.ts ?? 0))
      .map(({ row }) => row);

    const pruned = this.maxRows ? filtered.slice(-this.maxRows) : filtered;

    // Only rewrite when something changed
    if (pruned.length !== all.length) {
      const tmpPath = `${this.filepath}.${randomUUID()}.tmp`;
      const payload = pruned.map((r) => JSON.stringify(r)).join('\n') + '\n';
      await writeFile(tmpPath, payload, 'utf-8');
      await rename(tmpPath, this.filepath);
    }
  }
}

function extractTimestamp(row: object): number | null {
  for (const key of TIMESTAMP_KEYS) {
    const candidate: unknown = Reflect.get(row, key);
    if (typeof candidate !== 'string') continue;
    const ts = Date.parse(candidate);
    if (Number.isFinite(ts)) return ts;
  }
  return null;
}
