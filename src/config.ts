import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { AppConfig } from './types.js';

const configSchema = z.object({
  link: z
    .object({
      // A Data message must carry at least one byte of frame data (4B message + 4B segment overhead).
      mtu: z.number().int().min(9).max(0xffff).default(512),
    })
    .default({}),
  reassembly: z
    .object({
      maxPendingFrames: z.number().int().min(1).max(65_536).default(32),
      frameTimeoutMs: z.number().int().min(0).default(2_000),
      sweepIntervalMs: z.number().int().min(10).default(500),
    })
    .default({}),
  storage: z
    .object({
      path: z.string().default('./runs/latest'),
      retentionDays: z.number().min(1).max(3650).default(30),
      maxRows: z.number().min(100).max(1_000_000).default(100_000),
    })
    .default({}),
});

let cachedConfig: AppConfig | null = null;

const formatLocalDate = (now = new Date()) => {
  const year = now.getFullYear();
  const month = String(now.getMonth() + 1).padStart(2, '0');
  const day = String(now.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
};

export function parseConfig(raw: unknown): AppConfig {
  const parsed = configSchema.parse(raw);
  return {
    ...parsed,
    storage: { ...parsed.storage, path: parsed.storage.path.replaceAll('{date}', formatLocalDate()) },
  };
}

export async function loadConfig(configPath = path.resolve('config.json')): Promise<AppConfig> {
  if (cachedConfig) {
    return cachedConfig;
  }

  const raw = await readFile(configPath, 'utf-8');
  const typed = parseConfig(JSON.parse(raw));
  cachedConfig = typed;
  return typed;
}

export function reloadConfig(): void {
  cachedConfig = null;
}
