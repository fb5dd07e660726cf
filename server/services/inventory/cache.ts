// =============================================================================
// Inventory Cache: TTL-based file cache for assembled inventory documents
// One JSON file per key; writes go to a unique temp file that is renamed over
// the entry, so readers see either the old or the new document.
// =============================================================================

import { createHash } from 'crypto';
import fs from 'fs/promises';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { CacheCorruptionError } from '../../lib/errors';
import { HostValue, InventoryConfig, InventoryDocument } from './types';

export type CacheLookup =
  | { hit: true; document: InventoryDocument }
  | { hit: false; reason: 'absent' | 'stale' }
  | { hit: false; reason: 'corrupt'; error: CacheCorruptionError };

export interface CacheStore {
  get(key: string): Promise<CacheLookup>;
  put(key: string, document: InventoryDocument, ttlSeconds: number): Promise<void>;
}

/** Milliseconds since the epoch. */
export type Clock = () => number;

// -----------------------------------------------------------------------------
// Cache key
// -----------------------------------------------------------------------------

function stableStringify(value: unknown): string {
  if (Array.isArray(value)) {
    return `[${value.map((item) => stableStringify(item)).join(',')}]`;
  }
  if (value && typeof value === 'object') {
    const entries = Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
    return `{${entries.map(([key, val]) => `${JSON.stringify(key)}:${stableStringify(val)}`).join(',')}}`;
  }
  return JSON.stringify(value) ?? 'null';
}

/**
 * `<prefix>_<sha256>` over everything that shapes the document: server URL,
 * filters, group_by, compose and field mappings. Credentials stay out.
 */
export function computeCacheKey(config: InventoryConfig): string {
  const { filters } = config;
  const canonical = {
    url: config.url,
    apiBasePath: config.apiBasePath,
    filters: {
      status: filters.status,
      patch_status: filters.patch_status,
      system_groups:
        filters.system_groups === 'all'
          ? 'all'
          : [...new Set(filters.system_groups.map((group) => group.toLowerCase()))].sort(),
    },
    groupBy: config.groupBy,
    compose: config.compose,
    fieldMappings: config.fieldMappings,
  };
  const digest = createHash('sha256').update(stableStringify(canonical)).digest('hex');
  return `${config.cachePrefix}_${digest}`;
}

// -----------------------------------------------------------------------------
// Entry format
// -----------------------------------------------------------------------------

const hostValueSchema: z.ZodType<HostValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(hostValueSchema),
    z.record(z.string(), hostValueSchema),
  ])
);

// Groups and hosts are stored as [name, value] pairs so that every name read
// back becomes an own key, whatever the server called it
const cacheEntrySchema = z.object({
  version: z.literal(2),
  key: z.string(),
  createdAt: z.number(),
  expiresAt: z.number(),
  groups: z.array(z.tuple([z.string(), z.array(z.string())])),
  hostvars: z.array(z.tuple([z.string(), z.record(z.string(), hostValueSchema)])),
});

type CacheEntry = z.infer<typeof cacheEntrySchema>;

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

// -----------------------------------------------------------------------------
// File store
// -----------------------------------------------------------------------------

export class FileCacheStore implements CacheStore {
  constructor(
    private readonly directory: string,
    private readonly clock: Clock = Date.now
  ) {}

  entryPath(key: string): string {
    // Keys are hex digests behind a prefix; keep the file name portable
    return path.join(this.directory, `${key.replace(/[^A-Za-z0-9_.-]/g, '_')}.json`);
  }

  async get(key: string): Promise<CacheLookup> {
    const filePath = this.entryPath(key);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf-8');
    } catch (err) {
      if (isMissingFile(err)) return { hit: false, reason: 'absent' };
      return { hit: false, reason: 'corrupt', error: new CacheCorruptionError(filePath, err) };
    }

    let entry: CacheEntry;
    try {
      entry = cacheEntrySchema.parse(JSON.parse(raw));
    } catch (err) {
      return { hit: false, reason: 'corrupt', error: new CacheCorruptionError(filePath, err) };
    }

    if (entry.key !== key) {
      return {
        hit: false,
        reason: 'corrupt',
        error: new CacheCorruptionError(filePath, new Error(`entry belongs to ${entry.key}`)),
      };
    }
    if (this.clock() >= entry.expiresAt) {
      return { hit: false, reason: 'stale' };
    }
    return {
      hit: true,
      document: { groups: Object.fromEntries(entry.groups), hostvars: Object.fromEntries(entry.hostvars) },
    };
  }

  async put(key: string, document: InventoryDocument, ttlSeconds: number): Promise<void> {
    const filePath = this.entryPath(key);
    const now = this.clock();
    const entry: CacheEntry = {
      version: 2,
      key,
      createdAt: now,
      expiresAt: now + ttlSeconds * 1000,
      groups: Object.entries(document.groups),
      hostvars: Object.entries(document.hostvars),
    };

    await fs.mkdir(this.directory, { recursive: true });
    const tmpPath = `${filePath}.${uuidv4()}.tmp`;
    try {
      await fs.writeFile(tmpPath, JSON.stringify(entry), 'utf-8');
      await fs.rename(tmpPath, filePath);
    } catch (err) {
      await fs.rm(tmpPath, { force: true });
      throw err;
    }
  }
}
