// =============================================================================
// Inventory Configuration
// Loads the YAML inventory source, overlays MLM_* environment variables and
// validates everything with zod before any network call is made.
// =============================================================================

import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { ConfigurationError } from '../../lib/errors';
import { isPathList } from './normalizer';
import { ApiEndpoints, FieldMapping, FieldSelector, FilterSpec, InventoryConfig } from './types';

export const ENV_MLM_URL = 'MLM_URL';
export const ENV_MLM_USERNAME = 'MLM_USERNAME';
export const ENV_MLM_PASSWORD = 'MLM_PASSWORD';
export const ENV_MLM_API_BASE_PATH = 'MLM_API_BASE_PATH';
export const ENV_INVENTORY_CONFIG = 'MLM_INVENTORY_CONFIG';

export const DEFAULT_API_BASE_PATH = '/rhn/manager/api';
const DEFAULT_CONFIG_PATH = path.join('inventory', 'mlm.yml');

export const DEFAULT_API_ENDPOINTS: ApiEndpoints = {
  login: '/auth/login',
  logout: '/auth/logout',
  systems: '/system/listSystems',
  relevant_errata: '/system/getRelevantErrata',
  registration_date: '/system/getRegistrationDate',
  system_groups: '/system/listGroups',
  systems_reboot: '/system/listSuggestedReboot',
};

export const DEFAULT_FIELD_MAPPINGS: FieldMapping = {
  id: ['id'],
  name: ['name'],
  hostname: ['hostname'],
  active: ['active'],
  registration_date: ['created', 'registered', 'registrationDate'],
  last_checkin: ['lastCheckin'],
  last_boot: ['lastBoot'],
};

/**
 * Path of the inventory source (configurable via MLM_INVENTORY_CONFIG).
 */
export function getConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return path.resolve(env[ENV_INVENTORY_CONFIG] || DEFAULT_CONFIG_PATH);
}

export function getDefaultCacheConnection(): string {
  return path.join(os.homedir(), '.cache', 'mlm-inventory');
}

/** Resolve a leading "~" against the home directory. */
export function expandHome(dir: string): string {
  if (dir === '~') return os.homedir();
  if (dir.startsWith('~/')) return path.join(os.homedir(), dir.slice(2));
  return dir;
}

// -----------------------------------------------------------------------------
// Schema
// -----------------------------------------------------------------------------

export const IDENTIFIER_PATTERN = /^[a-z_][a-z0-9_]*$/;

const identifier = z.string().regex(IDENTIFIER_PATTERN, 'must match [a-z_][a-z0-9_]*');

const fieldName = z.string().min(1);

const candidateFields = z.union([
  fieldName,
  z.array(fieldName).min(1, 'needs at least one source field'),
  z.array(z.array(fieldName).min(1, 'needs at least one key')).min(1, 'needs at least one source path'),
]);

const filtersSchema = z
  .object({
    status: z.enum(['active', 'inactive', 'all']).default('all'),
    patch_status: z.enum(['up_to_date', 'needs_patches', 'needs_reboot', 'all']).default('all'),
    system_groups: z
      .union([z.literal('all'), z.array(z.string().min(1)).min(1, 'use "all" instead of an empty list')])
      .default('all'),
  })
  .strict();

const endpointsSchema = z
  .object({
    login: z.string().startsWith('/'),
    logout: z.string().startsWith('/'),
    systems: z.string().startsWith('/'),
    relevant_errata: z.string().startsWith('/'),
    registration_date: z.string().startsWith('/'),
    system_groups: z.string().startsWith('/'),
    systems_reboot: z.string().startsWith('/'),
  })
  .partial()
  .strict();

export const inventorySourceSchema = z
  .object({
    plugin: z.string().optional(),
    url: z.string().optional(),
    username: z.string().optional(),
    password: z.string().optional(),
    validate_certs: z.boolean().default(true),
    timeout: z.number().int().positive().default(60),
    retries: z.number().int().min(0).max(10).default(3),
    workers: z.number().int().min(1).max(32).default(4),
    cache: z.boolean().default(false),
    cache_timeout: z.number().int().min(0).default(3600),
    cache_connection: z.string().min(1).optional(),
    cache_prefix: z.string().regex(/^[A-Za-z0-9_-]+$/, 'letters, digits, "_" and "-" only').default('mlm'),
    filters: filtersSchema.default({}),
    group_by: z.array(identifier).default(['patch_status']),
    compose: z.record(identifier, z.string().min(1)).default({}),
    field_mappings: z
      .object({ system: z.record(identifier, candidateFields).default({}) })
      .strict()
      .default({}),
    api_base_path: z.string().startsWith('/').optional(),
    api_endpoints: endpointsSchema.default({}),
  })
  .strict();

export type InventorySource = z.input<typeof inventorySourceSchema>;

// -----------------------------------------------------------------------------
// Loading
// -----------------------------------------------------------------------------

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`);
}

/** YAML keys written without a value parse as null; treat them as unset. */
function dropNullValues(source: unknown): unknown {
  if (source === null || source === undefined) return {};
  if (typeof source !== 'object' || Array.isArray(source)) return source;
  const result: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(source)) {
    if (value !== null) result[key] = value;
  }
  return result;
}

function pickSetting(explicit: string | undefined, envName: string, env: NodeJS.ProcessEnv): string | undefined {
  if (explicit && explicit.trim()) return explicit.trim();
  const fromEnv = env[envName];
  return fromEnv && fromEnv.trim() ? fromEnv.trim() : undefined;
}

function normalizeFilters(filters: z.output<typeof filtersSchema>): FilterSpec {
  const groups = filters.system_groups;
  const isSentinel = groups === 'all' || groups.some((g) => g.toLowerCase() === 'all');
  return {
    status: filters.status,
    patch_status: filters.patch_status,
    system_groups: isSentinel ? 'all' : [...groups],
  };
}

function copySelector(selector: FieldSelector): FieldSelector {
  return isPathList(selector) ? selector.map((path) => [...path]) : [...selector];
}

function mergeFieldMappings(overrides: Record<string, string | FieldSelector>): FieldMapping {
  const merged: FieldMapping = {};
  for (const [field, selector] of Object.entries(DEFAULT_FIELD_MAPPINGS)) {
    merged[field] = copySelector(selector);
  }
  for (const [field, selector] of Object.entries(overrides)) {
    merged[field] = typeof selector === 'string' ? [selector] : copySelector(selector);
  }
  return merged;
}

/**
 * Validate an inventory source document and resolve it into an
 * InventoryConfig. Explicit values win over MLM_* environment variables,
 * which win over built-in defaults.
 */
export function loadInventoryConfig(source: unknown, env: NodeJS.ProcessEnv = process.env): InventoryConfig {
  const parsed = inventorySourceSchema.safeParse(dropNullValues(source));
  if (!parsed.success) {
    throw new ConfigurationError('Invalid inventory configuration', formatIssues(parsed.error));
  }
  const src = parsed.data;

  const issues: string[] = [];
  const url = pickSetting(src.url, ENV_MLM_URL, env);
  const username = pickSetting(src.username, ENV_MLM_USERNAME, env);
  const password = pickSetting(src.password, ENV_MLM_PASSWORD, env);

  if (!url) {
    issues.push(`url: required (or set ${ENV_MLM_URL})`);
  } else if (!z.string().url().safeParse(url).success || !/^https?:\/\//i.test(url)) {
    issues.push(`url: not an http(s) URL: ${url}`);
  }
  if (!username) issues.push(`username: required (or set ${ENV_MLM_USERNAME})`);
  if (!password) issues.push(`password: required (or set ${ENV_MLM_PASSWORD})`);

  const apiBasePath = pickSetting(src.api_base_path, ENV_MLM_API_BASE_PATH, env) ?? DEFAULT_API_BASE_PATH;
  if (!apiBasePath.startsWith('/')) {
    issues.push(`api_base_path: must start with "/": ${apiBasePath}`);
  }

  if (issues.length > 0 || !url || !username || !password) {
    throw new ConfigurationError('Invalid inventory configuration', issues);
  }

  return {
    url: url.replace(/\/+$/, ''),
    username,
    password,
    validateCerts: src.validate_certs,
    timeoutSeconds: src.timeout,
    retries: src.retries,
    workers: src.workers,
    cache: src.cache,
    cacheTimeoutSeconds: src.cache_timeout,
    cacheConnection: src.cache_connection ? expandHome(src.cache_connection) : getDefaultCacheConnection(),
    cachePrefix: src.cache_prefix,
    filters: normalizeFilters(src.filters),
    groupBy: [...src.group_by],
    compose: { ...src.compose },
    fieldMappings: mergeFieldMappings(src.field_mappings.system),
    apiBasePath: apiBasePath.replace(/\/+$/, ''),
    apiEndpoints: { ...DEFAULT_API_ENDPOINTS, ...src.api_endpoints },
  };
}

/**
 * Read and parse a YAML inventory source file.
 */
export async function readInventorySource(filePath: string): Promise<unknown> {
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(`Cannot read inventory source ${filePath}`, [], err);
  }
  try {
    return parseYaml(text);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Inventory source ${filePath} is not valid YAML`, [detail], err);
  }
}

export async function loadInventoryConfigFile(
  filePath: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<InventoryConfig> {
  return loadInventoryConfig(await readInventorySource(filePath), env);
}
