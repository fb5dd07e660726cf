// =============================================================================
// Attribute Normalizer
// Resolves canonical attributes from raw server records through the ordered
// field mapping, and derives patch status.
// =============================================================================

import {
  FieldMapping,
  FieldSelector,
  HostValue,
  PatchStatus,
  RawSystem,
  SystemDetails,
  SystemId,
  SystemRecord,
} from './types';

function isObjectRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

function ownValue(source: Record<string, unknown>, key: string): unknown {
  return Object.prototype.hasOwnProperty.call(source, key) ? source[key] : undefined;
}

export function isPathList(selector: FieldSelector): selector is string[][] {
  const items: ReadonlyArray<string | string[]> = selector;
  return items.length > 0 && items.every((item) => Array.isArray(item));
}

/** Follow `path` through nested objects; undefined as soon as a step is missing. */
export function walkPath(raw: RawSystem, path: readonly string[]): unknown {
  let current: unknown = raw;
  for (const key of path) {
    if (!isObjectRecord(current)) return undefined;
    current = ownValue(current, key);
  }
  return current;
}

/**
 * First non-null value the selector finds in `raw`, or undefined.
 *
 *   ['created', 'registered']          first present key
 *   ['os', 'family']                   raw.os.family, when raw.os is an object
 *   [['network', 'fqdn'], ['hostname']] first nested path that yields a value
 */
export function resolveField(raw: RawSystem, selector: FieldSelector | undefined): unknown {
  if (!selector) return undefined;

  if (isPathList(selector)) {
    for (const path of selector) {
      const value = walkPath(raw, path);
      if (value !== null && value !== undefined) return value;
    }
    return undefined;
  }

  if (selector.length > 1 && isObjectRecord(ownValue(raw, selector[0]))) {
    const value = walkPath(raw, selector);
    return value === null ? undefined : value;
  }

  for (const key of selector) {
    const value = ownValue(raw, key);
    if (value !== null && value !== undefined) return value;
  }
  return undefined;
}

/**
 * Reboot need always dominates, even with zero pending errata.
 */
export function derivePatchStatus(errataCount: number, rebootRequired: boolean): PatchStatus {
  if (rebootRequired) return 'needs_reboot';
  if (errataCount > 0) return 'needs_patches';
  return 'up_to_date';
}

export function resolveSystemId(raw: RawSystem, mapping: FieldMapping): SystemId | undefined {
  const id = resolveField(raw, mapping.id);
  if (typeof id === 'number' && Number.isFinite(id)) return id;
  if (typeof id === 'string' && id.trim() !== '') return id;
  return undefined;
}

/**
 * Convert an arbitrary decoded value into a JSON-safe host value.
 * Functions, symbols and bigints have no JSON form and are dropped.
 */
export function toHostValue(value: unknown): HostValue | undefined {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      return Number.isFinite(value) ? value : undefined;
    case 'object': {
      if (value === null) return null;
      if (value instanceof Date) return value.toISOString();
      if (Array.isArray(value)) {
        const items: HostValue[] = [];
        for (const item of value) {
          const converted = toHostValue(item);
          if (converted !== undefined) items.push(converted);
        }
        return items;
      }
      const entries: Array<[string, HostValue]> = [];
      for (const [key, item] of Object.entries(value)) {
        const converted = toHostValue(item);
        if (converted !== undefined) entries.push([key, converted]);
      }
      return Object.fromEntries(entries);
    }
    default:
      return undefined;
  }
}

function asOptionalString(value: unknown): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  const converted = toHostValue(value);
  return converted === undefined ? undefined : JSON.stringify(converted);
}

function asActiveFlag(value: unknown): boolean {
  if (value === undefined) return true;
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return !['false', '0', 'no', 'off', ''].includes(value.trim().toLowerCase());
  return true;
}

/**
 * Build the canonical record for one raw system. Returns undefined when no id
 * can be resolved.
 */
export function normalizeSystem(
  raw: RawSystem,
  details: SystemDetails,
  mapping: FieldMapping
): SystemRecord | undefined {
  const id = resolveSystemId(raw, mapping);
  if (id === undefined) return undefined;

  const active = asActiveFlag(resolveField(raw, mapping.active));
  const errataCount = Math.max(0, Math.trunc(details.errataCount));
  const lastCheckin = resolveField(raw, mapping.last_checkin);
  const lastBoot = resolveField(raw, mapping.last_boot);

  return {
    id,
    name: asOptionalString(resolveField(raw, mapping.name)),
    hostname: asOptionalString(resolveField(raw, mapping.hostname)),
    active,
    status: active ? 'active' : 'inactive',
    registration_date: details.registrationDate ?? asOptionalString(resolveField(raw, mapping.registration_date)),
    last_checkin: lastCheckin === undefined ? undefined : toHostValue(lastCheckin),
    last_boot: lastBoot === undefined ? undefined : toHostValue(lastBoot),
    errata_count: errataCount,
    reboot_required: details.rebootRequired,
    patch_status: derivePatchStatus(errataCount, details.rebootRequired),
    system_groups: [...details.systemGroups],
    raw,
  };
}
