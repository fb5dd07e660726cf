// =============================================================================
// Group Builder
// Derives inventory groups from group_by keys and literal system groups.
// Names that sanitize to the same identifier share one group.
// =============================================================================

import { ConfigurationError } from '../../lib/errors';
import { IDENTIFIER_PATTERN } from './config';
import { GroupBySpec, HostValue, HostVars } from './types';

export const ALL_GROUP = 'all';

/** Top-level key of the script inventory that holds host variables. */
export const META_KEY = '_meta';

/** Sanitized names that would clash with the output format. */
const RESERVED_GROUP_NAMES: ReadonlySet<string> = new Set([META_KEY]);

/**
 * Lowercase, replace anything outside [a-z0-9_] with "_", and prefix "_" when
 * the result does not start with a letter or underscore. Idempotent.
 */
export function sanitizeGroupName(name: string): string {
  const replaced = name.toLowerCase().replace(/[^a-z0-9_]/gu, '_');
  return /^[a-z_]/.test(replaced) ? replaced : `_${replaced}`;
}

export function assertValidGroupKeys(groupBy: GroupBySpec): void {
  const invalid = groupBy.filter((key) => !IDENTIFIER_PATTERN.test(key));
  if (invalid.length > 0) {
    throw new ConfigurationError(
      'Invalid group_by keys',
      invalid.map((key) => `group_by: "${key}" must match [a-z_][a-z0-9_]*`)
    );
  }
}

export interface GroupCollision {
  group: string;
  sources: string[];
}

export interface GroupRename {
  source: string;
  group: string;
}

function scalarText(value: HostValue): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return undefined;
}

export class GroupBuilder {
  private groups = new Map<string, Set<string>>();
  private origins = new Map<string, Set<string>>();
  private renamed = new Map<string, string>();

  constructor(private readonly groupBy: GroupBySpec) {
    assertValidGroupKeys(groupBy);
  }

  /**
   * Place a host into `all`, every literal system group, and the groups its
   * group_by attributes produce.
   */
  addHost(hostname: string, attributes: HostVars, systemGroups: readonly string[]): void {
    this.add(ALL_GROUP, ALL_GROUP, hostname);

    for (const group of systemGroups) {
      this.add(sanitizeGroupName(group), group, hostname);
    }

    for (const key of this.groupBy) {
      const value = attributes[key];
      if (value === undefined || value === null) continue;

      if (Array.isArray(value)) {
        for (const element of value) {
          const text = scalarText(element);
          if (text !== undefined) this.add(sanitizeGroupName(text), text, hostname);
        }
        continue;
      }

      const text = scalarText(value);
      if (text !== undefined) {
        this.add(`${key}_${sanitizeGroupName(text)}`, `${key}_${text}`, hostname);
      }
    }
  }

  /** Groups that received hosts under more than one raw name. */
  collisions(): GroupCollision[] {
    const result: GroupCollision[] = [];
    for (const [group, sources] of this.origins) {
      if (sources.size > 1) {
        result.push({ group, sources: [...sources].sort() });
      }
    }
    return result.sort((x, y) => compareText(x.group, y.group));
  }

  /** Raw names whose sanitized form was reserved, with the group used instead. */
  renames(): GroupRename[] {
    return [...this.renamed]
      .map(([source, group]) => ({ source, group }))
      .sort((x, y) => compareText(x.source, y.source));
  }

  /** Group name → sorted host list, in sorted group order. */
  build(): Record<string, string[]> {
    return Object.fromEntries(
      [...this.groups]
        .sort(([a], [b]) => compareText(a, b))
        .map(([group, hosts]): [string, string[]] => [group, [...hosts].sort(compareText)])
    );
  }

  private add(name: string, origin: string, hostname: string): void {
    let group = name;
    if (RESERVED_GROUP_NAMES.has(name)) {
      group = `group_${name}`;
      this.renamed.set(origin, group);
    }

    let hosts = this.groups.get(group);
    if (!hosts) {
      hosts = new Set();
      this.groups.set(group, hosts);
    }
    hosts.add(hostname);

    let sources = this.origins.get(group);
    if (!sources) {
      sources = new Set();
      this.origins.set(group, sources);
    }
    sources.add(origin);
  }
}

/** Code-unit ordering, independent of the process locale. */
export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}
