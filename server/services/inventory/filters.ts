// =============================================================================
// Filter Engine
// Conjunction of status, patch status and system-group predicates; an "all"
// setting switches its predicate off.
// =============================================================================

import { FilterSpec, SystemRecord } from './types';

type Predicate = (record: SystemRecord) => boolean;

function activePredicates(spec: FilterSpec): Predicate[] {
  const predicates: Predicate[] = [];

  if (spec.status !== 'all') {
    const wanted = spec.status;
    predicates.push((record) => record.status === wanted);
  }

  if (spec.patch_status !== 'all') {
    const wanted = spec.patch_status;
    predicates.push((record) => record.patch_status === wanted);
  }

  if (spec.system_groups !== 'all') {
    const wanted = new Set(spec.system_groups.map((g) => g.toLowerCase()));
    predicates.push((record) => record.system_groups.some((g) => wanted.has(g.toLowerCase())));
  }

  return predicates;
}

export function matchesFilters(record: SystemRecord, spec: FilterSpec): boolean {
  return activePredicates(spec).every((predicate) => predicate(record));
}

export function filterSystems(records: readonly SystemRecord[], spec: FilterSpec): SystemRecord[] {
  const predicates = activePredicates(spec);
  return records.filter((record) => predicates.every((predicate) => predicate(record)));
}
