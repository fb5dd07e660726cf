// =============================================================================
// Inventory Types
// =============================================================================

/** JSON-safe value that can be stored as a host variable. */
export type HostValue = string | number | boolean | null | HostValue[] | { [key: string]: HostValue };

export type HostVars = Record<string, HostValue>;

/** A system record exactly as the server returned it. */
export type RawSystem = Record<string, unknown>;

export type SystemId = number | string;

export type PatchStatus = 'up_to_date' | 'needs_patches' | 'needs_reboot';

export type SystemStatus = 'active' | 'inactive';

/** Per-system facts fetched from the detail endpoints. */
export interface SystemDetails {
  errataCount: number;
  rebootRequired: boolean;
  systemGroups: string[];
  registrationDate?: string;
}

export interface SystemRecord {
  id: SystemId;
  name?: string;
  hostname?: string;
  active: boolean;
  status: SystemStatus;
  registration_date?: string;
  last_checkin?: HostValue;
  last_boot?: HostValue;
  errata_count: number;
  reboot_required: boolean;
  patch_status: PatchStatus;
  system_groups: string[];
  raw: RawSystem;
}

// -----------------------------------------------------------------------------
// Configuration-derived specs
// -----------------------------------------------------------------------------

export interface FilterSpec {
  status: SystemStatus | 'all';
  patch_status: PatchStatus | 'all';
  system_groups: string[] | 'all';
}

export type GroupBySpec = string[];

export type ComposeSpec = Record<string, string>;

/**
 * Where a canonical field is read from: alternative key names (or a nested
 * key path when the first key holds an object), or alternative nested paths.
 */
export type FieldSelector = string[] | string[][];

/** Canonical field name → its source selector. */
export type FieldMapping = Record<string, FieldSelector>;

export interface ApiEndpoints {
  login: string;
  logout: string;
  systems: string;
  relevant_errata: string;
  registration_date: string;
  system_groups: string;
  systems_reboot: string;
}

export interface InventoryConfig {
  url: string;
  username: string;
  password: string;
  validateCerts: boolean;
  timeoutSeconds: number;
  retries: number;
  workers: number;
  cache: boolean;
  cacheTimeoutSeconds: number;
  cacheConnection: string;
  cachePrefix: string;
  filters: FilterSpec;
  groupBy: GroupBySpec;
  compose: ComposeSpec;
  fieldMappings: FieldMapping;
  apiBasePath: string;
  apiEndpoints: ApiEndpoints;
}

// -----------------------------------------------------------------------------
// Output
// -----------------------------------------------------------------------------

export interface InventoryDocument {
  groups: Record<string, string[]>;
  hostvars: Record<string, HostVars>;
}

export interface AssemblyResult {
  document: InventoryDocument;
  warnings: string[];
  fromCache: boolean;
}
