// =============================================================================
// Host Variable Builder
// Turns a normalized system record into the variables exposed for its host.
// =============================================================================

import { toHostValue } from './normalizer';
import { HostValue, HostVars, SystemRecord } from './types';

// Legacy field superseded by errata_count
const SKIPPED_RAW_FIELDS = new Set(['errata_counts']);

const OS_FIELD_MAPPING: Record<string, string> = {
  name: 'os_name',
  version: 'os_version',
  family: 'os_family',
};

/**
 * The name a system is known by in the inventory: hostname, else name.
 */
export function inventoryHostname(record: SystemRecord): string | undefined {
  if (record.hostname && record.hostname.trim()) return record.hostname.trim();
  if (record.name && record.name.trim()) return record.name.trim();
  return undefined;
}

function nonEmptyString(value: unknown): string | undefined {
  return typeof value === 'string' && value.trim() !== '' ? value : undefined;
}

function setRawFields(vars: HostVars, record: SystemRecord): void {
  for (const [key, value] of Object.entries(record.raw)) {
    if (SKIPPED_RAW_FIELDS.has(key)) continue;
    const converted = toHostValue(value);
    if (converted === undefined) continue;
    // "name" is reserved by the automation framework
    vars[key === 'name' ? 'system_name' : key] = converted;
  }
}

function setCanonicalFields(vars: HostVars, record: SystemRecord): void {
  vars.id = record.id;
  if (record.name !== undefined) vars.system_name = record.name;
  if (record.hostname !== undefined) vars.hostname = record.hostname;
  vars.active = record.active;
  vars.status = record.status;
  if (record.registration_date !== undefined) vars.registration_date = record.registration_date;
  if (record.last_checkin !== undefined) vars.last_checkin = record.last_checkin;
  if (record.last_boot !== undefined) vars.last_boot = record.last_boot;
  vars.errata_count = record.errata_count;
  vars.reboot_required = record.reboot_required;
  vars.patch_status = record.patch_status;
  vars.system_groups = [...record.system_groups];
}

function setConnectionVariables(vars: HostVars, record: SystemRecord): void {
  const ip = nonEmptyString(record.raw.ip);
  const ipAddress = nonEmptyString(record.raw.ipAddress);
  let ansibleHost: string | undefined;

  if (ip) {
    ansibleHost = ip;
  } else if (ipAddress) {
    ansibleHost = ipAddress;
    vars.ip = ipAddress;
  } else if (record.hostname) {
    ansibleHost = record.hostname;
  } else if (record.name) {
    ansibleHost = record.name;
  }

  if (ansibleHost) vars.ansible_host = ansibleHost;
}

function setOsInformation(vars: HostVars, record: SystemRecord): void {
  const os = toHostValue(record.raw.os);
  if (typeof os === 'string') {
    if (!('os_name' in record.raw)) vars.os_name = os;
    return;
  }
  if (!isHostObject(os)) return;
  for (const [osKey, varName] of Object.entries(OS_FIELD_MAPPING)) {
    const value = os[osKey];
    if (value !== undefined && !(varName in record.raw)) {
      vars[varName] = value;
    }
  }
}

function isHostObject(value: HostValue | undefined): value is { [key: string]: HostValue } {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function buildHostVars(record: SystemRecord): HostVars {
  const vars: HostVars = {};
  setRawFields(vars, record);
  setCanonicalFields(vars, record);
  setConnectionVariables(vars, record);
  setOsInformation(vars, record);
  return vars;
}
