// =============================================================================
// Script inventory output
// Renders an InventoryDocument in the JSON shape automation tools read from
// dynamic inventory scripts (`--list` / `--host`).
// =============================================================================

import { ALL_GROUP, META_KEY, compareText } from './groups';
import { HostVars, InventoryDocument } from './types';

export interface ScriptInventoryGroup {
  hosts: string[];
  children?: string[];
}

export interface ScriptInventoryMeta {
  hostvars: Record<string, HostVars>;
}

export type ScriptInventory = Record<string, ScriptInventoryGroup | ScriptInventoryMeta>;

export function toScriptInventory(document: InventoryDocument): ScriptInventory {
  const groupNames = Object.keys(document.groups)
    .filter((name) => name !== ALL_GROUP && name !== META_KEY)
    .sort(compareText);

  // Own keys only: group names come from the server
  return Object.fromEntries<ScriptInventoryGroup | ScriptInventoryMeta>([
    [META_KEY, { hostvars: document.hostvars }],
    [ALL_GROUP, { hosts: [...(document.groups[ALL_GROUP] ?? [])], children: groupNames }],
    ...groupNames.map((name): [string, ScriptInventoryGroup] => [name, { hosts: [...document.groups[name]] }]),
  ]);
}

/** Variables of one host, or an empty object for unknown hosts. */
export function hostVariables(document: InventoryDocument, hostname: string): HostVars {
  return Object.prototype.hasOwnProperty.call(document.hostvars, hostname) ? document.hostvars[hostname] : {};
}

export function renderJson(value: unknown): string {
  return `${JSON.stringify(value, null, 2)}\n`;
}
