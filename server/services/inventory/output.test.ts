import { describe, it, expect } from 'vitest';
import { hostVariables, renderJson, toScriptInventory } from './output';
import { InventoryDocument } from './types';

const document: InventoryDocument = {
  groups: {
    all: ['db01.example.test', 'web01.example.test'],
    patch_status_up_to_date: ['web01.example.test'],
    web_servers: ['web01.example.test'],
  },
  hostvars: {
    'db01.example.test': { id: 2 },
    'web01.example.test': { id: 1, ansible_host: '192.0.2.11' },
  },
};

describe('Script inventory output', () => {
  it('should list groups with all as the parent of every other group', () => {
    expect(toScriptInventory(document)).toEqual({
      _meta: { hostvars: document.hostvars },
      all: {
        hosts: ['db01.example.test', 'web01.example.test'],
        children: ['patch_status_up_to_date', 'web_servers'],
      },
      patch_status_up_to_date: { hosts: ['web01.example.test'] },
      web_servers: { hosts: ['web01.example.test'] },
    });
  });

  it('should emit _meta first and all second', () => {
    expect(Object.keys(toScriptInventory(document))).toEqual([
      '_meta',
      'all',
      'patch_status_up_to_date',
      'web_servers',
    ]);
  });

  it('should return host variables or an empty object', () => {
    expect(hostVariables(document, 'web01.example.test')).toEqual({ id: 1, ansible_host: '192.0.2.11' });
    expect(hostVariables(document, 'missing.example.test')).toEqual({});
    expect(hostVariables(document, 'toString')).toEqual({});
  });

  it('should render indented JSON with a trailing newline', () => {
    expect(renderJson({ a: [1] })).toBe('{\n  "a": [\n    1\n  ]\n}\n');
  });

  it('should never let a group replace the host variables block', () => {
    const clashing: InventoryDocument = {
      groups: { all: ['web01'], _meta: ['web01'] },
      hostvars: { web01: { id: 1 } },
    };
    expect(toScriptInventory(clashing)).toEqual({
      _meta: { hostvars: { web01: { id: 1 } } },
      all: { hosts: ['web01'], children: [] },
    });
  });

  it('should emit a __proto__ group as an own key', () => {
    const unusual: InventoryDocument = {
      groups: Object.fromEntries([
        ['__proto__', ['web01']],
        ['all', ['web01']],
      ]),
      hostvars: { web01: { id: 1 } },
    };
    const inventory = toScriptInventory(unusual);
    expect(Object.keys(inventory)).toEqual(['_meta', 'all', '__proto__']);
    expect(renderJson(inventory)).toContain('"__proto__": {\n    "hosts": [\n      "web01"\n    ]\n  }');
  });
});
