import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { InventoryAssembler } from '../../services/inventory/assembler';
import { toScriptInventory } from '../../services/inventory/output';
import { FileCacheStore, computeCacheKey } from '../../services/inventory/cache';
import type { CacheStore } from '../../services/inventory/cache';
import { loadInventoryConfig } from '../../services/inventory/config';
import type { InventoryConfig, RawSystem } from '../../services/inventory/types';
import { AuthenticationError, ConfigurationError, ConnectivityError } from '../../lib/errors';
import type { InventoryLogger } from '../../lib/logger';
import { FakeInventoryClient, type FakeServerData } from '../fixtures/fake-client';
import { createRawSystems } from '../fixtures/mock-systems';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function createConfig(overrides: Record<string, unknown> = {}): InventoryConfig {
  return loadInventoryConfig(
    { url: 'https://mlm.example.test', username: 'admin', password: 'test-secret', ...overrides },
    {}
  );
}

function createServerData(): FakeServerData {
  return {
    systems: createRawSystems(),
    rebootRequired: [1000010003],
    errata: { '1000010002': 4 },
    groups: { '1000010001': ['Web Servers'], '1000010002': ['Databases'] },
    registrationDates: { '1000010001': '2024-01-02T10:00:00Z' },
  };
}

function createLogger(): InventoryLogger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('Inventory assembly', () => {
  describe('full run', () => {
    it('should build groups and host variables from the server data', async () => {
      const client = new FakeInventoryClient(createServerData());
      const assembler = new InventoryAssembler(createConfig(), { client });

      const result = await assembler.assemble();

      expect(result.fromCache).toBe(false);
      expect(result.warnings).toEqual([]);
      expect(result.document.groups).toEqual({
        all: ['db01.example.test', 'legacy01.example.test', 'web01.example.test'],
        databases: ['db01.example.test'],
        patch_status_needs_patches: ['db01.example.test'],
        patch_status_needs_reboot: ['legacy01.example.test'],
        patch_status_up_to_date: ['web01.example.test'],
        web_servers: ['web01.example.test'],
      });
      expect(result.document.hostvars['web01.example.test']).toEqual({
        id: 1000010001,
        system_name: 'web01',
        hostname: 'web01.example.test',
        active: true,
        lastCheckin: '2024-06-01T08:00:00Z',
        lastBoot: '2024-05-20T06:00:00Z',
        ip: '192.0.2.11',
        os: { name: 'SLES', version: '15.5', family: 'Suse' },
        status: 'active',
        registration_date: '2024-01-02T10:00:00Z',
        last_checkin: '2024-06-01T08:00:00Z',
        last_boot: '2024-05-20T06:00:00Z',
        errata_count: 0,
        reboot_required: false,
        patch_status: 'up_to_date',
        system_groups: ['Web Servers'],
        ansible_host: '192.0.2.11',
        os_name: 'SLES',
        os_version: '15.5',
        os_family: 'Suse',
      });
      expect(result.document.hostvars['legacy01.example.test']).toMatchObject({
        active: false,
        status: 'inactive',
        reboot_required: true,
        patch_status: 'needs_reboot',
        ansible_host: 'legacy01.example.test',
      });
    });

    it('should walk the states in order and log out after fetching', async () => {
      const client = new FakeInventoryClient(createServerData());
      const assembler = new InventoryAssembler(createConfig(), { client });

      await assembler.assemble();

      expect(assembler.state).toBe('Done');
      expect(assembler.history).toEqual([
        'Init',
        'Authenticate',
        'Fetch',
        'Normalize',
        'Filter',
        'Group',
        'Compose',
        'Done',
      ]);
      expect(client.calls[0]).toBe('authenticate');
      expect(client.calls[client.calls.length - 1]).toBe('logout');
      expect(client.count('getErrata')).toBe(3);
      expect(client.credentials).toEqual({ username: 'admin', password: 'test-secret' });
    });

    it('should produce byte-identical output regardless of record order', async () => {
      const forward = await new InventoryAssembler(createConfig(), {
        client: new FakeInventoryClient(createServerData()),
      }).assemble();
      const reversedData = createServerData();
      reversedData.systems.reverse();
      const reversed = await new InventoryAssembler(createConfig(), {
        client: new FakeInventoryClient(reversedData),
      }).assemble();

      expect(JSON.stringify(reversed.document)).toBe(JSON.stringify(forward.document));
    });

    it('should keep at most `workers` detail lookups in flight', async () => {
      const systems: RawSystem[] = Array.from({ length: 10 }, (_, i) => ({ id: i + 1, hostname: `node${i + 1}` }));
      const client = new FakeInventoryClient({ systems });

      const result = await new InventoryAssembler(createConfig({ workers: 2 }), { client }).assemble();

      expect(client.maxInFlight).toBe(2);
      expect(result.document.groups.all).toHaveLength(10);
    });
  });

  describe('filters and groups', () => {
    it('should select only active systems that need a reboot', async () => {
      const client = new FakeInventoryClient({
        systems: [
          { id: 1, hostname: 'a.example.test', active: true },
          { id: 2, hostname: 'b.example.test', active: true },
          { id: 3, hostname: 'c.example.test', active: false },
        ],
        errata: { '1': 5 },
        rebootRequired: [2, 3],
      });
      const config = createConfig({ filters: { status: 'active', patch_status: 'needs_reboot' } });

      const { document } = await new InventoryAssembler(config, { client }).assemble();

      expect(Object.keys(document.hostvars)).toEqual(['b.example.test']);
      expect(document.groups).toEqual({
        all: ['b.example.test'],
        patch_status_needs_reboot: ['b.example.test'],
      });
    });

    it('should emit literal system groups without any group_by keys', async () => {
      const client = new FakeInventoryClient({
        systems: [{ id: 7, hostname: 'web01.example.test' }],
        groups: { '7': ['Web Servers'] },
      });

      const { document } = await new InventoryAssembler(createConfig({ group_by: [] }), { client }).assemble();

      expect(document.groups).toEqual({ all: ['web01.example.test'], web_servers: ['web01.example.test'] });
    });

    it('should warn when group names merge', async () => {
      const client = new FakeInventoryClient({
        systems: [
          { id: 1, hostname: 'web01' },
          { id: 2, hostname: 'web02' },
        ],
        groups: { '1': ['Web Servers'], '2': ['web-servers'] },
      });

      const result = await new InventoryAssembler(createConfig({ group_by: [] }), { client }).assemble();

      expect(result.document.groups.web_servers).toEqual(['web01', 'web02']);
      expect(result.warnings).toEqual(['Group names "Web Servers", "web-servers" merged into "web_servers"']);
    });
  });

  describe('records that cannot be used as is', () => {
    it('should skip systems without an id or hostname and let the later duplicate hostname win', async () => {
      const client = new FakeInventoryClient({
        systems: [
          { id: 1, hostname: 'dup.example.test', name: 'first' },
          { id: 1, hostname: 'other.example.test' },
          { id: 2, hostname: 'dup.example.test', name: 'second' },
          { hostname: 'noid.example.test' },
          { id: 5 },
        ],
      });

      const result = await new InventoryAssembler(createConfig(), { client }).assemble();

      expect(result.warnings).toEqual([
        'Skipping duplicate system id 1',
        'Skipping system without an id',
        'Hostname dup.example.test is used by systems 1 and 2; keeping 2',
        'Skipping system 5: no hostname or name',
      ]);
      expect(Object.keys(result.document.hostvars)).toEqual(['dup.example.test']);
      expect(result.document.hostvars['dup.example.test'].system_name).toBe('second');
    });
  });

  describe('compose', () => {
    it('should record per-host failures as warnings and keep the run going', async () => {
      const client = new FakeInventoryClient(createServerData());
      const config = createConfig({
        compose: { site: 'location.site', label: "system_name ~ '-' ~ patch_status" },
      });
      const assembler = new InventoryAssembler(config, { client });

      const result = await assembler.assemble();

      expect(assembler.state).toBe('Done');
      expect(result.warnings).toEqual([
        `Could not compose 'site' for db01.example.test from "location.site": 'location.site' is undefined`,
        `Could not compose 'site' for legacy01.example.test from "location.site": 'location.site' is undefined`,
        `Could not compose 'site' for web01.example.test from "location.site": 'location.site' is undefined`,
      ]);
      expect(result.document.hostvars['db01.example.test'].label).toBe('db01-needs_patches');
      expect(result.document.hostvars['db01.example.test']).not.toHaveProperty('site');
    });

    it('should let composed values replace host variables but not groups', async () => {
      const client = new FakeInventoryClient(createServerData());
      const config = createConfig({ compose: { ansible_host: 'hostname', patch_status: "'overridden'" } });

      const { document } = await new InventoryAssembler(config, { client }).assemble();

      expect(document.hostvars['web01.example.test'].ansible_host).toBe('web01.example.test');
      expect(document.hostvars['web01.example.test'].patch_status).toBe('overridden');
      expect(document.groups.patch_status_up_to_date).toEqual(['web01.example.test']);
    });
  });

  describe('server-supplied names', () => {
    it('should keep reserved and built-in names out of the way of the output structure', async () => {
      const client = new FakeInventoryClient({
        systems: [{ id: 1, hostname: '__proto__' }],
        groups: { '1': ['_meta', '__proto__'] },
      });

      const result = await new InventoryAssembler(createConfig({ group_by: [] }), { client }).assemble();

      expect(result.warnings).toEqual(['Group name "_meta" is reserved; its hosts are placed in "group__meta"']);
      expect(Object.entries(result.document.groups)).toEqual([
        ['__proto__', ['__proto__']],
        ['all', ['__proto__']],
        ['group__meta', ['__proto__']],
      ]);
      expect(Object.keys(result.document.hostvars)).toEqual(['__proto__']);

      const inventory = toScriptInventory(result.document);
      expect(Object.keys(inventory)).toEqual(['_meta', 'all', '__proto__', 'group__meta']);
      expect(inventory.all).toEqual({ hosts: ['__proto__'], children: ['__proto__', 'group__meta'] });
      expect(Object.getOwnPropertyDescriptor(result.document.hostvars, '__proto__')?.value).toMatchObject({
        id: 1,
        hostname: '__proto__',
      });
    });
  });

  describe('fatal errors', () => {
    it('should reject invalid expressions before any network call', async () => {
      const client = new FakeInventoryClient(createServerData());
      const assembler = new InventoryAssembler(createConfig({ compose: { bad: 'errata_count +' } }), { client });

      await expect(assembler.assemble()).rejects.toBeInstanceOf(ConfigurationError);
      expect(client.calls).toEqual([]);
      expect(assembler.history).toEqual(['Init', 'Failed']);
    });

    it('should fail without a partial document when a read is exhausted', async () => {
      const client = new FakeInventoryClient(createServerData());
      const failure = new ConnectivityError('listSystems', 4, new Error('HTTP 503'));
      client.failures.listSystems = failure;
      const logger = createLogger();
      const assembler = new InventoryAssembler(createConfig(), { client, logger });

      await expect(assembler.assemble()).rejects.toBe(failure);
      expect(assembler.state).toBe('Failed');
      expect(client.count('logout')).toBe(1);
      expect(logger.error).toHaveBeenCalledWith(
        { code: 'CONNECTIVITY_EXHAUSTED' },
        'Inventory assembly failed: listSystems failed after 4 attempt(s): HTTP 503'
      );
    });

    it('should start no further lookups after a failed one and log out last', async () => {
      const systems: RawSystem[] = Array.from({ length: 20 }, (_, i) => ({ id: i + 1, hostname: `node${i + 1}` }));
      const client = new FakeInventoryClient({ systems });
      client.failures.getErrata = new ConnectivityError('getRelevantErrata', 4, new Error('HTTP 503'));
      const assembler = new InventoryAssembler(createConfig({ workers: 2 }), { client });

      await expect(assembler.assemble()).rejects.toBeInstanceOf(ConnectivityError);
      const callsAtFailure = client.calls.length;
      await new Promise((resolve) => setTimeout(resolve, 20));

      expect(client.calls).toHaveLength(callsAtFailure);
      expect(client.count('getErrata')).toBe(2);
      expect(client.calls[client.calls.length - 1]).toBe('logout');
      expect(client.inFlight).toBe(0);
    });

    it('should wait for the reboot list before logging out when the system list fails', async () => {
      const client = new FakeInventoryClient(createServerData());
      client.failures.listSystems = new ConnectivityError('listSystems', 4, new Error('HTTP 503'));

      await expect(new InventoryAssembler(createConfig(), { client }).assemble()).rejects.toBeInstanceOf(
        ConnectivityError
      );

      expect(client.calls).toEqual(['authenticate', 'listSystems', 'listRebootRequired', 'logout']);
    });

    it('should not log out when authentication fails', async () => {
      const client = new FakeInventoryClient(createServerData());
      client.failures.authenticate = new AuthenticationError();
      const assembler = new InventoryAssembler(createConfig(), { client });

      await expect(assembler.assemble()).rejects.toBeInstanceOf(AuthenticationError);
      expect(client.calls).toEqual(['authenticate']);
      expect(assembler.history).toEqual(['Init', 'Authenticate', 'Failed']);
    });

    it('should treat a failed logout as a warning only', async () => {
      const client = new FakeInventoryClient(createServerData());
      client.failures.logout = new Error('session already gone');
      const logger = createLogger();

      const result = await new InventoryAssembler(createConfig(), { client, logger }).assemble();

      expect(result.document.groups.all).toHaveLength(3);
      expect(logger.warn).toHaveBeenCalledWith({ error: 'session already gone' }, 'Logout failed');
    });
  });

  describe('cache', () => {
    let directory: string;

    beforeEach(async () => {
      directory = await fs.mkdtemp(path.join(os.tmpdir(), 'mlm-inventory-assembly-'));
    });

    afterEach(async () => {
      await fs.rm(directory, { recursive: true, force: true });
    });

    it('should serve a second run from the cache without contacting the server', async () => {
      const config = createConfig({ cache: true });
      const cacheStore = new FileCacheStore(directory);

      const first = new InventoryAssembler(config, { client: new FakeInventoryClient(createServerData()), cacheStore });
      const fresh = await first.assemble();
      expect(fresh.fromCache).toBe(false);
      expect(first.history).toContain('CachePut');

      const client = new FakeInventoryClient(createServerData());
      const second = new InventoryAssembler(config, { client, cacheStore });
      const cached = await second.assemble();

      expect(cached.fromCache).toBe(true);
      expect(cached.document).toEqual(fresh.document);
      expect(client.calls).toEqual([]);
      expect(second.history).toEqual(['Init', 'CacheCheck', 'Done']);
    });

    it('should skip the cache read on refresh but still write', async () => {
      const config = createConfig({ cache: true });
      const cacheStore = new FileCacheStore(directory);
      await new InventoryAssembler(config, { client: new FakeInventoryClient(createServerData()), cacheStore }).assemble();

      const client = new FakeInventoryClient(createServerData());
      const assembler = new InventoryAssembler(config, { client, cacheStore });
      const result = await assembler.assemble({ refresh: true });

      expect(result.fromCache).toBe(false);
      expect(client.count('authenticate')).toBe(1);
      expect(assembler.history).not.toContain('CacheCheck');
      expect(assembler.history).toContain('CachePut');
    });

    it('should neither read nor write when caching is disabled', async () => {
      const cacheStore: CacheStore = { get: vi.fn(), put: vi.fn() };
      const client = new FakeInventoryClient(createServerData());

      await new InventoryAssembler(createConfig({ cache: false }), { client, cacheStore }).assemble();

      expect(cacheStore.get).not.toHaveBeenCalled();
      expect(cacheStore.put).not.toHaveBeenCalled();
    });

    it('should rebuild over a corrupt entry and report it', async () => {
      const config = createConfig({ cache: true });
      const cacheStore = new FileCacheStore(directory);
      await fs.writeFile(cacheStore.entryPath(computeCacheKey(config)), 'not json', 'utf-8');

      const assembler = new InventoryAssembler(config, { client: new FakeInventoryClient(createServerData()), cacheStore });
      const result = await assembler.assemble();

      expect(result.fromCache).toBe(false);
      expect(result.warnings).toHaveLength(1);
      expect(result.warnings[0]).toContain('Unreadable cache entry');
      expect(assembler.state).toBe('Done');
      await expect(cacheStore.get(computeCacheKey(config))).resolves.toMatchObject({ hit: true });
    });
  });
});
