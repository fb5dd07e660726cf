// =============================================================================
// Inventory Assembler
// Drives one inventory run:
//   Init → CacheCheck → (hit: Done) | Authenticate → Fetch → Normalize →
//   Filter → Group → Compose → CachePut → Done
// Any fatal error moves the run to Failed and is rethrown unchanged.
// =============================================================================

import { mapWithConcurrency } from '../../lib/concurrency';
import { InventoryLogger, silentLogger } from '../../lib/logger';
import { describeCause, isInventoryError } from '../../lib/errors';
import { CacheStore, computeCacheKey } from './cache';
import { InventoryApiClient, Session } from './client';
import { VariableComposer } from './composer';
import { filterSystems } from './filters';
import { GroupBuilder, compareText } from './groups';
import { buildHostVars, inventoryHostname } from './hostvars';
import { normalizeSystem, resolveSystemId } from './normalizer';
import {
  AssemblyResult,
  HostVars,
  InventoryConfig,
  InventoryDocument,
  RawSystem,
  SystemDetails,
  SystemId,
  SystemRecord,
} from './types';

export type AssemblyState =
  | 'Init'
  | 'CacheCheck'
  | 'Authenticate'
  | 'Fetch'
  | 'Normalize'
  | 'Filter'
  | 'Group'
  | 'Compose'
  | 'CachePut'
  | 'Done'
  | 'Failed';

export interface AssemblerDependencies {
  client: InventoryApiClient;
  /** Omit to run without a cache even when the config enables one. */
  cacheStore?: CacheStore;
  logger?: InventoryLogger;
}

export interface AssembleOptions {
  /** Skip the cache read; the result is still written when caching is on. */
  refresh?: boolean;
}

interface FetchedSystem {
  id: SystemId;
  raw: RawSystem;
  details: SystemDetails;
}

interface HostEntry {
  record: SystemRecord;
  vars: HostVars;
}

export class InventoryAssembler {
  private currentState: AssemblyState = 'Init';
  private readonly visited: AssemblyState[] = [];
  private readonly logger: InventoryLogger;

  constructor(
    private readonly config: InventoryConfig,
    private readonly deps: AssemblerDependencies
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  get state(): AssemblyState {
    return this.currentState;
  }

  /** States entered by the last run, in order. */
  get history(): readonly AssemblyState[] {
    return this.visited;
  }

  async assemble(options: AssembleOptions = {}): Promise<AssemblyResult> {
    this.visited.length = 0;
    const warnings: string[] = [];

    try {
      this.enter('Init');
      // Compiles every compose expression and checks group_by keys
      const composer = new VariableComposer(this.config.compose);
      const groupBuilder = new GroupBuilder(this.config.groupBy);

      const cacheStore = this.config.cache ? this.deps.cacheStore : undefined;
      const cacheKey = computeCacheKey(this.config);

      if (cacheStore && !options.refresh) {
        this.enter('CacheCheck');
        const lookup = await cacheStore.get(cacheKey);
        if (lookup.hit) {
          this.logger.info({ key: cacheKey }, 'Serving inventory from cache');
          this.enter('Done');
          return { document: lookup.document, warnings, fromCache: true };
        }
        if (lookup.reason === 'corrupt') {
          this.warn(warnings, { key: cacheKey }, lookup.error.message);
        } else {
          this.logger.debug({ key: cacheKey, reason: lookup.reason }, 'Cache miss');
        }
      }

      this.enter('Authenticate');
      const session = await this.deps.client.authenticate({
        username: this.config.username,
        password: this.config.password,
      });

      this.enter('Fetch');
      const fetched = await this.fetchSystems(session, warnings).finally(() => this.logoutQuietly(session));

      this.enter('Normalize');
      const records = this.normalize(fetched, warnings);

      this.enter('Filter');
      const selected = filterSystems(records, this.config.filters);
      this.logger.info({ total: records.length, selected: selected.length }, 'Filtered systems');

      this.enter('Group');
      const hosts = this.collectHosts(selected, warnings);
      for (const [hostname, entry] of hosts) {
        groupBuilder.addHost(hostname, entry.vars, entry.record.system_groups);
      }
      for (const rename of groupBuilder.renames()) {
        this.warn(
          warnings,
          { group: rename.group },
          `Group name "${rename.source}" is reserved; its hosts are placed in "${rename.group}"`
        );
      }
      for (const collision of groupBuilder.collisions()) {
        this.warn(
          warnings,
          { group: collision.group },
          `Group names ${collision.sources.map((s) => `"${s}"`).join(', ')} merged into "${collision.group}"`
        );
      }

      this.enter('Compose');
      const composed: Array<[string, HostVars]> = [];
      for (const [hostname, entry] of hosts) {
        const { variables, errors } = composer.compose(hostname, entry.vars);
        for (const error of errors) {
          this.warn(warnings, { host: hostname, variable: error.variable }, error.message);
        }
        composed.push([hostname, variables]);
      }

      const document: InventoryDocument = {
        groups: groupBuilder.build(),
        hostvars: Object.fromEntries(composed),
      };

      if (cacheStore) {
        this.enter('CachePut');
        try {
          await cacheStore.put(cacheKey, document, this.config.cacheTimeoutSeconds);
        } catch (err) {
          this.warn(warnings, { key: cacheKey }, `Could not write cache entry: ${describeCause(err)}`);
        }
      }

      this.enter('Done');
      return { document, warnings, fromCache: false };
    } catch (err) {
      this.enter('Failed');
      this.logger.error(
        { code: isInventoryError(err) ? err.code : undefined },
        `Inventory assembly failed: ${describeCause(err)}`
      );
      throw err;
    }
  }

  // ---------------------------------------------------------------------------
  // Stages
  // ---------------------------------------------------------------------------

  private async fetchSystems(session: Session, warnings: string[]): Promise<FetchedSystem[]> {
    const { client } = this.deps;
    // Both lists settle before a failure is rethrown, so nothing is in flight at logout
    const [systemsResult, rebootResult] = await Promise.allSettled([
      client.listSystems(session),
      client.listRebootRequired(session),
    ]);
    if (systemsResult.status === 'rejected') throw systemsResult.reason;
    if (rebootResult.status === 'rejected') throw rebootResult.reason;
    const systems = systemsResult.value;
    const rebootIds = rebootResult.value;
    const needsReboot = new Set(rebootIds.map((id) => String(id)));

    const seen = new Set<string>();
    const unique: Array<{ id: SystemId; raw: RawSystem }> = [];
    for (const raw of systems) {
      const id = resolveSystemId(raw, this.config.fieldMappings);
      if (id === undefined) {
        this.warn(warnings, { name: describeRaw(raw) }, 'Skipping system without an id');
        continue;
      }
      if (seen.has(String(id))) {
        this.warn(warnings, { id }, `Skipping duplicate system id ${id}`);
        continue;
      }
      seen.add(String(id));
      unique.push({ id, raw });
    }

    this.logger.info({ systems: unique.length, workers: this.config.workers }, 'Fetching system details');

    return mapWithConcurrency(unique, this.config.workers, async ({ id, raw }) => {
      // One worker handles one system's lookups in sequence
      const errata = await client.getErrata(session, id);
      const systemGroups = await client.listSystemGroups(session, id);
      const registrationDate = await client.getRegistrationDate(session, id);
      return {
        id,
        raw,
        details: {
          errataCount: errata.length,
          rebootRequired: needsReboot.has(String(id)),
          systemGroups,
          registrationDate,
        },
      };
    });
  }

  private normalize(fetched: FetchedSystem[], warnings: string[]): SystemRecord[] {
    const records: SystemRecord[] = [];
    for (const { id, raw, details } of fetched) {
      const record = normalizeSystem(raw, details, this.config.fieldMappings);
      if (!record) {
        this.warn(warnings, { id }, `Skipping system ${id}: no usable id`);
        continue;
      }
      records.push(record);
    }
    return records;
  }

  /** Hosts keyed by inventory hostname in sorted order; a later duplicate wins. */
  private collectHosts(records: SystemRecord[], warnings: string[]): Map<string, HostEntry> {
    const byHostname = new Map<string, HostEntry>();
    for (const record of records) {
      const hostname = inventoryHostname(record);
      if (!hostname) {
        this.warn(warnings, { id: record.id }, `Skipping system ${record.id}: no hostname or name`);
        continue;
      }
      const previous = byHostname.get(hostname);
      if (previous) {
        this.warn(
          warnings,
          { host: hostname },
          `Hostname ${hostname} is used by systems ${previous.record.id} and ${record.id}; keeping ${record.id}`
        );
      }
      byHostname.set(hostname, { record, vars: buildHostVars(record) });
    }

    const sorted = new Map<string, HostEntry>();
    for (const hostname of [...byHostname.keys()].sort(compareText)) {
      const entry = byHostname.get(hostname);
      if (entry) sorted.set(hostname, entry);
    }
    return sorted;
  }

  private async logoutQuietly(session: Session): Promise<void> {
    try {
      await this.deps.client.logout(session);
    } catch (err) {
      this.logger.warn({ error: describeCause(err) }, 'Logout failed');
    }
  }

  // ---------------------------------------------------------------------------
  // Helpers
  // ---------------------------------------------------------------------------

  private enter(state: AssemblyState): void {
    this.logger.debug({ from: this.currentState, to: state }, 'State transition');
    this.currentState = state;
    this.visited.push(state);
  }

  private warn(warnings: string[], fields: Record<string, unknown>, message: string): void {
    warnings.push(message);
    this.logger.warn(fields, message);
  }
}

function describeRaw(raw: RawSystem): string {
  const name = raw.name ?? raw.hostname;
  return typeof name === 'string' ? name : 'unnamed';
}
