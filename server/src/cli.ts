// =============================================================================
// Dynamic inventory command line
//   --list            all groups and host variables
//   --host <name>     variables of one host
//   --config <path>   inventory source (default MLM_INVENTORY_CONFIG or inventory/mlm.yml)
//   --refresh         skip the cache read; the fresh result is still cached
// =============================================================================

import { createConsoleLogger, parseLogLevel } from '../lib/logger';
import type { InventoryLogger } from '../lib/logger';
import {
  FileCacheStore,
  InventoryAssembler,
  MlmApiClient,
  clientOptionsFromConfig,
  getConfigPath,
  hostVariables,
  loadInventoryConfigFile,
  renderJson,
  toScriptInventory,
} from '../services/inventory';
import type { CacheStore, InventoryApiClient, InventoryConfig } from '../services/inventory';

export const CLI_NAME = 'mlm-inventory';

export const USAGE = `Usage: ${CLI_NAME} (--list | --host <name>) [--config <path>] [--refresh]`;

export type CliOptions =
  | { mode: 'list'; configPath?: string; refresh: boolean }
  | { mode: 'host'; host: string; configPath?: string; refresh: boolean }
  | { mode: 'help' };

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export function parseCliArgs(args: readonly string[]): CliOptions {
  let list = false;
  let host: string | undefined;
  let configPath: string | undefined;
  let refresh = false;

  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    if (arg === '--help' || arg === '-h') {
      return { mode: 'help' };
    }
    if (arg === '--list') {
      list = true;
      continue;
    }
    if (arg === '--refresh') {
      refresh = true;
      continue;
    }
    if (arg === '--host' || arg === '--config') {
      const value = args[i + 1];
      if (value === undefined || value.startsWith('--')) {
        throw new CliUsageError(`${arg} needs a value`);
      }
      if (arg === '--host') host = value;
      else configPath = value;
      i += 1;
      continue;
    }
    throw new CliUsageError(`Unknown argument: ${arg}`);
  }

  if (list && host !== undefined) {
    throw new CliUsageError('--list and --host are mutually exclusive');
  }
  if (host !== undefined) {
    return { mode: 'host', host, configPath, refresh };
  }
  if (!list) {
    throw new CliUsageError('one of --list or --host is required');
  }
  return { mode: 'list', configPath, refresh };
}

export interface CliDependencies {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: InventoryLogger;
  createClient?: (config: InventoryConfig, logger: InventoryLogger) => InventoryApiClient;
  createCacheStore?: (config: InventoryConfig) => CacheStore;
}

/**
 * Runs one invocation and resolves with the process exit code.
 */
export async function runCli(args: readonly string[], deps: CliDependencies): Promise<number> {
  try {
    const options = parseCliArgs(args);
    if (options.mode === 'help') {
      deps.stdout(`${USAGE}\n`);
      return 0;
    }

    const config = await loadInventoryConfigFile(options.configPath ?? getConfigPath(deps.env), deps.env);
    const logger = deps.logger ?? createConsoleLogger(CLI_NAME, parseLogLevel(deps.env.LOG_LEVEL));
    const client = deps.createClient
      ? deps.createClient(config, logger)
      : new MlmApiClient(clientOptionsFromConfig(config, logger));
    const cacheStore = deps.createCacheStore
      ? deps.createCacheStore(config)
      : new FileCacheStore(config.cacheConnection);

    const assembler = new InventoryAssembler(config, { client, cacheStore, logger });
    const { document } = await assembler.assemble({ refresh: options.refresh });

    deps.stdout(
      renderJson(options.mode === 'host' ? hostVariables(document, options.host) : toScriptInventory(document))
    );
    return 0;
  } catch (err) {
    const name = err instanceof Error ? err.name : 'Error';
    const message = err instanceof Error ? err.message : String(err);
    deps.stderr(`[${CLI_NAME}] ${name}: ${message}\n`);
    if (err instanceof CliUsageError) deps.stderr(`${USAGE}\n`);
    return 1;
  }
}
