// =============================================================================
// Inventory module barrel
// =============================================================================

// Types
export type {
  AssemblyResult,
  FilterSpec,
  HostValue,
  HostVars,
  InventoryConfig,
  InventoryDocument,
  PatchStatus,
  RawSystem,
  SystemRecord,
} from './types';

// Config
export { getConfigPath, loadInventoryConfig, loadInventoryConfigFile } from './config';

// API client
export { MlmApiClient, clientOptionsFromConfig } from './client';
export type { InventoryApiClient, Session } from './client';

// Cache
export { FileCacheStore, computeCacheKey } from './cache';
export type { CacheStore } from './cache';

// Assembly
export { InventoryAssembler } from './assembler';
export type { AssemblyState } from './assembler';

// Output
export { hostVariables, renderJson, toScriptInventory } from './output';
