// =============================================================================
// MLM API Client
// Session-cookie authentication, envelope parsing and retry with exponential
// backoff over axios. Every call returns data or throws an InventoryError.
// =============================================================================

import axios, { AxiosInstance, AxiosResponse, Method } from 'axios';
import https from 'https';
import { z } from 'zod';
import {
  ApiRequestError,
  AuthenticationError,
  ConnectivityError,
  isInventoryError,
} from '../../lib/errors';
import { InventoryLogger, silentLogger } from '../../lib/logger';
import { ApiEndpoints, InventoryConfig, RawSystem, SystemId } from './types';

// -----------------------------------------------------------------------------
// Public surface
// -----------------------------------------------------------------------------

export interface Credentials {
  username: string;
  password: string;
}

export interface Session {
  /** Cookie header value sent with every authenticated call; may be empty. */
  cookie: string;
}

/**
 * Operations the assembler needs from the server. Implemented over HTTP by
 * MlmApiClient and by in-memory fakes in tests.
 */
export interface InventoryApiClient {
  authenticate(credentials: Credentials): Promise<Session>;
  listSystems(session: Session): Promise<RawSystem[]>;
  listRebootRequired(session: Session): Promise<SystemId[]>;
  getErrata(session: Session, systemId: SystemId): Promise<unknown[]>;
  listSystemGroups(session: Session, systemId: SystemId): Promise<string[]>;
  getRegistrationDate(session: Session, systemId: SystemId): Promise<string | undefined>;
  logout(session: Session): Promise<void>;
}

export interface ApiClientOptions {
  url: string;
  apiBasePath: string;
  endpoints: ApiEndpoints;
  timeoutSeconds: number;
  retries: number;
  validateCerts: boolean;
  logger?: InventoryLogger;
  /** Delay before retry number `attempt` (1-based). */
  backoffMs?: (attempt: number) => number;
  sleep?: (ms: number) => Promise<void>;
}

export const MAX_BACKOFF_SECONDS = 60;

export function defaultBackoffMs(attempt: number): number {
  const base = Math.min(MAX_BACKOFF_SECONDS, 2 ** (attempt - 1)) * 1000;
  return base + Math.floor(Math.random() * 1000);
}

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function clientOptionsFromConfig(config: InventoryConfig, logger?: InventoryLogger): ApiClientOptions {
  return {
    url: config.url,
    apiBasePath: config.apiBasePath,
    endpoints: config.apiEndpoints,
    timeoutSeconds: config.timeoutSeconds,
    retries: config.retries,
    validateCerts: config.validateCerts,
    logger,
  };
}

/** Server URL with the API base path appended unless it already ends with it. */
export function resolveApiRoot(url: string, apiBasePath: string): string {
  const root = url.replace(/\/+$/, '');
  if (apiBasePath === '' || root.endsWith(apiBasePath)) return root;
  return `${root}${apiBasePath}`;
}

// -----------------------------------------------------------------------------
// Response parsing
// -----------------------------------------------------------------------------

const responseEnvelopeSchema = z
  .object({
    success: z.boolean().optional(),
    result: z.unknown().optional(),
    message: z.string().optional(),
  })
  .passthrough();

const rawSystemListSchema = z.array(z.record(z.string(), z.unknown()));

/**
 * Unwraps `{success, result, message}`. `success: false` is a failure even
 * under HTTP 200; a bare list is taken as the result itself.
 */
export function unwrapEnvelope(operation: string, body: unknown): unknown {
  if (Array.isArray(body)) return body;
  const parsed = responseEnvelopeSchema.safeParse(body);
  if (!parsed.success) {
    throw new ApiRequestError(operation, 'Malformed response body');
  }
  if (parsed.data.success === false) {
    throw new ApiRequestError(operation, parsed.data.message ?? 'Unknown API error');
  }
  return parsed.data.result;
}

const GROUP_PREFIX = 'system_group_';

/**
 * Group names from a listGroups result. Structured entries count only when
 * subscribed; entries with just a name, and bare strings, are taken as is.
 */
export function parseSystemGroups(result: unknown): string[] {
  if (typeof result === 'string') return [result];
  if (!Array.isArray(result)) return [];

  const entries: unknown[] = result;
  const names: string[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      names.push(entry);
      continue;
    }
    if (typeof entry !== 'object' || entry === null) continue;

    const groupName: unknown = Reflect.get(entry, 'system_group_name');
    const subscribed: unknown = Reflect.get(entry, 'subscribed');
    if (typeof groupName === 'string') {
      if (subscribed === 1 || subscribed === true) {
        names.push(groupName.startsWith(GROUP_PREFIX) ? groupName.slice(GROUP_PREFIX.length) : groupName);
      }
      continue;
    }
    const name: unknown = Reflect.get(entry, 'name');
    if (typeof name === 'string') names.push(name);
  }
  return names;
}

function parseSystemIds(result: unknown): SystemId[] {
  if (!Array.isArray(result)) return [];
  const entries: unknown[] = result;
  const ids: SystemId[] = [];
  for (const entry of entries) {
    const id: unknown = typeof entry === 'object' && entry !== null ? Reflect.get(entry, 'id') : entry;
    if (typeof id === 'number' && Number.isFinite(id)) ids.push(id);
    else if (typeof id === 'string' && id.trim() !== '') ids.push(id);
  }
  return ids;
}

function extractCookie(response: AxiosResponse<unknown>): string {
  const header: unknown = response.headers['set-cookie'];
  const values = Array.isArray(header) ? header : typeof header === 'string' ? [header] : [];
  return values
    .filter((value): value is string => typeof value === 'string')
    .map((value) => value.split(';')[0].trim())
    .filter((pair) => pair !== '')
    .join('; ');
}

// -----------------------------------------------------------------------------
// HTTP client
// -----------------------------------------------------------------------------

class TransientFailure extends Error {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = 'TransientFailure';
  }
}

interface RequestSpec {
  operation: string;
  method: Method;
  path: string;
  session?: Session;
  params?: Record<string, SystemId>;
  data?: unknown;
  /** Treat 404 as "no data" instead of a failure. */
  allowNotFound?: boolean;
  maxAttempts?: number;
}

export class MlmApiClient implements InventoryApiClient {
  private readonly apiRoot: string;
  private readonly httpsAgent: https.Agent;
  private readonly logger: InventoryLogger;
  private readonly backoffMs: (attempt: number) => number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly options: ApiClientOptions,
    private readonly http: AxiosInstance = axios.create()
  ) {
    this.apiRoot = resolveApiRoot(options.url, options.apiBasePath);
    this.httpsAgent = new https.Agent({ rejectUnauthorized: options.validateCerts });
    this.logger = options.logger ?? silentLogger;
    this.backoffMs = options.backoffMs ?? defaultBackoffMs;
    this.sleep = options.sleep ?? delay;
  }

  async authenticate(credentials: Credentials): Promise<Session> {
    const response = await this.request({
      operation: 'login',
      method: 'POST',
      path: this.options.endpoints.login,
      data: { login: credentials.username, password: credentials.password },
    });
    if (response === undefined) {
      throw new AuthenticationError('Login endpoint not found', 404);
    }
    try {
      unwrapEnvelope('login', response.data);
    } catch (err) {
      throw new AuthenticationError(err instanceof Error ? err.message : 'Login rejected', response.status, err);
    }
    this.logger.debug({ url: this.apiRoot }, 'Authenticated');
    return { cookie: extractCookie(response) };
  }

  async listSystems(session: Session): Promise<RawSystem[]> {
    const result = await this.fetchResult('listSystems', this.options.endpoints.systems, session);
    const parsed = rawSystemListSchema.safeParse(result ?? []);
    if (!parsed.success) {
      throw new ApiRequestError('listSystems', 'Expected a list of system records');
    }
    return parsed.data;
  }

  async listRebootRequired(session: Session): Promise<SystemId[]> {
    const result = await this.fetchResult('listSuggestedReboot', this.options.endpoints.systems_reboot, session);
    return parseSystemIds(result);
  }

  async getErrata(session: Session, systemId: SystemId): Promise<unknown[]> {
    const result = await this.fetchResult(
      'getRelevantErrata',
      this.options.endpoints.relevant_errata,
      session,
      systemId
    );
    return Array.isArray(result) ? result : [];
  }

  async listSystemGroups(session: Session, systemId: SystemId): Promise<string[]> {
    const result = await this.fetchResult('listGroups', this.options.endpoints.system_groups, session, systemId);
    return parseSystemGroups(result);
  }

  async getRegistrationDate(session: Session, systemId: SystemId): Promise<string | undefined> {
    const result = await this.fetchResult(
      'getRegistrationDate',
      this.options.endpoints.registration_date,
      session,
      systemId
    );
    return typeof result === 'string' && result.trim() !== '' ? result : undefined;
  }

  async logout(session: Session): Promise<void> {
    await this.request({
      operation: 'logout',
      method: 'POST',
      path: this.options.endpoints.logout,
      session,
      allowNotFound: true,
      maxAttempts: 1,
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /** GET an endpoint and unwrap its envelope; per-system lookups pass `sid`. */
  private async fetchResult(
    operation: string,
    path: string,
    session: Session,
    systemId?: SystemId
  ): Promise<unknown> {
    const response = await this.request({
      operation,
      method: 'GET',
      path,
      session,
      params: systemId === undefined ? undefined : { sid: systemId },
      allowNotFound: systemId !== undefined,
    });
    if (response === undefined) return undefined;
    return unwrapEnvelope(operation, response.data);
  }

  /**
   * Runs one call under the retry policy. Resolves undefined only for an
   * allowed 404.
   */
  private async request(spec: RequestSpec): Promise<AxiosResponse<unknown> | undefined> {
    const maxAttempts = spec.maxAttempts ?? this.options.retries + 1;
    let lastCause: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      try {
        return await this.attempt(spec);
      } catch (err) {
        if (!(err instanceof TransientFailure)) throw err;
        lastCause = err.cause ?? err;
        if (attempt < maxAttempts) {
          const wait = this.backoffMs(attempt);
          this.logger.warn(
            { operation: spec.operation, attempt, maxAttempts, retryInMs: wait },
            `Transient failure: ${err.message}`
          );
          await this.sleep(wait);
        }
      }
    }

    throw new ConnectivityError(spec.operation, maxAttempts, lastCause);
  }

  private async attempt(spec: RequestSpec): Promise<AxiosResponse<unknown> | undefined> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.request<unknown>({
        url: `${this.apiRoot}${spec.path}`,
        method: spec.method,
        params: spec.params,
        data: spec.data,
        headers: spec.session && spec.session.cookie !== '' ? { Cookie: spec.session.cookie } : undefined,
        timeout: this.options.timeoutSeconds * 1000,
        httpsAgent: this.httpsAgent,
        validateStatus: () => true,
      });
    } catch (err) {
      if (isInventoryError(err)) throw err;
      // No response at all: refused, reset, DNS or timeout
      if (axios.isAxiosError(err) && err.response === undefined) {
        throw new TransientFailure(err.code ? `${err.code}: ${err.message}` : err.message, err);
      }
      throw new ApiRequestError(spec.operation, err instanceof Error ? err.message : String(err), undefined, err);
    }

    const { status } = response;
    this.logger.debug({ operation: spec.operation, status }, 'API response');

    if (status >= 200 && status < 300) return response;
    if (status === 401 || status === 403) {
      throw new AuthenticationError(`${spec.operation} rejected with HTTP ${status}`, status);
    }
    if (status === 429 || status >= 500) {
      throw new TransientFailure(`HTTP ${status}`, new Error(`HTTP ${status}`));
    }
    if (status === 404 && spec.allowNotFound) return undefined;
    throw new ApiRequestError(spec.operation, `HTTP ${status}`, status);
  }
}
