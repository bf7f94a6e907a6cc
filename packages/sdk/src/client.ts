/**
 * @clusterops/sdk — ManagementClient
 *
 * Typed HTTP client for the cluster management REST API.
 * Every call runs through the ResilienceEngine; the SessionManager supplies
 * the credential for each attempt.
 */
import { z } from 'zod';
import type {
  CreateIndexParams,
  CreateMacroParams,
  CreateRoleParams,
  CreateSavedSearchParams,
  CreateUserParams,
  Logger,
  ModifyIndexParams,
  ModifyRoleParams,
  ModifyUserParams,
  ResourceType,
  UpdateMacroParams,
  UpdateSavedSearchParams,
} from '@clusterops/core';
import { createLogger, getErrorMessage } from '@clusterops/core';
import type { CircuitBreakerConfig } from './circuit-breaker.js';
import { CircuitBreaker } from './circuit-breaker.js';
import { AuthenticationError, ClusterOpsError, ResponseParseError, TokenRefreshError } from './errors.js';
import type { MetricsRecorder } from './metrics.js';
import { InMemoryMetricsRecorder, MetricsCollector } from './metrics.js';
import type { RequestFactory } from './resilience.js';
import { ResilienceEngine } from './resilience.js';
import type { SleepFn } from './retry.js';
import type { AuthStrategy } from './session.js';
import { SessionManager } from './session.js';
import type { TransactionExecutor } from './transaction-manager.js';

// ─── Types ──────────────────────────────────────────────────────────

export interface RetryConfig {
  /** Maximum number of retries after the first attempt (default: 3) */
  maxRetries?: number;
  /** Base delay in ms for exponential backoff (default: 1000) */
  baseDelayMs?: number;
}

export interface ManagementClientOptions {
  /** Base URL of the management API (e.g. "https://cluster.example.com:8089") */
  url: string;
  auth: AuthStrategy;
  /** Custom fetch implementation (defaults to global fetch) */
  fetch?: typeof globalThis.fetch;
  /** Per-attempt timeout in milliseconds (default: 30000) */
  timeoutMs?: number;
  retry?: RetryConfig;
  session?: { ttlSeconds?: number; expiryBufferSeconds?: number };
  /** Per-endpoint circuit breaker; off unless set */
  circuitBreaker?: CircuitBreakerConfig | boolean;
  /** Metrics sink (default: in-memory recorder; null disables metrics) */
  metrics?: MetricsRecorder | null;
  logger?: Logger;
  /** Wait function between retries; tests pass a fake */
  sleep?: SleepFn;
  now?: () => number;
}

export interface CallOptions {
  signal?: AbortSignal;
}

/** One resource as the API returns it */
export interface ResourceEntry {
  name: string;
  content: Record<string, unknown>;
}

type FormValue = string | number | boolean | string[] | undefined;

interface SendOptions extends CallOptions {
  method?: string;
  form?: Record<string, FormValue>;
  skipAuth?: boolean;
}

// ─── Response Schemas ───────────────────────────────────────────────

const loginResponseSchema = z.object({ sessionKey: z.string().min(1) });

const entryResponseSchema = z
  .object({
    entry: z.array(z.object({ name: z.string(), content: z.record(z.unknown()).default({}) })),
  })
  .transform((body, ctx) => {
    const first = body.entry[0];
    if (!first) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Response contains no entry' });
      return z.NEVER;
    }
    return first;
  });

const RESOURCE_PATHS: Record<ResourceType, string> = {
  index: '/services/data/indexes',
  user: '/services/authentication/users',
  role: '/services/authorization/roles',
  macro: '/services/admin/macros',
  saved_search: '/services/saved/searches',
};

const LOGIN_PATH = '/services/auth/login';

// ─── Client ─────────────────────────────────────────────────────────

/**
 * Resolve credentials from the environment.
 * - `CLUSTEROPS_API_TOKEN` → api-token auth
 * - `CLUSTEROPS_USERNAME` + `CLUSTEROPS_PASSWORD` → session auth
 */
export function authFromEnv(env: NodeJS.ProcessEnv = process.env): AuthStrategy | null {
  if (env.CLUSTEROPS_API_TOKEN) return { kind: 'api-token', token: env.CLUSTEROPS_API_TOKEN };
  if (env.CLUSTEROPS_USERNAME && env.CLUSTEROPS_PASSWORD) {
    return { kind: 'session', username: env.CLUSTEROPS_USERNAME, password: env.CLUSTEROPS_PASSWORD };
  }
  return null;
}

export class ManagementClient implements TransactionExecutor {
  /** Recorder metrics go to, or null when disabled */
  readonly metrics: MetricsRecorder | null;
  readonly session: SessionManager;

  private readonly baseUrl: string;
  private readonly _fetch: typeof globalThis.fetch;
  private readonly engine: ResilienceEngine;
  private readonly collector: MetricsCollector;
  private readonly log: Logger;

  /**
   * Create a client from environment variables.
   * - `CLUSTEROPS_URL` → url (default: "https://localhost:8089")
   * - credentials as in {@link authFromEnv}
   * Explicit overrides take priority over env vars.
   */
  static fromEnv(overrides: Partial<ManagementClientOptions> = {}): ManagementClient {
    const auth = overrides.auth ?? authFromEnv();
    if (!auth) {
      throw new ClusterOpsError(
        'No credentials configured: set CLUSTEROPS_API_TOKEN, or CLUSTEROPS_USERNAME and CLUSTEROPS_PASSWORD',
        0,
        'CONFIG_ERROR',
      );
    }
    return new ManagementClient({
      ...overrides,
      url: overrides.url ?? process.env.CLUSTEROPS_URL ?? 'https://localhost:8089',
      auth,
    });
  }

  constructor(options: ManagementClientOptions) {
    // Strip trailing slash
    this.baseUrl = options.url.replace(/\/+$/, '');
    this._fetch = options.fetch ?? globalThis.fetch.bind(globalThis);
    this.log = options.logger ?? createLogger('clusterops:client');
    this.metrics = options.metrics === undefined ? new InMemoryMetricsRecorder() : options.metrics;
    this.collector = new MetricsCollector(this.metrics, options.logger);

    const breakerConfig = options.circuitBreaker;
    const circuitBreaker =
      breakerConfig === undefined || breakerConfig === false
        ? null
        : new CircuitBreaker(breakerConfig === true ? {} : breakerConfig, {
            metrics: this.collector,
            logger: options.logger,
            now: options.now,
          });

    this.engine = new ResilienceEngine({
      timeoutMs: options.timeoutMs,
      maxRetries: options.retry?.maxRetries,
      baseDelayMs: options.retry?.baseDelayMs,
      metrics: this.collector,
      circuitBreaker,
      logger: options.logger,
      sleep: options.sleep,
      now: options.now,
    });

    this.session = new SessionManager(options.auth, (username, password) => this.login(username, password), {
      ttlSeconds: options.session?.ttlSeconds,
      expiryBufferSeconds: options.session?.expiryBufferSeconds,
      metrics: this.collector,
      logger: options.logger,
      now: options.now,
    });
  }

  // ─── Authentication ──────────────────────────────────────

  /**
   * Exchange username/password for a session token.
   * Normally called by the SessionManager, not directly.
   */
  async login(username: string, password: string, options: CallOptions = {}): Promise<string> {
    const result = await this.request(LOGIN_PATH, LOGIN_PATH, loginResponseSchema, {
      method: 'POST',
      form: { username, password },
      skipAuth: true,
      signal: options.signal,
    });
    return result.sessionKey;
  }

  // ─── Indexes ─────────────────────────────────────────────

  async createIndex(params: CreateIndexParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.createResource('index', indexForm(params, params.name), options);
  }

  async deleteIndex(name: string, options: CallOptions = {}): Promise<void> {
    return this.deleteResource('index', name, options);
  }

  async modifyIndex(name: string, params: ModifyIndexParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.updateResource('index', name, indexForm(params), options);
  }

  // ─── Users ───────────────────────────────────────────────

  async createUser(params: CreateUserParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.createResource('user', userForm(params, params.name), options);
  }

  async deleteUser(name: string, options: CallOptions = {}): Promise<void> {
    return this.deleteResource('user', name, options);
  }

  async modifyUser(name: string, params: ModifyUserParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.updateResource('user', name, userForm(params), options);
  }

  // ─── Roles ───────────────────────────────────────────────

  async createRole(params: CreateRoleParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.createResource('role', roleForm(params, params.name), options);
  }

  async deleteRole(name: string, options: CallOptions = {}): Promise<void> {
    return this.deleteResource('role', name, options);
  }

  async modifyRole(name: string, params: ModifyRoleParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.updateResource('role', name, roleForm(params), options);
  }

  // ─── Macros ──────────────────────────────────────────────

  async createMacro(params: CreateMacroParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.createResource('macro', macroForm(params, params.name), options);
  }

  async deleteMacro(name: string, options: CallOptions = {}): Promise<void> {
    return this.deleteResource('macro', name, options);
  }

  async updateMacro(name: string, params: UpdateMacroParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.updateResource('macro', name, macroForm(params), options);
  }

  // ─── Saved Searches ──────────────────────────────────────

  async createSavedSearch(params: CreateSavedSearchParams, options: CallOptions = {}): Promise<ResourceEntry> {
    return this.createResource('saved_search', savedSearchForm(params, params.name), options);
  }

  async deleteSavedSearch(name: string, options: CallOptions = {}): Promise<void> {
    return this.deleteResource('saved_search', name, options);
  }

  async updateSavedSearch(
    name: string,
    params: UpdateSavedSearchParams,
    options: CallOptions = {},
  ): Promise<ResourceEntry> {
    return this.updateResource('saved_search', name, savedSearchForm(params), options);
  }

  // ─── Internal ────────────────────────────────────────────

  private async createResource(
    resource: ResourceType,
    form: Record<string, FormValue>,
    options: CallOptions,
  ): Promise<ResourceEntry> {
    const path = RESOURCE_PATHS[resource];
    return this.request(path, path, entryResponseSchema, { method: 'POST', form, signal: options.signal });
  }

  private async updateResource(
    resource: ResourceType,
    name: string,
    form: Record<string, FormValue>,
    options: CallOptions,
  ): Promise<ResourceEntry> {
    const base = RESOURCE_PATHS[resource];
    return this.request(`${base}/{name}`, `${base}/${encodeURIComponent(name)}`, entryResponseSchema, {
      method: 'POST',
      form,
      signal: options.signal,
    });
  }

  private async deleteResource(resource: ResourceType, name: string, options: CallOptions): Promise<void> {
    const base = RESOURCE_PATHS[resource];
    const response = await this.send(`${base}/{name}`, `${base}/${encodeURIComponent(name)}`, {
      method: 'DELETE',
      signal: options.signal,
    });
    // The body lists what remains; nothing here needs it.
    await response.text();
  }

  /**
   * Send, then decode the JSON body against `schema`. Decoding failures are
   * reported at once and never retried.
   */
  private async request<T>(
    endpoint: string,
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: SendOptions,
  ): Promise<T> {
    const method = options.method ?? 'GET';
    const response = await this.send(endpoint, path, options);

    let body: unknown;
    try {
      body = await response.json();
    } catch (err) {
      this.collector.recordDeserializationFailure(endpoint, method);
      throw new ResponseParseError(
        `Malformed response body from ${method} ${endpoint}: ${getErrorMessage(err)}`,
        response.status,
      );
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.collector.recordDeserializationFailure(endpoint, method);
      throw new ResponseParseError(
        `Unexpected response shape from ${method} ${endpoint}`,
        response.status,
        parsed.error.issues,
      );
    }
    return parsed.data;
  }

  /**
   * Run one call through the engine. With session auth, a 401 drops the
   * rejected token, logs in again and replays the call once.
   */
  private async send(endpoint: string, path: string, options: SendOptions): Promise<Response> {
    const { method = 'GET', skipAuth = false, signal } = options;
    const url = `${this.baseUrl}${path}?output_mode=json`;
    const body = options.form ? encodeForm(options.form) : undefined;
    const seen: { token: string | null } = { token: null };

    const factory: RequestFactory = async (attemptSignal) => {
      const headers: Record<string, string> = { Accept: 'application/json' };
      if (!skipAuth) {
        const credential = await this.session.getCredential();
        seen.token = credential;
        headers['Authorization'] = `Bearer ${credential}`;
      }
      if (body !== undefined) {
        headers['Content-Type'] = 'application/x-www-form-urlencoded';
      }
      return this._fetch(url, { method, headers, body, signal: attemptSignal });
    };

    const execute = () => this.engine.execute(factory, { endpoint, method, signal, url });

    try {
      return await execute();
    } catch (err) {
      const rejectedToken = seen.token;
      if (
        !(err instanceof AuthenticationError) ||
        err instanceof TokenRefreshError ||
        skipAuth ||
        this.session.isApiToken ||
        rejectedToken === null
      ) {
        throw err;
      }
      this.log.info('Session token rejected, re-authenticating', { endpoint, method });
      this.session.invalidate(rejectedToken);
      return execute();
    }
  }
}

// ─── Form Encoding ──────────────────────────────────────────────────

function encodeForm(fields: Record<string, FormValue>): string {
  const form = new URLSearchParams();
  for (const [key, value] of Object.entries(fields)) {
    if (value === undefined) continue;
    if (Array.isArray(value)) {
      for (const item of value) form.append(key, item);
    } else if (typeof value === 'boolean') {
      form.append(key, value ? '1' : '0');
    } else {
      form.append(key, String(value));
    }
  }
  return form.toString();
}

function indexForm(params: ModifyIndexParams, name?: string): Record<string, FormValue> {
  return {
    name,
    maxTotalDataSizeMB: params.maxDataSizeMb,
    frozenTimePeriodInSecs: params.frozenTimePeriodSecs,
    homePath: params.homePath,
    coldPath: params.coldPath,
    thawedPath: params.thawedPath,
  };
}

function userForm(params: ModifyUserParams, name?: string): Record<string, FormValue> {
  return {
    name,
    password: params.password,
    roles: params.roles,
    realname: params.realName,
    email: params.email,
    defaultApp: params.defaultApp,
  };
}

function roleForm(params: ModifyRoleParams, name?: string): Record<string, FormValue> {
  return {
    name,
    capabilities: params.capabilities,
    imported_roles: params.importedRoles,
    srchIndexesAllowed: params.searchIndexesAllowed,
    srchIndexesDefault: params.searchIndexesDefault,
    defaultApp: params.defaultApp,
  };
}

function macroForm(params: UpdateMacroParams, name?: string): Record<string, FormValue> {
  return {
    name,
    definition: params.definition,
    args: params.args,
    description: params.description,
    disabled: params.disabled,
    iseval: params.isEval,
  };
}

function savedSearchForm(params: UpdateSavedSearchParams, name?: string): Record<string, FormValue> {
  return {
    name,
    search: params.search,
    description: params.description,
    disabled: params.disabled,
    cron_schedule: params.cronSchedule,
    is_scheduled: params.isScheduled,
  };
}
