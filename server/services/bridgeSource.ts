/**
 * HTTP bridge client for the trading terminal's market-data API.
 *
 * Owns the session (login/logout), request timeout, rate-limit retry and the
 * mapping from the bridge's structured error codes onto the sync error
 * taxonomy. Payload shapes are validated with the schemas in apiSchemas.
 */

import type { z } from 'zod';

import {
  AccountResponseSchema,
  ErrorResponseSchema,
  RatesResponseSchema,
  SymbolsResponseSchema,
  TerminalResponseSchema,
  validateApiResponse,
  type AccountResponse,
  type TerminalResponse,
} from '../lib/apiSchemas.js';
import { toUnixSeconds } from '../lib/dateUtils.js';
import {
  ConnectivityError,
  InvalidRangeError,
  NotFoundError,
  SyncError,
  errorMessage,
  isAbortError,
  isSyncError,
} from '../lib/errors.js';
import { sleepWithAbort, type SleepFn } from '../lib/sleep.js';

// ---------------------------------------------------------------------------
// Source contract
// ---------------------------------------------------------------------------

export interface SourceSymbol {
  name: string;
  visible: boolean;
}

/** What the Source Gateway needs from a market-data provider. */
export interface MarketDataSource {
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  accountInfo(): Promise<AccountResponse>;
  terminalInfo(): Promise<TerminalResponse>;
  listSymbols(): Promise<SourceSymbol[]>;
  selectSymbol(name: string): Promise<void>;
  /** Raw rate records for `[from, to]`; the gateway validates and trims them. */
  fetchRatesRange(symbol: string, timeframeCode: number, from: Date, to: Date): Promise<unknown[]>;
  fetchRatesLatest(symbol: string, timeframeCode: number, count: number): Promise<unknown[]>;
}

// ---------------------------------------------------------------------------
// Bridge error codes
// ---------------------------------------------------------------------------

/** Invalid request parameters (range too large, bad timeframe). */
export const BRIDGE_ERROR_INVALID_PARAMS = -2;
/** Unknown symbol or resource. */
export const BRIDGE_ERROR_NOT_FOUND = -4;

const RATE_LIMIT_MAX_RETRIES = 3;
const RATE_LIMIT_BASE_BACKOFF_MS = 1_500;
const RATE_LIMIT_MAX_BACKOFF_MS = 30_000;
const DEFAULT_TIMEOUT_MS = 15_000;

// ---------------------------------------------------------------------------
// URL helpers
// ---------------------------------------------------------------------------

type QueryParams = Record<string, string | number | boolean | undefined | null>;

function buildBridgeUrl(baseUrl: string, path: string, params: QueryParams = {}): string {
  const normalizedBase = String(baseUrl || '').replace(/\/+$/, '');
  const normalizedPath = String(path || '').replace(/^\/+/, '');
  const url = new URL(`${normalizedBase}/${normalizedPath}`);
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== null && value !== '') {
      url.searchParams.set(key, String(value));
    }
  }
  return url.toString();
}

const SECRET_QUERY_KEYS = ['apiKey', 'apikey', 'api_key', 'token', 'access_token'];

/** Mask credentials carried in a URL before it is logged. */
function sanitizeBridgeUrl(url: string): string {
  try {
    const parsed = new URL(url);
    for (const key of SECRET_QUERY_KEYS) {
      if (parsed.searchParams.has(key)) parsed.searchParams.set(key, '***');
    }
    if (parsed.password) parsed.password = '***';
    return parsed.toString();
  } catch {
    return url;
  }
}

function parseJsonSafe(text: unknown): unknown {
  if (typeof text !== 'string' || !text.trim()) return null;
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/**
 * Map a failed bridge response onto the error taxonomy. Dispatches on the
 * structured `error.code` and the HTTP status only, never on message text.
 */
function classifyBridgeError(status: number, payload: unknown, label: string): SyncError {
  const parsed = ErrorResponseSchema.safeParse(payload);
  const code = parsed.success ? parsed.data.error.code : undefined;
  const detail = parsed.success && parsed.data.error.message ? parsed.data.error.message : `HTTP ${status}`;
  const message = `${label} request failed (${status}): ${detail}`;

  if (status === 429) {
    return new ConnectivityError(message, { httpStatus: status, code });
  }
  if (code === BRIDGE_ERROR_INVALID_PARAMS) {
    return new InvalidRangeError(message, { httpStatus: status, code });
  }
  if (code === BRIDGE_ERROR_NOT_FOUND || status === 404) {
    return new NotFoundError(message, { httpStatus: status, code });
  }
  return new ConnectivityError(message, { httpStatus: status, code });
}

function isRateLimitedError(err: unknown): boolean {
  return isSyncError(err, 'connectivity') && err.httpStatus === 429;
}

function rateLimitBackoffMs(attempt: number): number {
  return Math.min(RATE_LIMIT_MAX_BACKOFF_MS, RATE_LIMIT_BASE_BACKOFF_MS * 2 ** (attempt - 1));
}

// ---------------------------------------------------------------------------
// Client
// ---------------------------------------------------------------------------

export interface HttpBridgeSourceOptions {
  baseUrl: string;
  apiKey?: string;
  login?: string;
  password?: string;
  server?: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
  sleep?: SleepFn;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'DELETE';
  params?: QueryParams;
  body?: Record<string, unknown>;
}

export class HttpBridgeSource implements MarketDataSource {
  private readonly baseUrl: string;
  private readonly apiKey: string;
  private readonly login: string;
  private readonly password: string;
  private readonly server: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private readonly sleep: SleepFn;
  private sessionOpen = false;

  constructor(options: HttpBridgeSourceOptions) {
    this.baseUrl = String(options.baseUrl || '').trim();
    if (!this.baseUrl) {
      throw new Error('SOURCE_BASE_URL is not configured');
    }
    this.apiKey = options.apiKey || '';
    this.login = options.login || '';
    this.password = options.password || '';
    this.server = options.server || '';
    this.timeoutMs = Math.max(1, Math.floor(Number(options.timeoutMs) || DEFAULT_TIMEOUT_MS));
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.sleep = options.sleep ?? sleepWithAbort;
  }

  async connect(): Promise<void> {
    await this.requestJson('/api/v1/session', 'login', {
      method: 'POST',
      body: { login: this.login, password: this.password, server: this.server },
    });
    this.sessionOpen = true;
  }

  async disconnect(): Promise<void> {
    if (!this.sessionOpen) return;
    this.sessionOpen = false;
    await this.requestJson('/api/v1/session', 'logout', { method: 'DELETE' });
  }

  async accountInfo(): Promise<AccountResponse> {
    const payload = await this.requestJson('/api/v1/account', 'account');
    return this.requireValid(AccountResponseSchema, payload, 'account');
  }

  async terminalInfo(): Promise<TerminalResponse> {
    const payload = await this.requestJson('/api/v1/terminal', 'terminal');
    return this.requireValid(TerminalResponseSchema, payload, 'terminal');
  }

  async listSymbols(): Promise<SourceSymbol[]> {
    const payload = await this.requestJson('/api/v1/symbols', 'symbols');
    const data = this.requireValid(SymbolsResponseSchema, payload, 'symbols');
    return data.symbols.map((s) => ({ name: s.name, visible: s.visible !== false }));
  }

  async selectSymbol(name: string): Promise<void> {
    await this.requestJson(`/api/v1/symbols/${encodeURIComponent(name)}/select`, `select ${name}`, {
      method: 'POST',
    });
  }

  async fetchRatesRange(symbol: string, timeframeCode: number, from: Date, to: Date): Promise<unknown[]> {
    const payload = await this.requestJson('/api/v1/rates/range', `rates ${symbol}`, {
      params: { symbol, timeframe: timeframeCode, from: toUnixSeconds(from), to: toUnixSeconds(to) },
    });
    return this.requireValid(RatesResponseSchema, payload, `rates ${symbol}`).rates;
  }

  async fetchRatesLatest(symbol: string, timeframeCode: number, count: number): Promise<unknown[]> {
    const payload = await this.requestJson('/api/v1/rates/latest', `latest ${symbol}`, {
      params: { symbol, timeframe: timeframeCode, count },
    });
    return this.requireValid(RatesResponseSchema, payload, `latest ${symbol}`).rates;
  }

  // -----------------------------------------------------------------------
  // Transport
  // -----------------------------------------------------------------------

  private requireValid<T>(schema: z.ZodType<T>, payload: unknown, label: string): T {
    const data = validateApiResponse(schema, payload, label);
    if (data === null) {
      throw new ConnectivityError(`${label} response failed validation`);
    }
    return data;
  }

  /** One request with rate-limit retry; 429 is retried with exponential backoff. */
  private async requestJson(path: string, label: string, options: RequestOptions = {}): Promise<unknown> {
    let attempt = 0;
    while (true) {
      try {
        return await this.requestJsonOnce(path, label, options);
      } catch (err: unknown) {
        attempt++;
        if (isRateLimitedError(err) && attempt <= RATE_LIMIT_MAX_RETRIES) {
          const backoffMs = rateLimitBackoffMs(attempt);
          console.warn(`[bridge] ${label} rate-limited (attempt ${attempt}/${RATE_LIMIT_MAX_RETRIES}), retrying in ${backoffMs}ms`);
          await this.sleep(backoffMs);
          continue;
        }
        throw err;
      }
    }
  }

  private async requestJsonOnce(path: string, label: string, options: RequestOptions): Promise<unknown> {
    const url = buildBridgeUrl(this.baseUrl, path, options.params);
    const controller = new AbortController();
    let timedOut = false;
    const timeout = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, this.timeoutMs);

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.apiKey) headers.Authorization = `Bearer ${this.apiKey}`;
    if (options.body) headers['Content-Type'] = 'application/json';

    try {
      const resp = await this.fetchImpl(url, {
        method: options.method || 'GET',
        headers,
        body: options.body ? JSON.stringify(options.body) : undefined,
        signal: controller.signal,
      });
      const payload = parseJsonSafe(await resp.text());
      if (!resp.ok) {
        throw classifyBridgeError(resp.status, payload, label);
      }
      return payload;
    } catch (err: unknown) {
      if (isSyncError(err)) throw err;
      if (timedOut || isAbortError(err)) {
        throw new ConnectivityError(`${label} request to ${sanitizeBridgeUrl(url)} timed out after ${this.timeoutMs}ms`, {
          cause: err,
        });
      }
      throw new ConnectivityError(`${label} request to ${sanitizeBridgeUrl(url)} failed: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

export { buildBridgeUrl, classifyBridgeError, rateLimitBackoffMs, sanitizeBridgeUrl };
