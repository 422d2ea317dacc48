// ============================================================================
// RD Station CRM Client — Authenticated JSON requests
// ============================================================================
//
// Usage:
//   const client = new RdStationClient({ token: config.rdStation.token });
//   const deals = await client.get('/deals', { page: 1 });
//
// The client handles:
// - Token injection (`token` query parameter, RD Station CRM's auth scheme)
// - JSON request/response encoding
// - Request timeout (AbortController, enforced even if the transport ignores it)
// - Mapping failures onto the typed errors in ./errors.ts
//
// Each call is a single attempt: no retries, no caching, no paging.

import { ApiError, ConfigurationError, NetworkError, ParseError, TimeoutError } from './errors.js';
import { parseJson } from './json.js';
import type { JsonValue } from './json.js';

export const DEFAULT_BASE_URL = 'https://crm.rdstation.com/api/v1';
export const DEFAULT_TIMEOUT_MS = 30_000;

export type Transport = (input: string, init: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | undefined;
export type QueryParams = Record<string, QueryValue>;

export interface RdStationClientOptions {
  token: string | null | undefined;
  baseUrl?: string;
  timeoutMs?: number;
  /** Defaults to the global fetch, looked up per call */
  transport?: Transport;
}

type HttpMethod = 'GET' | 'POST';

export class RdStationClient {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly token: string;
  private readonly transport: Transport;

  constructor(options: RdStationClientOptions) {
    const token = options.token?.trim();
    if (!token) {
      throw new ConfigurationError(
        'RD Station token is missing. Set RD_STATION_TOKEN in .env (see .env.example).',
      );
    }

    const baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    if (!isHttpUrl(baseUrl)) {
      throw new ConfigurationError(`RD Station base URL must be an absolute http(s) URL, got "${baseUrl}"`);
    }

    const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    if (!Number.isInteger(timeoutMs) || timeoutMs <= 0) {
      throw new ConfigurationError(`RD Station timeout must be a positive integer (ms), got ${timeoutMs}`);
    }

    this.token = token;
    this.baseUrl = baseUrl;
    this.timeoutMs = timeoutMs;
    this.transport = options.transport ?? ((input, init) => fetch(input, init));
  }

  /** GET `path` with the token and `params` in the query string. */
  async get(path: string, params: QueryParams = {}): Promise<JsonValue> {
    return this.request('GET', path, params);
  }

  /** POST a JSON `body` to `path`. */
  async post(path: string, body?: JsonValue, params: QueryParams = {}): Promise<JsonValue> {
    return this.request('POST', path, params, body);
  }

  private async request(
    method: HttpMethod,
    path: string,
    params: QueryParams,
    body?: JsonValue,
  ): Promise<JsonValue> {
    const url = this.buildUrl(path, params);
    const label = `${method} ${normalizePath(path)}`;

    const headers: Record<string, string> = { Accept: 'application/json' };
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }

    const { response, responseText } = await this.send(url, label, {
      method,
      headers,
      ...(body !== undefined ? { body: JSON.stringify(body) } : {}),
    });

    if (!response.ok) {
      const errorBody = parseJson(responseText);
      throw new ApiError(
        `RD Station API error: ${response.status} ${response.statusText} for ${label}`,
        response.status,
        errorBody === undefined ? responseText : errorBody,
        responseText,
      );
    }

    if (responseText.trim() === '') {
      return null;
    }

    const data = parseJson(responseText);
    if (data === undefined) {
      throw new ParseError(
        `RD Station returned malformed JSON (${response.status}) for ${label}`,
        response.status,
        responseText,
      );
    }
    return data;
  }

  private async send(
    url: string,
    label: string,
    init: RequestInit,
  ): Promise<{ response: Response; responseText: string }> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);
    // Settles the race even when a transport ignores `signal`
    const aborted = new Promise<never>((_resolve, reject) => {
      controller.signal.addEventListener('abort', () => reject(new Error('Request aborted')), { once: true });
    });

    try {
      const response = await Promise.race([this.transport(url, { ...init, signal: controller.signal }), aborted]);
      const responseText = await Promise.race([response.text(), aborted]);
      return { response, responseText };
    } catch (error) {
      if (controller.signal.aborted) {
        throw new TimeoutError(`RD Station request timed out after ${this.timeoutMs}ms: ${label}`, this.timeoutMs);
      }
      throw new NetworkError(
        `RD Station request failed: ${label}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    } finally {
      clearTimeout(timer);
    }
  }

  private buildUrl(path: string, params: QueryParams): string {
    const url = new URL(`${this.baseUrl}${normalizePath(path)}`);
    url.searchParams.set('token', this.token);
    for (const [key, value] of Object.entries(params)) {
      if (value === undefined) continue;
      url.searchParams.set(key, String(value));
    }
    return url.toString();
  }
}

function normalizePath(path: string): string {
  return path.startsWith('/') ? path : `/${path}`;
}

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'https:' || url.protocol === 'http:';
  } catch {
    return false;
  }
}
