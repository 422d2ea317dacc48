// ============================================================================
// RD Station Error Types — Typed errors for API call failures
// ============================================================================

import type { JsonValue } from './json.js';

/**
 * Base error for everything the RD Station client throws.
 * Messages NEVER include the API token or deal/lead contents.
 */
export class RdStationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'RdStationError';
  }
}

/**
 * Thrown when the client or a script is started with missing or invalid
 * settings (empty token, malformed base URL, bad env var).
 */
export class ConfigurationError extends RdStationError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/** The request never produced an HTTP response (DNS, refused connection, reset). */
export class NetworkError extends RdStationError {
  constructor(message: string) {
    super(message);
    this.name = 'NetworkError';
  }
}

/** The request was aborted after the client's timeout elapsed. */
export class TimeoutError extends NetworkError {
  readonly timeoutMs: number;

  constructor(message: string, timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Non-2xx HTTP response.
 * `body` is the parsed JSON body, or the raw text when it is not JSON.
 */
export class ApiError extends RdStationError {
  readonly status: number;
  readonly body: JsonValue;
  readonly responseText: string;

  constructor(message: string, status: number, body: JsonValue, responseText: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.body = body;
    this.responseText = responseText;
  }
}

/** A 2xx response whose body is not valid JSON. */
export class ParseError extends RdStationError {
  readonly status: number;
  readonly responseText: string;

  constructor(message: string, status: number, responseText: string) {
    super(message);
    this.name = 'ParseError';
    this.status = status;
    this.responseText = responseText;
  }
}
