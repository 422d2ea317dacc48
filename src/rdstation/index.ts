// ============================================================================
// RD Station Module — Barrel Export
// ============================================================================
//
// NOT exported:
// - Setup scripts (src/rdstation/setup/) — one-time utilities, not runtime code

export { RdStationClient, DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS } from './client.js';
export type { RdStationClientOptions, QueryParams, QueryValue, Transport } from './client.js';

export {
  RdStationError,
  ConfigurationError,
  NetworkError,
  TimeoutError,
  ApiError,
  ParseError,
} from './errors.js';

export { JsonValueSchema, isJsonObject, isJsonValue, parseJson } from './json.js';
export type { JsonValue, JsonObject, JsonPrimitive } from './json.js';

export {
  MAX_PER_PAGE,
  DaySchema,
  dealsQueryForDay,
  fetchDealsPage,
  dealsFromPayload,
  isLastPage,
  daysBetween,
  nextDay,
  today,
} from './deals.js';
