// ============================================================================
// RD Station Deals — Per-day deal queries
// ============================================================================
//
// RD Station CRM filters deals by creation period with `created_at_period=true`
// plus a start/end timestamp. A day is queried from 00:00:01 to 23:59:59.

import { z } from 'zod';
import type { RdStationClient } from './client.js';
import { JsonValueSchema } from './json.js';
import type { JsonValue } from './json.js';

/** Upper bound RD Station accepts for `per_page` */
export const MAX_PER_PAGE = 200;

/** A calendar day, `YYYY-MM-DD` */
export const DaySchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD')
  .refine(isCalendarDay, 'not a calendar date');

const DealsEnvelopeSchema = z
  .object({
    deals: z.array(JsonValueSchema),
    has_more: z.boolean().optional(),
  })
  .passthrough();

export function dealsQueryForDay(
  day: string,
  page: number,
  perPage: number,
): Record<string, string | number | boolean> {
  return {
    created_at_period: true,
    start_date: `${day}T00:00:01`,
    end_date: `${day}T23:59:59`,
    page,
    per_page: perPage,
  };
}

/** GET one page of the deals created on `day`. */
export async function fetchDealsPage(
  client: RdStationClient,
  day: string,
  page: number,
  perPage: number,
): Promise<JsonValue> {
  return client.get('/deals', dealsQueryForDay(day, page, perPage));
}

/**
 * Deals carried by a deals response.
 * Accepts both a bare array and the `{ deals: [...] }` envelope.
 */
export function dealsFromPayload(payload: JsonValue): JsonValue[] {
  if (Array.isArray(payload)) {
    return payload;
  }
  const envelope = DealsEnvelopeSchema.safeParse(payload);
  return envelope.success ? envelope.data.deals : [];
}

/** True when no page follows `payload`. */
export function isLastPage(payload: JsonValue, perPage: number): boolean {
  const envelope = DealsEnvelopeSchema.safeParse(payload);
  if (envelope.success && envelope.data.has_more === false) {
    return true;
  }
  return dealsFromPayload(payload).length < perPage;
}

// ---------------------------------------------------------------------------
// Day arithmetic (UTC, so DST never shifts a day)
// ---------------------------------------------------------------------------

function toUtcDate(day: string): Date {
  const [year, month, date] = day.split('-').map(Number);
  return new Date(Date.UTC(year, month - 1, date));
}

function isCalendarDay(day: string): boolean {
  const date = toUtcDate(day);
  return !Number.isNaN(date.getTime()) && date.toISOString().slice(0, 10) === day;
}

export function nextDay(day: string): string {
  const date = toUtcDate(day);
  date.setUTCDate(date.getUTCDate() + 1);
  return date.toISOString().slice(0, 10);
}

/** Every day from `start` to `end`, inclusive. Empty when `start` is after `end`. */
export function daysBetween(start: string, end: string): string[] {
  const days: string[] = [];
  for (let day = start; day <= end; day = nextDay(day)) {
    days.push(day);
  }
  return days;
}

export function today(now: Date = new Date()): string {
  return now.toISOString().slice(0, 10);
}
