/**
 * Deal Export Run
 *
 * Walks every day from startDate to endDate and, for each day, pages through
 * the deals created that day until a page comes back empty or short.
 *
 * A request failure ends the day it happened on and is recorded in the
 * summary; the run moves on to the next day. Anything other than an
 * RD Station request error propagates.
 */

import type { RdStationClient } from '../rdstation/client.js';
import { daysBetween, dealsFromPayload, fetchDealsPage, isLastPage } from '../rdstation/deals.js';
import { ApiError, ConfigurationError, NetworkError, ParseError } from '../rdstation/errors.js';
import type { JsonValue } from '../rdstation/json.js';
import type { DealExporter } from './exporter.js';

export interface ExportDealsOptions {
  startDate: string;
  endDate: string;
  perPage: number;
}

export interface ExportFailure {
  day: string;
  page: number;
  error: string;
  /** HTTP status for ApiError/ParseError, absent for network failures */
  status?: number;
}

export interface ExportDealsResult {
  days: number;
  pagesSaved: number;
  dealsSaved: number;
  files: string[];
  failures: ExportFailure[];
}

export async function exportDeals(
  client: RdStationClient,
  exporter: DealExporter,
  options: ExportDealsOptions,
): Promise<ExportDealsResult> {
  const { startDate, endDate, perPage } = options;
  if (startDate > endDate) {
    throw new ConfigurationError(`Export start date ${startDate} is after end date ${endDate}`);
  }

  const result: ExportDealsResult = {
    days: 0,
    pagesSaved: 0,
    dealsSaved: 0,
    files: [],
    failures: [],
  };

  for (const day of daysBetween(startDate, endDate)) {
    result.days++;
    await exportDay(client, exporter, day, perPage, result);
  }

  console.log('[export] Finished', {
    startDate,
    endDate,
    days: result.days,
    pagesSaved: result.pagesSaved,
    dealsSaved: result.dealsSaved,
    failedDays: result.failures.length,
  });

  return result;
}

async function exportDay(
  client: RdStationClient,
  exporter: DealExporter,
  day: string,
  perPage: number,
  result: ExportDealsResult,
): Promise<void> {
  for (let page = 1; ; page++) {
    const payload = await fetchOrRecordFailure(client, day, page, perPage, result);
    if (payload === undefined) {
      return;
    }

    const count = dealsFromPayload(payload).length;
    const filePath = await exporter.saveDeals(payload, day, page);
    if (!filePath) {
      console.log(`[export] ${day} page ${page} empty, day done`);
      return;
    }

    result.pagesSaved++;
    result.dealsSaved += count;
    result.files.push(filePath);
    console.log(`[export] ${day} page ${page}: ${count} deals saved`);

    if (isLastPage(payload, perPage)) {
      return;
    }
  }
}

/** Resolves to undefined after recording a request failure. */
async function fetchOrRecordFailure(
  client: RdStationClient,
  day: string,
  page: number,
  perPage: number,
  result: ExportDealsResult,
): Promise<JsonValue | undefined> {
  try {
    return await fetchDealsPage(client, day, page, perPage);
  } catch (error) {
    if (!isRequestError(error)) {
      throw error;
    }
    result.failures.push({
      day,
      page,
      error: error.message,
      ...(error instanceof NetworkError ? {} : { status: error.status }),
    });
    console.error(`[export] ${day} page ${page} failed, skipping rest of day:`, error.message);
    return undefined;
  }
}

function isRequestError(error: unknown): error is NetworkError | ApiError | ParseError {
  return error instanceof NetworkError || error instanceof ApiError || error instanceof ParseError;
}
