/**
 * Deal Exporter
 *
 * Writes each fetched deals page verbatim to
 * `<outputDir>/oportunidades_<YYYY-MM-DD>_p<page>.json` (4-space indent, UTF-8).
 * Pages without deals are skipped.
 */

import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { dealsFromPayload } from '../rdstation/deals.js';
import type { JsonValue } from '../rdstation/json.js';

export function pageFileName(day: string, page: number): string {
  return `oportunidades_${day}_p${page}.json`;
}

export class DealExporter {
  readonly outputDir: string;
  private ready: Promise<string | undefined> | null = null;

  constructor(outputDir: string) {
    this.outputDir = path.resolve(outputDir);
  }

  /**
   * Save one page of deals.
   * @returns the written file path, or null when the page held no deals
   */
  async saveDeals(payload: JsonValue, day: string, page: number): Promise<string | null> {
    if (dealsFromPayload(payload).length === 0) {
      return null;
    }

    await this.ensureOutputDir();
    const filePath = path.join(this.outputDir, pageFileName(day, page));
    await writeFile(filePath, JSON.stringify(payload, null, 4), 'utf-8');
    return filePath;
  }

  private ensureOutputDir(): Promise<string | undefined> {
    // A failed mkdir is not cached; the next save tries again
    this.ready ??= mkdir(this.outputDir, { recursive: true }).catch((error: unknown) => {
      this.ready = null;
      throw error;
    });
    return this.ready;
  }
}
