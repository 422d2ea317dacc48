/**
 * Deal Export Run — config to exit code
 *
 * Builds the client and exporter from env, runs the export and maps the
 * outcome to a process exit code: 0 when every day exported cleanly, 1 when
 * any day failed or the run could not start (missing token, bad dates).
 * Startup failures print one line to stderr, never a stack trace.
 */

import { loadConfig } from '../config.js';
import type { Env } from '../config.js';
import { RdStationClient } from '../rdstation/client.js';
import type { Transport } from '../rdstation/client.js';
import { DealExporter } from './exporter.js';
import { exportDeals } from './export-deals.js';

export interface RunExportOptions {
  transport?: Transport;
  now?: Date;
}

export async function runExport(env: Env, options: RunExportOptions = {}): Promise<number> {
  try {
    const config = loadConfig(env, options.now);
    const client = new RdStationClient({ ...config.rdStation, transport: options.transport });
    const exporter = new DealExporter(config.export.outputDir);

    console.log('[startup] RD Station deal export starting...', {
      baseUrl: client.baseUrl,
      startDate: config.export.startDate,
      endDate: config.export.endDate,
      perPage: config.export.perPage,
      outputDir: exporter.outputDir,
    });

    const result = await exportDeals(client, exporter, config.export);

    if (result.failures.length > 0) {
      console.error(`[startup] ${result.failures.length} day(s) failed:`);
      for (const failure of result.failures) {
        console.error(`  - ${failure.day} (page ${failure.page}): ${failure.error}`);
      }
      return 1;
    }
    return 0;
  } catch (err) {
    console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
    return 1;
  }
}
