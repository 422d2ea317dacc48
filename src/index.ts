/**
 * Deal Export Entry Point
 *
 * Exports every RD Station CRM deal created between EXPORT_START_DATE and
 * EXPORT_END_DATE into one JSON file per page under EXPORT_OUTPUT_DIR.
 * Exit codes are decided by runExport (src/export/run-export.ts).
 *
 * Usage:
 *   Production: node dist/index.js
 *   Development: npx tsx src/index.ts
 */

import 'dotenv/config';
import { runExport } from './export/run-export.js';

async function main() {
  process.exitCode = await runExport(process.env);
}

main().catch((err: unknown) => {
  console.error('[startup] Fatal error:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
