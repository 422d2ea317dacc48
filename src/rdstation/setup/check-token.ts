/**
 * Setup script: verify that RD_STATION_TOKEN is accepted by RD Station CRM.
 *
 * Run with: npx tsx src/rdstation/setup/check-token.ts
 *
 * This script does NOT modify any data in the CRM.
 */

import 'dotenv/config';
import { checkToken } from '../token-check.js';

async function main() {
  process.exitCode = await checkToken(process.env);
}

main().catch((err: unknown) => {
  console.error('[check-token] Failed:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
