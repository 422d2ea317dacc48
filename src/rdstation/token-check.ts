/**
 * Token check — verifies that RD_STATION_TOKEN is accepted by RD Station CRM.
 *
 * Calls GET /token/check and prints the account the token belongs to.
 * Read-only. Resolves to the process exit code: 0 accepted, 1 otherwise.
 */

import { loadRdStationConfig } from '../config.js';
import type { Env } from '../config.js';
import { RdStationClient } from './client.js';
import type { Transport } from './client.js';
import { ApiError } from './errors.js';
import { isJsonObject } from './json.js';

const ACCOUNT_KEYS = ['name', 'account_id', 'email'];

export async function checkToken(env: Env, transport?: Transport): Promise<number> {
  try {
    const client = new RdStationClient({ ...loadRdStationConfig(env), transport });
    const account = await client.get('/token/check');

    console.log('[check-token] Token accepted.');
    if (isJsonObject(account)) {
      for (const key of ACCOUNT_KEYS) {
        const value = account[key];
        if (typeof value === 'string' || typeof value === 'number') {
          console.log(`  ${key}: ${value}`);
        }
      }
    }
    return 0;
  } catch (err) {
    if (err instanceof ApiError && err.status === 401) {
      console.error('[check-token] Token rejected (401). Check RD_STATION_TOKEN in .env.');
    } else {
      console.error('[check-token] Failed:', err instanceof Error ? err.message : String(err));
    }
    return 1;
  }
}
