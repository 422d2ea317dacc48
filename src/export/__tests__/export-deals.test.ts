/**
 * Tests for exportDeals — day/page walk
 *
 * RD Station is stood in for by a transport that answers per (day, page);
 * page files go to a temp dir.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { RdStationClient, ConfigurationError } from '../../rdstation/index.js';
import { DealExporter } from '../exporter.js';
import { exportDeals } from '../export-deals.js';

// ---------------------------------------------------------------------------
// Fake RD Station
// ---------------------------------------------------------------------------

type Reply = { status: number; body: string };

function deals(count: number, prefix: string) {
  return Array.from({ length: count }, (_, i) => ({ _id: `${prefix}-${i + 1}` }));
}

function json(status: number, value: unknown): Reply {
  return { status, body: JSON.stringify(value) };
}

/** Replies keyed by `<day>#<page>`; anything unlisted is an empty page. */
function fakeTransport(replies: Record<string, Reply | Error>) {
  return vi.fn(async (input: string) => {
    const url = new URL(input);
    const day = (url.searchParams.get('start_date') ?? '').slice(0, 10);
    const key = `${day}#${url.searchParams.get('page')}`;
    const reply = replies[key] ?? json(200, { deals: [] });
    if (reply instanceof Error) {
      throw reply;
    }
    return new Response(reply.body, { status: reply.status });
  });
}

let tmpDir: string;

beforeEach(async () => {
  tmpDir = await mkdtemp(path.join(os.tmpdir(), 'export-deals-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(async () => {
  vi.restoreAllMocks();
  await rm(tmpDir, { recursive: true, force: true });
});

function setup(replies: Record<string, Reply | Error>) {
  const transport = fakeTransport(replies);
  const client = new RdStationClient({ token: 'test-token', baseUrl: 'https://test-api.example.com', transport });
  const exporter = new DealExporter(tmpDir);
  return { transport, client, exporter };
}

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('exportDeals', () => {
  it('pages through a day until a short page', async () => {
    const { transport, client, exporter } = setup({
      '2024-07-30#1': json(200, { deals: deals(2, 'a') }),
      '2024-07-30#2': json(200, { deals: deals(2, 'b') }),
      '2024-07-30#3': json(200, { deals: deals(1, 'c') }),
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-07-30',
      perPage: 2,
    });

    expect(transport).toHaveBeenCalledTimes(3);
    expect(result).toEqual({
      days: 1,
      pagesSaved: 3,
      dealsSaved: 5,
      files: [
        path.join(tmpDir, 'oportunidades_2024-07-30_p1.json'),
        path.join(tmpDir, 'oportunidades_2024-07-30_p2.json'),
        path.join(tmpDir, 'oportunidades_2024-07-30_p3.json'),
      ],
      failures: [],
    });
  });

  it('stops a day on an empty page without writing it', async () => {
    const { transport, client, exporter } = setup({
      '2024-07-30#1': json(200, { deals: deals(2, 'a') }),
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-07-31',
      perPage: 2,
    });

    // day 1: full page then empty page; day 2: empty page
    expect(transport).toHaveBeenCalledTimes(3);
    expect(result.days).toBe(2);
    expect(result.pagesSaved).toBe(1);
    expect((await readdir(tmpDir)).sort()).toEqual(['oportunidades_2024-07-30_p1.json']);
  });

  it('stops a day when has_more is false even on a full page', async () => {
    const { transport, client, exporter } = setup({
      '2024-07-30#1': json(200, { deals: deals(2, 'a'), has_more: false }),
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-07-30',
      perPage: 2,
    });

    expect(transport).toHaveBeenCalledTimes(1);
    expect(result.dealsSaved).toBe(2);
  });

  it('records a failed day and carries on with the next', async () => {
    const { client, exporter } = setup({
      '2024-07-30#1': json(200, { deals: deals(2, 'a') }),
      '2024-07-30#2': json(401, { error: 'unauthorized' }),
      '2024-07-31#1': new Error('socket hang up'),
      '2024-08-01#1': json(200, { deals: deals(1, 'd') }),
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-08-01',
      perPage: 2,
    });

    expect(result.failures).toEqual([
      {
        day: '2024-07-30',
        page: 2,
        status: 401,
        error: 'RD Station API error: 401  for GET /deals',
      },
      {
        day: '2024-07-31',
        page: 1,
        error: 'RD Station request failed: GET /deals: socket hang up',
      },
    ]);
    expect(result.pagesSaved).toBe(2);
    expect(result.dealsSaved).toBe(3);
    expect((await readdir(tmpDir)).sort()).toEqual([
      'oportunidades_2024-07-30_p1.json',
      'oportunidades_2024-08-01_p1.json',
    ]);
  });

  it('records malformed JSON as a failure with its status', async () => {
    const { client, exporter } = setup({
      '2024-07-30#1': { status: 200, body: '{"deals": [' },
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-07-30',
      perPage: 2,
    });

    expect(result.failures).toEqual([
      {
        day: '2024-07-30',
        page: 1,
        status: 200,
        error: 'RD Station returned malformed JSON (200) for GET /deals',
      },
    ]);
  });

  it('saves pages holding deeply nested deals', async () => {
    const depth = 1000;
    const nested = '['.repeat(depth) + ']'.repeat(depth);
    const { client, exporter } = setup({
      '2024-07-30#1': { status: 200, body: `{"deals": [{"_id": "a-1", "history": ${nested}}]}` },
    });

    const result = await exportDeals(client, exporter, {
      startDate: '2024-07-30',
      endDate: '2024-07-30',
      perPage: 2,
    });

    expect(result.failures).toEqual([]);
    expect(result.dealsSaved).toBe(1);
  });

  it('rejects a start date after the end date', async () => {
    const { transport, client, exporter } = setup({});

    await expect(
      exportDeals(client, exporter, { startDate: '2024-08-01', endDate: '2024-07-30', perPage: 2 }),
    ).rejects.toThrow(ConfigurationError);
    expect(transport).not.toHaveBeenCalled();
  });

  it('propagates errors that are not request failures', async () => {
    const { client } = setup({
      '2024-07-30#1': json(200, { deals: deals(1, 'a') }),
    });
    const exporter = new DealExporter(tmpDir);
    vi.spyOn(exporter, 'saveDeals').mockRejectedValueOnce(new Error('EACCES: permission denied'));

    await expect(
      exportDeals(client, exporter, { startDate: '2024-07-30', endDate: '2024-07-30', perPage: 2 }),
    ).rejects.toThrow('EACCES: permission denied');
  });
});
