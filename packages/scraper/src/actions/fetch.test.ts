import { mkdtemp, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { fetchArgsSchema, runFetchAction } from './fetch.js';
import { ResilientFetcher } from '../web-engine/resilient-fetcher.js';
import { FakeClock, ScriptedTransport } from '../testing/fakes.js';

const PAGE_URL = 'https://fbref.com/en/comps/9/Premier-League-Stats';

function setup(script: ConstructorParameters<typeof ScriptedTransport>[1]) {
  const clock = new FakeClock();
  const transport = new ScriptedTransport(clock, script);
  const fetcher = new ResilientFetcher(
    { minIntervalMs: 0, maxRetries: 2, backoffScheduleMs: [100] },
    { transport, clock },
  );
  return { transport, fetcher };
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('fetchArgsSchema', () => {
  it('requires an absolute http(s) URL', () => {
    expect(fetchArgsSchema.safeParse({}).error?.issues[0]?.message).toBe(
      'Missing required option: --url',
    );
    expect(
      fetchArgsSchema.safeParse({ url: 'ftp://fbref.com/' }).error?.issues[0]?.message,
    ).toBe('Invalid --url. Must be an absolute http(s) URL.');
  });

  it('treats a blank output file as unset', () => {
    const args = fetchArgsSchema.parse({ url: PAGE_URL, outputFile: '  ' });

    expect(args.outputFile).toBeUndefined();
  });
});

describe('runFetchAction', () => {
  it('prints the page content', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { fetcher } = setup([200]);

    const exitCode = await runFetchAction(fetchArgsSchema.parse({ url: PAGE_URL }), {
      fetcher,
    });

    expect(exitCode).toBe(0);
    expect(logSpy).toHaveBeenCalledWith(
      `<html><body>status 200 for ${PAGE_URL}</body></html>`,
    );
  });

  it('writes the page content to the output file', async () => {
    const dir = await mkdtemp(join(tmpdir(), 'fetch-action-'));
    const outputFile = join(dir, 'nested', 'page.html');
    const { fetcher } = setup([429, 200]);

    try {
      const exitCode = await runFetchAction(
        fetchArgsSchema.parse({ url: PAGE_URL, outputFile }),
        { fetcher },
      );

      expect(exitCode).toBe(0);
      expect(await readFile(outputFile, 'utf-8')).toBe(
        `<html><body>status 200 for ${PAGE_URL}</body></html>`,
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });

  it('prints the failure and exits with 1', async () => {
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const { transport, fetcher } = setup([403]);

    const exitCode = await runFetchAction(fetchArgsSchema.parse({ url: PAGE_URL }), {
      fetcher,
    });

    expect(exitCode).toBe(1);
    expect(transport.requests).toHaveLength(2);
    expect(JSON.parse(String(errorSpy.mock.calls[0]?.[0]))).toMatchObject({
      success: false,
      errorCode: 'exhausted',
      error: `Gave up on ${PAGE_URL} after 2 attempts (last: blocked (HTTP 403))`,
      metadata: { method: 'http-get' },
    });
  });
});
