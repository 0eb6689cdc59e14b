import { log } from '@workspace/logger';
import { z } from 'zod';
import { loadFetcherConfig } from '../config/fetcher-config.js';
import { collectPages } from '../pipeline/page-collector.js';
import type { CollectionResult, FailurePolicy } from '../pipeline/types.js';
import type { PageTarget } from '../sources/types.js';
import { FetcherConfigError } from '../utils/errors.js';
import { ResilientFetcher } from '../web-engine/resilient-fetcher.js';

const booleanFromCliSchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

export const booleanFlagSchema = z.preprocess((value) => {
  if (value === undefined) {
    return 'false';
  }

  if (typeof value === 'string') {
    return value.toLowerCase();
  }

  return value;
}, booleanFromCliSchema);

export const onFailureSchema = z
  .enum(['skip', 'abort'], {
    errorMap: () => ({ message: 'Invalid --onFailure. Use skip or abort.' }),
  })
  .default('skip');

type ActionDeps = {
  fetcher?: ResilientFetcher;
};

type CollectionActionOptions = {
  onFailure: FailurePolicy;
  pretty: boolean;
};

export function formatJson(value: unknown, pretty: boolean): string {
  return pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value);
}

/**
 * The injected fetcher, or one configured from SCRAPER_* variables.
 * Prints the problem and returns undefined when the environment is invalid.
 */
export function resolveFetcher(deps: ActionDeps): ResilientFetcher | undefined {
  if (deps.fetcher) {
    return deps.fetcher;
  }

  try {
    return new ResilientFetcher(loadFetcherConfig());
  } catch (error) {
    if (error instanceof FetcherConfigError) {
      console.error(error.message);
      return undefined;
    }

    throw error;
  }
}

export function summarizeCollection(result: CollectionResult) {
  return {
    aborted: result.aborted,
    pages: result.pages.map((page) => ({
      label: page.target.label,
      url: page.target.url,
      statusCode: page.statusCode,
      attempts: page.attempts,
      bytes: Buffer.byteLength(page.content, 'utf8'),
    })),
    failures: result.failures.map((failure) => ({
      label: failure.target.label,
      url: failure.target.url,
      errorCode: failure.errorCode,
      error: failure.error,
      attempts: failure.attempts,
    })),
    notAttempted: result.notAttempted.map((target) => target.label),
  };
}

/**
 * Fetch a list of targets and print a JSON summary. Exit code 1 when any page
 * could not be retrieved.
 */
export async function runCollectionAction(
  targets: readonly PageTarget[],
  options: CollectionActionOptions,
  deps: ActionDeps = {},
): Promise<number> {
  const fetcher = resolveFetcher(deps);
  if (!fetcher) {
    return 1;
  }

  const startTime = Date.now();
  log.info('Starting collection', { pages: targets.length, onFailure: options.onFailure });

  try {
    const result = await collectPages(fetcher, targets, {
      onFailure: options.onFailure,
    });
    console.log(formatJson(summarizeCollection(result), options.pretty));

    log.info(`Execution finished in ${Date.now() - startTime}ms`);
    return result.failures.length > 0 ? 1 : 0;
  } finally {
    fetcher.metrics.log(log);
  }
}

export type { ActionDeps, CollectionActionOptions };
