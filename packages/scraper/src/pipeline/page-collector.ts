import { createLogger } from '@workspace/logger';
import type { PageTarget } from '../sources/types.js';
import type { CollectOptions, CollectionResult, PageFetcher } from './types.js';

const collectorLog = createLogger('Collector');

/**
 * Fetch each target once, in order. A failed page is recorded and either
 * skipped or ends the run; retrying is left entirely to the fetcher.
 */
export async function collectPages(
  fetcher: PageFetcher,
  targets: readonly PageTarget[],
  options: CollectOptions = {},
): Promise<CollectionResult> {
  const onFailure = options.onFailure ?? 'skip';
  const result: CollectionResult = {
    pages: [],
    failures: [],
    aborted: false,
    notAttempted: [],
  };

  for (const [index, target] of targets.entries()) {
    collectorLog.info(`(${index + 1}/${targets.length}) ${target.label}`);
    const response = await fetcher.fetch(target.url);

    if (response.success) {
      result.pages.push({
        target,
        content: response.content,
        statusCode: response.statusCode,
        finalUrl: response.finalUrl,
        attempts: response.attempts.length,
      });
      continue;
    }

    result.failures.push({
      target,
      errorCode: response.errorCode,
      error: response.error,
      attempts: response.attempts.length,
    });

    if (onFailure === 'abort') {
      result.aborted = true;
      result.notAttempted = targets.slice(index + 1);
      collectorLog.error(
        `Aborting after ${target.label} failed (${response.errorCode}); ${result.notAttempted.length} pages not fetched`,
      );
      break;
    }

    collectorLog.warn(`Skipping ${target.label}: ${response.error}`);
  }

  collectorLog.info(
    `Collected ${result.pages.length}/${targets.length} pages, ${result.failures.length} failed`,
  );

  return result;
}
