import { mkdir, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { log } from '@workspace/logger';
import { z } from 'zod';
import {
  booleanFlagSchema,
  formatJson,
  resolveFetcher,
  type ActionDeps,
} from './shared.js';

const fetchArgsSchema = z.object({
  url: z
    .string({ required_error: 'Missing required option: --url' })
    .trim()
    .url('Invalid --url. Must be an absolute http(s) URL.')
    .refine((value) => /^https?:\/\//i.test(value), {
      message: 'Invalid --url. Must be an absolute http(s) URL.',
    }),
  outputFile: z.preprocess(
    (value) => {
      if (typeof value === 'string') {
        const trimmed = value.trim();
        return trimmed.length ? trimmed : undefined;
      }

      return value;
    },
    z.string().min(1, 'Invalid --outputFile path').optional(),
  ),
  pretty: booleanFlagSchema,
});

type FetchArgs = z.infer<typeof fetchArgsSchema>;

/**
 * Fetch a single page and print (or save) its raw content.
 */
export async function runFetchAction(
  args: FetchArgs,
  deps: ActionDeps = {},
): Promise<number> {
  const fetcher = resolveFetcher(deps);
  if (!fetcher) {
    return 1;
  }

  try {
    const response = await fetcher.fetch(args.url);

    if (!response.success) {
      console.error(
        formatJson(
          {
            success: false,
            errorCode: response.errorCode,
            error: response.error,
            attempts: response.attempts,
            metadata: response.metadata,
          },
          args.pretty,
        ),
      );
      return 1;
    }

    if (args.outputFile) {
      await mkdir(dirname(args.outputFile), { recursive: true });
      await writeFile(args.outputFile, response.content, 'utf-8');
      log.info(`Saved ${args.url} to ${args.outputFile}`);
    } else {
      console.log(response.content);
    }

    return 0;
  } finally {
    fetcher.metrics.log(log);
  }
}

export { fetchArgsSchema };
export type { FetchArgs };
