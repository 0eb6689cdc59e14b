const NETWORK_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNRESET',
  'ECONNREFUSED',
  'ECONNABORTED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ERR_NETWORK',
]);

/**
 * A request that never produced an HTTP response.
 */
export class TransportError extends Error {
  readonly code: string | undefined;

  constructor(message: string, options: { code?: string; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransportError';
    this.code = options.code;
  }

  get isNetworkError(): boolean {
    return this.code !== undefined && NETWORK_ERROR_CODES.has(this.code);
  }
}

export class FetcherConfigError extends Error {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid fetcher configuration: ${issues.join('; ')}`);
    this.name = 'FetcherConfigError';
    this.issues = issues;
  }
}
