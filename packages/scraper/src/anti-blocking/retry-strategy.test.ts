import { describe, it, expect } from 'vitest';
import { RetryStrategy, buildBackoffSchedule, isRecoverable } from './retry-strategy.js';
import { TransportError } from '../utils/errors.js';

describe('buildBackoffSchedule', () => {
  it('builds a linear schedule', () => {
    expect(
      buildBackoffSchedule({ strategy: 'linear', baseMs: 5000, steps: 3 }),
    ).toEqual([5000, 10000, 15000]);
  });

  it('builds an exponential schedule', () => {
    expect(
      buildBackoffSchedule({ strategy: 'exponential', baseMs: 1000, steps: 4 }),
    ).toEqual([1000, 2000, 4000, 8000]);
  });

  it('returns an empty schedule for zero or negative steps', () => {
    expect(
      buildBackoffSchedule({ strategy: 'linear', baseMs: 5000, steps: 0 }),
    ).toEqual([]);
    expect(
      buildBackoffSchedule({ strategy: 'linear', baseMs: 5000, steps: -2 }),
    ).toEqual([]);
  });
});

describe('RetryStrategy', () => {
  const strategy = new RetryStrategy({
    maxRetries: 3,
    backoffScheduleMs: [100, 200],
  });

  it('classifies 2xx as success', () => {
    expect(strategy.classifyStatus(200)).toBe('success');
    expect(strategy.classifyStatus(204)).toBe('success');
  });

  it('classifies 403 as blocked', () => {
    expect(strategy.classifyStatus(403)).toBe('blocked');
  });

  it('classifies 429 as rate-limited', () => {
    expect(strategy.classifyStatus(429)).toBe('rate-limited');
  });

  it('classifies other 4xx as client-error', () => {
    expect(strategy.classifyStatus(404)).toBe('client-error');
    expect(strategy.classifyStatus(400)).toBe('client-error');
    expect(strategy.classifyStatus(410)).toBe('client-error');
  });

  it('classifies 5xx as transient-error', () => {
    expect(strategy.classifyStatus(500)).toBe('transient-error');
    expect(strategy.classifyStatus(503)).toBe('transient-error');
  });

  it('classifies unfollowed redirects as unexpected', () => {
    expect(strategy.classifyStatus(301)).toBe('unexpected');
    expect(strategy.classifyStatus(304)).toBe('unexpected');
  });

  it('classifies network transport errors as transient-error', () => {
    const error = new TransportError('read ECONNRESET', { code: 'ECONNRESET' });
    expect(strategy.classifyError(error)).toBe('transient-error');
  });

  it('classifies timeout messages as transient-error', () => {
    expect(strategy.classifyError(new Error('Request timeout'))).toBe(
      'transient-error',
    );
  });

  it('classifies unknown failures as unexpected', () => {
    const error = new TransportError('Invalid URL', { code: 'ERR_INVALID_URL' });
    expect(strategy.classifyError(error)).toBe('unexpected');
    expect(strategy.classifyError('boom')).toBe('unexpected');
  });

  it('retries recoverable failures with the scheduled wait', () => {
    expect(strategy.decide('rate-limited', 1)).toEqual({
      shouldRetry: true,
      recoverable: true,
      delayMs: 100,
      status: 'rate-limited',
    });
    expect(strategy.decide('blocked', 2).delayMs).toBe(200);
    expect(strategy.decide('transient-error', 2).shouldRetry).toBe(true);
  });

  it('stops retrying once maxRetries attempts were made', () => {
    expect(strategy.decide('blocked', 3)).toEqual({
      shouldRetry: false,
      recoverable: true,
      delayMs: 0,
      status: 'blocked',
    });
  });

  it('never retries client errors', () => {
    expect(strategy.decide('client-error', 1)).toEqual({
      shouldRetry: false,
      recoverable: false,
      delayMs: 0,
      status: 'client-error',
    });
  });

  it('never retries unexpected failures', () => {
    expect(strategy.decide('unexpected', 1).shouldRetry).toBe(false);
  });

  it('applies no backoff before the first attempt', () => {
    expect(strategy.backoffBefore(1)).toBe(0);
    expect(strategy.backoffBefore(2)).toBe(100);
    expect(strategy.backoffBefore(3)).toBe(200);
  });

  it('reuses the last scheduled wait past the end of the schedule', () => {
    expect(strategy.backoffBefore(5)).toBe(200);
  });

  it('reports which statuses are recoverable', () => {
    expect(isRecoverable('rate-limited')).toBe(true);
    expect(isRecoverable('transient-error')).toBe(true);
    expect(isRecoverable('client-error')).toBe(false);
    expect(isRecoverable('success')).toBe(false);
  });
});
