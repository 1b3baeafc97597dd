import { Attempt, FallbackReason, FetchResult } from '../interfaces/fetchResult';
import { classifyError } from '../utils/errors';
import { logger } from '../logger';

export function success<T>(data: T, fetchedAt = Date.now()): FetchResult<T> {
  return { status: 'success', data, fetchedAt };
}

export function fallback<T>(
  data: T,
  reason: FallbackReason,
  detail?: string,
  fetchedAt = Date.now()
): FetchResult<T> {
  return detail === undefined
    ? { status: 'fallback', data, reason, fetchedAt }
    : { status: 'fallback', data, reason, detail, fetchedAt };
}

/**
 * Runs a source fetch and substitutes mock data on any failure.
 * Never rejects.
 */
export async function withFallback<T>(
  source: string,
  fetch: () => Promise<T>,
  mock: () => T
): Promise<FetchResult<T>> {
  try {
    const data = await fetch();
    logger.debug({ source }, 'Source fetched');
    return success(data);
  } catch (err) {
    const { reason, detail } = classifyError(err);
    logger.warn({ source, reason, detail }, 'Source unavailable, using fallback data');
    return fallback(mock(), reason, detail);
  }
}

/**
 * Fault-isolates one sub-call of a composite fetcher.
 */
export async function attempt<T>(
  source: string,
  call: string,
  fn: () => Promise<T>
): Promise<Attempt<T>> {
  try {
    return { ok: true, value: await fn() };
  } catch (err) {
    const { reason, detail } = classifyError(err);
    logger.warn({ source, call, reason, detail }, 'Sub-call failed');
    return { ok: false, reason, detail };
  }
}
