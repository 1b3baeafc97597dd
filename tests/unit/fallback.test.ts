import { attempt, fallback, success, withFallback } from '@/modules/fallback';
import {
  CalendarAuthError,
  classifyError,
  EmptyResponseError,
  MissingCredentialError,
  SchemaMismatchError,
} from '@/utils/errors';

describe('fallback policy (unit)', () => {
  /**
   * Purpose:
   * Verifies Core behavior:
   * - success wraps data with its fetch time
   * - fallback carries the reason and omits an absent detail
   */
  it('builds success and fallback results', () => {
    expect(success([1, 2], 1000)).toEqual({ status: 'success', data: [1, 2], fetchedAt: 1000 });
    expect(fallback('mock', 'timeout', undefined, 2000)).toEqual({
      status: 'fallback',
      data: 'mock',
      reason: 'timeout',
      fetchedAt: 2000,
    });
    expect(fallback('mock', 'timeout', 'slow', 2000)).toHaveProperty('detail', 'slow');
  });

  /**
   * Purpose:
   * Verifies Defensive behavior:
   * - a rejected fetch never propagates
   * - mock data is substituted and the reason classified
   */
  it('substitutes mock data when the fetch rejects', async () => {
    const result = await withFallback(
      'weather',
      () => Promise.reject({ code: 'ETIMEDOUT' }),
      () => 'mock'
    );

    expect(result).toMatchObject({ status: 'fallback', data: 'mock', reason: 'timeout' });
  });

  it('returns live data when the fetch resolves', async () => {
    const mock = jest.fn(() => 'mock');
    const result = await withFallback('weather', async () => 'live', mock);

    expect(result).toMatchObject({ status: 'success', data: 'live' });
    expect(mock).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Fault isolation:
   * - sub-call failures become a failed attempt, not an exception
   */
  it('captures a failed sub-call as an attempt', async () => {
    await expect(attempt('lms', 'grades', async () => 3)).resolves.toEqual({ ok: true, value: 3 });
    await expect(
      attempt('lms', 'grades', () => Promise.reject(new EmptyResponseError('Canvas')))
    ).resolves.toEqual({
      ok: false,
      reason: 'empty_response',
      detail: 'Canvas returned no usable data',
    });
  });
});

describe('classifyError (unit)', () => {
  it.each([
    [new MissingCredentialError('OpenWeatherMap API key'), 'not_configured'],
    [new CalendarAuthError('refresh failed', 'TOKEN_REFRESH_FAILED'), 'auth_error'],
    [new SchemaMismatchError('Feed', []), 'schema_mismatch'],
    [new EmptyResponseError('Feed'), 'empty_response'],
    [{ code: 'ECONNABORTED', message: 'timeout of 10000ms exceeded' }, 'timeout'],
    [{ code: 'ERR_BAD_REQUEST', response: { status: 401 } }, 'auth_error'],
    [{ code: 'ERR_BAD_RESPONSE', response: { status: 503 } }, 'api_error'],
    [{ code: 'ENOTFOUND' }, 'network_error'],
    [new Error('boom'), 'unknown'],
    ['weird', 'unknown'],
  ])('classifies %p as %s', (err, reason) => {
    expect(classifyError(err).reason).toBe(reason);
  });

  it('uses the error message as detail', () => {
    expect(classifyError(new MissingCredentialError('Canvas API key')).detail).toBe(
      'Canvas API key is not configured'
    );
    expect(classifyError({ code: 'ETIMEDOUT' }).detail).toBe('ETIMEDOUT');
  });
});
