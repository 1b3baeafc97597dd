/**
 * Why a source delivered fallback data instead of live data.
 */
export type FallbackReason =
  | 'not_configured'
  | 'timeout'
  | 'network_error'
  | 'auth_error'
  | 'api_error'
  | 'schema_mismatch'
  | 'empty_response'
  | 'all_sources_failed'
  | 'unknown';

export type FetchResult<T> =
  | {
      status: 'success';
      data: T;
      fetchedAt: number;
    }
  | {
      status: 'fallback';
      data: T;
      reason: FallbackReason;
      detail?: string;
      fetchedAt: number;
    };

/**
 * Outcome of one fault-isolated sub-call inside a fetcher.
 */
export type Attempt<T> =
  | { ok: true; value: T }
  | { ok: false; reason: FallbackReason; detail: string };
