import { OAuthToken } from '../interfaces/calendar';
import { CalendarAuthError } from '../utils/errors';
import { deleteTokenCache, readTokenCache, writeTokenCache } from './tokenCache';
import { logger } from '../logger';

/** Refresh this long before the access token actually expires */
export const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

export interface RefreshedToken {
  access_token: string;
  expiry_date: number;
  refresh_token?: string;
  token_type?: string;
  scope?: string;
}

export interface TokenRefresher {
  refresh(refreshToken: string): Promise<RefreshedToken>;
}

/** Interactive browser consent, provided by the caller */
export type ConsentFlow = () => Promise<OAuthToken>;

export interface CalendarAuthenticatorOptions {
  tokenPath: string;
  refresher: TokenRefresher;
  consent?: ConsentFlow;
  clock?: () => number;
}

/**
 * Owns the OAuth token cache: loads it, refreshes it silently before
 * expiry, and re-runs consent when nothing usable is cached.
 */
export class CalendarAuthenticator {
  private readonly tokenPath: string;
  private readonly refresher: TokenRefresher;
  private readonly consent?: ConsentFlow;
  private readonly clock: () => number;

  constructor(options: CalendarAuthenticatorOptions) {
    this.tokenPath = options.tokenPath;
    this.refresher = options.refresher;
    this.consent = options.consent;
    this.clock = options.clock ?? Date.now;
  }

  async authenticate(): Promise<OAuthToken> {
    const cached = await readTokenCache(this.tokenPath);

    if (!cached) {
      return this.runConsent();
    }

    if (this.clock() < cached.expiry_date - EXPIRY_BUFFER_MS) {
      return cached;
    }

    let refreshed: RefreshedToken;
    try {
      refreshed = await this.refresher.refresh(cached.refresh_token);
    } catch (err) {
      // next invocation starts over with consent
      await deleteTokenCache(this.tokenPath);
      throw new CalendarAuthError(
        'Failed to refresh access token. Re-run authorize to grant access again.',
        'TOKEN_REFRESH_FAILED',
        err
      );
    }

    const token: OAuthToken = {
      ...cached,
      ...refreshed,
      refresh_token: refreshed.refresh_token || cached.refresh_token,
    };
    await writeTokenCache(this.tokenPath, token);
    logger.info({ expiresAt: new Date(token.expiry_date).toISOString() }, 'Calendar token refreshed');

    return token;
  }

  private async runConsent(): Promise<OAuthToken> {
    if (!this.consent) {
      throw new CalendarAuthError(
        'No cached calendar token and no interactive consent available',
        'CONSENT_REQUIRED'
      );
    }

    logger.info('No usable calendar token cached, starting consent flow');

    let token: OAuthToken;
    try {
      token = await this.consent();
    } catch (err) {
      throw new CalendarAuthError('Calendar consent flow failed', 'INVALID_CREDENTIALS', err);
    }

    await writeTokenCache(this.tokenPath, token);
    return token;
  }
}
