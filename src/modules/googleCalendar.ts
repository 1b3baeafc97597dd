/**
 * Google-backed collaborators for the calendar fetcher: the OAuth2 client
 * used for refresh and consent, and the Calendar v3 event source.
 */

import readline from 'readline/promises';
import { google, type Auth, type calendar_v3 } from 'googleapis';
import { OAuthToken } from '../interfaces/calendar';
import { CalendarConfig } from '../schemas/config.schema';
import { CalendarAuthError, MissingCredentialError } from '../utils/errors';
import { CalendarAuthenticator, ConsentFlow, RefreshedToken, TokenRefresher } from './calendarAuth';
import { CalendarEventsSource } from './calendar';

const CALENDAR_SCOPES = ['https://www.googleapis.com/auth/calendar.readonly'];

function toRefreshedToken(credentials: Auth.Credentials): RefreshedToken {
  if (!credentials.access_token || !credentials.expiry_date) {
    throw new CalendarAuthError(
      'Token endpoint returned no access token or expiry',
      'INVALID_CREDENTIALS'
    );
  }

  const token: RefreshedToken = {
    access_token: credentials.access_token,
    expiry_date: credentials.expiry_date,
  };
  if (credentials.refresh_token) token.refresh_token = credentials.refresh_token;
  if (credentials.token_type) token.token_type = credentials.token_type;
  if (credentials.scope) token.scope = credentials.scope;
  return token;
}

export class GoogleOAuthClient implements TokenRefresher {
  private readonly client: Auth.OAuth2Client;

  constructor(clientId: string, clientSecret: string, redirectUri: string) {
    this.client = new google.auth.OAuth2(clientId, clientSecret, redirectUri);
  }

  static fromConfig(config: CalendarConfig): GoogleOAuthClient {
    if (!config.clientId || !config.clientSecret) {
      throw new MissingCredentialError('Google Calendar client id/secret');
    }
    return new GoogleOAuthClient(config.clientId, config.clientSecret, config.redirectUri);
  }

  async refresh(refreshToken: string): Promise<RefreshedToken> {
    this.client.setCredentials({ refresh_token: refreshToken });
    const { credentials } = await this.client.refreshAccessToken();
    return toRefreshedToken(credentials);
  }

  authUrl(): string {
    return this.client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: CALENDAR_SCOPES,
    });
  }

  async exchangeCode(code: string): Promise<OAuthToken> {
    const { tokens } = await this.client.getToken(code);
    const token = toRefreshedToken(tokens);
    if (!token.refresh_token) {
      throw new CalendarAuthError(
        'Consent returned no refresh token; revoke access and authorize again',
        'INVALID_CREDENTIALS'
      );
    }
    return { ...token, refresh_token: token.refresh_token };
  }

  /** OAuth2 client carrying the given token, for API calls */
  authorized(token: OAuthToken): Auth.OAuth2Client {
    this.client.setCredentials({
      access_token: token.access_token,
      refresh_token: token.refresh_token,
      expiry_date: token.expiry_date,
    });
    return this.client;
  }
}

/**
 * Prints the consent URL and reads the authorization code from the terminal.
 */
export function createTerminalConsent(oauth: GoogleOAuthClient): ConsentFlow {
  return async () => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      process.stdout.write(`\nOpen this URL in a browser and grant calendar access:\n\n${oauth.authUrl()}\n\n`);
      const answer = await rl.question('Paste the authorization code (or the full redirect URL): ');
      return await oauth.exchangeCode(extractCode(answer));
    } finally {
      rl.close();
    }
  };
}

/**
 * Accepts either a bare code or the redirect URL the browser landed on.
 */
export function extractCode(input: string): string {
  const trimmed = input.trim();
  if (!/^https?:\/\//.test(trimmed)) return trimmed;
  const code = new URL(trimmed).searchParams.get('code');
  if (!code) {
    throw new CalendarAuthError('Redirect URL carries no authorization code', 'INVALID_CREDENTIALS');
  }
  return code;
}

export class GoogleCalendarSource implements CalendarEventsSource {
  private readonly calendar: calendar_v3.Calendar;

  constructor(auth: Auth.OAuth2Client, private readonly timeoutMs: number) {
    this.calendar = google.calendar({ version: 'v3', auth });
  }

  async listEvents(
    calendarId: string,
    timeMin: Date,
    timeMax: Date,
    maxResults: number
  ): Promise<unknown[]> {
    const response = await this.calendar.events.list(
      {
        calendarId,
        timeMin: timeMin.toISOString(),
        timeMax: timeMax.toISOString(),
        singleEvents: true,
        orderBy: 'startTime',
        maxResults,
      },
      { timeout: this.timeoutMs }
    );
    return response.data.items ?? [];
  }
}

/**
 * Authenticates against Google and yields an event source; used as the
 * calendar fetcher's `connect` collaborator.
 */
export function createGoogleConnector(
  config: CalendarConfig,
  timeoutSeconds: number,
  consent?: (oauth: GoogleOAuthClient) => ConsentFlow
): () => Promise<CalendarEventsSource> {
  return async () => {
    const oauth = GoogleOAuthClient.fromConfig(config);
    const authenticator = new CalendarAuthenticator({
      tokenPath: config.tokenPath,
      refresher: oauth,
      consent: consent ? consent(oauth) : undefined,
    });
    const token = await authenticator.authenticate();
    return new GoogleCalendarSource(oauth.authorized(token), timeoutSeconds * 1000);
  };
}
