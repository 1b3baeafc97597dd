import { extractCode, GoogleOAuthClient } from '@/modules/googleCalendar';
import { CalendarConfigSchema } from '@/schemas/config.schema';
import { CalendarAuthError, MissingCredentialError } from '@/utils/errors';

describe('extractCode (unit)', () => {
  it('accepts a bare authorization code', () => {
    expect(extractCode('  4/test-code \n')).toBe('4/test-code');
  });

  it('reads the code from a pasted redirect URL', () => {
    expect(extractCode('http://127.0.0.1:8081/?code=4%2Ftest-code&scope=calendar')).toBe('4/test-code');
  });

  it('rejects a redirect URL without a code', () => {
    expect(() => extractCode('http://127.0.0.1:8081/?error=access_denied')).toThrow(CalendarAuthError);
  });
});

describe('GoogleOAuthClient (unit)', () => {
  it('requires a client id and secret', () => {
    expect(() => GoogleOAuthClient.fromConfig(CalendarConfigSchema.parse({}))).toThrow(MissingCredentialError);
  });

  it('asks for offline read-only calendar access', () => {
    const oauth = GoogleOAuthClient.fromConfig(
      CalendarConfigSchema.parse({ clientId: 'test-client', clientSecret: 'test-secret' })
    );
    const url = new URL(oauth.authUrl());

    expect(url.searchParams.get('access_type')).toBe('offline');
    expect(url.searchParams.get('prompt')).toBe('consent');
    expect(url.searchParams.get('client_id')).toBe('test-client');
    expect(url.searchParams.get('scope')).toBe('https://www.googleapis.com/auth/calendar.readonly');
  });
});
