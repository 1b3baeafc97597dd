import fs from 'fs';
import os from 'os';
import path from 'path';
import { CalendarAuthenticator, EXPIRY_BUFFER_MS } from '@/modules/calendarAuth';
import { deleteTokenCache, readTokenCache, writeTokenCache } from '@/modules/tokenCache';
import { OAuthToken } from '@/interfaces/calendar';

const NOW = Date.parse('2024-03-13T12:00:00Z');

const token: OAuthToken = {
  access_token: 'test-access',
  refresh_token: 'test-refresh',
  expiry_date: NOW + 60 * 60 * 1000,
  token_type: 'Bearer',
};

describe('token cache (unit)', () => {
  let dir: string;
  let tokenPath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dashboard-token-'));
    tokenPath = path.join(dir, 'nested', 'token.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  /**
   * Purpose:
   * Verifies Persistence:
   * - a written token reads back with identical fields
   * - no temp file is left behind
   */
  it('round-trips a token through the cache file', async () => {
    await writeTokenCache(tokenPath, token);

    await expect(readTokenCache(tokenPath)).resolves.toEqual(token);
    expect(await fs.promises.readdir(path.dirname(tokenPath))).toEqual(['token.json']);
  });

  it('treats a missing, corrupt or incomplete cache as absent', async () => {
    await expect(readTokenCache(tokenPath)).resolves.toBeNull();

    await fs.promises.mkdir(path.dirname(tokenPath), { recursive: true });
    await fs.promises.writeFile(tokenPath, '{not json');
    await expect(readTokenCache(tokenPath)).resolves.toBeNull();

    await fs.promises.writeFile(tokenPath, JSON.stringify({ access_token: 'test-access' }));
    await expect(readTokenCache(tokenPath)).resolves.toBeNull();
  });

  it('deletes the cache and tolerates deleting it twice', async () => {
    await writeTokenCache(tokenPath, token);
    await deleteTokenCache(tokenPath);
    await deleteTokenCache(tokenPath);

    expect(fs.existsSync(tokenPath)).toBe(false);
  });
});

describe('CalendarAuthenticator (unit)', () => {
  let dir: string;
  let tokenPath: string;

  beforeEach(async () => {
    dir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'dashboard-auth-'));
    tokenPath = path.join(dir, 'token.json');
  });

  afterEach(async () => {
    await fs.promises.rm(dir, { recursive: true, force: true });
  });

  it('returns a cached token that is still valid without refreshing', async () => {
    await writeTokenCache(tokenPath, token);
    const refresher = { refresh: jest.fn() };

    const auth = new CalendarAuthenticator({ tokenPath, refresher, clock: () => NOW });

    await expect(auth.authenticate()).resolves.toEqual(token);
    expect(refresher.refresh).not.toHaveBeenCalled();
  });

  /**
   * Purpose:
   * Verifies Silent refresh:
   * - a token inside the expiry buffer is refreshed
   * - the refresh token is kept when the response omits it
   * - the refreshed token is persisted
   */
  it('refreshes a token close to expiry and keeps the refresh token', async () => {
    await writeTokenCache(tokenPath, { ...token, expiry_date: NOW + EXPIRY_BUFFER_MS - 1 });
    const refresher = {
      refresh: jest.fn().mockResolvedValue({ access_token: 'test-access-2', expiry_date: NOW + 3_600_000 }),
    };

    const auth = new CalendarAuthenticator({ tokenPath, refresher, clock: () => NOW });
    const result = await auth.authenticate();

    expect(refresher.refresh).toHaveBeenCalledWith('test-refresh');
    expect(result).toEqual({
      access_token: 'test-access-2',
      refresh_token: 'test-refresh',
      expiry_date: NOW + 3_600_000,
      token_type: 'Bearer',
    });
    await expect(readTokenCache(tokenPath)).resolves.toEqual(result);
  });

  /**
   * Purpose:
   * Verifies Failure handling:
   * - a failed refresh deletes the cache
   * - the failure surfaces as TOKEN_REFRESH_FAILED
   */
  it('deletes the cache when refresh fails', async () => {
    await writeTokenCache(tokenPath, { ...token, expiry_date: NOW - 1 });
    const refresher = { refresh: jest.fn().mockRejectedValue(new Error('invalid_grant')) };

    const auth = new CalendarAuthenticator({ tokenPath, refresher, clock: () => NOW });

    await expect(auth.authenticate()).rejects.toMatchObject({
      name: 'CalendarAuthError',
      code: 'TOKEN_REFRESH_FAILED',
    });
    expect(fs.existsSync(tokenPath)).toBe(false);
  });

  it('requires consent when nothing is cached and no terminal is attached', async () => {
    const auth = new CalendarAuthenticator({ tokenPath, refresher: { refresh: jest.fn() } });

    await expect(auth.authenticate()).rejects.toMatchObject({ code: 'CONSENT_REQUIRED' });
  });

  it('runs consent and caches the result when nothing is cached', async () => {
    const consent = jest.fn().mockResolvedValue(token);
    const auth = new CalendarAuthenticator({ tokenPath, refresher: { refresh: jest.fn() }, consent });

    await expect(auth.authenticate()).resolves.toEqual(token);
    expect(consent).toHaveBeenCalledTimes(1);
    await expect(readTokenCache(tokenPath)).resolves.toEqual(token);
  });

  it('reports a failed consent as invalid credentials', async () => {
    const consent = jest.fn().mockRejectedValue(new Error('access_denied'));
    const auth = new CalendarAuthenticator({ tokenPath, refresher: { refresh: jest.fn() }, consent });

    await expect(auth.authenticate()).rejects.toMatchObject({ code: 'INVALID_CREDENTIALS' });
  });
});
