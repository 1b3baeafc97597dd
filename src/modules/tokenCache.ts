import fs from 'fs';
import path from 'path';
import { OAuthToken } from '../interfaces/calendar';
import { OAuthTokenSchema } from '../schemas/calendar.schema';
import { logger } from '../logger';

function isMissingFile(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

/**
 * Returns the cached token, or null when the file is absent or unreadable.
 */
export async function readTokenCache(tokenPath: string): Promise<OAuthToken | null> {
  let raw: string;
  try {
    raw = await fs.promises.readFile(tokenPath, 'utf8');
  } catch (err) {
    if (!isMissingFile(err)) {
      logger.warn({ tokenPath, err }, 'Token cache unreadable, treating as absent');
    }
    return null;
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    logger.warn({ tokenPath }, 'Token cache is not valid JSON, treating as absent');
    return null;
  }

  const parsed = OAuthTokenSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn({ tokenPath, issues: parsed.error.issues }, 'Token cache schema mismatch, treating as absent');
    return null;
  }
  return parsed.data;
}

/**
 * Write-temp-then-rename so a concurrent reader never sees a partial file.
 */
export async function writeTokenCache(tokenPath: string, token: OAuthToken): Promise<void> {
  const tmpPath = `${tokenPath}.${process.pid}.tmp`;
  await fs.promises.mkdir(path.dirname(tokenPath), { recursive: true });
  await fs.promises.writeFile(tmpPath, JSON.stringify(token, null, 2), { mode: 0o600 });
  await fs.promises.rename(tmpPath, tokenPath);
  logger.debug({ tokenPath }, 'Token cache written');
}

export async function deleteTokenCache(tokenPath: string): Promise<void> {
  try {
    await fs.promises.unlink(tokenPath);
    logger.info({ tokenPath }, 'Token cache deleted');
  } catch (err) {
    if (!isMissingFile(err)) throw err;
  }
}
