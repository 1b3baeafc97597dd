import { ZodError, ZodIssue } from 'zod';
import { FallbackReason } from '../interfaces/fetchResult';

export class ConfigError extends Error {
  issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

export class MissingCredentialError extends Error {
  constructor(what: string) {
    super(`${what} is not configured`);
    this.name = 'MissingCredentialError';
  }
}

export class SchemaMismatchError extends Error {
  issues: ZodIssue[];

  constructor(source: string, issues: ZodIssue[]) {
    super(`${source} schema mismatch`);
    this.name = 'SchemaMismatchError';
    this.issues = issues;
  }
}

export class EmptyResponseError extends Error {
  constructor(source: string) {
    super(`${source} returned no usable data`);
    this.name = 'EmptyResponseError';
  }
}

export const CalendarAuthErrorCodes = {
  CONSENT_REQUIRED: 'CONSENT_REQUIRED',
  TOKEN_REFRESH_FAILED: 'TOKEN_REFRESH_FAILED',
  INVALID_CREDENTIALS: 'INVALID_CREDENTIALS',
} as const;

export type CalendarAuthErrorCode = keyof typeof CalendarAuthErrorCodes;

export class CalendarAuthError extends Error {
  code: CalendarAuthErrorCode;

  constructor(message: string, code: CalendarAuthErrorCode, cause?: unknown) {
    super(message, { cause });
    this.name = 'CalendarAuthError';
    this.code = code;
  }
}

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);
const NETWORK_CODES = new Set([
  'ENOTFOUND',
  'ECONNREFUSED',
  'ECONNRESET',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ERR_NETWORK',
]);

function errorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

function responseStatus(err: unknown): number | undefined {
  if (typeof err !== 'object' || err === null || !('response' in err)) return undefined;
  const response = err.response;
  if (typeof response === 'object' && response !== null && 'status' in response) {
    return typeof response.status === 'number' ? response.status : undefined;
  }
  return undefined;
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
    return err.message;
  }
  const code = errorCode(err);
  return code ?? String(err);
}

/**
 * Maps any thrown value onto the fallback taxonomy.
 */
export function classifyError(err: unknown): { reason: FallbackReason; detail: string } {
  const detail = errorMessage(err);

  if (err instanceof MissingCredentialError) return { reason: 'not_configured', detail };
  if (err instanceof CalendarAuthError) return { reason: 'auth_error', detail };
  if (err instanceof SchemaMismatchError || err instanceof ZodError) {
    return { reason: 'schema_mismatch', detail };
  }
  if (err instanceof EmptyResponseError) return { reason: 'empty_response', detail };

  const code = errorCode(err);
  if (code && TIMEOUT_CODES.has(code)) return { reason: 'timeout', detail };

  const status = responseStatus(err);
  if (status === 401 || status === 403) return { reason: 'auth_error', detail };
  if (status !== undefined) return { reason: 'api_error', detail };

  if (code && NETWORK_CODES.has(code)) return { reason: 'network_error', detail };

  return { reason: 'unknown', detail };
}
