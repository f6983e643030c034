// src/core/render/classify.ts
import { errors } from 'playwright';
import { describeError } from '../errors.js';
import type { RenderErrorType } from './types.js';

export interface RenderFailure {
  errorType: RenderErrorType;
  errorMessage: string;
}

// Network error codes reported by Chromium (net::ERR_*), Firefox (NS_ERROR_*)
// and WebKit, mapped onto the result taxonomy.
export const NETWORK_ERROR_TYPES: Readonly<Record<string, RenderErrorType>> = {
  'net::ERR_NAME_NOT_RESOLVED': 'dns_error',
  'net::ERR_NAME_RESOLUTION_FAILED': 'dns_error',
  NS_ERROR_UNKNOWN_HOST: 'dns_error',
  'net::ERR_CONNECTION_REFUSED': 'connection_refused',
  NS_ERROR_CONNECTION_REFUSED: 'connection_refused',
  'net::ERR_TIMED_OUT': 'connection_timeout',
  'net::ERR_CONNECTION_TIMED_OUT': 'connection_timeout',
  NS_ERROR_NET_TIMEOUT: 'connection_timeout',
};

const CONNECTION_ERROR_TYPES: ReadonlySet<RenderErrorType> = new Set([
  'dns_error',
  'connection_refused',
  'connection_timeout',
]);

const NETWORK_CODE_PATTERN = /(net::ERR_[A-Z_]+|NS_ERROR_[A-Z_]+)/;
const WEBKIT_MESSAGES: ReadonlyArray<[RegExp, RenderErrorType]> = [
  [/could not resolve host|a server with the specified hostname could not be found/i, 'dns_error'],
  [/could not connect to server|connection refused/i, 'connection_refused'],
];
// Playwright prefixes API failures with the failing call, e.g. "page.goto: ..."
const ENGINE_CALL_PATTERN = /^(page|frame|browserContext|browser|browserType|route|locator|response)\.\w+:/;
const CLOSED_TARGET_PATTERN = /target (page, context or browser|closed)|has been closed/i;

export function isConnectionError(errorType: RenderErrorType | undefined): boolean {
  return errorType !== undefined && CONNECTION_ERROR_TYPES.has(errorType);
}

export function isNavigationTimeout(error: unknown): boolean {
  if (error instanceof errors.TimeoutError) {
    return true;
  }
  return error instanceof Error && error.name === 'TimeoutError';
}

export function extractNetworkErrorCode(message: string): string | undefined {
  const match = NETWORK_CODE_PATTERN.exec(message);
  return match?.[1];
}

function isEngineError(error: Error): boolean {
  return (
    ENGINE_CALL_PATTERN.test(error.message) ||
    NETWORK_CODE_PATTERN.test(error.message) ||
    CLOSED_TARGET_PATTERN.test(error.message)
  );
}

/**
 * Maps an error thrown while rendering one URL onto the result taxonomy.
 */
export function classifyRenderFailure(error: unknown, timeoutSeconds: number): RenderFailure {
  if (isNavigationTimeout(error)) {
    return {
      errorType: 'timeout_error',
      errorMessage: `Navigation timeout after ${timeoutSeconds}s`,
    };
  }

  const errorMessage = describeError(error);
  if (!(error instanceof Error)) {
    return { errorType: 'unexpected_error', errorMessage };
  }

  const code = extractNetworkErrorCode(errorMessage);
  if (code) {
    return { errorType: NETWORK_ERROR_TYPES[code] ?? 'engine_error', errorMessage };
  }

  for (const [pattern, errorType] of WEBKIT_MESSAGES) {
    if (pattern.test(errorMessage)) {
      return { errorType, errorMessage };
    }
  }

  if (isEngineError(error)) {
    return { errorType: 'engine_error', errorMessage };
  }

  return { errorType: 'unexpected_error', errorMessage };
}
