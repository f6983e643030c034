import { describe, it, expect } from '@jest/globals';
import { errors } from 'playwright';
import {
  classifyRenderFailure,
  extractNetworkErrorCode,
  isConnectionError,
  isNavigationTimeout,
} from '../classify.js';

describe('classifyRenderFailure', () => {
  it('classifies Playwright timeouts', () => {
    const error = new errors.TimeoutError('page.goto: Timeout 15000ms exceeded.');

    expect(classifyRenderFailure(error, 15)).toEqual({
      errorType: 'timeout_error',
      errorMessage: 'Navigation timeout after 15s',
    });
  });

  it('classifies errors named TimeoutError from other engines', () => {
    const error = new Error('Navigation timed out');
    error.name = 'TimeoutError';

    expect(isNavigationTimeout(error)).toBe(true);
    expect(classifyRenderFailure(error, 10).errorType).toBe('timeout_error');
  });

  it.each([
    ['page.goto: net::ERR_NAME_NOT_RESOLVED at https://nx.example/', 'dns_error'],
    ['page.goto: net::ERR_CONNECTION_REFUSED at http://localhost:1/', 'connection_refused'],
    ['page.goto: net::ERR_CONNECTION_TIMED_OUT at https://slow.example/', 'connection_timeout'],
    ['page.goto: NS_ERROR_UNKNOWN_HOST', 'dns_error'],
    ['page.goto: NS_ERROR_NET_TIMEOUT', 'connection_timeout'],
    ['page.goto: Could not resolve host: nx.example', 'dns_error'],
    ['page.goto: Could not connect to server', 'connection_refused'],
    ['page.goto: net::ERR_CERT_AUTHORITY_INVALID at https://self-signed.example/', 'engine_error'],
    ['page.content: Target page, context or browser has been closed', 'engine_error'],
    ['Cannot read properties of undefined', 'unexpected_error'],
  ])('maps "%s" to %s', (message, expected) => {
    const result = classifyRenderFailure(new Error(message), 15);

    expect(result).toEqual({ errorType: expected, errorMessage: message });
  });

  it('treats thrown non-errors as unexpected', () => {
    expect(classifyRenderFailure('net::ERR_NAME_NOT_RESOLVED', 15)).toEqual({
      errorType: 'unexpected_error',
      errorMessage: 'net::ERR_NAME_NOT_RESOLVED',
    });
  });
});

describe('extractNetworkErrorCode', () => {
  it('extracts Chromium and Firefox codes', () => {
    expect(extractNetworkErrorCode('page.goto: net::ERR_TIMED_OUT at https://a.example')).toBe('net::ERR_TIMED_OUT');
    expect(extractNetworkErrorCode('NS_ERROR_CONNECTION_REFUSED')).toBe('NS_ERROR_CONNECTION_REFUSED');
    expect(extractNetworkErrorCode('no code here')).toBeUndefined();
  });
});

describe('isConnectionError', () => {
  it('covers the network-layer categories only', () => {
    expect(isConnectionError('dns_error')).toBe(true);
    expect(isConnectionError('connection_refused')).toBe(true);
    expect(isConnectionError('connection_timeout')).toBe(true);
    expect(isConnectionError('timeout_error')).toBe(false);
    expect(isConnectionError(undefined)).toBe(false);
  });
});
