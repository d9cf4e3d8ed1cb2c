/**
 * Request Logger Middleware Tests
 *
 * - Request ID generation and propagation
 * - Start and completion logging
 * - Excluded paths
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EventEmitter } from 'events';
import type { Request, Response, NextFunction } from 'express';

const mockLogger = vi.hoisted(() => ({
  info: vi.fn(),
  error: vi.fn(),
  warn: vi.fn(),
  debug: vi.fn(),
}));

vi.mock('../../../src/utils/logger', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../../src/utils/logger')>();
  return {
    ...actual,
    createLogger: () => mockLogger,
  };
});

import { requestLogger } from '../../../src/middleware/requestLogger';

const TOKEN = 'test-token-000001';

describe('Request Logger Middleware', () => {
  let req: Request;
  let res: EventEmitter & { statusCode: number; setHeader: ReturnType<typeof vi.fn> };
  let next: ReturnType<typeof vi.fn>;

  const makeRequest = (path: string, query = '', headers: Record<string, string> = {}): Request =>
    ({
      method: 'GET',
      path,
      originalUrl: `${path}${query}`,
      headers: { 'user-agent': 'TestClient/1.0', ...headers },
    }) as Partial<Request> as Request;

  const invoke = (): void => {
    requestLogger(req, res as unknown as Response, next as NextFunction);
  };

  beforeEach(() => {
    req = makeRequest('/orders/7', `?scopeId=${TOKEN}`);
    res = Object.assign(new EventEmitter(), { statusCode: 200, setHeader: vi.fn() });
    next = vi.fn();
  });

  it('should log the request path without the query string', () => {
    invoke();

    expect(mockLogger.debug).toHaveBeenCalledWith('GET /orders/7', { userAgent: 'TestClient/1.0' });
    expect(next).toHaveBeenCalledTimes(1);
  });

  it('should never write a redirect-scope token to the logs', () => {
    invoke();
    res.emit('finish');

    const logged = [...mockLogger.debug.mock.calls, ...mockLogger.info.mock.calls].map((call) => JSON.stringify(call));
    expect(logged.filter((line) => line.includes(TOKEN))).toEqual([]);
  });

  it('should propagate an incoming request ID', () => {
    req = makeRequest('/orders/7', '', { 'x-request-id': 'upstream-42' });

    invoke();

    expect(res.setHeader).toHaveBeenCalledWith('X-Request-ID', 'upstream-42');
  });

  it('should log completion at a level matching the status code', () => {
    res.statusCode = 503;

    invoke();
    res.emit('finish');

    expect(mockLogger.error).toHaveBeenCalledWith(
      'GET /orders/7 completed',
      expect.objectContaining({ status: 503 })
    );
    expect(mockLogger.info).not.toHaveBeenCalled();
  });

  it('should skip logging for excluded paths', () => {
    req = makeRequest('/favicon.ico');

    invoke();
    res.emit('finish');

    expect(mockLogger.debug).not.toHaveBeenCalled();
    expect(mockLogger.info).not.toHaveBeenCalled();
    expect(next).toHaveBeenCalledTimes(1);
  });
});
