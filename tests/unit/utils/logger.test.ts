/**
 * Logger Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { createLogger, extractError, formatContext, getConfiguredLogLevel, setLogLevel } from '../../../src/utils/logger';
import { maskToken } from '../../../src/utils/redact';
import { requestContext } from '../../../src/utils/requestContext';

describe('formatContext', () => {
  it('should render key=value pairs', () => {
    expect(formatContext({ keys: ['a', 'b'], count: 2, missing: undefined, flag: false })).toBe(
      'keys=["a","b"] count=2 missing=null flag=false'
    );
  });

  it('should render nothing for an empty context', () => {
    expect(formatContext({})).toBe('');
    expect(formatContext()).toBe('');
  });
});

describe('createLogger', () => {
  afterEach(() => {
    setLogLevel('error');
  });

  it('should include prefix, request id and locale from the request context', () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('debug');
    const log = createLogger('SCOPE');

    requestContext.run({ requestId: 'req-7', startTime: 0, locale: 'de' }, () => {
      log.info('Scope resumed', { keys: 1 });
    });

    expect(output).toHaveBeenCalledTimes(2);
    const line = String(output.mock.calls[1][0]);
    expect(line).toContain('[SCOPE]');
    expect(line).toContain('[req-7]');
    expect(line).toContain('Scope resumed');
    expect(line).toContain('keys=1 locale=de');
  });

  it('should drop messages below the configured level', () => {
    const output = vi.spyOn(console, 'log').mockImplementation(() => {});
    setLogLevel('warn');

    createLogger('TEST').info('hidden');

    expect(getConfiguredLogLevel()).toBe('warn');
    expect(output).not.toHaveBeenCalled();
  });
});

describe('extractError', () => {
  it('should keep non-default error names', () => {
    expect(extractError(new TypeError('bad'))).toEqual({ error: 'bad', errorName: 'TypeError' });
    expect(extractError(new Error('plain'))).toEqual({ error: 'plain' });
    expect(extractError('text')).toEqual({ error: 'text' });
  });
});

describe('maskToken', () => {
  it('should show only the ends of a token', () => {
    expect(maskToken('0123456789abcdef')).toBe('0123***cdef');
    expect(maskToken('short')).toBe('[REDACTED]');
  });
});

describe('requestContext', () => {
  it('should report no request outside a context', () => {
    expect(requestContext.getRequestId()).toBe('no-request');
    expect(requestContext.getDuration()).toBe(0);
  });

  it('should generate short request ids', () => {
    expect(requestContext.generateRequestId()).toMatch(/^[0-9a-f]{8}$/);
  });
});
