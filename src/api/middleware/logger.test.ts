import { describe, it, expect } from 'vitest';
import { DEFAULT_LOGGER_CONFIG, formatRequestLog, formatResponseTime } from './logger';

describe('formatResponseTime', () => {
  it('uses milliseconds below one second', () => {
    expect(formatResponseTime(15)).toBe('15ms');
  });

  it('uses seconds from one second up', () => {
    expect(formatResponseTime(1234)).toBe('1.23s');
  });
});

describe('formatRequestLog', () => {
  it('writes a plain line when colors are off', () => {
    const config = { ...DEFAULT_LOGGER_CONFIG, colorize: false };

    expect(formatRequestLog(config, 'POST', '/api/resources/', 201, 8)).toBe(
      '[API] POST /api/resources/ 201 - 8ms'
    );
  });

  it('wraps method and status in ANSI colors when enabled', () => {
    const config = { ...DEFAULT_LOGGER_CONFIG, colorize: true };

    expect(formatRequestLog(config, 'DELETE', '/api/images/1/', 404, 3)).toBe(
      '[API] \x1b[31mDELETE \x1b[0m /api/images/1/ \x1b[33m404\x1b[0m - \x1b[2m3ms\x1b[0m'
    );
  });
});
