import { describe, it, expect } from 'vitest';
import { getLogger, resolveLogLevel } from '../logging/logger.js';

describe('logger', () => {
  it('prefers LOG_LEVEL over NODE_ENV', () => {
    expect(resolveLogLevel({ LOG_LEVEL: 'error', NODE_ENV: 'development' })).toBe('error');
  });

  it('derives the level from NODE_ENV', () => {
    expect(resolveLogLevel({ NODE_ENV: 'production' })).toBe('info');
    expect(resolveLogLevel({ NODE_ENV: 'test' })).toBe('warn');
    expect(resolveLogLevel({})).toBe('debug');
  });

  it('caches loggers by name', () => {
    expect(getLogger('topology:test')).toBe(getLogger('topology:test'));
    expect(getLogger('topology:test')).not.toBe(getLogger('topology:other'));
  });
});
