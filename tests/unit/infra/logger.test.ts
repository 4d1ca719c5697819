import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger } from '@/infra/logger/index.js';

describe('createLogger', () => {
  it('applies the configured level and name', () => {
    const logger = createLogger({ level: 'warn', pretty: false, name: 'grid-test' });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toEqual({ name: 'grid-test' });
  });

  it('binds context on child loggers', () => {
    const parent = createLogger({ level: 'silent', pretty: false });

    const child = createChildLogger(parent, { domain: 'forestry' });

    expect(child.bindings()).toEqual({ name: 'agro-grid-mapping', domain: 'forestry' });
    expect(child.level).toBe('silent');
  });
});
