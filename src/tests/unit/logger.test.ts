import { describe, it, expect, vi, afterEach } from 'vitest';

describe('createLogger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.resetModules();
  });

  it('falls back to info for an unknown LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'loud');
    vi.resetModules();
    const { createLogger } = await import('../../utils/logger.js');

    expect(createLogger({ component: 'test' }).level).toBe('info');
  });

  it('uses a valid LOG_LEVEL', async () => {
    vi.stubEnv('LOG_LEVEL', 'warn');
    vi.resetModules();
    const { createLogger } = await import('../../utils/logger.js');

    expect(createLogger().level).toBe('warn');
  });
});
