import { describe, it, expect, afterEach, vi } from 'vitest';

async function loadConfig() {
  vi.resetModules();
  return import('./config.js');
}

describe('config', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('defaults the schedule timezone to UTC', async () => {
    vi.stubEnv('SCHEDULE_TIMEZONE', '');
    const { SCHEDULE_TIMEZONE, validateEnvironmentVariables } = await loadConfig();

    expect(SCHEDULE_TIMEZONE).toBe('UTC');
    expect(validateEnvironmentVariables()).toEqual({ valid: true, missing: [], invalid: [] });
  });

  it('flags an unknown timezone', async () => {
    vi.stubEnv('SCHEDULE_TIMEZONE', 'Mars/Olympus_Mons');
    const { validateEnvironmentVariables } = await loadConfig();

    expect(validateEnvironmentVariables()).toEqual({ valid: false, missing: [], invalid: ['SCHEDULE_TIMEZONE'] });
  });

  it('requires DATABASE_PATH only when asked to', async () => {
    vi.stubEnv('DATABASE_PATH', '');
    const { validateEnvironmentVariables } = await loadConfig();

    expect(validateEnvironmentVariables(false).valid).toBe(true);
    expect(validateEnvironmentVariables(true)).toEqual({ valid: false, missing: ['DATABASE_PATH'], invalid: [] });
  });

  it('treats NODE_ENV=production as production', async () => {
    vi.stubEnv('NODE_ENV', 'production');
    const { IS_PRODUCTION } = await loadConfig();

    expect(IS_PRODUCTION).toBe(true);
  });
});
