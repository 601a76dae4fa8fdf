import { describe, expect, it } from 'vitest';
import { parseConfig } from '../../../src/shared/config/env';

describe('parseConfig', () => {
  it('applies defaults for an empty environment', () => {
    const config = parseConfig({});

    expect(config).toMatchObject({
      NODE_ENV: 'development',
      LOG_LEVEL: 'info',
      ORCHESTRATOR_PROFILE: 'conservative',
      TOOL_DEFAULT_TIMEOUT_MS: 4000,
      TOOL_RETRY_BASE_DELAY_MS: 200,
      TOOL_LOG_DIR: '',
      HIL_INTERACTIVE: false,
      isDev: true,
      isProd: false,
    });
  });

  it('coerces numbers, normalizes the profile name and reads boolean flags', () => {
    const config = parseConfig({
      NODE_ENV: 'production',
      ORCHESTRATOR_PROFILE: ' Exploratory ',
      TOOL_DEFAULT_TIMEOUT_MS: '2500',
      HIL_INTERACTIVE: '1',
    });

    expect(config.ORCHESTRATOR_PROFILE).toBe('exploratory');
    expect(config.TOOL_DEFAULT_TIMEOUT_MS).toBe(2500);
    expect(config.HIL_INTERACTIVE).toBe(true);
    expect(config.isProd).toBe(true);
  });

  it('throws CONFIG_INVALID naming the failing keys', () => {
    let thrown: unknown;
    try {
      parseConfig({ TOOL_DEFAULT_TIMEOUT_MS: '60000', ORCHESTRATOR_PROFILE: 'reckless' });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toMatchObject({ code: 'CONFIG_INVALID' });
    expect(thrown).toHaveProperty('message', expect.stringContaining('TOOL_DEFAULT_TIMEOUT_MS'));
    expect(thrown).toHaveProperty('message', expect.stringContaining('ORCHESTRATOR_PROFILE'));
  });
});
