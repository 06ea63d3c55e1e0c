import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import { HomeContext } from '../../../src/core/home-context';
import { ValidationError } from '../../../src/errors';
import {
  DEFAULT_API_BASE,
  defaultSettings,
  loadSettings,
  parseSettings,
} from '../../../src/config/settings';
import { makeTempHome, removeTempHome } from '../../helpers/fixtures';

describe('settings', () => {
  let home: HomeContext;

  beforeEach(() => {
    home = makeTempHome();
  });

  afterEach(() => {
    removeTempHome(home);
  });

  it('uses defaults when config.toml is absent', () => {
    const settings = loadSettings(home);

    expect(settings).toEqual(defaultSettings());
    expect(settings.download.api_base).toBe(DEFAULT_API_BASE);
    expect(settings.download.max_retries).toBe(5);
    expect(settings.service.grace_period_ms).toBe(5000);
    expect(settings.stream.max_reconnect_attempts).toBe(5);
    expect(settings.stream.stable_after_ms).toBe(5000);
    expect(settings.monitor.policy).toBe('restart-with-backoff');
  });

  it('merges file values over the defaults', () => {
    fs.writeFileSync(
      home.settingsFile,
      [
        '[download]',
        'api_base = "http://127.0.0.1:8080"',
        'max_retries = 2',
        '',
        '[monitor]',
        'policy = "never"',
        'interval_ms = 250',
        '',
      ].join('\n')
    );

    const settings = loadSettings(home);

    expect(settings.download.api_base).toBe('http://127.0.0.1:8080');
    expect(settings.download.max_retries).toBe(2);
    expect(settings.download.timeout_ms).toBe(120000);
    expect(settings.monitor).toEqual({
      interval_ms: 250,
      policy: 'never',
      max_attempts: 3,
      base_delay_ms: 1000,
      healthy_reset_ms: 60000,
    });
  });

  it('names the offending key of an invalid value', () => {
    let caught: unknown;
    try {
      parseSettings('[monitor]\npolicy = "always"\n');
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    expect(caught).toMatchObject({ key: 'monitor.policy' });
  });

  it('rejects malformed TOML', () => {
    expect(() => parseSettings('[download\n', 'broken.toml')).toThrow(/^Invalid TOML in broken\.toml: /);
  });
});
