import { describe, expect, it } from 'vitest';

import { ATHLETE_PALETTE, DEFAULT_CONFIG, loadConfig, normalizeConfig } from '@shared/core/config';

describe('loadConfig', () => {
  it('uses the defaults for an empty environment', () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it('reads values from the environment', () => {
    const config = loadConfig({
      PULSE_DATA_DIR: ' /var/lib/pulse ',
      PULSE_CODE_LENGTH: '7',
      PULSE_SHARE_CODE_LENGTH: '10',
      PULSE_MAX_CODE_ATTEMPTS: '25',
      LOG_LEVEL: 'DEBUG',
    });
    expect(config.dataDir).toBe('/var/lib/pulse');
    expect(config.codeLength).toBe(7);
    expect(config.shareCodeLength).toBe(10);
    expect(config.maxCodeAttempts).toBe(25);
    expect(config.logLevel).toBe('debug');
  });

  it('prefers the namespaced variables', () => {
    const config = loadConfig({ PULSE_DATA_DIR: 'a', DATA_DIR: 'b', PULSE_LOG_LEVEL: 'warn', LOG_LEVEL: 'error' });
    expect(config.dataDir).toBe('a');
    expect(config.logLevel).toBe('warn');
  });

  it('falls back on invalid numbers and levels', () => {
    const config = loadConfig({
      PULSE_CODE_LENGTH: 'abc',
      PULSE_SHARE_CODE_LENGTH: '0',
      PULSE_MAX_CODE_ATTEMPTS: '2.5',
      LOG_LEVEL: 'loud',
    });
    expect(config.codeLength).toBe(6);
    expect(config.shareCodeLength).toBe(8);
    expect(config.maxCodeAttempts).toBe(5000);
    expect(config.logLevel).toBe('info');
  });

  it('lets explicit overrides win over the environment', () => {
    const config = loadConfig({ PULSE_CODE_LENGTH: '8', PULSE_DATA_DIR: 'env-dir' }, { codeLength: 5, dataDir: undefined });
    expect(config.codeLength).toBe(5);
    expect(config.dataDir).toBe('env-dir');
  });
});

describe('normalizeConfig', () => {
  it('keeps a usable palette and drops blank colors', () => {
    expect(normalizeConfig({ palette: ['#111111', ' ', '#222222'] }).palette).toEqual(['#111111', '#222222']);
    expect(normalizeConfig({ palette: [] }).palette).toBe(ATHLETE_PALETTE);
  });

  it('validates load thresholds one by one', () => {
    const config = normalizeConfig({ loadThresholds: { dailyMinutes: 90, weeklyMinutes: -1 } });
    expect(config.loadThresholds).toEqual({ dailyMinutes: 90, weeklyMinutes: 300 });
  });

  it('trims the default family name', () => {
    expect(normalizeConfig({ defaultFamilyName: '  Home ' }).defaultFamilyName).toBe('Home');
    expect(normalizeConfig({ defaultFamilyName: '   ' }).defaultFamilyName).toBe('Family');
  });
});
