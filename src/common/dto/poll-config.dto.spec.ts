import { validatePollConfig } from './index';
import { ConfigError } from '../errors';

describe('validatePollConfig', () => {
  it('should accept a valid configuration and trim the keyword', () => {
    expect(validatePollConfig({ keyword: '  varun ', lookbackDays: 1, intervalSeconds: 300 })).toEqual({
      keyword: 'varun',
      lookbackDays: 1,
      intervalSeconds: 300,
    });
  });

  it('should keep the optional tuning values', () => {
    const config = validatePollConfig({
      keyword: 'varun',
      lookbackDays: 0,
      intervalSeconds: 5,
      fetchTimeoutMs: 1000,
      concurrency: 2,
    });

    expect(config).toEqual({ keyword: 'varun', lookbackDays: 0, intervalSeconds: 5, fetchTimeoutMs: 1000, concurrency: 2 });
  });

  it('should reject an empty keyword', () => {
    expect(() => validatePollConfig({ keyword: '   ', lookbackDays: 1, intervalSeconds: 60 })).toThrow(ConfigError);
  });

  it('should reject a negative lookback', () => {
    expect(() => validatePollConfig({ keyword: 'varun', lookbackDays: -1, intervalSeconds: 60 })).toThrow(ConfigError);
  });

  it('should reject a zero interval', () => {
    expect(() => validatePollConfig({ keyword: 'varun', lookbackDays: 1, intervalSeconds: 0 })).toThrow(ConfigError);
  });

  it('should reject a lookback beyond the supported range', () => {
    expect(() => validatePollConfig({ keyword: 'varun', lookbackDays: 36501, intervalSeconds: 60 })).toThrow(ConfigError);
    expect(() => validatePollConfig({ keyword: 'varun', lookbackDays: 1e9, intervalSeconds: 60 })).toThrow(ConfigError);
  });

  it('should accept the longest timer interval and reject anything above it', () => {
    expect(validatePollConfig({ keyword: 'varun', lookbackDays: 36500, intervalSeconds: 2147483 })).toEqual({
      keyword: 'varun',
      lookbackDays: 36500,
      intervalSeconds: 2147483,
    });
    expect(() => validatePollConfig({ keyword: 'varun', lookbackDays: 1, intervalSeconds: 2147484 })).toThrow(ConfigError);
  });

  it('should reject a non-object input', () => {
    expect(() => validatePollConfig('varun')).toThrow(ConfigError);
  });

  it('should list every problem in the error details', () => {
    let caught: unknown;
    try {
      validatePollConfig({ keyword: '', lookbackDays: 1.5, intervalSeconds: 0 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.details).toContain('keyword ne doit pas être vide');
      expect(caught.details).toHaveLength(3);
    }
  });
});
