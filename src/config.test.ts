import { describe, expect, it } from 'vitest';
import { parseConfig } from './config.js';
import { ConfigurationError } from './errors.js';

describe('parseConfig', () => {
  it('applies defaults to an empty environment', () => {
    const config = parseConfig({});
    expect(config.synthesis).toEqual({
      durationSeconds: 10,
      samplingRateHz: 250,
      heartRateBpm: 72,
      noiseLevel: 0.05,
      amplitudeScale: 1,
      includePWave: true,
      includeTWave: true
    });
    expect(config.transmit).toEqual({
      batchSize: 10,
      sendIntervalMs: 100,
      pollIntervalMs: 1000,
      endpoint: 'http://localhost:3000/api/ecg-data',
      userId: undefined,
      policy: 'advance-always',
      retry: { maxAttempts: 3, baseDelayMs: 500 },
      requestTimeoutMs: 10000
    });
    expect(config.logPath).toBe('ecg_simulation_data.csv');
    expect(config.cursorPath).toBeUndefined();
    expect(config.server).toEqual({ port: 3000, corsOrigin: '*' });
  });

  it('reads overrides and treats empty strings as unset', () => {
    const config = parseConfig({
      HEART_RATE_BPM: '60',
      INCLUDE_T_WAVE: 'false',
      BATCH_SIZE: '250',
      USER_ID: 'patient-1',
      CURSOR_PATH: '',
      DELIVERY_POLICY: 'advance-on-success'
    });
    expect(config.synthesis.heartRateBpm).toBe(60);
    expect(config.synthesis.includeTWave).toBe(false);
    expect(config.transmit.batchSize).toBe(250);
    expect(config.transmit.userId).toBe('patient-1');
    expect(config.transmit.policy).toBe('advance-on-success');
    expect(config.cursorPath).toBeUndefined();
  });

  it('accepts boolean flags in any case', () => {
    const config = parseConfig({ INCLUDE_P_WAVE: 'TRUE', INCLUDE_T_WAVE: 'No' });
    expect(config.synthesis.includePWave).toBe(true);
    expect(config.synthesis.includeTWave).toBe(false);
  });

  it('is frozen', () => {
    const config = parseConfig({});
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.transmit.retry)).toBe(true);
  });

  it('fails fast with every invalid key listed', () => {
    let caught: unknown;
    try {
      parseConfig({ HEART_RATE_BPM: '0', SAMPLING_RATE_HZ: 'fast', BATCH_SIZE: '2.5' });
    } catch (e) {
      caught = e;
    }
    expect(caught).toBeInstanceOf(ConfigurationError);
    const issues = caught instanceof ConfigurationError ? caught.issues : [];
    expect(issues.map((i) => i.split(':')[0]).sort()).toEqual(['BATCH_SIZE', 'HEART_RATE_BPM', 'SAMPLING_RATE_HZ']);
  });

  it('rejects an unknown delivery policy', () => {
    expect(() => parseConfig({ DELIVERY_POLICY: 'exactly-once' })).toThrow(ConfigurationError);
  });
});
