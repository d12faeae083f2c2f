import { describe, expect, it } from 'vitest';
import type { SynthesisConfig } from '../config.js';
import { ConfigurationError } from '../errors.js';
import { capturingLogger, fakeClock } from '../testing/fakes.js';
import { seededRandom } from '../utils/random.js';
import { MemoryRecordLog } from './recordLog.js';
import {
  SignalSynthesizer,
  beatCenter,
  beatComponents,
  beatCount,
  componentValue,
  runSynthesizer
} from './synthesizer.js';

const base: SynthesisConfig = {
  durationSeconds: 10,
  samplingRateHz: 250,
  heartRateBpm: 72,
  noiseLevel: 0,
  amplitudeScale: 1,
  includePWave: true,
  includeTWave: true
};

describe('SignalSynthesizer', () => {
  it('produces floor(duration * rate) samples with increasing time on [0, duration)', () => {
    const window = new SignalSynthesizer(base).produceWindow();
    expect(window).toHaveLength(2500);
    expect(window[0].time).toBe(0);
    expect(window[2499].time).toBeCloseTo(9.996, 12);
    for (let k = 1; k < window.length; k++) expect(window[k].time).toBeGreaterThan(window[k - 1].time);
  });

  it('truncates a fractional sample count', () => {
    const window = new SignalSynthesizer({ ...base, durationSeconds: 1.001, samplingRateHz: 3 }).produceWindow();
    expect(window).toHaveLength(3);
  });

  it('returns an empty window when duration * rate floors to zero', () => {
    const window = new SignalSynthesizer({ ...base, durationSeconds: 0.1, samplingRateHz: 5 }).produceWindow();
    expect(window).toEqual([]);
  });

  it('rejects a non-positive heart rate with ConfigurationError', () => {
    expect(() => new SignalSynthesizer({ ...base, heartRateBpm: 0 })).toThrow(ConfigurationError);
    expect(() => new SignalSynthesizer({ ...base, heartRateBpm: -60 })).toThrow(ConfigurationError);
  });

  it('rejects a non-positive sampling rate', () => {
    expect(() => new SignalSynthesizer({ ...base, samplingRateHz: 0 })).toThrow(/samplingRateHz must be > 0/);
  });

  it('spaces beat centers 60 / heartRate seconds apart', () => {
    expect(beatCount(base)).toBe(12);
    expect(beatCenter(0, 72)).toBe(0);
    expect(beatCenter(1, 72)).toBeCloseTo(0.833333333, 8);
    expect(beatCenter(2, 72)).toBeCloseTo(1.666666667, 8);
  });

  it('gives the R component a peak of exactly the amplitude scale', () => {
    const config = { ...base, amplitudeScale: 1.7 };
    for (const i of [0, 3, 11]) {
      const r = beatComponents(config, i).find((c) => c.name === 'R');
      expect(r?.center).toBe(beatCenter(i, 72));
      expect(r && componentValue(r, r.center)).toBe(1.7);
    }
  });

  it('only adds P and T waves when enabled', () => {
    const names = (c: SynthesisConfig) => beatComponents(c, 0).map((w) => w.name);
    expect(names(base)).toEqual(['P', 'Q', 'R', 'S', 'T']);
    expect(names({ ...base, includePWave: false, includeTWave: false })).toEqual(['Q', 'R', 'S']);
  });

  it('sums the QRS components at a beat center when noise is off', () => {
    const config = { ...base, amplitudeScale: 2, includePWave: false, includeTWave: false };
    const window = new SignalSynthesizer(config).produceWindow();
    // Q and S sit 0.05 s away: each contributes amplitude * exp(-3.125).
    expect(window[0].amplitude).toBeCloseTo(2 * (1 - 0.8 * Math.exp(-3.125)), 10);
  });

  it('adds gaussian noise with the configured standard deviation', () => {
    const config = { ...base, noiseLevel: 0.05 };
    const synth = new SignalSynthesizer(config, seededRandom(42));
    const window = synth.produceWindow();
    const clean = synth.noiselessSignal(window.map((s) => s.time));
    const diff = window.map((s, k) => s.amplitude - clean[k]);
    const mean = diff.reduce((a, b) => a + b, 0) / diff.length;
    const std = Math.sqrt(diff.reduce((a, b) => a + (b - mean) ** 2, 0) / diff.length);
    expect(diff).toHaveLength(2500);
    expect(Math.abs(mean)).toBeLessThan(0.01);
    expect(Math.abs(std - 0.05)).toBeLessThan(0.005);
  });

  it('is reproducible with the same random source', () => {
    const a = new SignalSynthesizer({ ...base, noiseLevel: 0.1 }, seededRandom(7)).produceWindow();
    const b = new SignalSynthesizer({ ...base, noiseLevel: 0.1 }, seededRandom(7)).produceWindow();
    expect(a).toEqual(b);
  });
});

describe('runSynthesizer', () => {
  it('appends one window per cycle and pauses for the window duration between them', async () => {
    const log = new MemoryRecordLog();
    const clock = fakeClock();
    const logger = capturingLogger();
    const synthesizer = new SignalSynthesizer({ ...base, durationSeconds: 2, samplingRateHz: 50 });

    const produced = await runSynthesizer({
      synthesizer,
      log,
      clock,
      logger,
      signal: new AbortController().signal,
      maxWindows: 3
    });

    expect(produced).toBe(3);
    expect(await log.length()).toBe(300);
    expect(clock.sleeps).toEqual([2000, 2000]);
    expect(logger.lines[0].message).toMatch(/^\[synth\] window #1: 100 samples appended/);
  });

  it('does nothing once the signal has aborted', async () => {
    const log = new MemoryRecordLog();
    const controller = new AbortController();
    controller.abort();
    const produced = await runSynthesizer({
      synthesizer: new SignalSynthesizer(base),
      log,
      clock: fakeClock(),
      logger: capturingLogger(),
      signal: controller.signal
    });
    expect(produced).toBe(0);
    expect(await log.length()).toBe(0);
  });
});
