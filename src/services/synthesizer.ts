import type { SynthesisConfig } from '../config.js';
import { ConfigurationError, errorMessage } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Sample, WaveformWindow } from '../types/ecg.js';
import type { Clock } from '../utils/clock.js';
import { gaussian, type RandomSource } from '../utils/random.js';
import { estimateHeartRate } from './heartRate.js';
import type { RecordLog } from './recordLog.js';

export type WaveComponent = {
  name: 'P' | 'Q' | 'R' | 'S' | 'T';
  center: number;
  amplitude: number;
  width: number;
};

export function gaussianWave(x: number, center: number, amplitude: number, width: number): number {
  return amplitude * Math.exp(-((x - center) ** 2) / (2 * width ** 2));
}

export function componentValue(c: WaveComponent, x: number): number {
  return gaussianWave(x, c.center, c.amplitude, c.width);
}

/** Center (R peak) of beat cycle `i`, in seconds from the window origin. */
export function beatCenter(i: number, heartRateBpm: number): number {
  return (i * 60) / heartRateBpm;
}

export function beatCount(config: SynthesisConfig): number {
  return Math.floor((config.durationSeconds * config.heartRateBpm) / 60);
}

export function beatComponents(config: SynthesisConfig, i: number): WaveComponent[] {
  const c = beatCenter(i, config.heartRateBpm);
  const a = config.amplitudeScale;
  const out: WaveComponent[] = [];
  if (config.includePWave) out.push({ name: 'P', center: c, amplitude: 0.1, width: 0.1 });
  out.push(
    { name: 'Q', center: c - 0.05, amplitude: -0.5 * a, width: 0.02 },
    { name: 'R', center: c, amplitude: a, width: 0.03 },
    { name: 'S', center: c + 0.05, amplitude: -0.3 * a, width: 0.02 }
  );
  if (config.includeTWave) out.push({ name: 'T', center: c + 0.4, amplitude: -0.3, width: 0.15 });
  return out;
}

export function validateSynthesisConfig(config: SynthesisConfig): void {
  const issues: string[] = [];
  if (!(config.heartRateBpm > 0)) issues.push(`heartRateBpm must be > 0, got ${config.heartRateBpm}`);
  if (!(config.samplingRateHz > 0)) issues.push(`samplingRateHz must be > 0, got ${config.samplingRateHz}`);
  if (!(config.durationSeconds > 0)) issues.push(`durationSeconds must be > 0, got ${config.durationSeconds}`);
  if (!(config.noiseLevel >= 0)) issues.push(`noiseLevel must be >= 0, got ${config.noiseLevel}`);
  if (!Number.isFinite(config.amplitudeScale)) issues.push('amplitudeScale must be finite');
  if (issues.length) throw new ConfigurationError('Invalid synthesis configuration', issues);
}

export class SignalSynthesizer {
  private windows = 0;

  constructor(
    readonly config: Readonly<SynthesisConfig>,
    private readonly random: RandomSource = Math.random
  ) {
    validateSynthesisConfig(config);
  }

  get windowsProduced(): number {
    return this.windows;
  }

  /** `floor(duration * rate)` evenly spaced points on [0, duration). */
  timeAxis(): number[] {
    const { durationSeconds, samplingRateHz } = this.config;
    const n = Math.floor(durationSeconds * samplingRateHz);
    const step = n > 0 ? durationSeconds / n : 0;
    return Array.from({ length: n }, (_, k) => k * step);
  }

  noiselessSignal(time: readonly number[]): number[] {
    const base = new Array<number>(time.length).fill(0);
    const beats = beatCount(this.config);
    for (let i = 0; i < beats; i++) {
      for (const component of beatComponents(this.config, i)) {
        for (let k = 0; k < time.length; k++) base[k] += componentValue(component, time[k]);
      }
    }
    return base;
  }

  produceWindow(): WaveformWindow {
    const time = this.timeAxis();
    const base = this.noiselessSignal(time);
    const noise = this.config.noiseLevel;
    const window: Sample[] = time.map((t, k) => ({
      time: t,
      amplitude: noise > 0 ? base[k] + gaussian(this.random, 0, noise) : base[k]
    }));
    this.windows++;
    return window;
  }
}

export type SynthesizerLoopDeps = {
  synthesizer: SignalSynthesizer;
  log: RecordLog;
  clock: Clock;
  logger: Logger;
  signal: AbortSignal;
  /** Stop after this many windows; unbounded when omitted. */
  maxWindows?: number;
};

/**
 * Produces one window per `durationSeconds`, appending each to the log.
 * Append failures are logged and the next window is tried after the usual
 * pause.
 */
export async function runSynthesizer(deps: SynthesizerLoopDeps): Promise<number> {
  const { synthesizer, log, clock, logger, signal, maxWindows } = deps;
  const pauseMs = synthesizer.config.durationSeconds * 1000;
  let produced = 0;
  while (!signal.aborted && (maxWindows === undefined || produced < maxWindows)) {
    const window = synthesizer.produceWindow();
    try {
      await log.append(window);
      produced++;
      const bpm = estimateHeartRate(window);
      logger.info(
        `[synth] window #${synthesizer.windowsProduced}: ${window.length} samples appended` +
          (bpm !== null ? `, estimated heart rate ${bpm.toFixed(2)} BPM` : '')
      );
    } catch (e) {
      logger.error(`[synth] append failed: ${errorMessage(e)}`);
    }
    if (maxWindows !== undefined && produced >= maxWindows) break;
    await clock.sleep(pauseMs, signal);
  }
  return produced;
}
