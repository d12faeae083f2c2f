import type { Sample } from '../types/ecg.js';

export type PeakOptions = {
  /** Minimum peak value. */
  height?: number;
  /** Minimum spacing in samples; the taller of two close peaks wins. */
  distance?: number;
};

/**
 * Indices of local maxima. A flat top counts once, at its middle sample
 * (rounded down). The first and last samples never count.
 */
export function findPeaks(values: readonly number[], options: PeakOptions = {}): number[] {
  const height = options.height ?? Number.NEGATIVE_INFINITY;
  const peaks: number[] = [];
  let i = 1;
  while (i < values.length - 1) {
    if (values[i - 1] < values[i]) {
      let ahead = i + 1;
      while (ahead < values.length - 1 && values[ahead] === values[i]) ahead++;
      if (values[ahead] < values[i]) {
        const mid = Math.floor((i + ahead - 1) / 2);
        if (values[mid] >= height) peaks.push(mid);
        i = ahead;
        continue;
      }
    }
    i++;
  }

  const distance = options.distance ?? 1;
  if (distance <= 1 || peaks.length < 2) return peaks;
  const keep = new Set(peaks);
  const byHeight = [...peaks].sort((a, b) => values[b] - values[a]);
  for (const p of byHeight) {
    if (!keep.has(p)) continue;
    for (const q of peaks) {
      if (q !== p && Math.abs(q - p) < distance) keep.delete(q);
    }
  }
  return peaks.filter((p) => keep.has(p));
}

/** Shortest R-R interval considered, in seconds (300 BPM). */
const MIN_RR_SECONDS = 0.2;

/**
 * Beats per minute from the mean spacing of R peaks, or null when the window
 * holds fewer than two of them. R peaks are maxima reaching half of the
 * window's largest amplitude, at least {@link MIN_RR_SECONDS} apart.
 */
export function estimateHeartRate(window: readonly Sample[]): number | null {
  if (window.length < 3) return null;
  const values = window.map((s) => s.amplitude);
  const max = Math.max(...values);
  if (!(max > 0)) return null;
  const dt = window[1].time - window[0].time;
  const peaks = findPeaks(values, {
    height: max / 2,
    distance: dt > 0 ? Math.ceil(MIN_RR_SECONDS / dt) : 1
  });
  if (peaks.length < 2) return null;
  const span = window[peaks[peaks.length - 1]].time - window[peaks[0]].time;
  const mean = span / (peaks.length - 1);
  return mean > 0 ? 60 / mean : null;
}
