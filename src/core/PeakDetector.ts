import {PPG_CONFIG} from './PPGConfig';

/**
 * Value at fraction `p` of the ascending order of `values`, using the
 * lower nearest rank (`floor(p * (n - 1))`).
 */
export function percentile(values: readonly number[], p: number): number {
  if (values.length === 0) {
    return 0;
  }
  const sorted = values.slice().sort((a, b) => a - b);
  const clamped = Math.min(1, Math.max(0, p));
  return sorted[Math.floor(clamped * (sorted.length - 1))];
}

export function adaptiveThreshold(
  signal: readonly number[],
  p: number = PPG_CONFIG.peak.thresholdPercentile,
): number {
  return percentile(
    signal.map(value => Math.abs(value)),
    p,
  );
}

/**
 * Greedy left-to-right scan for strict local maxima above the adaptive
 * threshold. A candidate closer than `minDistance` samples to the last
 * accepted peak is skipped; accepted peaks are never revisited.
 */
export function findPeaks(
  signal: readonly number[],
  minDistance: number,
): number[] {
  if (signal.length <= 2) {
    return [];
  }
  const threshold = adaptiveThreshold(signal);
  const peaks: number[] = [];

  for (let i = 1; i < signal.length - 1; i += 1) {
    const value = signal[i];
    if (value <= signal[i - 1] || value <= signal[i + 1] || value <= threshold) {
      continue;
    }
    const last = peaks.length > 0 ? peaks[peaks.length - 1] : undefined;
    if (last === undefined || i - last >= minDistance) {
      peaks.push(i);
    }
  }
  return peaks;
}

export function minPeakDistance(
  sampleRateHz: number,
  minDistanceSeconds: number = PPG_CONFIG.peak.minDistanceSeconds,
): number {
  return Math.max(1, Math.round(sampleRateHz * minDistanceSeconds));
}
