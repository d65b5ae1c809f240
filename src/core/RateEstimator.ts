import {PPG_CONFIG, type BpmRange} from './PPGConfig';

const DEFAULT_RANGE: BpmRange = {
  min: PPG_CONFIG.bpmRange.min,
  max: PPG_CONFIG.bpmRange.max,
};

export function peakIntervalsSeconds(
  peaks: readonly number[],
  sampleRateHz: number,
): number[] {
  const intervals: number[] = [];
  for (let i = 1; i < peaks.length; i += 1) {
    intervals.push((peaks[i] - peaks[i - 1]) / sampleRateHz);
  }
  return intervals;
}

/** Upper median for even-length input. */
export function median(values: readonly number[]): number {
  const sorted = values.slice().sort((a, b) => a - b);
  return sorted[Math.floor(sorted.length / 2)];
}

/**
 * BPM from peak indices, or `null` when there are fewer than three peaks or
 * no interval implies a rate inside `range`.
 */
export function calculateBPM(
  peaks: readonly number[],
  sampleRateHz: number,
  range: BpmRange = DEFAULT_RANGE,
): number | null {
  if (peaks.length < 3) {
    return null;
  }
  const valid = peakIntervalsSeconds(peaks, sampleRateHz).filter(interval => {
    if (interval <= 0) {
      return false;
    }
    const bpm = 60 / interval;
    return bpm >= range.min && bpm <= range.max;
  });
  if (valid.length === 0) {
    return null;
  }
  const bpm = Math.round(60 / median(valid));
  // rounding can cross a fractional bound
  if (bpm < range.min || bpm > range.max) {
    return null;
  }
  return bpm;
}
