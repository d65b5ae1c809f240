import {PPG_CONFIG} from './PPGConfig';

export interface BandpassOptions {
  readonly lowCutHz?: number;
  readonly highCutHz?: number;
}

/**
 * Single-pole exponential low-pass. Seeds the output with the first input.
 */
export function lowPass(
  signal: readonly number[],
  cutoffHz: number,
  sampleRateHz: number,
): number[] {
  if (signal.length === 0) {
    return [];
  }
  const rc = 1 / (2 * Math.PI * cutoffHz);
  const dt = 1 / sampleRateHz;
  const alpha = dt / (rc + dt);

  const filtered = new Array<number>(signal.length);
  filtered[0] = signal[0];
  for (let i = 1; i < signal.length; i += 1) {
    filtered[i] = filtered[i - 1] + alpha * (signal[i] - filtered[i - 1]);
  }
  return filtered;
}

/**
 * Single-pole high-pass. Seeds the output with the first input.
 */
export function highPass(
  signal: readonly number[],
  cutoffHz: number,
  sampleRateHz: number,
): number[] {
  if (signal.length === 0) {
    return [];
  }
  const rc = 1 / (2 * Math.PI * cutoffHz);
  const dt = 1 / sampleRateHz;
  const alpha = rc / (rc + dt);

  const filtered = new Array<number>(signal.length);
  filtered[0] = signal[0];
  for (let i = 1; i < signal.length; i += 1) {
    filtered[i] = alpha * (filtered[i - 1] + signal[i] - signal[i - 1]);
  }
  return filtered;
}

export function removeMean(signal: readonly number[]): number[] {
  if (signal.length === 0) {
    return [];
  }
  const mean = signal.reduce((sum, value) => sum + value, 0) / signal.length;
  return signal.map(value => value - mean);
}

/**
 * Isolates the heart-rate band: mean removal, low-pass at `highCutHz`, then
 * high-pass at `lowCutHz` on the low-passed result. The whole window is
 * recomputed on every call; no state carries between calls.
 *
 * Inputs of `passthroughMaxLength` samples or fewer come back as an
 * unchanged copy.
 */
export function applyBandpass(
  signal: readonly number[],
  sampleRateHz: number,
  options: BandpassOptions = {},
): number[] {
  if (signal.length <= PPG_CONFIG.bandpass.passthroughMaxLength) {
    return signal.slice();
  }
  const lowCutHz = options.lowCutHz ?? PPG_CONFIG.bandpass.lowCutHz;
  const highCutHz = options.highCutHz ?? PPG_CONFIG.bandpass.highCutHz;

  const centered = removeMean(signal);
  const lowPassed = lowPass(centered, highCutHz, sampleRateHz);
  return highPass(lowPassed, lowCutHz, sampleRateHz);
}
