import FFT from 'fft.js';
import {PPG_CONFIG, type BpmRange} from './PPGConfig';

function hann(n: number): Float64Array {
  const w = new Float64Array(n);
  if (n === 1) {
    w[0] = 1;
    return w;
  }
  for (let i = 0; i < n; i += 1) {
    w[i] = 0.5 * (1 - Math.cos((2 * Math.PI * i) / (n - 1)));
  }
  return w;
}

function nextPow2(n: number): number {
  return 1 << (32 - Math.clz32(n - 1));
}

/**
 * Dominant frequency of `signal` inside the BPM band, as BPM. The window is
 * Hann-tapered and zero-padded to a power of two. Returns `null` below
 * `PPG_CONFIG.spectral.minSamples` or when the band holds no energy.
 */
export function estimateSpectralBpm(
  signal: readonly number[],
  sampleRateHz: number,
  range: BpmRange = {min: PPG_CONFIG.bpmRange.min, max: PPG_CONFIG.bpmRange.max},
): number | null {
  if (signal.length < PPG_CONFIG.spectral.minSamples) {
    return null;
  }
  const n = nextPow2(signal.length);
  const window = hann(signal.length);
  const padded = new Float64Array(n);
  for (let i = 0; i < signal.length; i += 1) {
    padded[i] = signal[i] * window[i];
  }

  const fft = new FFT(n);
  const spectrum = fft.createComplexArray();
  fft.realTransform(spectrum, padded);
  fft.completeSpectrum(spectrum);

  const binHz = sampleRateHz / n;
  const minBin = Math.max(1, Math.ceil(range.min / 60 / binHz));
  const maxBin = Math.min(n / 2 - 1, Math.floor(range.max / 60 / binHz));

  let peakBin = -1;
  let peakMagnitude = 0;
  for (let bin = minBin; bin <= maxBin; bin += 1) {
    const magnitude = Math.hypot(spectrum[2 * bin], spectrum[2 * bin + 1]);
    if (magnitude > peakMagnitude) {
      peakMagnitude = magnitude;
      peakBin = bin;
    }
  }
  if (peakBin < 0) {
    return null;
  }
  return Math.round(peakBin * binHz * 60);
}

/**
 * Pulse period from the autocorrelation of the mean-centred signal. Each lag
 * in the BPM band is scored by its correlation divided by the overlap
 * length; the best lag becomes the rate.
 */
export function estimateAutocorrelationBpm(
  signal: readonly number[],
  sampleRateHz: number,
  range: BpmRange = {min: PPG_CONFIG.bpmRange.min, max: PPG_CONFIG.bpmRange.max},
): number | null {
  const n = signal.length;
  if (n < PPG_CONFIG.spectral.autocorrelationMinSamples) {
    return null;
  }
  const minLag = Math.max(1, Math.floor((sampleRateHz * 60) / range.max));
  const maxLag = Math.floor((sampleRateHz * 60) / range.min);
  if (maxLag >= n / 2) {
    return null;
  }

  const mean = signal.reduce((sum, v) => sum + v, 0) / n;
  const centered = signal.map(v => v - mean);
  const energy = centered.reduce((sum, v) => sum + v * v, 0);
  if (energy === 0) {
    return null;
  }

  let bestLag = 0;
  let bestCorrelation = 0;
  for (let lag = minLag; lag <= maxLag; lag += 1) {
    const overlap = n - lag;
    let total = 0;
    for (let i = 0; i < overlap; i += 1) {
      total += centered[i] * centered[i + lag];
    }
    const correlation = total / overlap;
    if (correlation > bestCorrelation) {
      bestCorrelation = correlation;
      bestLag = lag;
    }
  }
  if (bestLag === 0) {
    return null;
  }
  const bpm = Math.round((60 * sampleRateHz) / bestLag);
  return bpm >= range.min && bpm <= range.max ? bpm : null;
}

export interface CrossCheckEstimates {
  readonly spectralBpm?: number | null;
  readonly autocorrelationBpm?: number | null;
}

/**
 * Combines the peak-interval estimate with the cross-check estimates. The
 * autocorrelation estimate is tried first, then the spectral one; the first
 * that agrees with the peak estimate within `agreementBpm` is averaged with
 * it. With no agreement the peak estimate stands.
 */
export function fuseEstimates(
  peakBpm: number | null,
  estimates: CrossCheckEstimates,
  agreementBpm: number = PPG_CONFIG.spectral.agreementBpm,
): number | null {
  if (peakBpm === null) {
    return null;
  }
  for (const candidate of [estimates.autocorrelationBpm, estimates.spectralBpm]) {
    if (
      candidate !== undefined &&
      candidate !== null &&
      Math.abs(peakBpm - candidate) <= agreementBpm
    ) {
      return Math.round((peakBpm + candidate) / 2);
    }
  }
  return peakBpm;
}
