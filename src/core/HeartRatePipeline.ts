import type {PPGSample} from '../types/PPGTypes';
import {applyBandpass} from './BandpassFilter';
import {findPeaks, minPeakDistance} from './PeakDetector';
import type {MeasurementConfig} from './PPGConfig';
import {calculateBPM} from './RateEstimator';
import {
  estimateAutocorrelationBpm,
  estimateSpectralBpm,
  fuseEstimates,
} from './SpectralEstimator';

export interface PipelineResult {
  readonly bpm: number | null;
  readonly peaks: readonly number[];
  readonly filtered: readonly number[];
  readonly spectralBpm: number | null;
  readonly autocorrelationBpm: number | null;
}

type PipelineConfig = Pick<
  MeasurementConfig,
  | 'sampleRateHz'
  | 'minDistanceSeconds'
  | 'lowCutHz'
  | 'highCutHz'
  | 'minBpm'
  | 'maxBpm'
  | 'spectralFusion'
>;

/**
 * Frame rate actually delivered over `samples`: `(n - 1) / (t_last - t_first)`.
 * Falls back to `configuredHz` with fewer than two samples or no time span.
 */
export function observedSampleRate(
  samples: readonly PPGSample[],
  configuredHz: number,
): number {
  if (samples.length < 2) {
    return configuredHz;
  }
  const span =
    samples[samples.length - 1].timestampSeconds - samples[0].timestampSeconds;
  if (!(span > 0)) {
    return configuredHz;
  }
  return (samples.length - 1) / span;
}

/** Bandpass → peaks → median-interval BPM over the whole window. */
export function runPipeline(
  values: readonly number[],
  config: PipelineConfig,
): PipelineResult {
  const {sampleRateHz} = config;
  const range = {min: config.minBpm, max: config.maxBpm};

  const filtered = applyBandpass(values, sampleRateHz, {
    lowCutHz: config.lowCutHz,
    highCutHz: config.highCutHz,
  });
  const peaks = findPeaks(
    filtered,
    minPeakDistance(sampleRateHz, config.minDistanceSeconds),
  );
  const peakBpm = calculateBPM(peaks, sampleRateHz, range);

  if (!config.spectralFusion) {
    return {
      bpm: peakBpm,
      peaks,
      filtered,
      spectralBpm: null,
      autocorrelationBpm: null,
    };
  }
  const spectralBpm = estimateSpectralBpm(filtered, sampleRateHz, range);
  const autocorrelationBpm = estimateAutocorrelationBpm(filtered, sampleRateHz, range);
  return {
    bpm: fuseEstimates(peakBpm, {spectralBpm, autocorrelationBpm}),
    peaks,
    filtered,
    spectralBpm,
    autocorrelationBpm,
  };
}
