// PPG Configuration Constants
// All tunables in one place; per-session overrides are validated below

import {z} from 'zod';

const isDebugMode =
  process.env.NODE_ENV === 'development' || process.env.PPG_DEBUG === '1';

export const PPG_CONFIG = {
  // Sampling & buffering
  sampleRateHz: 30,
  measurementDurationSeconds: 20,
  minSamplesForCalculation: 150, // ~5 s @ 30 Hz
  maxSamples: 600,               // ~20 s @ 30 Hz

  // Filtering & peak detection
  bandpass: {
    lowCutHz: 0.7,
    highCutHz: 3.5,
    passthroughMaxLength: 10,
  },
  peak: {
    minDistanceSeconds: 0.3,
    thresholdPercentile: 0.6,
  },
  bpmRange: {
    min: 40,
    max: 200,
  },

  // Empirical calibration constants, validate against real traces before changing
  quality: {
    windowSamples: 30,
    poorMeanBelow: 100,
    poorAmplitudeBelow: 2,
    fairMeanBelow: 150,
    fairAmplitudeBelow: 5,
    fairStdDevBelow: 1,
    goodStdDevBelow: 3,
    motionWindowSamples: 10,
    motionDerivativeAbove: 20,
    redDominanceRatio: 0.8, // red >= 0.8 * (green + blue)
  },

  // Optional cross-check estimators (FFT peak, autocorrelation)
  spectral: {
    enabled: false,
    minSamples: 64,
    autocorrelationMinSamples: 128,
    agreementBpm: 10,
  },

  // Camera preferences
  camera: {
    channel: 'red',
    roiFraction: 0.5, // central box (fraction of width/height)
    pixelStride: 2,
    torchLevel: 1.0,
  },

  debug: {
    enabled: isDebugMode,
    sampleLogThrottle: 30,
  },
} as const;

const positive = z.number().finite().positive();
const positiveInt = z.number().int().positive();

export const MeasurementConfigSchema = z
  .object({
    sampleRateHz: positive.default(PPG_CONFIG.sampleRateHz),
    measurementDurationSeconds: positive.default(
      PPG_CONFIG.measurementDurationSeconds,
    ),
    minSamplesForCalculation: positiveInt.default(
      PPG_CONFIG.minSamplesForCalculation,
    ),
    maxSamples: positiveInt.default(PPG_CONFIG.maxSamples),
    minDistanceSeconds: positive.default(PPG_CONFIG.peak.minDistanceSeconds),
    lowCutHz: positive.default(PPG_CONFIG.bandpass.lowCutHz),
    highCutHz: positive.default(PPG_CONFIG.bandpass.highCutHz),
    minBpm: positive.default(PPG_CONFIG.bpmRange.min),
    maxBpm: positive.default(PPG_CONFIG.bpmRange.max),
    channel: z.enum(['red', 'green']).default(PPG_CONFIG.camera.channel),
    roiFraction: positive.max(1).default(PPG_CONFIG.camera.roiFraction),
    pixelStride: positiveInt.default(PPG_CONFIG.camera.pixelStride),
    torchLevel: positive.max(1).default(PPG_CONFIG.camera.torchLevel),
    spectralFusion: z.boolean().default(PPG_CONFIG.spectral.enabled),
  })
  .strict()
  .refine(config => config.minSamplesForCalculation <= config.maxSamples, {
    message: 'minSamplesForCalculation must not exceed maxSamples',
    path: ['minSamplesForCalculation'],
  })
  .refine(config => config.lowCutHz < config.highCutHz, {
    message: 'lowCutHz must be below highCutHz',
    path: ['lowCutHz'],
  })
  .refine(config => config.minBpm < config.maxBpm, {
    message: 'minBpm must be below maxBpm',
    path: ['minBpm'],
  });

export type MeasurementConfig = z.output<typeof MeasurementConfigSchema>;
export type MeasurementConfigInput = z.input<typeof MeasurementConfigSchema>;

export function resolveMeasurementConfig(
  overrides: MeasurementConfigInput = {},
): MeasurementConfig {
  return MeasurementConfigSchema.parse(overrides);
}

export interface BpmRange {
  readonly min: number;
  readonly max: number;
}
