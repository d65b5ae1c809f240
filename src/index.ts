export * from './types/PPGTypes';
export {
  PPG_CONFIG,
  MeasurementConfigSchema,
  resolveMeasurementConfig,
  type BpmRange,
  type MeasurementConfig,
  type MeasurementConfigInput,
} from './core/PPGConfig';
export {MeasurementError, FrameReadError, describeMeasurementError} from './core/PPGErrors';
export {SignalBuffer} from './core/SignalBuffer';
export {
  channelValue,
  extractColorAverages,
  sampleFrame,
  type SamplerOptions,
} from './core/FrameSampler';
export {applyBandpass, lowPass, highPass, removeMean, type BandpassOptions} from './core/BandpassFilter';
export {findPeaks, adaptiveThreshold, percentile, minPeakDistance} from './core/PeakDetector';
export {calculateBPM, median, peakIntervalsSeconds} from './core/RateEstimator';
export {
  assessQuality,
  evaluateQuality,
  isMotionExcessive,
  isRedDominant,
  qualityScore,
  type FrameColors,
} from './core/QualityEvaluator';
export {
  estimateAutocorrelationBpm,
  estimateSpectralBpm,
  fuseEstimates,
  type CrossCheckEstimates,
} from './core/SpectralEstimator';
export {observedSampleRate, runPipeline, type PipelineResult} from './core/HeartRatePipeline';
export {
  bpmCategory,
  errorBounds,
  integerMean,
  isValidBpm,
  readingConfidence,
  summarizeReadings,
  trimOutliers,
  validatedAverageBpm,
} from './core/ReadingValidator';
export {
  CameraCapability,
  CameraLease,
  type CameraHardware,
  type FrameSubscription,
} from './core/CameraCapability';
export {inlineDispatcher, deferredDispatcher, type Dispatcher} from './core/Dispatcher';
export {
  MeasurementSession,
  type SessionOptions,
  type SessionSnapshot,
} from './core/MeasurementSession';
