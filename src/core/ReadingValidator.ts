import type {
  BPMCategory,
  ErrorBounds,
  MeasurementSummary,
  SignalQuality,
} from '../types/PPGTypes';
import {qualityScore} from './QualityEvaluator';

// Absolute plausibility bounds for a stored reading; per-tick readings are
// already held to the narrower estimator range.
const PLAUSIBLE_MIN_BPM = 30;
const PLAUSIBLE_MAX_BPM = 220;
const MAX_CONFIDENCE = 0.99;

export function isValidBpm(bpm: number): boolean {
  return bpm >= PLAUSIBLE_MIN_BPM && bpm <= PLAUSIBLE_MAX_BPM;
}

export function bpmCategory(bpm: number): BPMCategory {
  if (bpm < 50) return 'low';
  if (bpm < 60) return 'athlete';
  if (bpm < 100) return 'normal';
  if (bpm < 120) return 'elevated';
  return 'high';
}

/** Integer (floored) mean, the aggregation used for the final result. */
export function integerMean(readings: readonly number[]): number {
  const total = readings.reduce((sum, bpm) => sum + bpm, 0);
  return Math.floor(total / readings.length);
}

/**
 * Keeps readings inside `[q1 - k·iqr, q3 + k·iqr]`, with quartiles taken at
 * indices `n/4` and `3n/4` of the sorted readings.
 */
export function trimOutliers(readings: readonly number[], k: number): number[] {
  if (readings.length === 0) {
    return [];
  }
  const sorted = readings.slice().sort((a, b) => a - b);
  const q1 = sorted[Math.floor(sorted.length / 4)];
  const q3 = sorted[Math.floor((sorted.length * 3) / 4)];
  const iqr = q3 - q1;
  const lower = q1 - k * iqr;
  const upper = q3 + k * iqr;
  return readings.filter(bpm => bpm >= lower && bpm <= upper);
}

function stdDevOf(values: readonly number[]): {mean: number; stdDev: number} {
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const variance =
    values.reduce((sum, v) => sum + (v - mean) * (v - mean), 0) / values.length;
  return {mean, stdDev: Math.sqrt(variance)};
}

export function validatedAverageBpm(readings: readonly number[]): number | null {
  const valid = readings.filter(isValidBpm);
  if (valid.length < 3) {
    return null;
  }
  const kept = trimOutliers(valid, 1.5);
  return kept.length === 0 ? null : integerMean(kept);
}

/**
 * 0..0.99 score for how consistent a series of per-tick readings is:
 * 50% spread, 30% coefficient of variation, 20% reading count, then scaled
 * by the signal quality score.
 */
export function readingConfidence(
  readings: readonly number[],
  quality: SignalQuality = 'excellent',
): number {
  if (readings.length < 5) {
    return 0;
  }
  const kept = trimOutliers(readings, 3);
  if (kept.length < 5) {
    return 0;
  }
  const {mean, stdDev} = stdDevOf(kept);
  const cv = stdDev / mean;
  const countFactor = Math.min(1, kept.length / 20);
  const consistency = Math.max(0, Math.min(1, 1 - stdDev / 8));
  const cvScore = Math.max(0, Math.min(1, 1 - cv * 20));
  const base = consistency * 0.5 + cvScore * 0.3 + countFactor * 0.2;
  return Math.max(0, Math.min(MAX_CONFIDENCE, base * qualityScore(quality)));
}

export function errorBounds(readings: readonly number[]): ErrorBounds | null {
  const valid = readings.filter(isValidBpm);
  if (valid.length < 5) {
    return null;
  }
  const kept = trimOutliers(valid, 1.5);
  if (kept.length < 3) {
    return null;
  }
  const {stdDev} = stdDevOf(kept);
  const margin = Math.max(2, Math.min(Math.ceil(stdDev * 1.5), 10));
  return {
    min: Math.min(...kept),
    max: Math.max(...kept),
    margin,
  };
}

export function summarizeReadings(
  readings: readonly number[],
  lastQuality: SignalQuality,
  durationSeconds: number,
): MeasurementSummary {
  const averageBpm = integerMean(readings);
  return {
    averageBpm,
    validatedAverageBpm: validatedAverageBpm(readings),
    readingCount: readings.length,
    confidence: readingConfidence(readings, lastQuality),
    errorBounds: errorBounds(readings),
    category: bpmCategory(averageBpm),
    lastQuality,
    durationSeconds,
  };
}
