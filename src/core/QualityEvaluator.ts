import type {ColorAverages, QualityAssessment, SignalQuality} from '../types/PPGTypes';
import {PPG_CONFIG} from './PPGConfig';

const Q = PPG_CONFIG.quality;

interface WindowStats {
  readonly mean: number;
  readonly amplitude: number;
  readonly stdDev: number;
}

function windowStats(values: readonly number[]): WindowStats {
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const value of values) {
    sum += value;
    if (value < min) min = value;
    if (value > max) max = value;
  }
  const mean = sum / values.length;
  let squares = 0;
  for (const value of values) {
    squares += (value - mean) * (value - mean);
  }
  return {
    mean,
    amplitude: max - min,
    stdDev: Math.sqrt(squares / values.length),
  };
}

/**
 * Mean absolute first difference over the most recent `windowSamples`
 * values exceeds `threshold`. Needs a full window.
 */
export function isMotionExcessive(
  values: readonly number[],
  windowSamples: number = Q.motionWindowSamples,
  threshold: number = Q.motionDerivativeAbove,
): boolean {
  if (values.length < windowSamples || windowSamples < 2) {
    return false;
  }
  const recent = values.slice(-windowSamples);
  let total = 0;
  for (let i = 1; i < recent.length; i += 1) {
    total += Math.abs(recent[i] - recent[i - 1]);
  }
  return total / (recent.length - 1) > threshold;
}

function classify({mean, amplitude, stdDev}: WindowStats): SignalQuality {
  if (mean < Q.poorMeanBelow || amplitude < Q.poorAmplitudeBelow) {
    return 'poor';
  }
  if (
    mean < Q.fairMeanBelow ||
    amplitude < Q.fairAmplitudeBelow ||
    stdDev < Q.fairStdDevBelow
  ) {
    return 'fair';
  }
  if (stdDev < Q.goodStdDevBelow) {
    return 'good';
  }
  return 'excellent';
}

export type FrameColors = Pick<ColorAverages, 'red' | 'green' | 'blue'>;

/**
 * A fingertip over the lit lens reads red-dominant. A scene whose red mean
 * falls below `redDominanceRatio` of green plus blue is something else.
 */
export function isRedDominant(
  colors: FrameColors,
  ratio: number = Q.redDominanceRatio,
): boolean {
  return colors.red >= (colors.green + colors.blue) * ratio;
}

/**
 * Full quality assessment over the last `Q.windowSamples` raw samples.
 * Excessive motion, or latest-frame `colors` that are not red-dominant,
 * override the ladder with `poor`.
 */
export function assessQuality(
  recentSamples: readonly number[],
  colors?: FrameColors,
): QualityAssessment {
  const redDominant = colors === undefined || isRedDominant(colors);
  if (recentSamples.length < Q.windowSamples) {
    return {
      quality: 'poor',
      mean: 0,
      amplitude: 0,
      stdDev: 0,
      fingerDetected: false,
      motionExcessive: false,
      redDominant,
    };
  }
  const stats = windowStats(recentSamples.slice(-Q.windowSamples));
  const laddered = classify(stats);
  const motionExcessive = isMotionExcessive(recentSamples);
  return {
    ...stats,
    quality: motionExcessive || !redDominant ? 'poor' : laddered,
    fingerDetected:
      redDominant &&
      stats.mean >= Q.poorMeanBelow &&
      stats.amplitude >= Q.poorAmplitudeBelow,
    motionExcessive,
    redDominant,
  };
}

export function evaluateQuality(recentSamples: readonly number[]): SignalQuality {
  return assessQuality(recentSamples).quality;
}

export function qualityScore(quality: SignalQuality): number {
  switch (quality) {
    case 'excellent':
      return 1.0;
    case 'good':
      return 0.9;
    case 'fair':
      return 0.7;
    case 'poor':
      return 0.5;
  }
}
