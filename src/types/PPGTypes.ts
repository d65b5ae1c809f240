// PPG Type Definitions
// Shared data model for the measurement pipeline and its callers

export interface PPGSample {
  readonly value: number;
  readonly timestampSeconds: number; // offset from measurement start
}

export type SignalQuality = 'poor' | 'fair' | 'good' | 'excellent';

export interface BPMReading {
  readonly bpm: number;
  readonly computedAtTimestamp: number;
}

export type MeasurementState = 'idle' | 'running' | 'finished';

export type MeasurementErrorKind =
  | 'cameraUnavailable'
  | 'illuminationUnavailable'
  | 'permissionDenied'
  | 'measurementFailed';

export type PermissionStatus = 'granted' | 'denied' | 'undetermined';

export type PixelFormat = 'bgra' | 'rgba';

export type PPGChannel = 'red' | 'green';

/**
 * One raw camera frame. `data` holds `height` rows of `bytesPerRow` bytes,
 * four bytes per pixel in `pixelFormat` order.
 */
export interface CameraFrame {
  readonly width: number;
  readonly height: number;
  readonly bytesPerRow?: number;
  readonly pixelFormat: PixelFormat;
  readonly data: Uint8Array | Uint8ClampedArray;
  readonly timestamp?: number; // seconds, monotonic
}

export interface ColorAverages {
  readonly red: number;
  readonly green: number;
  readonly blue: number;
  readonly pixelCount: number;
}

export interface QualityAssessment {
  readonly quality: SignalQuality;
  readonly mean: number;
  readonly amplitude: number;
  readonly stdDev: number;
  readonly fingerDetected: boolean;
  readonly motionExcessive: boolean;
  readonly redDominant: boolean;
}

export type BPMCategory = 'low' | 'athlete' | 'normal' | 'elevated' | 'high';

export interface ErrorBounds {
  readonly min: number;
  readonly max: number;
  readonly margin: number;
}

export interface MeasurementSummary {
  readonly averageBpm: number;
  readonly validatedAverageBpm: number | null;
  readonly readingCount: number;
  readonly confidence: number;
  readonly errorBounds: ErrorBounds | null;
  readonly category: BPMCategory;
  readonly lastQuality: SignalQuality;
  readonly durationSeconds: number;
}

export interface MeasurementCallbacks {
  onBPMUpdate?: (bpm: number) => void;
  onQualityUpdate?: (quality: SignalQuality) => void;
  onProgressUpdate?: (progress: number) => void;
  onFinished?: (averageBpm: number, summary: MeasurementSummary) => void;
  onError?: (kind: MeasurementErrorKind) => void;
  onStateChange?: (state: MeasurementState) => void;
}

export type SessionLog = (event: string, data: Record<string, unknown>) => void;
