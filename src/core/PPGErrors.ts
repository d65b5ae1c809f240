import type {MeasurementErrorKind} from '../types/PPGTypes';

const MESSAGES: Record<MeasurementErrorKind, string> = {
  cameraUnavailable: 'Camera is not available on this device.',
  illuminationUnavailable: 'Flash/torch is not available on this device.',
  permissionDenied:
    'Camera permission is required. Please enable it in Settings.',
  measurementFailed: 'Measurement failed. Please try again.',
};

export class MeasurementError extends Error {
  constructor(readonly kind: MeasurementErrorKind, options?: {cause?: unknown}) {
    super(MESSAGES[kind], options);
    this.name = 'MeasurementError';
  }
}

/** Raised by the frame sampler when a frame has no readable pixels. */
export class FrameReadError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'FrameReadError';
  }
}

export function describeMeasurementError(kind: MeasurementErrorKind): string {
  return MESSAGES[kind];
}
