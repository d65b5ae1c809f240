import type {
  BPMReading,
  CameraFrame,
  ColorAverages,
  MeasurementCallbacks,
  MeasurementErrorKind,
  MeasurementState,
  SessionLog,
  SignalQuality,
} from '../types/PPGTypes';
import type {CameraCapability, CameraLease} from './CameraCapability';
import {inlineDispatcher, type Dispatcher} from './Dispatcher';
import {channelValue, extractColorAverages} from './FrameSampler';
import {observedSampleRate, runPipeline} from './HeartRatePipeline';
import {createLogger, type TaggedLogger} from './logger';
import {
  PPG_CONFIG,
  resolveMeasurementConfig,
  type MeasurementConfig,
  type MeasurementConfigInput,
} from './PPGConfig';
import {FrameReadError, MeasurementError} from './PPGErrors';
import {assessQuality} from './QualityEvaluator';
import {integerMean, summarizeReadings} from './ReadingValidator';
import {SignalBuffer} from './SignalBuffer';

export interface SessionOptions extends MeasurementCallbacks {
  readonly capability: CameraCapability;
  readonly config?: MeasurementConfigInput;
  readonly dispatch?: Dispatcher;
  readonly log?: SessionLog;
  /** Seconds; used for frames that carry no timestamp. */
  readonly clock?: () => number;
}

export interface SessionSnapshot {
  readonly state: MeasurementState;
  readonly progress: number;
  readonly sampleCount: number;
  readonly readings: readonly BPMReading[];
  readonly lastQuality: SignalQuality;
  readonly droppedFrames: number;
}

type FinishReason = 'completed' | 'stopped';

/**
 * Fixed-duration camera heart-rate measurement. Owns the sample buffer and
 * the camera lease for one run at a time; frames are processed in arrival
 * order on the caller's frame path and results leave through `dispatch`.
 */
export class MeasurementSession {
  readonly config: MeasurementConfig;
  private state: MeasurementState = 'idle';
  private readonly buffer: SignalBuffer;
  private readonly capability: CameraCapability;
  private readonly callbacks: MeasurementCallbacks;
  private readonly dispatch: Dispatcher;
  private readonly logger: TaggedLogger;
  private readonly clock: () => number;

  private runId = 0;
  private lease: CameraLease | null = null;
  private readings: BPMReading[] = [];
  private startTimestamp: number | null = null;
  private lastFrameTimestamp: number | null = null;
  private progress = 0;
  private lastQuality: SignalQuality = 'poor';
  private processing = false;
  private droppedFrames = 0;
  private frameCount = 0;
  private lastError: MeasurementError | null = null;

  constructor(options: SessionOptions) {
    this.config = resolveMeasurementConfig(options.config);
    this.capability = options.capability;
    this.callbacks = {
      onBPMUpdate: options.onBPMUpdate,
      onQualityUpdate: options.onQualityUpdate,
      onProgressUpdate: options.onProgressUpdate,
      onFinished: options.onFinished,
      onError: options.onError,
      onStateChange: options.onStateChange,
    };
    this.dispatch = options.dispatch ?? inlineDispatcher;
    this.logger = createLogger('MeasurementSession', options.log);
    this.clock = options.clock ?? (() => Date.now() / 1000);
    this.buffer = new SignalBuffer(this.config.maxSamples);
  }

  getState(): MeasurementState {
    return this.state;
  }

  getLastError(): MeasurementError | null {
    return this.lastError;
  }

  getReadings(): readonly BPMReading[] {
    return this.readings.slice();
  }

  getSnapshot(): SessionSnapshot {
    return {
      state: this.state,
      progress: this.progress,
      sampleCount: this.buffer.count,
      readings: this.readings.slice(),
      lastQuality: this.lastQuality,
      droppedFrames: this.droppedFrames,
    };
  }

  /**
   * Checks the camera, permission and torch, then claims the hardware and
   * starts listening for frames. Resolves `false` after reporting `onError`
   * when any of them is unavailable; the state stays `idle`.
   */
  async startMeasurement(): Promise<boolean> {
    if (this.state === 'running') {
      this.logger.debug('session_restarted', {previousRun: this.runId});
      this.cancelMeasurement();
    }
    this.resetRun();
    const runId = ++this.runId;
    const {hardware} = this.capability;

    let cameraAvailable: boolean;
    try {
      cameraAvailable = hardware.isCameraAvailable();
    } catch (error) {
      return this.failStart('cameraUnavailable', error);
    }
    if (!cameraAvailable) {
      return this.failStart('cameraUnavailable');
    }

    let granted: boolean;
    try {
      const status = await hardware.getPermissionStatus();
      granted =
        status === 'granted' ||
        (status === 'undetermined' && (await hardware.requestPermission()));
    } catch (error) {
      if (runId !== this.runId) {
        return false;
      }
      return this.failStart('cameraUnavailable', error);
    }
    if (runId !== this.runId) {
      this.logger.debug('session_start_aborted', {runId});
      return false;
    }
    if (!granted) {
      return this.failStart('permissionDenied');
    }
    let torchAvailable: boolean;
    try {
      torchAvailable = hardware.hasTorch();
    } catch (error) {
      return this.failStart('illuminationUnavailable', error);
    }
    if (!torchAvailable) {
      return this.failStart('illuminationUnavailable');
    }

    const lease = this.capability.acquire(() => this.handlePreempted(runId));
    try {
      lease.torchOn(this.config.torchLevel);
      lease.listen(frame => this.handleFrame(frame));
    } catch (error) {
      lease.release();
      return this.failStart('illuminationUnavailable', error);
    }
    this.lease = lease;
    this.setState('running');
    this.logger.debug('session_started', {
      runId,
      sampleRateHz: this.config.sampleRateHz,
      durationSeconds: this.config.measurementDurationSeconds,
    });
    return true;
  }

  /**
   * Ends the run now. The torch is off before this returns; collected
   * readings are averaged once and reported through `onFinished`, or
   * `onError('measurementFailed')` when there are none.
   */
  stopMeasurement(): void {
    if (this.state !== 'running') {
      this.runId += 1; // aborts a start still waiting on permission
      return;
    }
    this.finish('stopped');
  }

  /** Ends the run without reporting a result. */
  cancelMeasurement(): void {
    this.runId += 1;
    if (this.state !== 'running') {
      return;
    }
    this.releaseHardware();
    this.logger.debug('session_cancelled', {readings: this.readings.length});
    this.setState('idle');
  }

  /**
   * Processes one frame. Frames arriving while another is being processed,
   * out of order, with a non-finite timestamp, or outside a run are dropped.
   */
  handleFrame(frame: CameraFrame): void {
    if (this.state !== 'running') {
      return;
    }
    if (this.processing) {
      this.dropFrame('busy');
      return;
    }
    this.processing = true;
    try {
      this.processFrame(frame, this.runId);
    } finally {
      this.processing = false;
    }
  }

  private processFrame(frame: CameraFrame, runId: number): void {
    const timestamp = frame.timestamp ?? this.clock();
    if (!Number.isFinite(timestamp)) {
      this.dropFrame('invalid_timestamp');
      return;
    }
    if (this.lastFrameTimestamp !== null && timestamp <= this.lastFrameTimestamp) {
      this.dropFrame('out_of_order');
      return;
    }

    let colors: ColorAverages;
    try {
      colors = extractColorAverages(frame, {
        roiFraction: this.config.roiFraction,
        pixelStride: this.config.pixelStride,
      });
    } catch (error) {
      this.logger.warn('frame_read_failed', {
        message: error instanceof Error ? error.message : String(error),
        recoverable: error instanceof FrameReadError,
      });
      return;
    }
    const value = channelValue(colors, this.config.channel);

    if (this.startTimestamp === null) {
      this.startTimestamp = timestamp;
    }
    this.lastFrameTimestamp = timestamp;
    const elapsed = timestamp - this.startTimestamp;
    this.buffer.append({value, timestampSeconds: elapsed});
    this.frameCount += 1;

    if (this.frameCount % PPG_CONFIG.debug.sampleLogThrottle === 0) {
      this.logger.debug('sample_received', {
        frameCount: this.frameCount,
        value,
        elapsed,
        bufferSize: this.buffer.count,
      });
    }

    this.progress = Math.min(elapsed / this.config.measurementDurationSeconds, 1);
    const progress = this.progress;
    this.emit('onProgressUpdate', () => this.callbacks.onProgressUpdate?.(progress));
    if (runId !== this.runId) return;

    const samples = this.buffer.windowed();
    const values = samples.map(sample => sample.value);
    const assessment = assessQuality(values, colors);
    this.lastQuality = assessment.quality;
    this.emit('onQualityUpdate', () =>
      this.callbacks.onQualityUpdate?.(assessment.quality),
    );
    if (runId !== this.runId) return;

    if (this.buffer.count >= this.config.minSamplesForCalculation) {
      const sampleRateHz = observedSampleRate(samples, this.config.sampleRateHz);
      const {bpm, peaks, spectralBpm, autocorrelationBpm} = runPipeline(values, {
        ...this.config,
        sampleRateHz,
      });
      if (bpm !== null) {
        this.readings.push({bpm, computedAtTimestamp: elapsed});
        this.logger.debug('bpm_computed', {
          bpm,
          peaks: peaks.length,
          spectralBpm,
          autocorrelationBpm,
          sampleRateHz,
          elapsed,
        });
        this.emit('onBPMUpdate', () => this.callbacks.onBPMUpdate?.(bpm));
        if (runId !== this.runId) return;
      }
    }

    if (elapsed >= this.config.measurementDurationSeconds) {
      this.finish('completed');
    }
  }

  private finish(reason: FinishReason): void {
    this.runId += 1;
    const bpms = this.readings.map(reading => reading.bpm);
    const durationSeconds =
      this.startTimestamp !== null && this.lastFrameTimestamp !== null
        ? this.lastFrameTimestamp - this.startTimestamp
        : 0;
    const lastQuality = this.lastQuality;

    try {
      this.releaseHardware();
    } finally {
      if (bpms.length === 0) {
        this.logger.debug('session_stopped', {reason, result: null});
        this.setState(reason === 'completed' ? 'finished' : 'idle');
        this.reportError('measurementFailed');
      } else {
        const averageBpm = integerMean(bpms);
        const summary = summarizeReadings(bpms, lastQuality, durationSeconds);
        this.logger.debug('session_stopped', {
          reason,
          averageBpm,
          readings: bpms.length,
        });
        this.setState('finished');
        this.emit('onFinished', () =>
          this.callbacks.onFinished?.(averageBpm, summary),
        );
      }
    }
  }

  private handlePreempted(runId: number): void {
    if (runId !== this.runId || this.state !== 'running') {
      return;
    }
    this.logger.warn('session_preempted', {runId});
    this.cancelMeasurement();
  }

  private releaseHardware(): void {
    const lease = this.lease;
    this.lease = null;
    lease?.release();
  }

  private failStart(kind: MeasurementErrorKind, cause?: unknown): false {
    this.logger.warn('session_start_failed', {
      kind,
      cause: cause instanceof Error ? cause.message : cause,
    });
    this.reportError(kind, cause);
    return false;
  }

  private reportError(kind: MeasurementErrorKind, cause?: unknown): void {
    this.lastError = new MeasurementError(kind, cause === undefined ? undefined : {cause});
    this.emit('onError', () => this.callbacks.onError?.(kind));
  }

  private dropFrame(reason: string): void {
    this.droppedFrames += 1;
    this.logger.debug('frame_dropped', {reason, droppedFrames: this.droppedFrames});
  }

  private resetRun(): void {
    this.buffer.clear();
    this.readings = [];
    this.startTimestamp = null;
    this.lastFrameTimestamp = null;
    this.progress = 0;
    this.lastQuality = 'poor';
    this.droppedFrames = 0;
    this.frameCount = 0;
    this.lastError = null;
  }

  private emit(name: keyof MeasurementCallbacks, task: () => void): void {
    this.dispatch(() => {
      try {
        task();
      } catch (error) {
        this.logger.error('callback_failed', {
          callback: name,
          message: error instanceof Error ? error.message : String(error),
        });
      }
    });
  }

  private setState(next: MeasurementState): void {
    if (this.state === next) {
      return;
    }
    this.logger.debug('state_transition', {from: this.state, to: next});
    this.state = next;
    this.emit('onStateChange', () => this.callbacks.onStateChange?.(next));
  }
}
