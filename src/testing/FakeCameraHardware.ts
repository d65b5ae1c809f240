import type {CameraHardware, FrameSubscription} from '../core/CameraCapability';
import type {CameraFrame, PermissionStatus} from '../types/PPGTypes';

export interface FakeHardwareOptions {
  readonly cameraAvailable?: boolean;
  readonly torch?: boolean;
  readonly permission?: PermissionStatus;
  readonly grantOnRequest?: boolean;
  readonly torchFailure?: Error;
  readonly cameraQueryFailure?: Error;
  readonly torchQueryFailure?: Error;
}

/**
 * In-memory camera for driving {@link MeasurementSession} in tests. Records
 * every torch level it is given and lets the test push frames to whoever is
 * listening.
 */
export class FakeCameraHardware implements CameraHardware {
  readonly torchCalls: number[] = [];
  permissionRequests = 0;
  private readonly listeners = new Set<(frame: CameraFrame) => void>();
  private permission: PermissionStatus;

  constructor(private readonly options: FakeHardwareOptions = {}) {
    this.permission = options.permission ?? 'granted';
  }

  isCameraAvailable(): boolean {
    if (this.options.cameraQueryFailure) {
      throw this.options.cameraQueryFailure;
    }
    return this.options.cameraAvailable ?? true;
  }

  hasTorch(): boolean {
    if (this.options.torchQueryFailure) {
      throw this.options.torchQueryFailure;
    }
    return this.options.torch ?? true;
  }

  async getPermissionStatus(): Promise<PermissionStatus> {
    return this.permission;
  }

  async requestPermission(): Promise<boolean> {
    this.permissionRequests += 1;
    const granted = this.options.grantOnRequest ?? false;
    this.permission = granted ? 'granted' : 'denied';
    return granted;
  }

  setTorchLevel(level: number): void {
    if (level > 0 && this.options.torchFailure) {
      throw this.options.torchFailure;
    }
    this.torchCalls.push(level);
  }

  addFrameListener(listener: (frame: CameraFrame) => void): FrameSubscription {
    this.listeners.add(listener);
    return {
      remove: () => {
        this.listeners.delete(listener);
      },
    };
  }

  get listenerCount(): number {
    return this.listeners.size;
  }

  get torchOffCount(): number {
    return this.torchCalls.filter(level => level === 0).length;
  }

  get torchIsOn(): boolean {
    const last = this.torchCalls[this.torchCalls.length - 1];
    return last !== undefined && last > 0;
  }

  emit(frame: CameraFrame): void {
    for (const listener of Array.from(this.listeners)) {
      listener(frame);
    }
  }
}
