import type {CameraFrame, PermissionStatus} from '../types/PPGTypes';

export interface FrameSubscription {
  remove(): void;
}

/**
 * Platform camera + torch access. `setTorchLevel` is synchronous so the torch
 * is off by the time a stop call returns.
 */
export interface CameraHardware {
  isCameraAvailable(): boolean;
  hasTorch(): boolean;
  getPermissionStatus(): Promise<PermissionStatus>;
  requestPermission(): Promise<boolean>;
  setTorchLevel(level: number): void;
  addFrameListener(listener: (frame: CameraFrame) => void): FrameSubscription;
}

/**
 * Exclusive hold on the camera and torch. `release` switches the torch off
 * and drops the frame subscription once; later calls do nothing.
 */
export class CameraLease {
  private released = false;
  private subscription: FrameSubscription | null = null;

  constructor(
    private readonly hardware: CameraHardware,
    private readonly onReleased: (lease: CameraLease) => void,
  ) {}

  get isReleased(): boolean {
    return this.released;
  }

  torchOn(level: number): void {
    if (this.released) {
      throw new Error('CameraLease used after release');
    }
    this.hardware.setTorchLevel(level);
  }

  listen(listener: (frame: CameraFrame) => void): void {
    if (this.released) {
      throw new Error('CameraLease used after release');
    }
    this.subscription?.remove();
    this.subscription = this.hardware.addFrameListener(listener);
  }

  release(): void {
    if (this.released) {
      return;
    }
    this.released = true;
    const subscription = this.subscription;
    this.subscription = null;
    try {
      subscription?.remove();
    } finally {
      try {
        this.hardware.setTorchLevel(0);
      } finally {
        this.onReleased(this);
      }
    }
  }
}

interface Holder {
  readonly lease: CameraLease;
  readonly onPreempted: () => void;
}

/**
 * Hands out at most one {@link CameraLease} at a time. A new acquisition
 * preempts the current holder, which is told to stop before the new lease
 * is issued.
 */
export class CameraCapability {
  private holder: Holder | null = null;

  constructor(readonly hardware: CameraHardware) {}

  get isHeld(): boolean {
    return this.holder !== null;
  }

  acquire(onPreempted: () => void): CameraLease {
    const previous = this.holder;
    if (previous) {
      previous.onPreempted();
      // holder that ignored preemption still loses the hardware
      previous.lease.release();
    }
    const lease = new CameraLease(this.hardware, released => {
      if (this.holder?.lease === released) {
        this.holder = null;
      }
    });
    this.holder = {lease, onPreempted};
    return lease;
  }
}
