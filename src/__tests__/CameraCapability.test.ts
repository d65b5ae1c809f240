import {CameraCapability} from '../core/CameraCapability';
import {FakeCameraHardware} from '../testing/FakeCameraHardware';
import {solidFrame} from '../testing/syntheticSignal';

describe('CameraCapability', () => {
  it('turns the torch off exactly once on release', () => {
    const hardware = new FakeCameraHardware();
    const capability = new CameraCapability(hardware);
    const lease = capability.acquire(() => undefined);

    lease.torchOn(1);
    lease.release();
    lease.release();

    expect(hardware.torchCalls).toEqual([1, 0]);
    expect(lease.isReleased).toBe(true);
    expect(capability.isHeld).toBe(false);
  });

  it('drops the frame subscription on release', () => {
    const hardware = new FakeCameraHardware();
    const lease = new CameraCapability(hardware).acquire(() => undefined);
    const frames: number[] = [];

    lease.listen(frame => frames.push(frame.timestamp ?? -1));
    hardware.emit(solidFrame(100, 1));
    lease.release();
    hardware.emit(solidFrame(100, 2));

    expect(frames).toEqual([1]);
    expect(hardware.listenerCount).toBe(0);
  });

  it('preempts the current holder before issuing a new lease', () => {
    const hardware = new FakeCameraHardware();
    const capability = new CameraCapability(hardware);
    const preempted = jest.fn();

    const first = capability.acquire(preempted);
    first.torchOn(1);
    const second = capability.acquire(() => undefined);
    second.torchOn(1);

    expect(preempted).toHaveBeenCalledTimes(1);
    expect(first.isReleased).toBe(true);
    expect(second.isReleased).toBe(false);
    expect(capability.isHeld).toBe(true);
    expect(hardware.torchCalls).toEqual([1, 0, 1]);
  });

  it('refuses to use a released lease', () => {
    const lease = new CameraCapability(new FakeCameraHardware()).acquire(() => undefined);
    lease.release();

    expect(() => lease.torchOn(1)).toThrow('CameraLease used after release');
    expect(() => lease.listen(() => undefined)).toThrow('CameraLease used after release');
  });
});
