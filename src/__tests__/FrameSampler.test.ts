import {channelValue, extractColorAverages, sampleFrame} from '../core/FrameSampler';
import {FrameReadError} from '../core/PPGErrors';
import {solidFrame} from '../testing/syntheticSignal';
import type {CameraFrame} from '../types/PPGTypes';

function frameWith(
  width: number,
  height: number,
  pixel: (x: number, y: number) => [number, number, number],
  pixelFormat: 'bgra' | 'rgba' = 'bgra',
  bytesPerRow = width * 4,
): CameraFrame {
  const data = new Uint8Array(bytesPerRow * height);
  for (let y = 0; y < height; y += 1) {
    for (let x = 0; x < width; x += 1) {
      const [r, g, b] = pixel(x, y);
      const offset = y * bytesPerRow + x * 4;
      if (pixelFormat === 'bgra') {
        data.set([b, g, r, 255], offset);
      } else {
        data.set([r, g, b, 255], offset);
      }
    }
  }
  return {width, height, pixelFormat, data, bytesPerRow};
}

describe('FrameSampler', () => {
  it('averages every channel over the sampled pixels', () => {
    expect(extractColorAverages(solidFrame(150))).toEqual({
      red: 150,
      green: 30,
      blue: 20,
      pixelCount: 4,
    });
  });

  it('reads only the strided central box', () => {
    // sampled pixels at x, y ∈ {2, 4}; everything else is a distractor
    const frame = frameWith(8, 8, (x, y) => {
      const sampled = (x === 2 || x === 4) && (y === 2 || y === 4);
      return sampled ? [100, 0, 0] : [255, 255, 255];
    });

    expect(sampleFrame(frame)).toBe(100);
  });

  it('reads red from RGBA frames', () => {
    const frame = frameWith(8, 8, () => [180, 40, 10], 'rgba');

    expect(sampleFrame(frame)).toBe(180);
  });

  it('honours padded rows', () => {
    const frame = frameWith(8, 8, () => [90, 40, 10], 'bgra', 40);

    expect(sampleFrame(frame)).toBe(90);
  });

  it('samples the green channel when asked', () => {
    expect(sampleFrame(solidFrame(150), {channel: 'green'})).toBe(30);
  });

  it('keeps fractional averages', () => {
    expect(sampleFrame(solidFrame(128.25))).toBe(128.25);
  });

  it('fails with FrameReadError when no pixel can be read', () => {
    const empty: CameraFrame = {width: 8, height: 8, pixelFormat: 'bgra', data: new Uint8Array(0)};
    const degenerate: CameraFrame = {width: 0, height: 8, pixelFormat: 'bgra', data: new Uint8Array(32)};
    const tiny = frameWith(1, 1, () => [200, 0, 0]);

    expect(() => sampleFrame(empty)).toThrow(FrameReadError);
    expect(() => sampleFrame(degenerate)).toThrow(FrameReadError);
    expect(() => sampleFrame(tiny)).toThrow('No readable pixels in sampled region');
  });

  it('picks the configured channel from the averages', () => {
    const averages = extractColorAverages(solidFrame(150, 0, {green: 90, blue: 40}));

    expect(averages).toEqual({red: 150, green: 90, blue: 40, pixelCount: 4});
    expect(channelValue(averages)).toBe(150);
    expect(channelValue(averages, 'green')).toBe(90);
  });
});
