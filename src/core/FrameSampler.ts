import type {CameraFrame, ColorAverages, PPGChannel} from '../types/PPGTypes';
import {PPG_CONFIG} from './PPGConfig';
import {FrameReadError} from './PPGErrors';

const BYTES_PER_PIXEL = 4;

export interface SamplerOptions {
  readonly roiFraction?: number;
  readonly pixelStride?: number;
  readonly channel?: PPGChannel;
}

const CHANNEL_OFFSETS = {
  bgra: {red: 2, green: 1, blue: 0},
  rgba: {red: 0, green: 1, blue: 2},
} as const;

/**
 * Mean colour over the strided central box of the frame. The box spans
 * `roiFraction` of each dimension around the centre, which keeps vignetted
 * edges out of the average.
 */
export function extractColorAverages(
  frame: CameraFrame,
  options: SamplerOptions = {},
): ColorAverages {
  const roi = options.roiFraction ?? PPG_CONFIG.camera.roiFraction;
  const stride = options.pixelStride ?? PPG_CONFIG.camera.pixelStride;
  const {width, height, data} = frame;

  if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
    throw new FrameReadError(`Invalid frame dimensions ${width}x${height}`);
  }
  const bytesPerRow = frame.bytesPerRow ?? width * BYTES_PER_PIXEL;
  if (bytesPerRow < width * BYTES_PER_PIXEL) {
    throw new FrameReadError(`Row stride ${bytesPerRow} too small for width ${width}`);
  }

  const startX = Math.floor((width * (1 - roi)) / 2);
  const endX = Math.floor((width * (1 + roi)) / 2);
  const startY = Math.floor((height * (1 - roi)) / 2);
  const endY = Math.floor((height * (1 + roi)) / 2);
  const offsets = CHANNEL_OFFSETS[frame.pixelFormat];

  let redSum = 0;
  let greenSum = 0;
  let blueSum = 0;
  let pixelCount = 0;

  for (let y = startY; y < endY; y += stride) {
    const rowStart = y * bytesPerRow;
    for (let x = startX; x < endX; x += stride) {
      const offset = rowStart + x * BYTES_PER_PIXEL;
      if (offset + BYTES_PER_PIXEL > data.length) {
        break;
      }
      redSum += data[offset + offsets.red];
      greenSum += data[offset + offsets.green];
      blueSum += data[offset + offsets.blue];
      pixelCount += 1;
    }
  }

  if (pixelCount === 0) {
    throw new FrameReadError('No readable pixels in sampled region');
  }
  return {
    red: redSum / pixelCount,
    green: greenSum / pixelCount,
    blue: blueSum / pixelCount,
    pixelCount,
  };
}

export function channelValue(
  averages: ColorAverages,
  channel: PPGChannel = PPG_CONFIG.camera.channel,
): number {
  return channel === 'green' ? averages.green : averages.red;
}

/** One scalar sample per frame: the configured channel's mean. */
export function sampleFrame(frame: CameraFrame, options: SamplerOptions = {}): number {
  return channelValue(extractColorAverages(frame, options), options.channel);
}
