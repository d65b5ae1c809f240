import {
  adaptiveThreshold,
  findPeaks,
  minPeakDistance,
  percentile,
} from '../core/PeakDetector';

describe('PeakDetector', () => {
  it('returns no peaks for signals of two samples or fewer', () => {
    expect(findPeaks([], 1)).toEqual([]);
    expect(findPeaks([1, 2], 1)).toEqual([]);
  });

  it('finds one peak per cycle of a 60 BPM wave at 30 Hz', () => {
    const signal = Array.from({length: 300}, (_, i) => Math.cos((2 * Math.PI * i) / 30));
    const peaks = findPeaks(signal, minPeakDistance(30));

    expect(peaks).toEqual([30, 60, 90, 120, 150, 180, 210, 240, 270]);
  });

  it('skips a second crest closer than the minimum distance', () => {
    const signal = [0, 3, 0, 2.9, 0, 0, 0, 0, 0, 0, 3, 0];

    expect(findPeaks(signal, 4)).toEqual([1, 10]);
    expect(findPeaks(signal, 1)).toEqual([1, 3, 10]);
  });

  it('ignores maxima that do not exceed the adaptive threshold', () => {
    const signal = [0, 1, 0, 10, 0, 1, 0, 10, 0, 10, 0];

    expect(adaptiveThreshold(signal)).toBe(1);
    expect(findPeaks(signal, 1)).toEqual([3, 7, 9]);
  });

  it('requires a strict local maximum', () => {
    expect(findPeaks([0, 5, 5, 0, 0, 0], 1)).toEqual([]);
  });

  it('takes the lower nearest-rank percentile', () => {
    expect(percentile([5, 1, 4, 2, 3], 0.6)).toBe(3);
    expect(percentile([], 0.6)).toBe(0);
  });

  it('derives the minimum distance from the sample rate', () => {
    expect(minPeakDistance(30)).toBe(9);
    expect(minPeakDistance(60, 0.3)).toBe(18);
    expect(minPeakDistance(1, 0.3)).toBe(1);
  });
});
