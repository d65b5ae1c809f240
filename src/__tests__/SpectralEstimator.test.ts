import {
  estimateAutocorrelationBpm,
  estimateSpectralBpm,
  fuseEstimates,
} from '../core/SpectralEstimator';
import {pulseSignal} from '../testing/syntheticSignal';

describe('SpectralEstimator', () => {
  it('finds the dominant pulse frequency', () => {
    const signal = pulseSignal(72, 20, 30, {baseline: 0});
    const bpm = estimateSpectralBpm(signal, 30);

    expect(bpm).not.toBeNull();
    expect(bpm).toBeGreaterThanOrEqual(70);
    expect(bpm).toBeLessThanOrEqual(74);
  });

  it('needs at least 64 samples', () => {
    expect(estimateSpectralBpm(new Array<number>(63).fill(1), 30)).toBeNull();
  });

  it('finds nothing in a silent band', () => {
    expect(estimateSpectralBpm(new Array<number>(128).fill(0), 30)).toBeNull();
  });

  describe('autocorrelation', () => {
    it('recovers the pulse period as a lag', () => {
      expect(estimateAutocorrelationBpm(pulseSignal(72, 20, 30), 30)).toBe(72);
    });

    it('scales the lag by the sample rate it is given', () => {
      expect(estimateAutocorrelationBpm(pulseSignal(72, 20, 24), 24)).toBe(72);
    });

    it('needs at least 128 samples', () => {
      expect(estimateAutocorrelationBpm(pulseSignal(72, 10, 30).slice(0, 127), 30)).toBeNull();
    });

    it('needs a window twice the slowest period', () => {
      const signal = pulseSignal(72, 10, 30).slice(0, 128);

      expect(estimateAutocorrelationBpm(signal, 30)).not.toBeNull();
      expect(estimateAutocorrelationBpm(signal, 30, {min: 20, max: 200})).toBeNull();
    });

    it('finds nothing in a flat signal', () => {
      expect(estimateAutocorrelationBpm(new Array<number>(300).fill(200), 30)).toBeNull();
    });
  });

  describe('fuseEstimates', () => {
    it('averages estimates that agree within 10 BPM', () => {
      expect(fuseEstimates(72, {spectralBpm: 76})).toBe(74);
      expect(fuseEstimates(71, {spectralBpm: 72})).toBe(72);
      expect(fuseEstimates(72, {spectralBpm: 82})).toBe(77);
    });

    it('prefers the autocorrelation estimate when both agree', () => {
      expect(fuseEstimates(72, {spectralBpm: 80, autocorrelationBpm: 74})).toBe(73);
    });

    it('falls through to the spectral estimate when autocorrelation disagrees', () => {
      expect(fuseEstimates(72, {spectralBpm: 76, autocorrelationBpm: 100})).toBe(74);
    });

    it('keeps the peak estimate when nothing agrees', () => {
      expect(fuseEstimates(72, {spectralBpm: 90, autocorrelationBpm: 50})).toBe(72);
      expect(fuseEstimates(72, {spectralBpm: null, autocorrelationBpm: null})).toBe(72);
      expect(fuseEstimates(72, {})).toBe(72);
    });

    it('never surfaces a cross-check-only reading', () => {
      expect(fuseEstimates(null, {spectralBpm: 72, autocorrelationBpm: 72})).toBeNull();
    });
  });
});
