/**
 * Unit tests for the SpectralAnalyzer service.
 *
 * Validates:
 * - Refined frequency within one tenth of a bin for pure tones
 * - Bin-centred tones come back unchanged
 * - Silence and sub-noise-floor blocks report no peak
 * - Nyquist-bin peaks use the raw bin frequency
 * - Boundary rejection of invalid sample rates, block sizes and block lengths
 */

import { SpectralAnalyzer } from '../../services/audio/spectralAnalyzer';
import { ConfigurationError } from '../../errors';
import { generateNyquistWave, generateSineWave } from '../utils/testHelpers';

const SAMPLE_RATE = 44100;
const BLOCK_SIZE = 2048;
const BIN_HZ = SAMPLE_RATE / BLOCK_SIZE;

// ── Construction ─────────────────────────────────────────────────────────────

describe('SpectralAnalyzer – construction', () => {
  it('rejects a non-positive sample rate', () => {
    expect(() => new SpectralAnalyzer(0, BLOCK_SIZE)).toThrow(ConfigurationError);
    expect(() => new SpectralAnalyzer(-1, BLOCK_SIZE)).toThrow(ConfigurationError);
  });

  it('rejects an empty or fractional block size', () => {
    expect(() => new SpectralAnalyzer(SAMPLE_RATE, 0)).toThrow(ConfigurationError);
    expect(() => new SpectralAnalyzer(SAMPLE_RATE, 10.5)).toThrow(ConfigurationError);
  });

  it('rejects a negative noise floor', () => {
    expect(() => new SpectralAnalyzer(SAMPLE_RATE, BLOCK_SIZE, { noiseFloor: -0.1 })).toThrow(ConfigurationError);
  });

  it('derives bin width and first search bin', () => {
    const analyzer = new SpectralAnalyzer(8000, 256, { minFrequencyHz: 500 });
    expect(analyzer.binHz).toBe(31.25);
    expect(analyzer.startBin).toBe(16);
    expect(new SpectralAnalyzer(8000, 256).startBin).toBe(1);
  });
});

// ── Pure tones ───────────────────────────────────────────────────────────────

describe('SpectralAnalyzer – pure tones', () => {
  const analyzer = new SpectralAnalyzer(SAMPLE_RATE, BLOCK_SIZE, { noiseFloor: 0.002 });

  it.each([261.63, 440, 523.25, 1000, 3520])('refines %f Hz to within a tenth of a bin', frequency => {
    const peak = analyzer.analyze(generateSineWave(frequency, SAMPLE_RATE, BLOCK_SIZE, 0.5));
    expect(peak).not.toBeNull();
    expect(Math.abs(peak!.refinedFrequencyHz - frequency)).toBeLessThan(BIN_HZ / 10);
    expect(peak!.binIndex).toBe(Math.round(frequency / BIN_HZ));
    expect(peak!.binFrequencyHz).toBeCloseTo(peak!.binIndex * BIN_HZ, 10);
  });

  it('does better than the raw bin for an off-centre tone', () => {
    const peak = analyzer.analyze(generateSineWave(440, SAMPLE_RATE, BLOCK_SIZE, 0.5));
    expect(Math.abs(peak!.refinedFrequencyHz - 440)).toBeLessThan(Math.abs(peak!.binFrequencyHz - 440));
  });

  it('returns a bin-centred tone unchanged', () => {
    // 1000 Hz is exactly bin 32 at 8000 Hz / 256
    const small = new SpectralAnalyzer(8000, 256);
    const peak = small.analyze(generateSineWave(1000, 8000, 256, 0.5));
    expect(peak!.binIndex).toBe(32);
    expect(peak!.refinedFrequencyHz).toBeCloseTo(1000, 3);
    expect(peak!.magnitude).toBeCloseTo(0.5, 4);
  });

  it('handles non power-of-two block sizes', () => {
    const odd = new SpectralAnalyzer(8000, 1000);
    const peak = odd.analyze(generateSineWave(1000, 8000, 1000, 0.5));
    expect(peak!.binIndex).toBe(125);
    expect(Math.abs(peak!.refinedFrequencyHz - 1000)).toBeLessThan(0.8);
  });

  it('skips bins below minFrequencyHz', () => {
    const tones = generateSineWave(100, 8000, 256, 0.8);
    const upper = generateSineWave(1000, 8000, 256, 0.3);
    for (let i = 0; i < tones.length; i++) tones[i] += upper[i];

    expect(new SpectralAnalyzer(8000, 256).analyze(tones)!.binIndex).toBe(3);
    expect(new SpectralAnalyzer(8000, 256, { minFrequencyHz: 500 }).analyze(tones)!.binIndex).toBe(32);
  });
});

// ── Silence ──────────────────────────────────────────────────────────────────

describe('SpectralAnalyzer – silence', () => {
  it('reports no peak for an all-zero block', () => {
    const analyzer = new SpectralAnalyzer(SAMPLE_RATE, BLOCK_SIZE);
    expect(analyzer.analyze(new Float32Array(BLOCK_SIZE))).toBeNull();
  });

  it('reports no peak when the peak does not exceed the noise floor', () => {
    const analyzer = new SpectralAnalyzer(SAMPLE_RATE, BLOCK_SIZE, { noiseFloor: 0.002 });
    expect(analyzer.analyze(generateSineWave(440, SAMPLE_RATE, BLOCK_SIZE, 0.001))).toBeNull();
    expect(analyzer.analyze(generateSineWave(440, SAMPLE_RATE, BLOCK_SIZE, 0.01))).not.toBeNull();
  });
});

// ── Edge bins ────────────────────────────────────────────────────────────────

describe('SpectralAnalyzer – edge bins', () => {
  it('reports a Nyquist peak at fs/2 without interpolation', () => {
    const analyzer = new SpectralAnalyzer(8000, 64);
    const peak = analyzer.analyze(generateNyquistWave(64, 0.5));
    expect(peak).toEqual({
      binIndex: 32,
      binFrequencyHz: 4000,
      refinedFrequencyHz: 4000,
      magnitude: expect.closeTo(1.0, 10),
    });
  });
});

// ── Block length contract ────────────────────────────────────────────────────

describe('SpectralAnalyzer – block length', () => {
  it('rejects blocks of the wrong length', () => {
    const analyzer = new SpectralAnalyzer(SAMPLE_RATE, BLOCK_SIZE);
    expect(() => analyzer.analyze(new Float32Array(BLOCK_SIZE / 2))).toThrow(ConfigurationError);
    expect(() => analyzer.analyze(new Float32Array(0))).toThrow(ConfigurationError);
  });

  it('exposes the full spectrum for drawing', () => {
    const analyzer = new SpectralAnalyzer(8000, 256);
    expect(analyzer.spectrum(new Float32Array(256)).length).toBe(129);
  });
});
