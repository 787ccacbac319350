/**
 * SpectralAnalyzer service – dominant frequency of one audio block.
 *
 * Windows the block (Hann), takes its magnitude spectrum, finds the strongest
 * non-DC bin and refines it with parabolic interpolation. Blocks whose peak
 * does not exceed the noise floor are reported as silence (null).
 */

import { ConfigurationError } from '../../errors';
import { hannWindow, magnitudeSpectrum } from '../../utils/fft';
import { findPeakBin, refinePeakFrequency } from '../../utils/spectralPeak';
import type { SpectrumPeak } from '../../types';

export interface SpectralAnalyzerOptions {
  /** Peaks at or below this normalised magnitude are treated as silence (default 0) */
  noiseFloor?: number;
  /** Ignore bins below this frequency (default 0: only DC is skipped) */
  minFrequencyHz?: number;
}

export class SpectralAnalyzer {
  readonly sampleRate: number;
  readonly blockSize: number;
  readonly noiseFloor: number;
  /** First bin the peak search looks at (always ≥ 1) */
  readonly startBin: number;
  private readonly window: Float64Array;

  constructor(sampleRate: number, blockSize: number, options: SpectralAnalyzerOptions = {}) {
    if (!Number.isFinite(sampleRate) || sampleRate <= 0) {
      throw new ConfigurationError('sampleRate', `must be a positive number, got ${sampleRate}`);
    }
    if (!Number.isInteger(blockSize) || blockSize <= 0) {
      throw new ConfigurationError('blockSize', `must be a positive integer, got ${blockSize}`);
    }
    const noiseFloor = options.noiseFloor ?? 0;
    if (!Number.isFinite(noiseFloor) || noiseFloor < 0) {
      throw new ConfigurationError('noiseFloor', `must be zero or more, got ${noiseFloor}`);
    }

    this.sampleRate = sampleRate;
    this.blockSize = blockSize;
    this.noiseFloor = noiseFloor;
    this.startBin = Math.max(1, Math.ceil((options.minFrequencyHz ?? 0) / this.binHz));
    this.window = hannWindow(blockSize);
  }

  /** Width of one frequency bin in Hz */
  get binHz(): number {
    return this.sampleRate / this.blockSize;
  }

  /**
   * Full magnitude spectrum of a block (floor(N/2) + 1 bins), for callers
   * that want to draw it.
   */
  spectrum(samples: Float32Array): Float64Array {
    this.assertBlockLength(samples);
    return magnitudeSpectrum(samples, this.window);
  }

  /**
   * Locates the dominant spectral peak.
   *
   * @param samples - Exactly `blockSize` time-domain samples
   * @returns SpectrumPeak, or null when the block is silent
   */
  analyze(samples: Float32Array): SpectrumPeak | null {
    const mags = this.spectrum(samples);
    const binIndex = findPeakBin(mags, this.startBin);
    if (binIndex < 0) return null;

    const magnitude = mags[binIndex];
    if (!(magnitude > this.noiseFloor)) return null;

    return {
      binIndex,
      binFrequencyHz: binIndex * this.binHz,
      refinedFrequencyHz: refinePeakFrequency(mags, binIndex, this.sampleRate, this.blockSize),
      magnitude,
    };
  }

  private assertBlockLength(samples: Float32Array): void {
    if (samples.length !== this.blockSize) {
      throw new ConfigurationError('blockSize', `expected ${this.blockSize} samples, got ${samples.length}`);
    }
  }
}
