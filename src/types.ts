/**
 * Types shared across the live pitch monitor.
 */

/** One fixed-size block of mono samples handed over by the capture source. */
export interface AudioBlock {
  /** Mono samples in the range -1..1 */
  readonly samples: Float32Array;
  /** Sample rate in Hz (constant for the run) */
  readonly sampleRate: number;
  /** Arrival order, starting at 0 */
  readonly sequence: number;
}

/** Dominant spectral peak of one analysed block */
export interface SpectrumPeak {
  /** Index of the strongest magnitude bin */
  binIndex: number;
  /** Centre frequency of that bin in Hz */
  binFrequencyHz: number;
  /** Frequency after parabolic sub-bin refinement */
  refinedFrequencyHz: number;
  /** Amplitude-normalised magnitude of the peak bin */
  magnitude: number;
}

/** Affine correction applied to raw detected frequencies */
export interface CalibrationParams {
  scale: number;
  offsetHz: number;
}

export interface PitchReading {
  /** Calibrated frequency in Hz */
  frequencyHz: number;
  /** Fractional MIDI number (69 = A4 = 440 Hz) */
  midiFloat: number;
  /** Nearest MIDI note */
  midiInt: number;
  /** Note name in sharp spelling, e.g. "C#" */
  noteName: string;
  octave: number;
  /** Deviation from midiInt in cents, in [-50, 50) */
  cents: number;
}

/** What the display reads: the last published reading, or null for silence */
export type LatestResult = PitchReading | null;

/** What to publish when a block contains no peak above the noise floor */
export type SilencePolicy = 'clear' | 'hold';

export interface PipelineStats {
  /** Blocks accepted from the capture source */
  received: number;
  /** Blocks that went through analysis */
  processed: number;
  /** Blocks discarded because the queue was full */
  dropped: number;
  /** Processed blocks that yielded no peak */
  silent: number;
}
