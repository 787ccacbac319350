/**
 * Run-time settings for the pitch monitor.
 *
 * All values are fixed at initialisation. `resolveTunerConfig` merges caller
 * overrides over the defaults and rejects anything the pipeline cannot run with.
 */

import { ConfigurationError } from './errors';
import { IDENTITY_CALIBRATION, validateCalibration } from './utils/calibration';
import type { CalibrationParams, SilencePolicy } from './types';

export interface TunerConfig {
  /** Capture sample rate in Hz */
  sampleRate: number;
  /** Samples per AudioBlock (power of two for the fast transform path) */
  blockSize: number;
  /** Seconds of audio kept in the waveform ring buffer */
  displayWindowSeconds: number;
  /** Seconds of the most recent audio drawn by the waveform view */
  plotWindowSeconds: number;
  /** Peaks at or below this normalised magnitude count as silence */
  noiseFloor: number;
  /** Bins below this frequency are ignored by the peak search */
  minFrequencyHz: number;
  /** Blocks held between capture and analysis before the oldest is dropped */
  queueCapacity: number;
  silencePolicy: SilencePolicy;
  calibration: CalibrationParams;
}

export type TunerConfigOverrides = Partial<Omit<TunerConfig, 'calibration'>> & {
  calibration?: Partial<CalibrationParams>;
};

export const DEFAULT_TUNER_CONFIG: Readonly<TunerConfig> = Object.freeze({
  sampleRate: 44100,
  blockSize: 2048,          // ~46 ms @ 44100, ~21.5 Hz per bin
  displayWindowSeconds: 2.0,
  plotWindowSeconds: 0.1,
  noiseFloor: 0.002,
  minFrequencyHz: 20,
  queueCapacity: 8,
  silencePolicy: 'clear',
  calibration: IDENTITY_CALIBRATION,
});

function requirePositive(field: string, value: number): void {
  if (!Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(field, `must be a positive number, got ${value}`);
  }
}

function requirePositiveInteger(field: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(field, `must be a positive integer, got ${value}`);
  }
}

/**
 * Checks every setting, throwing ConfigurationError on the first invalid one.
 */
export function validateTunerConfig(config: TunerConfig): void {
  requirePositive('sampleRate', config.sampleRate);
  requirePositiveInteger('blockSize', config.blockSize);
  requirePositive('displayWindowSeconds', config.displayWindowSeconds);
  requirePositive('plotWindowSeconds', config.plotWindowSeconds);
  requirePositiveInteger('queueCapacity', config.queueCapacity);

  if (!Number.isFinite(config.noiseFloor) || config.noiseFloor < 0) {
    throw new ConfigurationError('noiseFloor', `must be zero or more, got ${config.noiseFloor}`);
  }
  if (!Number.isFinite(config.minFrequencyHz) || config.minFrequencyHz < 0) {
    throw new ConfigurationError('minFrequencyHz', `must be zero or more, got ${config.minFrequencyHz}`);
  }
  if (config.silencePolicy !== 'clear' && config.silencePolicy !== 'hold') {
    throw new ConfigurationError('silencePolicy', `must be "clear" or "hold", got ${String(config.silencePolicy)}`);
  }
  if (bufferCapacity(config) < 1) {
    throw new ConfigurationError('displayWindowSeconds', 'holds less than one sample');
  }

  validateCalibration(config.calibration);
}

/**
 * Builds a validated, frozen configuration from the defaults and `overrides`.
 */
export function resolveTunerConfig(overrides: TunerConfigOverrides = {}): Readonly<TunerConfig> {
  const { calibration, ...rest } = overrides;
  const config: TunerConfig = {
    ...DEFAULT_TUNER_CONFIG,
    ...rest,
    calibration: Object.freeze({ ...DEFAULT_TUNER_CONFIG.calibration, ...calibration }),
  };
  validateTunerConfig(config);
  return Object.freeze(config);
}

/** Ring buffer capacity in samples (display window × sample rate). */
export function bufferCapacity(config: TunerConfig): number {
  return Math.floor(config.displayWindowSeconds * config.sampleRate);
}

/** Number of samples the waveform view draws, never more than the buffer holds. */
export function plotSampleCount(config: TunerConfig): number {
  return Math.max(1, Math.min(bufferCapacity(config), Math.floor(config.plotWindowSeconds * config.sampleRate)));
}
