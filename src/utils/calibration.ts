/**
 * Affine frequency calibration.
 *
 * Corrects systematic measurement bias (sample-rate drift, fixed offsets):
 *   calibrated = raw × scale + offset
 *
 * Constants are derived offline from two reference tones; the pipeline only
 * applies them.
 */

import { ConfigurationError } from '../errors';
import type { CalibrationParams } from '../types';

export const IDENTITY_CALIBRATION: Readonly<CalibrationParams> = Object.freeze({ scale: 1.0, offsetHz: 0.0 });

/** Two known reference tones and what the uncalibrated monitor measured for them */
export interface TwoToneMeasurement {
  /** First reference frequency (Hz) */
  f1: number;
  /** Measured value for f1 (Hz) */
  m1: number;
  f2: number;
  m2: number;
}

export function applyCalibration(rawHz: number, params: CalibrationParams): number {
  return rawHz * params.scale + params.offsetHz;
}

/**
 * Throws ConfigurationError unless scale is finite and positive and the offset finite.
 */
export function validateCalibration(params: CalibrationParams): void {
  if (!Number.isFinite(params.scale) || params.scale <= 0) {
    throw new ConfigurationError('calibration.scale', `must be a positive number, got ${params.scale}`);
  }
  if (!Number.isFinite(params.offsetHz)) {
    throw new ConfigurationError('calibration.offsetHz', `must be finite, got ${params.offsetHz}`);
  }
}

/**
 * Derives scale and offset from the two-tone procedure:
 *   scale  = (f2 − f1) / (m2 − m1)
 *   offset = f1 − scale × m1
 *
 * Identical measurements leave the scale undefined and are rejected.
 */
export function deriveCalibration({ f1, m1, f2, m2 }: TwoToneMeasurement): CalibrationParams {
  for (const [name, value] of [['f1', f1], ['m1', m1], ['f2', f2], ['m2', m2]] as const) {
    if (!Number.isFinite(value)) {
      throw new ConfigurationError(`calibration.${name}`, `must be finite, got ${value}`);
    }
  }
  if (m2 === m1) {
    throw new ConfigurationError('calibration', 'both reference tones measured the same frequency; scale is undefined');
  }

  const scale = (f2 - f1) / (m2 - m1);
  const params = { scale, offsetHz: f1 - scale * m1 };
  validateCalibration(params);
  return params;
}
