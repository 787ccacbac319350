/**
 * CalibrationModel service – applies pre-derived scale/offset constants to raw
 * detected frequencies.
 */

import { applyCalibration, deriveCalibration, IDENTITY_CALIBRATION, validateCalibration } from '../../utils/calibration';
import type { TwoToneMeasurement } from '../../utils/calibration';
import type { CalibrationParams } from '../../types';

export class CalibrationModel {
  readonly params: Readonly<CalibrationParams>;

  constructor(params: CalibrationParams = IDENTITY_CALIBRATION) {
    validateCalibration(params);
    this.params = Object.freeze({ scale: params.scale, offsetHz: params.offsetHz });
  }

  /**
   * Builds a model from two reference tones measured without calibration.
   * Throws ConfigurationError when both measurements are equal.
   */
  static fromTwoTones(measurement: TwoToneMeasurement): CalibrationModel {
    return new CalibrationModel(deriveCalibration(measurement));
  }

  apply(rawHz: number): number {
    return applyCalibration(rawHz, this.params);
  }
}
