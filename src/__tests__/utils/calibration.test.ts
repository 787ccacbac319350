/**
 * Unit tests for frequency calibration.
 */

import { applyCalibration, deriveCalibration, IDENTITY_CALIBRATION, validateCalibration } from '../../utils/calibration';
import { ConfigurationError } from '../../errors';

describe('applyCalibration', () => {
  it('is the identity with scale 1 and offset 0', () => {
    for (const raw of [0.5, 27.5, 440, 1234.5678, 20000]) {
      expect(applyCalibration(raw, IDENTITY_CALIBRATION)).toBe(raw);
    }
  });

  it('scales then offsets', () => {
    expect(applyCalibration(990, { scale: 1000 / 990, offsetHz: 0 })).toBeCloseTo(1000, 10);
    expect(applyCalibration(100, { scale: 2, offsetHz: -5 })).toBe(195);
  });
});

describe('deriveCalibration', () => {
  it('recovers scale and offset from two reference tones', () => {
    // Monitor reads 1% low plus 0.5 Hz: m = f × 0.99 + 0.5
    const params = deriveCalibration({ f1: 440, m1: 436.1, f2: 880, m2: 871.7 });
    expect(params.scale).toBeCloseTo(1 / 0.99, 10);
    expect(params.offsetHz).toBeCloseTo(-0.5 / 0.99, 10);
    expect(applyCalibration(436.1, params)).toBeCloseTo(440, 9);
    expect(applyCalibration(871.7, params)).toBeCloseTo(880, 9);
  });

  it('treats identical measurements as a configuration error', () => {
    expect(() => deriveCalibration({ f1: 440, m1: 441, f2: 880, m2: 441 })).toThrow(ConfigurationError);
  });

  it('rejects non-finite inputs', () => {
    expect(() => deriveCalibration({ f1: Number.NaN, m1: 1, f2: 2, m2: 3 })).toThrow(ConfigurationError);
  });

  it('rejects a derivation that yields a negative scale', () => {
    expect(() => deriveCalibration({ f1: 440, m1: 880, f2: 880, m2: 440 })).toThrow(ConfigurationError);
  });
});

describe('validateCalibration', () => {
  it('accepts the identity', () => {
    expect(() => validateCalibration(IDENTITY_CALIBRATION)).not.toThrow();
  });

  it('names the offending field', () => {
    try {
      validateCalibration({ scale: 0, offsetHz: 0 });
      expect.unreachable('scale 0 should be rejected');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      expect(err).toMatchObject({ field: 'calibration.scale' });
    }
    expect(() => validateCalibration({ scale: 1, offsetHz: Infinity })).toThrow(ConfigurationError);
  });
});
