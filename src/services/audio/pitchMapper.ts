/**
 * PitchMapper service – calibrated frequency to musical pitch.
 *
 * Converts frequencies into note name, octave and cents deviation relative to
 * equal temperament with A4 = 440 Hz, and renders the display title.
 */

import { formatPitchTitle, frequencyToPitch } from '../../utils/musicUtils';
import type { PitchReading } from '../../types';

export class PitchMapper {
  /**
   * @param calibratedHz - Frequency in Hz; must be positive (silence is handled upstream)
   * @returns Frozen PitchReading
   */
  map(calibratedHz: number): PitchReading {
    return Object.freeze(frequencyToPitch(calibratedHz));
  }

  /** Display title, e.g. "440.1 Hz – A4 (+0.3 cents)". */
  describe(reading: PitchReading | null): string {
    return formatPitchTitle(reading);
  }
}
