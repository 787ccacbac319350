/**
 * PitchTitle – one-line reading: frequency, note and cents deviation.
 */

import { centsToColor, formatPitchTitle } from '../utils/musicUtils';
import type { LatestResult } from '../types';

interface PitchTitleProps {
  pitch: LatestResult;
  isRunning: boolean;
}

export function PitchTitle({ pitch, isRunning }: PitchTitleProps) {
  if (!isRunning) {
    return <h2 className="pitch-title pitch-title-idle">Live Waveform</h2>;
  }

  return (
    <h2
      className={pitch ? 'pitch-title' : 'pitch-title pitch-title-silent'}
      style={{ color: pitch ? centsToColor(pitch.cents) : '#555' }}
    >
      {formatPitchTitle(pitch)}
    </h2>
  );
}
