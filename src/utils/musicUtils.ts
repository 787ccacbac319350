/**
 * Music theory utilities for the pitch monitor.
 * Handles note naming, MIDI numbers, cents deviation and display text.
 */

import type { PitchReading } from '../types';

// Note names in equal temperament (starting from C), sharp spelling
export const NOTE_NAMES = ['C', 'C#', 'D', 'D#', 'E', 'F', 'F#', 'G', 'G#', 'A', 'A#', 'B'] as const;

// Reference: A4 = 440 Hz, MIDI note 69
const A4_FREQUENCY = 440.0;
const A4_MIDI = 69;

/** Cents thresholds for the colour scale */
export const CENTS_THRESHOLD_IN_TUNE = 5;
export const CENTS_THRESHOLD_CLOSE = 15;

/**
 * Maps a calibrated frequency to its nearest equal-temperament note.
 *
 * cents = (midiFloat − midiInt) × 100, which lies in [-50, 50) because
 * Math.round sends exact halves upwards.
 *
 * @throws RangeError when `freq` is not a finite positive number; silence has
 *   to be filtered out before calling this.
 */
export function frequencyToPitch(freq: number): PitchReading {
  if (!Number.isFinite(freq) || freq <= 0) {
    throw new RangeError(`frequency must be a positive finite number, got ${freq}`);
  }

  // MIDI note number (floating point)
  const midiFloat = A4_MIDI + 12 * Math.log2(freq / A4_FREQUENCY);
  const midiInt = Math.round(midiFloat);

  const noteIndex = ((midiInt % 12) + 12) % 12;
  const octave = Math.floor(midiInt / 12) - 1;

  return {
    frequencyHz: freq,
    midiFloat,
    midiInt,
    noteName: NOTE_NAMES[noteIndex],
    octave,
    cents: (midiFloat - midiInt) * 100,
  };
}

/**
 * Returns the exact frequency for a given MIDI note number.
 */
export function midiToFrequency(midiNote: number): number {
  return A4_FREQUENCY * Math.pow(2, (midiNote - A4_MIDI) / 12);
}

/**
 * Formats a cents value with an explicit sign and one decimal, e.g. "+0.3".
 */
export function formatCents(cents: number): string {
  const sign = cents >= 0 ? '+' : '';
  return `${sign}${cents.toFixed(1)}`;
}

/**
 * Title text for a reading, e.g. "440.1 Hz – A4 (+0.3 cents)".
 * A null reading (silence) renders as "-- Hz – no signal".
 */
export function formatPitchTitle(reading: PitchReading | null): string {
  if (reading === null) return '-- Hz – no signal';
  return `${reading.frequencyHz.toFixed(1)} Hz – ${reading.noteName}${reading.octave} (${formatCents(reading.cents)} cents)`;
}

/**
 * Returns a colour for a cents deviation.
 * Green = in tune, yellow = close, red = off.
 */
export function centsToColor(cents: number): string {
  const abs = Math.abs(cents);
  if (abs <= CENTS_THRESHOLD_IN_TUNE) return '#00ff88';
  if (abs <= CENTS_THRESHOLD_CLOSE) return '#ffcc00';
  return '#ff2200';
}
