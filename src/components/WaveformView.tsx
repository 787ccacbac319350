/**
 * WaveformView – live waveform of the most recent samples.
 *
 * Draws the ring-buffer window as a line on a canvas with a fixed −1..1
 * amplitude axis, right-aligned so the newest sample sits at the right edge.
 */

import { useRef, useEffect } from 'react';

interface WaveformViewProps {
  /** Ordered samples, oldest first. Empty when not recording. */
  samples: Float32Array;
  /** Number of samples the full width represents (shorter input is right-aligned) */
  windowLength: number;
  /** Sample rate in Hz, for the time axis label */
  sampleRate: number;
  width?: number;
  height?: number;
}

export interface WaveformPoint {
  x: number;
  y: number;
}

const DEFAULT_WIDTH = 600;
const DEFAULT_HEIGHT = 200;

/**
 * Maps samples to canvas coordinates. Amplitudes are clamped to −1..1;
 * +1 maps to the top edge (y = 0) and −1 to the bottom edge (y = height).
 */
export function buildWaveformPoints(
  samples: ArrayLike<number>,
  windowLength: number,
  width: number,
  height: number
): WaveformPoint[] {
  const span = Math.max(1, windowLength - 1);
  const offset = Math.max(0, windowLength - samples.length);
  const points: WaveformPoint[] = [];
  for (let i = 0; i < samples.length; i++) {
    const amplitude = Math.max(-1, Math.min(1, samples[i]));
    points.push({
      x: ((offset + i) / span) * width,
      y: ((1 - amplitude) / 2) * height,
    });
  }
  return points;
}

export function WaveformView({
  samples,
  windowLength,
  sampleRate,
  width = DEFAULT_WIDTH,
  height = DEFAULT_HEIGHT,
}: WaveformViewProps) {
  const canvasRef = useRef<HTMLCanvasElement>(null);

  useEffect(() => {
    const canvas = canvasRef.current;
    if (!canvas) return;
    const ctx = canvas.getContext('2d');
    if (!ctx) return;

    ctx.fillStyle = '#0d1117';
    ctx.fillRect(0, 0, width, height);

    // Zero line
    ctx.strokeStyle = '#223';
    ctx.beginPath();
    ctx.moveTo(0, height / 2);
    ctx.lineTo(width, height / 2);
    ctx.stroke();

    if (samples.length === 0) {
      ctx.fillStyle = '#444';
      ctx.font = '14px monospace';
      ctx.textAlign = 'center';
      ctx.fillText('Waiting for audio…', width / 2, height / 2 - 8);
      return;
    }

    const points = buildWaveformPoints(samples, windowLength, width, height);
    ctx.strokeStyle = '#00d4ff';
    ctx.lineWidth = 1;
    ctx.beginPath();
    points.forEach(({ x, y }, i) => {
      if (i === 0) ctx.moveTo(x, y);
      else ctx.lineTo(x, y);
    });
    ctx.stroke();

    ctx.fillStyle = '#556';
    ctx.font = '10px monospace';
    ctx.textAlign = 'right';
    ctx.fillText(`${((windowLength / sampleRate) * 1000).toFixed(0)} ms`, width - 4, height - 4);
  }, [samples, windowLength, sampleRate, width, height]);

  return (
    <div className="waveform-view">
      <canvas
        ref={canvasRef}
        width={width}
        height={height}
        className="waveform-view-canvas"
        aria-label="Live waveform"
      />
    </div>
  );
}
