/**
 * useLivePitch hook – runs a LiveSession and polls its pipeline for rendering.
 *
 * The pipeline owns analysis; this hook only reads `currentPitch()` and
 * `currentWaveform()` on its own 100 Hz cadence.
 */

import { useState, useRef, useCallback, useEffect, useMemo } from 'react';
import { DEFAULT_TUNER_CONFIG } from '../config';
import type { TunerConfig } from '../config';
import { LiveSession } from '../services/audio/liveSession';
import { logger } from '../utils/logger';
import type { LatestResult, PipelineStats } from '../types';

const POLL_INTERVAL = 10; // ms between display reads (~100 Hz)
const TAG = 'live-pitch';

const EMPTY_STATS: PipelineStats = { received: 0, processed: 0, dropped: 0, silent: 0 };

const errorMessage = (err: unknown, fallback: string) => (err instanceof Error ? err.message : fallback);

export function useLivePitch(config: Readonly<TunerConfig> = DEFAULT_TUNER_CONFIG) {
  const [isRunning, setIsRunning] = useState(false);
  const [isStarting, setIsStarting] = useState(false);
  const [pitch, setPitch] = useState<LatestResult>(null);
  const [waveform, setWaveform] = useState<Float32Array>(() => new Float32Array(0));
  const [stats, setStats] = useState<PipelineStats>(EMPTY_STATS);
  const [error, setError] = useState<string | null>(null);

  const intervalRef = useRef<number | null>(null);

  const stopPolling = useCallback(() => {
    if (intervalRef.current !== null) {
      window.clearInterval(intervalRef.current);
      intervalRef.current = null;
    }
  }, []);

  const markStopped = useCallback(() => {
    stopPolling();
    setIsRunning(false);
    setPitch(null);
  }, [stopPolling]);

  const session = useMemo(
    () =>
      new LiveSession(config, {
        onFatal: err => {
          setError(errorMessage(err, String(err)));
          markStopped();
        },
        onEnded: markStopped,
      }),
    [config, markStopped]
  );

  const poll = useCallback(() => {
    const pipeline = session.activePipeline;
    if (!pipeline) return;
    setPitch(pipeline.currentPitch());
    setWaveform(pipeline.currentWaveform());
    setStats(pipeline.getStats());
  }, [session]);

  const stop = useCallback(async () => {
    stopPolling();
    try {
      await session.stop();
    } catch (err) {
      logger.error(TAG, 'Failed to release audio resources', err);
    }
    markStopped();
  }, [session, stopPolling, markStopped]);

  const start = useCallback(async () => {
    if (session.isStarting || session.isRunning) return;
    setError(null);
    setIsStarting(true);
    try {
      if (await session.start()) {
        intervalRef.current = window.setInterval(poll, POLL_INTERVAL);
        setIsRunning(true);
      }
    } catch (err) {
      setError(errorMessage(err, 'Microphone access denied'));
      markStopped();
    } finally {
      setIsStarting(false);
    }
  }, [session, poll, markStopped]);

  // Release the session on unmount or when the config changes
  useEffect(
    () => () => {
      stopPolling();
      session.stop().catch(err => logger.error(TAG, 'Cleanup failed', err));
    },
    [session, stopPolling]
  );

  return { isRunning, isStarting, pitch, waveform, stats, error, start, stop };
}
