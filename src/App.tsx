/**
 * Live Pitch Monitor
 *
 * Listens to the microphone, shows the rolling waveform of the last 100 ms and
 * titles it with the dominant frequency as a note name, octave and cents
 * deviation from equal temperament (A4 = 440 Hz).
 */

import { plotSampleCount } from './config';
import type { TunerConfig } from './config';
import { useLivePitch } from './hooks/useLivePitch';
import { useLogFeed } from './hooks/useLogFeed';
import { PitchTitle } from './components/PitchTitle';
import { WaveformView } from './components/WaveformView';
import { logger } from './utils/logger';
import './App.css';

interface AppProps {
  config: Readonly<TunerConfig>;
}

function App({ config }: AppProps) {
  const { isRunning, isStarting, pitch, waveform, stats, error, start, stop } = useLivePitch(config);
  const warnings = useLogFeed('warn', 3);

  const toggle = () => {
    const action = isRunning ? stop() : start();
    action.catch(err => logger.error('app', 'Toggle failed', err));
  };

  return (
    <div className="app">
      <header className="app-header">
        <h1 className="app-title">Live Pitch Monitor</h1>
        <p className="app-subtitle">
          {config.sampleRate} Hz &middot; {config.blockSize}-sample blocks &middot; FFT peak with parabolic refinement
        </p>
      </header>

      <PitchTitle pitch={pitch} isRunning={isRunning} />

      <WaveformView
        samples={waveform}
        windowLength={plotSampleCount(config)}
        sampleRate={config.sampleRate}
      />

      {error && <div className="error-banner">{error}</div>}

      <div className="controls">
        <button className={isRunning ? 'btn btn-stop' : 'btn btn-start'} onClick={toggle} disabled={isStarting}>
          {isStarting ? 'Opening microphone…' : isRunning ? 'Stop' : 'Start listening'}
        </button>
        {isRunning && (
          <span className="pipeline-stats">
            {stats.processed} blocks &middot; {stats.dropped} dropped
          </span>
        )}
      </div>

      {warnings.length > 0 && (
        <ul className="log-feed">
          {warnings.map(event => (
            <li key={event.seq} className={`log-feed-item log-feed-${event.level}`}>
              [{event.tag}] {event.message}
            </li>
          ))}
        </ul>
      )}
    </div>
  );
}

export default App;
