import { StrictMode } from 'react';
import { createRoot } from 'react-dom/client';
import App from './App';
import { resolveTunerConfig } from './config';

// Calibration constants come from the offline two-tone procedure (see utils/calibration)
const config = resolveTunerConfig({
  calibration: { scale: 1.0, offsetHz: 0.0 },
});

const container = document.getElementById('root');
if (!container) throw new Error('Missing #root element');

createRoot(container).render(
  <StrictMode>
    <App config={config} />
  </StrictMode>
);
