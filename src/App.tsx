import { useState } from 'react';
import { SpinnerField, LobeChorus, parseStartupOptions } from './components/spinner';
import { ModeSwitcher } from './components/ModeSwitcher';
import { useToneAudio } from './shared';
import type { SimulationMode } from './shared/types';
import './index.css';

// Startup parameters come from the query string, read once
function readStartupOptions() {
  const options = parseStartupOptions(window.location.search);
  for (const warning of options.warnings) {
    console.warn(warning);
  }
  return options;
}

function App() {
  const [{ config, mode: initialMode }] = useState(readStartupOptions);
  const [mode, setMode] = useState<SimulationMode>(initialMode);
  const audio = useToneAudio(config.sampleRate, config.maxVoices);

  return (
    <>
      <ModeSwitcher mode={mode} onModeChange={setMode} />
      {mode === 'spinners' ? (
        <SpinnerField audio={audio} config={config} />
      ) : (
        <LobeChorus audio={audio} config={config} />
      )}
    </>
  );
}

export default App;
