/**
 * SpinnerField - Nested spinners with Maxwell's Demon
 *
 * Drives the simulation from requestAnimationFrame at the configured frame
 * rate: step every tree, draw every tree, then the totals overlay. With audio
 * on, every particle sounds a short tone each tick.
 */

import { useState, useEffect, useRef, useCallback } from 'react';
import type { SpinnerConfig } from './types';
import { SpinnerSimulation } from './simulation';
import type { SimulationSnapshot } from './simulation';
import { CanvasRenderBackend } from './canvasBackend';
import { FrameClock } from './frameClock';
import { createToneEmitter } from './toneEmitter';
import type { ToneEmitter } from './toneEmitter';
import { styles } from './styles';
import type { ToneAudioResult } from '../../shared';

interface SpinnerFieldProps {
  audio: ToneAudioResult;
  config: SpinnerConfig;
}

const DISPLAY_UPDATE_MS = 1000;

export function SpinnerField({ audio, config }: SpinnerFieldProps) {
  const [simulation] = useState(() => new SpinnerSimulation(config));
  const [snapshot, setSnapshot] = useState<SimulationSnapshot>(() => simulation.snapshot());
  const [toneStats, setToneStats] = useState({ played: 0, dropped: 0 });
  const [canvasError, setCanvasError] = useState<string | null>(null);
  const [isPaused, setIsPaused] = useState(false);

  const { isActive, isSuspended, error: audioError, backend, startAudio, stopAudio } = audio;

  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const animationRef = useRef<number | null>(null);
  const pausedRef = useRef(false);
  const emitterRef = useRef<ToneEmitter | null>(null);
  const lastDisplayUpdateRef = useRef(0);

  // No display or no audio device: nothing to fall back to
  const fatalError = canvasError ?? (config.audio ? audioError : null);

  useEffect(() => {
    pausedRef.current = isPaused;
  }, [isPaused]);

  // Attach the tone sink whenever the audio backend comes and goes
  useEffect(() => {
    const emitter = createToneEmitter(backend, config);
    emitterRef.current = emitter;
    if (!emitter) {
      simulation.setToneSink(null);
      return;
    }
    simulation.setToneSink(emitter);
    return () => {
      simulation.setToneSink(null);
    };
  }, [backend, config, simulation]);

  // Auto-start audio on load (or on first user interaction if the browser blocks it)
  useEffect(() => {
    if (!config.audio) return;
    startAudio().catch(err => {
      console.error('Audio start error:', err);
    });
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

  // Animation loop
  useEffect(() => {
    if (fatalError) return;

    const surface = canvasRef.current?.getContext('2d') ?? null;
    if (!surface) {
      const message = 'Canvas 2D rendering is unavailable';
      console.error(message);
      setCanvasError(message);
      return;
    }

    const renderer = new CanvasRenderBackend(surface, { width: config.width, height: config.height });
    const clock = new FrameClock(config.fps);
    simulation.render(renderer);

    const animate = (timestamp: number) => {
      if (pausedRef.current) {
        clock.reset();
      } else {
        const elapsedMs = clock.tick(timestamp);
        if (elapsedMs !== null) {
          simulation.step(elapsedMs * config.timeScale);
          simulation.render(renderer);

          if (timestamp - lastDisplayUpdateRef.current > DISPLAY_UPDATE_MS) {
            lastDisplayUpdateRef.current = timestamp;
            setSnapshot(simulation.snapshot());
            if (emitterRef.current) setToneStats(emitterRef.current.getStats());
          }
        }
      }
      animationRef.current = requestAnimationFrame(animate);
    };

    animationRef.current = requestAnimationFrame(animate);
    return () => {
      if (animationRef.current) {
        cancelAnimationFrame(animationRef.current);
      }
    };
  }, [config, simulation, fatalError]);

  const toggleAudio = useCallback(() => {
    if (isActive) {
      stopAudio();
      return;
    }
    startAudio().catch(err => {
      console.error('Audio start error:', err);
    });
  }, [isActive, startAudio, stopAudio]);

  const handleBackgroundClick = useCallback(() => {
    if (config.audio && isSuspended) {
      startAudio().catch(err => {
        console.error('Audio resume error:', err);
      });
      return;
    }
    setIsPaused(prev => !prev);
  }, [config.audio, isSuspended, startAudio]);

  return (
    <div style={styles.container} onClick={handleBackgroundClick}>
      <canvas ref={canvasRef} width={config.width} height={config.height} style={styles.canvas} />

      <div style={styles.controlPanel} onClick={e => e.stopPropagation()}>
        <h1 style={styles.title}>Nested Spinners</h1>

        {fatalError && <p style={styles.error}>{fatalError}</p>}

        {config.audio && (
          <button
            onClick={toggleAudio}
            style={{
              ...styles.button,
              ...(isActive ? styles.buttonStop : styles.buttonStart),
            }}
          >
            {isActive ? 'Stop Audio' : 'Start Audio'}
          </button>
        )}
        {isSuspended && <p style={styles.stats}>Click anywhere to enable sound</p>}

        <p style={styles.stats}>
          {isPaused ? '⏸' : '▶'} {snapshot.nodes} spinners | {snapshot.particles} particles | seed {snapshot.seed}
        </p>
        <p style={{ ...styles.stats, fontSize: 10, marginTop: 4 }}>
          Energy: {snapshot.energy.toFixed(2)}
          {config.audio && ` | Tones: ${toneStats.played} played, ${toneStats.dropped} dropped`}
        </p>
      </div>
    </div>
  );
}
