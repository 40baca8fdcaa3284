/**
 * LobeChorus - three free lobes, one tone per particle per tick
 */

import { useState, useEffect, useRef } from 'react';
import type { SpinnerConfig } from './types';
import { CHORUS_FPS } from './types';
import { mulberry32, randomSeed } from './random';
import { createChorus, updateChorusLobe, chorusTones, renderChorus } from './lobeChorus';
import { CanvasRenderBackend } from './canvasBackend';
import { FrameClock } from './frameClock';
import { createToneEmitter } from './toneEmitter';
import type { ToneEmitter } from './toneEmitter';
import { styles } from './styles';
import type { ToneAudioResult } from '../../shared';

interface LobeChorusProps {
  audio: ToneAudioResult;
  config: SpinnerConfig;
}

export function LobeChorus({ audio, config }: LobeChorusProps) {
  const [seed] = useState(() => config.seed ?? randomSeed());
  const [rng] = useState(() => mulberry32(seed));
  const [lobes] = useState(() => createChorus(rng, config));
  const [canvasError, setCanvasError] = useState<string | null>(null);

  const { isActive, isSuspended, error: audioError, backend, startAudio, stopAudio } = audio;

  const canvasRef = useRef<HTMLCanvasElement | null>(null);
  const animationRef = useRef<number | null>(null);
  const emitterRef = useRef<ToneEmitter | null>(null);

  const fatalError = canvasError ?? (config.audio ? audioError : null);

  useEffect(() => {
    emitterRef.current = createToneEmitter(backend, config);
  }, [backend, config]);

  useEffect(() => {
    if (!config.audio) return;
    startAudio().catch(err => {
      console.error('Audio start error:', err);
    });
  }, []); // eslint-disable-line react-hooks/exhaustive-deps

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
    const clock = new FrameClock(CHORUS_FPS);
    const size = { width: config.width, height: config.height };
    renderChorus(lobes, renderer, size, config.lobeRadius);

    const animate = (timestamp: number) => {
      if (clock.tick(timestamp) !== null) {
        for (const lobe of lobes) {
          updateChorusLobe(lobe, rng);
        }
        const emitter = emitterRef.current;
        if (emitter) {
          for (const tone of chorusTones(lobes, config)) {
            emitter.emit(tone);
          }
        }
        renderChorus(lobes, renderer, size, config.lobeRadius);
      }
      animationRef.current = requestAnimationFrame(animate);
    };

    animationRef.current = requestAnimationFrame(animate);
    return () => {
      if (animationRef.current) {
        cancelAnimationFrame(animationRef.current);
      }
    };
  }, [config, lobes, rng, fatalError]);

  const toggleAudio = () => {
    if (isActive) {
      stopAudio();
      return;
    }
    startAudio().catch(err => {
      console.error('Audio start error:', err);
    });
  };

  // Autoplay policy: the first click anywhere resumes a suspended context
  const handleBackgroundClick = () => {
    if (!config.audio || !isSuspended) return;
    startAudio().catch(err => {
      console.error('Audio resume error:', err);
    });
  };

  return (
    <div style={styles.container} onClick={handleBackgroundClick}>
      <canvas ref={canvasRef} width={config.width} height={config.height} style={styles.canvas} />

      <div style={styles.controlPanel} onClick={e => e.stopPropagation()}>
        <h1 style={styles.title}>Lobe Chorus</h1>
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
          {lobes.length} lobes × {config.particlesPerLobe} particles | seed {seed}
        </p>
      </div>
    </div>
  );
}
