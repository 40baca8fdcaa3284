/**
 * Tone Audio Hook
 * Owns the AudioContext and exposes a voice-capped playback backend
 */

import { useState, useEffect, useRef, useCallback } from 'react';
import { WebAudioBackend } from './webAudioBackend';

export interface ToneAudioResult {
  isActive: boolean;
  isSuspended: boolean;
  error: string | null;
  backend: WebAudioBackend | null;
  startAudio: () => Promise<void>;
  stopAudio: () => void;
}

export function useToneAudio(sampleRate: number, maxVoices: number): ToneAudioResult {
  const [isActive, setIsActive] = useState(false);
  const [isSuspended, setIsSuspended] = useState(false);
  const [error, setError] = useState<string | null>(null);
  const [backend, setBackend] = useState<WebAudioBackend | null>(null);

  const audioContextRef = useRef<AudioContext | null>(null);

  const startAudio = useCallback(async () => {
    if (audioContextRef.current) {
      // Autoplay policy: resume on a later user gesture
      await audioContextRef.current.resume();
      setIsSuspended(audioContextRef.current.state !== 'running');
      return;
    }

    try {
      setError(null);

      const audioContext = new AudioContext({ sampleRate });
      audioContextRef.current = audioContext;
      audioContext.onstatechange = () => {
        setIsSuspended(audioContext.state !== 'running');
      };

      setBackend(new WebAudioBackend(audioContext, maxVoices));
      setIsActive(true);
      setIsSuspended(audioContext.state !== 'running');
      await audioContext.resume();
    } catch (err) {
      setError(err instanceof Error ? err.message : 'Failed to open audio output');
      console.error('Audio error:', err);
    }
  }, [sampleRate, maxVoices]);

  const stopAudio = useCallback(() => {
    const audioContext = audioContextRef.current;
    audioContextRef.current = null;
    if (audioContext) {
      audioContext.close().catch(err => {
        console.error('Audio close error:', err);
      });
    }

    setBackend(null);
    setIsActive(false);
    setIsSuspended(false);
  }, []);

  // Cleanup on unmount
  useEffect(() => {
    return () => {
      stopAudio();
    };
  }, [stopAudio]);

  return {
    isActive,
    isSuspended,
    error,
    backend,
    startAudio,
    stopAudio,
  };
}
