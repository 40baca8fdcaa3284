/**
 * Tone emission
 *
 * Bridges the simulation's tone requests to an audio backend. Requests are
 * fire-and-forget: a saturated or failing backend drops them and the tick goes on.
 */

import type { SpinnerConfig } from './types';
import type { ToneParams, ToneWaveform } from './tone';

export interface AudioBackend {
  synthesizeTone(
    frequency: number,
    volume: number,
    leftGain: number,
    rightGain: number,
    durationSeconds: number,
    sampleRate: number
  ): ToneWaveform;
  /** Must not block. */
  play(waveform: ToneWaveform): void;
  /** False while every voice is busy. */
  hasCapacity(): boolean;
}

export interface ToneSink {
  emit(tone: ToneParams): void;
}

export class ToneEmitter implements ToneSink {
  private backend: AudioBackend;
  private durationSeconds: number;
  private sampleRate: number;
  private played = 0;
  private dropped = 0;
  private failureReported = false;

  constructor(
    backend: AudioBackend,
    config: Pick<SpinnerConfig, 'toneDuration' | 'sampleRate'>
  ) {
    this.backend = backend;
    this.durationSeconds = config.toneDuration;
    this.sampleRate = config.sampleRate;
  }

  emit(tone: ToneParams): void {
    if (!this.backend.hasCapacity()) {
      this.dropped++;
      return;
    }

    try {
      const waveform = this.backend.synthesizeTone(
        tone.frequency,
        tone.volume,
        tone.leftGain,
        tone.rightGain,
        this.durationSeconds,
        this.sampleRate
      );
      // Too short to hold a single frame
      if (waveform.frames === 0) {
        this.dropped++;
        return;
      }
      this.backend.play(waveform);
      this.played++;
    } catch (err) {
      this.dropped++;
      if (!this.failureReported) {
        this.failureReported = true;
        console.warn('Tone dropped:', err instanceof Error ? err.message : err);
      }
    }
  }

  getStats(): { played: number; dropped: number } {
    return { played: this.played, dropped: this.dropped };
  }
}

/** Null when audio is switched off or no backend is open yet. */
export function createToneEmitter(
  backend: AudioBackend | null,
  config: Pick<SpinnerConfig, 'audio' | 'toneDuration' | 'sampleRate'>
): ToneEmitter | null {
  return config.audio && backend ? new ToneEmitter(backend, config) : null;
}
