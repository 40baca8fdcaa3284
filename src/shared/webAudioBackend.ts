/**
 * Web Audio playback for synthesized tones
 *
 * Each tone becomes a one-shot buffer source. Concurrent voices are capped;
 * while every voice is busy the backend reports no capacity and callers drop.
 */

import { synthesizeTone } from '../components/spinner/tone';
import type { ToneWaveform } from '../components/spinner/tone';
import type { AudioBackend } from '../components/spinner/toneEmitter';

// The slices of AudioContext and its nodes this backend touches
export interface PcmBuffer {
  getChannelData(channel: number): Float32Array;
}

export interface BufferVoice {
  buffer: PcmBuffer | null;
  connect(destination: object): unknown;
  start(when?: number): void;
}

export interface VoiceContext {
  readonly currentTime: number;
  readonly destination: object;
  createBuffer(numberOfChannels: number, length: number, sampleRate: number): PcmBuffer;
  createBufferSource(): BufferVoice;
}

const INT16_SCALE = 32768;

export class WebAudioBackend implements AudioBackend {
  private ctx: VoiceContext;
  private maxVoices: number;
  private voiceEnds: number[] = [];

  constructor(ctx: VoiceContext, maxVoices: number) {
    this.ctx = ctx;
    this.maxVoices = maxVoices;
  }

  synthesizeTone(
    frequency: number,
    volume: number,
    leftGain: number,
    rightGain: number,
    durationSeconds: number,
    sampleRate: number
  ): ToneWaveform {
    return synthesizeTone(frequency, volume, leftGain, rightGain, durationSeconds, sampleRate);
  }

  hasCapacity(): boolean {
    const now = this.ctx.currentTime;
    this.voiceEnds = this.voiceEnds.filter(end => end > now);
    return this.voiceEnds.length < this.maxVoices;
  }

  play(waveform: ToneWaveform): void {
    if (waveform.frames === 0) return;

    const buffer = this.ctx.createBuffer(waveform.channels, waveform.frames, waveform.sampleRate);
    const left = buffer.getChannelData(0);
    const right = buffer.getChannelData(1);
    for (let i = 0; i < waveform.frames; i++) {
      left[i] = waveform.samples[i * 2] / INT16_SCALE;
      right[i] = waveform.samples[i * 2 + 1] / INT16_SCALE;
    }

    const voice = this.ctx.createBufferSource();
    voice.buffer = buffer;
    voice.connect(this.ctx.destination);
    voice.start();
    this.voiceEnds.push(this.ctx.currentTime + waveform.frames / waveform.sampleRate);
  }

  getActiveVoices(): number {
    return this.voiceEnds.length;
  }
}
