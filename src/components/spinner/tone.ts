/**
 * Tone mapping and synthesis
 * Kinetic energy -> pitch/volume/pan, and short stereo sine bursts as int16 PCM
 */

import type { SpinnerConfig } from './types';

export interface ToneParams {
  frequency: number;   // Hz
  volume: number;      // 0-1
  leftGain: number;    // 0-1
  rightGain: number;   // 0-1
}

export interface ToneWaveform {
  samples: Int16Array; // Interleaved L/R
  frames: number;
  sampleRate: number;
  channels: 2;
}

const INT16_MAX = 32767;
const INT16_MIN = -32768;

/**
 * @param pan - 0 is hard left, 1 is hard right
 */
export function mapEnergyToTone(
  energy: number,
  baseFrequency: number,
  pan: number,
  config: Pick<SpinnerConfig, 'energyPitchScale' | 'energyVolumeScale'>
): ToneParams {
  return {
    frequency: baseFrequency + energy * config.energyPitchScale,
    volume: Math.min(1.0, energy * config.energyVolumeScale),
    leftGain: 1.0 - pan,
    rightGain: pan,
  };
}

function toInt16(value: number): number {
  return Math.max(INT16_MIN, Math.min(INT16_MAX, Math.trunc(value * INT16_MAX)));
}

export function synthesizeTone(
  frequency: number,
  volume: number,
  leftGain: number,
  rightGain: number,
  durationSeconds: number,
  sampleRate: number
): ToneWaveform {
  const frames = Math.max(0, Math.floor(sampleRate * durationSeconds));
  const samples = new Int16Array(frames * 2);

  for (let i = 0; i < frames; i++) {
    const t = i / sampleRate;
    const wave = Math.sin(2 * Math.PI * frequency * t) * volume;
    samples[i * 2] = toInt16(wave * leftGain);
    samples[i * 2 + 1] = toInt16(wave * rightGain);
  }

  return { samples, frames, sampleRate, channels: 2 };
}
