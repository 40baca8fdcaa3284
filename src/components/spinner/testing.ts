/**
 * In-process stand-ins shared by the tests
 */

import type { Rng, Vec2 } from './types';
import type { RenderBackend } from './canvasBackend';
import type { ToneParams } from './tone';
import type { ToneSink } from './toneEmitter';

/** Returns the given values in order, then 0.5 (zero jitter) forever. */
export function scriptedRng(values: number[]): Rng {
  let index = 0;
  return () => (index < values.length ? values[index++] : 0.5);
}

export type DrawCall =
  | { kind: 'clear'; color: string }
  | { kind: 'rect'; position: Vec2; width: number; height: number; color: string }
  | { kind: 'line'; from: Vec2; to: Vec2; color: string; width: number }
  | { kind: 'outline'; center: Vec2; radius: number; color: string }
  | { kind: 'dot'; center: Vec2; radius: number; color: string }
  | { kind: 'text'; position: Vec2; text: string; color: string };

export class RecordingBackend implements RenderBackend {
  calls: DrawCall[] = [];

  clear(color: string): void {
    this.calls.push({ kind: 'clear', color });
  }

  fillRect(position: Vec2, size: { width: number; height: number }, color: string): void {
    this.calls.push({ kind: 'rect', position, width: size.width, height: size.height, color });
  }

  drawLine(from: Vec2, to: Vec2, color: string, width: number): void {
    this.calls.push({ kind: 'line', from, to, color, width });
  }

  drawCircleOutline(center: Vec2, radius: number, color: string): void {
    this.calls.push({ kind: 'outline', center, radius, color });
  }

  drawFilledCircle(center: Vec2, radius: number, color: string): void {
    this.calls.push({ kind: 'dot', center, radius, color });
  }

  drawText(position: Vec2, text: string, color: string): void {
    this.calls.push({ kind: 'text', position, text, color });
  }
}

export class RecordingToneSink implements ToneSink {
  tones: ToneParams[] = [];

  emit(tone: ToneParams): void {
    this.tones.push(tone);
  }
}
