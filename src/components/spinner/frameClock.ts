/**
 * Frame pacing over requestAnimationFrame timestamps.
 * Yields the elapsed milliseconds since the last accepted frame, used as dt.
 */

// rAF timestamps jitter around the display's refresh interval
const JITTER_MS = 1;

export class FrameClock {
  private interval: number;
  private lastFrame: number | null = null;

  constructor(fps: number) {
    this.interval = 1000 / fps;
  }

  tick(timestamp: number): number | null {
    if (this.lastFrame === null) {
      this.lastFrame = timestamp;
      return null;
    }

    const elapsed = timestamp - this.lastFrame;
    if (elapsed < this.interval - JITTER_MS) return null;

    this.lastFrame = timestamp;
    return elapsed;
  }

  reset(): void {
    this.lastFrame = null;
  }
}
