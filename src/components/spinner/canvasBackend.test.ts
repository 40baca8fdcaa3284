import { describe, it, expect } from 'vitest';
import { CanvasRenderBackend } from './canvasBackend';
import type { Canvas2DSurface } from './canvasBackend';

class RecordingSurface implements Canvas2DSurface {
  fillStyle: string | CanvasGradient | CanvasPattern = '#000000';
  strokeStyle: string | CanvasGradient | CanvasPattern = '#000000';
  lineWidth = 1;
  font = '10px sans-serif';
  textBaseline: CanvasTextBaseline = 'alphabetic';
  ops: string[] = [];

  fillRect(x: number, y: number, w: number, h: number): void {
    this.ops.push(`fillRect ${x} ${y} ${w} ${h} ${String(this.fillStyle)}`);
  }

  beginPath(): void {
    this.ops.push('beginPath');
  }

  moveTo(x: number, y: number): void {
    this.ops.push(`moveTo ${x} ${y}`);
  }

  lineTo(x: number, y: number): void {
    this.ops.push(`lineTo ${x} ${y}`);
  }

  arc(x: number, y: number, radius: number, startAngle: number, endAngle: number): void {
    this.ops.push(`arc ${x} ${y} ${radius} ${startAngle} ${endAngle === Math.PI * 2 ? '2pi' : endAngle}`);
  }

  stroke(): void {
    this.ops.push(`stroke ${String(this.strokeStyle)} ${this.lineWidth}`);
  }

  fill(): void {
    this.ops.push(`fill ${String(this.fillStyle)}`);
  }

  fillText(text: string, x: number, y: number): void {
    this.ops.push(`fillText ${text} ${x} ${y} ${this.font} ${this.textBaseline}`);
  }
}

describe('CanvasRenderBackend', () => {
  const setup = () => {
    const surface = new RecordingSurface();
    return { surface, backend: new CanvasRenderBackend(surface, { width: 640, height: 480 }) };
  };

  it('clears the whole surface', () => {
    const { surface, backend } = setup();
    backend.clear('#0b1020');
    expect(surface.ops).toEqual(['fillRect 0 0 640 480 #0b1020']);
  });

  it('fills a rectangle', () => {
    const { surface, backend } = setup();
    backend.fillRect({ x: 10, y: 10 }, { width: 280, height: 60 }, '#141e2d');
    expect(surface.ops).toEqual(['fillRect 10 10 280 60 #141e2d']);
  });

  it('strokes a line at the requested width', () => {
    const { surface, backend } = setup();
    backend.drawLine({ x: 1, y: 2 }, { x: 3, y: 4 }, '#c8c8c8', 2);
    expect(surface.ops).toEqual(['beginPath', 'moveTo 1 2', 'lineTo 3 4', 'stroke #c8c8c8 2']);
  });

  it('outlines circles with a hairline', () => {
    const { surface, backend } = setup();
    backend.drawLine({ x: 0, y: 0 }, { x: 1, y: 1 }, '#c8c8c8', 3);
    surface.ops = [];
    backend.drawCircleOutline({ x: 50, y: 60 }, 44, '#ffd93d');
    expect(surface.ops).toEqual(['beginPath', 'arc 50 60 44 0 2pi', 'stroke #ffd93d 1']);
  });

  it('fills particle dots', () => {
    const { surface, backend } = setup();
    backend.drawFilledCircle({ x: 5, y: 6 }, 3, '#6be36b');
    expect(surface.ops).toEqual(['beginPath', 'arc 5 6 3 0 2pi', 'fill #6be36b']);
  });

  it('draws text from its top-left corner', () => {
    const { surface, backend } = setup();
    backend.drawText({ x: 20, y: 15 }, 'Total Particles: 54', '#e6eef8');
    expect(surface.ops).toEqual(['fillText Total Particles: 54 20 15 18px Arial, sans-serif top']);
    expect(surface.fillStyle).toBe('#e6eef8');
  });
});
