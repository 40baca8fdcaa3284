/**
 * Render backend
 * The drawing primitives the simulation needs, and their canvas 2D implementation
 */

import type { Vec2 } from './types';

export interface RenderBackend {
  clear(color: string): void;
  fillRect(position: Vec2, size: { width: number; height: number }, color: string): void;
  drawLine(from: Vec2, to: Vec2, color: string, width: number): void;
  drawCircleOutline(center: Vec2, radius: number, color: string): void;
  drawFilledCircle(center: Vec2, radius: number, color: string): void;
  drawText(position: Vec2, text: string, color: string): void;
}

// The slice of CanvasRenderingContext2D this backend touches
export type Canvas2DSurface = Pick<
  CanvasRenderingContext2D,
  | 'fillStyle'
  | 'strokeStyle'
  | 'lineWidth'
  | 'font'
  | 'textBaseline'
  | 'fillRect'
  | 'beginPath'
  | 'moveTo'
  | 'lineTo'
  | 'arc'
  | 'stroke'
  | 'fill'
  | 'fillText'
>;

const FONT = '18px Arial, sans-serif';

export class CanvasRenderBackend implements RenderBackend {
  private surface: Canvas2DSurface;
  private size: { width: number; height: number };

  constructor(surface: Canvas2DSurface, size: { width: number; height: number }) {
    this.surface = surface;
    this.size = size;
  }

  clear(color: string): void {
    this.surface.fillStyle = color;
    this.surface.fillRect(0, 0, this.size.width, this.size.height);
  }

  fillRect(position: Vec2, size: { width: number; height: number }, color: string): void {
    this.surface.fillStyle = color;
    this.surface.fillRect(position.x, position.y, size.width, size.height);
  }

  drawLine(from: Vec2, to: Vec2, color: string, width: number): void {
    const s = this.surface;
    s.strokeStyle = color;
    s.lineWidth = width;
    s.beginPath();
    s.moveTo(from.x, from.y);
    s.lineTo(to.x, to.y);
    s.stroke();
  }

  drawCircleOutline(center: Vec2, radius: number, color: string): void {
    const s = this.surface;
    s.strokeStyle = color;
    s.lineWidth = 1;
    s.beginPath();
    s.arc(center.x, center.y, radius, 0, Math.PI * 2);
    s.stroke();
  }

  drawFilledCircle(center: Vec2, radius: number, color: string): void {
    const s = this.surface;
    s.fillStyle = color;
    s.beginPath();
    s.arc(center.x, center.y, radius, 0, Math.PI * 2);
    s.fill();
  }

  drawText(position: Vec2, text: string, color: string): void {
    const s = this.surface;
    s.fillStyle = color;
    s.font = FONT;
    s.textBaseline = 'top';
    s.fillText(text, position.x, position.y);
  }
}
