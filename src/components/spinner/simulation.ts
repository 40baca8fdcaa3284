/**
 * Simulation root
 * Independent top-level spinner trees, stepped and drawn once per frame
 */

import type { SpinnerConfig } from './types';
import { THEME } from './types';
import { mulberry32, randomSeed } from './random';
import { SpinnerNode } from './spinnerNode';
import type { SimulationContext } from './spinnerNode';
import type { ToneSink } from './toneEmitter';
import type { RenderBackend } from './canvasBackend';

export interface SimulationSnapshot {
  particles: number;
  energy: number;
  nodes: number;
  seed: number;
}

const PANEL = { x: 10, y: 10, width: 280, height: 60 };
const LINE_HEIGHT = 25;

export function formatOverlay(particles: number, energy: number): string[] {
  return [`Total Particles: ${particles}`, `Total Energy: ${energy.toFixed(2)}`];
}

export class SpinnerSimulation {
  readonly config: SpinnerConfig;
  readonly seed: number;
  readonly systems: SpinnerNode[];
  private context: SimulationContext;

  constructor(config: SpinnerConfig, tones: ToneSink | null = null) {
    this.config = config;
    this.seed = config.seed ?? randomSeed();
    this.context = { rng: mulberry32(this.seed), config, tones };

    const center = { x: Math.floor(config.width / 2), y: Math.floor(config.height / 2) };
    this.systems = Array.from(
      { length: config.systemCount },
      () =>
        new SpinnerNode(
          {
            level: 0,
            center,
            armLength: config.armLength,
            lobeRadius: config.lobeRadius,
            maxLevel: config.maxLevel,
          },
          this.context
        )
    );
  }

  setToneSink(tones: ToneSink | null): void {
    this.context.tones = tones;
  }

  step(dt: number): void {
    for (const system of this.systems) {
      system.update(dt, this.context);
    }
  }

  render(backend: RenderBackend): void {
    backend.clear(THEME.background);
    for (const system of this.systems) {
      system.render(backend);
    }

    backend.fillRect(
      { x: PANEL.x, y: PANEL.y },
      { width: PANEL.width, height: PANEL.height },
      THEME.panel
    );
    formatOverlay(this.totalParticles(), this.totalEnergy()).forEach((line, i) => {
      backend.drawText({ x: PANEL.x + 10, y: PANEL.y + 5 + i * LINE_HEIGHT }, line, THEME.text);
    });
  }

  totalParticles(): number {
    return this.systems.reduce((sum, system) => sum + system.totalParticles(), 0);
  }

  totalEnergy(): number {
    return this.systems.reduce((sum, system) => sum + system.totalEnergy(), 0);
  }

  nodeCount(): number {
    return this.systems.reduce((sum, system) => sum + system.nodeCount(), 0);
  }

  snapshot(): SimulationSnapshot {
    return {
      particles: this.totalParticles(),
      energy: this.totalEnergy(),
      nodes: this.nodeCount(),
      seed: this.seed,
    };
  }
}
