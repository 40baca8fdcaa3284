/**
 * Spinner Node
 *
 * One spinner: three arms ending in circular lobes of particles. Below the
 * depth limit every lobe carries three smaller spinners, nine children in all.
 * Children never own their position: each tick the parent pushes the current
 * lobe center down before updating them.
 */

import type { Particle, Rng, SpinnerConfig, Vec2 } from './types';
import { LOBE_COUNT, LOBE_COLORS, THEME } from './types';
import { createParticle, kineticEnergy, updateParticle } from './particle';
import { applyDemonSort } from './demon';
import { mapEnergyToTone } from './tone';
import type { ToneSink } from './toneEmitter';
import type { RenderBackend } from './canvasBackend';

export const CHILDREN_PER_LOBE = 3;

export interface SimulationContext {
  rng: Rng;
  config: SpinnerConfig;
  tones: ToneSink | null;
}

export interface SpinnerNodeOptions {
  level: number;
  center: Vec2;
  armLength: number;
  lobeRadius: number;
  maxLevel: number;
}

export class SpinnerNode {
  readonly level: number;
  readonly maxLevel: number;
  readonly armLength: number;
  readonly lobeRadius: number;
  center: Vec2;
  theta = 0;
  readonly particles: Particle[][];
  readonly children: SpinnerNode[][] | null;

  constructor(options: SpinnerNodeOptions, context: SimulationContext) {
    const { level, center, armLength, lobeRadius, maxLevel } = options;
    this.level = level;
    this.maxLevel = maxLevel;
    this.armLength = armLength;
    this.lobeRadius = lobeRadius;
    this.center = { ...center };
    this.particles = Array.from({ length: LOBE_COUNT }, () => []);
    this.children = level < maxLevel ? this.createChildren(context) : null;
    this.initParticles(context);
  }

  private createChildren(context: SimulationContext): SpinnerNode[][] {
    const shrink = context.config.shrinkFactor;
    const children: SpinnerNode[][] = [];
    for (let i = 0; i < LOBE_COUNT; i++) {
      const lobeCenter = this.getLobeCenter(i);
      const group: SpinnerNode[] = [];
      for (let j = 0; j < CHILDREN_PER_LOBE; j++) {
        group.push(
          new SpinnerNode(
            {
              level: this.level + 1,
              center: lobeCenter,
              armLength: this.armLength * shrink,
              lobeRadius: this.lobeRadius * shrink,
              maxLevel: this.maxLevel,
            },
            context
          )
        );
      }
      children.push(group);
    }
    return children;
  }

  private initParticles(context: SimulationContext): void {
    for (let i = 0; i < LOBE_COUNT; i++) {
      const lobeCenter = this.getLobeCenter(i);
      const group: Particle[] = [];
      for (let n = 0; n < context.config.particlesPerLobe; n++) {
        group.push(createParticle(lobeCenter, this.lobeRadius, context.rng, context.config));
      }
      this.particles[i] = group;
    }
  }

  getLobeCenter(index: number): Vec2 {
    const angle = (index * 2 * Math.PI) / 3 + this.theta;
    return {
      x: this.center.x + Math.cos(angle) * this.armLength,
      y: this.center.y + Math.sin(angle) * this.armLength,
    };
  }

  getLobeCenters(): Vec2[] {
    return Array.from({ length: LOBE_COUNT }, (_, i) => this.getLobeCenter(i));
  }

  /**
   * Order matters for reproducible trajectories: rotate, move own particles
   * (emitting tones), update children at the fresh lobe centers, then sort.
   */
  update(dt: number, context: SimulationContext): void {
    const { config, rng, tones } = context;
    this.theta += dt * (config.spinRate + this.level * config.levelSpinBoost);

    const lobeCenters = this.getLobeCenters();
    for (let i = 0; i < LOBE_COUNT; i++) {
      const pan = i / 2;
      for (const particle of this.particles[i]) {
        updateParticle(particle, lobeCenters[i], this.lobeRadius, dt, rng, config.perturbation);
        if (tones) {
          tones.emit(mapEnergyToTone(kineticEnergy(particle), config.baseFrequencies[i], pan, config));
        }
      }
    }

    if (this.children) {
      for (let i = 0; i < LOBE_COUNT; i++) {
        for (const child of this.children[i]) {
          child.center = { ...lobeCenters[i] };
          child.update(dt, context);
        }
      }
    }

    for (let i = 0; i < LOBE_COUNT; i++) {
      applyDemonSort(this.particles[i], lobeCenters[i], config.demonThreshold);
    }
  }

  render(backend: RenderBackend): void {
    for (let i = 0; i < LOBE_COUNT; i++) {
      const lobeCenter = this.getLobeCenter(i);
      const color = LOBE_COLORS[i];
      backend.drawLine(this.center, lobeCenter, THEME.arm, 2);
      backend.drawCircleOutline(lobeCenter, this.lobeRadius, color);
      for (const particle of this.particles[i]) {
        backend.drawFilledCircle({ x: particle.x, y: particle.y }, particle.radius, color);
      }
    }
    this.forEachChild(child => child.render(backend));
  }

  private forEachChild(visit: (child: SpinnerNode) => void): void {
    if (!this.children) return;
    for (const group of this.children) {
      for (const child of group) {
        visit(child);
      }
    }
  }

  /** Depth-first, parent before children. */
  forEachNode(visit: (node: SpinnerNode) => void): void {
    visit(this);
    this.forEachChild(child => child.forEachNode(visit));
  }

  totalEnergy(): number {
    let energy = 0;
    for (const group of this.particles) {
      for (const particle of group) {
        energy += kineticEnergy(particle);
      }
    }
    this.forEachChild(child => {
      energy += child.totalEnergy();
    });
    return energy;
  }

  totalParticles(): number {
    let count = 0;
    for (const group of this.particles) {
      count += group.length;
    }
    this.forEachChild(child => {
      count += child.totalParticles();
    });
    return count;
  }

  nodeCount(): number {
    let count = 1;
    this.forEachChild(child => {
      count += child.nodeCount();
    });
    return count;
  }
}
