/**
 * Lobe Chorus
 *
 * Three free-standing lobes of velocity-only particles. Each tick jitters every
 * particle, then a softer demon nudges particles above the lobe's average energy
 * rightward and the rest leftward. Every particle sounds its own tone.
 */

import type { Rng, SpinnerConfig } from './types';
import { LOBE_COLORS, THEME } from './types';
import { mapEnergyToTone } from './tone';
import type { ToneParams } from './tone';
import type { RenderBackend } from './canvasBackend';

export interface ChorusParticle {
  vx: number;
  vy: number;
}

export interface ChorusLobe {
  particles: ChorusParticle[];
  baseFrequency: number;
  pan: number;           // 0.0 = left, 1.0 = right
}

export const CHORUS_PANS = [0.1, 0.5, 0.9] as const;

const INITIAL_SPREAD = 0.5;
const JITTER = 0.02;
const DEMON_NUDGE = 0.01;

export function chorusEnergy(particle: ChorusParticle): number {
  return 0.5 * (particle.vx ** 2 + particle.vy ** 2);
}

export function createChorus(
  rng: Rng,
  config: Pick<SpinnerConfig, 'particlesPerLobe' | 'baseFrequencies'>
): ChorusLobe[] {
  return CHORUS_PANS.map((pan, i) => ({
    particles: Array.from({ length: config.particlesPerLobe }, () => ({
      vx: (rng() - 0.5) * INITIAL_SPREAD,
      vy: (rng() - 0.5) * INITIAL_SPREAD,
    })),
    baseFrequency: config.baseFrequencies[i],
    pan,
  }));
}

export function updateChorusLobe(lobe: ChorusLobe, rng: Rng): void {
  for (const particle of lobe.particles) {
    particle.vx += (rng() - 0.5) * JITTER;
    particle.vy += (rng() - 0.5) * JITTER;
  }

  if (lobe.particles.length === 0) return;
  const average =
    lobe.particles.reduce((sum, particle) => sum + chorusEnergy(particle), 0) / lobe.particles.length;

  for (const particle of lobe.particles) {
    if (chorusEnergy(particle) > average) {
      particle.vx += DEMON_NUDGE;
    } else {
      particle.vx -= DEMON_NUDGE;
    }
  }
}

export function chorusTones(
  lobes: ChorusLobe[],
  config: Pick<SpinnerConfig, 'energyPitchScale' | 'energyVolumeScale'>
): ToneParams[] {
  return lobes.flatMap(lobe =>
    lobe.particles.map(particle =>
      mapEnergyToTone(chorusEnergy(particle), lobe.baseFrequency, lobe.pan, config)
    )
  );
}

// Bars are drawn this many pixels per unit of energy
const BAR_SCALE = 400;
const BAR_SPACING = 12;

/** Lobes sit across the canvas at their pan; one bar per particle. */
export function renderChorus(
  lobes: ChorusLobe[],
  backend: RenderBackend,
  size: { width: number; height: number },
  lobeRadius: number
): void {
  backend.clear(THEME.background);

  let total = 0;
  lobes.forEach((lobe, i) => {
    const center = { x: size.width * lobe.pan, y: size.height / 2 };
    const color = LOBE_COLORS[i % LOBE_COLORS.length];
    backend.drawCircleOutline(center, lobeRadius, color);

    const top = center.y - ((lobe.particles.length - 1) * BAR_SPACING) / 2;
    lobe.particles.forEach((particle, n) => {
      const energy = chorusEnergy(particle);
      total += energy;
      const y = top + n * BAR_SPACING;
      const length = Math.min(lobeRadius, energy * BAR_SCALE);
      backend.drawLine({ x: center.x, y }, { x: center.x + Math.sign(particle.vx) * length, y }, color, 3);
    });

    backend.drawText(
      { x: center.x - 30, y: center.y + lobeRadius + 10 },
      `${lobe.baseFrequency} Hz`,
      THEME.text
    );
  });

  backend.fillRect({ x: 10, y: 10 }, { width: 280, height: 35 }, THEME.panel);
  backend.drawText({ x: 20, y: 15 }, `Total Energy: ${total.toFixed(2)}`, THEME.text);
}
