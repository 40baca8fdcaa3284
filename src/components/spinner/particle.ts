/**
 * Particle Physics
 * Integration, lobe-boundary reflection, velocity jitter
 */

import type { Particle, Rng, SpinnerConfig, Vec2 } from './types';

// Below this distance from the lobe center the outward normal is undefined
export const DEGENERATE_DISTANCE = 1e-9;

export function kineticEnergy(particle: Particle): number {
  return 0.5 * (particle.vx ** 2 + particle.vy ** 2);
}

/**
 * Place a particle on the inner rim of its lobe.
 * Velocity points along the same random angle as the placement.
 */
export function createParticle(
  lobeCenter: Vec2,
  lobeRadius: number,
  rng: Rng,
  config: Pick<SpinnerConfig, 'maxInitialSpeed' | 'particleRadius'>
): Particle {
  const [minRadius, maxRadius] = config.particleRadius;
  const angle = rng() * 2 * Math.PI;
  const speed = rng() * config.maxInitialSpeed;
  const radius = minRadius + rng() * (maxRadius - minRadius);

  return {
    x: lobeCenter.x + Math.cos(angle) * (lobeRadius - radius),
    y: lobeCenter.y + Math.sin(angle) * (lobeRadius - radius),
    vx: Math.cos(angle) * speed,
    vy: Math.sin(angle) * speed,
    radius,
  };
}

/**
 * Advance one tick inside a circular lobe.
 *
 * Crossing the rim reflects velocity about the outward normal and clamps the
 * particle back onto the rim. The jitter afterwards is never capped, so energy
 * drifts upward over long runs.
 */
export function updateParticle(
  particle: Particle,
  center: Vec2,
  lobeRadius: number,
  dt: number,
  rng: Rng,
  perturbation: number
): void {
  particle.x += particle.vx * dt;
  particle.y += particle.vy * dt;

  const dx = particle.x - center.x;
  const dy = particle.y - center.y;
  const dist = Math.hypot(dx, dy);

  if (dist + particle.radius > lobeRadius && dist >= DEGENERATE_DISTANCE) {
    const nx = dx / dist;
    const ny = dy / dist;
    const dot = particle.vx * nx + particle.vy * ny;
    particle.vx -= 2 * dot * nx;
    particle.vy -= 2 * dot * ny;
    particle.x = center.x + nx * (lobeRadius - particle.radius);
    particle.y = center.y + ny * (lobeRadius - particle.radius);
  }

  particle.vx += (rng() - 0.5) * perturbation;
  particle.vy += (rng() - 0.5) * perturbation;
}
