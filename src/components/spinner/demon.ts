/**
 * Maxwell's Demon
 *
 * Mirrors each particle to the hot (right) or cold (left) half of its lobe by
 * kinetic energy. Only x is overwritten; velocity is left alone, and the
 * distance to the lobe center is preserved.
 */

import type { Particle, Vec2 } from './types';
import { kineticEnergy } from './particle';

export function applyDemonSort(
  particles: Particle[],
  lobeCenter: Vec2,
  threshold: number
): void {
  for (const particle of particles) {
    const dx = particle.x - lobeCenter.x;
    if (kineticEnergy(particle) > threshold) {
      particle.x = lobeCenter.x + Math.abs(dx);
    } else {
      particle.x = lobeCenter.x - Math.abs(dx);
    }
  }
}
