import { describe, it, expect } from 'vitest';
import { SpinnerNode } from './spinnerNode';
import type { SimulationContext } from './spinnerNode';
import { kineticEnergy } from './particle';
import { mulberry32 } from './random';
import { RecordingBackend, RecordingToneSink, scriptedRng } from './testing';
import { DEFAULT_CONFIG, THEME } from './types';
import type { Rng, SpinnerConfig } from './types';

const CENTER = { x: 600, y: 400 };

function makeContext(overrides: Partial<SpinnerConfig> = {}, rng: Rng = mulberry32(1)): SimulationContext {
  return { rng, config: { ...DEFAULT_CONFIG, ...overrides }, tones: null };
}

function makeRoot(context: SimulationContext): SpinnerNode {
  return new SpinnerNode(
    {
      level: 0,
      center: CENTER,
      armLength: context.config.armLength,
      lobeRadius: context.config.lobeRadius,
      maxLevel: context.config.maxLevel,
    },
    context
  );
}

describe('SpinnerNode construction', () => {
  it.each([
    [0, 1],
    [1, 10],
    [2, 91],
  ])('builds a full tree for maxLevel %i (%i nodes)', (maxLevel, nodes) => {
    const root = makeRoot(makeContext({ maxLevel }));
    expect(root.nodeCount()).toBe(nodes);
    expect(root.totalParticles()).toBe(nodes * 3 * DEFAULT_CONFIG.particlesPerLobe);
  });

  it('has no children at the depth limit', () => {
    const root = makeRoot(makeContext({ maxLevel: 0 }));
    expect(root.children).toBeNull();
  });

  it('hangs three shrunken children on every lobe', () => {
    const root = makeRoot(makeContext({ maxLevel: 1 }));
    expect(root.children).not.toBeNull();
    const children = root.children ?? [];
    expect(children).toHaveLength(3);

    for (const [i, group] of children.entries()) {
      expect(group).toHaveLength(3);
      for (const child of group) {
        expect(child.level).toBe(1);
        expect(child.armLength).toBeCloseTo(68, 9);
        expect(child.lobeRadius).toBeCloseTo(44, 9);
        expect(child.center).toEqual(root.getLobeCenter(i));
        expect(child.children).toBeNull();
      }
    }
  });

  it('spawns particles inside their lobes', () => {
    const root = makeRoot(makeContext({ maxLevel: 1 }));
    root.forEachNode(node => {
      node.particles.forEach((group, i) => {
        const lobe = node.getLobeCenter(i);
        for (const particle of group) {
          expect(Math.hypot(particle.x - lobe.x, particle.y - lobe.y) + particle.radius)
            .toBeLessThanOrEqual(node.lobeRadius + 1e-9);
        }
      });
    });
  });
});

describe('SpinnerNode.update', () => {
  it('spins deeper levels faster', () => {
    const context = makeContext({ maxLevel: 2 });
    const root = makeRoot(context);
    root.update(2, context);

    const thetaByLevel = new Map<number, number>();
    root.forEachNode(node => {
      thetaByLevel.set(node.level, node.theta);
    });
    expect(thetaByLevel.get(0)).toBeCloseTo(2, 9);
    expect(thetaByLevel.get(1)).toBeCloseTo(2.6, 9);
    expect(thetaByLevel.get(2)).toBeCloseTo(3.2, 9);
  });

  it('keeps every child centered on its parent lobe', () => {
    const context = makeContext({ maxLevel: 2 });
    const root = makeRoot(context);

    for (let tick = 0; tick < 5; tick++) {
      root.update(16, context);
      root.forEachNode(node => {
        node.children?.forEach((group, i) => {
          for (const child of group) {
            expect(child.center).toEqual(node.getLobeCenter(i));
          }
        });
      });
    }
  });

  it('keeps particles contained and sorted by the demon', () => {
    const context = makeContext({ maxLevel: 1 });
    const root = makeRoot(context);
    const threshold = context.config.demonThreshold;

    for (let tick = 0; tick < 60; tick++) {
      root.update(16, context);
      root.forEachNode(node => {
        node.particles.forEach((group, i) => {
          const lobe = node.getLobeCenter(i);
          for (const particle of group) {
            expect(Math.hypot(particle.x - lobe.x, particle.y - lobe.y) + particle.radius)
              .toBeLessThanOrEqual(node.lobeRadius + 1e-9);
            if (kineticEnergy(particle) > threshold) {
              expect(particle.x).toBeGreaterThanOrEqual(lobe.x);
            } else {
              expect(particle.x).toBeLessThanOrEqual(lobe.x);
            }
          }
        });
      });
    }
  });

  it('reports total energy as the sum over every particle', () => {
    const context = makeContext({ maxLevel: 1 });
    const root = makeRoot(context);
    root.update(16, context);

    let expected = 0;
    root.forEachNode(node => {
      for (const group of node.particles) {
        for (const particle of group) {
          expected += kineticEnergy(particle);
        }
      }
    });
    expect(root.totalEnergy()).toBeCloseTo(expected, 9);
    expect(root.totalEnergy()).toBeGreaterThanOrEqual(0);
  });

  it('bounces, sorts and voices a single particle per lobe', () => {
    // angle 0, speed 0.15, radius 3 for each of the three particles; no spin
    const script = [0, 0.5, 0.5, 0, 0.5, 0.5, 0, 0.5, 0.5];
    const context = makeContext({ maxLevel: 0, particlesPerLobe: 1, spinRate: 0 }, scriptedRng(script));
    const root = makeRoot(context);
    const tones = new RecordingToneSink();
    context.tones = tones;

    const [first] = root.particles[0];
    expect(first).toEqual({ x: 877, y: 400, vx: 0.15, vy: 0, radius: 3 });

    root.update(1, context);

    // Moving 0.15 outward from the rim reflects, then the now-cold particle is mirrored left
    expect(root.theta).toBe(0);
    expect(first.x).toBe(663);
    expect(first.y).toBe(400);
    expect(first.vx).toBe(-0.15);
    expect(first.vy).toBe(0);

    root.particles.forEach((group, i) => {
      const lobe = root.getLobeCenter(i);
      expect(group[0].x).toBeCloseTo(lobe.x - 107, 9);
      expect(group[0].y).toBeCloseTo(lobe.y, 9);
    });

    expect(tones.tones.map(tone => tone.leftGain)).toEqual([1, 0.5, 0]);
    expect(tones.tones.map(tone => tone.rightGain)).toEqual([0, 0.5, 1]);
    tones.tones.forEach((tone, i) => {
      expect(tone.frequency).toBeCloseTo(DEFAULT_CONFIG.baseFrequencies[i] + 0.01125 * 300, 9);
      expect(tone.volume).toBeCloseTo(0.09, 9);
    });
  });

  it('emits one tone per particle, parent lobes first', () => {
    const context = makeContext({ maxLevel: 1, particlesPerLobe: 2 });
    const root = makeRoot(context);
    const tones = new RecordingToneSink();
    context.tones = tones;

    root.update(16, context);

    expect(tones.tones).toHaveLength(60);
    expect(tones.tones.slice(0, 6).map(tone => tone.leftGain)).toEqual([1, 1, 0.5, 0.5, 0, 0]);
    expect(tones.tones[0].frequency).toBe(220 + kineticEnergy(root.particles[0][0]) * 300);
  });

  it('stays silent without a tone sink', () => {
    const context = makeContext({ maxLevel: 1 });
    const root = makeRoot(context);
    expect(() => root.update(16, context)).not.toThrow();
  });
});

describe('SpinnerNode.render', () => {
  it('draws arm, lobe outline, then particles for each lobe', () => {
    const root = makeRoot(makeContext({ maxLevel: 0, particlesPerLobe: 2 }));
    const backend = new RecordingBackend();
    root.render(backend);

    expect(backend.calls.map(call => call.kind)).toEqual([
      'line', 'outline', 'dot', 'dot',
      'line', 'outline', 'dot', 'dot',
      'line', 'outline', 'dot', 'dot',
    ]);
    expect(backend.calls[0]).toEqual({
      kind: 'line',
      from: CENTER,
      to: root.getLobeCenter(0),
      color: THEME.arm,
      width: 2,
    });
    expect(backend.calls[1]).toEqual({
      kind: 'outline',
      center: root.getLobeCenter(0),
      radius: 110,
      color: '#ff6b6b',
    });
    const particle = root.particles[0][0];
    expect(backend.calls[2]).toEqual({
      kind: 'dot',
      center: { x: particle.x, y: particle.y },
      radius: particle.radius,
      color: '#ff6b6b',
    });
  });

  it('draws the parent before its children', () => {
    const root = makeRoot(makeContext({ maxLevel: 1, particlesPerLobe: 1 }));
    const backend = new RecordingBackend();
    root.render(backend);

    // 10 nodes, 3 lobes each, 3 calls per lobe
    expect(backend.calls).toHaveLength(90);
    expect(backend.calls[9]).toEqual({
      kind: 'line',
      from: root.getLobeCenter(0),
      to: root.children?.[0][0].getLobeCenter(0),
      color: THEME.arm,
      width: 2,
    });
  });
});
