/**
 * Nested Spinners - core types and configuration
 */

export interface Vec2 {
  x: number;
  y: number;
}

export interface Particle {
  x: number;
  y: number;
  vx: number;
  vy: number;
  radius: number;
}

/** Returns a uniform float in [0, 1). */
export type Rng = () => number;

export interface SpinnerConfig {
  width: number;
  height: number;
  fps: number;
  systemCount: number;
  lobeRadius: number;
  armLength: number;
  particlesPerLobe: number;
  maxLevel: number;
  shrinkFactor: number;
  spinRate: number;
  levelSpinBoost: number;
  demonThreshold: number;
  perturbation: number;
  maxInitialSpeed: number;
  particleRadius: [number, number];
  baseFrequencies: [number, number, number];
  energyPitchScale: number;
  energyVolumeScale: number;
  sampleRate: number;
  toneDuration: number;
  seed: number | null;
  audio: boolean;
  maxVoices: number;
  timeScale: number;
}

// Isolated variant: demon sort plus one tone per particle per tick
export const DEFAULT_CONFIG: SpinnerConfig = {
  width: 1200,
  height: 800,
  fps: 60,
  systemCount: 3,
  lobeRadius: 110,
  armLength: 170,
  particlesPerLobe: 6,
  maxLevel: 2,
  shrinkFactor: 0.4,              // Arm and lobe scale per level
  spinRate: 1,
  levelSpinBoost: 0.3,            // Deeper levels spin faster
  demonThreshold: 0.05,           // Energy above this goes to the hot side
  perturbation: 0.01,             // Velocity jitter span, i.e. ±0.005
  maxInitialSpeed: 0.3,
  particleRadius: [2, 4],
  baseFrequencies: [220, 330, 440],
  energyPitchScale: 300,          // Hz per unit of kinetic energy
  energyVolumeScale: 8,
  sampleRate: 44100,
  toneDuration: 0.05,             // seconds
  seed: null,
  audio: true,
  maxVoices: 48,
  timeScale: 1,                   // dt is raw elapsed milliseconds
};

// Light variant: silent, denser lobes, fixed seed
export const LIGHT_PRESET: Partial<SpinnerConfig> = {
  particlesPerLobe: 10,
  seed: 42,
  audio: false,
};

export const CHORUS_FPS = 30;

export const LOBE_COLORS = ['#ff6b6b', '#ffd93d', '#6be36b'] as const;

export const THEME = {
  background: '#0b1020',
  panel: '#141e2d',
  text: '#e6eef8',
  arm: '#c8c8c8',
} as const;

export const LOBE_COUNT = 3;
