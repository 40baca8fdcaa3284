/**
 * Startup parameters
 *
 * Reads the page query string (?systems=2&maxLevel=1&seed=7) on top of the
 * defaults. A value that fails validation is reported and the default kept.
 */

import type { SpinnerConfig } from './types';
import { DEFAULT_CONFIG, LIGHT_PRESET } from './types';
import type { SimulationMode } from '../../shared/types';

export interface StartupOptions {
  config: SpinnerConfig;
  mode: SimulationMode;
  warnings: string[];
}

// 9^5 nodes per tree would stall the frame loop
export const MAX_LEVEL_LIMIT = 4;

type Parser<T> = (raw: string) => T | null;

const positiveInt: Parser<number> = raw => {
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : null;
};

const nonNegativeInt: Parser<number> = raw => {
  const value = Number(raw);
  return Number.isInteger(value) && value >= 0 ? value : null;
};

const positiveNumber: Parser<number> = raw => {
  if (raw.trim() === '') return null;
  const value = Number(raw);
  return Number.isFinite(value) && value > 0 ? value : null;
};

const toggle: Parser<boolean> = raw => {
  switch (raw.toLowerCase()) {
    case 'on':
    case 'true':
    case '1':
      return true;
    case 'off':
    case 'false':
    case '0':
      return false;
    default:
      return null;
  }
};

const frequencies: Parser<[number, number, number]> = raw => {
  const parts = raw.split(',').map(part => positiveNumber(part));
  if (parts.length !== 3) return null;
  const [low, mid, high] = parts;
  if (low === null || mid === null || high === null) return null;
  return [low, mid, high];
};

const seed: Parser<number> = raw => {
  const value = nonNegativeInt(raw);
  return value !== null && value <= 0xffffffff ? value : null;
};

const maxLevel: Parser<number> = raw => {
  const value = nonNegativeInt(raw);
  return value !== null && value <= MAX_LEVEL_LIMIT ? value : null;
};

const mode: Parser<SimulationMode> = raw =>
  raw === 'spinners' || raw === 'chorus' ? raw : null;

function readParam<T>(
  params: URLSearchParams,
  name: string,
  parse: Parser<T>,
  warnings: string[]
): T | undefined {
  const raw = params.get(name);
  if (raw === null) return undefined;
  const value = parse(raw);
  if (value === null) {
    warnings.push(`Ignoring invalid "${name}": ${JSON.stringify(raw)}`);
    return undefined;
  }
  return value;
}

export function leafLobeRadius(
  config: Pick<SpinnerConfig, 'lobeRadius' | 'shrinkFactor' | 'maxLevel'>
): number {
  return config.lobeRadius * config.shrinkFactor ** config.maxLevel;
}

export function parseStartupOptions(search: string): StartupOptions {
  const params = new URLSearchParams(search);
  const warnings: string[] = [];
  const config: SpinnerConfig = { ...DEFAULT_CONFIG };

  const preset = params.get('preset');
  if (preset === 'light') {
    Object.assign(config, LIGHT_PRESET);
  } else if (preset !== null && preset !== 'isolated') {
    warnings.push(`Ignoring unknown preset ${JSON.stringify(preset)}`);
  }

  const assign = <K extends keyof SpinnerConfig>(key: K, value: SpinnerConfig[K] | undefined) => {
    if (value !== undefined) config[key] = value;
  };
  const baseGeometry = { lobeRadius: config.lobeRadius, maxLevel: config.maxLevel };

  assign('width', readParam(params, 'width', positiveInt, warnings));
  assign('height', readParam(params, 'height', positiveInt, warnings));
  assign('fps', readParam(params, 'fps', positiveInt, warnings));
  assign('systemCount', readParam(params, 'systems', positiveInt, warnings));
  assign('lobeRadius', readParam(params, 'lobeRadius', positiveNumber, warnings));
  assign('armLength', readParam(params, 'armLength', positiveNumber, warnings));
  assign('particlesPerLobe', readParam(params, 'particles', positiveInt, warnings));
  assign('maxLevel', readParam(params, 'maxLevel', maxLevel, warnings));
  assign('baseFrequencies', readParam(params, 'frequencies', frequencies, warnings));
  assign('sampleRate', readParam(params, 'sampleRate', positiveInt, warnings));
  assign('toneDuration', readParam(params, 'toneDuration', positiveNumber, warnings));
  assign('seed', readParam(params, 'seed', seed, warnings));
  assign('audio', readParam(params, 'audio', toggle, warnings));
  assign('maxVoices', readParam(params, 'maxVoices', positiveInt, warnings));
  assign('timeScale', readParam(params, 'timeScale', positiveNumber, warnings));

  // The deepest lobes must fit the largest particle, or no particle can be inside one
  const leafRadius = leafLobeRadius(config);
  if (leafRadius <= config.particleRadius[1]) {
    warnings.push(
      `Ignoring "lobeRadius" and "maxLevel": leaf lobes of radius ${leafRadius.toFixed(2)} ` +
        `cannot hold particles of radius ${config.particleRadius[1]}`
    );
    Object.assign(config, baseGeometry);
  }

  return {
    config,
    mode: readParam(params, 'mode', mode, warnings) ?? 'spinners',
    warnings,
  };
}
