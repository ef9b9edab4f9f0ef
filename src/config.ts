import path from 'path';
import { ConfigError } from './errors';
import { DEFAULT_HISTORY_LIMIT } from './history-store';
import type { SamplingMode, ShadeSystemId } from './types';

export interface AppConfig {
  dataDir: string;
  historyFile: string;
  historyLimit: number;
  defaultSystems: ShadeSystemId[];
  defaultSamplingMode: SamplingMode;
  debugMode: boolean;
}

function parseBoolean(value: string | undefined): boolean {
  return value === '1' || value?.toLowerCase() === 'true';
}

/**
 * Defaults, overridden by SHADE_DATA_DIR, SHADE_HISTORY_LIMIT and SHADE_DEBUG
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, cwd: string = process.cwd()): AppConfig {
  const dataDir = path.resolve(cwd, env.SHADE_DATA_DIR || 'shade-data');

  let historyLimit = DEFAULT_HISTORY_LIMIT;
  if (env.SHADE_HISTORY_LIMIT !== undefined && env.SHADE_HISTORY_LIMIT !== '') {
    historyLimit = Number(env.SHADE_HISTORY_LIMIT);
    if (!Number.isInteger(historyLimit) || historyLimit < 1) {
      throw new ConfigError(`SHADE_HISTORY_LIMIT must be a positive integer, got "${env.SHADE_HISTORY_LIMIT}"`);
    }
  }

  return {
    dataDir,
    historyFile: path.join(dataDir, 'patients.json'),
    historyLimit,
    defaultSystems: ['vita-classical'],
    defaultSamplingMode: 'average',
    debugMode: parseBoolean(env.SHADE_DEBUG)
  };
}
