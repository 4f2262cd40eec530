// src/core/config/project.ts
import * as path from 'path';
import * as fs from 'fs/promises';
import { getDefaultProjectDir } from './app-dirs.js';
import { API_KEY_ENV, API_KEY_FILENAME, PARSE_FAILS_FILENAME, STORE_FILENAME } from './constants.js';
import { AuthError } from '../errors.js';

export type CutoffUnit = 'hours' | 'days' | 'weeks' | 'months';

const UNIT_MS: Record<CutoffUnit, number> = {
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  weeks: 7 * 24 * 60 * 60 * 1000,
  months: 30 * 24 * 60 * 60 * 1000,
};

export interface ProjectPaths {
  projectDir: string;
  storePath: string;
  parseFailsPath: string;
  apiKeyPath: string;
}

export function resolveProjectPaths(projectDir?: string): ProjectPaths {
  const dir = path.resolve(projectDir ?? getDefaultProjectDir());
  return {
    projectDir: dir,
    storePath: path.join(dir, STORE_FILENAME),
    parseFailsPath: path.join(dir, PARSE_FAILS_FILENAME),
    apiKeyPath: path.join(dir, API_KEY_FILENAME),
  };
}

export function isCutoffUnit(value: string): value is CutoffUnit {
  return Object.keys(UNIT_MS).includes(value);
}

export function cutoffToMs(value: number, unit: CutoffUnit): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid cutoff: ${value}`);
  }
  return value * UNIT_MS[unit];
}

/**
 * Environment first, then the project's api_key file.
 */
export async function loadApiKey(paths: ProjectPaths, env: NodeJS.ProcessEnv = process.env): Promise<string> {
  const fromEnv = env[API_KEY_ENV]?.trim();
  if (fromEnv) return fromEnv;

  let content: string;
  try {
    content = await fs.readFile(paths.apiKeyPath, 'utf-8');
  } catch (error) {
    throw new AuthError(`Missing API key: set ${API_KEY_ENV} or create ${paths.apiKeyPath}`, error);
  }

  const key = content.trim();
  if (!key) {
    throw new AuthError(`Empty API key file: ${paths.apiKeyPath}`);
  }
  return key;
}
