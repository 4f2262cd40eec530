import os from 'node:os';
import path from 'node:path';
import { APP_NAME, HOME_ENV } from './constants.js';

/**
 * Per-user data directory: WATCHTRAIL_HOME when set, otherwise the
 * platform's application data location.
 */
export function getAppDataDir(
  env: NodeJS.ProcessEnv = process.env,
  platform: NodeJS.Platform = process.platform
): string {
  const override = env[HOME_ENV];
  if (override) {
    return path.resolve(override);
  }

  switch (platform) {
    case 'win32': {
      const base = env.LOCALAPPDATA || env.APPDATA;
      return path.join(base || path.join(os.homedir(), 'AppData', 'Local'), APP_NAME);
    }
    case 'darwin':
      return path.join(os.homedir(), 'Library', 'Application Support', APP_NAME);
    default:
      return path.join(env.XDG_DATA_HOME || path.join(os.homedir(), '.local', 'share'), APP_NAME);
  }
}

export function getDefaultProjectDir(env: NodeJS.ProcessEnv = process.env): string {
  return path.join(getAppDataDir(env), 'default');
}
