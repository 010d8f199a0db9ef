import { statSync } from 'fs';
import { homedir } from 'os';
import path from 'path';
import { logger } from './logger.js';

export interface DownloadsPathEnvironment {
  platform?: NodeJS.Platform;
  home?: string;
  env?: NodeJS.ProcessEnv;
  isDirectory?: (candidate: string) => boolean;
}

function directoryExists(candidate: string): boolean {
  try {
    return statSync(candidate).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Candidate folders in preference order for the given platform
 */
export function downloadsCandidates(platform: NodeJS.Platform, home: string, env: NodeJS.ProcessEnv): string[] {
  if (platform === 'win32') {
    const candidates = [path.join(home, 'Downloads'), path.join(home, 'Desktop')];
    if (env.USERPROFILE) {
      candidates.push(path.join(env.USERPROFILE, 'Downloads'));
    }
    return candidates;
  }

  if (platform === 'darwin') {
    return [path.join(home, 'Downloads'), path.join(home, 'Desktop')];
  }

  return [path.join(home, 'Downloads'), path.join(home, 'downloads'), path.join(home, 'Desktop')];
}

/**
 * First existing downloads folder, falling back to the home directory
 */
export function getDownloadsPath(environment: DownloadsPathEnvironment = {}): string {
  const platform = environment.platform ?? process.platform;
  const home = environment.home ?? homedir();
  const env = environment.env ?? process.env;
  const isDirectory = environment.isDirectory ?? directoryExists;

  for (const candidate of downloadsCandidates(platform, home, env)) {
    if (isDirectory(candidate)) {
      return candidate;
    }
  }

  logger.warn(`Could not find Downloads folder, using ${home}`, undefined, 'DownloadsPath');
  return home;
}
