import * as os from 'os';
import * as path from 'path';
import type { FeatureClosureDirectories } from '../types/index.js';
import { DIR_PATTERNS } from '../constants/index.js';

/**
 * Directory resolution following the dotfile convention (~/.feature-closure
 * on every platform)
 */

export function getFeatureClosureDirectories(homeDir: string = os.homedir()): FeatureClosureDirectories {
  const baseDir = path.join(homeDir, DIR_PATTERNS.FEATURE_CLOSURE);

  return {
    config: baseDir
  };
}

/**
 * Default local Maven repository (~/.m2/repository)
 */
export function getDefaultLocalRepository(homeDir: string = os.homedir()): string {
  return path.join(homeDir, DIR_PATTERNS.MAVEN_LOCAL_REPOSITORY);
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandTilde(input: string, homeDir: string = os.homedir()): string {
  if (input === '~') {
    return homeDir;
  }
  if (input.startsWith('~/')) {
    return path.join(homeDir, input.slice(2));
  }
  return input;
}
