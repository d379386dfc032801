import { join, resolve } from 'path';
import { FeatureClosureConfig, FeatureClosureDirectories } from '../types/index.js';
import { CONFIG_FILE_NAMES, ENV_VARS } from '../constants/index.js';
import { readJsonOrJsoncFile, exists } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { ConfigError } from '../utils/errors.js';
import { expandTilde, getDefaultLocalRepository, getFeatureClosureDirectories } from './directory.js';

/**
 * Configuration management for the feature-closure CLI
 * Supports both JSON and JSONC formats
 */

export interface ConfigManagerOptions {
  directories?: FeatureClosureDirectories;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

function validateConfig(value: unknown, configPath: string): FeatureClosureConfig {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    throw new ConfigError(`Configuration in ${configPath} must be an object`, { configPath });
  }
  const localRepository = 'localRepository' in value ? value.localRepository : undefined;
  if (localRepository === undefined) {
    return {};
  }
  if (typeof localRepository !== 'string') {
    throw new ConfigError(`'localRepository' in ${configPath} must be a string`, { configPath });
  }
  return { localRepository };
}

export class ConfigManager {
  private config: FeatureClosureConfig | null = null;
  private readonly directories: FeatureClosureDirectories;
  private readonly env: NodeJS.ProcessEnv;
  private readonly homeDir?: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.homeDir = options.homeDir;
    this.directories = options.directories ?? getFeatureClosureDirectories(options.homeDir);
    this.env = options.env ?? process.env;
  }

  /**
   * Find the existing config file (supports both .json and .jsonc)
   */
  private async findConfigFile(): Promise<string | null> {
    for (const fileName of CONFIG_FILE_NAMES) {
      const path = join(this.directories.config, fileName);
      if (await exists(path)) {
        return path;
      }
    }
    return null;
  }

  /**
   * Load configuration from file; a missing file yields an empty config
   */
  async load(): Promise<FeatureClosureConfig> {
    if (this.config) {
      return this.config;
    }

    const configPath = await this.findConfigFile();
    if (!configPath) {
      logger.debug('Config file not found, using defaults');
      this.config = {};
      return this.config;
    }

    logger.debug(`Loading config from: ${configPath}`);
    let raw: unknown;
    try {
      raw = await readJsonOrJsoncFile(configPath);
    } catch (error) {
      logger.error('Failed to load configuration', { error });
      throw new ConfigError(`Failed to load configuration: ${configPath}`, { configPath, error });
    }

    this.config = validateConfig(raw, configPath);
    return this.config;
  }

  /**
   * Local repository to resolve artifacts from.
   *
   * Precedence: explicit override, then FCLOSURE_LOCAL_REPO, then the config
   * file, then ~/.m2/repository.
   */
  async getLocalRepository(override?: string): Promise<string> {
    const fromEnv = this.env[ENV_VARS.LOCAL_REPOSITORY];
    const selected =
      override ??
      (fromEnv && fromEnv.length > 0 ? fromEnv : undefined) ??
      (await this.load()).localRepository ??
      getDefaultLocalRepository(this.homeDir);

    return resolve(expandTilde(selected, this.homeDir));
  }
}

// Export singleton instance
export const configManager = new ConfigManager();
