/**
 * Execution Context Module
 * 
 * Creates and validates the ExecutionContext for commands: resolves the
 * working directory, picks the local repository from options and
 * configuration, and binds a descriptor loader to it.
 */

import { resolve } from 'path';
import { stat } from 'fs/promises';
import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { configManager as defaultConfigManager, type ConfigManager } from './config.js';
import { FileDescriptorLoader } from './descriptor/file-descriptor-loader.js';
import { LocalRepositoryResolver } from './resolver/local-repository-resolver.js';
import { ValidationError } from '../utils/errors.js';
import { logger } from '../utils/logger.js';

/**
 * Create an ExecutionContext from command options.
 * 
 * @throws ValidationError when --cwd is not an existing directory
 */
export async function createExecutionContext(
  options: ExecutionOptions = {},
  configManager: ConfigManager = defaultConfigManager
): Promise<ExecutionContext> {
  const sourceCwd = options.cwd ? resolve(process.cwd(), options.cwd) : process.cwd();
  await validateSourceCwd(sourceCwd);

  const localRepository = await configManager.getLocalRepository(options.localRepository);
  const loader = new FileDescriptorLoader({
    resolver: new LocalRepositoryResolver(localRepository)
  });

  logger.debug('Created execution context', { sourceCwd, localRepository });

  return { sourceCwd, localRepository, loader };
}

async function validateSourceCwd(sourceCwd: string): Promise<void> {
  let isDirectory: boolean;
  try {
    isDirectory = (await stat(sourceCwd)).isDirectory();
  } catch (error) {
    throw new ValidationError(`working directory does not exist: ${sourceCwd}`, { sourceCwd, error });
  }
  if (!isDirectory) {
    throw new ValidationError(`working directory is not a directory: ${sourceCwd}`, { sourceCwd });
  }
}

/**
 * Resolve a descriptor path argument against the context's working directory.
 */
export function resolveInputPath(context: ExecutionContext, input: string): string {
  return resolve(context.sourceCwd, input);
}
