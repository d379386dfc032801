/**
 * Execution Context Types
 * 
 * Type definitions for the context a command runs in: where input paths
 * are resolved from, which repository artifacts come from, and where
 * output goes.
 */

import type { OutputPort } from '../core/ports/output.js';
import type { DescriptorLoader } from '../core/ports/descriptor-loader.js';

export interface ExecutionContext {
  /**
   * Absolute path descriptor file arguments are resolved against.
   * - Normally the original working directory
   * - For --cwd commands: the specified directory
   */
  sourceCwd: string;

  /**
   * Absolute path of the local repository coordinates resolve into.
   */
  localRepository: string;

  /**
   * Loader for descriptor files and coordinates, bound to localRepository.
   */
  loader: DescriptorLoader;

  /**
   * Output port for all user-facing messages.
   * When not provided, defaults to consoleOutput (plain console.log).
   */
  output?: OutputPort;
}

/**
 * Options for creating an ExecutionContext
 */
export interface ExecutionOptions {
  /**
   * --cwd flag: directory descriptor paths are relative to
   */
  cwd?: string;

  /**
   * --local-repo flag: overrides the configured local repository
   */
  localRepository?: string;
}
