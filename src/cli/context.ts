/**
 * CLI Context Factory
 * 
 * Creates ExecutionContext instances with the CLI output port injected.
 * Command handlers use this instead of calling createExecutionContext()
 * directly.
 */

import type { ExecutionContext, ExecutionOptions } from '../types/execution-context.js';
import { createExecutionContext } from '../core/execution-context.js';
import { consoleOutput } from '../core/ports/console-output.js';
import type { OutputPort } from '../core/ports/output.js';

export interface CliContextOptions extends ExecutionOptions {
  output?: OutputPort;
}

export async function createCliExecutionContext(options: CliContextOptions = {}): Promise<ExecutionContext> {
  const ctx = await createExecutionContext(options);
  ctx.output = options.output ?? consoleOutput;
  return ctx;
}
