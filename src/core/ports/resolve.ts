/**
 * Port Resolution Helpers
 * 
 * Resolve the OutputPort from an ExecutionContext, falling back to
 * the plain console adapter when none is provided.
 */

import type { OutputPort } from './output.js';
import { consoleOutput } from './console-output.js';

export function resolveOutput(ctx?: { output?: OutputPort }): OutputPort {
  return ctx?.output ?? consoleOutput;
}
