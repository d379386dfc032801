/**
 * Console Output Adapter (Default/CI)
 * 
 * Plain console.log-based implementation of OutputPort.
 * Safe for CI/CD pipelines and piped output.
 */

import type { OutputPort } from './output.js';

export const consoleOutput: OutputPort = {
  info(message: string): void {
    console.log(message);
  },

  message(message: string): void {
    console.log(message);
  },

  success(message: string): void {
    console.log(`✓ ${message}`);
  },
};
