/**
 * Core Ports
 * 
 * Re-exports all port interfaces and default implementations.
 * These ports define the boundary between the closure logic
 * and external concerns (artifact storage, descriptor format, output).
 */

export type { OutputPort } from './output.js';
export type { ArtifactResolver } from './artifact-resolver.js';
export type { DescriptorParser } from './descriptor-parser.js';
export type { DescriptorLoader } from './descriptor-loader.js';
export { consoleOutput } from './console-output.js';
export { resolveOutput } from './resolve.js';
