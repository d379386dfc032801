import type { Command } from 'commander';

import type { CommandResult, Descriptor } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveInputPath } from '../core/execution-context.js';
import { resolveClosure } from '../core/closure/closure-resolver.js';
import { resolveOutput } from '../core/ports/resolve.js';
import { formatDescriptor, formatList } from '../utils/formatters.js';
import { loadAllFromFiles } from '../core/descriptor/file-descriptor-loader.js';

interface ClosureOptions {
  localRepo?: string;
  json?: boolean;
}

type GlobalOptions = {
  cwd?: string;
};

export interface DescriptorSummary {
  name?: string;
  source: string;
}

export interface ClosureReport {
  start: DescriptorSummary[];
  discovered: DescriptorSummary[];
}

function summarize(descriptor: Descriptor): DescriptorSummary {
  return descriptor.name ? { name: descriptor.name, source: descriptor.source } : { source: descriptor.source };
}

/**
 * Load the given descriptor files and every descriptor reachable from them
 * through repository references.
 */
export async function closureCommand(
  descriptorPaths: string[],
  options: ClosureOptions,
  ctx: ExecutionContext
): Promise<CommandResult<ClosureReport>> {
  const out = resolveOutput(ctx);
  const paths = descriptorPaths.map(path => resolveInputPath(ctx, path));
  const start = await loadAllFromFiles(ctx.loader, paths);
  const discovered = await resolveClosure(start, ctx.loader);

  const report: ClosureReport = {
    start: start.map(summarize),
    discovered: Array.from(discovered, summarize)
  };

  if (options.json) {
    out.message(JSON.stringify(report, null, 2));
  } else {
    const lines = Array.from(discovered, descriptor => formatDescriptor(descriptor, ctx.sourceCwd));
    out.message(`Closure of ${start.map(descriptor => formatDescriptor(descriptor, ctx.sourceCwd)).join(', ')}`);
    if (lines.length > 0) {
      formatList(lines).forEach(line => out.message(line));
    } else {
      out.message('└── (no repositories)');
    }
    out.success(`Discovered ${discovered.size} descriptor(s)`);
  }

  return { success: true, data: report };
}

export function setupClosureCommand(program: Command): void {
  program
    .command('closure')
    .description('List every features descriptor reachable through repository references')
    .argument('<descriptors...>', 'features descriptor files to start from')
    .option('--local-repo <dir>', 'local Maven repository to resolve repositories from')
    .option('--json', 'print the result as JSON')
    .action(withErrorHandling(async (descriptorPaths: string[], options: ClosureOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd: globals.cwd, localRepository: options.localRepo });
      await closureCommand(descriptorPaths, options, ctx);
    }));
}
