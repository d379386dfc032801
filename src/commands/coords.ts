import type { Command } from 'commander';

import type { ArtifactCoordinate, CommandResult } from '../types/index.js';
import type { ExecutionContext } from '../types/execution-context.js';
import { withErrorHandling } from '../utils/errors.js';
import { createCliExecutionContext } from '../cli/context.js';
import { resolveInputPath } from '../core/execution-context.js';
import { collectClosureCoordinates } from '../core/closure/closure-resolver.js';
import { descriptorCoordinates } from '../core/coordinates/extract.js';
import { loadAllFromFiles } from '../core/descriptor/file-descriptor-loader.js';
import { resolveOutput } from '../core/ports/resolve.js';

interface CoordsOptions {
  localRepo?: string;
  /** Commander sets this to false for --no-closure */
  closure?: boolean;
  json?: boolean;
}

type GlobalOptions = {
  cwd?: string;
};

/**
 * Print every artifact coordinate referenced by the given descriptors and,
 * unless disabled, by the descriptors reachable from them.
 */
export async function coordsCommand(
  descriptorPaths: string[],
  options: CoordsOptions,
  ctx: ExecutionContext
): Promise<CommandResult<ArtifactCoordinate[]>> {
  const out = resolveOutput(ctx);
  const paths = descriptorPaths.map(path => resolveInputPath(ctx, path));
  const start = await loadAllFromFiles(ctx.loader, paths);

  const coordinates = options.closure === false
    ? descriptorCoordinates(start)
    : await collectClosureCoordinates(start, ctx.loader);
  const result = Array.from(coordinates);

  if (options.json) {
    out.message(JSON.stringify(result, null, 2));
  } else if (result.length === 0) {
    out.info('No coordinates referenced');
  } else {
    result.forEach(coordinate => out.message(coordinate));
  }

  return { success: true, data: result };
}

export function setupCoordsCommand(program: Command): void {
  program
    .command('coords')
    .description('List the artifact coordinates referenced by features descriptors')
    .argument('<descriptors...>', 'features descriptor files to start from')
    .option('--local-repo <dir>', 'local Maven repository to resolve repositories from')
    .option('--no-closure', 'only list coordinates of the given descriptors')
    .option('--json', 'print the result as JSON')
    .action(withErrorHandling(async (descriptorPaths: string[], options: CoordsOptions, command: Command) => {
      const globals = command.optsWithGlobals<GlobalOptions>();
      const ctx = await createCliExecutionContext({ cwd: globals.cwd, localRepository: options.localRepo });
      await coordsCommand(descriptorPaths, options, ctx);
    }));
}
