/**
 * Feature closure resolution
 *
 * Starting from one or more descriptors, follows repository references
 * depth-first and loads every descriptor reachable from them. The visited
 * set is shared by every branch of one resolution: a coordinate is recorded
 * before its descriptor is loaded, so cyclic repository references end the
 * descent instead of recursing forever.
 *
 * Each newly discovered descriptor is recursed into directly rather than
 * being loaded a second time; the loader is assumed to return equal
 * descriptors for equal coordinates.
 */

import type { ArtifactCoordinate, Descriptor } from '../../types/index.js';
import type { DescriptorLoader } from '../ports/descriptor-loader.js';
import {
  descriptorCoordinates,
  isDescriptor,
  repositoryCoordinates,
  type CoordinateSet
} from '../coordinates/extract.js';
import { logger } from '../../utils/logger.js';

export type VisitedCoordinates = Set<ArtifactCoordinate>;

interface TraversalContext {
  loader: DescriptorLoader;
  visited: VisitedCoordinates;
}

function describe(descriptor: Descriptor): string {
  return descriptor.name ?? descriptor.source;
}

async function collectFrom(
  descriptor: Descriptor,
  ctx: TraversalContext,
  result: Set<Descriptor>
): Promise<void> {
  logger.debug(`resolveClosure(${describe(descriptor)}) starts`);
  logger.debug('resolveClosure knows about these coordinates', ctx.visited);

  for (const coordinate of repositoryCoordinates(descriptor)) {
    if (ctx.visited.has(coordinate)) {
      logger.debug(`resolveClosure() skips known ${coordinate}`);
      continue;
    }

    logger.debug(`resolveClosure() going to add ${coordinate}`);
    ctx.visited.add(coordinate);
    const loaded = await ctx.loader.resolveAndLoad(coordinate);
    result.add(loaded);
    logger.debug(`resolveClosure() added ${coordinate}`);

    await collectFrom(loaded, ctx, result);
  }
}

/**
 * Load every descriptor transitively reachable from `start` through
 * repository references.
 *
 * Descriptors whose coordinate is already in `visited` are neither loaded
 * nor descended into. `visited` is updated in place with every coordinate
 * discovered. Any loader or normalization error aborts the resolution.
 *
 * @param start - starting descriptor, or descriptors sharing one visited set
 * @param loader - descriptor source for discovered coordinates
 * @param visited - coordinates already known; defaults to a fresh set
 * @returns discovered descriptors in discovery order, excluding `start`
 */
export async function resolveClosure(
  start: Descriptor | Iterable<Descriptor>,
  loader: DescriptorLoader,
  visited: VisitedCoordinates = new Set()
): Promise<Set<Descriptor>> {
  const ctx: TraversalContext = { loader, visited };
  const result = new Set<Descriptor>();
  const starting = isDescriptor(start) ? [start] : Array.from(start);

  for (const descriptor of starting) {
    await collectFrom(descriptor, ctx, result);
  }

  logger.debug(`resolveClosure() discovered ${result.size} descriptor(s)`);
  return result;
}

/**
 * Every coordinate referenced by the starting descriptors and by the
 * descriptors reachable from them.
 */
export async function collectClosureCoordinates(
  start: Descriptor | Iterable<Descriptor>,
  loader: DescriptorLoader
): Promise<CoordinateSet> {
  const starting = isDescriptor(start) ? [start] : Array.from(start);
  const closure = await resolveClosure(starting, loader);
  return descriptorCoordinates([...starting, ...closure]);
}
