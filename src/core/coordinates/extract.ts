/**
 * Coordinate extraction
 *
 * Every function here answers the same question for a different kind of
 * input: which artifact coordinates does it reference? Results are
 * insertion-ordered sets, so the first occurrence of a coordinate fixes its
 * position. A malformed location anywhere in the input fails the whole call.
 */

import type {
  ArtifactCoordinate,
  Bundle,
  ConfigFile,
  Descriptor,
  Feature,
  Location
} from '../../types/index.js';
import { logger } from '../../utils/logger.js';
import { toCoordinate } from './normalize.js';

export type CoordinateSet = Set<ArtifactCoordinate>;

/**
 * Something that references artifacts by coordinate.
 */
export type CoordinateProducer<T> = (source: T) => CoordinateSet;

export function isDescriptor(value: Descriptor | Iterable<Descriptor>): value is Descriptor {
  return !(Symbol.iterator in value);
}

function addAll(target: CoordinateSet, source: Iterable<ArtifactCoordinate>): void {
  for (const coordinate of source) {
    target.add(coordinate);
  }
}

/**
 * Normalizes the given locations into a de-duplicated coordinate set.
 */
export function locationsToCoordinates(locations: Iterable<Location>): CoordinateSet {
  const result: CoordinateSet = new Set();
  for (const location of locations) {
    result.add(toCoordinate(location));
  }
  return result;
}

export const bundleCoordinates: CoordinateProducer<readonly Bundle[]> = (bundles) => {
  const result = locationsToCoordinates(bundles.map(bundle => bundle.location));
  logger.debug('bundleCoordinates() returns', result);
  return result;
};

export const configFileCoordinates: CoordinateProducer<readonly ConfigFile[]> = (configFiles) => {
  const result = locationsToCoordinates(configFiles.map(configFile => configFile.location));
  logger.debug('configFileCoordinates() returns', result);
  return result;
};

/**
 * Coordinates of a single feature's bundles and configuration files.
 * Repositories of the enclosing descriptor are not included.
 */
export const featureCoordinates: CoordinateProducer<Feature> = (feature) => {
  const result: CoordinateSet = new Set();
  addAll(result, bundleCoordinates(feature.bundles));
  addAll(result, configFileCoordinates(feature.configFiles));
  logger.debug(`featureCoordinates(${feature.name}) returns`, result);
  return result;
};

/**
 * Coordinates of the repositories referenced by one or more descriptors.
 */
export function repositoryCoordinates(source: Descriptor | Iterable<Descriptor>): CoordinateSet {
  if (isDescriptor(source)) {
    return locationsToCoordinates(source.repositories);
  }

  const result: CoordinateSet = new Set();
  for (const descriptor of source) {
    addAll(result, repositoryCoordinates(descriptor));
  }
  logger.debug('repositoryCoordinates() returns', result);
  return result;
}

/**
 * All coordinates a descriptor references directly: its repositories, then
 * the bundles and configuration files of each feature it contains.
 */
export function descriptorCoordinates(source: Descriptor | Iterable<Descriptor>): CoordinateSet {
  const result: CoordinateSet = new Set();

  if (isDescriptor(source)) {
    addAll(result, repositoryCoordinates(source));
    for (const feature of source.features) {
      addAll(result, featureCoordinates(feature));
    }
    logger.debug(`descriptorCoordinates(${source.name ?? source.source}) returns`, result);
    return result;
  }

  for (const descriptor of source) {
    addAll(result, descriptorCoordinates(descriptor));
  }
  return result;
}
