/**
 * Location → artifact coordinate normalization.
 *
 * Accepted location syntax:
 *   [wrap:]mvn:[<repository-url>!]<group>/<artifact>[/<version>[/<type>[/<classifier>]]]
 *
 * The resulting coordinate is `group:artifact[:type][:classifier]:version`.
 * A classifier given with a blank type gets the `jar` type, so the classifier
 * never lands in the type slot.
 * Anything following a `$` in the version (wrap instructions, unresolved
 * property placeholders) is dropped.
 */

import type { ArtifactCoordinate, Location, MavenLocation } from '../../types/index.js';
import { LOCATION_PREFIXES, MAVEN_LOCATION } from '../../constants/index.js';
import { MalformedLocationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

/**
 * Remove `prefix` from the start of `value` when present (literal match).
 */
function stripPrefix(value: string, prefix: string): string {
  return value.startsWith(prefix) ? value.slice(prefix.length) : value;
}

function optionalSegment(segments: string[], index: number): string | undefined {
  const segment = segments[index];
  return segment !== undefined && segment.trim().length > 0 ? segment : undefined;
}

/**
 * Parse a Maven location into its parts without joining them.
 *
 * @throws MalformedLocationError when the location is not a `mvn:` reference
 * or lacks a group or artifact
 */
export function parseMavenLocation(location: Location): MavenLocation {
  const unwrapped = stripPrefix(location.trim(), LOCATION_PREFIXES.WRAP);
  if (!unwrapped.startsWith(LOCATION_PREFIXES.MAVEN)) {
    throw new MalformedLocationError(location, `expected a '${LOCATION_PREFIXES.MAVEN}' location`);
  }

  const path = stripPrefix(unwrapped, LOCATION_PREFIXES.MAVEN);
  const separator = MAVEN_LOCATION.REPOSITORY_SEPARATOR;
  if (path.startsWith(separator) || path.endsWith(separator)) {
    throw new MalformedLocationError(location, `path cannot start or end with '${separator}'`);
  }

  let repositoryUrl: string | undefined;
  let artifactPart = path;
  const separatorIndex = path.lastIndexOf(separator);
  if (separatorIndex !== -1) {
    repositoryUrl = path.slice(0, separatorIndex);
    artifactPart = path.slice(separatorIndex + 1);
  }

  const segments = artifactPart.split(MAVEN_LOCATION.ARTIFACT_SEPARATOR);
  if (segments.length < 2) {
    throw new MalformedLocationError(location, 'expected at least <group>/<artifact>');
  }

  const group = optionalSegment(segments, 0);
  if (!group) {
    throw new MalformedLocationError(location, 'invalid groupId');
  }
  const artifact = optionalSegment(segments, 1);
  if (!artifact) {
    throw new MalformedLocationError(location, 'invalid artifactId');
  }

  const classifier = optionalSegment(segments, 4);
  const type = optionalSegment(segments, 3) ?? (classifier === undefined ? undefined : MAVEN_LOCATION.TYPE_JAR);

  return {
    repositoryUrl,
    group,
    artifact,
    version: optionalSegment(segments, 2) ?? MAVEN_LOCATION.VERSION_LATEST,
    type,
    classifier
  };
}

/**
 * Drop everything from the first property marker to the end of the version.
 */
export function stripVersionQualifier(version: string): string {
  const markerIndex = version.indexOf(MAVEN_LOCATION.PROPERTY_MARKER);
  return markerIndex === -1 ? version : version.slice(0, markerIndex);
}

/**
 * Join parsed location parts into a coordinate string.
 */
export function formatCoordinate(parts: MavenLocation): ArtifactCoordinate {
  const segments = [parts.group, parts.artifact];
  if (parts.type !== undefined) {
    segments.push(parts.type);
  }
  if (parts.classifier !== undefined) {
    segments.push(parts.classifier);
  }
  segments.push(stripVersionQualifier(parts.version));
  return segments.join(MAVEN_LOCATION.COORDINATE_SEPARATOR);
}

/**
 * Converts the given location to an artifact coordinate.
 */
export function toCoordinate(location: Location): ArtifactCoordinate {
  const coordinate = formatCoordinate(parseMavenLocation(location));
  logger.debug(`toCoordinate(${location}) returns ${coordinate}`);
  return coordinate;
}

/**
 * Converts each location, keeping order and duplicates.
 */
export function toCoordinates(locations: readonly Location[]): ArtifactCoordinate[] {
  const result = locations.map(toCoordinate);
  logger.debug('toCoordinates() returns', { locations, result });
  return result;
}
