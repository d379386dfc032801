/**
 * Local Maven repository resolver
 *
 * Maps a coordinate onto the standard repository layout:
 *   <root>/<group as path>/<artifact>/<version>/<artifact>-<version>[-<classifier>].<type>
 *
 * Nothing is downloaded; a coordinate whose file is not already present in
 * the repository cannot be resolved.
 */

import { join, resolve } from 'path';
import type { ArtifactCoordinate } from '../../types/index.js';
import type { ArtifactResolver } from '../ports/artifact-resolver.js';
import { MAVEN_LOCATION } from '../../constants/index.js';
import { UnresolvableCoordinateError } from '../../utils/errors.js';
import { isFile } from '../../utils/fs.js';
import { logger } from '../../utils/logger.js';

const RELATIVE_PATH_SEGMENTS = new Set(['.', '..']);

// Segments become directory and file names under the repository root
function isPathSafeSegment(segment: string): boolean {
  return segment.length > 0 &&
    !RELATIVE_PATH_SEGMENTS.has(segment) &&
    !segment.includes('/') &&
    !segment.includes('\\');
}

export interface ArtifactParts {
  group: string;
  artifact: string;
  version: string;
  type?: string;
  classifier?: string;
}

/**
 * Split a coordinate back into its parts. Four segments are read as
 * `group:artifact:type:version`. Segments that are empty, `.` or `..`, or
 * that contain a path separator, make the coordinate unusable.
 */
export function parseCoordinate(coordinate: ArtifactCoordinate): ArtifactParts | null {
  const segments = coordinate.split(MAVEN_LOCATION.COORDINATE_SEPARATOR);
  if (segments.some(segment => !isPathSafeSegment(segment))) {
    return null;
  }

  switch (segments.length) {
    case 3: {
      const [group, artifact, version] = segments;
      return { group, artifact, version };
    }
    case 4: {
      const [group, artifact, type, version] = segments;
      return { group, artifact, type, version };
    }
    case 5: {
      const [group, artifact, type, classifier, version] = segments;
      return { group, artifact, type, classifier, version };
    }
    default:
      return null;
  }
}

/**
 * Path of an artifact relative to the repository root.
 */
export function artifactRelativePath(parts: ArtifactParts): string {
  const classifierSuffix = parts.classifier ? `-${parts.classifier}` : '';
  const extension = parts.type ?? MAVEN_LOCATION.TYPE_JAR;
  const fileName = `${parts.artifact}-${parts.version}${classifierSuffix}.${extension}`;
  return join(...parts.group.split('.'), parts.artifact, parts.version, fileName);
}

export class LocalRepositoryResolver implements ArtifactResolver {
  readonly root: string;

  constructor(root: string) {
    this.root = resolve(root);
  }

  async resolve(coordinate: ArtifactCoordinate): Promise<string> {
    const parts = parseCoordinate(coordinate);
    if (!parts) {
      throw new UnresolvableCoordinateError(coordinate, 'not a group:artifact[:type][:classifier]:version coordinate');
    }

    const path = join(this.root, artifactRelativePath(parts));
    if (!(await isFile(path))) {
      throw new UnresolvableCoordinateError(coordinate, `no artifact at ${path}`, { repository: this.root, path });
    }

    logger.debug(`Resolved ${coordinate} to ${path}`);
    return path;
  }
}
