/**
 * Artifact Resolver Port
 *
 * Turns an artifact coordinate into the path of a local file holding that
 * artifact. Implementations decide where artifacts come from; the closure
 * resolver only ever sees this contract.
 *
 * Implementations:
 *   - LocalRepositoryResolver: Maven-layout directory on disk
 */

import type { ArtifactCoordinate } from '../../types/index.js';

export interface ArtifactResolver {
  /**
   * @returns absolute path of the resolved artifact file
   * @throws UnresolvableCoordinateError when the artifact cannot be provided
   */
  resolve(coordinate: ArtifactCoordinate): Promise<string>;
}
