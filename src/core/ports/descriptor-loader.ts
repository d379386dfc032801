/**
 * Descriptor Loader Port
 *
 * The seam the closure resolver loads descriptors through. Loading the same
 * coordinate twice is expected to yield equal descriptors.
 */

import type { ArtifactCoordinate, Descriptor } from '../../types/index.js';

export interface DescriptorLoader {
  /**
   * @throws DescriptorNotFoundError when the file is missing or unreadable
   * @throws MalformedDescriptorError when the content cannot be parsed
   */
  loadFromFile(path: string): Promise<Descriptor>;

  /**
   * Resolve the coordinate to a local file, then load it.
   *
   * @throws UnresolvableCoordinateError when the coordinate cannot be resolved
   */
  resolveAndLoad(coordinate: ArtifactCoordinate): Promise<Descriptor>;
}
