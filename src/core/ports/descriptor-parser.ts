/**
 * Descriptor Parser Port
 *
 * Turns the raw content of a features file into a Descriptor.
 */

import type { Descriptor } from '../../types/index.js';

export interface DescriptorParser {
  /**
   * @param sourceIdentifier - identifier recorded as `Descriptor.source`
   * @param content - raw descriptor text
   * @throws MalformedDescriptorError when the content is not a descriptor
   */
  parse(sourceIdentifier: string, content: string): Descriptor;
}
