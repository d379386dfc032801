import type { Descriptor } from '../../types/index.js';
import type { DescriptorParser } from '../ports/descriptor-parser.js';
import { xmlDescriptorParser } from './xml-descriptor-parser.js';
import { yamlDescriptorParser } from './yaml-descriptor-parser.js';

export type DescriptorFormat = 'xml' | 'yaml';

const PARSERS: Record<DescriptorFormat, DescriptorParser> = {
  xml: xmlDescriptorParser,
  yaml: yamlDescriptorParser
};

/**
 * Pick the descriptor format from the file extension of the source, falling
 * back to the content: markup is XML, anything else is YAML.
 */
export function detectDescriptorFormat(sourceIdentifier: string, content: string): DescriptorFormat {
  if (/\.xml$/i.test(sourceIdentifier)) {
    return 'xml';
  }
  if (/\.(ya?ml|json)$/i.test(sourceIdentifier)) {
    return 'yaml';
  }
  return content.trimStart().startsWith('<') ? 'xml' : 'yaml';
}

export const detectingDescriptorParser: DescriptorParser = {
  parse(sourceIdentifier: string, content: string): Descriptor {
    return PARSERS[detectDescriptorFormat(sourceIdentifier, content)].parse(sourceIdentifier, content);
  }
};
