import * as yaml from 'js-yaml';
import type { Bundle, ConfigFile, Descriptor, Feature, Location } from '../../types/index.js';
import type { DescriptorParser } from '../ports/descriptor-parser.js';
import { MalformedDescriptorError } from '../../utils/errors.js';

/**
 * YAML features file parser.
 *
 * Builds a Descriptor from content shaped like:
 *
 *   name: example-features
 *   repositories:
 *     - mvn:org.example/other-features/1.0/yml/features
 *   features:
 *     - name: example
 *       bundles:
 *         - mvn:org.example/example-api/1.0
 *         - location: mvn:org.example/example-impl/1.0
 *           start-level: 80
 *       configfiles:
 *         - location: mvn:org.example/example-config/1.0/cfg
 *           finalname: etc/example.cfg
 *
 * JSON is valid YAML, so `.json` descriptors are read the same way.
 * Only the structure needed to build a Descriptor is checked; locations are
 * not normalized here.
 */

type YamlMapping = Record<string, unknown>;

function isMapping(value: unknown): value is YamlMapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

class DescriptorShapeError extends Error {}

function optionalString(mapping: YamlMapping, key: string, context: string): string | undefined {
  const value = mapping[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value === 'string') {
    return value;
  }
  // Versions such as `1.0` arrive as numbers
  if (typeof value === 'number') {
    return String(value);
  }
  throw new DescriptorShapeError(`${context}.${key} must be a string`);
}

function optionalList(mapping: YamlMapping, key: string, context: string): unknown[] {
  const value = mapping[key];
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new DescriptorShapeError(`${context}.${key} must be a list`);
  }
  return value;
}

function readLocation(entry: unknown, context: string): { location: Location; rest: YamlMapping } {
  if (typeof entry === 'string') {
    return { location: entry, rest: {} };
  }
  if (isMapping(entry)) {
    const location = entry.location;
    if (typeof location === 'string') {
      return { location, rest: entry };
    }
  }
  throw new DescriptorShapeError(`${context} must be a location string or a mapping with a 'location'`);
}

function readBundle(entry: unknown, context: string): Bundle {
  const { location, rest } = readLocation(entry, context);
  const startLevel = rest['start-level'];
  if (startLevel === undefined || startLevel === null) {
    return { location };
  }
  if (typeof startLevel !== 'number' || !Number.isInteger(startLevel)) {
    throw new DescriptorShapeError(`${context}.start-level must be an integer`);
  }
  return { location, startLevel };
}

function readConfigFile(entry: unknown, context: string): ConfigFile {
  const { location, rest } = readLocation(entry, context);
  const finalname = optionalString(rest, 'finalname', context);
  return finalname === undefined ? { location } : { location, finalname };
}

function readFeature(entry: unknown, index: number): Feature {
  const context = `features[${index}]`;
  if (!isMapping(entry)) {
    throw new DescriptorShapeError(`${context} must be a mapping`);
  }
  const name = optionalString(entry, 'name', context);
  if (!name) {
    throw new DescriptorShapeError(`${context} must have a name`);
  }

  return {
    name,
    version: optionalString(entry, 'version', context),
    description: optionalString(entry, 'description', context),
    bundles: optionalList(entry, 'bundles', context)
      .map((bundle, i) => readBundle(bundle, `${context}.bundles[${i}]`)),
    configFiles: optionalList(entry, 'configfiles', context)
      .map((configFile, i) => readConfigFile(configFile, `${context}.configfiles[${i}]`))
  };
}

function readRepositories(document: YamlMapping): Location[] {
  return optionalList(document, 'repositories', 'descriptor').map((repository, i) => {
    if (typeof repository !== 'string') {
      throw new DescriptorShapeError(`repositories[${i}] must be a location string`);
    }
    return repository;
  });
}

/**
 * Parse descriptor text. Throws MalformedDescriptorError for invalid YAML and
 * for content that does not have the descriptor structure.
 */
export function parseDescriptor(sourceIdentifier: string, content: string): Descriptor {
  let document: unknown;
  try {
    document = yaml.load(content, { filename: sourceIdentifier });
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    throw new MalformedDescriptorError(sourceIdentifier, reason);
  }

  if (!isMapping(document)) {
    throw new MalformedDescriptorError(sourceIdentifier, 'content must be a mapping');
  }

  try {
    return {
      name: optionalString(document, 'name', 'descriptor'),
      source: sourceIdentifier,
      repositories: readRepositories(document),
      features: optionalList(document, 'features', 'descriptor').map(readFeature)
    };
  } catch (error) {
    if (error instanceof DescriptorShapeError) {
      throw new MalformedDescriptorError(sourceIdentifier, error.message);
    }
    throw error;
  }
}

export const yamlDescriptorParser: DescriptorParser = {
  parse: parseDescriptor
};
