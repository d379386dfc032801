import { XMLParser, XMLValidator } from 'fast-xml-parser';
import type { Bundle, ConfigFile, Descriptor, Feature, Location } from '../../types/index.js';
import type { DescriptorParser } from '../ports/descriptor-parser.js';
import { MalformedDescriptorError } from '../../utils/errors.js';

/**
 * Karaf features XML parser.
 *
 *   <features name="example-features" xmlns="http://karaf.apache.org/xmlns/features/v1.4.0">
 *     <repository>mvn:org.example/other-features/1.0/xml/features</repository>
 *     <feature name="example" version="1.0.0">
 *       <bundle start-level="80">mvn:org.example/example-impl/1.0</bundle>
 *       <configfile finalname="etc/example.cfg">mvn:org.example/example-config/1.0/cfg</configfile>
 *     </feature>
 *   </features>
 *
 * Only bundles and config files listed directly under a feature are kept.
 * Nested feature dependencies and conditionals are not read.
 */

type XmlElement = Record<string, unknown>;

const ATTRIBUTE_PREFIX = '@_';
const TEXT_NODE = '#text';
const ROOT_ELEMENT = 'features';
const LIST_ELEMENTS = new Set(['repository', 'feature', 'bundle', 'configfile']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTRIBUTE_PREFIX,
  textNodeName: TEXT_NODE,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseTagValue: false,
  parseAttributeValue: false,
  isArray: (tagName, _jPath, _isLeafNode, isAttribute) => !isAttribute && LIST_ELEMENTS.has(tagName)
});

class DescriptorShapeError extends Error {}

function isElement(value: unknown): value is XmlElement {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// An element without attributes or children is read as an empty string
function asElement(value: unknown, context: string): XmlElement {
  if (value === '') {
    return {};
  }
  if (!isElement(value)) {
    throw new DescriptorShapeError(`${context} must be an element`);
  }
  return value;
}

function children(parent: XmlElement, name: string): unknown[] {
  const value = parent[name];
  return Array.isArray(value) ? value : [];
}

function attribute(element: XmlElement, name: string): string | undefined {
  const value = element[`${ATTRIBUTE_PREFIX}${name}`];
  return typeof value === 'string' ? value : undefined;
}

function elementText(value: unknown): string | undefined {
  const text = isElement(value) ? value[TEXT_NODE] : value;
  if (typeof text !== 'string') {
    return undefined;
  }
  const trimmed = text.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function readLocation(value: unknown, context: string): { location: Location; element: XmlElement } {
  const location = elementText(value);
  if (location === undefined) {
    throw new DescriptorShapeError(`${context} must contain a location`);
  }
  return { location, element: isElement(value) ? value : {} };
}

function readBundle(value: unknown, context: string): Bundle {
  const { location, element } = readLocation(value, context);
  const startLevel = attribute(element, 'start-level');
  if (startLevel === undefined) {
    return { location };
  }
  if (!/^-?\d+$/.test(startLevel.trim())) {
    throw new DescriptorShapeError(`${context} start-level must be an integer`);
  }
  return { location, startLevel: Number.parseInt(startLevel, 10) };
}

function readConfigFile(value: unknown, context: string): ConfigFile {
  const { location, element } = readLocation(value, context);
  const finalname = attribute(element, 'finalname');
  return finalname === undefined ? { location } : { location, finalname };
}

function readFeature(value: unknown, index: number): Feature {
  const context = `feature[${index}]`;
  const element = asElement(value, context);
  const name = attribute(element, 'name');
  if (!name) {
    throw new DescriptorShapeError(`${context} must have a name attribute`);
  }

  return {
    name,
    version: attribute(element, 'version'),
    description: attribute(element, 'description'),
    bundles: children(element, 'bundle')
      .map((bundle, i) => readBundle(bundle, `${context}.bundle[${i}]`)),
    configFiles: children(element, 'configfile')
      .map((configFile, i) => readConfigFile(configFile, `${context}.configfile[${i}]`))
  };
}

function readRepositories(root: XmlElement): Location[] {
  return children(root, 'repository').map((repository, i) => {
    const location = elementText(repository);
    if (location === undefined) {
      throw new DescriptorShapeError(`repository[${i}] must contain a location`);
    }
    return location;
  });
}

/**
 * Parse Karaf features XML. Throws MalformedDescriptorError for text that is
 * not well-formed XML and for documents whose root is not `<features>`.
 */
export function parseXmlDescriptor(sourceIdentifier: string, content: string): Descriptor {
  const validation = XMLValidator.validate(content);
  if (validation !== true) {
    const { msg, line, col } = validation.err;
    throw new MalformedDescriptorError(sourceIdentifier, `${msg} (line ${line}, column ${col})`);
  }

  const document: unknown = xmlParser.parse(content);
  if (!isElement(document) || !(ROOT_ELEMENT in document)) {
    throw new MalformedDescriptorError(sourceIdentifier, `root element must be <${ROOT_ELEMENT}>`);
  }

  try {
    const root = asElement(document[ROOT_ELEMENT], ROOT_ELEMENT);
    return {
      name: attribute(root, 'name'),
      source: sourceIdentifier,
      repositories: readRepositories(root),
      features: children(root, 'feature').map(readFeature)
    };
  } catch (error) {
    if (error instanceof DescriptorShapeError) {
      throw new MalformedDescriptorError(sourceIdentifier, error.message);
    }
    throw error;
  }
}

export const xmlDescriptorParser: DescriptorParser = {
  parse: parseXmlDescriptor
};
