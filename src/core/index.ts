/**
 * Library entry point
 *
 * - coordinates/: location normalization and coordinate extraction
 * - descriptor/: XML and YAML descriptor parsing, loading
 * - resolver/: local repository artifact resolution
 * - closure/: transitive repository closure
 */

export type {
  ArtifactCoordinate,
  Location,
  Descriptor,
  Feature,
  Bundle,
  ConfigFile,
  MavenLocation,
  Logger,
  CommandResult,
  FeatureClosureConfig
} from '../types/index.js';
export { FeatureClosureError, ErrorCodes, LogLevel } from '../types/index.js';
export {
  MalformedLocationError,
  DescriptorNotFoundError,
  MalformedDescriptorError,
  UnresolvableCoordinateError,
  FileSystemError,
  ValidationError,
  ConfigError
} from '../utils/errors.js';

export type { ArtifactResolver, DescriptorLoader, DescriptorParser, OutputPort } from './ports/index.js';

export {
  parseMavenLocation,
  formatCoordinate,
  stripVersionQualifier,
  toCoordinate,
  toCoordinates
} from './coordinates/normalize.js';
export {
  locationsToCoordinates,
  bundleCoordinates,
  configFileCoordinates,
  featureCoordinates,
  repositoryCoordinates,
  descriptorCoordinates,
  type CoordinateSet,
  type CoordinateProducer
} from './coordinates/extract.js';

export { parseDescriptor, yamlDescriptorParser } from './descriptor/yaml-descriptor-parser.js';
export { parseXmlDescriptor, xmlDescriptorParser } from './descriptor/xml-descriptor-parser.js';
export { detectDescriptorFormat, detectingDescriptorParser, type DescriptorFormat } from './descriptor/descriptor-format.js';
export { FileDescriptorLoader, loadAllFromFiles, type FileDescriptorLoaderOptions } from './descriptor/file-descriptor-loader.js';
export { LocalRepositoryResolver, parseCoordinate, artifactRelativePath } from './resolver/local-repository-resolver.js';
export { resolveClosure, collectClosureCoordinates, type VisitedCoordinates } from './closure/closure-resolver.js';
