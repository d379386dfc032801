/**
 * Feature descriptor model.
 *
 * A descriptor is the parsed form of a features file: it points at further
 * descriptors through `repositories` and groups installable artifacts into
 * named features. Every reference is a Location string such as
 * `mvn:org.example/example-api/1.0`.
 */

/**
 * URL-like reference to a retrievable artifact, optionally wrapped
 * (`wrap:mvn:group/artifact/version`).
 */
export type Location = string;

/**
 * Canonical `group:artifact[:type][:classifier]:version` identifier.
 */
export type ArtifactCoordinate = string;

export interface Bundle {
  location: Location;
  startLevel?: number;
}

export interface ConfigFile {
  location: Location;
  /** Path, relative to the container root, the file is installed to */
  finalname?: string;
}

export interface Feature {
  name: string;
  version?: string;
  description?: string;
  bundles: Bundle[];
  configFiles: ConfigFile[];
}

export interface Descriptor {
  name?: string;
  /**
   * Identifier of the content this descriptor was parsed from
   * (a `file://` URI for descriptors read from disk).
   */
  source: string;
  repositories: Location[];
  features: Feature[];
}

/**
 * Parts of a Maven location, before they are joined into a coordinate.
 */
export interface MavenLocation {
  /** Repository URL given before `!`, if any */
  repositoryUrl?: string;
  group: string;
  artifact: string;
  version: string;
  type?: string;
  classifier?: string;
}
