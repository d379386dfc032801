/**
 * Shared constants for the feature-closure CLI
 * Single source of truth for location prefixes, directory names and
 * configuration file names.
 */

export const LOCATION_PREFIXES = {
  /** Transport wrapper put in front of plain jars that are turned into bundles */
  WRAP: 'wrap:',
  MAVEN: 'mvn:'
} as const;

export const MAVEN_LOCATION = {
  REPOSITORY_SEPARATOR: '!',
  ARTIFACT_SEPARATOR: '/',
  COORDINATE_SEPARATOR: ':',
  /** Everything from this marker to the end of a version is dropped */
  PROPERTY_MARKER: '$',
  VERSION_LATEST: 'LATEST',
  TYPE_JAR: 'jar'
} as const;

export const DIR_PATTERNS = {
  FEATURE_CLOSURE: '.feature-closure',
  MAVEN_LOCAL_REPOSITORY: '.m2/repository'
} as const;

export const CONFIG_FILE_NAMES = ['config.jsonc', 'config.json'] as const;

export const ENV_VARS = {
  VERBOSE: 'FCLOSURE_VERBOSE',
  LOCAL_REPOSITORY: 'FCLOSURE_LOCAL_REPO'
} as const;
