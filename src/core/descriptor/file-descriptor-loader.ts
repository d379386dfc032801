import { resolve } from 'path';
import { pathToFileURL } from 'url';
import type { ArtifactCoordinate, Descriptor } from '../../types/index.js';
import type { ArtifactResolver } from '../ports/artifact-resolver.js';
import type { DescriptorLoader } from '../ports/descriptor-loader.js';
import type { DescriptorParser } from '../ports/descriptor-parser.js';
import { detectingDescriptorParser } from './descriptor-format.js';
import { readTextFile } from '../../utils/fs.js';
import { DescriptorNotFoundError, FileSystemError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface FileDescriptorLoaderOptions {
  resolver: ArtifactResolver;
  parser?: DescriptorParser;
}

/**
 * Loads descriptors from local files, resolving coordinates to files first
 * when asked for a coordinate. Without a parser, XML and YAML descriptors are
 * told apart by file extension or content.
 */
export class FileDescriptorLoader implements DescriptorLoader {
  private readonly resolver: ArtifactResolver;
  private readonly parser: DescriptorParser;

  constructor(options: FileDescriptorLoaderOptions) {
    this.resolver = options.resolver;
    this.parser = options.parser ?? detectingDescriptorParser;
  }

  async loadFromFile(path: string): Promise<Descriptor> {
    const absolutePath = resolve(path);
    let content: string;
    try {
      content = await readTextFile(absolutePath);
    } catch (error) {
      if (error instanceof FileSystemError) {
        throw new DescriptorNotFoundError(absolutePath, error.details?.error);
      }
      throw error;
    }

    const result = this.parser.parse(pathToFileURL(absolutePath).toString(), content);
    logger.debug(`loadFromFile(${absolutePath}) returns ${result.name ?? '(unnamed)'} without resolving first`);
    return result;
  }

  async resolveAndLoad(coordinate: ArtifactCoordinate): Promise<Descriptor> {
    const path = await this.resolver.resolve(coordinate);
    const result = await this.loadFromFile(path);
    logger.debug(`resolveAndLoad(${coordinate}) returns ${result.name ?? '(unnamed)'} after resolving first`);
    return result;
  }
}

/**
 * Load every given descriptor file, in order.
 */
export async function loadAllFromFiles(loader: DescriptorLoader, paths: Iterable<string>): Promise<Descriptor[]> {
  const result: Descriptor[] = [];
  for (const path of paths) {
    result.push(await loader.loadFromFile(path));
  }
  logger.debug('loadAllFromFiles() returns', result.map(descriptor => descriptor.source));
  return result;
}
