import { fileURLToPath } from 'url';
import { homedir } from 'os';
import { relative, isAbsolute, sep } from 'path';
import type { Descriptor } from '../types/index.js';

/**
 * Formatting utilities for consistent display across commands
 */

/**
 * Format a file system path (or file:// URI) for display to the user.
 *
 * - Paths inside cwd are shown relative to it
 * - Paths under the home directory use tilde notation
 * - Anything else is shown as given
 *
 * @example
 * formatPathForDisplay('/work/features.yml', '/work') // => 'features.yml'
 * formatPathForDisplay('file:///home/me/.m2/repository/x.yml', '/work', '/home/me') // => '~/.m2/repository/x.yml'
 */
export function formatPathForDisplay(
  path: string,
  cwd: string = process.cwd(),
  homeDir: string = homedir()
): string {
  const filePath = path.startsWith('file:') ? fileURLToPath(path) : path;

  if (!isAbsolute(filePath)) {
    return filePath;
  }

  const relativePath = relative(cwd, filePath);
  if (relativePath && !relativePath.startsWith('..') && !isAbsolute(relativePath)) {
    return relativePath;
  }

  if (filePath === homeDir || filePath.startsWith(homeDir + sep)) {
    return `~${filePath.slice(homeDir.length)}`;
  }

  return filePath;
}

/**
 * One-line summary of a descriptor: its name (when it has one) and where it
 * was read from.
 */
export function formatDescriptor(descriptor: Descriptor, cwd?: string, homeDir?: string): string {
  const source = formatPathForDisplay(descriptor.source, cwd, homeDir);
  return descriptor.name ? `${descriptor.name} (${source})` : source;
}

/**
 * Render items as a tree-style list
 */
export function formatList(items: readonly string[]): string[] {
  return items.map((item, index) => {
    const connector = index === items.length - 1 ? '└── ' : '├── ';
    return `${connector}${item}`;
  });
}
