/**
 * @fileOverview: Conventional file discovery for views and controllers of a Rails project
 * @module: FileDiscovery
 * @keyFunctions:
 *   - discover(): Relative paths of every file of a dialect under its conventional directories
 *   - exists(): Whether a project-relative file is present on disk
 * @dependencies:
 *   - globby: Glob matching with ignore support
 * @context: Paths are relative to the project root and use forward slashes, which is the form
 *   used for controller resolution, whitelists and the report
 */

import * as fs from 'fs';
import * as path from 'path';
import globby from 'globby';
import type { Dialect } from './parsers/types';
import { logger } from '../utils/logger';

export const DIALECT_PATTERNS: Record<Dialect, string[]> = {
  erb: ['app/**/*.erb'],
  haml: ['app/**/*.haml'],
  ruby: ['app/controllers/**/*.rb'],
};

const DEFAULT_IGNORE_PATTERNS = ['**/node_modules/**', '**/vendor/**', '**/tmp/**', '**/.git/**'];

export interface FileDiscoveryOptions {
  ignorePatterns?: string[];
}

export class FileDiscovery {
  readonly rootDir: string;
  private ignorePatterns: string[];

  constructor(rootDir: string, options: FileDiscoveryOptions = {}) {
    this.rootDir = path.resolve(rootDir);
    this.ignorePatterns = [...DEFAULT_IGNORE_PATTERNS, ...(options.ignorePatterns ?? [])];
  }

  discover(dialect: Dialect): string[] {
    return this.glob(DIALECT_PATTERNS[dialect]);
  }

  glob(patterns: string[]): string[] {
    const files = globby.sync(patterns, {
      cwd: this.rootDir,
      ignore: this.ignorePatterns,
      onlyFiles: true,
      followSymbolicLinks: false,
    });
    logger.debug('Discovered files', { patterns, count: files.length });
    return files.sort();
  }

  /**
   * Unreadable paths count as missing.
   */
  exists(relPath: string): boolean {
    try {
      return fs.statSync(this.resolve(relPath)).isFile();
    } catch {
      return false;
    }
  }

  /**
   * Whether `stem.<anything>` exists, e.g. `app/views/users/index` matches `index.html.erb`.
   */
  existsWithAnyExtension(stem: string): boolean {
    const dir = this.resolve(path.posix.dirname(stem));
    const prefix = `${path.posix.basename(stem)}.`;
    try {
      return fs
        .readdirSync(dir, { withFileTypes: true })
        .some(entry => entry.isFile() && entry.name.startsWith(prefix));
    } catch {
      return false;
    }
  }

  read(relPath: string): string {
    return fs.readFileSync(this.resolve(relPath), 'utf8');
  }

  resolve(relPath: string): string {
    return path.resolve(this.rootDir, relPath);
  }
}
