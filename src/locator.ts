import fs from 'node:fs';
import * as path from 'node:path';
import { toCanonical } from './modules.js';
import { ModuleIdentifier } from './types.js';

export const DEFAULT_EXTENSIONS: readonly string[] = ['.md', '.markdown'];

/**
 * Subdirectory of each root that is also searched, for projects that keep
 * standalone documentation next to their sources
 */
export const DOCS_SUBDIR = 'docs';

/**
 * Minimal logging sink
 */
export interface Logger {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Options for locating module documentation
 */
export interface LocatorOptions {
  /** Directories to search, in order */
  roots: readonly string[];
  /** File extensions to try, in order (default: .md, .markdown) */
  extensions?: readonly string[];
  logger?: Logger;
}

/**
 * A located and successfully read documentation file
 */
export interface ModuleSource {
  path: string;
  source: string;
}

function isFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).isFile();
  } catch {
    return false;
  }
}

/**
 * Resolves module names to documentation files under a fixed set of roots
 */
export class ModuleLocator {
  readonly roots: readonly string[];
  readonly extensions: readonly string[];
  private readonly logger: Logger;

  constructor(options: LocatorOptions) {
    this.roots = options.roots.map(root => path.resolve(root));
    this.extensions = options.extensions ?? DEFAULT_EXTENSIONS;
    this.logger = options.logger ?? console;
  }

  /**
   * Candidate file paths for a module, in search order
   */
  candidates(module: ModuleIdentifier): string[] {
    const relative = path.join(...module.segments);
    const paths: string[] = [];
    for (const root of this.roots) {
      for (const dir of [root, path.join(root, DOCS_SUBDIR)]) {
        for (const ext of this.extensions) {
          paths.push(path.join(dir, relative + ext));
        }
      }
    }
    return paths;
  }

  /**
   * Find the documentation file for a module
   */
  find(module: ModuleIdentifier): string | undefined {
    return this.candidates(module).find(isFile);
  }

  /**
   * Find and read a module's documentation. Unreadable files count as missing.
   */
  read(module: ModuleIdentifier): ModuleSource | undefined {
    const filePath = this.find(module);
    if (!filePath) {
      return undefined;
    }
    try {
      return { path: filePath, source: fs.readFileSync(filePath, 'utf-8') };
    } catch (err) {
      this.logger.warn(`Failed to read ${toCanonical(module)} from ${filePath}: ${err}`);
      return undefined;
    }
  }
}
