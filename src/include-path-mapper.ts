// Include-path mapping: header paths to extern header names, namespaces to module names

import { isReservedName } from './dialect';

export interface IncludePathMapperOptions {
  includeRoots?: string[];
  // spell extern header names as `<name>`
  systemHeaders?: boolean;
}

export class IncludePathMapper {
  private readonly normalizedRootSegments: string[][];
  private readonly systemHeaders: boolean;

  constructor(options: IncludePathMapperOptions = {}) {
    this.normalizedRootSegments = (options.includeRoots ?? [])
      .map(root => this.splitPathComponents(this.normalizePath(root)))
      .filter(segments => segments.length > 0)
      .sort((a, b) => b.length - a.length);
    this.systemHeaders = options.systemHeaders === true;
  }

  /**
   * The name a header is included by: the path below the longest matching
   * include root, or the file name when no root matches.
   */
  headerName(filePath: string): string {
    const fileSegments = this.splitPathComponents(this.normalizePath(filePath));
    let relative: string[] | null = null;

    for (const rootSegments of this.normalizedRootSegments) {
      relative = this.stripRootSegments(fileSegments, rootSegments);
      if (relative && relative.length > 0) {
        break;
      }
      relative = null;
    }

    const segments = relative ?? fileSegments.slice(-1);
    const name = segments.length > 0 ? segments.join('/') : filePath;
    return this.systemHeaders ? `<${name}>` : name;
  }

  /**
   * Module of a namespace chain: `A::B` -> `A.B`, the global namespace maps
   * to `rootModule`.
   */
  moduleName(namespace: string, rootModule: string): string {
    const segments = namespace.split('::').filter(segment => segment.length > 0);
    if (segments.length === 0) {
      return rootModule;
    }
    return segments.map(segment => sanitizeIdentifier(segment)).join('.');
  }

  /**
   * Root module derived from a header path: `include/zlib.h` -> `zlib`.
   */
  defaultRootModule(filePath: string): string {
    const segments = this.splitPathComponents(this.normalizePath(filePath));
    const base = segments.length > 0 ? segments[segments.length - 1] : '';
    const dot = base.indexOf('.');
    return sanitizeIdentifier(dot > 0 ? base.slice(0, dot) : base);
  }

  private normalizePath(filePath: string): string {
    return filePath.replace(/\\/g, '/');
  }

  private splitPathComponents(pathString: string): string[] {
    return pathString
      .split('/')
      .filter(component => component.length > 0 && component !== '.');
  }

  private stripRootSegments(fileSegments: string[], rootSegments: string[]): string[] | null {
    if (rootSegments.length === 0 || rootSegments.length > fileSegments.length) {
      return null;
    }

    for (let start = 0; start <= fileSegments.length - rootSegments.length; start++) {
      let matches = true;
      for (let offset = 0; offset < rootSegments.length; offset++) {
        if (fileSegments[start + offset] !== rootSegments[offset]) {
          matches = false;
          break;
        }
      }
      if (matches) {
        return fileSegments.slice(start + rootSegments.length);
      }
    }

    return null;
  }
}

export function sanitizeIdentifier(name: string): string {
  // Replace invalid characters with underscores
  let sanitized = name.replace(/[^a-zA-Z0-9_]/g, '_');

  if (/^[0-9]/.test(sanitized)) {
    sanitized = '_' + sanitized;
  }
  if (sanitized.length === 0) {
    sanitized = '_';
  }
  if (isReservedName(sanitized)) {
    sanitized = sanitized + '_';
  }
  return sanitized;
}

/**
 * Shell-style pattern (`*`, `?`, `**`) matched against a whole path.
 */
export function globToRegExp(pattern: string): RegExp {
  let source = '';
  for (let i = 0; i < pattern.length; i++) {
    const ch = pattern[i];
    if (ch === '*') {
      if (pattern[i + 1] === '*') {
        source += '.*';
        i++;
      } else {
        source += '[^/]*';
      }
    } else if (ch === '?') {
      source += '[^/]';
    } else {
      source += ch.replace(/[.+^${}()|[\]\\]/g, '\\$&');
    }
  }
  return new RegExp(`^${source}$`);
}
