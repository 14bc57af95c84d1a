/**
 * Conversion between operator paths (as typed at the prompt, Windows or POSIX)
 * and archive paths (mount-relative, always `/`-separated).
 */

import { InvalidPathError } from './errors.js';

interface ParsedPath {
  root: string;
  segments: string[];
  windows: boolean;
}

const DRIVE_ROOT = /^[A-Za-z]:[\\/]/;

function parseAbsolute(input: string): ParsedPath {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new InvalidPathError(input, 'path is empty');
  }

  let root: string;
  let rest: string;
  let windows: boolean;

  if (trimmed.startsWith('\\\\') || trimmed.startsWith('//')) {
    // UNC: \\server\share is the root
    const parts = trimmed.slice(2).split(/[\\/]+/).filter(Boolean);
    if (parts.length < 2) {
      throw new InvalidPathError(input, 'UNC path needs a server and a share');
    }
    root = `\\\\${parts[0]}\\${parts[1]}`;
    rest = parts.slice(2).join('/');
    windows = true;
  } else if (DRIVE_ROOT.test(trimmed)) {
    root = trimmed.slice(0, 2).toUpperCase();
    rest = trimmed.slice(3);
    windows = true;
  } else if (trimmed.startsWith('/')) {
    root = '/';
    rest = trimmed.slice(1);
    windows = false;
  } else {
    throw new InvalidPathError(input, 'path must be absolute');
  }

  const segments: string[] = [];
  for (const segment of rest.split(/[\\/]+/)) {
    if (!segment || segment === '.') continue;
    if (segment === '..') {
      throw new InvalidPathError(input, 'parent directory segments are not allowed');
    }
    segments.push(segment);
  }

  return { root, segments, windows };
}

function sameSegment(a: string, b: string, caseInsensitive: boolean): boolean {
  return caseInsensitive ? a.toLowerCase() === b.toLowerCase() : a === b;
}

/**
 * Translate an operator path into the archive's directory notation.
 *
 * @example
 * toArchivePath('N:\\PPDO\\Records\\42xx\\4203', 'N:\\PPDO\\Records') // '42xx/4203'
 */
export function toArchivePath(operatorPath: string, mount: string): string {
  const target = parseAbsolute(operatorPath);
  const base = parseAbsolute(mount);
  const caseInsensitive = target.windows || base.windows;

  if (!sameSegment(target.root, base.root, caseInsensitive)) {
    throw new InvalidPathError(operatorPath, `not under the archive mount ${mount}`);
  }
  if (target.segments.length <= base.segments.length) {
    throw new InvalidPathError(operatorPath, `must be below the archive mount ${mount}`);
  }
  for (let i = 0; i < base.segments.length; i += 1) {
    if (!sameSegment(target.segments[i], base.segments[i], caseInsensitive)) {
      throw new InvalidPathError(operatorPath, `not under the archive mount ${mount}`);
    }
  }

  return target.segments.slice(base.segments.length).join('/');
}

/**
 * Join an archive directory (and optional filename) onto the mount,
 * using the mount's own separator style.
 */
export function toOperatorPath(mount: string, directory: string, filename?: string): string {
  const windows = mount.includes('\\') || DRIVE_ROOT.test(mount);
  const separator = windows ? '\\' : '/';

  let base = mount;
  while (base.length > 1 && (base.endsWith('/') || base.endsWith('\\'))) {
    base = base.slice(0, -1);
  }

  const parts = directory.split('/').filter(Boolean);
  if (filename) parts.push(filename);
  if (parts.length === 0) return base;

  const joiner = base.endsWith(separator) ? '' : separator;
  return `${base}${joiner}${parts.join(separator)}`;
}

export function formatFileSize(sizeBytes: number): string {
  if (sizeBytes < 1024) {
    return `${sizeBytes} B`;
  }
  if (sizeBytes < 1024 * 1024) {
    return `${(sizeBytes / 1024).toFixed(0)} KB`;
  }
  if (sizeBytes < 1024 * 1024 * 1024) {
    return `${(sizeBytes / (1024 * 1024)).toFixed(1)} MB`;
  }
  return `${(sizeBytes / (1024 * 1024 * 1024)).toFixed(2)} GB`;
}
