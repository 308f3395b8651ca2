/**
 * Filesystem utilities for project-root path resolution and validation.
 *
 * Shared by the diff builder, backup manager, applier and refactor engine:
 * - Root containment with path traversal protection
 * - Symlink-safe path resolution
 * - Text/binary detection
 * - Small stat helpers that never throw for a missing path
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { BINARY_CHECK_SIZE } from '../config/constants.js';

// =============================================================================
// Containment
// =============================================================================

/**
 * Check if a path is within another path (child of or equal to).
 * Uses path.relative() to avoid issues with case-insensitive filesystems.
 */
export function isPathWithin(child: string, parent: string): boolean {
  const relative = path.relative(path.resolve(parent), path.resolve(child));
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

/**
 * Resolve a project-relative path against the root.
 * Returns null when the lexically resolved path escapes the root or names the
 * root itself. Does not follow symlinks; use resolveWithinRootSafe for that.
 */
export function resolveWithinRoot(root: string, relativePath: string): string | null {
  if (relativePath === '' || relativePath.includes('\0')) {
    return null;
  }
  const resolvedRoot = path.resolve(root);
  const resolved = path.resolve(resolvedRoot, relativePath);
  if (resolved === resolvedRoot || !isPathWithin(resolved, resolvedRoot)) {
    return null;
  }
  return resolved;
}

/**
 * Resolve a project-relative path with symlink safety.
 * After the lexical check, follows symlinks on the path itself (or on the
 * nearest existing parent, for paths that don't exist yet) and verifies the
 * real location is still under the real root.
 *
 * @returns The lexically resolved absolute path, or null if it escapes the root
 */
export async function resolveWithinRootSafe(
  root: string,
  relativePath: string
): Promise<string | null> {
  const resolved = resolveWithinRoot(root, relativePath);
  if (resolved === null) {
    return null;
  }

  const realRoot = await safeRealpath(root);

  // Walk up until an existing path is found, then check its real location
  let checkPath = resolved;
  for (;;) {
    try {
      const real = await fs.realpath(checkPath);
      return isPathWithin(real, realRoot) ? resolved : null;
    } catch {
      const parent = path.dirname(checkPath);
      if (parent === checkPath) {
        return resolved;
      }
      checkPath = parent;
    }
  }
}

/**
 * Resolve path to its real path, following symlinks.
 * Returns the resolved path on error (path may not exist yet).
 */
export async function safeRealpath(inputPath: string): Promise<string> {
  try {
    return await fs.realpath(inputPath);
  } catch {
    return path.resolve(inputPath);
  }
}

/**
 * Convert an absolute path under root to a forward-slash relative path.
 */
export function toRelativePosix(root: string, absolutePath: string): string {
  return path.relative(path.resolve(root), absolutePath).split(path.sep).join('/');
}

// =============================================================================
// Stat Helpers
// =============================================================================

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await fs.lstat(filePath);
    return true;
  } catch {
    return false;
  }
}

export async function isRegularFile(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isFile();
  } catch {
    return false;
  }
}

export async function isDirectory(filePath: string): Promise<boolean> {
  try {
    return (await fs.stat(filePath)).isDirectory();
  } catch {
    return false;
  }
}

// =============================================================================
// Text Detection
// =============================================================================

/**
 * Decide whether a buffer sample holds text: no NUL byte and valid UTF-8.
 * A multi-byte sequence cut off at the end of the sample is tolerated.
 */
export function isTextSample(sample: Uint8Array): boolean {
  if (sample.includes(0)) {
    return false;
  }
  try {
    new TextDecoder('utf-8', { fatal: true }).decode(sample, { stream: true });
    return true;
  } catch {
    return false;
  }
}

/**
 * Read a file as UTF-8 text if it exists, is a regular file, and is text.
 * Returns null otherwise; callers treat null as "no original content".
 */
export async function readTextFile(filePath: string): Promise<string | null> {
  let data: Buffer;
  try {
    const stats = await fs.stat(filePath);
    if (!stats.isFile()) {
      return null;
    }
    data = await fs.readFile(filePath);
  } catch {
    return null;
  }

  if (!isTextSample(data.subarray(0, BINARY_CHECK_SIZE))) {
    return null;
  }
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(data);
  } catch {
    return null;
  }
}
