// src/config/environment.ts

import * as fs from 'fs';
import * as path from 'path';
import { isErrnoException } from '../utils/errors.js';

/**
 * Git environment variables that may carry paths relative to the directory
 * the user started in. They are made absolute before any git call so that a
 * later change of working directory cannot reinterpret them.
 */
export const CANONICAL_PATH_VARIABLES = [
  'GIT_INDEX_FILE',
  'GIT_OBJECT_DIRECTORY',
  'GIT_DIR',
  'GIT_WORK_TREE',
  'GIT_COMMON_DIR',
] as const;

/**
 * Rewrites the path-valued git variables in `env` to absolute, symlink-free
 * paths. Paths that do not exist yet are only made absolute.
 */
export function canonicalizeEnvironment(env: NodeJS.ProcessEnv, cwd: string): void {
  for (const name of CANONICAL_PATH_VARIABLES) {
    const value = env[name];
    if (!value) {
      continue;
    }
    env[name] = canonicalizePath(value, cwd);
  }
}

export function canonicalizePath(value: string, cwd: string): string {
  const absolute = path.resolve(cwd, value);
  try {
    return fs.realpathSync.native(absolute);
  } catch (error) {
    if (isErrnoException(error) && error.code === 'ENOENT') {
      return absolute;
    }
    throw error;
  }
}
