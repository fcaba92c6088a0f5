// src/utils/version.ts

import * as fs from 'fs';

export const ROOT_COMMAND_NAME = 'git-lfs';

let cachedVersion: string | undefined;

/**
 * Reads the version from the package.json that sits two levels above this
 * file, which holds for both src/ and dist/.
 */
export function packageVersion(): string {
  if (cachedVersion === undefined) {
    const pkgPath = new URL('../../package.json', import.meta.url);
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    cachedVersion =
      typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
        ? pkg.version
        : '0.0.0';
  }
  return cachedVersion;
}

export function userAgent(): string {
  return `${ROOT_COMMAND_NAME}/${packageVersion()} (${process.platform} ${process.arch}; node ${process.versions.node})`;
}
