// src/__tests__/utils/version.test.ts

import { describe, it, expect } from 'vitest';
import * as fs from 'fs';
import { packageVersion, userAgent, ROOT_COMMAND_NAME } from '../../utils/version.js';

describe('packageVersion', () => {
  it('should match the version in package.json', () => {
    const pkg = JSON.parse(fs.readFileSync(new URL('../../../package.json', import.meta.url), 'utf-8'));

    expect(packageVersion()).toBe(pkg.version);
  });
});

describe('userAgent', () => {
  it('should name the program, version and platform', () => {
    expect(userAgent()).toBe(
      `${ROOT_COMMAND_NAME}/${packageVersion()} (${process.platform} ${process.arch}; node ${process.versions.node})`
    );
  });
});
