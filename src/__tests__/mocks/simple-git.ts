import { vi } from 'vitest';

export interface MockGitResponse {
  gitDir?: string | Error;       // Result of rev-parse --absolute-git-dir
  workingDir?: string | Error;   // Result of rev-parse --show-toplevel
}

export function createMockGit(response: MockGitResponse = {}) {
  const resolve = (value: string | Error | undefined) =>
    value instanceof Error ? Promise.reject(value) : Promise.resolve(`${value ?? ''}\n`);

  return {
    revparse: vi.fn((args: string[]) => {
      if (args.includes('--absolute-git-dir')) {
        return resolve(response.gitDir);
      }
      if (args.includes('--show-toplevel')) {
        return resolve(response.workingDir);
      }
      return Promise.reject(new Error(`unexpected rev-parse ${args.join(' ')}`));
    }),
  };
}
