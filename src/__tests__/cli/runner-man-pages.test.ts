// src/__tests__/cli/runner-man-pages.test.ts

import { describe, it, expect, vi, afterEach } from 'vitest';
import chalk from 'chalk';
import { run, EXIT_FAILURE } from '../../cli/runner.js';
import { Configuration } from '../../config/configuration.js';
import { CommandRegistry } from '../../core/command-registry.js';
import type { CommandContext } from '../../core/types/command-context.js';
import { Logger } from '../../utils/logger.js';
import { createSink } from '../setup.js';

vi.mock('../../cli/help/man-pages.js', async (importOriginal) => {
  const actual = await importOriginal<typeof import('../../cli/help/man-pages.js')>();
  return {
    ...actual,
    loadManPages: vi.fn(() => {
      throw new Error('Man page table must be a JSON object');
    }),
  };
});

describe('run with an unreadable man page table', () => {
  afterEach(() => {
    Logger.setOutput(process.stderr);
  });

  it('should return 127 and still close the API client', async () => {
    chalk.level = 0;
    const stdout = createSink();
    const stderr = createSink();
    const apiClient = { logHttpStats: vi.fn(), close: vi.fn(async () => {}) };
    const loadConfig = vi.fn(async (env: NodeJS.ProcessEnv, cwd: string) => new Configuration({ env, cwd }));

    const code = await run({
      argv: ['-v'],
      env: {},
      cwd: '/work',
      stdout,
      stderr,
      registry: new CommandRegistry<CommandContext>(),
      apiClient,
      loadConfig,
    });

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr.text()).toBe('❌ Man page table must be a JSON object\n');
    expect(stdout.text()).toBe('');
    expect(apiClient.close).toHaveBeenCalledTimes(1);
    expect(loadConfig).not.toHaveBeenCalled();
  });
});
