// src/cli/commands/env.ts

import type { CommandContext } from '../../core/types/command-context.js';
import { LOG_STATS_VARIABLE } from '../diagnostics.js';
import { versionCommand } from './version.js';
import { registerCommand } from './register.js';

export function envCommand(ctx: CommandContext): void {
  const { config, stdout } = ctx;

  versionCommand(ctx);
  stdout.write('\n');

  const entries: Array<[string, string | undefined]> = [
    ['LocalWorkingDir', config.localWorkingDir()],
    ['LocalGitDir', config.localGitDir()],
    ['LocalGitStorageDir', config.localStorageDir()],
    ['LocalLogDir', config.localLogDir()],
    [LOG_STATS_VARIABLE, config.getenv(LOG_STATS_VARIABLE)],
  ];

  for (const [key, value] of entries) {
    stdout.write(`${key}=${value ?? ''}\n`);
  }
}

registerCommand('env', envCommand, (command) => {
  command.description('Display the Git LFS environment');
});
