// src/cli/commands/completion.ts

import { Argument, type Command } from 'commander';
import type { OutputSink } from '../../core/types/output-sink.js';
import { generateCompletion, SUPPORTED_SHELLS, type Shell } from '../completion/index.js';

export function registerCompletionCommand(program: Command, out: OutputSink): Command {
  return program
    .command('completion')
    .description('Generate completion script')
    .addArgument(new Argument('<shell>', 'Shell to generate the script for').choices(SUPPORTED_SHELLS))
    .action((shell: Shell) => {
      generateCompletion(shell, program, out);
    });
}
