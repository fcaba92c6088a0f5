// src/cli/commands/complete.ts - Hidden commands the completion scripts call

import type { Command } from 'commander';
import type { OutputSink } from '../../core/types/output-sink.js';
import {
  COMPLETE_COMMAND,
  COMPLETE_NO_DESC_COMMAND,
  completeWords,
  formatCandidates,
} from '../completion/index.js';

export function registerCompleteCommands(program: Command, out: OutputSink): void {
  const variants = [
    { name: COMPLETE_COMMAND, descriptions: true },
    { name: COMPLETE_NO_DESC_COMMAND, descriptions: false },
  ];

  for (const { name, descriptions } of variants) {
    program
      .command(name, { hidden: true })
      .argument('[words...]')
      .helpOption(false)
      .allowUnknownOption()
      .passThroughOptions()
      .action(function (this: Command) {
        out.write(formatCandidates(completeWords(program, this.args), descriptions));
      });
  }
}
