// src/cli/commands/help.ts

import type { Command } from 'commander';
import type { OutputSink } from '../../core/types/output-sink.js';
import { tr, type Translator } from '../../utils/tr.js';
import { findCommand } from '../command-tree.js';
import { HELP_ONLY_TOPICS, type HelpRenderer } from '../help/index.js';

export interface HelpCommandOptions {
  help: HelpRenderer;
  usage: HelpRenderer;
  out: OutputSink;
  translate?: Translator;
}

/**
 * Replaces commander's implicit help command. Topics are looked up in the
 * command tree first; "config" and "faq" have man pages but no command, so
 * they are accepted through the help command itself.
 */
export function registerHelpCommand(program: Command, options: HelpCommandOptions): Command {
  return program
    .command('help')
    .description('Help about any command')
    .argument('[topic...]', 'Command or topic to show help for')
    .action((topics: string[]) => {
      helpCommand(program, topics, options);
    });
}

export function helpCommand(program: Command, topics: string[], options: HelpCommandOptions): void {
  const { help, usage, out } = options;
  const translate = options.translate ?? tr;

  if (topics.length === 0) {
    out.write(`${help(program.name())}\n`);
    return;
  }

  let target = findCommand(program, topics);
  if (!target && HELP_ONLY_TOPICS.includes(topics[0])) {
    target = findCommand(program, ['help']);
  }

  if (!target) {
    out.write(`${translate('help.unknownTopic', { topic: `\`${topics.join(' ')}\`` })}\n`);
    out.write(`${usage(program.name())}\n`);
    return;
  }

  out.write(`${help(topics[0])}\n`);
}
