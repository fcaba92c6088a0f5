// src/cli/program.ts - Commander program factory

import { Command, CommanderError } from 'commander';
import type { OutputSink } from '../core/types/output-sink.js';
import { quote } from '../utils/template-interpolator.js';
import { tr, type Translator } from '../utils/tr.js';
import { versionCommand } from './commands/version.js';
import { registerCompletionCommand } from './commands/completion.js';
import { registerHelpCommand } from './commands/help.js';
import { registerCompleteCommands } from './commands/complete.js';
import type { HelpRenderer } from './help/index.js';

export interface ProgramOptions {
  name: string;
  help: HelpRenderer;       // Text for `--help` and the help command
  usage: HelpRenderer;      // Text printed by the bare root command and after errors
  stdout: OutputSink;
  stderr: OutputSink;
  translate?: Translator;
}

type RootOptions = {
  version?: boolean;
};

/**
 * Builds the root command with its fixed subcommands (completion, help and
 * the hidden completion callbacks). Registered subcommands are added later
 * with attachCommands(), once the configuration they depend on exists.
 */
export function createProgram(options: ProgramOptions): Command {
  const { name, help, usage, stdout, stderr } = options;
  const translate = options.translate ?? tr;

  const program = new Command(name);

  program
    .configureOutput({
      writeOut: (str) => stdout.write(str),
      writeErr: (str) => stderr.write(str),
    })
    .configureHelp({
      formatHelp: (cmd) => `${help(cmd.name())}\n`,
    })
    .helpCommand(false)
    .showHelpAfterError()
    .enablePositionalOptions()
    .exitOverride();

  program
    .option('-v, --version', 'Print the version and exit')
    .action(function (this: Command) {
      if (this.args.length > 0) {
        this.error(translate('command.unknown', { name: quote(this.args[0]), root: quote(name) }), {
          code: 'commander.unknownCommand',
        });
      }

      versionCommand({ stdout });
      if (!this.opts<RootOptions>().version) {
        stdout.write(`${usage(name)}\n`);
      }
    });

  registerCompletionCommand(program, stdout);
  registerHelpCommand(program, { help, usage, out: stdout, translate });
  registerCompleteCommands(program, stdout);

  return program;
}

/**
 * Adds realized subcommands to the root. Each one inherits the root's
 * output, help and exit settings and runs `preAction` before its body.
 */
export function attachCommands(
  program: Command,
  commands: readonly Command[],
  preAction: (command: Command) => void
): void {
  for (const command of commands) {
    command.copyInheritedSettings(program);
    command.hook('preAction', (_hooked, actionCommand) => preAction(actionCommand));
    program.addCommand(command);
  }
}

export { CommanderError };
