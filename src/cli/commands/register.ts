// src/cli/commands/register.ts - Deferred subcommand registration

import { Command } from 'commander';
import { CommandRegistry } from '../../core/command-registry.js';
import type { CommandContext } from '../../core/types/command-context.js';

export type CommandRunner = (ctx: CommandContext, args: string[], command: Command) => void | Promise<void>;

export type CommandCustomizer = (command: Command, ctx: CommandContext) => void;

/**
 * Registry the command modules add themselves to while they load. The
 * runner accepts any registry, so tests build their own.
 */
export const commandRegistry = new CommandRegistry<CommandContext>();

export function newCommand(name: string, run: CommandRunner, ctx: CommandContext): Command {
  return new Command(name).action(async function (this: Command) {
    await run(ctx, this.args, this);
  });
}

/**
 * Registers a direct subcommand of the root. Nothing is built until the
 * runner realizes the registry; `customize` then gets the new command to add
 * arguments, options or a description.
 */
export function registerCommand(
  name: string,
  run: CommandRunner,
  customize?: CommandCustomizer,
  registry: CommandRegistry<CommandContext> = commandRegistry
): void {
  registry.add({
    name,
    build: (ctx) => newCommand(name, run, ctx),
    decorate: customize,
  });
}
