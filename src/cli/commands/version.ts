// src/cli/commands/version.ts

import type { CommandContext } from '../../core/types/command-context.js';
import { userAgent } from '../../utils/version.js';
import { registerCommand } from './register.js';

export function versionCommand(ctx: Pick<CommandContext, 'stdout'>): void {
  ctx.stdout.write(`${userAgent()}\n`);
}

registerCommand('version', versionCommand, (command) => {
  command.description('Report the version number');
});
