// src/cli/commands/index.ts - Loads every command module so it can register itself

import './version.js';
import './env.js';

export { commandRegistry, registerCommand, newCommand } from './register.js';
export type { CommandRunner, CommandCustomizer } from './register.js';
