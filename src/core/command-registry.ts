// src/core/command-registry.ts

import type { Command } from 'commander';
import { RegistryError } from '../utils/errors.js';
import { tr } from '../utils/tr.js';

/**
 * A deferred command definition. `build` runs once, during realization, and
 * may return null to leave the command out of the tree (feature-gated
 * commands use this). `decorate` runs on the produced command only.
 */
export interface CommandEntry<TContext> {
  name: string;
  build: (ctx: TContext) => Command | null;
  decorate?: (command: Command, ctx: TContext) => void;
}

/**
 * Ordered list of deferred command builders.
 *
 * Command modules add entries while they load, in whatever order the module
 * graph imports them. The runner realizes the registry exactly once, after
 * the shared configuration exists, and attaches the results to the root.
 *
 * @example
 * ```typescript
 * registry.add({ name: 'version', build: (ctx) => newCommand('version', run, ctx) });
 *
 * const commands = registry.realize(ctx);
 * ```
 */
export class CommandRegistry<TContext> {
  private entries: CommandEntry<TContext>[] = [];
  private realizing = false;
  private realized = false;

  /**
   * Append an entry. Appends are synchronous, so callers interleaving on the
   * event loop cannot lose or reorder each other's entries.
   *
   * @throws RegistryError if called from a builder while realize() runs
   */
  add(entry: CommandEntry<TContext>): void {
    if (this.realizing) {
      throw new RegistryError(entry.name, tr('registry.nested', { name: entry.name }));
    }
    this.entries.push(entry);
  }

  /**
   * Invoke every builder in registration order and return the commands that
   * were produced.
   *
   * @throws RegistryError on a second call, or when a builder registers more entries
   */
  realize(ctx: TContext): Command[] {
    if (this.realized) {
      throw new RegistryError('', tr('registry.realized'));
    }

    this.realizing = true;
    const commands: Command[] = [];
    try {
      for (const entry of this.entries) {
        const command = entry.build(ctx);
        if (!command) {
          continue;
        }
        entry.decorate?.(command, ctx);
        commands.push(command);
      }
    } finally {
      this.realizing = false;
      this.realized = true;
    }

    return commands;
  }

  /**
   * Entry names in registration order, built or not.
   */
  names(): string[] {
    return this.entries.map((entry) => entry.name);
  }
}
