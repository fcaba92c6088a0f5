// src/cli/runner.ts

import { CommanderError } from 'commander';
import { Configuration } from '../config/configuration.js';
import { canonicalizeEnvironment } from '../config/environment.js';
import { HttpApiClient, type ApiClient } from '../core/api-client.js';
import type { CommandRegistry } from '../core/command-registry.js';
import type { CommandContext } from '../core/types/command-context.js';
import type { OutputSink } from '../core/types/output-sink.js';
import { errorMessage } from '../utils/errors.js';
import { Logger, LogLevel } from '../utils/logger.js';
import { tr, type Translator } from '../utils/tr.js';
import { ROOT_COMMAND_NAME, userAgent } from '../utils/version.js';
import { commandRegistry } from './commands/index.js';
import { createHttpStatsHook } from './diagnostics.js';
import { HelpResolver, loadManPages, type ManPageTable } from './help/index.js';
import { attachCommands, createProgram } from './program.js';

export const EXIT_SUCCESS = 0;
// Every failure maps to the same code; callers cannot tell usage errors
// from command failures.
export const EXIT_FAILURE = 127;

export interface RunOptions {
  argv?: string[];                      // Arguments after the program name
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  stdout?: OutputSink;
  stderr?: OutputSink;
  registry?: CommandRegistry<CommandContext>;
  manPages?: ManPageTable;
  translate?: Translator;
  apiClient?: ApiClient;
  loadConfig?: (env: NodeJS.ProcessEnv, cwd: string) => Promise<Configuration>;
}

/**
 * Assembles the command tree, runs the command line against it and returns
 * the process exit code. The API client is closed on every path.
 */
export async function run(options: RunOptions = {}): Promise<number> {
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const translate = options.translate ?? tr;
  const loadConfig: NonNullable<RunOptions['loadConfig']> =
    options.loadConfig ?? ((configEnv, configCwd) => Configuration.load(configEnv, configCwd));

  Logger.setOutput(stderr);
  if (env.GIT_TRACE) {
    Logger.setLevel(LogLevel.DEBUG);
  }

  const apiClient = options.apiClient ?? new HttpApiClient(userAgent());

  try {
    const resolver = new HelpResolver(options.manPages ?? loadManPages(), ROOT_COMMAND_NAME, translate);
    const renderHelp = (name: string) => resolver.resolve(name);

    const program = createProgram({
      name: ROOT_COMMAND_NAME,
      help: renderHelp,
      usage: renderHelp,
      stdout,
      stderr,
      translate,
    });

    canonicalizeEnvironment(env, cwd);
    const config = await loadConfig(env, cwd);

    const ctx: CommandContext = {
      rootName: ROOT_COMMAND_NAME,
      config,
      apiClient,
      stdout,
      stderr,
      translate,
    };

    const registry = options.registry ?? commandRegistry;
    Logger.debug(`Registered commands: ${registry.names().join(', ')}`);
    attachCommands(program, registry.realize(ctx), createHttpStatsHook({ config, apiClient, translate }));

    await program.parseAsync(options.argv ?? process.argv.slice(2), { from: 'user' });
    return EXIT_SUCCESS;
  } catch (error) {
    return exitCodeFor(error);
  } finally {
    try {
      await apiClient.close();
    } catch (error) {
      Logger.error(`Failed to close API client: ${errorMessage(error)}`);
    }
  }
}

function exitCodeFor(error: unknown): number {
  if (error instanceof CommanderError) {
    // Commander has already printed its message; help output exits with 0
    return error.exitCode === 0 ? EXIT_SUCCESS : EXIT_FAILURE;
  }

  Logger.error(errorMessage(error));
  if (error instanceof Error && error.stack) {
    Logger.debug(error.stack);
  }
  return EXIT_FAILURE;
}
