// src/cli/help/types.ts

/**
 * Preformatted help text keyed by command or topic name.
 */
export type ManPageTable = Readonly<Record<string, string>>;

/**
 * Renders the help shown for a command (or the usage shown after an error).
 * The program takes one for help and one for usage.
 */
export type HelpRenderer = (commandName: string) => string;

/**
 * Topics that are documented but have no command node of their own.
 */
export const HELP_ONLY_TOPICS: readonly string[] = ['config', 'faq'];
