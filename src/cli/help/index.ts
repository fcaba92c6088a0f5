// src/cli/help/index.ts

import { quote } from '../../utils/template-interpolator.js';
import { tr, type Translator } from '../../utils/tr.js';
import type { ManPageTable } from './types.js';

/**
 * Stands in for "no topic given" when help is requested through the flag.
 */
export const HELP_FLAG_TOPIC = '--help';

/**
 * Looks help text up in the man page table instead of generating it from
 * the command tree.
 */
export class HelpResolver {
  constructor(
    private manPages: ManPageTable,
    private rootName: string,
    private translate: Translator = tr
  ) {}

  resolve(commandName: string): string {
    const name = commandName === HELP_FLAG_TOPIC ? this.rootName : commandName;

    const text = Object.prototype.hasOwnProperty.call(this.manPages, name)
      ? this.manPages[name]
      : undefined;
    if (text !== undefined) {
      return text.trim();
    }

    return this.translate('help.notFound', { name: quote(name) });
  }
}

export type { ManPageTable, HelpRenderer } from './types.js';
export { HELP_ONLY_TOPICS } from './types.js';
export { loadManPages, parseManPages } from './man-pages.js';
