// src/utils/tr.ts - Message catalog lookup

import { interpolateTemplate } from './template-interpolator.js';

const messages = {
  'help.notFound': 'Sorry, no usage text found for {{name}}',
  'help.unknownTopic': 'Unknown help topic {{topic}}',
  'command.unknown': 'unknown command {{name}} for {{root}}',
  'registry.nested': 'Cannot register command {{name}} while commands are being built',
  'registry.realized': 'Commands have already been built; cannot build them again',
  'completion.unsupportedShell': 'Unsupported shell {{shell}}: expected one of {{shells}}',
  'diagnostics.httpStats': 'Error logging HTTP stats: {{error}}',
} as const;

export type MessageKey = keyof typeof messages;

/**
 * Formats a catalog message. Collaborators take this as a dependency so tests
 * and other locales can substitute their own.
 */
export type Translator = (key: MessageKey, context?: Record<string, unknown>) => string;

export const tr: Translator = (key, context = {}) => interpolateTemplate(messages[key], context);
