// src/cli/help/man-pages.ts

import * as fs from 'fs';
import type { ManPageTable } from './types.js';

const MAN_PAGES_URL = new URL('../../../man/man-pages.json', import.meta.url);

let cached: ManPageTable | undefined;

export function loadManPages(): ManPageTable {
  if (!cached) {
    cached = parseManPages(fs.readFileSync(MAN_PAGES_URL, 'utf-8'));
  }
  return cached;
}

export function parseManPages(content: string): ManPageTable {
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new Error('Man page table must be a JSON object');
  }

  const table: Record<string, string> = {};
  for (const [name, text] of Object.entries(parsed)) {
    if (typeof text !== 'string') {
      throw new Error(`Man page for ${name} must be a string`);
    }
    table[name] = text;
  }
  return Object.freeze(table);
}
