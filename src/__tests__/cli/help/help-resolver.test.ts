// src/__tests__/cli/help/help-resolver.test.ts

import { describe, it, expect } from 'vitest';
import { HelpResolver, loadManPages, parseManPages } from '../../../cli/help/index.js';

const manPages = {
  'git-lfs': '\n  git lfs <command> [<args>]\n\nOverview text.\n\n',
  version: 'git lfs version\n',
};

describe('HelpResolver', () => {
  const resolver = new HelpResolver(manPages, 'git-lfs');

  it('should return the trimmed man page for a known command', () => {
    expect(resolver.resolve('version')).toBe('git lfs version');
  });

  it('should return the root page for the root name', () => {
    expect(resolver.resolve('git-lfs')).toBe('git lfs <command> [<args>]\n\nOverview text.');
  });

  it('should treat --help as the root name', () => {
    expect(resolver.resolve('--help')).toBe(resolver.resolve('git-lfs'));
  });

  it('should report topics without a man page', () => {
    expect(resolver.resolve('nonexistent-topic')).toBe(
      'Sorry, no usage text found for "nonexistent-topic"'
    );
  });

  it('should not resolve inherited object properties', () => {
    expect(resolver.resolve('toString')).toBe('Sorry, no usage text found for "toString"');
  });

  it('should return identical text on repeated lookups', () => {
    expect(resolver.resolve('version')).toBe(resolver.resolve('version'));
  });

  it('should format the missing-page message with the injected translator', () => {
    const custom = new HelpResolver(manPages, 'git-lfs', (key, context) => `${key}:${String(context?.name)}`);

    expect(custom.resolve('missing')).toBe('help.notFound:"missing"');
  });
});

describe('parseManPages', () => {
  it('should parse an object of strings', () => {
    expect(parseManPages('{"a": "text"}')).toEqual({ a: 'text' });
  });

  it('should return a frozen table', () => {
    expect(Object.isFrozen(parseManPages('{"a": "text"}'))).toBe(true);
  });

  it('should reject non-object content', () => {
    expect(() => parseManPages('["a"]')).toThrow('Man page table must be a JSON object');
  });

  it('should reject non-string pages', () => {
    expect(() => parseManPages('{"a": 1}')).toThrow('Man page for a must be a string');
  });
});

describe('loadManPages', () => {
  it('should load the bundled pages for the root, commands and help-only topics', () => {
    const pages = loadManPages();

    for (const name of ['git-lfs', 'version', 'env', 'completion', 'help', 'config', 'faq']) {
      expect(typeof pages[name]).toBe('string');
    }
  });
});
