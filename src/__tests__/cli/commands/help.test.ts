// src/__tests__/cli/commands/help.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { Command } from 'commander';
import { helpCommand, registerHelpCommand } from '../../../cli/commands/help.js';
import { createSink, type MemorySink } from '../../setup.js';

const pages: Record<string, string> = {
  'git-lfs': 'root page',
  version: 'version page',
  config: 'config page',
  faq: 'faq page',
  help: 'help page',
};

const render = (name: string) => pages[name] ?? `no page for ${name}`;

describe('helpCommand', () => {
  let program: Command;
  let out: MemorySink;

  beforeEach(() => {
    out = createSink();
    program = new Command('git-lfs');
    program.command('version');
    registerHelpCommand(program, { help: render, usage: (name) => `usage of ${name}`, out });
  });

  it('should print the root page when no topic is given', () => {
    helpCommand(program, [], { help: render, usage: render, out });

    expect(out.text()).toBe('root page\n');
  });

  it('should print the page of a command', () => {
    helpCommand(program, ['version'], { help: render, usage: render, out });

    expect(out.text()).toBe('version page\n');
  });

  it('should print the page of the first topic for nested lookups', () => {
    helpCommand(program, ['version', 'extra'], { help: render, usage: render, out });

    expect(out.text()).toBe('version page\n');
  });

  it.each(['config', 'faq'])('should accept the %s topic without a command', (topic) => {
    helpCommand(program, [topic], { help: render, usage: render, out });

    expect(out.text()).toBe(`${topic} page\n`);
  });

  it('should report unknown topics followed by the root usage', () => {
    helpCommand(program, ['bogus', 'topic'], { help: render, usage: (name) => `usage of ${name}`, out });

    expect(out.text()).toBe('Unknown help topic `bogus topic`\nusage of git-lfs\n');
  });

  it('should not treat config as a command when the help command is missing', () => {
    const bare = new Command('git-lfs');

    helpCommand(bare, ['config'], { help: render, usage: () => 'usage', out });

    expect(out.text()).toBe('Unknown help topic `config`\nusage\n');
  });

  it('should be reachable through the command line', async () => {
    program.exitOverride();

    await program.parseAsync(['help', 'faq'], { from: 'user' });

    expect(out.text()).toBe('faq page\n');
  });
});
