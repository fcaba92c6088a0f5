// src/cli/completion/candidates.ts

import type { Command } from 'commander';
import { findChild } from '../command-tree.js';

export interface Candidate {
  name: string;
  description: string;
}

/**
 * Computes completion candidates for the word being typed. `words` are the
 * command-line words after the program name, the last one being the partial
 * word (possibly empty).
 */
export function completeWords(root: Command, words: readonly string[]): Candidate[] {
  const partial = words.length > 0 ? words[words.length - 1] : '';
  const completed = words.slice(0, -1);

  let node = root;
  let operands = 0;
  for (const word of completed) {
    if (word.startsWith('-')) {
      continue;
    }
    const child = operands === 0 ? findChild(node, word) : undefined;
    if (child) {
      node = child;
    } else {
      operands++;
    }
  }

  const helper = node.createHelp();
  let candidates: Candidate[];

  if (partial.startsWith('-')) {
    candidates = helper.visibleOptions(node).flatMap((option) =>
      [option.long, option.short]
        .filter((flag): flag is string => typeof flag === 'string')
        .map((flag) => ({ name: flag, description: option.description }))
    );
  } else if (operands === 0 && node.commands.length > 0) {
    candidates = helper.visibleCommands(node).map((command) => ({
      name: command.name(),
      description: command.description(),
    }));
  } else {
    const argument = node.registeredArguments[operands];
    candidates = (argument?.argChoices ?? []).map((choice) => ({ name: choice, description: '' }));
  }

  return candidates.filter((candidate) => candidate.name.startsWith(partial));
}

export function formatCandidates(candidates: readonly Candidate[], includeDescriptions: boolean): string {
  return candidates
    .map((candidate) =>
      includeDescriptions && candidate.description
        ? `${candidate.name}\t${candidate.description}\n`
        : `${candidate.name}\n`
    )
    .join('');
}
