// src/cli/command-tree.ts

import type { Command } from 'commander';

export function findChild(parent: Command, name: string): Command | undefined {
  return parent.commands.find((child) => child.name() === name || child.aliases().includes(name));
}

/**
 * Walks `path` from the root. Words past the deepest matching command are
 * treated as that command's arguments; a path whose first word matches
 * nothing yields undefined. An empty path yields the root.
 */
export function findCommand(root: Command, path: readonly string[]): Command | undefined {
  let node = root;
  for (const word of path) {
    const child = findChild(node, word);
    if (!child) {
      break;
    }
    node = child;
  }

  if (node === root && path.length > 0) {
    return undefined;
  }
  return node;
}
