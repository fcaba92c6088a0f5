// src/cli/completion/index.ts

import type { Command } from 'commander';
import type { OutputSink } from '../../core/types/output-sink.js';
import { CompletionError } from '../../utils/errors.js';
import { quote } from '../../utils/template-interpolator.js';
import { tr } from '../../utils/tr.js';
import { renderBash, renderFish, renderPowerShell, renderZsh } from './renderers.js';
import { isSupportedShell, SUPPORTED_SHELLS } from './types.js';

const ZSH_REQUEST_COMP = 'requestComp="${words[1]}';
const ZSH_REQUEST_COMP_GIT = 'requestComp="git-${words[1]#*git-}';

/**
 * Collects writes into a string so a script can be rewritten before output.
 */
class StringSink implements OutputSink {
  private chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}

/**
 * Writes the completion script for `shell` to `out`.
 *
 * The bash and zsh scripts get patched so that completion also works when
 * the program runs as `git lfs`: git's bash completion looks for a
 * `_git_<sub>` function, and under zsh the first word is `lfs` rather than
 * the program name.
 *
 * @throws CompletionError for an unsupported shell, before anything is written
 */
export function generateCompletion(shell: string, root: Command, out: OutputSink): void {
  if (!isSupportedShell(shell)) {
    throw new CompletionError(
      shell,
      tr('completion.unsupportedShell', { shell: quote(shell), shells: SUPPORTED_SHELLS.join(', ') })
    );
  }

  const programName = root.name();

  switch (shell) {
    case 'bash': {
      const script = new StringSink();
      renderBash(programName, script);
      script.write(`_${programName.replace(/-/g, '_')}() { __start_${programName}; }\n`);
      out.write(script.toString());
      break;
    }
    case 'zsh': {
      const script = new StringSink();
      renderZsh(programName, script);
      out.write(script.toString().replace(ZSH_REQUEST_COMP, () => ZSH_REQUEST_COMP_GIT));
      break;
    }
    case 'fish':
      renderFish(programName, out, true);
      break;
    case 'powershell':
      renderPowerShell(programName, out, true);
      break;
  }
}

export { completeWords, formatCandidates, type Candidate } from './candidates.js';
export {
  SUPPORTED_SHELLS,
  COMPLETE_COMMAND,
  COMPLETE_NO_DESC_COMMAND,
  isSupportedShell,
  type Shell,
} from './types.js';
