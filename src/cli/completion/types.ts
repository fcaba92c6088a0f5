// src/cli/completion/types.ts

export const SUPPORTED_SHELLS = ['bash', 'zsh', 'fish', 'powershell'] as const;

export type Shell = typeof SUPPORTED_SHELLS[number];

export function isSupportedShell(value: string): value is Shell {
  return (SUPPORTED_SHELLS as readonly string[]).includes(value);
}

/**
 * Hidden commands the generated scripts call back into. The second one
 * prints candidate names without descriptions.
 */
export const COMPLETE_COMMAND = '__complete';
export const COMPLETE_NO_DESC_COMMAND = '__completeNoDesc';
