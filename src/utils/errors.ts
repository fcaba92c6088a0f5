// src/utils/errors.ts

export class RegistryError extends Error {
  constructor(
    public commandName: string,
    message: string
  ) {
    super(message);
    this.name = 'RegistryError';
  }
}

export class CompletionError extends Error {
  constructor(
    public shell: string,
    message: string
  ) {
    super(message);
    this.name = 'CompletionError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
