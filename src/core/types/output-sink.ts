// src/core/types/output-sink.ts

/**
 * Anything text can be written to: process.stdout, process.stderr, a file
 * stream, or an in-memory collector in tests.
 */
export interface OutputSink {
  write(chunk: string): unknown;
}
