// src/core/types/command-context.ts

import type { Configuration } from '../../config/configuration.js';
import type { Translator } from '../../utils/tr.js';
import type { ApiClient } from '../api-client.js';
import type { OutputSink } from './output-sink.js';

/**
 * Everything a command builder can rely on. It only exists once the
 * environment has been canonicalized and the configuration loaded, which is
 * why builders receive it instead of reaching for globals.
 */
export interface CommandContext {
  rootName: string;
  config: Configuration;
  apiClient: ApiClient;
  stdout: OutputSink;
  stderr: OutputSink;
  translate: Translator;
}
