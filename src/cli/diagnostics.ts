// src/cli/diagnostics.ts - Opt-in HTTP statistics logging

import * as fs from 'fs';
import * as path from 'path';
import type { Configuration } from '../config/configuration.js';
import type { ApiClient } from '../core/api-client.js';
import { errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';
import { tr, type Translator } from '../utils/tr.js';

export const LOG_STATS_VARIABLE = 'GIT_LOG_STATS';

export interface HttpStatsHookOptions {
  config: Configuration;
  apiClient: ApiClient;
  translate?: Translator;
  now?: () => number;       // Milliseconds since the epoch
}

/**
 * Builds the pre-action hook installed on every registered subcommand.
 *
 * When GIT_LOG_STATS is non-empty the hook opens
 * `<local log dir>/http/http-<unix seconds>.log` and hands it to the API
 * client. Failing to create the directory or the file only prints a
 * warning; the command still runs. The hook does its work at most once per
 * process.
 */
export function createHttpStatsHook(options: HttpStatsHookOptions): () => void {
  const { config, apiClient } = options;
  const translate = options.translate ?? tr;
  const now = options.now ?? Date.now;
  let fired = false;

  return () => {
    if (fired) {
      return;
    }
    fired = true;

    if (!config.getenv(LOG_STATS_VARIABLE)) {
      return;
    }

    const logBase = path.join(config.localLogDir(), 'http');
    try {
      fs.mkdirSync(logBase, { recursive: true });
    } catch (error) {
      Logger.warn(translate('diagnostics.httpStats', { error: errorMessage(error) }));
      return;
    }

    const logFile = path.join(logBase, `http-${Math.floor(now() / 1000)}.log`);
    let fd: number;
    try {
      fd = fs.openSync(logFile, 'w');
    } catch (error) {
      Logger.warn(translate('diagnostics.httpStats', { error: errorMessage(error) }));
      return;
    }

    apiClient.logHttpStats(fs.createWriteStream(logFile, { fd }));
  };
}
