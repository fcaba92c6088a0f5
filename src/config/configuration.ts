// src/config/configuration.ts

import * as os from 'os';
import * as path from 'path';
import { simpleGit } from 'simple-git';
import { errorMessage } from '../utils/errors.js';
import { Logger } from '../utils/logger.js';

export interface ConfigurationOptions {
  env: NodeJS.ProcessEnv;
  cwd: string;
  gitDir?: string;         // Absolute path to the repository's git directory
  workingDir?: string;     // Absolute path to the working tree root
}

/**
 * Shared configuration handed to every command builder.
 *
 * Built after environment canonicalization so that GIT_DIR and friends are
 * already absolute when git is asked where the repository lives.
 */
export class Configuration {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  private gitDir?: string;
  private workingDir?: string;

  constructor(options: ConfigurationOptions) {
    this.env = options.env;
    this.cwd = options.cwd;
    this.gitDir = options.gitDir;
    this.workingDir = options.workingDir;
  }

  /**
   * Asks git for the repository layout around `cwd`. Outside a repository
   * (or without git) the configuration still loads; the local directories
   * then fall back to the user's state directory.
   */
  static async load(env: NodeJS.ProcessEnv, cwd: string): Promise<Configuration> {
    const git = simpleGit(cwd);

    let gitDir: string | undefined;
    try {
      gitDir = (await git.revparse(['--absolute-git-dir'])).trim() || undefined;
    } catch (error) {
      Logger.debug(`Not in a git repository: ${errorMessage(error)}`);
    }

    let workingDir: string | undefined;
    if (gitDir) {
      try {
        workingDir = (await git.revparse(['--show-toplevel'])).trim() || undefined;
      } catch (error) {
        // Bare repositories have no working tree
        Logger.debug(`No working tree: ${errorMessage(error)}`);
      }
    }

    return new Configuration({ env, cwd, gitDir, workingDir });
  }

  getenv(name: string): string | undefined {
    return this.env[name];
  }

  localGitDir(): string | undefined {
    return this.gitDir;
  }

  localWorkingDir(): string | undefined {
    return this.workingDir;
  }

  localStorageDir(): string | undefined {
    return this.gitDir ? path.join(this.gitDir, 'lfs') : undefined;
  }

  localLogDir(): string {
    const storageDir = this.localStorageDir();
    if (storageDir) {
      return path.join(storageDir, 'logs');
    }

    const stateHome = this.env.XDG_STATE_HOME || path.join(os.homedir(), '.local', 'state');
    return path.join(stateHome, 'git-lfs', 'logs');
  }
}
