import { existsSync } from 'fs';
import { dirname, join } from 'path';
import fs from 'fs-extra';
import { StashError } from './errors.js';
import { runTool } from './utils/exec.js';
import { SecurityValidator } from './utils/security.js';

/**
 * Version-control operations on a local working copy.
 *
 * Every method rejects with `ExternalToolError` when git fails.
 */
export interface GitHandle {
  add(path: string): Promise<void>;
  /** Runs `git commit` with the given arguments, e.g. `commit('-m', message)` */
  commit(...args: string[]): Promise<void>;
  /** Whether the working tree has staged, unstaged or untracked changes */
  isDirty(): Promise<boolean>;
  /** Sets aside every uncommitted change, untracked files included */
  stash(message: string): Promise<void>;
  stashPop(): Promise<void>;
}

/**
 * A repository known by its full name, and its local clone.
 */
export interface RepositoryConnector {
  /** Full name, `organization/repository` */
  readonly name: string;
  /** Location of the local clone */
  readonly path: string;
  readonly exists: boolean;
  /** Handle on the local clone, `null` while it is not cloned */
  readonly repository: GitHandle | null;
  /**
   * Clones the repository unless a local clone is already present.
   *
   * @returns `true` when a clone was made by this call
   */
  clone(): Promise<boolean>;
}

/**
 * `GitHandle` backed by the `git` executable.
 */
export class CliGitHandle implements GitHandle {
  constructor(private readonly path: string) {}

  private async git(...args: string[]): Promise<string> {
    return runTool('git', ['-C', this.path, ...args]);
  }

  async add(path: string): Promise<void> {
    await this.git('add', '--', path);
  }

  async commit(...args: string[]): Promise<void> {
    await this.git('commit', ...args);
  }

  async isDirty(): Promise<boolean> {
    const status = await this.git('status', '--porcelain');
    return status.length > 0;
  }

  async stash(message: string): Promise<void> {
    await this.git('stash', 'push', '--include-untracked', '--message', message);
  }

  async stashPop(): Promise<void> {
    await this.git('stash', 'pop');
  }
}

export type GitConnectorOptions = {
  /** Root directory of local clones */
  repositoriesDir: string;
  /** Prefix of clone URLs, e.g. `git@github.com:` or `https://github.com/` */
  remote: string;
};

/**
 * Repository cloned under `<repositoriesDir>/<organization>/<repository>`.
 *
 * @example
 * ```typescript
 * const connector = new GitConnector('odoo-ps/client-project', {
 *   repositoriesDir: '/home/dev/odoo/repositories',
 *   remote: 'git@github.com:'
 * });
 * await connector.clone();
 * console.log(connector.path); // /home/dev/odoo/repositories/odoo-ps/client-project
 * ```
 */
export class GitConnector implements RepositoryConnector {
  readonly name: string;
  readonly path: string;

  constructor(fullName: string, private readonly options: GitConnectorOptions) {
    this.name = SecurityValidator.validateRepositoryName(fullName);
    const [organization, repository] = this.name.split('/');
    this.path = join(SecurityValidator.validatePath(options.repositoriesDir), organization, repository);
  }

  get url(): string {
    return `${this.options.remote}${this.name}.git`;
  }

  get exists(): boolean {
    return existsSync(join(this.path, '.git'));
  }

  get repository(): GitHandle | null {
    return this.exists ? new CliGitHandle(this.path) : null;
  }

  async clone(): Promise<boolean> {
    if (this.exists) {
      return false;
    }

    await fs.ensureDir(dirname(this.path));
    await runTool('git', ['clone', this.url, this.path]);
    return true;
  }
}

const STASH_MESSAGE = 'odoo-dev: changes set aside while applying templates';

/**
 * Runs `action` on a clean working tree.
 *
 * Uncommitted changes are stashed first and popped back once `action`
 * settles, whether it resolves or rejects. Git failures surface as
 * `StashError`: when stashing fails `action` is never run, and when only the
 * pop fails the changes stay in `git stash`. An error of `action` always
 * wins over a failed pop, which is attached to it as `cause`.
 */
export async function withStash<T>(handle: GitHandle, action: () => Promise<T>): Promise<T> {
  let stashed: boolean;
  try {
    stashed = await handle.isDirty();
    if (stashed) {
      await handle.stash(STASH_MESSAGE);
    }
  } catch (error) {
    throw new StashError('stash', error);
  }

  let result: T;
  try {
    result = await action();
  } catch (error) {
    if (stashed) {
      try {
        await handle.stashPop();
      } catch (popError) {
        if (error instanceof Error && error.cause === undefined) {
          error.cause = new StashError('restore', popError);
        }
      }
    }
    throw error;
  }

  if (stashed) {
    try {
      await handle.stashPop();
    } catch (error) {
      throw new StashError('restore', error);
    }
  }
  return result;
}
