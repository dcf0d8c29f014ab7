import { COPIER_ANSWERS_FILE, type TemplatingEngine } from '../copier.js';
import { CommandError, ExternalToolError, StashError } from '../errors.js';
import { withStash, type GitHandle, type RepositoryConnector } from '../git.js';
import type { HookManager } from '../hooks.js';
import type { Target } from '../types.js';
import type { Ui } from '../ui.js';
import { ErrorUtils } from '../utils/security.js';

/** Template repository holding the pre-commit configuration */
export const PRE_COMMIT_TEMPLATE = 'gh:odoo-ps/psbe-ps-tech-tools';

/**
 * `fresh` renders the template for the first time, `update` re-applies it
 * from the recorded answers.
 */
export type InstallMode = 'fresh' | 'update';

export type PreCommitDependencies = {
  ui: Ui;
  repository: RepositoryConnector;
  templating: TemplatingEngine;
  hooks: HookManager;
  /** Finds the Odoo series of the addons under a path */
  scanVersion: (repositoryPath: string) => Promise<string | null>;
  /** Reads the Copier answers of a repository, `null` when there are none */
  readAnswers: (repositoryPath: string) => Promise<Record<string, unknown> | null>;
};

export type PreCommitResult = {
  mode: InstallMode;
  version: string;
  message: string;
};

/**
 * Installs or updates the pre-commit configuration of a repository.
 *
 * Steps, each aborting the run on failure:
 * 1. clone the repository when it is not present yet
 * 2. resolve the Odoo version, from the database or from the addons manifests
 * 3. render or update the template with uncommitted changes stashed away
 * 4. install the pre-commit git hook
 * 5. commit everything
 *
 * Files written by the template are not rolled back when a later step fails.
 *
 * @example
 * ```typescript
 * const workflow = new PreCommitWorkflow(target, {
 *   ui, repository, templating, hooks, scanVersion: versionFromAddons, readAnswers
 * });
 * const { mode, version } = await workflow.run();
 * ```
 */
export class PreCommitWorkflow {
  constructor(
    private readonly target: Target,
    private readonly deps: PreCommitDependencies
  ) {}

  async run(): Promise<PreCommitResult> {
    const { ui, repository } = this.deps;

    const cloned = await this.clone();
    const version = await this.resolveVersion();
    const mode = await this.installMode(cloned, version);

    const handle = repository.repository;
    if (!handle) {
      throw new CommandError('resolution', `Ignoring non-existing repository '${repository.name}'`);
    }

    await ui.spinner(`Copying pre-commit config for Odoo ${version}`, () =>
      this.copyConfig(handle, mode, version)
    );
    await ui.spinner('Installing pre-commit hooks', () => this.installHooks());

    const message = commitMessage(mode, version);
    await ui.spinner('Committing changes', () => this.commitChanges(handle, message));

    ui.success(
      `Pre-commit configuration successfully ${mode === 'fresh' ? 'installed' : 'updated'} ` +
        `in repository '${repository.name}'`
    );
    return { mode, version, message };
  }

  private async clone(): Promise<boolean> {
    const { ui, repository } = this.deps;
    if (repository.exists) {
      ui.debug(`Using existing clone at ${repository.path}`);
      return false;
    }

    try {
      return await ui.spinner(`Cloning repository '${repository.name}'`, () => repository.clone());
    } catch (error) {
      throw toolFailure(`Failed to clone repository '${repository.name}'`, error);
    }
  }

  private async resolveVersion(): Promise<string> {
    const { ui, repository, scanVersion } = this.deps;

    if (this.target.kind === 'database' && this.target.database.version) {
      ui.debug(`Using version ${this.target.database.version} of database '${this.target.database.name}'`);
      return this.target.database.version;
    }

    const version = await scanVersion(repository.path);
    if (!version) {
      throw new CommandError('resolution', `Could not determine Odoo version from repository '${repository.name}'`);
    }
    return version;
  }

  private async installMode(cloned: boolean, version: string): Promise<InstallMode> {
    const { ui, repository, readAnswers } = this.deps;
    if (cloned) {
      return 'fresh';
    }

    let answers: Record<string, unknown> | null;
    try {
      answers = await readAnswers(repository.path);
    } catch (error) {
      throw new CommandError('resolution', ErrorUtils.extractErrorMessage(error), { cause: error });
    }

    if (!answers) {
      return 'fresh';
    }

    const previous = answers.odoo_version;
    if (typeof previous === 'string' && previous !== version) {
      ui.info(`Previous configuration targeted Odoo ${previous}`);
    }
    return 'update';
  }

  private async copyConfig(handle: GitHandle, mode: InstallMode, version: string): Promise<void> {
    const { ui, repository, templating } = this.deps;
    const common = {
      destination: repository.path,
      quiet: ui.level !== 'debug',
      data: { odoo_version: version },
      unsafe: true
    };

    try {
      await withStash(handle, async () => {
        if (mode === 'fresh') {
          ui.info('Handing over to Copier to configure options:');
          await this.interactive(() =>
            templating.copy(PRE_COMMIT_TEMPLATE, { ...common, overwrite: true, defaults: false })
          );
        } else {
          await templating.update({ ...common, answersFile: COPIER_ANSWERS_FILE, defaults: true });
        }
      });
    } catch (error) {
      if (error instanceof StashError) {
        throw toolFailure(
          error.phase === 'stash'
            ? 'Failed to set aside uncommitted changes'
            : 'Failed to restore uncommitted changes (kept in git stash)',
          error
        );
      }
      if (error instanceof Error && error.cause instanceof StashError) {
        ui.warning('Uncommitted changes could not be restored and are kept in git stash');
      }
      throw toolFailure('Failed to copy pre-commit configuration', error);
    }
  }

  private async installHooks(): Promise<void> {
    try {
      await this.deps.hooks.install(this.deps.repository.path);
    } catch (error) {
      throw toolFailure('Failed to install pre-commit hooks', error);
    }
  }

  private async commitChanges(handle: GitHandle, message: string): Promise<void> {
    try {
      await handle.add('.');
      await handle.commit('-m', message);
    } catch (error) {
      throw toolFailure('Failed to commit changes', error);
    }
  }

  private async interactive(task: () => Promise<void>): Promise<void> {
    const { ui } = this.deps;
    ui.pause();
    ui.print();
    try {
      await task();
    } finally {
      ui.print();
      ui.resume();
    }
  }
}

/**
 * Message of the commit recording the configuration change.
 */
export function commitMessage(mode: InstallMode, version: string): string {
  const action = mode === 'fresh' ? '[ADD] Install' : '[IMP] Update';

  return [
    `${action} \`pre-commit\` configuration`,
    '',
    'Added automatically with [odoo-dev](https://github.com/odoo-odev/odev) using configuration templates',
    'from [pre-commit-template](https://github.com/odoo-ps/psbe-ps-tech-tools/tree/pre-commit-template).',
    '',
    `Odoo version: ${version}`,
    'See: [pre-commit](https://github.com/odoo-ps/psbe-process/wiki/Development-common-practices#pre-commit)'
  ].join('\n');
}

function toolFailure(action: string, error: unknown): CommandError {
  if (error instanceof CommandError) {
    return error;
  }

  const detail = error instanceof ExternalToolError
    ? error.stderr || error.message
    : ErrorUtils.extractErrorMessage(error);
  return new CommandError('external', `${action}:\n${detail}`, { cause: error });
}
