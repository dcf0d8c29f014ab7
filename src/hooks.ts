import { runTool } from './utils/exec.js';

/**
 * Installs git hooks into a repository.
 */
export interface HookManager {
  install(repositoryPath: string): Promise<void>;
}

/**
 * `HookManager` backed by the `pre-commit` executable.
 *
 * `GIT_CONFIG` points to `/dev/null` for the child process only: a global
 * `core.hooksPath` would otherwise make `pre-commit install` refuse to write
 * the repository hook.
 */
export class PreCommitHooks implements HookManager {
  async install(repositoryPath: string): Promise<void> {
    await runTool('pre-commit', ['install'], {
      cwd: repositoryPath,
      env: { GIT_CONFIG: '/dev/null' }
    });
  }
}
