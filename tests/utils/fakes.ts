import { vi } from 'vitest';
import type { PreCommitDependencies } from '../../src/commands/pre-commit.js';
import type { CopyOptions, UpdateOptions } from '../../src/copier.js';
import type { GitHandle, RepositoryConnector } from '../../src/git.js';
import type { LogLevel, Ui } from '../../src/ui.js';

/**
 * Ui recording log lines, and spinner and pause events into `calls`
 */
export function createTestUi(level: LogLevel = 'info', calls: string[] = []): Ui & { lines: string[] } {
  const lines: string[] = [];
  return {
    level,
    lines,
    debug: (message) => { lines.push(`debug: ${message}`); },
    info: (message) => { lines.push(`info: ${message}`); },
    success: (message) => { lines.push(`success: ${message}`); },
    warning: (message) => { lines.push(`warning: ${message}`); },
    error: (message) => { lines.push(`error: ${message}`); },
    print: () => {},
    spinner: <T>(message: string, task: () => Promise<T>): Promise<T> => {
      calls.push(`spinner ${message}`);
      return task();
    },
    pause: () => { calls.push('pause'); },
    resume: () => { calls.push('resume'); }
  };
}

export type HarnessOptions = {
  /** Local clone already present */
  exists?: boolean;
  /** `clone()` reports a clone but leaves no working copy */
  brokenClone?: boolean;
  /** Uncommitted changes in the working copy */
  dirty?: boolean;
  /** Recorded Copier answers, `null` for no answers file */
  answers?: Record<string, unknown> | null;
  /** Version found in the addons manifests */
  scannedVersion?: string | null;
  level?: LogLevel;
};

export const REPOSITORY_NAME = 'odoo-ps/client-project';
export const REPOSITORY_PATH = '/repositories/odoo-ps/client-project';

/**
 * In-memory collaborators of the pre-commit workflow, all recording into `calls`
 */
export function createHarness(options: HarnessOptions = {}) {
  const calls: string[] = [];
  const ui = createTestUi(options.level ?? 'info', calls);
  let exists = options.exists ?? false;

  const handle = {
    add: vi.fn(async (path: string) => { calls.push(`add ${path}`); }),
    commit: vi.fn(async (...args: string[]) => { calls.push(`commit ${args[0]}`); }),
    isDirty: vi.fn(async () => { calls.push('isDirty'); return options.dirty ?? false; }),
    stash: vi.fn(async () => { calls.push('stash'); }),
    stashPop: vi.fn(async () => { calls.push('stashPop'); })
  } satisfies GitHandle;

  const repository: RepositoryConnector = {
    name: REPOSITORY_NAME,
    path: REPOSITORY_PATH,
    get exists() {
      return exists;
    },
    get repository() {
      return exists ? handle : null;
    },
    clone: vi.fn(async () => {
      if (exists) return false;
      calls.push('clone');
      exists = !options.brokenClone;
      return true;
    })
  };

  const templating = {
    copy: vi.fn(async (_source: string, _options: CopyOptions) => { calls.push('copy'); }),
    update: vi.fn(async (_options: UpdateOptions) => { calls.push('update'); })
  };

  const hooks = {
    install: vi.fn(async (_path: string) => { calls.push('install'); })
  };

  const scanVersion = vi.fn(async (_path: string) => {
    calls.push('scanVersion');
    return options.scannedVersion === undefined ? '17.0' : options.scannedVersion;
  });

  const readAnswers = vi.fn(async (_path: string) => {
    calls.push('readAnswers');
    return options.answers ?? null;
  });

  const deps: PreCommitDependencies = { ui, repository, templating, hooks, scanVersion, readAnswers };

  return { calls, ui, handle, repository, templating, hooks, scanVersion, readAnswers, deps };
}
