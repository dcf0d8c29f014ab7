import { describe, test, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdirSync } from 'fs';
import { join } from 'path';
import { CliGitHandle, GitConnector, withStash, type GitHandle } from '../src/git.js';
import { ExternalToolError, StashError } from '../src/errors.js';
import * as exec from '../src/utils/exec.js';
import { createTestDir, removeTestDir } from './utils/testDir.js';

vi.mock('../src/utils/exec.js');

function fakeHandle(dirty: boolean) {
  return {
    add: vi.fn(async (_path: string) => {}),
    commit: vi.fn(async (..._args: string[]) => {}),
    isDirty: vi.fn(async () => dirty),
    stash: vi.fn(async (_message: string) => {}),
    stashPop: vi.fn(async () => {})
  } satisfies GitHandle;
}

describe('Git Operations', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    vi.mocked(exec.runTool).mockResolvedValue('');
  });

  describe('CliGitHandle', () => {
    const handle = new CliGitHandle('/repositories/odoo-ps/client-project');

    test('stages paths', async () => {
      await handle.add('.');
      expect(exec.runTool).toHaveBeenCalledWith('git', ['-C', '/repositories/odoo-ps/client-project', 'add', '--', '.']);
    });

    test('commits with the given arguments', async () => {
      await handle.commit('-m', '[ADD] Install `pre-commit` configuration');
      expect(exec.runTool).toHaveBeenCalledWith('git', [
        '-C', '/repositories/odoo-ps/client-project',
        'commit', '-m', '[ADD] Install `pre-commit` configuration'
      ]);
    });

    test('reports a dirty working tree from porcelain status', async () => {
      vi.mocked(exec.runTool).mockResolvedValueOnce('M README.md\n?? .pre-commit-config.yaml');
      expect(await handle.isDirty()).toBe(true);

      vi.mocked(exec.runTool).mockResolvedValueOnce('');
      expect(await handle.isDirty()).toBe(false);
    });

    test('stashes untracked files and pops them back', async () => {
      await handle.stash('set aside');
      await handle.stashPop();

      expect(vi.mocked(exec.runTool).mock.calls).toEqual([
        ['git', ['-C', '/repositories/odoo-ps/client-project', 'stash', 'push', '--include-untracked', '--message', 'set aside']],
        ['git', ['-C', '/repositories/odoo-ps/client-project', 'stash', 'pop']]
      ]);
    });
  });

  describe('GitConnector', () => {
    let testDir: string;

    beforeEach(() => {
      testDir = createTestDir('git-test', expect.getState().currentTestName);
    });

    afterEach(() => {
      removeTestDir(testDir);
    });

    test('places the clone under organization and repository directories', () => {
      const connector = new GitConnector('odoo-ps/client-project', { repositoriesDir: testDir, remote: 'git@github.com:' });

      expect(connector.name).toBe('odoo-ps/client-project');
      expect(connector.path).toBe(join(testDir, 'odoo-ps', 'client-project'));
      expect(connector.url).toBe('git@github.com:odoo-ps/client-project.git');
      expect(connector.exists).toBe(false);
      expect(connector.repository).toBeNull();
    });

    test('clones a missing repository', async () => {
      const connector = new GitConnector('odoo-ps/client-project', { repositoriesDir: testDir, remote: 'https://github.com/' });

      expect(await connector.clone()).toBe(true);
      expect(exec.runTool).toHaveBeenCalledWith('git', [
        'clone',
        'https://github.com/odoo-ps/client-project.git',
        join(testDir, 'odoo-ps', 'client-project')
      ]);
    });

    test('does not clone twice', async () => {
      const connector = new GitConnector('odoo-ps/client-project', { repositoriesDir: testDir, remote: 'git@github.com:' });
      mkdirSync(join(connector.path, '.git'), { recursive: true });

      expect(connector.exists).toBe(true);
      expect(await connector.clone()).toBe(false);
      expect(exec.runTool).not.toHaveBeenCalled();
      expect(connector.repository).toBeInstanceOf(CliGitHandle);
    });

    test('rejects invalid repository names', () => {
      expect(() => new GitConnector('../client-project', { repositoriesDir: testDir, remote: 'git@github.com:' }))
        .toThrow(`Invalid repository name '../client-project': contains dangerous characters`);
    });
  });

  describe('withStash', () => {
    test('runs the action directly on a clean working tree', async () => {
      const handle = fakeHandle(false);

      expect(await withStash(handle, async () => 'done')).toBe('done');
      expect(handle.stash).not.toHaveBeenCalled();
      expect(handle.stashPop).not.toHaveBeenCalled();
    });

    test('pops the stash after the action resolves', async () => {
      const handle = fakeHandle(true);
      const action = vi.fn(async () => {
        expect(handle.stash).toHaveBeenCalledOnce();
        expect(handle.stashPop).not.toHaveBeenCalled();
      });

      await withStash(handle, action);

      expect(action).toHaveBeenCalledOnce();
      expect(handle.stashPop).toHaveBeenCalledOnce();
    });

    test('pops the stash when the action rejects', async () => {
      const handle = fakeHandle(true);

      await expect(withStash(handle, async () => {
        throw new Error('template failed');
      })).rejects.toThrow('template failed');
      expect(handle.stashPop).toHaveBeenCalledOnce();
    });

    test('does not run the action when stashing fails', async () => {
      const handle = fakeHandle(true);
      handle.stash.mockRejectedValueOnce(new ExternalToolError('git', 'Command failed', 'error: could not write index'));
      const action = vi.fn(async () => {});

      await expect(withStash(handle, action)).rejects.toBeInstanceOf(ExternalToolError);
      expect(action).not.toHaveBeenCalled();
      expect(handle.stashPop).not.toHaveBeenCalled();
    });

    test('keeps the action error when popping the stash fails too', async () => {
      const handle = fakeHandle(true);
      const conflict = new ExternalToolError('git', 'Command failed', 'CONFLICT: .pre-commit-config.yaml already exists');
      handle.stashPop.mockRejectedValueOnce(conflict);
      const failure = new ExternalToolError('copier', 'Command failed', 'Template not found');

      const error = await withStash(handle, async () => {
        throw failure;
      }).catch((caught: unknown) => caught);

      expect(error).toBe(failure);
      expect(failure.cause).toBeInstanceOf(StashError);
      expect(failure.cause).toMatchObject({
        phase: 'restore',
        stderr: 'CONFLICT: .pre-commit-config.yaml already exists'
      });
    });

    test('reports a failed pop after the action resolves as a restore failure', async () => {
      const handle = fakeHandle(true);
      handle.stashPop.mockRejectedValueOnce(
        new ExternalToolError('git', 'Command failed', 'CONFLICT: .pre-commit-config.yaml already exists')
      );

      await expect(withStash(handle, async () => 'done')).rejects.toMatchObject({
        name: 'StashError',
        phase: 'restore',
        tool: 'git',
        stderr: 'CONFLICT: .pre-commit-config.yaml already exists'
      });
    });

    test('reports a failed stash as a stash failure', async () => {
      const handle = fakeHandle(true);
      handle.stash.mockRejectedValueOnce(new ExternalToolError('git', 'Command failed', 'error: could not write index'));

      await expect(withStash(handle, async () => 'done')).rejects.toMatchObject({
        phase: 'stash',
        stderr: 'error: could not write index'
      });
    });
  });
});
