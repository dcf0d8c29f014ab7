import { Command, Option } from 'commander';
import { PreCommitWorkflow, type PreCommitResult } from './commands/pre-commit.js';
import { loadConfig, type Config } from './config.js';
import { CopierTemplating, readAnswers } from './copier.js';
import { JsonDatabaseStore } from './database.js';
import { CommandError } from './errors.js';
import { GitConnector } from './git.js';
import { PreCommitHooks } from './hooks.js';
import { repositoryName, resolveTarget } from './target.js';
import { createUi, isLogLevel, LOG_LEVELS, type Ui } from './ui.js';
import { ErrorUtils } from './utils/security.js';
import { versionFromAddons } from './version.js';

export type PreCommitArgs = {
  database?: string;
  repository?: string;
  logLevel?: string;
};

function connect(fullName: string, config: Config): GitConnector {
  try {
    return new GitConnector(fullName, { repositoriesDir: config.repositoriesDir, remote: config.gitRemote });
  } catch (error) {
    throw new CommandError('configuration', ErrorUtils.extractErrorMessage(error), { cause: error });
  }
}

/**
 * Wires configuration, registry and external tools, then runs the
 * `pre-commit` workflow.
 */
export async function runPreCommit(
  args: PreCommitArgs,
  env: NodeJS.ProcessEnv = process.env
): Promise<PreCommitResult> {
  const config = loadConfig(env);
  const ui = createUi({ level: args.logLevel && isLogLevel(args.logLevel) ? args.logLevel : config.logLevel });

  const target = await resolveTarget(args, new JsonDatabaseStore(config.databasesFile));
  const repository = connect(repositoryName(target), config);

  const workflow = new PreCommitWorkflow(target, {
    ui,
    repository,
    templating: new CopierTemplating(),
    hooks: new PreCommitHooks(),
    scanVersion: versionFromAddons,
    readAnswers
  });
  return workflow.run();
}

export function createProgram(): Command {
  const program = new Command();

  program
    .name('odoo-dev')
    .description('Development helpers for Odoo databases and their repositories')
    .version('0.1.0');

  program
    .command('pre-commit')
    .description('Install or update pre-commit hooks to be used with a database and its repository')
    .argument('[database]', 'Name of a database linked to a repository')
    .option('-r, --repository <name>', 'Repository to configure, as organization/repository')
    .addOption(new Option('--log-level <level>', 'Verbosity of the output').choices(LOG_LEVELS))
    .action(async (database: string | undefined, options: { repository?: string; logLevel?: string }) => {
      await runPreCommit({ database, ...options });
    });

  return program;
}

/**
 * Reports a failure and exits with code 1.
 */
export function handleError(error: unknown, ui: Ui = createUi()): never {
  if (error instanceof CommandError) {
    ui.error(`❌ ${error.message}`);
  } else {
    ui.error(`❌ Unexpected error: ${ErrorUtils.extractErrorMessage(error)}`);
  }
  process.exit(1);
}

export async function main(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (error) {
    handleError(error);
  }
}
