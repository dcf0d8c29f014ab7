import { CommandError } from './errors.js';
import type { DatabaseStore } from './database.js';
import type { Target } from './types.js';
import { ErrorUtils, SecurityValidator } from './utils/security.js';

export type TargetOptions = {
  database?: string;
  repository?: string;
};

/**
 * Turns the `database` argument and `--repository` option into a {@link Target}.
 *
 * Exactly one of them must be given. A database must be registered and linked
 * to a repository. Nothing is written before these checks pass.
 *
 * @throws {CommandError} `configuration` errors for every rejected combination
 */
export async function resolveTarget(options: TargetOptions, store: DatabaseStore): Promise<Target> {
  const { database, repository } = options;

  if (database && repository) {
    throw new CommandError('configuration', 'Arguments database and --repository are mutually exclusive');
  }

  if (repository) {
    return { kind: 'repository', name: validName(repository) };
  }

  if (!database) {
    throw new CommandError('configuration', 'Either a database or --repository is required');
  }

  const record = await store.get(database);
  if (!record) {
    throw new CommandError('configuration', `Database '${database}' not found`);
  }

  if (!record.repository) {
    throw new CommandError('configuration', `No repository linked to database '${record.name}'`);
  }

  validName(record.repository.fullName);
  return { kind: 'database', database: record };
}

/**
 * Full name of the repository a target points to.
 */
export function repositoryName(target: Target): string {
  if (target.kind === 'repository') {
    return target.name;
  }

  if (!target.database.repository) {
    throw new CommandError('configuration', `No repository linked to database '${target.database.name}'`);
  }
  return target.database.repository.fullName;
}

function validName(name: string): string {
  try {
    return SecurityValidator.validateRepositoryName(name);
  } catch (error) {
    throw new CommandError('configuration', ErrorUtils.extractErrorMessage(error), { cause: error });
  }
}
