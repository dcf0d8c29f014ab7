import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { CommandError } from './errors.js';
import { LOG_LEVELS, type LogLevel } from './ui.js';

/**
 * Environment variables read by the CLI, with their defaults.
 */
const EnvSchema = z.object({
  ODOO_DEV_REPOSITORIES: z.string().min(1).default(join(homedir(), 'odoo', 'repositories')),
  ODOO_DEV_DATABASES: z.string().min(1).default(join(homedir(), '.config', 'odoo-dev', 'databases.json')),
  ODOO_DEV_GIT_REMOTE: z.string().min(1).default('git@github.com:'),
  ODOO_DEV_LOG_LEVEL: z
    .string()
    .transform(value => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('info')
});

export type Config = {
  /** Directory holding local clones, as `<dir>/<organization>/<repository>` */
  repositoriesDir: string;
  /** JSON registry of known databases */
  databasesFile: string;
  /** Prefix prepended to `organization/repository.git` to build clone URLs */
  gitRemote: string;
  logLevel: LogLevel;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new CommandError('configuration', `Invalid configuration: ${issues}`);
  }

  return {
    repositoriesDir: parsed.data.ODOO_DEV_REPOSITORIES,
    databasesFile: parsed.data.ODOO_DEV_DATABASES,
    gitRemote: parsed.data.ODOO_DEV_GIT_REMOTE,
    logLevel: parsed.data.ODOO_DEV_LOG_LEVEL
  };
}
