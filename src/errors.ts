/**
 * Category of a command failure.
 *
 * - `configuration`: bad argument combination or missing repository link,
 *   raised before any side effect
 * - `resolution`: something the workflow needs could not be determined
 *   (Odoo version, cloned repository)
 * - `external`: an invoked tool (git, Copier, pre-commit) failed
 */
export type CommandErrorKind = 'configuration' | 'resolution' | 'external';

/**
 * User-facing error raised by a command.
 *
 * The CLI entry point prints its message and exits with code 1.
 *
 * @example
 * ```typescript
 * throw new CommandError('configuration', `No repository linked to database 'demo'`);
 * ```
 */
export class CommandError extends Error {
  constructor(
    public readonly kind: CommandErrorKind,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'CommandError';
  }
}

/**
 * Failure of an external executable, with its captured standard error.
 */
export class ExternalToolError extends Error {
  constructor(
    public readonly tool: string,
    message: string,
    public readonly stderr: string,
    public readonly exitCode?: number
  ) {
    super(message);
    this.name = 'ExternalToolError';
  }
}

/**
 * Git failure while setting aside (`stash`) or bringing back (`restore`)
 * uncommitted changes around a templating run.
 */
export class StashError extends ExternalToolError {
  constructor(
    public readonly phase: 'stash' | 'restore',
    error: unknown
  ) {
    super(
      'git',
      error instanceof Error ? error.message : String(error),
      error instanceof ExternalToolError ? error.stderr : '',
      error instanceof ExternalToolError ? error.exitCode : undefined
    );
    this.name = 'StashError';
  }
}
