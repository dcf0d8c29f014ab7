import { execa, ExecaError } from 'execa';
import { ExternalToolError } from '../errors.js';

export interface RunToolOptions {
  /** Working directory of the child process */
  cwd?: string;
  /** Variables added to the inherited environment of the child only */
  env?: Record<string, string>;
  /** Hand the terminal over to the tool (prompts, colors); output is not captured */
  interactive?: boolean;
}

/**
 * Runs an external executable and returns its trimmed standard output.
 *
 * Blocks until the tool exits; no timeout is applied. A non-zero exit status,
 * a signal or a missing executable is reported as {@link ExternalToolError}
 * carrying whatever the tool wrote to stderr.
 */
export async function runTool(
  tool: string,
  args: string[],
  options: RunToolOptions = {}
): Promise<string> {
  try {
    const { stdout } = await execa(tool, args, {
      cwd: options.cwd,
      env: options.env,
      stdio: options.interactive ? 'inherit' : 'pipe',
      shell: false // Explicitly disable shell interpretation
    });
    return typeof stdout === 'string' ? stdout.trim() : '';
  } catch (error) {
    if (error instanceof ExecaError) {
      const stderr = typeof error.stderr === 'string' ? error.stderr.trim() : '';
      throw new ExternalToolError(tool, error.shortMessage, stderr, error.exitCode);
    }
    throw error;
  }
}
