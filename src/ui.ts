import pc from 'picocolors';

export const LOG_LEVELS = ['debug', 'info', 'warning', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * Minimal writable target for console output (`process.stdout` in the CLI).
 */
export interface UiOutput {
  write(chunk: string): unknown;
  isTTY?: boolean;
}

/**
 * Console handle passed to commands.
 *
 * Log lines below the configured level are dropped. `spinner` wraps a task
 * with an animated line on terminals and a plain line elsewhere, and prints
 * a check mark or a cross once the task settles.
 */
export interface Ui {
  readonly level: LogLevel;
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  /** Writes a raw line whatever the level */
  print(message?: string): void;
  spinner<T>(message: string, task: () => Promise<T>): Promise<T>;
  /** Stops animating so an interactive tool can own the terminal */
  pause(): void;
  resume(): void;
}

type SpinnerState = {
  message: string;
  frameIndex: number;
  interval?: NodeJS.Timeout;
};

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const CLEAR_LINE = '\r\x1b[2K';

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

export function createUi(options: { level?: LogLevel; output?: UiOutput } = {}): Ui {
  const level = options.level ?? 'info';
  const output = options.output ?? process.stdout;
  const spinners: SpinnerState[] = [];
  let paused = false;

  const enabled = (wanted: LogLevel) => LOG_LEVELS.indexOf(wanted) >= LOG_LEVELS.indexOf(level);

  const startFrames = (state: SpinnerState) => {
    if (!output.isTTY || paused || state.interval) return;
    state.interval = setInterval(() => {
      output.write(`\r${pc.blue(FRAMES[state.frameIndex])} ${state.message}`);
      state.frameIndex = (state.frameIndex + 1) % FRAMES.length;
    }, 80);
  };

  const stopFrames = (state: SpinnerState | undefined) => {
    if (!state?.interval) return;
    clearInterval(state.interval);
    state.interval = undefined;
    output.write(CLEAR_LINE);
  };

  const line = (wanted: LogLevel, text: string) => {
    if (!enabled(wanted)) return;
    const current = spinners[spinners.length - 1];
    if (current?.interval) output.write(CLEAR_LINE);
    output.write(`${text}\n`);
  };

  return {
    level,
    debug: (message) => line('debug', pc.dim(`[debug] ${message}`)),
    info: (message) => line('info', pc.gray(message)),
    success: (message) => line('info', pc.green(message)),
    warning: (message) => line('warning', pc.yellow(message)),
    error: (message) => line('error', pc.red(message)),
    print: (message = '') => {
      output.write(`${message}\n`);
    },

    spinner: async <T>(message: string, task: () => Promise<T>): Promise<T> => {
      const visible = enabled('info');
      const state: SpinnerState = { message, frameIndex: 0 };

      if (visible) {
        stopFrames(spinners[spinners.length - 1]);
        spinners.push(state);
        if (output.isTTY) startFrames(state);
        else output.write(`${pc.blue('…')} ${message}\n`);
      }

      const finish = (mark: string) => {
        if (!visible) return;
        stopFrames(state);
        spinners.pop();
        output.write(`${mark}\n`);
        const outer = spinners[spinners.length - 1];
        if (outer) startFrames(outer);
      };

      try {
        const result = await task();
        finish(pc.green(`✓ ${message}`));
        return result;
      } catch (error) {
        finish(pc.red(`✗ ${message}`));
        throw error;
      }
    },

    pause: () => {
      stopFrames(spinners[spinners.length - 1]);
      paused = true;
    },
    resume: () => {
      paused = false;
      const current = spinners[spinners.length - 1];
      if (current) startFrames(current);
    }
  };
}
