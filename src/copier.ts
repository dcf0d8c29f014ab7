import fs from 'fs-extra';
import { join } from 'path';
import { parse } from 'yaml';
import { runTool } from './utils/exec.js';

/** Answers recorded by Copier at the root of a templated repository */
export const COPIER_ANSWERS_FILE = '.copier-answers.yml';

export type TemplateData = Record<string, string>;

type CommonOptions = {
  /** Directory receiving the rendered files */
  destination: string;
  /** Hide Copier's own output */
  quiet: boolean;
  /** Values passed to the template, skipping the matching questions */
  data: TemplateData;
  /** Allow the template to run its tasks and migrations */
  unsafe: boolean;
  /** Use default answers instead of prompting */
  defaults: boolean;
};

export type CopyOptions = CommonOptions & {
  /** Replace existing files without asking */
  overwrite: boolean;
};

// `copier update` always overwrites, and takes no `--overwrite` flag
export type UpdateOptions = CommonOptions & {
  /** Answers file, relative to the destination */
  answersFile: string;
};

/**
 * Scaffolding of files from a template repository.
 */
export interface TemplatingEngine {
  /** Renders `source` into the destination, prompting unless `defaults` is set */
  copy(source: string, options: CopyOptions): Promise<void>;
  /** Re-applies the template recorded in the answers file */
  update(options: UpdateOptions): Promise<void>;
}

function commonFlags(options: CommonOptions): string[] {
  const flags = Object.entries(options.data).flatMap(([key, value]) => ['--data', `${key}=${value}`]);
  if (options.unsafe) flags.push('--trust');
  if (options.quiet) flags.push('--quiet');
  if (options.defaults) flags.push('--defaults');
  return flags;
}

export function copyArgs(source: string, options: CopyOptions): string[] {
  return [
    'copy',
    ...commonFlags(options),
    ...(options.overwrite ? ['--overwrite'] : []),
    source,
    options.destination
  ];
}

export function updateArgs(options: UpdateOptions): string[] {
  return [
    'update',
    ...commonFlags(options),
    '--answers-file',
    options.answersFile,
    options.destination
  ];
}

/**
 * `TemplatingEngine` backed by the `copier` executable.
 *
 * Copies run interactively so the user can answer the template questions;
 * updates capture the output and report it on failure.
 */
export class CopierTemplating implements TemplatingEngine {
  async copy(source: string, options: CopyOptions): Promise<void> {
    await runTool('copier', copyArgs(source, options), { interactive: !options.defaults });
  }

  async update(options: UpdateOptions): Promise<void> {
    await runTool('copier', updateArgs(options), { interactive: !options.defaults });
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads the Copier answers recorded in a repository.
 *
 * @returns The answers, or `null` when the repository has no answers file
 * @throws {Error} When the file is not a YAML mapping
 */
export async function readAnswers(repositoryPath: string): Promise<Record<string, unknown> | null> {
  const file = join(repositoryPath, COPIER_ANSWERS_FILE);
  if (!(await fs.pathExists(file))) {
    return null;
  }

  const answers: unknown = parse(await fs.readFile(file, 'utf8'));
  if (!isRecord(answers)) {
    throw new Error(`Invalid answers file ${file}: expected a mapping`);
  }
  return answers;
}
