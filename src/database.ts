import fs from 'fs-extra';
import { z } from 'zod';
import { CommandError } from './errors.js';
import type { DatabaseRecord } from './types.js';
import { ErrorUtils } from './utils/security.js';

const DatabaseSchema = z.object({
  name: z.string().min(1),
  version: z.string().min(1).nullish(),
  repository: z.object({ fullName: z.string().min(1) }).nullish()
});

const RegistrySchema = z.object({
  databases: z.array(DatabaseSchema).default([])
});

/**
 * Lookup of databases by name.
 */
export interface DatabaseStore {
  get(name: string): Promise<DatabaseRecord | null>;
}

/**
 * Database registry stored as a JSON file:
 *
 * ```json
 * { "databases": [{ "name": "client-17", "version": "17.0", "repository": { "fullName": "odoo-ps/client-project" } }] }
 * ```
 *
 * A missing file is an empty registry.
 */
export class JsonDatabaseStore implements DatabaseStore {
  constructor(private readonly file: string) {}

  async list(): Promise<DatabaseRecord[]> {
    if (!(await fs.pathExists(this.file))) {
      return [];
    }

    let content: unknown;
    try {
      content = await fs.readJson(this.file);
    } catch (error) {
      throw new CommandError(
        'configuration',
        `Invalid database registry ${this.file}: ${ErrorUtils.extractErrorMessage(error)}`,
        { cause: error }
      );
    }

    const parsed = RegistrySchema.safeParse(content);
    if (!parsed.success) {
      throw new CommandError(
        'configuration',
        `Invalid database registry ${this.file}: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`
      );
    }

    return parsed.data.databases.map(database => ({
      name: database.name,
      version: database.version ?? null,
      repository: database.repository ?? null
    }));
  }

  async get(name: string): Promise<DatabaseRecord | null> {
    const databases = await this.list();
    return databases.find(database => database.name === name) ?? null;
  }
}
