/**
 * Database known to the tool, as recorded in the database registry.
 *
 * @example
 * ```typescript
 * const database: DatabaseRecord = {
 *   name: 'client-17',
 *   version: '17.0',
 *   repository: { fullName: 'odoo-ps/client-project' }
 * };
 * ```
 */
export type DatabaseRecord = {
  name: string;
  /** Odoo series the database runs, when known */
  version: string | null;
  /** Repository holding the custom addons of the database */
  repository: { fullName: string } | null;
};

/**
 * What a command operates on: exactly one of a database or a repository.
 */
export type Target =
  | { kind: 'database'; database: DatabaseRecord }
  | { kind: 'repository'; name: string };
