import { resolve } from 'path';

/**
 * Validation of user-supplied names and paths before they reach git or the
 * filesystem.
 */
export class SecurityValidator {
  /**
   * Dangerous patterns that should be rejected in repository names
   */
  private static readonly DANGEROUS_NAME_PATTERNS = [
    /\.\./,            // Path traversal
    /^-/,              // Option injection
    /[\x00-\x1f\x7f]/, // Control characters including null bytes
    /[;&|`$(){}]/,     // Shell metacharacters
    /\s/               // Whitespace characters
  ];

  /**
   * Validates and sanitizes file system paths to prevent path traversal attacks.
   *
   * @returns Sanitized absolute path
   * @throws {Error} When path traversal is detected
   */
  static validatePath(path: string): string {
    const sanitized = resolve(path);
    if (sanitized.includes('..') || path.includes('..')) {
      throw new Error('Path traversal detected');
    }
    return sanitized;
  }

  /**
   * Validates a repository full name of the form `organization/repository`.
   *
   * @returns The trimmed name
   * @throws {Error} When the name contains dangerous patterns or is not `owner/name`
   */
  static validateRepositoryName(name: string): string {
    const sanitized = name.trim();

    if (this.DANGEROUS_NAME_PATTERNS.some(pattern => pattern.test(sanitized))) {
      throw new Error(`Invalid repository name '${sanitized}': contains dangerous characters`);
    }

    if (!/^[a-zA-Z0-9][a-zA-Z0-9_.-]*\/[a-zA-Z0-9][a-zA-Z0-9_.-]*$/.test(sanitized)) {
      throw new Error(`Invalid repository name '${sanitized}': expected 'organization/repository'`);
    }

    return sanitized.replace(/\.git$/, '');
  }
}

/**
 * Utility functions for consistent error handling across the codebase.
 */
export class ErrorUtils {
  /**
   * Extracts error message from unknown error types consistently.
   */
  static extractErrorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
  }
}
