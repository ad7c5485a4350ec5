/**
 * Error type definitions for the helpdesk assistant
 *
 * These custom error classes provide:
 * - Actionable error messages with recovery hints
 * - Exit codes for the CLI
 * - Type safety for error handling logic
 */

/**
 * Base class for all application errors.
 *
 * hint tells the user how to fix the problem; code is the CLI exit code.
 */
export class CLIError extends Error {
  /** Recovery suggestion shown to the user */
  public readonly hint?: string;

  /** Exit code (1-255, 0 is reserved for success) */
  public readonly code: number;

  constructor(message: string, hint?: string, code: number = 1) {
    super(message);
    // Required for instanceof checks after transpilation
    Object.setPrototypeOf(this, new.target.prototype);
    this.name = 'CLIError';
    this.hint = hint;
    this.code = code;
  }
}

/**
 * Thrown when a file or directory doesn't exist.
 *
 * Exit code 3: File not found
 */
export class FileNotFoundError extends CLIError {
  constructor(path: string) {
    super(`Path does not exist: ${path}`, 'Check the path and try again', 3);
    this.name = 'FileNotFoundError';
  }
}

/**
 * Thrown for configuration-related errors.
 *
 * Examples:
 * - Invalid TOML syntax
 * - Values outside the schema's ranges
 * - Unknown config keys
 *
 * Exit code 2: Configuration error
 */
export class ConfigError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Run: helpdesk config list  to see valid options', 2);
    this.name = 'ConfigError';
  }
}

/**
 * Thrown when an API key is missing or malformed.
 *
 * Exit code 4: API key error
 */
export class APIKeyError extends CLIError {
  /** Provider whose key is missing */
  public readonly provider: string;

  constructor(provider: string, envVar?: string, detail?: string) {
    const envVarName = envVar ?? `${provider.toUpperCase()}_API_KEY`;
    super(
      detail ?? `${provider} API key not configured`,
      `Set the ${envVarName} environment variable (or add it to .env)`,
      4
    );
    this.name = 'APIKeyError';
    this.provider = provider;
  }
}

/**
 * Thrown for database-related errors.
 *
 * Wraps SQLite errors with user-friendly messages.
 *
 * Exit code 5: Database error
 */
export class DatabaseError extends CLIError {
  /** The original database error for debugging */
  public readonly cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message, 'Try running: helpdesk index --force  to rebuild the index', 5);
    this.name = 'DatabaseError';
    this.cause = cause;
  }
}

/**
 * Thrown when input validation fails.
 *
 * Used with Zod schemas to provide detailed field-level errors.
 *
 * Exit code 1: General error (validation is user input error)
 */
export class ValidationError extends CLIError {
  /** Individual validation issues */
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    const hint =
      issues.length > 0
        ? `Issues:\n  ${issues.join('\n  ')}`
        : 'Check your input and try again';
    super(message, hint, 1);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

/**
 * Thrown when the knowledge base cannot be loaded or yields no chunks.
 *
 * Fatal at construction: the chatbot cannot serve queries without an index.
 *
 * Exit code 6: Knowledge base error
 */
export class KnowledgeBaseError extends CLIError {
  constructor(message: string, hint?: string) {
    super(message, hint ?? 'Check knowledge_base.path in your config', 6);
    this.name = 'KnowledgeBaseError';
  }
}

/**
 * Category of an upstream (LLM or embedding API) failure.
 */
export type UpstreamErrorKind =
  | 'network'
  | 'timeout'
  | 'quota'
  | 'auth'
  | 'api'
  | 'cancelled'
  | 'malformed';

/**
 * Thrown when a completion or embedding call fails.
 *
 * Query-time code catches these and applies its fallback.
 *
 * Exit code 7: Upstream service error
 */
export class UpstreamServiceError extends CLIError {
  public readonly kind: UpstreamErrorKind;
  public readonly provider: string;
  public readonly cause?: unknown;

  constructor(provider: string, kind: UpstreamErrorKind, message: string, cause?: unknown) {
    super(`${provider}: ${message}`, UPSTREAM_HINTS[kind], 7);
    this.name = 'UpstreamServiceError';
    this.provider = provider;
    this.kind = kind;
    this.cause = cause;
  }
}

const UPSTREAM_HINTS: Record<UpstreamErrorKind, string> = {
  network: 'Check your internet connection and try again',
  timeout: 'The provider is slow to respond; raise llm.timeout_ms or embedding.timeout_ms',
  quota: 'Rate limit or quota exceeded; wait a moment or check your plan',
  auth: 'The provider rejected the API key; check the key in your environment',
  api: 'The provider returned an error; try again later',
  cancelled: 'The request was cancelled',
  malformed: 'The provider returned an unexpected response',
};
