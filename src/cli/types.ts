import { z } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result interface for successful operations
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - repoRoot: repository root path (when applicable)
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 */
export interface CLIResult {
  ok: true;
  command?: string;
  repoRoot?: string;
  timestamp?: string;
  duration_ms?: number;
  /** Printed instead of the JSON result when present. */
  textOutput?: string;
  [key: string]: unknown;
}

/**
 * Standard CLI error interface
 *
 * - reason: machine-readable error code
 * - message: human-readable error description
 * - hint: optional suggestion for resolution
 */
export interface CLIError {
  ok: false;
  reason: string;
  message?: string;
  command?: string;
  timestamp?: string;
  hint?: string;
  [key: string]: unknown;
}

export type CLIOutcome = CLIResult | CLIError;

/**
 * CLI handler function signature
 * @template TInput - Validated input type (from Zod schema)
 */
export type CLIHandler<TInput> = (input: TInput) => Promise<CLIOutcome>;

/** Input schema whose raw side is whatever commander hands over. */
export type InputSchema<TInput> = z.ZodType<TInput, z.ZodTypeDef, unknown>;

/**
 * Handler registration: validates raw input with its schema, then runs the
 * handler. Validation failures reject with `z.ZodError`.
 */
export interface HandlerRegistration {
  run(rawInput: unknown): Promise<CLIOutcome>;
}

export function registerHandler<TInput>(schema: InputSchema<TInput>, handler: CLIHandler<TInput>): HandlerRegistration {
  return {
    run: async (rawInput) => handler(schema.parse(rawInput)),
  };
}

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

/**
 * Execute a CLI handler with validation and error handling. Exits 0 on
 * success, 2 on a handled failure and 1 on invalid input or an unexpected
 * error.
 *
 * @example
 * ```typescript
 * .action(async (prefix, options) => {
 *   await executeHandler('find', { prefix, ...options });
 * })
 * ```
 */
export async function executeHandler(commandKey: string, rawInput: unknown): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: ErrorReasons.UNKNOWN_COMMAND,
        command: commandKey,
        timestamp,
        hint: 'Run "refgraph --help" to see available commands',
      },
      null,
      2,
    ));
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.run(rawInput);
    const duration_ms = Date.now() - startedAt;
    const agentResult = { ...result, command: commandKey, timestamp, duration_ms };

    if (result.ok) {
      // handlers set textOutput only when plain text was asked for
      console.log(typeof result.textOutput === 'string' ? result.textOutput : JSON.stringify(agentResult, null, 2));
      process.exit(0);
    } else {
      process.stderr.write(JSON.stringify(agentResult, null, 2) + '\n');
      process.exit(2);
    }
  } catch (e) {
    const duration_ms = Date.now() - startedAt;

    if (e instanceof z.ZodError) {
      const errors = e.issues.map((err: z.ZodIssue) => ({
        path: err.path.join('.'),
        message: err.message,
        code: err.code,
      }));

      console.error(JSON.stringify(
        {
          ok: false,
          reason: ErrorReasons.VALIDATION_ERROR,
          message: 'Invalid command arguments',
          command: commandKey,
          timestamp,
          duration_ms,
          errors,
          hint: ErrorHints.VALIDATION_ERROR,
        },
        null,
        2,
      ));
      process.exit(1);
      return;
    }

    const errorDetails = e instanceof Error
      ? { name: e.name, message: e.message, stack: e.stack }
      : { message: String(e) };

    log.error(commandKey, { ok: false, err: errorDetails });

    console.error(JSON.stringify(
      {
        ok: false,
        reason: ErrorReasons.INTERNAL_ERROR,
        message: e instanceof Error ? e.message : String(e),
        command: commandKey,
        timestamp,
        duration_ms,
        hint: 'An unexpected error occurred. Check logs for details.',
      },
      null,
      2,
    ));
    process.exit(1);
  }
}

/**
 * Create a success result with agent-readable metadata
 */
export function success(data: Record<string, unknown>): CLIResult {
  return {
    ok: true,
    ...data,
  };
}

/**
 * Create an error result with agent-readable metadata
 */
export function error(reason: string, details?: Record<string, unknown>): CLIError {
  return {
    ok: false,
    reason,
    ...details,
  };
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  UNKNOWN_COMMAND: 'unknown_command',
  REPO_NOT_FOUND: 'repo_not_found',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
  INDEX_FAILED: 'index_failed',
  GRAPH_NOT_READY: 'graph_not_ready',
  SYMBOL_NOT_FOUND: 'symbol_not_found',
  FILE_NOT_FOUND: 'file_not_found',
  RENAME_FAILED: 'rename_failed',
  MIGRATION_FAILED: 'migration_failed',
  PATCH_NO_MATCH: 'patch_no_match',
  PATCH_FAILED: 'patch_failed',
  OUTSIDE_REPO: 'outside_repo',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints = {
  REPO_NOT_FOUND: 'Check the --path argument',
  VALIDATION_ERROR: 'Check command syntax with --help',
  GRAPH_NOT_READY: 'Run "refgraph index" to build the cross-reference graph',
  SYMBOL_NOT_FOUND: 'Check the name with "refgraph find <prefix>"',
  PATCH_NO_MATCH: 'The search text must match the file exactly, whitespace included',
} as const;
