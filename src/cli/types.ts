import { z, type ZodType, type ZodTypeDef } from 'zod';
import { createLogger } from '../core/log';

/**
 * Standard CLI result for successful runs
 *
 * Agent-readable output format:
 * - ok: boolean indicating success/failure
 * - command: the command that was executed
 * - timestamp: ISO 8601 timestamp
 * - duration_ms: execution time in milliseconds
 * - everything else: command-specific result data
 */
export interface CLIResult {
  ok: true;
  command?: string;
  timestamp?: string;
  duration_ms?: number;
  [key: string]: unknown;
}

/**
 * Standard CLI error
 *
 * - reason: machine-readable error code
 * - message: human-readable description
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

export type CLIHandler<TInput = unknown> = (input: TInput) => Promise<CLIResult | CLIError>;

/**
 * Handler registration with schema and handler function
 */
export interface HandlerRegistration<TInput = unknown> {
  schema: ZodType<TInput, ZodTypeDef, unknown>;
  handler: CLIHandler<TInput>;
}

/** Registration with its input type erased, so the registry can hold any command. */
export interface RegisteredHandler {
  execute(rawInput: unknown): Promise<CLIResult | CLIError>;
}

export function registerHandler<TInput>(registration: HandlerRegistration<TInput>): RegisteredHandler {
  return {
    execute: async (rawInput) => registration.handler(registration.schema.parse(rawInput)),
  };
}

/**
 * Execute a CLI handler with validation and error handling
 *
 * Exit codes: 0 on completion, 2 when the handler reports an error (setup
 * failures), 1 for invalid arguments or unexpected exceptions.
 *
 * @example
 * ```typescript
 * .action(async (options) => {
 *   await executeHandler('rrf', options);
 * })
 * ```
 */
export async function executeHandler(
  commandKey: string,
  rawInput: unknown
): Promise<void> {
  const { cliHandlers } = await import('./registry');
  const startedAt = Date.now();
  const timestamp = new Date().toISOString();

  const handler = cliHandlers[commandKey];
  if (!handler) {
    console.error(JSON.stringify(
      {
        ok: false,
        reason: 'unknown_command',
        command: commandKey,
        timestamp,
        hint: 'Run "retrieval-harness --help" to see available commands'
      },
      null,
      2
    ));
    process.exit(1);
    return;
  }

  const log = createLogger({ component: 'cli', cmd: commandKey });

  try {
    const result = await handler.execute(rawInput);
    const duration_ms = Date.now() - startedAt;

    if (result.ok) {
      console.log(JSON.stringify({ ...result, command: commandKey, timestamp, duration_ms }, null, 2));
      process.exit(0);
    } else {
      process.stderr.write(JSON.stringify({ ...result, command: commandKey, timestamp, duration_ms }, null, 2) + '\n');
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
          hint: ErrorHints[ErrorReasons.VALIDATION_ERROR],
        },
        null,
        2
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
        hint: 'An unexpected error occurred. Check logs for details.'
      },
      null,
      2
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

export function isCLIError(value: unknown): value is CLIError {
  return typeof value === 'object' && value !== null && 'ok' in value && value.ok === false;
}

/**
 * Common error reasons for consistent agent handling
 */
export const ErrorReasons = {
  CONFIG_INVALID: 'config_invalid',
  INFERENCE_UNREACHABLE: 'inference_unreachable',
  STORE_UNAVAILABLE: 'store_unavailable',
  CORPUS_INVALID: 'corpus_invalid',
  QUERIES_INVALID: 'queries_invalid',
  GROUND_TRUTH_MISMATCH: 'ground_truth_mismatch',
  VALIDATION_ERROR: 'validation_error',
  INTERNAL_ERROR: 'internal_error',
} as const;

/**
 * Common hints for error resolution
 */
export const ErrorHints: Record<string, string> = {
  config_invalid: 'Check the HARNESS_* environment variables',
  inference_unreachable: 'Start the inference server or point HARNESS_INFERENCE_URL at it',
  store_unavailable: 'Check that the temp directory is writable, or run with --store memory',
  corpus_invalid: 'Check the corpus file passed with --corpus (or data/corpus.json)',
  queries_invalid: 'Check the query file passed with --queries (or data/queries.json)',
  ground_truth_mismatch: 'Every relevant cluster named by a query must exist in the corpus',
  validation_error: 'Check command syntax with --help',
};
