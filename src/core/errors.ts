export type SetupReason =
  | 'config_invalid'
  | 'inference_unreachable'
  | 'store_unavailable'
  | 'corpus_invalid'
  | 'queries_invalid'
  | 'ground_truth_mismatch';

/**
 * Raised before any work starts when a run cannot proceed.
 * Handlers turn it into a CLI error result.
 */
export class SetupError extends Error {
  readonly reason: SetupReason;
  readonly details?: Record<string, unknown>;

  constructor(reason: SetupReason, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'SetupError';
    this.reason = reason;
    this.details = details;
  }
}

export class InferenceError extends Error {
  readonly transient: boolean;
  readonly status?: number;

  constructor(message: string, options: { transient: boolean; status?: number; cause?: unknown }) {
    super(message, { cause: options.cause });
    this.name = 'InferenceError';
    this.transient = options.transient;
    this.status = options.status;
  }
}

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ECONNREFUSED', 'ETIMEDOUT', 'EPIPE', 'EAI_AGAIN', 'UND_ERR_SOCKET', 'UND_ERR_CONNECT_TIMEOUT']);

function readCode(e: unknown): string | undefined {
  if (typeof e !== 'object' || e === null) return undefined;
  const code = 'code' in e ? e.code : undefined;
  return typeof code === 'string' ? code : undefined;
}

/** Connection resets, timeouts and 5xx responses are worth retrying. */
export function isTransientError(e: unknown): boolean {
  if (e instanceof InferenceError) return e.transient;
  if (e instanceof Error) {
    if (e.name === 'TimeoutError' || e.name === 'AbortError') return true;
    const code = readCode(e) ?? readCode(e.cause);
    if (code && TRANSIENT_CODES.has(code)) return true;
  }
  return false;
}
