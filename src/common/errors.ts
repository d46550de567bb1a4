/**
 * COMMON — Error taxonomy
 *
 * Every failure the bot knows about is an AppError with a stable `code`.
 * Only ConfigMissingError is fatal; everything else is scoped to a single
 * pipeline run or a single send.
 */

export class AppError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

// ═══════════════════════════════════════════════════════════════
// STARTUP
// ═══════════════════════════════════════════════════════════════

export class ConfigMissingError extends AppError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super('CONFIG_MISSING', `Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

// ═══════════════════════════════════════════════════════════════
// PIPELINE (recoverable)
// ═══════════════════════════════════════════════════════════════

export class UpstreamUnavailableError extends AppError {
  readonly status?: number;
  readonly retryable: boolean;

  constructor(message: string, opts: { status?: number; retryable?: boolean; cause?: unknown } = {}) {
    super('UPSTREAM_UNAVAILABLE', message, { cause: opts.cause });
    this.status = opts.status;
    this.retryable = opts.retryable ?? true;
  }
}

export class MalformedResponseError extends AppError {
  constructor(message: string) {
    super('MALFORMED_RESPONSE', message);
  }
}

export class RenderError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('RENDER_ERROR', message, options);
  }
}

// ═══════════════════════════════════════════════════════════════
// TELEGRAM
// ═══════════════════════════════════════════════════════════════

export class TelegramApiError extends AppError {
  readonly method: string;
  readonly errorCode?: number;

  constructor(method: string, description: string, errorCode?: number, options?: { cause?: unknown }) {
    super('TELEGRAM_API_ERROR', `${method}: ${description}`, options);
    this.method = method;
    this.errorCode = errorCode;
  }
}

export type DeliveryFailureReason = 'EMPTY_PAYLOAD' | 'REJECTED';

export class DeliveryFailedError extends AppError {
  readonly reason: DeliveryFailureReason;

  constructor(reason: DeliveryFailureReason, message: string, options?: { cause?: unknown }) {
    super('DELIVERY_FAILED', message, options);
    this.reason = reason;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
