// ───── Error taxonomy ─────────────────────────────────────────────
// Only ValidationError and TenantNotFoundError ever leave Router.process().
// RemoteModelError is caught inside the reply cascade and turned into the
// deterministic fallback reply.

export type ErrorCode =
  | 'VALIDATION_ERROR'
  | 'TENANT_NOT_FOUND'
  | 'REMOTE_MODEL_ERROR'
  | 'CONFIGURATION_ERROR'
  | 'STATE_CORRUPTION';

export interface ErrorPayload {
  code: ErrorCode;
  message: string;
  context?: Record<string, unknown>;
}

export class RouterError extends Error {
  readonly code: ErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = 'RouterError';
    this.code = code;
    this.context = context;
  }

  toJSON(): ErrorPayload {
    return { code: this.code, message: this.message, context: this.context };
  }
}

export type ValidationIssue = 'empty' | 'too_long' | 'missing_session' | 'missing_tenant';

export class ValidationError extends RouterError {
  readonly issue: ValidationIssue;

  constructor(issue: ValidationIssue, message: string, context?: Record<string, unknown>) {
    super('VALIDATION_ERROR', message, { issue, ...context });
    this.name = 'ValidationError';
    this.issue = issue;
  }
}

export class TenantNotFoundError extends RouterError {
  readonly tenantId: string;

  constructor(tenantId: string) {
    super('TENANT_NOT_FOUND', `Unknown tenant: ${tenantId}`, { tenantId });
    this.name = 'TenantNotFoundError';
    this.tenantId = tenantId;
  }
}

export type RemoteFailureReason = 'timeout' | 'rate_limited' | 'malformed' | 'unavailable' | 'failed';

export class RemoteModelError extends RouterError {
  readonly reason: RemoteFailureReason;

  constructor(reason: RemoteFailureReason, message: string, cause?: unknown) {
    super('REMOTE_MODEL_ERROR', message, { reason }, cause);
    this.name = 'RemoteModelError';
    this.reason = reason;
  }
}

export class ConfigurationError extends RouterError {
  constructor(message: string, context?: Record<string, unknown>) {
    super('CONFIGURATION_ERROR', message, context);
    this.name = 'ConfigurationError';
  }
}

export class StateCorruptionError extends RouterError {
  constructor(sessionId: string, message: string) {
    super('STATE_CORRUPTION', message, { sessionId });
    this.name = 'StateCorruptionError';
  }
}

/** Normalize anything thrown into a RemoteModelError */
export function toRemoteModelError(err: unknown): RemoteModelError {
  if (err instanceof RemoteModelError) return err;
  if (err instanceof Error) {
    if (err.name === 'AbortError' || err.name === 'TimeoutError') {
      return new RemoteModelError('timeout', err.message, err);
    }
    const status = statusOf(err);
    if (status === 429) return new RemoteModelError('rate_limited', err.message, err);
    if (status !== undefined && status >= 500) return new RemoteModelError('unavailable', err.message, err);
    return new RemoteModelError('failed', err.message, err);
  }
  return new RemoteModelError('failed', String(err));
}

function statusOf(err: Error): number | undefined {
  if ('status' in err && typeof err.status === 'number') return err.status;
  return undefined;
}
