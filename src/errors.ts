export type PanebridgeErrorCode =
  | 'NO_ACTIVE_SESSION'
  | 'SESSION_UNHEALTHY'
  | 'INJECTION_FAILED'
  | 'QUERY_FAILED'
  | 'TRANSCRIPT_UNAVAILABLE'
  | 'TRANSCRIPT_PARSE';

export class PanebridgeError extends Error {
  constructor(
    message: string,
    public readonly code: PanebridgeErrorCode,
    public readonly context?: Record<string, unknown>,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/** No session descriptor in the environment or the project directory. */
export class NoActiveSessionError extends PanebridgeError {
  constructor(provider: string, hint?: string) {
    super(
      `No active ${provider} session found${hint ? `. ${hint}` : ''}`,
      'NO_ACTIVE_SESSION',
      { provider },
    );
  }
}

export class SessionUnhealthyError extends PanebridgeError {
  constructor(status: string, context?: Record<string, unknown>) {
    super(`Session unhealthy: ${status}`, 'SESSION_UNHEALTHY', context);
  }
}

export class InjectionFailedError extends PanebridgeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'INJECTION_FAILED', context, cause);
  }
}

export class TerminalQueryError extends PanebridgeError {
  constructor(message: string, context?: Record<string, unknown>, cause?: unknown) {
    super(message, 'QUERY_FAILED', context, cause);
  }
}

export class TranscriptUnavailableError extends PanebridgeError {
  constructor(root: string) {
    super(`Transcript not found under ${root}`, 'TRANSCRIPT_UNAVAILABLE', { root });
  }
}

/**
 * Raised while a transcript document is being rewritten. Readers retry on it;
 * it never reaches callers.
 */
export class TranscriptParseError extends PanebridgeError {
  constructor(path: string, cause?: unknown) {
    super(`Transcript could not be parsed: ${path}`, 'TRANSCRIPT_PARSE', { path }, cause);
  }
}

export function isPanebridgeError(error: unknown): error is PanebridgeError {
  return error instanceof PanebridgeError;
}

export function isPermissionError(error: unknown): boolean {
  if (!(error instanceof Error) || !('code' in error)) return false;
  return error.code === 'EACCES' || error.code === 'EPERM';
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
