export type EngineErrorCode =
  | 'LOOKUP_FAILED'
  | 'NOT_FOUND'
  | 'TRANSCODE_FAILED'
  | 'INVALID_POSITION'
  | 'TRANSPORT_ERROR'
  | 'VOICE_CONNECT_FAILED'
  | 'PLAYER_CLOSED'
  | 'CANCELLED'
  | 'INTERNAL';

export class EngineError extends Error {
  constructor(
    message: string,
    public readonly code: EngineErrorCode,
    public readonly tenantId?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EngineError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class LookupFailedError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'LOOKUP_FAILED', undefined, options);
    this.name = 'LookupFailedError';
  }
}

export class NotFoundError extends EngineError {
  constructor(public readonly query: string) {
    super(`No songs found for "${query}"`, 'NOT_FOUND');
    this.name = 'NotFoundError';
  }
}

export class TranscodeFailedError extends EngineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'TRANSCODE_FAILED', undefined, options);
    this.name = 'TranscodeFailedError';
  }
}

export class InvalidPositionError extends EngineError {
  constructor(public readonly position: number, public readonly pending: number, tenantId?: string) {
    super(`Position ${position} is outside 1..${pending}`, 'INVALID_POSITION', tenantId);
    this.name = 'InvalidPositionError';
  }
}

export class TransportError extends EngineError {
  constructor(message: string, tenantId?: string, options?: { cause?: unknown }) {
    super(message, 'TRANSPORT_ERROR', tenantId, options);
    this.name = 'TransportError';
  }
}

export class VoiceConnectError extends EngineError {
  constructor(message: string, tenantId?: string, options?: { cause?: unknown }) {
    super(message, 'VOICE_CONNECT_FAILED', tenantId, options);
    this.name = 'VoiceConnectError';
  }
}

export class PlayerClosedError extends EngineError {
  constructor(tenantId: string) {
    super(`Player for tenant ${tenantId} is closed`, 'PLAYER_CLOSED', tenantId);
    this.name = 'PlayerClosedError';
  }
}

export class CancelledError extends EngineError {
  constructor(message = 'Operation cancelled') {
    super(message, 'CANCELLED');
    this.name = 'CancelledError';
  }
}

export function isCancellation(error: unknown): boolean {
  return error instanceof CancelledError
    || (error instanceof Error && error.name === 'AbortError');
}

/**
 * Normalizes anything thrown into an EngineError, keeping the original as cause.
 */
export function toEngineError(error: unknown, tenantId?: string): EngineError {
  if (error instanceof EngineError) return error;
  if (isCancellation(error)) return new CancelledError();
  const message = error instanceof Error ? error.message : String(error);
  return new EngineError(message, 'INTERNAL', tenantId, { cause: error });
}

/**
 * Shape used in structured log lines.
 */
export function describeError(error: unknown): { name: string; message: string; code?: string } {
  if (error instanceof EngineError) {
    return { name: error.name, message: error.message, code: error.code };
  }
  if (error instanceof Error) {
    return { name: error.name, message: error.message };
  }
  return { name: 'Unknown', message: String(error) };
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new CancelledError();
}
