// Error types and the tagged result returned by the "safe" conversation calls.

export type SafeResult<T, E = TransportError> =
  | {readonly ok: true; readonly value: T}
  | {readonly ok: false; readonly error: E}

export function ok<T>(value: T): SafeResult<T, never> {
  return {ok: true, value}
}

export function err<E>(error: E): SafeResult<never, E> {
  return {ok: false, error}
}

export class ChatweaveError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly cause?: unknown
  ) {
    super(message)
    this.name = 'ChatweaveError'
  }
}

/** The backend could not be reached or answered with a non-2xx status. */
export class TransportError extends ChatweaveError {
  constructor(
    message: string,
    public readonly status?: number,
    cause?: unknown
  ) {
    super(message, 'TRANSPORT_ERROR', cause)
    this.name = 'TransportError'
  }
}

export class TurnInProgressError extends ChatweaveError {
  constructor() {
    super('A turn is already in progress for this conversation.', 'TURN_IN_PROGRESS')
    this.name = 'TurnInProgressError'
  }
}

export class ConfigError extends ChatweaveError {
  constructor(message: string, cause?: unknown) {
    super(message, 'CONFIG_ERROR', cause)
    this.name = 'ConfigError'
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

export function toTransportError(error: unknown, prefix = 'Transport failure'): TransportError {
  if (error instanceof TransportError) return error
  const status = statusOf(error)
  return new TransportError(`${prefix}: ${errorMessage(error)}`, status, error)
}

function statusOf(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null || !('status' in error)) return undefined
  return typeof error.status === 'number' ? error.status : undefined
}
