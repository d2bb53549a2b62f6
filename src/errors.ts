export type TransferErrorKind =
  | 'ConnectionError'
  | 'DecodeError'
  | 'ProtocolViolation'
  | 'TimeoutError'
  | 'IoError'
  | 'PathSecurityError'

export class TransferError extends Error {
  readonly kind: TransferErrorKind

  constructor(kind: TransferErrorKind, message: string) {
    super(message)
    this.name = 'TransferError'
    this.kind = kind
  }
}

export type DecodeErrorReason = 'Truncated' | 'UnknownTag' | 'Malformed'

export class DecodeError extends TransferError {
  readonly reason: DecodeErrorReason

  constructor(reason: DecodeErrorReason, message: string) {
    super('DecodeError', message)
    this.name = 'DecodeError'
    this.reason = reason
  }
}

export function isTruncated(err: unknown): boolean {
  return err instanceof DecodeError && err.reason === 'Truncated'
}

// Anything thrown inside a session that isn't ours came from the local filesystem
export function toTransferError(err: unknown): TransferError {
  if (err instanceof TransferError) return err
  const message = err instanceof Error ? err.message : String(err)
  return new TransferError('IoError', message)
}
