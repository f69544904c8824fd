export type LedgerErrorCode =
  | 'InsufficientNativeBalance'
  | 'NativeTransferFailed'
  | 'UnknownContract'
  | 'ERC20InsufficientBalance'
  | 'ERC20InsufficientAllowance'
  | 'ERC20InvalidReceiver'
  | 'SignatureExpired'
  | 'InvalidAmount'
  | 'InvalidNonce'
  | 'InvalidSigner'

/**
 * Failure raised by the host or one of its collaborators (tokens, wrapped
 * currency, signature transfers). Aborts the enclosing invocation.
 */
export class LedgerError extends Error {
  constructor(
    public readonly code: LedgerErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'LedgerError'
  }
}
