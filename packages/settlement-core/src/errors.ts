export type SettlementErrorCode =
  // input validation
  | 'InvalidPaymentAmount'
  | 'InvalidNativePaymentAmount'
  | 'PaymentExpired'
  | 'InvalidExchangeAddress'
  | 'InvalidServiceFeePercent'
  | 'InvalidAddress'
  // collaborator failure
  | 'ExchangeCallFailed'
  | 'SweepExcessNativeFailed'
  | 'ServiceFeeNativePaymentFailed'
  | 'ReceiverNativePaymentFailed'
  | 'ReceiverCallFailed'
  // operational state
  | 'OwnableUnauthorizedAccount'
  | 'EnforcedPause'
  | 'ExpectedPause'
  | 'ReentrantCall'
  // configuration
  | 'InvalidConfiguration'

/**
 * Failure of a settlement or governance invocation.
 * Nothing is recovered locally: the host rolls the whole invocation back and the
 * caller sees the code.
 */
export class SettlementError extends Error {
  constructor(
    public readonly code: SettlementErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {},
    options?: { cause?: unknown },
  ) {
    super(message, options)
    this.name = 'SettlementError'
  }
}

export function isSettlementError(err: unknown, code?: SettlementErrorCode): err is SettlementError {
  return err instanceof SettlementError && (code === undefined || err.code === code)
}

/** Code used to label a failure in logs and metrics. */
export function failureCode(err: unknown): string {
  if (isSettlementError(err)) return err.code
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code
  return 'unknown'
}
