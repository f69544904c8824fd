import type { Address, FundingPath, SettlementEvent } from '@intentpay/core'

/** Who invoked the engine, and the native value attached to the invocation. */
export interface InvocationContext {
  caller: Address
  value: bigint
}

/**
 * Where engine-owned state reports changes: events go to the host log, undo
 * actions to the active invocation frame so a rolled-back invocation restores them.
 */
export interface StateScope {
  emit(event: SettlementEvent): void
  journal(undo: () => void): void
}

export interface SettlementReceipt {
  fundingPath: FundingPath
  recipient: Address
  receiptToken: Address
  receiptAmount: bigint
  feeBps: bigint
  feeAmount: bigint
  netAmount: bigint
  /** Unspent input returned to the caller (exchange excess or passthrough surplus) */
  excessRefunded: bigint
}
