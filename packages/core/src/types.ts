import type { Address, Hex } from 'viem'

export type { Address, Hex }

// ---- Payment intent (caller-supplied, immutable for one invocation) ----

/** 0 = no exchange (wrap, unwrap or passthrough), 1 = exchange required */
export type ExchangeType = 0 | 1

export const EXCHANGE_TYPE = {
  NONE: 0,
  EXCHANGE: 1,
} as const satisfies Record<string, ExchangeType>

export interface TokenPermissions {
  token: Address
  amount: bigint
}

/** Pre-signed single transfer authorization (Permit2 `PermitTransferFrom`). */
export interface PermitTransferFrom {
  permitted: TokenPermissions
  nonce: bigint
  /** Unix seconds */
  deadline: bigint
}

export interface SignatureTransferDetails {
  to: Address
  requestedAmount: bigint
}

export interface SignatureTransferData {
  isSignatureTransfer: boolean
  permit: PermitTransferFrom
  transferDetails: SignatureTransferDetails
  signature: Hex
}

export interface PaymentIntent {
  /** Quantity of tokenIn the payer commits. Must be positive. */
  amountIn: bigint
  /** Exact quantity of receiptToken owed to the merchant before fee deduction */
  receiptAmount: bigint
  /** Unix seconds after which the intent is void */
  deadline: bigint
  tokenIn: Address
  receiptToken: Address
  exchangeAddress: Address
  exchangeCallData: Hex
  exchangeType: ExchangeType
  paymentReceiver: Address
  receiverCallData: Hex
  signatureTransferData: SignatureTransferData
}

/** Which of the three funding paths an intent takes. */
export type FundingPath = 'native' | 'signature-transfer' | 'allowance'

// ---- Fee configuration ----

export interface FeeConfig {
  /** Basis points, at most MAX_FEE_BPS */
  standardFeeBps: bigint
  /** Per-payee overrides keyed by checksummed address */
  specialFeeBps: ReadonlyMap<Address, bigint>
  feeReceiver: Address
}

// ---- Emitted records ----

export interface PaymentSuccessEvent {
  name: 'PaymentSuccess'
  args: {
    recipient: Address
    /** Net amount delivered to the recipient */
    amount: bigint
    receiptAmount: bigint
    feeAmount: bigint
    receiptToken: Address
  }
}

export interface FeeChangedEvent {
  name: 'FeeChanged'
  args: { rate: bigint }
}

export interface SpecialFeeChangedEvent {
  name: 'SpecialFeeChanged'
  args: { account: Address; rate: bigint }
}

export interface FeeReceiverChangedEvent {
  name: 'FeeReceiverChanged'
  args: { previousReceiver: Address; newReceiver: Address }
}

export interface PausedEvent {
  name: 'Paused'
  args: { account: Address }
}

export interface UnpausedEvent {
  name: 'Unpaused'
  args: { account: Address }
}

export interface OwnershipTransferredEvent {
  name: 'OwnershipTransferred'
  args: { previousOwner: Address; newOwner: Address }
}

export type SettlementEvent =
  | PaymentSuccessEvent
  | FeeChangedEvent
  | SpecialFeeChangedEvent
  | FeeReceiverChangedEvent
  | PausedEvent
  | UnpausedEvent
  | OwnershipTransferredEvent

export interface TransferEvent {
  name: 'Transfer'
  args: { from: Address; to: Address; value: bigint }
}

export interface ApprovalEvent {
  name: 'Approval'
  args: { owner: Address; spender: Address; value: bigint }
}

export interface DepositEvent {
  name: 'Deposit'
  args: { account: Address; value: bigint }
}

export interface WithdrawalEvent {
  name: 'Withdrawal'
  args: { account: Address; value: bigint }
}

export type TokenEvent = TransferEvent | ApprovalEvent | DepositEvent | WithdrawalEvent

export type LedgerEvent = SettlementEvent | TokenEvent

/** A record appended to the host's log by the account at `emitter`. */
export type LogEntry = LedgerEvent & { emitter: Address }
