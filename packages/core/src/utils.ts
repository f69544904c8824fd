import { getAddress, isAddressEqual, size, zeroAddress, type Address, type Hex } from 'viem'
import { BPS_DENOMINATOR, EMPTY_CALL_DATA, NATIVE_TOKEN } from './constants'
import type { ExchangeType, FundingPath, PaymentIntent, SignatureTransferData } from './types'

export function isNativeToken(token: Address): boolean {
  return isAddressEqual(token, NATIVE_TOKEN)
}

export function isNullAddress(account: Address): boolean {
  return isAddressEqual(account, zeroAddress)
}

export function isEmptyCallData(data: Hex): boolean {
  return size(data) === 0
}

/**
 * Fee owed on `amount` at `bps` basis points, rounded down.
 * Input: 990n, 80n
 * Output: 7n
 */
export function calculateFee(amount: bigint, bps: bigint): bigint {
  return (amount * bps) / BPS_DENOMINATOR
}

/**
 * Format a basis-point rate as a percentage for display.
 * Input: 80n → "0.8%", 100n → "1%", 5n → "0.05%"
 */
export function formatBps(bps: bigint): string {
  const whole = bps / 100n
  const frac = (bps % 100n).toString().padStart(2, '0').replace(/0+$/, '')
  return frac ? `${whole}.${frac}%` : `${whole}%`
}

/** Funding path an intent takes: decided by tokenIn first, then the signature-transfer flag. */
export function fundingPathOf(intent: Pick<PaymentIntent, 'tokenIn' | 'signatureTransferData'>): FundingPath {
  if (isNativeToken(intent.tokenIn)) return 'native'
  if (intent.signatureTransferData.isSignatureTransfer) return 'signature-transfer'
  return 'allowance'
}

export function disabledSignatureTransfer(): SignatureTransferData {
  return {
    isSignatureTransfer: false,
    permit: { permitted: { token: zeroAddress, amount: 0n }, nonce: 0n, deadline: 0n },
    transferDetails: { to: zeroAddress, requestedAmount: 0n },
    signature: EMPTY_CALL_DATA,
  }
}

export interface BuildPaymentIntentParams {
  amountIn: bigint
  receiptAmount: bigint
  deadline: bigint
  tokenIn: Address
  receiptToken: Address
  paymentReceiver: Address
  exchangeType?: ExchangeType
  exchangeAddress?: Address
  exchangeCallData?: Hex
  receiverCallData?: Hex
  signatureTransferData?: SignatureTransferData
}

/**
 * Build a PaymentIntent, filling the optional exchange, callback and
 * signature-transfer fields with their "not used" values.
 */
export function buildPaymentIntent(params: BuildPaymentIntentParams): PaymentIntent {
  return {
    amountIn: params.amountIn,
    receiptAmount: params.receiptAmount,
    deadline: params.deadline,
    tokenIn: getAddress(params.tokenIn),
    receiptToken: getAddress(params.receiptToken),
    paymentReceiver: getAddress(params.paymentReceiver),
    exchangeType: params.exchangeType ?? 0,
    exchangeAddress: params.exchangeAddress ? getAddress(params.exchangeAddress) : zeroAddress,
    exchangeCallData: params.exchangeCallData ?? EMPTY_CALL_DATA,
    receiverCallData: params.receiverCallData ?? EMPTY_CALL_DATA,
    signatureTransferData: params.signatureTransferData ?? disabledSignatureTransfer(),
  }
}
