import { isNativeToken, type PaymentIntent } from '@intentpay/core'
import { SettlementError } from './errors'

/**
 * Entry checks on a payment intent, in order: amount, attached native value, deadline.
 * Addresses and the receipt side are not checked here; bad ones fail downstream.
 */
export function validatePaymentIntent(intent: PaymentIntent, value: bigint, now: bigint): void {
  if (intent.amountIn === 0n) {
    throw new SettlementError('InvalidPaymentAmount', 'amountIn must be positive')
  }

  if (isNativeToken(intent.tokenIn)) {
    if (value !== intent.amountIn) {
      throw new SettlementError(
        'InvalidNativePaymentAmount',
        `Attached value ${value} does not match amountIn ${intent.amountIn}`,
        { value, amountIn: intent.amountIn },
      )
    }
  } else if (value !== 0n) {
    // Token payments carry no native value.
    throw new SettlementError('InvalidNativePaymentAmount', `Token payment carries native value ${value}`, { value })
  }

  if (now > intent.deadline) {
    throw new SettlementError('PaymentExpired', `Intent expired at ${intent.deadline}`, {
      deadline: intent.deadline,
      now,
    })
  }
}
