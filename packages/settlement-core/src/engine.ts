import { getAddress, type Address } from 'viem'
import {
  EMPTY_CALL_DATA,
  EXCHANGE_TYPE,
  calculateFee,
  formatBps,
  fundingPathOf,
  isEmptyCallData,
  isNativeToken,
  isNullAddress,
  type ExecutionHost,
  type FeeConfig,
  type FundingPath,
  type PaymentIntent,
  type SignatureTransfer,
  type WrappedNativeToken,
} from '@intentpay/core'
import {
  createMetricsRegistry,
  createSilentLogger,
  type Counter,
  type Histogram,
  type MetricsRegistry,
  type StructuredLogger,
} from '@intentpay/observability'
import { Ownable } from './access-control'
import { CircuitBreaker } from './circuit-breaker'
import { SettlementError, failureCode } from './errors'
import { FeeGovernance } from './fee-governance'
import { ReentrancyGuard } from './reentrancy-guard'
import type { InvocationContext, SettlementReceipt, StateScope } from './types'
import { validatePaymentIntent } from './validation'

export interface SettlementEngineOptions {
  host: ExecutionHost
  /** The engine's own account on the host */
  address: Address
  owner: Address
  /** Signature-authorized transfer service */
  signatureTransfer: Address
  wrappedNative: Address
  feeReceiver: Address
  standardFeeBps: bigint
  logger?: StructuredLogger
  metrics?: MetricsRegistry
}

/**
 * What the engine holds after funds acquisition. `token` is the native sentinel
 * when native value is held as-is; `wrapped` marks native value the engine wrapped itself.
 */
interface HeldAsset {
  token: Address
  wrapped: boolean
}

type GovernanceAction =
  | 'set_standard_fee'
  | 'set_special_fee'
  | 'set_fee_receiver'
  | 'pause'
  | 'unpause'
  | 'transfer_ownership'

function requireAddress(label: string, account: Address): Address {
  if (isNullAddress(account)) throw new SettlementError('InvalidAddress', `${label} cannot be the null address`)
  return getAddress(account)
}

/**
 * Settles a payment intent in one atomic invocation: acquire the payer's funds,
 * optionally route them through an exchange, return any unspent input, then pay
 * the fee receiver and the merchant.
 */
export class PaymentSettlementEngine {
  readonly address: Address
  readonly metrics: MetricsRegistry

  private readonly host: ExecutionHost
  private readonly access: Ownable
  private readonly breaker: CircuitBreaker
  private readonly guard = new ReentrancyGuard()
  private readonly fees: FeeGovernance
  private readonly wrappedNative: WrappedNativeToken
  private readonly signatureTransfer: SignatureTransfer
  private readonly logger: StructuredLogger
  private readonly settlements: Counter
  private readonly settlementDuration: Histogram
  private readonly governanceChanges: Counter

  constructor(options: SettlementEngineOptions) {
    this.host = options.host
    this.address = requireAddress('Engine address', options.address)
    const signatureTransfer = requireAddress('Signature transfer service', options.signatureTransfer)
    const wrappedNative = requireAddress('Wrapped native token', options.wrappedNative)

    const scope: StateScope = {
      emit: (event) => this.host.emit({ ...event, emitter: this.address }),
      journal: (undo) => this.host.journal(undo),
    }
    this.access = new Ownable(options.owner, scope)
    this.breaker = new CircuitBreaker(this.access, scope)
    this.fees = new FeeGovernance(this.access, scope, {
      standardFeeBps: options.standardFeeBps,
      feeReceiver: options.feeReceiver,
    })
    this.wrappedNative = this.host.wrappedNativeToken(wrappedNative)
    this.signatureTransfer = this.host.signatureTransfer(signatureTransfer)

    this.logger = (options.logger ?? createSilentLogger()).child({ component: 'settlement-engine', engine: this.address })
    this.metrics = options.metrics ?? createMetricsRegistry()
    this.settlements = this.metrics.counter('settlements_total', 'Settlement invocations by outcome and failure code')
    this.settlementDuration = this.metrics.histogram('settlement_duration_ms', 'Wall-clock settlement duration')
    this.governanceChanges = this.metrics.counter('governance_changes_total', 'Applied governance changes by action')
  }

  // ---- Read surface ----

  owner(): Address {
    return this.access.owner()
  }

  isPaused(): boolean {
    return this.breaker.isPaused()
  }

  getServiceFee(account: Address): bigint {
    return this.fees.resolveFee(account)
  }

  feeConfig(): FeeConfig {
    return this.fees.snapshot()
  }

  // ---- Governance surface ----

  setServiceFeePercent(caller: Address, rate: bigint): Promise<void> {
    return this.govern(caller, 'set_standard_fee', () => this.fees.setStandardFee(caller, rate))
  }

  setSpecialFee(caller: Address, account: Address, rate: bigint): Promise<void> {
    return this.govern(caller, 'set_special_fee', () => this.fees.setSpecialFee(caller, account, rate))
  }

  setFeeReceiver(caller: Address, receiver: Address): Promise<void> {
    return this.govern(caller, 'set_fee_receiver', () => this.fees.setFeeReceiver(caller, receiver))
  }

  pause(caller: Address): Promise<void> {
    return this.govern(caller, 'pause', () => this.breaker.pause(caller))
  }

  unpause(caller: Address): Promise<void> {
    return this.govern(caller, 'unpause', () => this.breaker.unpause(caller))
  }

  transferOwnership(caller: Address, newOwner: Address): Promise<void> {
    return this.govern(caller, 'transfer_ownership', () => this.access.transferOwnership(caller, newOwner))
  }

  private async govern(caller: Address, action: GovernanceAction, apply: () => void): Promise<void> {
    try {
      await this.host.transact({ from: caller, to: this.address, value: 0n }, async () => apply())
    } catch (err) {
      this.logger.warn('Governance change rejected', { action, caller, code: failureCode(err) }, err)
      throw err
    }
    this.governanceChanges.inc({ action })
    this.logger.info('Governance change applied', { action, caller })
  }

  // ---- Settlement entry point ----

  async settle(ctx: InvocationContext, intent: PaymentIntent): Promise<SettlementReceipt> {
    const stopTimer = this.settlementDuration.startTimer()
    const log = this.logger.child({
      caller: ctx.caller,
      recipient: intent.paymentReceiver,
      tokenIn: intent.tokenIn,
      receiptToken: intent.receiptToken,
    })
    log.debug('Settlement started', {
      amountIn: intent.amountIn,
      receiptAmount: intent.receiptAmount,
      exchangeType: intent.exchangeType,
    })

    try {
      const receipt = await this.host.transact({ from: ctx.caller, to: this.address, value: ctx.value }, () =>
        this.guard.run(() => this.execute(ctx, intent)),
      )
      stopTimer({ outcome: 'success' })
      this.settlements.inc({ outcome: 'success', code: 'none' })
      log.info('Payment settled', {
        fundingPath: receipt.fundingPath,
        netAmount: receipt.netAmount,
        feeAmount: receipt.feeAmount,
        feeRate: formatBps(receipt.feeBps),
        excessRefunded: receipt.excessRefunded,
      })
      return receipt
    } catch (err) {
      const code = failureCode(err)
      stopTimer({ outcome: 'failure' })
      this.settlements.inc({ outcome: 'failure', code })
      log.warn('Settlement failed', { code }, err)
      throw err
    }
  }

  private async execute(ctx: InvocationContext, intent: PaymentIntent): Promise<SettlementReceipt> {
    this.breaker.assertNotPaused()
    validatePaymentIntent(intent, ctx.value, this.host.now())

    const fundingPath = fundingPathOf(intent)
    const held = await this.acquireFunds(ctx, intent, fundingPath)

    let excessRefunded = 0n
    if (intent.exchangeType === EXCHANGE_TYPE.EXCHANGE) {
      excessRefunded = await this.executeExchange(ctx, intent, held)
    } else if (intent.amountIn > intent.receiptAmount) {
      excessRefunded = intent.amountIn - intent.receiptAmount
      await this.sweepExcess(ctx, intent, held, excessRefunded)
    }

    if (isNativeToken(intent.receiptToken) && !isNativeToken(held.token)) {
      await this.wrappedNative.withdraw(this.address, intent.receiptAmount)
    }

    return { fundingPath, excessRefunded, ...(await this.payout(intent)) }
  }

  private async acquireFunds(ctx: InvocationContext, intent: PaymentIntent, path: FundingPath): Promise<HeldAsset> {
    switch (path) {
      case 'native':
        // Exchanges and token receipts operate on the wrapped form.
        if (!isNativeToken(intent.receiptToken) || intent.exchangeType === EXCHANGE_TYPE.EXCHANGE) {
          await this.wrappedNative.deposit(this.address, intent.amountIn)
          return { token: this.wrappedNative.address, wrapped: true }
        }
        return { token: intent.tokenIn, wrapped: false }
      case 'signature-transfer': {
        const { permit, transferDetails, signature } = intent.signatureTransferData
        await this.signatureTransfer.permitTransferFrom(this.address, permit, transferDetails, ctx.caller, signature)
        return { token: intent.tokenIn, wrapped: false }
      }
      case 'allowance':
        await this.host.token(intent.tokenIn).transferFrom(this.address, ctx.caller, this.address, intent.amountIn)
        return { token: intent.tokenIn, wrapped: false }
    }
  }

  /**
   * Runs the exchange call and returns the unspent input to the caller.
   * The spend is measured from the engine's balance before and after the call;
   * the exchange's own return data is ignored.
   */
  private async executeExchange(ctx: InvocationContext, intent: PaymentIntent, held: HeldAsset): Promise<bigint> {
    if (isNullAddress(intent.exchangeAddress)) {
      throw new SettlementError('InvalidExchangeAddress', 'Exchange address is the null address')
    }

    const token = this.host.token(held.token)
    const balanceBefore = await token.balanceOf(this.address)
    const allowance = await token.allowance(this.address, intent.exchangeAddress)
    await token.approve(this.address, intent.exchangeAddress, allowance + intent.amountIn)

    const result = await this.host.call({
      from: this.address,
      to: intent.exchangeAddress,
      value: 0n,
      data: intent.exchangeCallData,
    })
    if (!result.ok) {
      throw new SettlementError('ExchangeCallFailed', `Exchange call to ${intent.exchangeAddress} failed`, {
        exchange: intent.exchangeAddress,
      }, { cause: result.error })
    }

    const balanceAfter = await token.balanceOf(this.address)
    const actualSpent = balanceBefore - balanceAfter
    if (actualSpent < 0n || actualSpent > intent.amountIn) {
      throw new SettlementError('ExchangeCallFailed', `Exchange spent ${actualSpent} of an approved ${intent.amountIn}`, {
        exchange: intent.exchangeAddress,
        actualSpent,
      })
    }

    const excess = intent.amountIn - actualSpent
    if (excess > 0n) await this.sweepExcess(ctx, intent, held, excess)
    return excess
  }

  /** Returns unspent input to the caller in the form it was paid in. */
  private async sweepExcess(ctx: InvocationContext, intent: PaymentIntent, held: HeldAsset, amount: bigint): Promise<void> {
    if (!isNativeToken(intent.tokenIn)) {
      await this.host.token(held.token).transfer(this.address, ctx.caller, amount)
      return
    }

    if (held.wrapped) await this.wrappedNative.withdraw(this.address, amount)
    const result = await this.host.call({ from: this.address, to: ctx.caller, value: amount, data: EMPTY_CALL_DATA })
    if (!result.ok) {
      throw new SettlementError('SweepExcessNativeFailed', `Returning ${amount} native to ${ctx.caller} failed`, {
        amount,
      }, { cause: result.error })
    }
  }

  private async payout(intent: PaymentIntent) {
    const feeBps = this.fees.resolveFee(intent.paymentReceiver)
    const feeAmount = calculateFee(intent.receiptAmount, feeBps)
    const netAmount = intent.receiptAmount - feeAmount
    const feeReceiver = this.fees.feeReceiver()

    if (isNativeToken(intent.receiptToken)) {
      if (feeAmount > 0n) {
        const fee = await this.host.call({ from: this.address, to: feeReceiver, value: feeAmount, data: EMPTY_CALL_DATA })
        if (!fee.ok) {
          throw new SettlementError('ServiceFeeNativePaymentFailed', `Paying the service fee to ${feeReceiver} failed`, {
            feeReceiver,
          }, { cause: fee.error })
        }
      }
      const paid = await this.host.call({
        from: this.address,
        to: intent.paymentReceiver,
        value: netAmount,
        data: intent.receiverCallData,
      })
      if (!paid.ok) {
        throw new SettlementError('ReceiverNativePaymentFailed', `Paying ${intent.paymentReceiver} failed`, {
          receiver: intent.paymentReceiver,
        }, { cause: paid.error })
      }
    } else {
      const token = this.host.token(intent.receiptToken)
      if (feeAmount > 0n) await token.transfer(this.address, feeReceiver, feeAmount)
      await token.transfer(this.address, intent.paymentReceiver, netAmount)

      if (!isEmptyCallData(intent.receiverCallData)) {
        const callback = await this.host.call({
          from: this.address,
          to: intent.paymentReceiver,
          value: 0n,
          data: intent.receiverCallData,
        })
        if (!callback.ok) {
          throw new SettlementError('ReceiverCallFailed', `Receiver callback on ${intent.paymentReceiver} failed`, {
            receiver: intent.paymentReceiver,
          }, { cause: callback.error })
        }
      }
    }

    this.host.emit({
      emitter: this.address,
      name: 'PaymentSuccess',
      args: {
        recipient: intent.paymentReceiver,
        amount: netAmount,
        receiptAmount: intent.receiptAmount,
        feeAmount,
        receiptToken: intent.receiptToken,
      },
    })

    return {
      recipient: intent.paymentReceiver,
      receiptToken: intent.receiptToken,
      receiptAmount: intent.receiptAmount,
      feeBps,
      feeAmount,
      netAmount,
    }
  }
}
