import { getAddress, type Address } from 'viem'
import { MAX_FEE_BPS, isNullAddress, type FeeConfig } from '@intentpay/core'
import type { AccessControl } from './access-control'
import { SettlementError } from './errors'
import type { StateScope } from './types'

function assertFeeRate(rate: bigint): void {
  if (rate < 0n || rate > MAX_FEE_BPS) {
    throw new SettlementError('InvalidServiceFeePercent', `Fee rate ${rate} bps is outside 0..${MAX_FEE_BPS}`, { rate })
  }
}

function assertNotNull(label: string, account: Address): void {
  if (isNullAddress(account)) throw new SettlementError('InvalidAddress', `${label} cannot be the null address`)
}

export interface FeeGovernanceInit {
  standardFeeBps: bigint
  feeReceiver: Address
}

/**
 * Standard fee rate, per-payee overrides and the fee receiver.
 * A special rate of zero means "no override": the standard rate applies.
 */
export class FeeGovernance {
  private standardFeeBps: bigint
  private receiver: Address
  private readonly specialFeeBps = new Map<Address, bigint>()

  constructor(
    private readonly access: AccessControl,
    private readonly scope: StateScope,
    init: FeeGovernanceInit,
  ) {
    assertFeeRate(init.standardFeeBps)
    assertNotNull('Fee receiver', init.feeReceiver)
    this.standardFeeBps = init.standardFeeBps
    this.receiver = getAddress(init.feeReceiver)
  }

  resolveFee(account: Address): bigint {
    const special = this.specialFeeBps.get(getAddress(account)) ?? 0n
    return special !== 0n ? special : this.standardFeeBps
  }

  feeReceiver(): Address {
    return this.receiver
  }

  snapshot(): FeeConfig {
    return {
      standardFeeBps: this.standardFeeBps,
      specialFeeBps: new Map(this.specialFeeBps),
      feeReceiver: this.receiver,
    }
  }

  setStandardFee(caller: Address, rate: bigint): void {
    this.access.assertAuthorized(caller)
    assertFeeRate(rate)

    const previous = this.standardFeeBps
    this.standardFeeBps = rate
    this.scope.journal(() => {
      this.standardFeeBps = previous
    })
    this.scope.emit({ name: 'FeeChanged', args: { rate } })
  }

  setSpecialFee(caller: Address, account: Address, rate: bigint): void {
    this.access.assertAuthorized(caller)
    assertNotNull('Account', account)
    assertFeeRate(rate)

    const key = getAddress(account)
    const previous = this.specialFeeBps.get(key)
    if (rate === 0n) this.specialFeeBps.delete(key)
    else this.specialFeeBps.set(key, rate)
    this.scope.journal(() => {
      if (previous === undefined) this.specialFeeBps.delete(key)
      else this.specialFeeBps.set(key, previous)
    })
    this.scope.emit({ name: 'SpecialFeeChanged', args: { account: key, rate } })
  }

  setFeeReceiver(caller: Address, receiver: Address): void {
    this.access.assertAuthorized(caller)
    assertNotNull('Fee receiver', receiver)

    const previousReceiver = this.receiver
    this.receiver = getAddress(receiver)
    this.scope.journal(() => {
      this.receiver = previousReceiver
    })
    this.scope.emit({ name: 'FeeReceiverChanged', args: { previousReceiver, newReceiver: this.receiver } })
  }
}
