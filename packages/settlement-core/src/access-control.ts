import { getAddress, isAddressEqual, type Address } from 'viem'
import { isNullAddress } from '@intentpay/core'
import { SettlementError } from './errors'
import type { StateScope } from './types'

/** Role check injected into every governance component. */
export interface AccessControl {
  assertAuthorized(caller: Address): void
}

/** Single-principal ownership: exactly one account may govern at any time. */
export class Ownable implements AccessControl {
  private current: Address

  constructor(owner: Address, private readonly scope: StateScope) {
    if (isNullAddress(owner)) throw new SettlementError('InvalidAddress', 'Owner cannot be the null address')
    this.current = getAddress(owner)
  }

  owner(): Address {
    return this.current
  }

  assertAuthorized(caller: Address): void {
    if (!isAddressEqual(caller, this.current)) {
      throw new SettlementError('OwnableUnauthorizedAccount', `${caller} is not the owner`, { account: caller })
    }
  }

  transferOwnership(caller: Address, newOwner: Address): void {
    this.assertAuthorized(caller)
    if (isNullAddress(newOwner)) throw new SettlementError('InvalidAddress', 'New owner cannot be the null address')

    const previousOwner = this.current
    this.current = getAddress(newOwner)
    this.scope.journal(() => {
      this.current = previousOwner
    })
    this.scope.emit({ name: 'OwnershipTransferred', args: { previousOwner, newOwner: this.current } })
  }
}
