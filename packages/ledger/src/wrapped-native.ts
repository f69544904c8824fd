import type { Address } from 'viem'
import type { WrappedNativeToken } from '@intentpay/core'
import { LedgerError } from './errors'
import type { InMemoryLedger } from './ledger'
import { InMemoryToken } from './token'

/** Wrapped native currency: every wrapped unit is backed by one native unit it holds. */
export class InMemoryWrappedNative extends InMemoryToken implements WrappedNativeToken {
  constructor(ledger: InMemoryLedger, address: Address) {
    super(ledger, address, 'WETH', 18)
    ledger.registerWrappedNative(this)
  }

  async deposit(sender: Address, value: bigint): Promise<void> {
    this.ledger.moveNative(sender, this.address, value)
    this.credit(sender, value)
    this.ledger.emit({ emitter: this.address, name: 'Deposit', args: { account: sender, value } })
  }

  async withdraw(sender: Address, amount: bigint): Promise<void> {
    this.debit(sender, amount)
    this.ledger.emit({ emitter: this.address, name: 'Withdrawal', args: { account: sender, value: amount } })
    const result = await this.ledger.call({ from: this.address, to: sender, value: amount, data: '0x' })
    if (!result.ok) {
      throw new LedgerError('NativeTransferFailed', `Withdrawal of ${amount} to ${sender} failed`, { cause: result.error })
    }
  }
}
