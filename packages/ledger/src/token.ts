import { maxUint256, zeroAddress, type Address } from 'viem'
import type { FungibleToken } from '@intentpay/core'
import { LedgerError } from './errors'
import type { InMemoryLedger } from './ledger'

/** ERC-20 token whose balances and allowances live in the ledger's journaled store. */
export class InMemoryToken implements FungibleToken {
  constructor(
    protected readonly ledger: InMemoryLedger,
    readonly address: Address,
    readonly symbol: string = 'TKN',
    readonly decimals: number = 18,
  ) {
    ledger.registerToken(this)
  }

  private balanceSlot(account: Address): string {
    return `${this.address.toLowerCase()}:balance:${account.toLowerCase()}`
  }

  private allowanceSlot(owner: Address, spender: Address): string {
    return `${this.address.toLowerCase()}:allowance:${owner.toLowerCase()}:${spender.toLowerCase()}`
  }

  async balanceOf(account: Address): Promise<bigint> {
    return this.ledger.read(this.balanceSlot(account))
  }

  async allowance(owner: Address, spender: Address): Promise<bigint> {
    return this.ledger.read(this.allowanceSlot(owner, spender))
  }

  async approve(sender: Address, spender: Address, amount: bigint): Promise<void> {
    this.ledger.write(this.allowanceSlot(sender, spender), amount)
    this.ledger.emit({ emitter: this.address, name: 'Approval', args: { owner: sender, spender, value: amount } })
  }

  async transfer(sender: Address, to: Address, amount: bigint): Promise<void> {
    this.move(sender, to, amount)
  }

  async transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void> {
    const allowed = this.ledger.read(this.allowanceSlot(from, spender))
    if (allowed < amount) {
      throw new LedgerError(
        'ERC20InsufficientAllowance',
        `${spender} may spend ${allowed} ${this.symbol} of ${from}, needs ${amount}`,
      )
    }
    // An unlimited allowance is never decremented.
    if (allowed !== maxUint256) this.ledger.write(this.allowanceSlot(from, spender), allowed - amount)
    this.move(from, to, amount)
  }

  /** Setup helper: creates `amount` tokens for `to`. */
  mint(to: Address, amount: bigint): void {
    this.credit(to, amount)
    this.ledger.emit({ emitter: this.address, name: 'Transfer', args: { from: zeroAddress, to, value: amount } })
  }

  protected credit(account: Address, amount: bigint): void {
    const slot = this.balanceSlot(account)
    this.ledger.write(slot, this.ledger.read(slot) + amount)
  }

  protected debit(account: Address, amount: bigint): void {
    const slot = this.balanceSlot(account)
    const balance = this.ledger.read(slot)
    if (balance < amount) {
      throw new LedgerError('ERC20InsufficientBalance', `${account} holds ${balance} ${this.symbol}, needs ${amount}`)
    }
    this.ledger.write(slot, balance - amount)
  }

  private move(from: Address, to: Address, amount: bigint): void {
    if (to.toLowerCase() === zeroAddress) {
      throw new LedgerError('ERC20InvalidReceiver', `Cannot transfer ${this.symbol} to the null address`)
    }
    this.debit(from, amount)
    this.credit(to, amount)
    this.ledger.emit({ emitter: this.address, name: 'Transfer', args: { from, to, value: amount } })
  }
}
