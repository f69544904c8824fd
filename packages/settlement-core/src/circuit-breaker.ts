import type { Address } from 'viem'
import type { AccessControl } from './access-control'
import { SettlementError } from './errors'
import type { StateScope } from './types'

export class CircuitBreaker {
  private paused = false

  constructor(
    private readonly access: AccessControl,
    private readonly scope: StateScope,
  ) {}

  isPaused(): boolean {
    return this.paused
  }

  assertNotPaused(): void {
    if (this.paused) throw new SettlementError('EnforcedPause', 'Settlement is paused')
  }

  pause(caller: Address): void {
    this.access.assertAuthorized(caller)
    this.assertNotPaused()
    this.set(true)
    this.scope.emit({ name: 'Paused', args: { account: caller } })
  }

  unpause(caller: Address): void {
    this.access.assertAuthorized(caller)
    if (!this.paused) throw new SettlementError('ExpectedPause', 'Settlement is not paused')
    this.set(false)
    this.scope.emit({ name: 'Unpaused', args: { account: caller } })
  }

  private set(paused: boolean): void {
    this.paused = paused
    this.scope.journal(() => {
      this.paused = !paused
    })
  }
}
