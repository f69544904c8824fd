import { AsyncLocalStorage } from 'node:async_hooks'
import type { Address } from 'viem'
import type {
  CallHandler,
  CallRequest,
  CallResult,
  ExecutionHost,
  FungibleToken,
  InvocationFrame,
  LogEntry,
  SignatureTransfer,
  WrappedNativeToken,
} from '@intentpay/core'
import { LedgerError } from './errors'

interface Frame {
  undo: Array<() => void>
}

export interface LedgerOptions {
  chainId?: number
  /** Initial block time in unix seconds */
  timestamp?: bigint
}

export interface LogFilter {
  name?: LogEntry['name']
  emitter?: Address
}

function key(account: Address): string {
  return account.toLowerCase()
}

/**
 * In-process execution host.
 *
 * State lives in a slot map with an undo log per frame. Top-level invocations are
 * queued and run one at a time; an invocation started from inside another one
 * (a sub-call, or a reentrant call) runs immediately as a savepoint of its parent.
 */
export class InMemoryLedger implements ExecutionHost {
  readonly chainId: number
  private timestamp: bigint
  private readonly slots = new Map<string, bigint>()
  private readonly entries: LogEntry[] = []
  private readonly code = new Map<string, CallHandler>()
  private readonly tokens = new Map<string, FungibleToken>()
  private readonly wrappedTokens = new Map<string, WrappedNativeToken>()
  private readonly authorizers = new Map<string, SignatureTransfer>()
  private readonly frames = new AsyncLocalStorage<Frame>()
  private tail: Promise<void> = Promise.resolve()

  constructor(options: LedgerOptions = {}) {
    this.chainId = options.chainId ?? 31337
    this.timestamp = options.timestamp ?? 1_700_000_000n
  }

  // ---- Storage ----

  read(slot: string): bigint {
    return this.slots.get(slot) ?? 0n
  }

  write(slot: string, value: bigint): void {
    const previous = this.slots.get(slot)
    if (value === 0n) this.slots.delete(slot)
    else this.slots.set(slot, value)
    this.journal(() => {
      if (previous === undefined) this.slots.delete(slot)
      else this.slots.set(slot, previous)
    })
  }

  journal(undo: () => void): void {
    this.frames.getStore()?.undo.push(undo)
  }

  /** True while an invocation is executing in the current async context. */
  inInvocation(): boolean {
    return this.frames.getStore() !== undefined
  }

  // ---- Invocations ----

  transact<T>(frame: InvocationFrame, fn: () => Promise<T>): Promise<T> {
    if (this.inInvocation()) return this.runFrame(frame, fn)
    return this.serialize(() => this.runFrame(frame, fn))
  }

  async call(request: CallRequest): Promise<CallResult> {
    try {
      await this.transact(request, async () => {
        const handler = this.code.get(key(request.to))
        if (handler) {
          await handler({ self: request.to, sender: request.from, value: request.value, data: request.data })
        }
      })
      return { ok: true }
    } catch (error) {
      return { ok: false, error }
    }
  }

  private serialize<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn)
    this.tail = result.then(
      () => undefined,
      () => undefined,
    )
    return result
  }

  private runFrame<T>(frame: InvocationFrame, fn: () => Promise<T>): Promise<T> {
    const parent = this.frames.getStore()
    const current: Frame = { undo: [] }
    return this.frames.run(current, async () => {
      try {
        this.moveNative(frame.from, frame.to, frame.value)
        const result = await fn()
        // Committing a savepoint hands its undo log to the parent frame.
        if (parent) parent.undo.push(...current.undo)
        return result
      } catch (err) {
        for (let i = current.undo.length - 1; i >= 0; i--) current.undo[i]()
        throw err
      }
    })
  }

  // ---- Native currency ----

  nativeBalanceOf(account: Address): bigint {
    return this.read(`native:${key(account)}`)
  }

  setNativeBalance(account: Address, value: bigint): void {
    this.write(`native:${key(account)}`, value)
  }

  moveNative(from: Address, to: Address, value: bigint): void {
    if (value === 0n) return
    const balance = this.nativeBalanceOf(from)
    if (balance < value) {
      throw new LedgerError('InsufficientNativeBalance', `${from} holds ${balance}, needs ${value}`)
    }
    this.setNativeBalance(from, balance - value)
    this.setNativeBalance(to, this.nativeBalanceOf(to) + value)
  }

  // ---- Contracts ----

  deploy(address: Address, handler: CallHandler): void {
    this.code.set(key(address), handler)
  }

  registerToken(token: FungibleToken): void {
    this.tokens.set(key(token.address), token)
  }

  registerWrappedNative(token: WrappedNativeToken): void {
    this.tokens.set(key(token.address), token)
    this.wrappedTokens.set(key(token.address), token)
  }

  registerSignatureTransfer(service: SignatureTransfer): void {
    this.authorizers.set(key(service.address), service)
  }

  token(address: Address): FungibleToken {
    const token = this.tokens.get(key(address))
    if (!token) throw new LedgerError('UnknownContract', `No token at ${address}`)
    return token
  }

  wrappedNativeToken(address: Address): WrappedNativeToken {
    const token = this.wrappedTokens.get(key(address))
    if (!token) throw new LedgerError('UnknownContract', `No wrapped native token at ${address}`)
    return token
  }

  signatureTransfer(address: Address): SignatureTransfer {
    const service = this.authorizers.get(key(address))
    if (!service) throw new LedgerError('UnknownContract', `No signature transfer service at ${address}`)
    return service
  }

  // ---- Clock ----

  now(): bigint {
    return this.timestamp
  }

  setTime(timestamp: bigint): void {
    this.timestamp = timestamp
  }

  advanceTime(seconds: bigint): void {
    this.timestamp += seconds
  }

  // ---- Logs ----

  emit(entry: LogEntry): void {
    this.entries.push(entry)
    this.journal(() => {
      this.entries.pop()
    })
  }

  logs(filter: LogFilter = {}): LogEntry[] {
    return this.entries.filter(
      (entry) =>
        (filter.name === undefined || entry.name === filter.name) &&
        (filter.emitter === undefined || key(entry.emitter) === key(filter.emitter)),
    )
  }
}
