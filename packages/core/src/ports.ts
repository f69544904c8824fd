/**
 * Contracts the settlement core expects from its collaborators.
 * Every state-changing call names its sender: the account the host attributes the call to.
 */

import type { Address, Hex } from 'viem'
import type { LogEntry, PermitTransferFrom, SignatureTransferDetails } from './types'

export interface FungibleToken {
  readonly address: Address
  balanceOf(account: Address): Promise<bigint>
  allowance(owner: Address, spender: Address): Promise<bigint>
  approve(sender: Address, spender: Address, amount: bigint): Promise<void>
  transfer(sender: Address, to: Address, amount: bigint): Promise<void>
  transferFrom(spender: Address, from: Address, to: Address, amount: bigint): Promise<void>
}

/** Wrapped representation of the native currency, 1:1 with native balance. */
export interface WrappedNativeToken extends FungibleToken {
  /** Converts `value` of the sender's native balance into wrapped tokens. */
  deposit(sender: Address, value: bigint): Promise<void>
  /** Burns wrapped tokens and pays the same native value back to the sender. */
  withdraw(sender: Address, amount: bigint): Promise<void>
}

/** Signature-authorized transfers: a payer pre-signs instead of keeping a standing allowance. */
export interface SignatureTransfer {
  readonly address: Address
  permitTransferFrom(
    spender: Address,
    permit: PermitTransferFrom,
    transferDetails: SignatureTransferDetails,
    owner: Address,
    signature: Hex,
  ): Promise<void>
}

export interface CallRequest {
  from: Address
  to: Address
  value: bigint
  data: Hex
}

export type CallResult = { ok: true } | { ok: false; error: unknown }

/** Context handed to code deployed at an address when it is called. */
export interface CallContext {
  self: Address
  sender: Address
  value: bigint
  data: Hex
}

export type CallHandler = (ctx: CallContext) => Promise<void>

export interface InvocationFrame {
  from: Address
  to: Address
  value: bigint
}

/**
 * The runtime that executes one invocation atomically.
 * Effects of a failed frame (balances, logs, journaled state) are rolled back as a unit.
 */
export interface ExecutionHost {
  transact<T>(frame: InvocationFrame, fn: () => Promise<T>): Promise<T>
  /** Opaque call with arbitrary payload. Target failure is reported, not thrown. */
  call(request: CallRequest): Promise<CallResult>
  /** Unix seconds */
  now(): bigint
  nativeBalanceOf(account: Address): bigint
  token(address: Address): FungibleToken
  wrappedNativeToken(address: Address): WrappedNativeToken
  signatureTransfer(address: Address): SignatureTransfer
  emit(entry: LogEntry): void
  /** Registers an undo action with the active frame; runs if that frame rolls back. */
  journal(undo: () => void): void
}
