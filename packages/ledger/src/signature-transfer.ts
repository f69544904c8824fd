import { verifyTypedData, type Address, type Hex } from 'viem'
import {
  permitTransferFromTypedData,
  type PermitTransferFrom,
  type SignatureTransfer,
  type SignatureTransferDetails,
} from '@intentpay/core'
import { LedgerError } from './errors'
import type { InMemoryLedger } from './ledger'

/**
 * Permit2-style signature transfers. The owner signs EIP-712 typed data naming
 * the token, the maximum amount, the spender, a one-time nonce and a deadline;
 * tokens move through the owner's allowance to this service.
 */
export class InMemorySignatureTransfer implements SignatureTransfer {
  constructor(
    private readonly ledger: InMemoryLedger,
    readonly address: Address,
  ) {
    ledger.registerSignatureTransfer(this)
  }

  private nonceSlot(owner: Address, nonce: bigint): string {
    return `${this.address.toLowerCase()}:nonce:${owner.toLowerCase()}:${nonce}`
  }

  isNonceUsed(owner: Address, nonce: bigint): boolean {
    return this.ledger.read(this.nonceSlot(owner, nonce)) !== 0n
  }

  async permitTransferFrom(
    spender: Address,
    permit: PermitTransferFrom,
    transferDetails: SignatureTransferDetails,
    owner: Address,
    signature: Hex,
  ): Promise<void> {
    if (this.ledger.now() > permit.deadline) {
      throw new LedgerError('SignatureExpired', `Permit expired at ${permit.deadline}`)
    }
    if (transferDetails.requestedAmount > permit.permitted.amount) {
      throw new LedgerError(
        'InvalidAmount',
        `Requested ${transferDetails.requestedAmount} exceeds permitted ${permit.permitted.amount}`,
      )
    }
    if (this.isNonceUsed(owner, permit.nonce)) {
      throw new LedgerError('InvalidNonce', `Nonce ${permit.nonce} already used by ${owner}`)
    }

    const typedData = permitTransferFromTypedData({
      chainId: this.ledger.chainId,
      verifyingContract: this.address,
      permit,
      spender,
    })
    let valid: boolean
    try {
      valid = await verifyTypedData({ address: owner, signature, ...typedData })
    } catch (err) {
      throw new LedgerError('InvalidSigner', 'Malformed permit signature', { cause: err })
    }
    if (!valid) throw new LedgerError('InvalidSigner', `Permit was not signed by ${owner}`)

    this.ledger.write(this.nonceSlot(owner, permit.nonce), 1n)
    await this.ledger
      .token(permit.permitted.token)
      .transferFrom(this.address, owner, transferDetails.to, transferDetails.requestedAmount)
  }
}
