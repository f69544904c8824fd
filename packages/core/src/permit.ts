import type { Address } from 'viem'
import type { PermitTransferFrom } from './types'

export const PERMIT_TRANSFER_FROM_TYPES = {
  PermitTransferFrom: [
    { name: 'permitted', type: 'TokenPermissions' },
    { name: 'spender', type: 'address' },
    { name: 'nonce', type: 'uint256' },
    { name: 'deadline', type: 'uint256' },
  ],
  TokenPermissions: [
    { name: 'token', type: 'address' },
    { name: 'amount', type: 'uint256' },
  ],
} as const

export interface PermitTypedDataParams {
  chainId: number
  /** Address of the signature-transfer service */
  verifyingContract: Address
  permit: PermitTransferFrom
  /** Account allowed to execute the transfer: the settlement engine */
  spender: Address
}

/**
 * EIP-712 typed data a payer signs to pre-authorize one transfer.
 * Pass the result to a viem account's `signTypedData`.
 */
export function permitTransferFromTypedData(params: PermitTypedDataParams) {
  return {
    domain: {
      name: 'Permit2',
      chainId: params.chainId,
      verifyingContract: params.verifyingContract,
    },
    types: PERMIT_TRANSFER_FROM_TYPES,
    primaryType: 'PermitTransferFrom' as const,
    message: {
      permitted: {
        token: params.permit.permitted.token,
        amount: params.permit.permitted.amount,
      },
      spender: params.spender,
      nonce: params.permit.nonce,
      deadline: params.permit.deadline,
    },
  }
}
