import type { Address } from 'viem'

/** Sentinel token address denoting the chain's native currency. */
export const NATIVE_TOKEN: Address = '0xEeeeeEeeeEeEeeEeEeEeeEEEeeeeEeeeeeeeEEeE'

export const BPS_DENOMINATOR = 10_000n

/** Upper bound for any configured fee rate: 100 bps = 1% */
export const MAX_FEE_BPS = 100n

export const EMPTY_CALL_DATA = '0x' as const
