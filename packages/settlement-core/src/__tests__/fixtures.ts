import { decodeFunctionData, encodeFunctionData, getAddress, pad, parseAbi, toHex, type Address, type Hex } from 'viem'
import { NATIVE_TOKEN, buildPaymentIntent, type BuildPaymentIntentParams, type PaymentIntent } from '@intentpay/core'
import { createLogger, createMetricsRegistry, type MetricsRegistry } from '@intentpay/observability'
import { InMemoryLedger, InMemorySignatureTransfer, InMemoryToken, InMemoryWrappedNative } from '@intentpay/ledger'
import { PaymentSettlementEngine } from '../engine'

export function addr(n: number): Address {
  return getAddress(pad(toHex(n), { size: 20 }))
}

export const OWNER = addr(0x1001)
export const FEE_RECEIVER = addr(0x1002)
export const PAYER = addr(0x1003)
export const MERCHANT = addr(0x1004)
export const STRANGER = addr(0x1005)
export const ENGINE = addr(0x2001)
export const WETH = addr(0x2002)
export const PERMIT2 = addr(0x2003)
export const TOKEN_A = addr(0x3001)
export const TOKEN_B = addr(0x3002)
export const EXCHANGE = addr(0x4001)

export const STANDARD_FEE_BPS = 80n

const EXCHANGE_ABI = parseAbi([
  'function swap(address tokenIn, address tokenOut, uint256 amountIn, uint256 amountOut, address recipient)',
])

export interface SwapOrder {
  tokenIn: Address
  tokenOut: Address
  amountIn: bigint
  amountOut: bigint
  recipient: Address
}

export function encodeSwap(order: SwapOrder): Hex {
  return encodeFunctionData({
    abi: EXCHANGE_ABI,
    functionName: 'swap',
    args: [order.tokenIn, order.tokenOut, order.amountIn, order.amountOut, order.recipient],
  })
}

export interface Harness {
  ledger: InMemoryLedger
  engine: PaymentSettlementEngine
  metrics: MetricsRegistry
  logLines: Array<Record<string, unknown>>
  tokenA: InMemoryToken
  tokenB: InMemoryToken
  weth: InMemoryWrappedNative
  permit2: InMemorySignatureTransfer
  /** Hook run by the exchange before it swaps; used for reentrancy probes. */
  beforeSwap: { current?: () => Promise<void> }
}

/**
 * Ledger with two tokens, wrapped native currency, a signature-transfer service,
 * a scripted exchange, and an engine charging STANDARD_FEE_BPS.
 */
export function createHarness(): Harness {
  const ledger = new InMemoryLedger()
  const tokenA = new InMemoryToken(ledger, TOKEN_A, 'AAA', 6)
  const tokenB = new InMemoryToken(ledger, TOKEN_B, 'BBB', 6)
  const weth = new InMemoryWrappedNative(ledger, WETH)
  const permit2 = new InMemorySignatureTransfer(ledger, PERMIT2)
  const beforeSwap: Harness['beforeSwap'] = {}

  // Pulls amountIn of tokenIn from the caller and pays amountOut of tokenOut to the recipient.
  ledger.deploy(EXCHANGE, async (ctx) => {
    if (beforeSwap.current) await beforeSwap.current()
    const { args } = decodeFunctionData({ abi: EXCHANGE_ABI, data: ctx.data })
    if (!args) throw new Error('swap called without arguments')
    const [tokenIn, tokenOut, amountIn, amountOut, recipient] = args
    await ledger.token(tokenIn).transferFrom(ctx.self, ctx.sender, ctx.self, amountIn)
    await ledger.token(tokenOut).transfer(ctx.self, recipient, amountOut)
  })

  const metrics = createMetricsRegistry()
  const logLines: Array<Record<string, unknown>> = []
  const logger = createLogger({ service: 'test' }, { level: 'debug', sink: (line) => logLines.push(JSON.parse(line)) })

  const engine = new PaymentSettlementEngine({
    host: ledger,
    address: ENGINE,
    owner: OWNER,
    signatureTransfer: PERMIT2,
    wrappedNative: WETH,
    feeReceiver: FEE_RECEIVER,
    standardFeeBps: STANDARD_FEE_BPS,
    logger,
    metrics,
  })

  return { ledger, engine, metrics, logLines, tokenA, tokenB, weth, permit2, beforeSwap }
}

export function intentFor(ledger: InMemoryLedger, params: Partial<BuildPaymentIntentParams> = {}): PaymentIntent {
  return buildPaymentIntent({
    amountIn: 1_000n,
    receiptAmount: 1_000n,
    deadline: ledger.now() + 300n,
    tokenIn: TOKEN_A,
    receiptToken: TOKEN_A,
    paymentReceiver: MERCHANT,
    ...params,
  })
}

export { NATIVE_TOKEN }
