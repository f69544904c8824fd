import { describe, it, expect, beforeEach } from 'vitest'
import { zeroAddress } from 'viem'
import { InMemoryLedger } from '@intentpay/ledger'
import { PaymentSettlementEngine } from '../engine'
import {
  ENGINE,
  FEE_RECEIVER,
  MERCHANT,
  OWNER,
  PAYER,
  PERMIT2,
  STRANGER,
  WETH,
  addr,
  createHarness,
  intentFor,
  type Harness,
} from './fixtures'

let h: Harness

function thrownBy(fn: () => unknown): unknown {
  try {
    fn()
  } catch (err) {
    return err
  }
  throw new Error('expected the call to throw')
}

beforeEach(() => {
  h = createHarness()
})

describe('fee governance', () => {
  it('starts from the configured standard fee and receiver', () => {
    expect(h.engine.getServiceFee(MERCHANT)).toBe(80n)
    expect(h.engine.feeConfig()).toEqual({
      standardFeeBps: 80n,
      specialFeeBps: new Map(),
      feeReceiver: FEE_RECEIVER,
    })
  })

  it('lets the owner change the standard fee and emits FeeChanged', async () => {
    await h.engine.setServiceFeePercent(OWNER, 50n)

    expect(h.engine.getServiceFee(MERCHANT)).toBe(50n)
    expect(h.ledger.logs({ name: 'FeeChanged' })).toEqual([{ emitter: ENGINE, name: 'FeeChanged', args: { rate: 50n } }])
    expect(h.metrics.counter('governance_changes_total', '').get({ action: 'set_standard_fee' })).toBe(1)
  })

  it('accepts the 100 bps cap and rejects anything above it', async () => {
    await h.engine.setServiceFeePercent(OWNER, 100n)
    expect(h.engine.getServiceFee(MERCHANT)).toBe(100n)

    await expect(h.engine.setServiceFeePercent(OWNER, 101n)).rejects.toMatchObject({
      code: 'InvalidServiceFeePercent',
    })
    expect(h.engine.getServiceFee(MERCHANT)).toBe(100n)
  })

  it('rejects governance calls from anyone but the owner', async () => {
    await expect(h.engine.setServiceFeePercent(STRANGER, 10n)).rejects.toMatchObject({
      code: 'OwnableUnauthorizedAccount',
    })
    await expect(h.engine.setSpecialFee(STRANGER, MERCHANT, 10n)).rejects.toMatchObject({
      code: 'OwnableUnauthorizedAccount',
    })
    await expect(h.engine.setFeeReceiver(STRANGER, STRANGER)).rejects.toMatchObject({
      code: 'OwnableUnauthorizedAccount',
    })
    expect(h.ledger.logs()).toHaveLength(0)
  })

  it('applies a special fee to one payee only', async () => {
    await h.engine.setSpecialFee(OWNER, MERCHANT, 30n)

    expect(h.engine.getServiceFee(MERCHANT)).toBe(30n)
    expect(h.engine.getServiceFee(PAYER)).toBe(80n)
    expect(h.ledger.logs({ name: 'SpecialFeeChanged' })).toEqual([
      { emitter: ENGINE, name: 'SpecialFeeChanged', args: { account: MERCHANT, rate: 30n } },
    ])
  })

  it('treats a zero special fee as no override', async () => {
    await h.engine.setSpecialFee(OWNER, MERCHANT, 30n)
    await h.engine.setSpecialFee(OWNER, MERCHANT, 0n)

    expect(h.engine.getServiceFee(MERCHANT)).toBe(80n)
    expect(h.engine.feeConfig().specialFeeBps.has(MERCHANT)).toBe(false)

    h.tokenA.mint(PAYER, 1_000n)
    await h.tokenA.approve(PAYER, ENGINE, 1_000n)
    const receipt = await h.engine.settle({ caller: PAYER, value: 0n }, intentFor(h.ledger))
    expect(receipt.feeAmount).toBe(8n)
    expect(await h.tokenA.balanceOf(MERCHANT)).toBe(992n)
  })

  it('charges the special fee on settlement', async () => {
    await h.engine.setSpecialFee(OWNER, MERCHANT, 30n)
    h.tokenA.mint(PAYER, 1_000n)
    await h.tokenA.approve(PAYER, ENGINE, 1_000n)

    const receipt = await h.engine.settle({ caller: PAYER, value: 0n }, intentFor(h.ledger))

    expect(receipt).toMatchObject({ feeBps: 30n, feeAmount: 3n, netAmount: 997n })
  })

  it('validates the special fee account and rate', async () => {
    await expect(h.engine.setSpecialFee(OWNER, zeroAddress, 10n)).rejects.toMatchObject({ code: 'InvalidAddress' })
    await expect(h.engine.setSpecialFee(OWNER, MERCHANT, 101n)).rejects.toMatchObject({
      code: 'InvalidServiceFeePercent',
    })
  })

  it('sends fees to a new receiver', async () => {
    const treasury = addr(0x5001)
    await h.engine.setFeeReceiver(OWNER, treasury)
    h.tokenA.mint(PAYER, 1_000n)
    await h.tokenA.approve(PAYER, ENGINE, 1_000n)

    await h.engine.settle({ caller: PAYER, value: 0n }, intentFor(h.ledger))

    expect(await h.tokenA.balanceOf(treasury)).toBe(8n)
    expect(await h.tokenA.balanceOf(FEE_RECEIVER)).toBe(0n)
    expect(h.ledger.logs({ name: 'FeeReceiverChanged' })).toEqual([
      { emitter: ENGINE, name: 'FeeReceiverChanged', args: { previousReceiver: FEE_RECEIVER, newReceiver: treasury } },
    ])
    await expect(h.engine.setFeeReceiver(OWNER, zeroAddress)).rejects.toMatchObject({ code: 'InvalidAddress' })
  })

  it('restores governance state when the enclosing invocation rolls back', async () => {
    await expect(
      h.ledger.transact({ from: OWNER, to: ENGINE, value: 0n }, async () => {
        await h.engine.setServiceFeePercent(OWNER, 50n)
        await h.engine.setSpecialFee(OWNER, MERCHANT, 20n)
        await h.engine.pause(OWNER)
        throw new Error('abort')
      }),
    ).rejects.toThrow('abort')

    expect(h.engine.getServiceFee(MERCHANT)).toBe(80n)
    expect(h.engine.feeConfig().specialFeeBps.size).toBe(0)
    expect(h.engine.isPaused()).toBe(false)
    expect(h.ledger.logs()).toHaveLength(0)
  })
})

describe('circuit breaker', () => {
  it('pauses and unpauses with events', async () => {
    await h.engine.pause(OWNER)
    expect(h.engine.isPaused()).toBe(true)
    await h.engine.unpause(OWNER)
    expect(h.engine.isPaused()).toBe(false)

    expect(h.ledger.logs().map((entry) => entry.name)).toEqual(['Paused', 'Unpaused'])
    expect(h.ledger.logs({ name: 'Paused' })[0]).toEqual({ emitter: ENGINE, name: 'Paused', args: { account: OWNER } })
  })

  it('rejects pausing twice and unpausing when running', async () => {
    await expect(h.engine.unpause(OWNER)).rejects.toMatchObject({ code: 'ExpectedPause' })
    await h.engine.pause(OWNER)
    await expect(h.engine.pause(OWNER)).rejects.toMatchObject({ code: 'EnforcedPause' })
  })

  it('only lets the owner pause', async () => {
    await expect(h.engine.pause(STRANGER)).rejects.toMatchObject({ code: 'OwnableUnauthorizedAccount' })
    expect(h.engine.isPaused()).toBe(false)
  })

  it('keeps governance available while paused', async () => {
    await h.engine.pause(OWNER)
    await h.engine.setServiceFeePercent(OWNER, 20n)
    expect(h.engine.getServiceFee(MERCHANT)).toBe(20n)
  })
})

describe('ownership', () => {
  it('hands governance to the new owner', async () => {
    await h.engine.transferOwnership(OWNER, STRANGER)

    expect(h.engine.owner()).toBe(STRANGER)
    await expect(h.engine.setServiceFeePercent(OWNER, 10n)).rejects.toMatchObject({
      code: 'OwnableUnauthorizedAccount',
    })
    await h.engine.setServiceFeePercent(STRANGER, 10n)
    expect(h.ledger.logs({ name: 'OwnershipTransferred' })).toEqual([
      { emitter: ENGINE, name: 'OwnershipTransferred', args: { previousOwner: OWNER, newOwner: STRANGER } },
    ])
  })

  it('rejects the null address as new owner', async () => {
    await expect(h.engine.transferOwnership(OWNER, zeroAddress)).rejects.toMatchObject({ code: 'InvalidAddress' })
    expect(h.engine.owner()).toBe(OWNER)
  })

  it('logs rejected governance changes', async () => {
    await expect(h.engine.pause(STRANGER)).rejects.toMatchObject({ code: 'OwnableUnauthorizedAccount' })

    expect(h.logLines.find((line) => line.msg === 'Governance change rejected')).toMatchObject({
      level: 'warn',
      action: 'pause',
      caller: STRANGER,
      code: 'OwnableUnauthorizedAccount',
    })
  })
})

describe('engine construction', () => {
  const base = {
    address: ENGINE,
    owner: OWNER,
    signatureTransfer: PERMIT2,
    wrappedNative: WETH,
    feeReceiver: FEE_RECEIVER,
    standardFeeBps: 80n,
  }

  it('rejects null addresses', () => {
    const host = h.ledger
    expect(thrownBy(() => new PaymentSettlementEngine({ ...base, host, address: zeroAddress }))).toMatchObject({ code: 'InvalidAddress' })
    expect(thrownBy(() => new PaymentSettlementEngine({ ...base, host, owner: zeroAddress }))).toMatchObject({ code: 'InvalidAddress' })
    expect(thrownBy(() => new PaymentSettlementEngine({ ...base, host, feeReceiver: zeroAddress }))).toMatchObject({ code: 'InvalidAddress' })
  })

  it('rejects a standard fee above the cap', () => {
    expect(thrownBy(() => new PaymentSettlementEngine({ ...base, host: h.ledger, standardFeeBps: 101n }))).toMatchObject({ code: 'InvalidServiceFeePercent' })
  })

  it('requires the collaborators to exist on the host', () => {
    expect(thrownBy(() => new PaymentSettlementEngine({ ...base, host: new InMemoryLedger() }))).toMatchObject({
      code: 'UnknownContract',
    })
  })
})
