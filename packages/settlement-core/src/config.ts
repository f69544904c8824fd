import { getAddress, isAddress, type Address } from 'viem'
import type { ExecutionHost } from '@intentpay/core'
import {
  createLogger,
  isLogLevel,
  type LogLevel,
  type MetricsRegistry,
  type StructuredLogger,
} from '@intentpay/observability'
import { PaymentSettlementEngine } from './engine'
import { SettlementError } from './errors'

export interface EngineConfig {
  engineAddress: Address
  owner: Address
  feeReceiver: Address
  wrappedNative: Address
  signatureTransfer: Address
  standardFeeBps: bigint
  logLevel: LogLevel
}

type Env = Record<string, string | undefined>

function requireAddress(env: Env, name: string): Address {
  const value = env[name]?.trim()
  if (!value) throw new SettlementError('InvalidConfiguration', `${name} is required`, { variable: name })
  if (!isAddress(value, { strict: false })) {
    throw new SettlementError('InvalidConfiguration', `${name} is not a valid address`, { variable: name, value })
  }
  return getAddress(value)
}

/**
 * Read engine configuration from the environment.
 * Range checks on the fee and null-address checks happen when the engine is built.
 */
export function loadEngineConfig(env: Env = process.env): EngineConfig {
  const feeRaw = env.STANDARD_FEE_BPS?.trim() || '0'
  if (!/^\d+$/.test(feeRaw)) {
    throw new SettlementError('InvalidConfiguration', 'STANDARD_FEE_BPS must be a non-negative integer', {
      variable: 'STANDARD_FEE_BPS',
      value: feeRaw,
    })
  }

  const logLevel = env.LOG_LEVEL?.trim() || 'info'
  if (!isLogLevel(logLevel)) {
    throw new SettlementError('InvalidConfiguration', `LOG_LEVEL must be one of debug, info, warn, error`, {
      variable: 'LOG_LEVEL',
      value: logLevel,
    })
  }

  return {
    engineAddress: requireAddress(env, 'ENGINE_ADDRESS'),
    owner: requireAddress(env, 'OWNER_ADDRESS'),
    feeReceiver: requireAddress(env, 'FEE_RECEIVER_ADDRESS'),
    wrappedNative: requireAddress(env, 'WRAPPED_NATIVE_ADDRESS'),
    signatureTransfer: requireAddress(env, 'SIGNATURE_TRANSFER_ADDRESS'),
    standardFeeBps: BigInt(feeRaw),
    logLevel,
  }
}

export interface EngineObservability {
  logger?: StructuredLogger
  metrics?: MetricsRegistry
}

export function createSettlementEngine(
  config: EngineConfig,
  host: ExecutionHost,
  observability: EngineObservability = {},
): PaymentSettlementEngine {
  return new PaymentSettlementEngine({
    host,
    address: config.engineAddress,
    owner: config.owner,
    feeReceiver: config.feeReceiver,
    wrappedNative: config.wrappedNative,
    signatureTransfer: config.signatureTransfer,
    standardFeeBps: config.standardFeeBps,
    logger: observability.logger ?? createLogger({ service: 'intentpay' }, { level: config.logLevel }),
    metrics: observability.metrics,
  })
}
