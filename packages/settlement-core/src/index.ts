export { PaymentSettlementEngine, type SettlementEngineOptions } from './engine'
export { Ownable, type AccessControl } from './access-control'
export { CircuitBreaker } from './circuit-breaker'
export { ReentrancyGuard } from './reentrancy-guard'
export { FeeGovernance, type FeeGovernanceInit } from './fee-governance'
export { validatePaymentIntent } from './validation'
export { SettlementError, isSettlementError, failureCode, type SettlementErrorCode } from './errors'
export { loadEngineConfig, createSettlementEngine, type EngineConfig, type EngineObservability } from './config'
export type { InvocationContext, SettlementReceipt, StateScope } from './types'
