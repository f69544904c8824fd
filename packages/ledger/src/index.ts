export { InMemoryLedger, type LedgerOptions, type LogFilter } from './ledger'
export { InMemoryToken } from './token'
export { InMemoryWrappedNative } from './wrapped-native'
export { InMemorySignatureTransfer } from './signature-transfer'
export { LedgerError, type LedgerErrorCode } from './errors'
