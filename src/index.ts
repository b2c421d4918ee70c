export { StateCache } from './cache.js';
export type { CacheBatch, CacheDocuments, CollectionName, PersistedState, StateSource, StateWriter } from './cache.js';
export { ManualClock, SystemClock, systemClock } from './clock.js';
export type { Clock } from './clock.js';
export { default as config } from './config.js';
export { deployStaking, deployToken } from './genesis.js';
export { initialize } from './initialize.js';
export type { InitializeOptions, LedgerDeployment } from './initialize.js';
export { default as logger } from './logger.js';
export { addMongoIndexes, connect, loadState, MongoStateSource, MongoStateWriter } from './mongo.js';
export { StakeLedger } from './stakeLedger.js';
export { TokenLedger } from './tokenLedger.js';
export { TransactionExecutor } from './transaction.js';
export type { ExecutionResult } from './transaction.js';
export type { Transaction } from './transactions/index.js';
export type { StakeRecord, StakingTerms } from './transactions/staking/staking-interfaces.js';
export { LEDGER_ERRORS, TransactionType } from './transactions/types.js';
export type { LedgerError, TxResult } from './transactions/types.js';
export { formatTokenAmount, parseTokenAmount, toBigInt } from './utils/bigint.js';
export { EventBus } from './utils/event-logger.js';
export type { EventDocument, EventOfType, LedgerEvent, LedgerEventMap, LedgerEventType } from './utils/event-logger.js';
