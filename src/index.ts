/**
 * Price Oracle
 *
 * Asset registry, feeder-gated price ledger and owner-gated configuration
 * over a transactional key-value store.
 */

export * from './types/oracle.types.js';
export * from './types/oracle-messages.js';

export { init, handle, query, dispatchQuery } from './services/oracle-contract.js';
export { initialize, updateConfig, queryConfig } from './services/config-store.js';
export { registerAsset, queryAsset } from './services/asset-registry.js';
export { feedPrice, queryPrice, PRICE_FEED_ACTION } from './services/price-ledger.js';
export {
  OracleService,
  systemClock,
  type OracleClock,
  type OracleServiceOptions,
  type OracleServiceEvents,
  type ExecutedEvent,
  type RejectedEvent,
} from './services/oracle-service.js';
export { OracleCommandRunner, type RunnerResult } from './services/oracle-runner.js';

export {
  MemoryKeyValueStore,
  type IKeyValueStore,
  type IReadonlyKeyValueStore,
} from './persistence/kv-store.js';
export { SqliteKeyValueStore } from './persistence/sqlite-kv-store.js';
export {
  readConfig,
  readAsset,
  readPrice,
  storeConfig,
  storeAsset,
  storePrice,
  namespacedKey,
} from './persistence/oracle-state.js';

export {
  CanonicalAddr,
  MockAddressApi,
  DEFAULT_CANONICAL_LENGTH,
  type IAddressApi,
} from './utils/address-api.js';
export {
  parseDecimal,
  decimalToString,
  decimalEquals,
  DECIMAL_ONE,
  DECIMAL_ZERO,
  DECIMAL_MAX,
  type Decimal,
} from './utils/decimal.js';
export { toBinary, fromBinary } from './utils/binary.js';
export {
  OracleError,
  OracleErrorCode,
  isOracleError,
} from './utils/oracle-error.js';
export {
  OracleLogger,
  LogEvents,
  createOracleLogger,
  type IOracleLogger,
  type LogContext,
  type LogEventType,
} from './utils/oracle-logger.js';
