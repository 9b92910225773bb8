/**
 * Oracle Type Definitions
 *
 * Stored entities, invocation context, dependency bundles and the response
 * records returned to the host.
 */

import type { CanonicalAddr, IAddressApi } from '../utils/address-api.js';
import type { Decimal } from '../utils/decimal.js';
import type { IKeyValueStore, IReadonlyKeyValueStore } from '../persistence/kv-store.js';

// ============================================================================
// Validation Constants (for runtime type checking)
// ============================================================================

/** Valid store backends for runtime validation */
export const VALID_STORE_KINDS = ['sqlite', 'memory'] as const;

/** Valid write modes for the SQLite store */
export const VALID_SYNC_MODES = ['normal', 'full', 'off'] as const;

// ============================================================================
// Primitive Types
// ============================================================================

/** Human-readable address as sent by callers and returned by queries */
export type HumanAddr = string;

/** Store backend */
export type StoreKind = (typeof VALID_STORE_KINDS)[number];

/** SQLite `synchronous` pragma */
export type SyncMode = (typeof VALID_SYNC_MODES)[number];

// ============================================================================
// Stored Entities
// ============================================================================

/**
 * Singleton oracle configuration
 */
export interface Config {
  /** Identity allowed to update the configuration */
  owner: CanonicalAddr;
  /** Denomination prices are quoted in */
  baseDenom: string;
}

/**
 * Registered asset
 */
export interface Asset {
  symbol: string;
  /** Identity allowed to feed prices for this symbol */
  feeder: CanonicalAddr;
  /** Token contract of the asset */
  token: CanonicalAddr;
}

/**
 * Latest reported price of an asset
 */
export interface PriceRecord {
  price: Decimal;
  priceMultiplier: Decimal;
  /** Seconds since epoch of the last feed (0 = never fed) */
  lastUpdateTime: number;
}

// ============================================================================
// Invocation Context
// ============================================================================

export interface BlockInfo {
  height: number;
  /** Seconds since epoch */
  time: number;
}

export interface MessageInfo {
  /** Address of the caller */
  sender: HumanAddr;
}

/**
 * Context of a single command invocation
 */
export interface Env {
  block: BlockInfo;
  message: MessageInfo;
}

/**
 * Dependencies available to commands (read-write store)
 */
export interface OracleDeps {
  storage: IKeyValueStore;
  api: IAddressApi;
}

/**
 * Dependencies available to queries (read-only store, no caller identity)
 */
export interface OracleQueryDeps {
  storage: IReadonlyKeyValueStore;
  api: IAddressApi;
}

// ============================================================================
// Responses
// ============================================================================

/**
 * Key/value attribute describing what a command did
 */
export interface LogAttribute {
  key: string;
  value: string;
}

export interface InitResponse {
  log: LogAttribute[];
}

export interface HandleResponse {
  log: LogAttribute[];
  data?: Uint8Array;
}

export interface ConfigResponse {
  owner: HumanAddr;
  base_denom: string;
}

export interface AssetResponse {
  symbol: string;
  feeder: HumanAddr;
  token: HumanAddr;
}

export interface PriceResponse {
  price: string;
  price_multiplier: string;
  last_update_time: number;
}

export type QueryResponse = ConfigResponse | AssetResponse | PriceResponse;

// ============================================================================
// Configuration
// ============================================================================

/**
 * SQLite persistence settings
 */
export interface PersistenceConfig {
  /** Database file path (must live under ./data or ./test-data) */
  dbPath: string;
  /** SQLite `synchronous` pragma */
  syncMode: SyncMode;
}

/**
 * Oracle runtime configuration
 */
export interface OracleConfig {
  store: StoreKind;
  persistence: PersistenceConfig;
  /** Canonical address length in bytes */
  canonicalLength: number;
  /** Structured logging toggle */
  loggingEnabled: boolean;
  /** Block height of the first executed command */
  initialBlockHeight: number;
}
