/**
 * Oracle Configuration
 *
 * All values can be overridden via environment variables.
 */

import type { OracleConfig, StoreKind, SyncMode } from '../src/types/oracle.types.js';
import { VALID_STORE_KINDS, VALID_SYNC_MODES } from '../src/types/oracle.types.js';

/**
 * Load configuration from an environment map
 *
 * Environment variables:
 * - ORACLE_STORE: Store backend 'sqlite' or 'memory' (default: 'sqlite')
 * - ORACLE_DB_PATH: Database file path (default: './data/oracle/oracle.db')
 * - ORACLE_SYNC_MODE: SQLite synchronous pragma 'normal', 'full' or 'off' (default: 'normal')
 * - ORACLE_CANONICAL_LENGTH: Canonical address length in bytes (default: 20)
 * - ORACLE_LOGGING_ENABLED: Structured logging toggle (default: true)
 * - ORACLE_INITIAL_BLOCK_HEIGHT: Height of the first block (default: 1)
 */
export function loadOracleConfig(env: NodeJS.ProcessEnv = process.env): OracleConfig {
  const parseNumber = (value: string | undefined, defaultValue: number): number => {
    if (value === undefined || value === '') return defaultValue;
    const parsed = Number(value);
    return Number.isNaN(parsed) ? defaultValue : parsed;
  };

  const parseChoice = <T extends string>(
    value: string | undefined,
    choices: readonly T[],
    defaultValue: T
  ): T => choices.find((choice) => choice === value) ?? defaultValue;

  return {
    store: parseChoice<StoreKind>(env.ORACLE_STORE, VALID_STORE_KINDS, 'sqlite'),
    persistence: {
      dbPath: env.ORACLE_DB_PATH || './data/oracle/oracle.db',
      syncMode: parseChoice<SyncMode>(env.ORACLE_SYNC_MODE, VALID_SYNC_MODES, 'normal'),
    },
    canonicalLength: parseNumber(env.ORACLE_CANONICAL_LENGTH, 20),
    loggingEnabled: env.ORACLE_LOGGING_ENABLED !== 'false', // Default: true
    initialBlockHeight: parseNumber(env.ORACLE_INITIAL_BLOCK_HEIGHT, 1),
  };
}

/**
 * Validate configuration and return any issues
 */
export function validateOracleConfig(config: OracleConfig): string[] {
  const issues: string[] = [];

  if (!Number.isInteger(config.canonicalLength) || config.canonicalLength < 3) {
    issues.push('canonicalLength must be an integer of at least 3');
  }

  if (!Number.isInteger(config.initialBlockHeight) || config.initialBlockHeight < 0) {
    issues.push('initialBlockHeight must be a non-negative integer');
  }

  if (config.store === 'sqlite' && config.persistence.dbPath.trim() === '') {
    issues.push('persistence.dbPath is required for the sqlite store');
  }

  return issues;
}
