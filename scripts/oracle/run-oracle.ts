#!/usr/bin/env npx tsx
/**
 * Oracle Runner
 *
 * Reads line-delimited JSON envelopes from stdin, applies them to the oracle
 * and prints one JSON result line per envelope.
 *
 * Usage:
 *   npx tsx scripts/oracle/run-oracle.ts < commands.jsonl
 *
 * Environment Variables:
 *   ORACLE_STORE - 'sqlite' or 'memory' (default: sqlite)
 *   ORACLE_DB_PATH - Database file path (default: ./data/oracle/oracle.db)
 *   ORACLE_SYNC_MODE - SQLite synchronous pragma (default: normal)
 *   ORACLE_CANONICAL_LENGTH - Canonical address length (default: 20)
 *   ORACLE_LOGGING_ENABLED - Structured logging (default: true)
 */

import { createInterface } from 'readline';

import { loadOracleConfig, validateOracleConfig } from '../../config/oracle.config.js';
import { MemoryKeyValueStore, type IKeyValueStore } from '../../src/persistence/kv-store.js';
import { SqliteKeyValueStore } from '../../src/persistence/sqlite-kv-store.js';
import { OracleCommandRunner } from '../../src/services/oracle-runner.js';
import { OracleService } from '../../src/services/oracle-service.js';
import { MockAddressApi } from '../../src/utils/address-api.js';
import { createOracleLogger, LogEvents, OracleLogger } from '../../src/utils/oracle-logger.js';

// ============================================================================
// Main
// ============================================================================

async function main(): Promise<void> {
  const config = loadOracleConfig();
  const logger = createOracleLogger({ enabled: config.loggingEnabled });

  const issues = validateOracleConfig(config);
  if (issues.length > 0) {
    logger.error(LogEvents.ERROR, { message: `Invalid configuration: ${issues.join('; ')}` });
    process.exit(1);
  }

  let storage: IKeyValueStore;
  let sqlite: SqliteKeyValueStore | null = null;
  if (config.store === 'sqlite') {
    sqlite = new SqliteKeyValueStore(config.persistence);
    await sqlite.initialize();
    storage = sqlite;
  } else {
    storage = new MemoryKeyValueStore();
  }
  logger.info(LogEvents.STORE_OPENED, {
    store: config.store,
    dbPath: sqlite?.getDbPath(),
  });

  const service = new OracleService({
    storage,
    api: new MockAddressApi(config.canonicalLength),
    logger,
    initialBlockHeight: config.initialBlockHeight,
  });
  const runner = new OracleCommandRunner(service, logger);

  logger.info(LogEvents.ORACLE_STARTED, { message: 'Reading envelopes from stdin' });

  const input = createInterface({ input: process.stdin, crlfDelay: Infinity });
  let lineNumber = 0;
  for await (const line of input) {
    lineNumber++;
    const result = runner.handleLine(line, lineNumber);
    if (result !== null) {
      process.stdout.write(result + '\n');
    }
  }

  await sqlite?.close();
  logger.info(LogEvents.ORACLE_STOPPED, { message: `Processed ${lineNumber} lines` });
}

main().catch((error: unknown) => {
  createOracleLogger().error(LogEvents.ERROR, {
    message: 'Fatal error',
    error: OracleLogger.sanitizeErrorMessage(error),
  });
  process.exit(1);
});
