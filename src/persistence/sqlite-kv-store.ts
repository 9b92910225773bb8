/**
 * SqliteKeyValueStore - SQLite persistence layer for oracle state
 *
 * Implements the byte-keyed store on a single `kv_store` table using
 * better-sqlite3. All operations are synchronous; transaction() maps onto
 * better-sqlite3 transactions (nested calls become savepoints).
 */

import Database from 'better-sqlite3';
import type { Statement } from 'better-sqlite3';
import { readFileSync, existsSync, mkdirSync, readdirSync, realpathSync } from 'fs';
import { dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';

import type { PersistenceConfig } from '../types/oracle.types.js';
import type { IKeyValueStore } from './kv-store.js';

// ============================================================================
// Constants
// ============================================================================

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

const MIGRATIONS_DIR = join(__dirname, 'migrations');

/** Default allowed base directory for database files */
const DEFAULT_ALLOWED_BASE_DIR = './data';

/** Base directory accepted for test databases */
const TEST_BASE_DIR = './test-data';

/** SQLite busy timeout in milliseconds */
const BUSY_TIMEOUT_MS = 5000;

const INVALID_PATH_MESSAGE = 'Invalid database path specified';

// ============================================================================
// Internal Row Types
// ============================================================================

interface ValueRow {
  value: Buffer;
}

interface VersionRow {
  version: number | null;
}

interface CountRow {
  total: number;
}

// ============================================================================
// SqliteKeyValueStore Implementation
// ============================================================================

export class SqliteKeyValueStore implements IKeyValueStore {
  private db: Database.Database | null = null;
  private readonly config: PersistenceConfig;

  // Cached prepared statements
  private statements: {
    selectValue?: Statement<[Buffer], ValueRow>;
    upsertValue?: Statement<[Buffer, Buffer]>;
    countEntries?: Statement<[], CountRow>;
  } = {};

  constructor(config: Partial<PersistenceConfig> = {}) {
    this.config = {
      dbPath: config.dbPath ?? './data/oracle/oracle.db',
      syncMode: config.syncMode ?? 'normal',
    };
  }

  // ============================================================================
  // Database Access (Safe Getter)
  // ============================================================================

  /**
   * Get the database connection, throwing if not initialized.
   */
  private get database(): Database.Database {
    if (!this.db) {
      throw new Error('SqliteKeyValueStore not initialized. Call initialize() first.');
    }
    return this.db;
  }

  // ============================================================================
  // Lifecycle Methods
  // ============================================================================

  /**
   * Open the database connection and run migrations
   */
  async initialize(): Promise<void> {
    if (this.db) {
      return;
    }

    this.validateDbPath(this.config.dbPath);
    mkdirSync(dirname(this.config.dbPath), { recursive: true });

    this.db = new Database(this.config.dbPath);
    this.db.pragma('journal_mode = WAL');
    this.db.pragma(`synchronous = ${this.config.syncMode.toUpperCase()}`);
    this.db.pragma(`busy_timeout = ${BUSY_TIMEOUT_MS}`);

    await this.runMigrations();
    this.initializeStatements();
  }

  /**
   * Validate that the database path is within an allowed directory.
   * Uses realpathSync on existing directories to catch symlinks pointing outside.
   */
  private validateDbPath(dbPath: string): void {
    const resolvedPath = resolve(dbPath);
    const allowedBases = [resolve(DEFAULT_ALLOWED_BASE_DIR), resolve(TEST_BASE_DIR)];

    if (!allowedBases.some((base) => resolvedPath.startsWith(base))) {
      throw new Error(INVALID_PATH_MESSAGE);
    }

    const dbDir = dirname(resolvedPath);
    if (!existsSync(dbDir)) {
      return;
    }

    const realDir = realpathSync(dbDir);
    const realBases = allowedBases.map((base) => (existsSync(base) ? realpathSync(base) : base));
    if (!realBases.some((base) => realDir.startsWith(base))) {
      throw new Error(INVALID_PATH_MESSAGE);
    }
  }

  /**
   * Initialize cached prepared statements
   */
  private initializeStatements(): void {
    const db = this.database;

    this.statements.selectValue = db.prepare<[Buffer], ValueRow>(
      'SELECT value FROM kv_store WHERE key = ?'
    );

    this.statements.upsertValue = db.prepare<[Buffer, Buffer]>(`
      INSERT INTO kv_store (key, value) VALUES (?, ?)
      ON CONFLICT(key) DO UPDATE SET value = excluded.value
    `);

    this.statements.countEntries = db.prepare<[], CountRow>(
      'SELECT COUNT(*) as total FROM kv_store'
    );
  }

  /**
   * Close the database connection
   */
  async close(): Promise<void> {
    this.statements = {};

    if (this.db) {
      this.db.close();
      this.db = null;
    }
  }

  // ============================================================================
  // Statement Access (Safe Getters)
  // ============================================================================

  /**
   * Safely get a prepared statement, throwing a descriptive error if not initialized.
   */
  private getStatement<K extends keyof typeof this.statements>(
    name: K
  ): NonNullable<(typeof this.statements)[K]> {
    const stmt = this.statements[name];
    if (!stmt) {
      throw new Error(
        `Statement '${name}' not initialized. Ensure initialize() was called successfully.`
      );
    }
    return stmt;
  }

  // ============================================================================
  // IKeyValueStore
  // ============================================================================

  get(key: Uint8Array): Uint8Array | undefined {
    const row = this.getStatement('selectValue').get(Buffer.from(key));
    return row ? new Uint8Array(row.value) : undefined;
  }

  set(key: Uint8Array, value: Uint8Array): void {
    this.getStatement('upsertValue').run(Buffer.from(key), Buffer.from(value));
  }

  /**
   * Execute fn within a single transaction.
   * All writes either succeed together or are rolled back together.
   */
  transaction<T>(fn: () => T): T {
    const txn = this.database.transaction(fn);
    return txn();
  }

  /**
   * Number of stored entries
   */
  count(): number {
    return this.getStatement('countEntries').get()?.total ?? 0;
  }

  getDbPath(): string {
    return this.config.dbPath;
  }

  // ============================================================================
  // Migrations
  // ============================================================================

  private async runMigrations(): Promise<void> {
    const db = this.database;
    const currentVersion = this.getSchemaVersion();

    for (const file of this.getMigrationFiles()) {
      const version = this.extractMigrationVersion(file);
      if (version > currentVersion) {
        const sql = readFileSync(join(MIGRATIONS_DIR, file), 'utf-8');
        db.exec(sql);
      }
    }
  }

  /**
   * Current schema version, 0 before the first migration
   */
  private getSchemaVersion(): number {
    const db = this.database;
    const table = db
      .prepare<[string], { name: string }>(
        "SELECT name FROM sqlite_master WHERE type = 'table' AND name = ?"
      )
      .get('schema_version');
    if (!table) {
      return 0;
    }

    const row = db
      .prepare<[], VersionRow>('SELECT MAX(version) as version FROM schema_version')
      .get();
    return row?.version ?? 0;
  }

  /**
   * Get sorted list of migration files
   */
  private getMigrationFiles(): string[] {
    return readdirSync(MIGRATIONS_DIR)
      .filter((f) => f.endsWith('.sql'))
      .sort((a, b) => this.extractMigrationVersion(a) - this.extractMigrationVersion(b));
  }

  /**
   * Extract version number from migration filename
   */
  private extractMigrationVersion(filename: string): number {
    const match = filename.match(/^(\d+)/);
    return match ? parseInt(match[1], 10) : 0;
  }
}
