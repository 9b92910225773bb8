/**
 * Oracle Service
 *
 * In-process host for the oracle contract. Owns the store, the address API,
 * a clock and a logger; builds the invocation Env for each command and
 * exposes typed and JSON entry points.
 *
 * Events:
 * - 'executed': a command was applied (ExecutedEvent)
 * - 'rejected': a command failed and was rolled back (RejectedEvent)
 */

import { EventEmitter } from 'events';

import type {
  Env,
  HandleResponse,
  HumanAddr,
  InitResponse,
  OracleDeps,
  QueryResponse,
} from '../types/oracle.types.js';
import {
  handleMsgKind,
  parseHandleMsg,
  parseInitMsg,
  parseJson,
  parseQueryMsg,
  queryMsgKind,
  type HandleMsg,
  type HandleMsgKind,
  type InitMsg,
  type QueryMsg,
} from '../types/oracle-messages.js';
import type { IKeyValueStore } from '../persistence/kv-store.js';
import type { IAddressApi } from '../utils/address-api.js';
import { decimalToString } from '../utils/decimal.js';
import { isOracleError, OracleError } from '../utils/oracle-error.js';
import { createOracleLogger, LogEvents, OracleLogger, type IOracleLogger } from '../utils/oracle-logger.js';
import { dispatchQuery, handle, init } from './oracle-contract.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Source of block time, in seconds since epoch
 */
export interface OracleClock {
  now(): number;
}

/** Wall clock truncated to whole seconds */
export const systemClock: OracleClock = {
  now: () => Math.floor(Date.now() / 1000),
};

export interface OracleServiceOptions {
  storage: IKeyValueStore;
  api: IAddressApi;
  /** Default: structured stdout logger */
  logger?: IOracleLogger;
  /** Default: systemClock */
  clock?: OracleClock;
  /** Height of the first block (default: 1) */
  initialBlockHeight?: number;
}

export interface ExecutedEvent {
  command: HandleMsgKind | 'init';
  sender: HumanAddr;
  env: Env;
  response: HandleResponse;
}

export interface RejectedEvent {
  command: HandleMsgKind | 'init';
  sender: HumanAddr;
  error: OracleError;
}

export interface OracleServiceEvents {
  executed: (event: ExecutedEvent) => void;
  rejected: (event: RejectedEvent) => void;
}

export declare interface OracleService {
  on<E extends keyof OracleServiceEvents>(event: E, listener: OracleServiceEvents[E]): this;
  once<E extends keyof OracleServiceEvents>(event: E, listener: OracleServiceEvents[E]): this;
  off<E extends keyof OracleServiceEvents>(event: E, listener: OracleServiceEvents[E]): this;
  emit<E extends keyof OracleServiceEvents>(
    event: E,
    ...args: Parameters<OracleServiceEvents[E]>
  ): boolean;
}

// ============================================================================
// OracleService Implementation
// ============================================================================

export class OracleService extends EventEmitter {
  private readonly deps: OracleDeps;
  private readonly logger: IOracleLogger;
  private readonly clock: OracleClock;
  private blockHeight: number;

  constructor(options: OracleServiceOptions) {
    super();
    this.deps = { storage: options.storage, api: options.api };
    this.logger = options.logger ?? createOracleLogger();
    this.clock = options.clock ?? systemClock;
    this.blockHeight = options.initialBlockHeight ?? 1;
  }

  // ============================================================================
  // Typed Entry Points
  // ============================================================================

  /**
   * Create the oracle configuration.
   */
  instantiate(sender: HumanAddr, msg: InitMsg): InitResponse {
    const env = this.nextEnv(sender);
    const response = this.run('init', sender, () => init(this.deps, env, msg));

    this.logger.info(LogEvents.ORACLE_INSTANTIATED, {
      sender,
      blockHeight: env.block.height,
      message: `owner=${msg.owner} base_denom=${msg.base_denom}`,
    });
    this.emit('executed', { command: 'init', sender, env, response });
    return response;
  }

  /**
   * Execute a command on behalf of sender. Failures are logged, emitted as
   * 'rejected' and re-thrown.
   */
  execute(sender: HumanAddr, msg: HandleMsg): HandleResponse {
    const command = handleMsgKind(msg);
    const env = this.nextEnv(sender);
    const response = this.run(command, sender, () => handle(this.deps, env, msg));

    this.logger.info(LogEvents.COMMAND_EXECUTED, {
      command,
      sender,
      blockHeight: env.block.height,
      blockTime: env.block.time,
    });
    if ('feed_price' in msg) {
      this.logger.info(LogEvents.PRICE_FED, {
        symbol: msg.feed_price.symbol,
        sender,
        price: decimalToString(msg.feed_price.price),
        priceMultiplier: msg.feed_price.price_multiplier
          ? decimalToString(msg.feed_price.price_multiplier)
          : undefined,
        blockTime: env.block.time,
      });
    }

    this.emit('executed', { command, sender, env, response });
    return response;
  }

  query(msg: QueryMsg): QueryResponse {
    try {
      return dispatchQuery(this.deps, msg);
    } catch (error) {
      this.logger.warn(LogEvents.QUERY_REJECTED, {
        command: queryMsgKind(msg),
        errorCode: isOracleError(error) ? error.code : undefined,
        error: OracleLogger.sanitizeErrorMessage(error),
      });
      throw error;
    }
  }

  // ============================================================================
  // JSON Entry Points
  // ============================================================================

  instantiateJson(sender: HumanAddr, raw: string): InitResponse {
    return this.instantiate(sender, parseInitMsg(parseJson(raw)));
  }

  executeJson(sender: HumanAddr, raw: string): HandleResponse {
    return this.execute(sender, parseHandleMsg(parseJson(raw)));
  }

  /**
   * @returns the JSON-encoded response record
   */
  queryJson(raw: string): string {
    return JSON.stringify(this.query(parseQueryMsg(parseJson(raw))));
  }

  getBlockHeight(): number {
    return this.blockHeight;
  }

  // ============================================================================
  // Private Methods
  // ============================================================================

  private nextEnv(sender: HumanAddr): Env {
    const env: Env = {
      block: { height: this.blockHeight, time: this.clock.now() },
      message: { sender },
    };
    this.blockHeight++;
    return env;
  }

  private run<T>(command: HandleMsgKind | 'init', sender: HumanAddr, fn: () => T): T {
    try {
      return fn();
    } catch (error) {
      if (isOracleError(error)) {
        this.logger.warn(LogEvents.COMMAND_REJECTED, {
          command,
          sender,
          errorCode: error.code,
          error: OracleLogger.sanitizeErrorMessage(error),
        });
        this.emit('rejected', { command, sender, error });
      } else {
        this.logger.error(LogEvents.ERROR, {
          command,
          sender,
          error: OracleLogger.sanitizeErrorMessage(error),
        });
      }
      throw error;
    }
  }
}
