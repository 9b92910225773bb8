/**
 * OracleService Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import {
  OracleService,
  systemClock,
  type ExecutedEvent,
  type OracleClock,
  type RejectedEvent,
} from './oracle-service.js';
import { captureError, createSpyLogger } from './test-fixtures.js';
import { MemoryKeyValueStore } from '../persistence/kv-store.js';
import { parseDecimal } from '../utils/decimal.js';
import { MockAddressApi } from '../utils/address-api.js';
import { OracleErrorCode, isOracleError } from '../utils/oracle-error.js';
import { LogEvents } from '../utils/oracle-logger.js';

const FIXED_TIME = 1_700_000_000;

describe('OracleService', () => {
  let logger: ReturnType<typeof createSpyLogger>;
  let clock: OracleClock;
  let service: OracleService;

  beforeEach(() => {
    logger = createSpyLogger();
    clock = { now: () => FIXED_TIME };
    service = new OracleService({
      storage: new MemoryKeyValueStore(),
      api: new MockAddressApi(),
      logger,
      clock,
      initialBlockHeight: 100,
    });
    service.instantiate('owner0000', { owner: 'owner0000', base_denom: 'uusd' });
    service.execute('owner0000', {
      register_asset: { symbol: 'mAPPL', feeder: 'addr0000', token: 'asset0000' },
    });
  });

  describe('block height', () => {
    it('should advance once per command', () => {
      expect(service.getBlockHeight()).toBe(102);

      service.execute('addr0000', { feed_price: { symbol: 'mAPPL', price: parseDecimal('1') } });
      expect(service.getBlockHeight()).toBe(103);
    });

    it('should advance for rejected commands but not for queries', () => {
      captureError(() => service.execute('owner0001', { update_config: {} }));
      service.query({ config: {} });

      expect(service.getBlockHeight()).toBe(103);
    });

    it('should default to height 1 and the system clock', () => {
      const defaults = new OracleService({
        storage: new MemoryKeyValueStore(),
        api: new MockAddressApi(),
        logger,
      });
      expect(defaults.getBlockHeight()).toBe(1);
      expect(Number.isInteger(systemClock.now())).toBe(true);
    });
  });

  describe('execute', () => {
    it('should stamp prices with the clock time', () => {
      service.execute('addr0000', { feed_price: { symbol: 'mAPPL', price: parseDecimal('1.2') } });

      expect(service.query({ price: { symbol: 'mAPPL' } })).toEqual({
        price: '1.2',
        price_multiplier: '1',
        last_update_time: FIXED_TIME,
      });
    });

    it('should emit executed with the env the command ran in', () => {
      const events: ExecutedEvent[] = [];
      service.on('executed', (event) => events.push(event));

      service.execute('addr0000', { feed_price: { symbol: 'mAPPL', price: parseDecimal('2') } });

      expect(events).toHaveLength(1);
      expect(events[0]).toMatchObject({
        command: 'feed_price',
        sender: 'addr0000',
        env: { block: { height: 102, time: FIXED_TIME }, message: { sender: 'addr0000' } },
      });
      expect(events[0]?.response.log).toEqual([
        { key: 'action', value: 'price_feed' },
        { key: 'price', value: '2' },
      ]);
    });

    it('should log executed commands and price feeds', () => {
      service.execute('addr0000', {
        feed_price: { symbol: 'mAPPL', price: parseDecimal('2'), price_multiplier: parseDecimal('0.5') },
      });

      expect(logger.info).toHaveBeenCalledWith(LogEvents.COMMAND_EXECUTED, {
        command: 'feed_price',
        sender: 'addr0000',
        blockHeight: 102,
        blockTime: FIXED_TIME,
      });
      expect(logger.info).toHaveBeenCalledWith(LogEvents.PRICE_FED, {
        symbol: 'mAPPL',
        sender: 'addr0000',
        price: '2',
        priceMultiplier: '0.5',
        blockTime: FIXED_TIME,
      });
    });

    it('should log, emit and rethrow rejected commands', () => {
      const rejected = vi.fn<(event: RejectedEvent) => void>();
      service.on('rejected', rejected);

      const error = captureError(() =>
        service.execute('addr0001', { feed_price: { symbol: 'mAPPL', price: parseDecimal('9') } })
      );

      expect(isOracleError(error, OracleErrorCode.UNAUTHORIZED)).toBe(true);
      expect(rejected).toHaveBeenCalledTimes(1);
      expect(rejected.mock.calls[0]?.[0]).toMatchObject({ command: 'feed_price', sender: 'addr0001' });
      expect(logger.warn).toHaveBeenCalledWith(LogEvents.COMMAND_REJECTED, {
        command: 'feed_price',
        sender: 'addr0001',
        errorCode: OracleErrorCode.UNAUTHORIZED,
        error: 'Unauthorized',
      });
    });

    it('should reject feeds stamped with a fractional clock time', () => {
      const skewed = new OracleService({
        storage: new MemoryKeyValueStore(),
        api: new MockAddressApi(),
        logger,
        clock: { now: () => 1.5 },
      });
      skewed.instantiate('owner0000', { owner: 'owner0000', base_denom: 'uusd' });
      skewed.execute('owner0000', {
        register_asset: { symbol: 'mAPPL', feeder: 'addr0000', token: 'asset0000' },
      });

      const error = captureError(() =>
        skewed.execute('addr0000', { feed_price: { symbol: 'mAPPL', price: parseDecimal('1.2') } })
      );

      expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
      expect(skewed.queryJson('{"price":{"symbol":"mAPPL"}}')).toBe(
        '{"price":"0","price_multiplier":"1","last_update_time":0}'
      );
    });

    it('should reject duplicate registration with ALREADY_EXISTS', () => {
      const error = captureError(() =>
        service.execute('owner0000', {
          register_asset: { symbol: 'mAPPL', feeder: 'addr0001', token: 'asset0001' },
        })
      );

      expect(isOracleError(error, OracleErrorCode.ALREADY_EXISTS)).toBe(true);
      expect(service.query({ asset: { symbol: 'mAPPL' } })).toEqual({
        symbol: 'mAPPL',
        feeder: 'addr0000',
        token: 'asset0000',
      });
    });
  });

  describe('query', () => {
    it('should log and rethrow failed queries', () => {
      const error = captureError(() => service.query({ price: { symbol: 'uusd' } }));

      expect(isOracleError(error, OracleErrorCode.NOT_FOUND)).toBe(true);
      expect(logger.warn).toHaveBeenCalledWith(LogEvents.QUERY_REJECTED, {
        command: 'price',
        errorCode: OracleErrorCode.NOT_FOUND,
        error: 'no price data stored',
      });
    });
  });

  describe('JSON entry points', () => {
    it('should execute and query JSON documents', () => {
      service.executeJson(
        'addr0000',
        '{"feed_price":{"symbol":"mAPPL","price":"1.25","price_multiplier":"2"}}'
      );

      expect(service.queryJson('{"price":{"symbol":"mAPPL"}}')).toBe(
        `{"price":"1.25","price_multiplier":"2","last_update_time":${FIXED_TIME}}`
      );
      expect(service.queryJson('{"config":{}}')).toBe('{"owner":"owner0000","base_denom":"uusd"}');
    });

    it('should instantiate from JSON', () => {
      const fresh = new OracleService({
        storage: new MemoryKeyValueStore(),
        api: new MockAddressApi(),
        logger,
        clock,
      });

      expect(fresh.instantiateJson('owner0000', '{"owner":"owner0001","base_denom":"uluna"}')).toEqual({
        log: [],
      });
      expect(fresh.queryJson('{"config":{}}')).toBe('{"owner":"owner0001","base_denom":"uluna"}');
    });

    it('should reject malformed JSON with INVALID_INPUT before any state change', () => {
      const error = captureError(() => service.executeJson('addr0000', '{"feed_price":'));

      expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
      expect(service.getBlockHeight()).toBe(102);
    });

    it('should reject an unknown command', () => {
      const error = captureError(() => service.executeJson('addr0000', '{"burn":{}}'));
      expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
    });
  });
});
