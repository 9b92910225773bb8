/**
 * Oracle State Unit Tests
 *
 * Key layout and entity codec over the in-memory store.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  KEY_CONFIG,
  assetKey,
  priceKey,
  namespacedKey,
  readAsset,
  readConfig,
  readPrice,
  hasAsset,
  storeAsset,
  storeConfig,
  storePrice,
} from './oracle-state.js';
import { MemoryKeyValueStore } from './kv-store.js';
import { MockAddressApi } from '../utils/address-api.js';
import { decimalToString, parseDecimal } from '../utils/decimal.js';
import { OracleErrorCode, isOracleError } from '../utils/oracle-error.js';
import { captureError } from '../services/test-fixtures.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

describe('oracle state', () => {
  const api = new MockAddressApi();
  let storage: MemoryKeyValueStore;

  beforeEach(() => {
    storage = new MemoryKeyValueStore();
  });

  describe('keys', () => {
    it('should prefix namespaced keys with a big-endian length', () => {
      expect(Array.from(namespacedKey('asset', 'ab'))).toEqual([0, 5, 97, 115, 115, 101, 116, 97, 98]);
    });

    it('should keep asset and price keys of the same symbol apart', () => {
      expect(Buffer.from(assetKey('mAPPL')).equals(Buffer.from(priceKey('mAPPL')))).toBe(false);
    });

    it('should use the bare config key', () => {
      expect(decoder.decode(KEY_CONFIG)).toBe('config');
    });
  });

  describe('config', () => {
    it('should fail with NOT_FOUND before it is stored', () => {
      const error = captureError(() => readConfig(storage));
      expect(isOracleError(error, OracleErrorCode.NOT_FOUND)).toBe(true);
      expect(error).toHaveProperty('message', 'no config data stored');
    });

    it('should round-trip through the store', () => {
      storeConfig(storage, { owner: api.canonicalAddress('owner0000'), baseDenom: 'uusd' });

      const config = readConfig(storage);
      expect(api.humanAddress(config.owner)).toBe('owner0000');
      expect(config.baseDenom).toBe('uusd');
    });

    it('should store identities in canonical hex form', () => {
      storeConfig(storage, { owner: api.canonicalAddress('abc'), baseDenom: 'uusd' });

      const stored = JSON.parse(decoder.decode(storage.get(KEY_CONFIG)));
      expect(stored).toEqual({
        owner: '6162630000000000000000000000000000000000',
        base_denom: 'uusd',
      });
    });

    it('should fail with PARSE_ERROR on corrupt bytes', () => {
      storage.set(KEY_CONFIG, encoder.encode('{not json'));
      const error = captureError(() => readConfig(storage));
      expect(isOracleError(error, OracleErrorCode.PARSE_ERROR)).toBe(true);
      expect(error).toHaveProperty('message', 'Error parsing Config');
    });

    it('should fail with PARSE_ERROR on a wrong document shape', () => {
      storage.set(KEY_CONFIG, encoder.encode('{"owner":"zz","base_denom":"uusd"}'));
      expect(isOracleError(captureError(() => readConfig(storage)), OracleErrorCode.PARSE_ERROR)).toBe(true);
    });
  });

  describe('asset', () => {
    it('should fail with NOT_FOUND for unknown symbols', () => {
      const error = captureError(() => readAsset(storage, 'uusd'));
      expect(isOracleError(error, OracleErrorCode.NOT_FOUND)).toBe(true);
      expect(error).toHaveProperty('message', 'no asset data stored');
      expect(hasAsset(storage, 'uusd')).toBe(false);
    });

    it('should round-trip through the store', () => {
      storeAsset(storage, 'mAPPL', {
        symbol: 'mAPPL',
        feeder: api.canonicalAddress('addr0000'),
        token: api.canonicalAddress('asset0000'),
      });

      const asset = readAsset(storage, 'mAPPL');
      expect(asset.symbol).toBe('mAPPL');
      expect(api.humanAddress(asset.feeder)).toBe('addr0000');
      expect(api.humanAddress(asset.token)).toBe('asset0000');
      expect(hasAsset(storage, 'mAPPL')).toBe(true);
    });
  });

  describe('price', () => {
    it('should fail with NOT_FOUND for unknown symbols', () => {
      const error = captureError(() => readPrice(storage, 'mAPPL'));
      expect(isOracleError(error, OracleErrorCode.NOT_FOUND)).toBe(true);
      expect(error).toHaveProperty('message', 'no price data stored');
    });

    it('should round-trip decimals exactly', () => {
      storePrice(storage, 'mAPPL', {
        price: parseDecimal('123.000000000000000001'),
        priceMultiplier: parseDecimal('0.5'),
        lastUpdateTime: 1_571_797_419,
      });

      const record = readPrice(storage, 'mAPPL');
      expect(decimalToString(record.price)).toBe('123.000000000000000001');
      expect(decimalToString(record.priceMultiplier)).toBe('0.5');
      expect(record.lastUpdateTime).toBe(1_571_797_419);
    });

    it('should not be visible under the asset key', () => {
      storePrice(storage, 'mAPPL', {
        price: parseDecimal('1'),
        priceMultiplier: parseDecimal('1'),
        lastUpdateTime: 0,
      });
      expect(hasAsset(storage, 'mAPPL')).toBe(false);
    });
  });
});
