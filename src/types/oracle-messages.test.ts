/**
 * Tests for oracle message parsing
 */

import { describe, it, expect } from 'vitest';
import {
  parseInitMsg,
  parseHandleMsg,
  parseQueryMsg,
  parseJson,
  handleMsgKind,
  queryMsgKind,
} from './oracle-messages.js';
import { decimalToString } from '../utils/decimal.js';
import { OracleErrorCode, isOracleError } from '../utils/oracle-error.js';
import { captureError } from '../services/test-fixtures.js';

describe('parseInitMsg', () => {
  it('should accept owner and base_denom', () => {
    expect(parseInitMsg({ owner: 'owner0000', base_denom: 'base0000' })).toEqual({
      owner: 'owner0000',
      base_denom: 'base0000',
    });
  });

  it('should reject missing fields', () => {
    const error = captureError(() => parseInitMsg({ owner: 'owner0000' }));
    expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
  });
});

describe('parseHandleMsg', () => {
  it('should parse update_config with and without an owner', () => {
    const withOwner = parseHandleMsg({ update_config: { owner: 'owner0001' } });
    expect(withOwner).toEqual({ update_config: { owner: 'owner0001' } });
    expect(handleMsgKind(withOwner)).toBe('update_config');

    expect(parseHandleMsg({ update_config: {} })).toEqual({ update_config: {} });
    expect(parseHandleMsg({ update_config: { owner: null } })).toEqual({ update_config: { owner: null } });
  });

  it('should parse register_asset', () => {
    const msg = parseHandleMsg({
      register_asset: { symbol: 'mAPPL', feeder: 'addr0000', token: 'asset0000' },
    });
    expect(msg).toEqual({ register_asset: { symbol: 'mAPPL', feeder: 'addr0000', token: 'asset0000' } });
    expect(handleMsgKind(msg)).toBe('register_asset');
  });

  it('should parse feed_price decimals', () => {
    const msg = parseHandleMsg({
      feed_price: { symbol: 'mAPPL', price: '1.20', price_multiplier: '2' },
    });
    expect(handleMsgKind(msg)).toBe('feed_price');
    if (!('feed_price' in msg)) throw new Error('expected feed_price');

    expect(msg.feed_price.symbol).toBe('mAPPL');
    expect(decimalToString(msg.feed_price.price)).toBe('1.2');
    const multiplier = msg.feed_price.price_multiplier;
    expect(multiplier ? decimalToString(multiplier) : undefined).toBe('2');
  });

  it('should leave price_multiplier absent when not given', () => {
    const msg = parseHandleMsg({ feed_price: { symbol: 'mAPPL', price: '1.2' } });
    if (!('feed_price' in msg)) throw new Error('expected feed_price');
    expect(msg.feed_price.price_multiplier).toBeUndefined();
  });

  it('should reject negative and numeric prices', () => {
    for (const price of ['-1', 1.2]) {
      const error = captureError(() => parseHandleMsg({ feed_price: { symbol: 'mAPPL', price } }));
      expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
    }
  });

  it('should reject empty or padded symbols', () => {
    for (const symbol of ['', ' mAPPL']) {
      const error = captureError(() =>
        parseHandleMsg({ register_asset: { symbol, feeder: 'addr0000', token: 'asset0000' } })
      );
      expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
    }
  });

  it('should reject unknown variants and extra fields', () => {
    expect(isOracleError(captureError(() => parseHandleMsg({ withdraw: {} })), OracleErrorCode.INVALID_INPUT)).toBe(true);
    expect(
      isOracleError(
        captureError(() => parseHandleMsg({ update_config: { owner: 'owner0001', extra: 1 } })),
        OracleErrorCode.INVALID_INPUT
      )
    ).toBe(true);
  });

  it('should reject two variants in one message', () => {
    const error = captureError(() =>
      parseHandleMsg({ update_config: {}, feed_price: { symbol: 'mAPPL', price: '1' } })
    );
    expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
  });
});

describe('parseQueryMsg', () => {
  it('should parse the three query variants', () => {
    expect(queryMsgKind(parseQueryMsg({ config: {} }))).toBe('config');
    expect(parseQueryMsg({ asset: { symbol: 'mAPPL' } })).toEqual({ asset: { symbol: 'mAPPL' } });
    expect(queryMsgKind(parseQueryMsg({ price: { symbol: 'mAPPL' } }))).toBe('price');
  });

  it('should reject a query without a symbol', () => {
    expect(isOracleError(captureError(() => parseQueryMsg({ price: {} })), OracleErrorCode.INVALID_INPUT)).toBe(true);
  });
});

describe('parseJson', () => {
  it('should parse JSON text', () => {
    expect(parseJson('{"config":{}}')).toEqual({ config: {} });
  });

  it('should map syntax errors to INVALID_INPUT', () => {
    const error = captureError(() => parseJson('{'));
    expect(isOracleError(error, OracleErrorCode.INVALID_INPUT)).toBe(true);
    expect(error).toHaveProperty('message', expect.stringMatching(/^Invalid input: malformed JSON: /));
  });
});
