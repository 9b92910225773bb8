/**
 * Oracle State
 *
 * Storage layout and byte codec for the three oracle entities:
 * - Config      at the fixed key `config`
 * - Asset       at namespace `asset` + symbol
 * - PriceRecord at namespace `price` + symbol
 *
 * Namespaced keys are `[u16 big-endian namespace length] ++ namespace ++ key`,
 * so an asset and a price stored under the same symbol never collide.
 * Values are UTF-8 JSON with canonical identities as hex and decimals as
 * strings. Every read goes to the store; nothing is cached.
 */

import { z } from 'zod';

import type { Asset, Config, PriceRecord } from '../types/oracle.types.js';
import type { IKeyValueStore, IReadonlyKeyValueStore } from './kv-store.js';
import { CanonicalAddr } from '../utils/address-api.js';
import { decimalToString, parseDecimal } from '../utils/decimal.js';
import { notFound, parseError } from '../utils/oracle-error.js';

// ============================================================================
// Keys
// ============================================================================

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export const KEY_CONFIG = encoder.encode('config');
export const PREFIX_ASSET = 'asset';
export const PREFIX_PRICE = 'price';

/** Largest namespace length a u16 prefix can describe */
const MAX_NAMESPACE_LENGTH = 0xffff;

/**
 * Build a namespaced key: length-prefixed namespace followed by the key.
 */
export function namespacedKey(namespace: string, key: string): Uint8Array {
  const ns = encoder.encode(namespace);
  if (ns.length > MAX_NAMESPACE_LENGTH) {
    throw new Error(`Namespace too long: ${ns.length} bytes`);
  }
  const suffix = encoder.encode(key);

  const out = new Uint8Array(2 + ns.length + suffix.length);
  out[0] = (ns.length >> 8) & 0xff;
  out[1] = ns.length & 0xff;
  out.set(ns, 2);
  out.set(suffix, 2 + ns.length);
  return out;
}

export function assetKey(symbol: string): Uint8Array {
  return namespacedKey(PREFIX_ASSET, symbol);
}

export function priceKey(symbol: string): Uint8Array {
  return namespacedKey(PREFIX_PRICE, symbol);
}

// ============================================================================
// Stored Document Schemas
// ============================================================================

const canonicalHex = z.string().regex(/^(?:[0-9a-f]{2})+$/);
const decimalString = z.string().regex(/^\d+(?:\.\d+)?$/);

const configDocSchema = z.object({
  owner: canonicalHex,
  base_denom: z.string(),
});

const assetDocSchema = z.object({
  symbol: z.string(),
  feeder: canonicalHex,
  token: canonicalHex,
});

const priceDocSchema = z.object({
  price: decimalString,
  price_multiplier: decimalString,
  last_update_time: z.number().int().nonnegative(),
});

// ============================================================================
// Codec Helpers
// ============================================================================

function encodeDoc(doc: object): Uint8Array {
  return encoder.encode(JSON.stringify(doc));
}

/**
 * Decode stored bytes with the given schema.
 * @throws OracleError (PARSE_ERROR) when the bytes are not the expected document
 */
function decodeDoc<T>(bytes: Uint8Array, schema: z.ZodType<T>, target: string): T {
  let raw: unknown;
  try {
    raw = JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw parseError(target, error);
  }

  const result = schema.safeParse(raw);
  if (!result.success) {
    throw parseError(target, result.error);
  }
  return result.data;
}

// ============================================================================
// Config
// ============================================================================

export function storeConfig(storage: IKeyValueStore, config: Config): void {
  storage.set(
    KEY_CONFIG,
    encodeDoc({ owner: config.owner.toHex(), base_denom: config.baseDenom })
  );
}

/**
 * @throws OracleError (NOT_FOUND) before initialization
 */
export function readConfig(storage: IReadonlyKeyValueStore): Config {
  const bytes = storage.get(KEY_CONFIG);
  if (!bytes) {
    throw notFound('config');
  }

  const doc = decodeDoc(bytes, configDocSchema, 'Config');
  return {
    owner: CanonicalAddr.fromHex(doc.owner),
    baseDenom: doc.base_denom,
  };
}

export function hasConfig(storage: IReadonlyKeyValueStore): boolean {
  return storage.get(KEY_CONFIG) !== undefined;
}

// ============================================================================
// Asset
// ============================================================================

export function storeAsset(storage: IKeyValueStore, symbol: string, asset: Asset): void {
  storage.set(
    assetKey(symbol),
    encodeDoc({
      symbol: asset.symbol,
      feeder: asset.feeder.toHex(),
      token: asset.token.toHex(),
    })
  );
}

/**
 * @throws OracleError (NOT_FOUND) when no asset is registered under symbol
 */
export function readAsset(storage: IReadonlyKeyValueStore, symbol: string): Asset {
  const bytes = storage.get(assetKey(symbol));
  if (!bytes) {
    throw notFound('asset');
  }

  const doc = decodeDoc(bytes, assetDocSchema, 'Asset');
  return {
    symbol: doc.symbol,
    feeder: CanonicalAddr.fromHex(doc.feeder),
    token: CanonicalAddr.fromHex(doc.token),
  };
}

export function hasAsset(storage: IReadonlyKeyValueStore, symbol: string): boolean {
  return storage.get(assetKey(symbol)) !== undefined;
}

// ============================================================================
// Price
// ============================================================================

export function storePrice(storage: IKeyValueStore, symbol: string, price: PriceRecord): void {
  storage.set(
    priceKey(symbol),
    encodeDoc({
      price: decimalToString(price.price),
      price_multiplier: decimalToString(price.priceMultiplier),
      last_update_time: price.lastUpdateTime,
    })
  );
}

/**
 * @throws OracleError (NOT_FOUND) when no price is stored under symbol
 */
export function readPrice(storage: IReadonlyKeyValueStore, symbol: string): PriceRecord {
  const bytes = storage.get(priceKey(symbol));
  if (!bytes) {
    throw notFound('price');
  }

  const doc = decodeDoc(bytes, priceDocSchema, 'Price');
  return {
    price: parseDecimal(doc.price),
    priceMultiplier: parseDecimal(doc.price_multiplier),
    lastUpdateTime: doc.last_update_time,
  };
}
