/**
 * Price Ledger
 *
 * Latest price per registered symbol, writable only by that symbol's feeder.
 */

import type {
  Env,
  LogAttribute,
  OracleDeps,
  OracleQueryDeps,
  PriceResponse,
} from '../types/oracle.types.js';
import { readAsset, readPrice, storePrice } from '../persistence/oracle-state.js';
import { decimalToString, type Decimal } from '../utils/decimal.js';
import { invalidInput, unauthorized } from '../utils/oracle-error.js';

/** Action name recorded in the log of a price feed */
export const PRICE_FEED_ACTION = 'price_feed';

/**
 * Record a new price for symbol at the block time of env.
 *
 * The price and update time are always overwritten; the multiplier only
 * when one is supplied.
 *
 * @returns log attributes: action=price_feed, price=<new price>
 * @throws OracleError (NOT_FOUND) when symbol is not registered
 * @throws OracleError (UNAUTHORIZED) when the sender is not the feeder
 * @throws OracleError (INVALID_INPUT) when the block time is not a whole number of seconds >= 0
 */
export function feedPrice(
  deps: OracleDeps,
  env: Env,
  symbol: string,
  price: Decimal,
  priceMultiplier?: Decimal | null
): LogAttribute[] {
  const asset = readAsset(deps.storage, symbol);
  if (!deps.api.canonicalAddress(env.message.sender).equals(asset.feeder)) {
    throw unauthorized();
  }

  const time = env.block.time;
  if (!Number.isSafeInteger(time) || time < 0) {
    throw invalidInput(`block time must be a non-negative integer: ${time}`);
  }

  const record = readPrice(deps.storage, symbol);
  record.lastUpdateTime = time;
  record.price = price;
  if (priceMultiplier !== undefined && priceMultiplier !== null) {
    record.priceMultiplier = priceMultiplier;
  }

  storePrice(deps.storage, symbol, record);

  return [
    { key: 'action', value: PRICE_FEED_ACTION },
    { key: 'price', value: decimalToString(price) },
  ];
}

export function queryPrice(deps: OracleQueryDeps, symbol: string): PriceResponse {
  const record = readPrice(deps.storage, symbol);
  return {
    price: decimalToString(record.price),
    price_multiplier: decimalToString(record.priceMultiplier),
    last_update_time: record.lastUpdateTime,
  };
}
