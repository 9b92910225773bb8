/**
 * Asset Registry
 *
 * One-time registration of a symbol with its feeder and token. Registering
 * an asset also creates its price record, in the same transaction, so a
 * price never exists without its asset.
 *
 * Registration is open: any sender may register an unused symbol. Only the
 * one-registration-per-symbol rule is enforced.
 */

import type {
  AssetResponse,
  Env,
  HumanAddr,
  OracleDeps,
  OracleQueryDeps,
} from '../types/oracle.types.js';
import { hasAsset, readAsset, storeAsset, storePrice } from '../persistence/oracle-state.js';
import { DECIMAL_ONE, DECIMAL_ZERO } from '../utils/decimal.js';
import { alreadyExists } from '../utils/oracle-error.js';

/**
 * Register symbol with its feeder and token, and create its price record
 * as { price: 0, priceMultiplier: 1, lastUpdateTime: 0 }.
 *
 * @throws OracleError (ALREADY_EXISTS) when symbol is already registered
 * @throws OracleError (INVALID_INPUT) when feeder or token is malformed
 */
export function registerAsset(
  deps: OracleDeps,
  _env: Env,
  symbol: string,
  feeder: HumanAddr,
  token: HumanAddr
): void {
  if (hasAsset(deps.storage, symbol)) {
    throw alreadyExists('asset', symbol);
  }

  const asset = {
    symbol,
    feeder: deps.api.canonicalAddress(feeder),
    token: deps.api.canonicalAddress(token),
  };

  deps.storage.transaction(() => {
    storeAsset(deps.storage, symbol, asset);
    storePrice(deps.storage, symbol, {
      price: DECIMAL_ZERO,
      priceMultiplier: DECIMAL_ONE,
      lastUpdateTime: 0,
    });
  });
}

export function queryAsset(deps: OracleQueryDeps, symbol: string): AssetResponse {
  const asset = readAsset(deps.storage, symbol);
  return {
    symbol: asset.symbol,
    feeder: deps.api.humanAddress(asset.feeder),
    token: deps.api.humanAddress(asset.token),
  };
}
