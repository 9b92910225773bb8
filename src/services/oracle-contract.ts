/**
 * Oracle Contract
 *
 * Entry points the host invokes: init, handle (commands) and query.
 * Commands run inside one store transaction each, so a failed command leaves
 * no write behind. Queries are read-only and need no caller identity.
 */

import type {
  Env,
  HandleResponse,
  InitResponse,
  OracleDeps,
  OracleQueryDeps,
  QueryResponse,
} from '../types/oracle.types.js';
import type { HandleMsg, InitMsg, QueryMsg } from '../types/oracle-messages.js';
import { toBinary } from '../utils/binary.js';
import { initialize, queryConfig, updateConfig } from './config-store.js';
import { queryAsset, registerAsset } from './asset-registry.js';
import { feedPrice, queryPrice } from './price-ledger.js';

export function init(deps: OracleDeps, _env: Env, msg: InitMsg): InitResponse {
  return deps.storage.transaction(() => {
    initialize(deps, msg.owner, msg.base_denom);
    return { log: [] };
  });
}

export function handle(deps: OracleDeps, env: Env, msg: HandleMsg): HandleResponse {
  return deps.storage.transaction((): HandleResponse => {
    if ('update_config' in msg) {
      updateConfig(deps, env, msg.update_config.owner);
      return { log: [] };
    }

    if ('register_asset' in msg) {
      const { symbol, feeder, token } = msg.register_asset;
      registerAsset(deps, env, symbol, feeder, token);
      return { log: [] };
    }

    const { symbol, price, price_multiplier } = msg.feed_price;
    return { log: feedPrice(deps, env, symbol, price, price_multiplier) };
  });
}

/**
 * Answer a query with a typed response record.
 */
export function dispatchQuery(deps: OracleQueryDeps, msg: QueryMsg): QueryResponse {
  if ('config' in msg) {
    return queryConfig(deps);
  }
  if ('asset' in msg) {
    return queryAsset(deps, msg.asset.symbol);
  }
  return queryPrice(deps, msg.price.symbol);
}

/**
 * Answer a query with the JSON-encoded response record.
 */
export function query(deps: OracleQueryDeps, msg: QueryMsg): Uint8Array {
  return toBinary(dispatchQuery(deps, msg));
}
