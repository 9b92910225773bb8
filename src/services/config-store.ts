/**
 * Config Store
 *
 * Owner-gated singleton configuration.
 */

import type {
  ConfigResponse,
  Env,
  HumanAddr,
  OracleDeps,
  OracleQueryDeps,
} from '../types/oracle.types.js';
import { hasConfig, readConfig, storeConfig } from '../persistence/oracle-state.js';
import { alreadyInitialized, unauthorized } from '../utils/oracle-error.js';

/**
 * Write the singleton Config. Ownership changes afterwards go through
 * updateConfig only.
 *
 * @throws OracleError (ALREADY_EXISTS) when a Config is already stored
 */
export function initialize(deps: OracleDeps, owner: HumanAddr, baseDenom: string): void {
  if (hasConfig(deps.storage)) {
    throw alreadyInitialized('config');
  }

  storeConfig(deps.storage, {
    owner: deps.api.canonicalAddress(owner),
    baseDenom,
  });
}

/**
 * Update the configuration. Only the current owner may call this; passing no
 * new owner is an authorization check that writes nothing new.
 *
 * @throws OracleError (UNAUTHORIZED) when the sender is not the owner
 * @throws OracleError (NOT_FOUND) before initialization
 */
export function updateConfig(deps: OracleDeps, env: Env, newOwner?: HumanAddr | null): void {
  const config = readConfig(deps.storage);
  if (!deps.api.canonicalAddress(env.message.sender).equals(config.owner)) {
    throw unauthorized();
  }

  if (newOwner !== undefined && newOwner !== null) {
    config.owner = deps.api.canonicalAddress(newOwner);
  }

  storeConfig(deps.storage, config);
}

export function queryConfig(deps: OracleQueryDeps): ConfigResponse {
  const config = readConfig(deps.storage);
  return {
    owner: deps.api.humanAddress(config.owner),
    base_denom: config.baseDenom,
  };
}
