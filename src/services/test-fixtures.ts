/**
 * Shared Test Fixtures for Oracle Tests
 *
 * Provides reusable factory functions for dependencies, invocation contexts
 * and a silent logger.
 */

import { vi } from 'vitest';

import type { Env, OracleDeps } from '../types/oracle.types.js';
import { MemoryKeyValueStore } from '../persistence/kv-store.js';
import { MockAddressApi } from '../utils/address-api.js';
import type { IOracleLogger } from '../utils/oracle-logger.js';
import { initialize } from './config-store.js';

/** Block height used by mockEnv */
export const MOCK_BLOCK_HEIGHT = 12_345;

/** Block time used by mockEnv (2019-10-23T02:23:39Z) */
export const MOCK_BLOCK_TIME = 1_571_797_419;

export interface MockDeps extends OracleDeps {
  storage: MemoryKeyValueStore;
}

/**
 * Fresh in-memory store with a 20-byte mock address API
 */
export function mockDependencies(canonicalLength: number = 20): MockDeps {
  return {
    storage: new MemoryKeyValueStore(),
    api: new MockAddressApi(canonicalLength),
  };
}

/**
 * Invocation context for sender at the mock block
 */
export function mockEnv(sender: string, block: Partial<Env['block']> = {}): Env {
  return {
    block: {
      height: block.height ?? MOCK_BLOCK_HEIGHT,
      time: block.time ?? MOCK_BLOCK_TIME,
    },
    message: { sender },
  };
}

/**
 * Dependencies with Config { owner0000, base0000 } already written
 */
export function initializedDependencies(): MockDeps {
  const deps = mockDependencies();
  initialize(deps, 'owner0000', 'base0000');
  return deps;
}

/**
 * Logger whose methods are spies
 */
export function createSpyLogger(): IOracleLogger & {
  info: ReturnType<typeof vi.fn>;
  warn: ReturnType<typeof vi.fn>;
  error: ReturnType<typeof vi.fn>;
} {
  return {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    isEnabled: () => true,
  };
}

/**
 * Run fn and return what it threw
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
