/**
 * Address API
 *
 * Identity resolution between human-readable addresses (what callers send
 * and what queries return) and canonical identities (what is stored and
 * compared). Authorization checks only ever compare CanonicalAddr values.
 */

import type { HumanAddr } from '../types/oracle.types.js';
import { invalidInput } from './oracle-error.js';

// ============================================================================
// Constants
// ============================================================================

/** Default canonical address length in bytes */
export const DEFAULT_CANONICAL_LENGTH = 20;

/** Minimum accepted human address length */
const MIN_HUMAN_LENGTH = 3;

const HEX_PATTERN = /^(?:[0-9a-f]{2})*$/;

// ============================================================================
// CanonicalAddr
// ============================================================================

/**
 * Canonical identity: the raw bytes of an address, compared by value.
 */
export class CanonicalAddr {
  private constructor(private readonly hex: string) {}

  static fromBytes(bytes: Uint8Array): CanonicalAddr {
    return new CanonicalAddr(Buffer.from(bytes).toString('hex'));
  }

  /**
   * @throws OracleError (INVALID_INPUT) when the input is not lowercase hex
   */
  static fromHex(hex: string): CanonicalAddr {
    if (!HEX_PATTERN.test(hex)) {
      throw invalidInput(`canonical address is not hex: '${hex}'`);
    }
    return new CanonicalAddr(hex);
  }

  equals(other: CanonicalAddr): boolean {
    return this.hex === other.hex;
  }

  toBytes(): Uint8Array {
    return new Uint8Array(Buffer.from(this.hex, 'hex'));
  }

  toHex(): string {
    return this.hex;
  }

  get length(): number {
    return this.hex.length / 2;
  }
}

// ============================================================================
// IAddressApi Interface
// ============================================================================

/**
 * Interface for identity resolution
 *
 * Enables dependency injection and testability.
 */
export interface IAddressApi {
  /** Resolve a human address to its canonical identity */
  canonicalAddress(human: HumanAddr): CanonicalAddr;
  /** Render a canonical identity back to its human address */
  humanAddress(canonical: CanonicalAddr): HumanAddr;
}

// ============================================================================
// MockAddressApi Implementation
// ============================================================================

/**
 * Deterministic address API with no cryptographic checks.
 *
 * The canonical form is the UTF-8 encoding of the human address right-padded
 * with zero bytes to a fixed length, so the mapping round-trips exactly.
 *
 * @example
 * const api = new MockAddressApi();
 * api.humanAddress(api.canonicalAddress('owner0000')) // => 'owner0000'
 */
export class MockAddressApi implements IAddressApi {
  constructor(private readonly canonicalLength: number = DEFAULT_CANONICAL_LENGTH) {
    if (!Number.isInteger(canonicalLength) || canonicalLength < MIN_HUMAN_LENGTH) {
      throw invalidInput(`canonical length must be an integer >= ${MIN_HUMAN_LENGTH}`);
    }
  }

  canonicalAddress(human: HumanAddr): CanonicalAddr {
    const encoded = Buffer.from(human, 'utf-8');
    if (encoded.length < MIN_HUMAN_LENGTH) {
      throw invalidInput('human address too short');
    }
    if (encoded.length > this.canonicalLength) {
      throw invalidInput('human address too long');
    }
    // Trailing zero bytes are stripped on the way back, so they cannot be part of an address
    if (encoded[encoded.length - 1] === 0) {
      throw invalidInput('human address must not end with a NUL character');
    }

    const padded = Buffer.alloc(this.canonicalLength);
    encoded.copy(padded);
    return CanonicalAddr.fromBytes(padded);
  }

  humanAddress(canonical: CanonicalAddr): HumanAddr {
    if (canonical.length !== this.canonicalLength) {
      throw invalidInput('canonical address length not correct');
    }

    const bytes = canonical.toBytes();
    let end = bytes.length;
    while (end > 0 && bytes[end - 1] === 0) {
      end--;
    }
    return Buffer.from(bytes.subarray(0, end)).toString('utf-8');
  }
}
