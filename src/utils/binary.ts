/**
 * JSON <-> bytes helpers for query responses
 */

import { parseError } from './oracle-error.js';

const encoder = new TextEncoder();
const decoder = new TextDecoder();

export function toBinary(value: unknown): Uint8Array {
  return encoder.encode(JSON.stringify(value));
}

/**
 * @throws OracleError (PARSE_ERROR) when bytes are not UTF-8 JSON
 */
export function fromBinary(bytes: Uint8Array): unknown {
  try {
    return JSON.parse(decoder.decode(bytes));
  } catch (error) {
    throw parseError('binary response', error);
  }
}
