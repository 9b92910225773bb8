/**
 * Oracle Message Definitions
 *
 * Wire format of the messages the host delivers: externally tagged JSON
 * objects with snake_case fields, e.g.
 *
 *   { "feed_price": { "symbol": "mAPPL", "price": "1.2" } }
 *
 * Decimal fields arrive as strings and are parsed into Decimal values here.
 */

import { z } from 'zod';

import { parseDecimal, type Decimal } from '../utils/decimal.js';
import { getErrorMessage, invalidInput } from '../utils/oracle-error.js';

// ============================================================================
// Field Schemas
// ============================================================================

const humanAddr = z.string();

const symbol = z
  .string()
  .min(1, 'symbol must not be empty')
  .refine((value) => value.trim() === value, 'symbol must not have surrounding whitespace');

const decimal = z.string().transform((value, ctx): Decimal => {
  try {
    return parseDecimal(value);
  } catch (error) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: getErrorMessage(error) });
    return z.NEVER;
  }
});

// ============================================================================
// Messages
// ============================================================================

export const initMsgSchema = z
  .object({
    owner: humanAddr,
    base_denom: z.string(),
  })
  .strict();

export const handleMsgSchema = z.union([
  z
    .object({
      update_config: z.object({ owner: humanAddr.nullish() }).strict(),
    })
    .strict(),
  z
    .object({
      register_asset: z.object({ symbol, feeder: humanAddr, token: humanAddr }).strict(),
    })
    .strict(),
  z
    .object({
      feed_price: z
        .object({ symbol, price: decimal, price_multiplier: decimal.nullish() })
        .strict(),
    })
    .strict(),
]);

export const queryMsgSchema = z.union([
  z.object({ config: z.object({}).strict() }).strict(),
  z.object({ asset: z.object({ symbol }).strict() }).strict(),
  z.object({ price: z.object({ symbol }).strict() }).strict(),
]);

export type InitMsg = z.infer<typeof initMsgSchema>;
export type HandleMsg = z.infer<typeof handleMsgSchema>;
export type QueryMsg = z.infer<typeof queryMsgSchema>;

/** Wire names of the command variants */
export type HandleMsgKind = 'update_config' | 'register_asset' | 'feed_price';

/** Wire names of the query variants */
export type QueryMsgKind = 'config' | 'asset' | 'price';

// ============================================================================
// Parsing
// ============================================================================

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, target: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
      .join('; ');
    throw invalidInput(`malformed ${target}: ${details}`, result.error);
  }
  return result.data;
}

/**
 * @throws OracleError (INVALID_INPUT) when raw is not a valid InitMsg
 */
export function parseInitMsg(raw: unknown): InitMsg {
  return parseWith(initMsgSchema, raw, 'InitMsg');
}

/**
 * @throws OracleError (INVALID_INPUT) when raw is not a valid HandleMsg
 */
export function parseHandleMsg(raw: unknown): HandleMsg {
  return parseWith(handleMsgSchema, raw, 'HandleMsg');
}

/**
 * @throws OracleError (INVALID_INPUT) when raw is not a valid QueryMsg
 */
export function parseQueryMsg(raw: unknown): QueryMsg {
  return parseWith(queryMsgSchema, raw, 'QueryMsg');
}

/**
 * Parse a JSON document, mapping syntax errors to INVALID_INPUT.
 */
export function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw invalidInput(`malformed JSON: ${getErrorMessage(error)}`, error);
  }
}

export function handleMsgKind(msg: HandleMsg): HandleMsgKind {
  if ('update_config' in msg) return 'update_config';
  if ('register_asset' in msg) return 'register_asset';
  return 'feed_price';
}

export function queryMsgKind(msg: QueryMsg): QueryMsgKind {
  if ('config' in msg) return 'config';
  if ('asset' in msg) return 'asset';
  return 'price';
}
