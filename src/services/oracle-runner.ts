/**
 * Oracle Command Runner
 *
 * Turns line-delimited JSON envelopes into service calls and renders one
 * JSON result line per envelope:
 *
 *   {"sender":"owner0000","init":{"owner":"owner0000","base_denom":"uusd"}}
 *   {"sender":"addr0000","execute":{"feed_price":{"symbol":"mAPPL","price":"1.2"}}}
 *   {"query":{"price":{"symbol":"mAPPL"}}}
 *
 * Results are {"ok": ...} or {"error": {"code": ..., "message": ...}}.
 * Only OracleErrors become error lines; anything else propagates.
 * Lines that fail to parse are logged here; failed commands and queries are
 * already logged by the service.
 */

import { z } from 'zod';

import { parseHandleMsg, parseInitMsg, parseJson, parseQueryMsg } from '../types/oracle-messages.js';
import { invalidInput, isOracleError, type OracleError } from '../utils/oracle-error.js';
import { LogEvents, OracleLogger, type IOracleLogger } from '../utils/oracle-logger.js';
import type { OracleService } from './oracle-service.js';

// ============================================================================
// Envelope Schema
// ============================================================================

const jsonObject = z.record(z.string(), z.unknown());

const envelopeSchema = z.union([
  z.object({ sender: z.string(), init: jsonObject }).strict(),
  z.object({ sender: z.string(), execute: jsonObject }).strict(),
  z.object({ query: jsonObject }).strict(),
]);

type Envelope = z.infer<typeof envelopeSchema>;

export type RunnerResult =
  | { ok: unknown }
  | { error: { code: string; message: string } };

// ============================================================================
// OracleCommandRunner Implementation
// ============================================================================

export class OracleCommandRunner {
  constructor(
    private readonly service: OracleService,
    private readonly logger: IOracleLogger
  ) {}

  /**
   * Process one input line.
   * @returns the result line, or null for blank lines
   */
  handleLine(line: string, lineNumber: number): string | null {
    if (line.trim() === '') {
      return null;
    }
    return JSON.stringify(this.process(line, lineNumber));
  }

  private process(line: string, lineNumber: number): RunnerResult {
    let command: () => unknown;
    try {
      command = this.parseCommand(this.parseEnvelope(line));
    } catch (error) {
      if (!isOracleError(error)) {
        throw error;
      }
      this.logger.warn(LogEvents.INPUT_REJECTED, {
        line: lineNumber,
        errorCode: error.code,
        error: OracleLogger.sanitizeErrorMessage(error),
      });
      return toErrorResult(error);
    }

    try {
      return { ok: command() };
    } catch (error) {
      if (!isOracleError(error)) {
        throw error;
      }
      return toErrorResult(error);
    }
  }

  private parseEnvelope(line: string): Envelope {
    const result = envelopeSchema.safeParse(parseJson(line));
    if (!result.success) {
      throw invalidInput('envelope must hold exactly one of init, execute or query', result.error);
    }
    return result.data;
  }

  /**
   * Parse the payload and bind it to the matching service call.
   */
  private parseCommand(envelope: Envelope): () => unknown {
    if ('init' in envelope) {
      const msg = parseInitMsg(envelope.init);
      return () => this.service.instantiate(envelope.sender, msg);
    }
    if ('execute' in envelope) {
      const msg = parseHandleMsg(envelope.execute);
      return () => this.service.execute(envelope.sender, msg);
    }
    const msg = parseQueryMsg(envelope.query);
    return () => this.service.query(msg);
  }
}

function toErrorResult(error: OracleError): RunnerResult {
  return { error: { code: error.code, message: error.message } };
}
