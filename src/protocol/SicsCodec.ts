import { ProtocolError } from '../errors';
import { Reading } from '../types/telemetry.types';

/** Request the current weight value, stable or not. */
export const SI_COMMAND = 'SI';

const RESPONSE_ID = 'S';
const MIN_TOKENS = 4;
const FLOAT_TOKEN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

export type ParseResult = { ok: true; reading: Reading } | { ok: false; error: ProtocolError };

export function encodeCommand(command: string): Buffer {
  return Buffer.from(`${command}\r\n`, 'ascii');
}

/**
 * Parses a response to `SI`: `S <status> <gross> <unit>`, tokens separated by
 * any whitespace. Never throws.
 */
export function parseResponse(response: string | Buffer): ParseResult {
  const text = typeof response === 'string' ? response : response.toString('ascii');
  const parts = text.trim().split(/\s+/);

  if (parts.length < MIN_TOKENS || parts[0] !== RESPONSE_ID) {
    return {
      ok: false,
      error: new ProtocolError(
        'MALFORMED_RESPONSE',
        `Unexpected response format: ${JSON.stringify(text.trim())}`,
        text,
      ),
    };
  }

  const [, status, grossToken, unit] = parts;
  if (!FLOAT_TOKEN.test(grossToken)) {
    return {
      ok: false,
      error: new ProtocolError(
        'NUMERIC_PARSE_ERROR',
        `Gross weight ${JSON.stringify(grossToken)} is not a number`,
        text,
      ),
    };
  }

  return {
    ok: true,
    reading: { status, gross: Number(grossToken), unit },
  };
}

/** Renders a reading the way the device sends it, terminated by CRLF. */
export function formatResponse(reading: Reading): string {
  // String(-0) drops the sign
  const gross = Object.is(reading.gross, -0) ? '-0' : String(reading.gross);
  return `${RESPONSE_ID} ${reading.status} ${gross} ${reading.unit}\r\n`;
}

/** SICS answer to a command the device does not understand. */
export const SYNTAX_ERROR_RESPONSE = 'ES\r\n';
