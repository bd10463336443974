/**
 * SCPI Response Parser
 *
 * Utilities for parsing SCPI (Standard Commands for Programmable Instruments)
 * responses. Works over any transport (serial, raw TCP socket, simulator).
 */

import { Result, Ok, Err } from '../../shared/types.js';
import type { InstrumentIdentity, SupplyErrorEntry } from './types.js';

/**
 * SCPI reports "not a number" as 9.91E37. Anything above this threshold is
 * treated as an invalid reading rather than a value.
 */
const SCPI_NAN_THRESHOLD = 9e36;

export const ScpiParser = {
  /**
   * Parse a numeric SCPI response.
   *
   * Handles standard and scientific notation, surrounding whitespace, the
   * SCPI NaN marker (9.91E37) and empty or non-numeric replies.
   */
  parseNumber(response: string): Result<number, string> {
    const trimmed = response.trim();

    if (trimmed === '') {
      return Err('empty response');
    }

    const value = Number(trimmed);

    if (isNaN(value)) {
      return Err(`non-numeric response: "${trimmed}"`);
    }

    if (Math.abs(value) > SCPI_NAN_THRESHOLD) {
      return Err('not a number (9.91E37)');
    }

    return Ok(value);
  },

  /**
   * Parse an integer flag such as the *OPC? or OUTP:STAT? reply.
   * "1", "1.0" and "+1" all read as 1; the fraction is truncated.
   */
  parseInteger(response: string): Result<number, string> {
    return Result.map(ScpiParser.parseNumber(response), Math.trunc);
  },

  /**
   * Parse a SCPI response using an enum mapping.
   *
   * @param map - Mapping from upper-case SCPI tokens to typed values
   */
  parseEnum<T>(response: string, map: Record<string, T>): Result<T, string> {
    const trimmed = response.trim().toUpperCase();

    for (const [key, value] of Object.entries(map)) {
      if (key.toUpperCase() === trimmed) {
        return Ok(value);
      }
    }

    const validKeys = Object.keys(map).join(', ');
    return Err(`unknown value "${trimmed}", expected one of: ${validKeys}`);
  },

  /**
   * Parse a comma-separated SCPI response into trimmed parts.
   */
  parseCsv(response: string): string[] {
    return response.split(',').map(s => s.trim());
  },

  /**
   * Parse a comma-separated list of numbers (":LIST:FREQ?", ":LIST:POW?").
   * Fails on the first entry that is not a number.
   */
  parseNumberList(response: string): Result<number[], string> {
    if (response.trim() === '') {
      return Err('empty response');
    }
    return Result.all(ScpiParser.parseCsv(response).map(part => ScpiParser.parseNumber(part)));
  },

  /**
   * Parse the IEEE 488.2 identification reply.
   *
   * Format: <manufacturer>,<model>,<serial>,<firmware>
   * Only manufacturer and model are mandatory.
   */
  parseIdentity(response: string): Result<InstrumentIdentity, string> {
    const parts = ScpiParser.parseCsv(response);
    if (parts.length < 2 || parts[1] === '') {
      return Err(`not an identification string: "${response.trim()}"`);
    }
    return Ok({
      manufacturer: parts[0],
      model: parts[1],
      serial: parts[2] ?? '',
      firmware: parts.slice(3).join(','),
    });
  },

  /**
   * Parse a SYST:ERR? entry.
   *
   * Standard format: <code>,"<message>" e.g. 0,"No error" or -113,"Undefined header"
   */
  parseErrorEntry(response: string): Result<SupplyErrorEntry, string> {
    const trimmed = response.trim();
    const comma = trimmed.indexOf(',');
    const codeText = comma === -1 ? trimmed : trimmed.slice(0, comma);
    const code = ScpiParser.parseNumber(codeText);
    if (!code.ok) {
      return Err(`invalid error code: ${code.error}`);
    }
    const message = comma === -1 ? '' : trimmed.slice(comma + 1).trim().replace(/^"(.*)"$/, '$1');
    return Ok({ code: code.value, message });
  },
};
