/**
 * Text helpers shared by the analyzers
 */

import { InvalidEncodingError, InvalidInputError } from './errors.js';

const utf8 = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true });

/**
 * Split a text into lines.
 *
 * Splits on `\n`, drops one trailing `\r` per line, and does not report the
 * empty piece after a final newline. The empty text has no lines.
 */
export function splitLines(text: string): string[] {
  if (text.length === 0) return [];

  const lines = text.split('\n');
  if (lines[lines.length - 1] === '') lines.pop();

  return lines.map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

/**
 * First line of a text, or `null` for the empty text
 */
export function firstLine(text: string): string | null {
  if (text.length === 0) return null;
  const end = text.indexOf('\n');
  const line = end === -1 ? text : text.slice(0, end);
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

/**
 * Number of Unicode code points in a string
 */
export function countCodePoints(text: string): number {
  return Array.from(text).length;
}

/**
 * Decode the first `length` bytes of a script buffer as UTF-8.
 *
 * @throws InvalidInputError when the buffer is missing, `length` is not a
 *   positive integer, or `length` runs past the end of the buffer
 * @throws InvalidEncodingError when the bytes are not valid UTF-8
 */
export function decodeScript(buffer: Uint8Array | null | undefined, length: number): string {
  if (!buffer) {
    throw new InvalidInputError('Script buffer is null');
  }
  if (!Number.isInteger(length) || length <= 0) {
    throw new InvalidInputError(`Invalid script length: ${length}`);
  }
  if (length > buffer.byteLength) {
    throw new InvalidInputError(`Script length ${length} exceeds buffer size ${buffer.byteLength}`);
  }

  try {
    return utf8.decode(buffer.subarray(0, length));
  } catch {
    throw new InvalidEncodingError();
  }
}
