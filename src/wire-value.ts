import { Readable } from 'node:stream';
import { FormatError } from './errors.js';

/** Text form of a primitive wire value, shared by the JSON and Atom writers. */
export function primitiveText(value: unknown): string {
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return value > 0 ? 'INF' : '-INF';
    return String(value);
  }
  if (value instanceof Uint8Array) return Buffer.from(value).toString('base64');
  if (typeof value === 'string') return value;
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  return JSON.stringify(value);
}

export function assertInlineValue(value: unknown): void {
  if (value instanceof Readable || value instanceof Blob) {
    throw new FormatError('Stream values cannot be written inline in an entry');
  }
}
