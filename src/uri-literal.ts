import type { PrimitiveKind } from './edm.js';
import { FormatError } from './errors.js';
import { convert } from './type-map.js';

/** Kinds whose literals are written without quotes. */
const BARE_KINDS: ReadonlySet<PrimitiveKind> = new Set([
  'Byte',
  'SByte',
  'Int16',
  'Int32',
  'Int64',
  'Decimal',
  'Double',
  'Single',
  'Guid',
  'DateTimeOffset',
  'Date',
  'TimeOfDay',
]);

const DATE = /^\d{4}-\d{2}-\d{2}$/;
const TIME_OF_DAY = /^\d{2}:\d{2}(:\d{2}(\.\d+)?)?$/;

/** Wire text of `value` for a key of `kind`, validated the way the payload writers validate it. */
function typedLiteral(value: unknown, kind: PrimitiveKind): string {
  if (kind === 'Date' && value instanceof Date) {
    if (Number.isNaN(value.getTime())) throw FormatError.conversion('Date', 'Edm.Date');
    return value.toISOString().slice(0, 10);
  }
  const wire = convert(value, kind);
  if (typeof wire !== 'string') return formatUriLiteral(wire);
  if (kind === 'Date' && !DATE.test(wire)) throw FormatError.conversion('string', 'Edm.Date');
  if (kind === 'TimeOfDay' && !TIME_OF_DAY.test(wire)) throw FormatError.conversion('string', 'Edm.TimeOfDay');
  if (kind === 'Duration') return `duration'${wire}'`;
  return BARE_KINDS.has(kind) ? wire : formatUriLiteral(wire);
}

/**
 * Render a single value as an OData URI literal: strings are single-quoted
 * with embedded quotes doubled, dates become ISO-8601 timestamps, numbers,
 * booleans and bigints keep their canonical text. With a declared `kind` the
 * value is converted first, so guids and temporal values come out unquoted.
 */
export function formatUriLiteral(value: unknown, kind?: PrimitiveKind): string {
  if (value === null || value === undefined) return 'null';
  if (kind) return typedLiteral(value, kind);
  if (typeof value === 'string') return `'${value.replace(/'/g, "''")}'`;
  if (typeof value === 'number') {
    if (Number.isNaN(value)) return 'NaN';
    if (!Number.isFinite(value)) return value > 0 ? 'INF' : '-INF';
    return String(value);
  }
  if (typeof value === 'boolean' || typeof value === 'bigint') return String(value);
  if (value instanceof Date) return value.toISOString();
  throw new FormatError(`Cannot format value of type ${typeof value} as a URI literal`);
}

/**
 * Format key fields as the parenthesised key segment of a resource path:
 * `(3)` for a single key, `(OrderId=1,Line=2)` for a composite one.
 * `keyKinds` gives the declared primitive kind of each key property.
 */
export function formatKeyAsUriLiteral(
  keyFields: Readonly<Record<string, unknown>>,
  keyKinds: Readonly<Record<string, PrimitiveKind>> = {}
): string {
  const entries = Object.entries(keyFields).map(([name, value]): [string, string] => [
    name,
    formatUriLiteral(value, keyKinds[name]),
  ]);
  const [single] = entries;
  if (single && entries.length === 1) return `(${single[1]})`;
  return `(${entries.map(([name, literal]) => `${name}=${literal}`).join(',')})`;
}
