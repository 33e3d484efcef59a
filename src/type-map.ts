// ============================================================================
// Native value <-> OData primitive type mapping
// ============================================================================

import { Readable } from 'node:stream';
import type { PrimitiveKind } from './edm.js';
import { FormatError } from './errors.js';

export type NativeType =
  | 'string'
  | 'boolean'
  | 'byte'
  | 'decimal'
  | 'double'
  | 'guid'
  | 'int16'
  | 'int32'
  | 'int64'
  | 'sbyte'
  | 'single'
  | 'binary'
  | 'stream'
  | 'geography'
  | 'geographyPoint'
  | 'geographyLineString'
  | 'geographyPolygon'
  | 'geographyCollection'
  | 'geographyMultiLineString'
  | 'geographyMultiPoint'
  | 'geographyMultiPolygon'
  | 'geometry'
  | 'geometryPoint'
  | 'geometryLineString'
  | 'geometryPolygon'
  | 'geometryCollection'
  | 'geometryMultiLineString'
  | 'geometryMultiPoint'
  | 'geometryMultiPolygon'
  | 'dateTimeOffset'
  | 'duration'
  | 'uint16'
  | 'uint32'
  | 'uint64'
  | 'charArray'
  | 'char';

type Conversion = { ok: true; value: unknown } | { ok: false };

type TypeMapping = {
  readonly native: NativeType;
  readonly wire: PrimitiveKind;
  readonly convert: (value: unknown) => Conversion;
};

/** Spatial values are GeoJSON geometry objects. */
export type SpatialValue = {
  type: string;
  coordinates?: unknown;
  geometries?: unknown;
  [key: string]: unknown;
};

const FAILED: Conversion = { ok: false };

function ok(value: unknown): Conversion {
  return { ok: true, value };
}

// ----------------------------------------------------------------------------
// Converters
// ----------------------------------------------------------------------------

const INTEGER = /^[+-]?\d+$/;
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;
const GUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;
const DATE_TIME_OFFSET = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})$/;
const DURATION = /^-?P(?!$)(\d+D)?(T(?=\d)(\d+H)?(\d+M)?(\d+(\.\d+)?S)?)?$/;
const MAX_SINGLE = 3.4028234663852886e38;

function toBigInt(value: unknown): bigint | undefined {
  if (typeof value === 'bigint') return value;
  if (typeof value === 'number' && Number.isInteger(value)) return BigInt(value);
  if (typeof value === 'string' && INTEGER.test(value.trim())) return BigInt(value.trim());
  return undefined;
}

/** Integers in range; values beyond the safe-integer range are kept as decimal strings. */
function integerIn(min: bigint, max: bigint): (value: unknown) => Conversion {
  return (value) => {
    const n = toBigInt(value);
    if (n === undefined || n < min || n > max) return FAILED;
    const asNumber = Number(n);
    return ok(Number.isSafeInteger(asNumber) ? asNumber : n.toString());
  };
}

function toStringValue(value: unknown): Conversion {
  if (typeof value === 'string') return ok(value);
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return ok(String(value));
  }
  return FAILED;
}

function toCharArray(value: unknown): Conversion {
  if (!Array.isArray(value)) return FAILED;
  if (!value.every((c): c is string => typeof c === 'string' && c.length === 1)) return FAILED;
  return ok(value.join(''));
}

function toChar(value: unknown): Conversion {
  return typeof value === 'string' && value.length === 1 ? ok(value) : FAILED;
}

function toBoolean(value: unknown): Conversion {
  if (typeof value === 'boolean') return ok(value);
  if (typeof value === 'number') return ok(value !== 0);
  if (typeof value === 'string') {
    const text = value.trim().toLowerCase();
    if (text === 'true') return ok(true);
    if (text === 'false') return ok(false);
  }
  return FAILED;
}

const DECIMAL_PARTS = /^([+-]?)(\d*)\.?(\d*)(?:[eE]([+-]?\d+))?$/;

/** Plain positional form of a decimal numeral: no exponent, no redundant zeros. */
function canonicalDecimal(text: string): string {
  const match = DECIMAL_PARTS.exec(text);
  if (!match) return text;
  const [, sign = '', whole = '', fraction = '', exponent = '0'] = match;
  let digits = whole + fraction;
  let point = whole.length + Number(exponent);
  if (point < 0) {
    digits = '0'.repeat(-point) + digits;
    point = 0;
  }
  if (point > digits.length) digits += '0'.repeat(point - digits.length);
  const integerPart = digits.slice(0, point).replace(/^0+/, '') || '0';
  const fractionPart = digits.slice(point).replace(/0+$/, '');
  const body = fractionPart ? `${integerPart}.${fractionPart}` : integerPart;
  return sign === '-' && body !== '0' ? `-${body}` : body;
}

/** Numbers where a double holds the value exactly; the canonical decimal string otherwise. */
function toDecimal(value: unknown): Conversion {
  if (typeof value === 'number') return Number.isFinite(value) ? ok(value) : FAILED;
  if (typeof value === 'bigint') {
    const asNumber = Number(value);
    return ok(Number.isSafeInteger(asNumber) ? asNumber : value.toString());
  }
  if (typeof value === 'string' && DECIMAL.test(value.trim())) {
    const text = canonicalDecimal(value.trim());
    const asNumber = Number(text);
    return ok(Number.isFinite(asNumber) && canonicalDecimal(String(asNumber)) === text ? asNumber : text);
  }
  return FAILED;
}

function toDouble(value: unknown): Conversion {
  if (typeof value === 'number') return ok(value);
  if (typeof value === 'bigint') return ok(Number(value));
  if (typeof value !== 'string') return FAILED;
  const text = value.trim();
  if (text === 'NaN') return ok(Number.NaN);
  if (text === 'INF') return ok(Number.POSITIVE_INFINITY);
  if (text === '-INF') return ok(Number.NEGATIVE_INFINITY);
  return DECIMAL.test(text) ? ok(Number(text)) : FAILED;
}

function toSingle(value: unknown): Conversion {
  const result = toDouble(value);
  if (!result.ok || typeof result.value !== 'number') return FAILED;
  return Number.isFinite(result.value) && Math.abs(result.value) > MAX_SINGLE ? FAILED : result;
}

function toGuid(value: unknown): Conversion {
  return typeof value === 'string' && GUID.test(value) ? ok(value) : FAILED;
}

function toBinary(value: unknown): Conversion {
  if (value instanceof Uint8Array) return ok(value);
  if (value instanceof ArrayBuffer) return ok(new Uint8Array(value));
  return FAILED;
}

function toStream(value: unknown): Conversion {
  return value instanceof Readable || value instanceof Blob ? ok(value) : FAILED;
}

function toDateTimeOffset(value: unknown): Conversion {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? FAILED : ok(value.toISOString());
  if (typeof value === 'string' && DATE_TIME_OFFSET.test(value) && !Number.isNaN(Date.parse(value))) {
    return ok(value);
  }
  return FAILED;
}

/** Milliseconds become `P{d}DT{h}H{m}M{s}S`. */
export function formatDuration(milliseconds: number): string {
  const sign = milliseconds < 0 ? '-' : '';
  let rest = Math.abs(milliseconds);
  const days = Math.floor(rest / 86_400_000);
  rest -= days * 86_400_000;
  const hours = Math.floor(rest / 3_600_000);
  rest -= hours * 3_600_000;
  const minutes = Math.floor(rest / 60_000);
  rest -= minutes * 60_000;
  const seconds = rest / 1000;
  return `${sign}P${days}DT${hours}H${minutes}M${seconds}S`;
}

function toDuration(value: unknown): Conversion {
  if (typeof value === 'number') return Number.isFinite(value) ? ok(formatDuration(value)) : FAILED;
  if (typeof value === 'string' && DURATION.test(value)) return ok(value);
  return FAILED;
}

function isSpatialValue(value: unknown): value is SpatialValue {
  return (
    typeof value === 'object' &&
    value !== null &&
    'type' in value &&
    typeof value.type === 'string' &&
    ('coordinates' in value || 'geometries' in value)
  );
}

const SPATIAL_SHAPES = [
  'Point',
  'LineString',
  'Polygon',
  'MultiPoint',
  'MultiLineString',
  'MultiPolygon',
  'GeometryCollection',
];

function spatial(shape?: string): (value: unknown) => Conversion {
  return (value) => {
    if (!isSpatialValue(value)) return FAILED;
    if (shape ? value.type !== shape : !SPATIAL_SHAPES.includes(value.type)) return FAILED;
    return ok(value);
  };
}

// ----------------------------------------------------------------------------
// Table
// ----------------------------------------------------------------------------

const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

/**
 * Ordered mapping from native representations to wire kinds. Several
 * natives may share a wire kind; conversion tries them in this order.
 */
const TYPE_MAP: readonly TypeMapping[] = [
  { native: 'string', wire: 'String', convert: toStringValue },
  { native: 'boolean', wire: 'Boolean', convert: toBoolean },
  { native: 'byte', wire: 'Byte', convert: integerIn(0n, 255n) },
  { native: 'decimal', wire: 'Decimal', convert: toDecimal },
  { native: 'double', wire: 'Double', convert: toDouble },
  { native: 'guid', wire: 'Guid', convert: toGuid },
  { native: 'int16', wire: 'Int16', convert: integerIn(-32768n, 32767n) },
  { native: 'int32', wire: 'Int32', convert: integerIn(-2147483648n, 2147483647n) },
  { native: 'int64', wire: 'Int64', convert: integerIn(INT64_MIN, INT64_MAX) },
  { native: 'sbyte', wire: 'SByte', convert: integerIn(-128n, 127n) },
  { native: 'single', wire: 'Single', convert: toSingle },
  { native: 'binary', wire: 'Binary', convert: toBinary },
  { native: 'stream', wire: 'Stream', convert: toStream },
  { native: 'geography', wire: 'Geography', convert: spatial() },
  { native: 'geographyPoint', wire: 'GeographyPoint', convert: spatial('Point') },
  { native: 'geographyLineString', wire: 'GeographyLineString', convert: spatial('LineString') },
  { native: 'geographyPolygon', wire: 'GeographyPolygon', convert: spatial('Polygon') },
  { native: 'geographyCollection', wire: 'GeographyCollection', convert: spatial('GeometryCollection') },
  { native: 'geographyMultiLineString', wire: 'GeographyMultiLineString', convert: spatial('MultiLineString') },
  { native: 'geographyMultiPoint', wire: 'GeographyMultiPoint', convert: spatial('MultiPoint') },
  { native: 'geographyMultiPolygon', wire: 'GeographyMultiPolygon', convert: spatial('MultiPolygon') },
  { native: 'geometry', wire: 'Geometry', convert: spatial() },
  { native: 'geometryPoint', wire: 'GeometryPoint', convert: spatial('Point') },
  { native: 'geometryLineString', wire: 'GeometryLineString', convert: spatial('LineString') },
  { native: 'geometryPolygon', wire: 'GeometryPolygon', convert: spatial('Polygon') },
  { native: 'geometryCollection', wire: 'GeometryCollection', convert: spatial('GeometryCollection') },
  { native: 'geometryMultiLineString', wire: 'GeometryMultiLineString', convert: spatial('MultiLineString') },
  { native: 'geometryMultiPoint', wire: 'GeometryMultiPoint', convert: spatial('MultiPoint') },
  { native: 'geometryMultiPolygon', wire: 'GeometryMultiPolygon', convert: spatial('MultiPolygon') },
  { native: 'dateTimeOffset', wire: 'DateTimeOffset', convert: toDateTimeOffset },
  { native: 'duration', wire: 'Duration', convert: toDuration },

  // Widening entries
  { native: 'uint16', wire: 'Int32', convert: integerIn(0n, 65535n) },
  { native: 'uint32', wire: 'Int64', convert: integerIn(0n, 4294967295n) },
  // Unsigned 64-bit values widen only as far as Int64 reaches
  { native: 'uint64', wire: 'Int64', convert: integerIn(0n, INT64_MAX) },
  { native: 'charArray', wire: 'String', convert: toCharArray },
  { native: 'char', wire: 'String', convert: toChar },
];

export function resolveWireKind(native: NativeType): PrimitiveKind | undefined {
  return TYPE_MAP.find((m) => m.native === native)?.wire;
}

/** Native representations that map to `kind`, in table order. */
export function nativeTypesFor(kind: PrimitiveKind): NativeType[] {
  return TYPE_MAP.filter((m) => m.wire === kind).map((m) => m.native);
}

/** Runtime type name used in conversion errors. */
export function describeValueType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'Array';
  if (typeof value === 'object') return value.constructor?.name ?? 'Object';
  return typeof value;
}

/**
 * Convert `value` to the wire representation of `kind` through the first
 * native candidate that accepts it. Kinds without table entries pass the
 * value through unchanged.
 */
export function convert(value: unknown, kind: PrimitiveKind): unknown {
  const candidates = TYPE_MAP.filter((m) => m.wire === kind);
  if (candidates.length === 0) return value;
  for (const candidate of candidates) {
    const result = candidate.convert(value);
    if (result.ok) return result.value;
  }
  throw FormatError.conversion(describeValueType(value), `Edm.${kind}`);
}
