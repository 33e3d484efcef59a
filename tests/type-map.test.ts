import { Readable } from 'node:stream';
import { test, expect } from 'vitest';
import type { PrimitiveKind } from '../src/edm.js';
import { FormatError } from '../src/errors.js';
import { convert, describeValueType, formatDuration, nativeTypesFor, resolveWireKind } from '../src/type-map.js';

// ============================================================================
// Table
// ============================================================================

test('maps native types to wire kinds', () => {
  expect(resolveWireKind('int32')).toBe('Int32');
  expect(resolveWireKind('uint16')).toBe('Int32');
  expect(resolveWireKind('uint64')).toBe('Int64');
  expect(resolveWireKind('char')).toBe('String');
});

test('lists native candidates in table order', () => {
  expect(nativeTypesFor('String')).toEqual(['string', 'charArray', 'char']);
  expect(nativeTypesFor('Int64')).toEqual(['int64', 'uint32', 'uint64']);
  expect(nativeTypesFor('Date')).toEqual([]);
});

// ============================================================================
// Conversion
// ============================================================================

test('converts numeric strings to decimals', () => {
  expect(convert('12.50', 'Decimal')).toBe(12.5);
  expect(convert(' 7 ', 'Decimal')).toBe(7);
});

test('keeps decimals a double cannot hold as decimal strings', () => {
  expect(convert('1234567890123456789.12', 'Decimal')).toBe('1234567890123456789.12');
  expect(convert('0.10000000000000000001', 'Decimal')).toBe('0.10000000000000000001');
  expect(convert('-001.500', 'Decimal')).toBe(-1.5);
  expect(convert('1.5e2', 'Decimal')).toBe(150);
  expect(convert(2n ** 70n + 1n, 'Decimal')).toBe('1180591620717411303425');
  expect(convert(42n, 'Decimal')).toBe(42);
});

test('converts integers within range', () => {
  expect(convert(42, 'Int32')).toBe(42);
  expect(convert('-128', 'SByte')).toBe(-128);
  expect(convert(65535, 'Int32')).toBe(65535);
  expect(() => convert(300, 'Byte')).toThrow(FormatError);
  expect(() => convert(1.5, 'Int32')).toThrow(FormatError);
});

test('keeps 64-bit integers beyond the safe range as strings', () => {
  expect(convert(9007199254740993n, 'Int64')).toBe('9007199254740993');
  expect(convert(12n, 'Int64')).toBe(12);
});

test('widens unsigned 64-bit values onto Int64 only within range', () => {
  expect(convert(2n ** 63n - 1n, 'Int64')).toBe('9223372036854775807');
  expect(() => convert(2n ** 63n, 'Int64')).toThrow(
    'Unable to convert value of type bigint to OData type Edm.Int64'
  );
  expect(() => convert(2n ** 64n, 'Int64')).toThrow(FormatError);
});

test('converts doubles including special values', () => {
  expect(convert('INF', 'Double')).toBe(Number.POSITIVE_INFINITY);
  expect(convert('-INF', 'Double')).toBe(Number.NEGATIVE_INFINITY);
  expect(convert('NaN', 'Double')).toBeNaN();
  expect(convert(0.25, 'Single')).toBe(0.25);
  expect(() => convert(1e39, 'Single')).toThrow(FormatError);
});

test('converts booleans and strings', () => {
  expect(convert('TRUE', 'Boolean')).toBe(true);
  expect(convert(0, 'Boolean')).toBe(false);
  expect(convert(5, 'String')).toBe('5');
  expect(convert(['a', 'b'], 'String')).toBe('ab');
});

test('converts dates and durations', () => {
  expect(convert(new Date(Date.UTC(2024, 4, 6, 7, 8, 9)), 'DateTimeOffset')).toBe('2024-05-06T07:08:09.000Z');
  expect(convert('2024-05-06T07:08:09+02:00', 'DateTimeOffset')).toBe('2024-05-06T07:08:09+02:00');
  expect(() => convert('2024-05-06', 'DateTimeOffset')).toThrow(FormatError);
  expect(convert('PT1H', 'Duration')).toBe('PT1H');
  expect(convert(90_061_500, 'Duration')).toBe('P1DT1H1M1.5S');
});

test('formats negative durations', () => {
  expect(formatDuration(-60_000)).toBe('-P0DT0H1M0S');
});

test('validates guids', () => {
  expect(convert('0f8fad5b-d9cb-469f-a165-70867728950e', 'Guid')).toBe('0f8fad5b-d9cb-469f-a165-70867728950e');
  expect(() => convert('not-a-guid', 'Guid')).toThrow(FormatError);
});

test('converts binary values to byte arrays', () => {
  const bytes = new Uint8Array([1, 2, 3]);
  expect(convert(bytes, 'Binary')).toBe(bytes);
  expect(convert(bytes.buffer, 'Binary')).toEqual(bytes);
});

test('accepts streams for stream properties', () => {
  const stream = Readable.from(['chunk']);
  expect(convert(stream, 'Stream')).toBe(stream);
});

test('checks the shape of spatial values', () => {
  const point = { type: 'Point', coordinates: [10, 20] };
  expect(convert(point, 'GeographyPoint')).toBe(point);
  expect(convert(point, 'Geometry')).toBe(point);
  expect(() => convert(point, 'GeometryPolygon')).toThrow(FormatError);
});

const fromInteger = (wire: unknown) => BigInt(String(wire));

const roundTrips: [string, unknown, PrimitiveKind, (wire: unknown) => unknown][] = [
  ['string', "O'Brien", 'String', String],
  ['boolean', false, 'Boolean', Boolean],
  ['byte', 255, 'Byte', Number],
  ['sbyte', -128, 'SByte', Number],
  ['int16', -32768, 'Int16', Number],
  ['int32', 2147483647, 'Int32', Number],
  ['int64 maximum', 2n ** 63n - 1n, 'Int64', fromInteger],
  ['int64 minimum', -(2n ** 63n), 'Int64', fromInteger],
  ['int64 within the safe range', 12n, 'Int64', fromInteger],
  ['decimal with 28 digits', '123456789012345678.9012345678', 'Decimal', String],
  ['decimal a double holds', '12.5', 'Decimal', String],
  ['double', 0.1, 'Double', Number],
  ['single', 0.25, 'Single', Number],
  ['guid', '0f8fad5b-d9cb-469f-a165-70867728950e', 'Guid', String],
  ['dateTimeOffset', '2024-05-06T07:08:09+02:00', 'DateTimeOffset', String],
  ['duration', 'P1DT2H', 'Duration', String],
  ['binary', new Uint8Array([0, 255]), 'Binary', (wire) => wire],
  ['geographyPoint', { type: 'Point', coordinates: [10, 20] }, 'GeographyPoint', (wire) => wire],
];

test.each(roundTrips)('%s survives conversion and decoding', (_, value, kind, decode) => {
  expect(decode(convert(value, kind))).toEqual(value);
});

test('unsigned 32-bit values widen onto Int64', () => {
  expect(fromInteger(convert(4294967295, 'Int64'))).toBe(4294967295n);
});

test('passes values of kinds without table entries through', () => {
  const value = { anything: true };
  expect(convert(value, 'Date')).toBe(value);
});

test('conversion errors name the value type and the target type', () => {
  let caught: unknown;
  try {
    convert({ amount: 1 }, 'Decimal');
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(FormatError);
  if (!(caught instanceof FormatError)) return;
  expect(caught.message).toBe('Unable to convert value of type Object to OData type Edm.Decimal');
  expect(caught.valueType).toBe('Object');
  expect(caught.targetType).toBe('Edm.Decimal');
});

test('describes runtime value types', () => {
  expect(describeValueType(null)).toBe('null');
  expect(describeValueType([1])).toBe('Array');
  expect(describeValueType(new Date(0))).toBe('Date');
  expect(describeValueType('x')).toBe('string');
});
