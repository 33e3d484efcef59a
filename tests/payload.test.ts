import { Readable } from 'node:stream';
import { XMLParser } from 'fast-xml-parser';
import { test, expect } from 'vitest';
import { encodeEntry } from '../src/entry-encoder.js';
import type { WriteMethod } from '../src/entry-encoder.js';
import type { EntryData, ODataEntry } from '../src/entry.js';
import { FormatError } from '../src/errors.js';
import { serializeEntry, serializeReference, toJsonEntry } from '../src/payload.js';
import type { PayloadFormat } from '../src/payload.js';
import { createCatalog, salesModel } from './test-metadata.js';

// ============================================================================
// Helpers
// ============================================================================

const decoder = new TextDecoder();

function encode(typeName: string, data: EntryData, method: WriteMethod = 'POST'): ODataEntry {
  const entry = encodeEntry({ model: salesModel, catalog: createCatalog() }, typeName, data, method);
  if (!entry) throw new Error(`No entry for ${method}`);
  return entry;
}

function write(entry: ODataEntry, format: PayloadFormat, indent = false): string {
  return decoder.decode(serializeEntry(entry, { format, indent }));
}

const atomParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  parseTagValue: false,
  isArray: (name) => name === 'link' || name === 'm:element',
});

type XmlObject = Record<string, unknown>;

function child(node: unknown, name: string): unknown {
  if (typeof node !== 'object' || node === null) return undefined;
  return Object.entries(node).find(([key]) => key === name)?.[1];
}

function readAtom(text: string): { entry: unknown; properties: unknown } {
  const document: XmlObject = atomParser.parse(text);
  const entry = child(document, 'entry');
  return { entry, properties: child(child(entry, 'content'), 'm:properties') };
}

// ============================================================================
// JSON
// ============================================================================

test('json - entry with type annotation and properties', () => {
  const entry = encode('Sales.Customer', { Id: 1, Name: 'Ada', Address: { City: 'Oslo' } });
  expect(write(entry, 'json')).toBe(
    '{"@odata.type":"#Sales.Customer","Id":1,"Name":"Ada","Address":{"@odata.type":"#Sales.Address","City":"Oslo"}}'
  );
});

test('json - PATCH writes one field', () => {
  const entry = encode('Sales.Order', { Total: '12.50' }, 'PATCH');
  expect(JSON.parse(write(entry, 'json'))).toEqual({ '@odata.type': '#Sales.Order', Total: 12.5 });
});

test('json - single-valued navigation binds one URL', () => {
  const entry = encode('Sales.Employee', { Id: 5, Manager: { Id: 3 } });
  expect(toJsonEntry(entry)).toEqual({
    '@odata.type': '#Sales.Employee',
    Id: 5,
    'Manager@odata.bind': 'Employees(3)',
  });
});

test('json - collection navigation binds an array of URLs', () => {
  const entry = encode('Sales.Customer', { Id: 1, Orders: [{ Id: 10 }, { Id: 11 }] });
  expect(toJsonEntry(entry)['Orders@odata.bind']).toEqual(['Orders(10)', 'Orders(11)']);
});

test('json - collection values keep their order', () => {
  const entry = encode('Sales.Customer', { Tags: ['b', 'a', 'c'] });
  expect(toJsonEntry(entry).Tags).toEqual(['b', 'a', 'c']);
});

test('json - binary as base64 and special doubles as text', () => {
  const order = encode('Sales.Order', { RowVersion: new Uint8Array([1, 2, 3]) });
  expect(toJsonEntry(order).RowVersion).toBe('AQID');

  const product = encode('Sales.Product', { Price: 'INF' });
  expect(toJsonEntry(product).Price).toBe('INF');
});

test('json - indentation', () => {
  const entry = encode('Sales.Order', { Id: 1 });
  expect(write(entry, 'json', true)).toBe('{\n  "@odata.type": "#Sales.Order",\n  "Id": 1\n}');
});

test('json - streams cannot be written inline', () => {
  const entry: ODataEntry = {
    typeName: 'Sales.Photo',
    properties: [{ name: 'Content', typeName: 'Edm.Stream', value: Readable.from(['data']) }],
    links: [],
  };
  expect(() => write(entry, 'json')).toThrow(FormatError);
});

test('json - entity reference', () => {
  const text = decoder.decode(
    serializeReference('https://example.com/odata/Orders(1)', { format: 'json', indent: false })
  );
  expect(text).toBe('{"@odata.id":"https://example.com/odata/Orders(1)"}');
});

// ============================================================================
// Atom
// ============================================================================

test('atom - entry category and typed properties', () => {
  const entry = encode('Sales.Employee', { Id: 5, Name: 'Bo' });
  const { entry: atomEntry, properties } = readAtom(write(entry, 'atom'));

  expect(child(atomEntry, '@_xmlns')).toBe('http://www.w3.org/2005/Atom');
  expect(child(atomEntry, 'category')).toEqual({
    '@_term': '#Sales.Employee',
    '@_scheme': 'http://docs.oasis-open.org/odata/ns/scheme',
  });
  expect(child(atomEntry, 'link')).toBeUndefined();
  expect(child(properties, 'd:Id')).toEqual({ '#text': '5', '@_m:type': 'Int32' });
  expect(child(properties, 'd:Name')).toBe('Bo');
});

test('atom - navigation links', () => {
  const entry = encode('Sales.Employee', { Id: 5, Manager: { Id: 3 }, DirectReports: [{ Id: 6 }] });
  const { entry: atomEntry } = readAtom(write(entry, 'atom'));

  expect(child(atomEntry, 'link')).toEqual([
    {
      '@_rel': 'http://docs.oasis-open.org/odata/ns/related/Manager',
      '@_type': 'application/atom+xml;type=feed',
      '@_title': 'Manager',
      '@_href': 'Employees(3)',
    },
    {
      '@_rel': 'http://docs.oasis-open.org/odata/ns/related/DirectReports',
      '@_type': 'application/atom+xml;type=entry',
      '@_title': 'DirectReports',
      '@_href': 'Employees(6)',
    },
  ]);
});

test('atom - complex, collection and null values', () => {
  const entry = encode('Sales.Customer', { Address: { City: 'Oslo' }, Tags: ['b', 'a'], Name: null });
  const { properties } = readAtom(write(entry, 'atom'));

  expect(child(properties, 'd:Address')).toEqual({ '@_m:type': '#Sales.Address', 'd:City': 'Oslo' });
  expect(child(properties, 'd:Tags')).toEqual({
    '@_m:type': '#Collection(Edm.String)',
    'm:element': ['b', 'a'],
  });
  expect(child(properties, 'd:Name')).toEqual({ '@_m:null': 'true' });
});

test('atom - text is escaped', () => {
  const entry = encode('Sales.Customer', { Name: 'Tom & <Jerry>' });
  const text = write(entry, 'atom');
  expect(text).toContain('<d:Name>Tom &amp; &lt;Jerry&gt;</d:Name>');
});

test('atom - entity reference', () => {
  const text = decoder.decode(
    serializeReference('https://example.com/odata/Orders(1)', { format: 'atom', indent: false })
  );
  const document: XmlObject = atomParser.parse(text);
  expect(child(child(document, 'm:ref'), '@_id')).toBe('https://example.com/odata/Orders(1)');
});
