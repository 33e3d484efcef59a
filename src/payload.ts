// ============================================================================
// Payload Serialization
// ============================================================================

import { writeAtomEntry, writeAtomReference } from './atom.js';
import type { ODataEntry } from './entry.js';
import { linkReferenceUrl, ODataCollectionValue, ODataComplexValue } from './entry.js';
import { assertInlineValue, primitiveText } from './wire-value.js';

export type PayloadFormat = 'json' | 'atom';

export type PayloadOptions = {
  format: PayloadFormat;
  indent: boolean;
};

export const CONTENT_TYPES: Record<PayloadFormat, string> = {
  json: 'application/json;odata.metadata=minimal',
  atom: 'application/atom+xml;type=entry',
};

function jsonValue(value: unknown): unknown {
  assertInlineValue(value);
  if (value instanceof ODataComplexValue) {
    const object: Record<string, unknown> = { '@odata.type': `#${value.typeName}` };
    for (const property of value.properties) object[property.name] = jsonValue(property.value);
    return object;
  }
  if (value instanceof ODataCollectionValue) return value.items.map(jsonValue);
  if (typeof value === 'number' && !Number.isFinite(value)) return primitiveText(value);
  if (value instanceof Uint8Array || typeof value === 'bigint') return primitiveText(value);
  return value;
}

/**
 * OData JSON object for an entry: type annotation, properties in order, then
 * one `@odata.bind` annotation per navigation property.
 */
export function toJsonEntry(entry: ODataEntry): Record<string, unknown> {
  const object: Record<string, unknown> = { '@odata.type': `#${entry.typeName}` };
  for (const property of entry.properties) object[property.name] = jsonValue(property.value);

  const binds = new Map<string, { collection: boolean; urls: string[] }>();
  for (const link of entry.links) {
    const bind = binds.get(link.name) ?? { collection: link.declaredCollection, urls: [] };
    bind.urls.push(linkReferenceUrl(link.reference));
    binds.set(link.name, bind);
  }
  for (const [name, bind] of binds) {
    object[`${name}@odata.bind`] = bind.collection ? bind.urls : bind.urls[0];
  }
  return object;
}

const encoder = new TextEncoder();

export function serializeEntry(entry: ODataEntry, options: PayloadOptions): Uint8Array {
  const text =
    options.format === 'atom'
      ? writeAtomEntry(entry, options.indent)
      : JSON.stringify(toJsonEntry(entry), null, options.indent ? 2 : undefined);
  return encoder.encode(text);
}

/** Entity reference payload for `url`, as sent to a `$ref` endpoint. */
export function serializeReference(url: string, options: PayloadOptions): Uint8Array {
  const text =
    options.format === 'atom'
      ? writeAtomReference(url, options.indent)
      : JSON.stringify({ '@odata.id': url }, null, options.indent ? 2 : undefined);
  return encoder.encode(text);
}
