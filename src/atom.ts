// ============================================================================
// Atom Entry Writer
// ============================================================================

import { XMLBuilder } from 'fast-xml-parser';
import type { ODataEntry, ODataProperty } from './entry.js';
import { linkReferenceUrl, ODataCollectionValue, ODataComplexValue } from './entry.js';
import { assertInlineValue, primitiveText } from './wire-value.js';

const ATOM_NS = 'http://www.w3.org/2005/Atom';
const DATA_NS = 'http://docs.oasis-open.org/odata/ns/data';
const METADATA_NS = 'http://docs.oasis-open.org/odata/ns/metadata';
const SCHEME_NS = 'http://docs.oasis-open.org/odata/ns/scheme';
const RELATED_NS = 'http://docs.oasis-open.org/odata/ns/related/';

type XmlNode = string | { [key: string]: XmlNode | XmlNode[] };

function createBuilder(indent: boolean): XMLBuilder {
  return new XMLBuilder({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    suppressEmptyNode: true,
    format: indent,
    indentBy: '  ',
  });
}

const XML_DECLARATION = { '?xml': { '@_version': '1.0', '@_encoding': 'utf-8' } };

function primitiveTypeAttribute(typeName: string): string | undefined {
  if (!typeName.startsWith('Edm.') || typeName === 'Edm.String') return undefined;
  return typeName.slice('Edm.'.length);
}

function valueNode(typeName: string, value: unknown): XmlNode {
  assertInlineValue(value);
  if (value === null || value === undefined) return { '@_m:null': 'true' };

  if (value instanceof ODataComplexValue) {
    const node: { [key: string]: XmlNode | XmlNode[] } = { '@_m:type': `#${value.typeName}` };
    for (const property of value.properties) node[`d:${property.name}`] = propertyNode(property);
    return node;
  }

  if (value instanceof ODataCollectionValue) {
    const elementType = value.typeName.replace(/^Collection\((.*)\)$/, '$1');
    return {
      '@_m:type': `#${value.typeName}`,
      'm:element': value.items.map((item) => valueNode(elementType, item)),
    };
  }

  const text = primitiveText(value);
  const type = primitiveTypeAttribute(typeName);
  return type ? { '@_m:type': type, '#text': text } : text;
}

function propertyNode(property: ODataProperty): XmlNode {
  return valueNode(property.typeName, property.value);
}

/**
 * Atom `<entry>` document for an encoded entry. Links carry their target as
 * `href`; properties go into `m:properties` inside the content element.
 */
export function writeAtomEntry(entry: ODataEntry, indent: boolean): string {
  const properties: { [key: string]: XmlNode | XmlNode[] } = {};
  for (const property of entry.properties) properties[`d:${property.name}`] = propertyNode(property);

  const node: { [key: string]: XmlNode | XmlNode[] } = {
    '@_xmlns': ATOM_NS,
    '@_xmlns:d': DATA_NS,
    '@_xmlns:m': METADATA_NS,
    category: { '@_term': `#${entry.typeName}`, '@_scheme': SCHEME_NS },
  };
  if (entry.links.length > 0) {
    node.link = entry.links.map((link) => ({
      '@_rel': `${RELATED_NS}${link.name}`,
      '@_type': `application/atom+xml;type=${link.isCollection ? 'feed' : 'entry'}`,
      '@_title': link.name,
      '@_href': linkReferenceUrl(link.reference),
    }));
  }
  node.content = { '@_type': 'application/xml', 'm:properties': properties };

  return createBuilder(indent).build({ ...XML_DECLARATION, entry: node });
}

export function writeAtomReference(url: string, indent: boolean): string {
  return createBuilder(indent).build({
    ...XML_DECLARATION,
    'm:ref': { '@_xmlns:m': METADATA_NS, '@_id': url },
  });
}
