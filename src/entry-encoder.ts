// ============================================================================
// Entry Encoding
// ============================================================================

import type { EntityType, NavigationProperty, StructuredType, TypeReference } from './edm.js';
import {
  isStructuredType,
  navigationProperties,
  structuralProperties,
  typeReferenceName,
} from './edm.js';
import { restrictSchema } from './delta-model.js';
import type { EntryData, ODataEntry, ODataLink, ODataProperty } from './entry.js';
import { isEntryData, ODataCollectionValue, ODataComplexValue } from './entry.js';
import { FormatError, SchemaMismatchError } from './errors.js';
import type { EncodingContext } from './link-encoder.js';
import { encodeLink } from './link-encoder.js';
import type { Logger } from './logger.js';
import { convert, describeValueType } from './type-map.js';

export type WriteMethod = 'POST' | 'PUT' | 'PATCH' | 'MERGE' | 'DELETE';

export type EntryEncodingContext = EncodingContext & {
  readonly logger?: Logger;
};

export function isPartialUpdate(method: WriteMethod): boolean {
  return method === 'PATCH' || method === 'MERGE';
}

function encodeStructuredFields(
  context: EntryEncodingContext,
  type: StructuredType,
  data: EntryData
): ODataProperty[] {
  const properties = structuralProperties(context.model, type);
  return Object.entries(data).map(([name, value]) => {
    const property = properties.find((p) => context.catalog.namesAreEqual(p.name, name));
    if (!property) {
      throw new SchemaMismatchError(`Property '${name}' not found on type '${type.fullName}'`);
    }
    return {
      name: property.name,
      typeName: typeReferenceName(property.type),
      value: encodeValue(context, property.type, value),
    };
  });
}

/**
 * Encode a property value against its declared type.
 */
export function encodeValue(context: EntryEncodingContext, type: TypeReference, value: unknown): unknown {
  if (value === null || value === undefined) return null;

  switch (type.kind) {
    case 'primitive':
      return convert(value, type.primitive);

    case 'complex': {
      const complexType = context.model.findDeclaredType(type.name);
      if (!isStructuredType(complexType)) {
        throw new SchemaMismatchError(`Complex type '${type.name}' not found`);
      }
      if (!isEntryData(value)) {
        throw FormatError.conversion(describeValueType(value), type.name);
      }
      return new ODataComplexValue(type.name, encodeStructuredFields(context, complexType, value));
    }

    case 'collection': {
      if (typeof value === 'string' || !isIterable(value)) {
        throw FormatError.conversion(describeValueType(value), typeReferenceName(type));
      }
      const items = Array.from(value, (item) => encodeValue(context, type.element, item));
      return new ODataCollectionValue(typeReferenceName(type), items);
    }

    default:
      return value;
  }
}

function isIterable(value: unknown): value is Iterable<unknown> {
  return typeof value === 'object' && value !== null && Symbol.iterator in value;
}

function encodeLinks(
  context: EntryEncodingContext,
  ownerType: EntityType,
  navigation: NavigationProperty,
  value: unknown
): ODataLink[] {
  const targets = Array.isArray(value) ? value : [value];
  const present = targets.filter((target) => target !== null && target !== undefined);
  if (present.length === 0) {
    context.logger?.debug(`Skipping link '${navigation.name}' without target data`);
    return [];
  }
  if (Array.isArray(value) && navigation.type.kind !== 'collection') {
    throw new SchemaMismatchError(
      `Navigation property '${navigation.name}' is single-valued but several targets were given`
    );
  }
  return present.map((target) => encodeLink(context, ownerType, navigation.name, target));
}

/**
 * Encode `entryData` as an entry of `typeName` for the given write method.
 * DELETE has no body; PATCH and MERGE encode against a view of the type
 * restricted to the supplied fields.
 */
export function encodeEntry(
  context: EntryEncodingContext,
  typeName: string,
  entryData: EntryData,
  method: WriteMethod
): ODataEntry | null {
  if (method === 'DELETE') return null;

  const sourceType = context.model.findDeclaredType(typeName);
  if (sourceType?.kind !== 'entity') {
    throw new SchemaMismatchError(`Entity type '${typeName}' not found`);
  }

  let scoped = context;
  let entityType = sourceType;
  if (isPartialUpdate(method)) {
    const delta = restrictSchema(context.model, sourceType, Object.keys(entryData), (actual, requested) =>
      context.catalog.namesAreEqual(actual, requested)
    );
    scoped = { ...context, model: delta };
    entityType = delta.entityType;
  }

  const properties = structuralProperties(scoped.model, entityType);
  const navigations = navigationProperties(scoped.model, entityType);
  const structural: EntryData = {};
  const links: ODataLink[] = [];

  for (const [name, value] of Object.entries(entryData)) {
    if (properties.some((p) => scoped.catalog.namesAreEqual(p.name, name))) {
      structural[name] = value;
      continue;
    }
    const navigation = navigations.find((n) => scoped.catalog.namesAreEqual(n.name, name));
    if (!navigation) {
      throw new SchemaMismatchError(`Property '${name}' not found on type '${entityType.fullName}'`);
    }
    links.push(...encodeLinks(scoped, entityType, navigation, value));
  }

  return {
    typeName: entityType.fullName,
    properties: encodeStructuredFields(scoped, entityType, structural),
    links,
  };
}
