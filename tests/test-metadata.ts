import { readFileSync } from 'node:fs';
import { MetadataCatalog } from '../src/catalog.js';
import type { MetadataCatalogOptions } from '../src/catalog.js';
import type { EntityType } from '../src/edm.js';
import { parseMetadata } from '../src/metadata.js';

export const salesMetadataXml = readFileSync(new URL('./fixtures/metadata.xml', import.meta.url), 'utf8');

export const salesModel = parseMetadata(salesMetadataXml);

export function createCatalog(options?: MetadataCatalogOptions): MetadataCatalog {
  return new MetadataCatalog(salesModel, options);
}

export function entityType(fullName: string): EntityType {
  const type = salesModel.findDeclaredType(fullName);
  if (type?.kind !== 'entity') throw new Error(`Fixture has no entity type '${fullName}'`);
  return type;
}

/** Naive English plural forms, enough for the fixture's names. */
export const testPluralizer = {
  pluralize: (word: string) => (word.endsWith('s') ? word : `${word}s`),
  singularize: (word: string) => (word.endsWith('s') ? word.slice(0, -1) : word),
};
