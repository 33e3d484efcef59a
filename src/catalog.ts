// ============================================================================
// Schema Catalog
// ============================================================================

import type { EdmModel, EntitySet, EntityType, PrimitiveKind } from './edm.js';
import { entityKey, entitySets, structuralProperties } from './edm.js';
import { SchemaMismatchError } from './errors.js';
import type { Pluralizer } from './names.js';
import { namesAreEqual } from './names.js';
import { formatKeyAsUriLiteral } from './uri-literal.js';

/**
 * Lookup service the writers consult for everything that depends on the
 * service metadata.
 */
export interface SchemaCatalog {
  readonly model: EdmModel;
  lookupEntityType(qualifiedName: string): EntityType | undefined;
  /** Qualified element type name of the entity set addressed by `collection`. */
  getEntitySetTypeName(collection: string): string;
  /** Declared key property names of an entity set's element type. */
  entitySetKey(entitySetName: string): readonly string[];
  /** Key segment for `keyFields`; `keyKinds` carries each key property's declared kind. */
  formatKeyAsUriLiteral(
    keyFields: Readonly<Record<string, unknown>>,
    keyKinds?: Readonly<Record<string, PrimitiveKind>>
  ): string;
  namesAreEqual(actualName: string, requestedName: string): boolean;
  requiresOptimisticConcurrencyCheck(collection: string): boolean;
}

export type MetadataCatalogOptions = {
  pluralizer?: Pluralizer;
};

export class MetadataCatalog implements SchemaCatalog {
  readonly model: EdmModel;
  #pluralizer?: Pluralizer;

  constructor(model: EdmModel, options: MetadataCatalogOptions = {}) {
    this.model = model;
    this.#pluralizer = options.pluralizer;
  }

  lookupEntityType(qualifiedName: string): EntityType | undefined {
    const type = this.model.findDeclaredType(qualifiedName);
    return type?.kind === 'entity' ? type : undefined;
  }

  getEntitySetTypeName(collection: string): string {
    const baseTypeName = this.#findEntitySet(collection).entityType;
    const [, derivedName] = collection.split('/');
    if (!derivedName) return baseTypeName;
    const derived = this.#findDerivedType(baseTypeName, derivedName);
    if (!derived) {
      throw new SchemaMismatchError(`Type '${derivedName}' does not derive from '${baseTypeName}'`);
    }
    return derived;
  }

  entitySetKey(entitySetName: string): readonly string[] {
    const entityType = this.#entitySetType(entitySetName);
    return entityKey(this.model, entityType);
  }

  formatKeyAsUriLiteral(
    keyFields: Readonly<Record<string, unknown>>,
    keyKinds?: Readonly<Record<string, PrimitiveKind>>
  ): string {
    return formatKeyAsUriLiteral(keyFields, keyKinds);
  }

  namesAreEqual(actualName: string, requestedName: string): boolean {
    return namesAreEqual(actualName, requestedName, this.#pluralizer);
  }

  requiresOptimisticConcurrencyCheck(collection: string): boolean {
    const entitySet = this.#findEntitySet(collection);
    if (entitySet.optimisticConcurrency) return true;
    const entityType = this.#entitySetType(collection);
    return structuralProperties(this.model, entityType).some((p) => p.concurrencyMode === 'fixed');
  }

  #findEntitySet(collection: string): EntitySet {
    // Collections may be addressed with a derived type segment, e.g. "Transport/Ships".
    const [setName = collection] = collection.split('/');
    const sets = entitySets(this.model);
    const entitySet =
      sets.find((s) => s.name === setName) ?? sets.find((s) => this.namesAreEqual(s.name, setName));
    if (!entitySet) throw new SchemaMismatchError(`Entity set '${collection}' not found`);
    return entitySet;
  }

  #findDerivedType(baseTypeName: string, derivedName: string): string | undefined {
    for (const type of this.model.findDirectlyDerivedTypes(baseTypeName)) {
      if (this.namesAreEqual(type.name, derivedName) || type.fullName === derivedName) return type.fullName;
      const nested = this.#findDerivedType(type.fullName, derivedName);
      if (nested) return nested;
    }
    return undefined;
  }

  #entitySetType(collection: string): EntityType {
    const typeName = this.#findEntitySet(collection).entityType;
    const entityType = this.lookupEntityType(typeName);
    if (!entityType) throw new SchemaMismatchError(`Entity type '${typeName}' not found`);
    return entityType;
  }
}
