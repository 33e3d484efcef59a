import type {
  EdmModel,
  EntityContainer,
  EntityType,
  NavigationProperty,
  Operation,
  SchemaElement,
  SchemaType,
  StructuredType,
} from './edm.js';
import { entityKey, navigationProperties, structuralProperties } from './edm.js';
import type { NameMatcher } from './names.js';

const exactMatch: NameMatcher = (actualName, requestedName) => actualName === requestedName;

/**
 * Overlay model used for partial updates. Its entity type carries only the
 * properties being written, so a PATCH declares nothing it does not send;
 * every other lookup goes to the source model.
 */
export class DeltaModel implements EdmModel {
  #source: EdmModel;
  #entityType: EntityType;

  constructor(
    source: EdmModel,
    entityType: EntityType,
    propertyNames: Iterable<string>,
    matches: NameMatcher = exactMatch
  ) {
    this.#source = source;
    const names = [...propertyNames];
    const keep = (name: string) => names.some((requested) => matches(name, requested));

    this.#entityType = {
      kind: 'entity',
      namespace: entityType.namespace,
      name: entityType.name,
      fullName: entityType.fullName,
      abstract: entityType.abstract,
      openType: entityType.openType,
      key: entityKey(source, entityType),
      properties: structuralProperties(source, entityType).filter((p) => keep(p.name)),
      navigationProperties: navigationProperties(source, entityType)
        .filter((n) => keep(n.name))
        .map(unidirectional),
    };
  }

  /** The unrestricted model this overlay reads through to. */
  get source(): EdmModel {
    return this.#source;
  }

  /** The restricted entity type. */
  get entityType(): EntityType {
    return this.#entityType;
  }

  get schemaElements(): readonly SchemaElement[] {
    return this.#source.schemaElements;
  }

  get declaredNamespaces(): readonly string[] {
    return this.#source.declaredNamespaces;
  }

  get entityContainer(): EntityContainer | undefined {
    return this.#source.entityContainer;
  }

  findDeclaredType(qualifiedName: string): SchemaType | undefined {
    if (qualifiedName === this.#entityType.fullName) return this.#entityType;
    return this.#source.findDeclaredType(qualifiedName);
  }

  findDeclaredOperations(qualifiedName: string): readonly Operation[] {
    return this.#source.findDeclaredOperations(qualifiedName);
  }

  findBoundOperations(bindingTypeName: string): readonly Operation[] {
    return this.#source.findBoundOperations(bindingTypeName);
  }

  findDirectlyDerivedTypes(baseTypeName: string): readonly StructuredType[] {
    return this.#source.findDirectlyDerivedTypes(baseTypeName);
  }
}

function unidirectional(navigation: NavigationProperty): NavigationProperty {
  return {
    name: navigation.name,
    type: navigation.type,
    containsTarget: navigation.containsTarget,
    onDelete: navigation.onDelete,
    referentialConstraints: navigation.referentialConstraints,
  };
}

/**
 * Restrict `entityType` to the properties named in `keep`.
 */
export function restrictSchema(
  model: EdmModel,
  entityType: EntityType,
  keep: Iterable<string>,
  matches?: NameMatcher
): DeltaModel {
  return new DeltaModel(model, entityType, keep, matches);
}
