// ============================================================================
// Entity Data Model
// ============================================================================

export type PrimitiveKind =
  | 'Binary'
  | 'Boolean'
  | 'Byte'
  | 'Date'
  | 'DateTimeOffset'
  | 'Decimal'
  | 'Double'
  | 'Duration'
  | 'Guid'
  | 'Int16'
  | 'Int32'
  | 'Int64'
  | 'SByte'
  | 'Single'
  | 'Stream'
  | 'String'
  | 'TimeOfDay'
  | 'Geography'
  | 'GeographyPoint'
  | 'GeographyLineString'
  | 'GeographyPolygon'
  | 'GeographyMultiPoint'
  | 'GeographyMultiLineString'
  | 'GeographyMultiPolygon'
  | 'GeographyCollection'
  | 'Geometry'
  | 'GeometryPoint'
  | 'GeometryLineString'
  | 'GeometryPolygon'
  | 'GeometryMultiPoint'
  | 'GeometryMultiLineString'
  | 'GeometryMultiPolygon'
  | 'GeometryCollection';

export const PRIMITIVE_KINDS: readonly PrimitiveKind[] = [
  'Binary',
  'Boolean',
  'Byte',
  'Date',
  'DateTimeOffset',
  'Decimal',
  'Double',
  'Duration',
  'Guid',
  'Int16',
  'Int32',
  'Int64',
  'SByte',
  'Single',
  'Stream',
  'String',
  'TimeOfDay',
  'Geography',
  'GeographyPoint',
  'GeographyLineString',
  'GeographyPolygon',
  'GeographyMultiPoint',
  'GeographyMultiLineString',
  'GeographyMultiPolygon',
  'GeographyCollection',
  'Geometry',
  'GeometryPoint',
  'GeometryLineString',
  'GeometryPolygon',
  'GeometryMultiPoint',
  'GeometryMultiLineString',
  'GeometryMultiPolygon',
  'GeometryCollection',
];

export function isPrimitiveKind(name: string): name is PrimitiveKind {
  return PRIMITIVE_KINDS.some((kind) => kind === name);
}

// ============================================================================
// Type References
// ============================================================================

export type TypeReference =
  | { kind: 'primitive'; primitive: PrimitiveKind; nullable: boolean }
  | { kind: 'complex'; name: string; nullable: boolean }
  | { kind: 'enum'; name: string; nullable: boolean }
  | { kind: 'entity'; name: string; nullable: boolean }
  | { kind: 'collection'; element: TypeReference; nullable: boolean }
  | { kind: 'untyped'; nullable: boolean };

export function typeReferenceName(type: TypeReference): string {
  switch (type.kind) {
    case 'primitive':
      return `Edm.${type.primitive}`;
    case 'collection':
      return `Collection(${typeReferenceName(type.element)})`;
    case 'untyped':
      return 'Edm.Untyped';
    default:
      return type.name;
  }
}

// ============================================================================
// Schema Elements
// ============================================================================

export type ConcurrencyMode = 'none' | 'fixed';

export type OnDeleteAction = 'none' | 'cascade' | 'setNull' | 'setDefault';

export type Multiplicity = 'zeroOrOne' | 'one' | 'many';

export type StructuralProperty = {
  readonly name: string;
  readonly type: TypeReference;
  readonly defaultValue?: string;
  readonly concurrencyMode: ConcurrencyMode;
};

export type ReferentialConstraint = {
  readonly property: string;
  readonly referencedProperty: string;
};

export type NavigationProperty = {
  readonly name: string;
  /** An entity reference, or a collection of one. */
  readonly type: TypeReference;
  readonly partner?: string;
  readonly containsTarget: boolean;
  readonly onDelete: OnDeleteAction;
  readonly referentialConstraints: readonly ReferentialConstraint[];
};

type NamedElement = {
  readonly namespace: string;
  readonly name: string;
  readonly fullName: string;
};

export type EntityType = NamedElement & {
  readonly kind: 'entity';
  readonly baseType?: string;
  readonly abstract: boolean;
  readonly openType: boolean;
  readonly key: readonly string[];
  readonly properties: readonly StructuralProperty[];
  readonly navigationProperties: readonly NavigationProperty[];
};

export type ComplexType = NamedElement & {
  readonly kind: 'complex';
  readonly baseType?: string;
  readonly abstract: boolean;
  readonly openType: boolean;
  readonly properties: readonly StructuralProperty[];
  readonly navigationProperties: readonly NavigationProperty[];
};

export type EnumType = NamedElement & {
  readonly kind: 'enum';
  readonly isFlags: boolean;
  readonly underlyingType: PrimitiveKind;
  readonly members: Readonly<Record<string, number>>;
};

export type SchemaType = EntityType | ComplexType | EnumType;

export type StructuredType = EntityType | ComplexType;

export type OperationParameter = {
  readonly name: string;
  readonly type: TypeReference;
};

export type Operation = NamedElement & {
  readonly kind: 'action' | 'function';
  readonly isBound: boolean;
  readonly parameters: readonly OperationParameter[];
  readonly returnType?: TypeReference;
};

export type EntitySet = {
  readonly name: string;
  readonly entityType: string;
  readonly navigationPropertyBindings: Readonly<Record<string, string>>;
  /** Property names listed by a Core.OptimisticConcurrency annotation. */
  readonly optimisticConcurrency?: readonly string[];
};

export type EntityContainer = NamedElement & {
  readonly kind: 'container';
  readonly entitySets: readonly EntitySet[];
};

export type SchemaElement = SchemaType | Operation | EntityContainer;

/**
 * Read-only view over a service schema. Implementations resolve qualified
 * names with namespace aliases already expanded.
 */
export interface EdmModel {
  readonly schemaElements: readonly SchemaElement[];
  readonly declaredNamespaces: readonly string[];
  readonly entityContainer: EntityContainer | undefined;
  findDeclaredType(qualifiedName: string): SchemaType | undefined;
  findDeclaredOperations(qualifiedName: string): readonly Operation[];
  findBoundOperations(bindingTypeName: string): readonly Operation[];
  findDirectlyDerivedTypes(baseTypeName: string): readonly StructuredType[];
}

// ============================================================================
// Model Helpers
// ============================================================================

export function isStructuredType(type: SchemaType | undefined): type is StructuredType {
  return type !== undefined && (type.kind === 'entity' || type.kind === 'complex');
}

function baseTypeChain(model: EdmModel, type: StructuredType): StructuredType[] {
  const chain: StructuredType[] = [];
  const visited = new Set<string>();
  let current: StructuredType | undefined = type;
  while (current && !visited.has(current.fullName)) {
    visited.add(current.fullName);
    chain.unshift(current);
    const base: SchemaType | undefined = current.baseType
      ? model.findDeclaredType(current.baseType)
      : undefined;
    current = isStructuredType(base) ? base : undefined;
  }
  return chain;
}

/** Declared and inherited structural properties, base type first. */
export function structuralProperties(model: EdmModel, type: StructuredType): StructuralProperty[] {
  return baseTypeChain(model, type).flatMap((t) => t.properties);
}

/** Declared and inherited navigation properties, base type first. */
export function navigationProperties(model: EdmModel, type: StructuredType): NavigationProperty[] {
  return baseTypeChain(model, type).flatMap((t) => t.navigationProperties);
}

/** Key property names, taken from the first type in the chain that declares one. */
export function entityKey(model: EdmModel, type: EntityType): readonly string[] {
  const declaring = baseTypeChain(model, type)
    .reverse()
    .find((t): t is EntityType => t.kind === 'entity' && t.key.length > 0);
  return declaring ? declaring.key : [];
}

export function entitySets(model: EdmModel): readonly EntitySet[] {
  return model.schemaElements.flatMap((element) =>
    element.kind === 'container' ? element.entitySets : []
  );
}

export function navigationMultiplicity(navigation: NavigationProperty): Multiplicity {
  if (navigation.type.kind === 'collection') return 'many';
  return navigation.type.nullable ? 'zeroOrOne' : 'one';
}

/** Target entity type name, with one level of collection unwrapped. */
export function navigationTargetName(navigation: NavigationProperty): string {
  const type = navigation.type.kind === 'collection' ? navigation.type.element : navigation.type;
  return type.kind === 'entity' || type.kind === 'complex' ? type.name : typeReferenceName(type);
}

export function findPartner(
  model: EdmModel,
  navigation: NavigationProperty
): NavigationProperty | undefined {
  if (!navigation.partner) return undefined;
  const target = model.findDeclaredType(navigationTargetName(navigation));
  if (!isStructuredType(target)) return undefined;
  return navigationProperties(model, target).find((n) => n.name === navigation.partner);
}
