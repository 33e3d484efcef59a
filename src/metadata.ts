import { XMLParser } from 'fast-xml-parser';
import type {
  ComplexType,
  EdmModel,
  EntityContainer,
  EntitySet,
  EntityType,
  EnumType,
  NavigationProperty,
  OnDeleteAction,
  Operation,
  OperationParameter,
  PrimitiveKind,
  SchemaElement,
  SchemaType,
  StructuralProperty,
  StructuredType,
  TypeReference,
} from './edm.js';
import { isPrimitiveKind } from './edm.js';
import { MetadataError } from './errors.js';

// ----------------------------------------------------------------------------
// XML Types
// ----------------------------------------------------------------------------
interface CsdlProperty {
  '@_Name': string;
  '@_Type': string;
  '@_Nullable'?: string;
  '@_DefaultValue'?: string;
  '@_ConcurrencyMode'?: string;
}

interface CsdlNavigationProperty {
  '@_Name': string;
  '@_Type': string;
  '@_Nullable'?: string;
  '@_Partner'?: string;
  '@_ContainsTarget'?: string;
  OnDelete?: { '@_Action': string };
  ReferentialConstraint?: { '@_Property': string; '@_ReferencedProperty': string }[];
}

interface CsdlKey {
  PropertyRef: { '@_Name': string }[];
}

interface CsdlStructuredType {
  '@_Name': string;
  '@_BaseType'?: string;
  '@_Abstract'?: string;
  '@_OpenType'?: string;
  Key?: CsdlKey;
  Property?: CsdlProperty[];
  NavigationProperty?: CsdlNavigationProperty[];
}

interface CsdlEnumType {
  '@_Name': string;
  '@_IsFlags'?: string;
  '@_UnderlyingType'?: string;
  Member?: { '@_Name': string; '@_Value'?: string }[];
}

interface CsdlTypeDefinition {
  '@_Name': string;
  '@_UnderlyingType': string;
}

interface CsdlActionOrFunction {
  '@_Name': string;
  '@_IsBound'?: string;
  Parameter?: { '@_Name': string; '@_Type': string; '@_Nullable'?: string }[];
  ReturnType?: { '@_Type': string; '@_Nullable'?: string };
}

interface CsdlAnnotation {
  '@_Term': string;
  Collection?: { PropertyPath?: (string | number)[] };
}

interface CsdlEntitySet {
  '@_Name': string;
  '@_EntityType': string;
  NavigationPropertyBinding?: { '@_Path': string; '@_Target': string }[];
  Annotation?: CsdlAnnotation[];
}

interface CsdlEntityContainer {
  '@_Name': string;
  EntitySet?: CsdlEntitySet[];
}

interface CsdlSchema {
  '@_Namespace': string;
  '@_Alias'?: string;
  EntityType?: CsdlStructuredType[];
  ComplexType?: CsdlStructuredType[];
  EnumType?: CsdlEnumType[];
  TypeDefinition?: CsdlTypeDefinition[];
  Action?: CsdlActionOrFunction[];
  Function?: CsdlActionOrFunction[];
  EntityContainer?: CsdlEntityContainer;
  Annotations?: { '@_Target': string; Annotation?: CsdlAnnotation[] }[];
}

interface CsdlDataServices {
  Schema?: CsdlSchema[];
}

interface CsdlEdmx {
  'edmx:DataServices'?: CsdlDataServices;
  DataServices?: CsdlDataServices;
}

interface CsdlDocument {
  'edmx:Edmx'?: CsdlEdmx;
  Edmx?: CsdlEdmx;
}

const ARRAY_TAGS = new Set([
  'Schema',
  'Property',
  'NavigationProperty',
  'NavigationPropertyBinding',
  'ReferentialConstraint',
  'EntitySet',
  'EntityType',
  'ComplexType',
  'EnumType',
  'TypeDefinition',
  'Action',
  'Function',
  'Parameter',
  'PropertyRef',
  'Member',
  'Annotation',
  'Annotations',
  'PropertyPath',
]);

const ON_DELETE_ACTIONS: Record<string, OnDeleteAction> = {
  None: 'none',
  Cascade: 'cascade',
  SetNull: 'setNull',
  SetDefault: 'setDefault',
};

// ----------------------------------------------------------------------------
// Model
// ----------------------------------------------------------------------------

/** An `EdmModel` backed by the elements of a parsed CSDL document. */
export class CsdlModel implements EdmModel {
  readonly schemaElements: readonly SchemaElement[];
  readonly declaredNamespaces: readonly string[];
  readonly entityContainer: EntityContainer | undefined;
  #types = new Map<string, SchemaType>();
  #operations = new Map<string, Operation[]>();

  constructor(elements: readonly SchemaElement[], namespaces: readonly string[]) {
    this.schemaElements = elements;
    this.declaredNamespaces = namespaces;
    this.entityContainer = elements.find((e): e is EntityContainer => e.kind === 'container');
    for (const element of elements) {
      if (element.kind === 'action' || element.kind === 'function') {
        const overloads = this.#operations.get(element.fullName) ?? [];
        overloads.push(element);
        this.#operations.set(element.fullName, overloads);
      } else if (element.kind === 'entity' || element.kind === 'complex' || element.kind === 'enum') {
        this.#types.set(element.fullName, element);
      }
    }
  }

  findDeclaredType(qualifiedName: string): SchemaType | undefined {
    return this.#types.get(qualifiedName);
  }

  findDeclaredOperations(qualifiedName: string): readonly Operation[] {
    return this.#operations.get(qualifiedName) ?? [];
  }

  findBoundOperations(bindingTypeName: string): readonly Operation[] {
    const bound: Operation[] = [];
    for (const overloads of this.#operations.values()) {
      for (const operation of overloads) {
        const binding = operation.parameters[0]?.type;
        if (!operation.isBound || !binding) continue;
        const bindingType = binding.kind === 'collection' ? binding.element : binding;
        if ((bindingType.kind === 'entity' || bindingType.kind === 'complex') && bindingType.name === bindingTypeName) {
          bound.push(operation);
        }
      }
    }
    return bound;
  }

  findDirectlyDerivedTypes(baseTypeName: string): readonly StructuredType[] {
    const derived: StructuredType[] = [];
    for (const type of this.#types.values()) {
      if (type.kind !== 'enum' && type.baseType === baseTypeName) derived.push(type);
    }
    return derived;
  }
}

// ----------------------------------------------------------------------------
// Parsing
// ----------------------------------------------------------------------------

function isTrue(value: string | undefined): boolean {
  return value === 'true';
}

function nameOf(node: { '@_Name'?: unknown }, what: string): string {
  const name = node['@_Name'];
  if (typeof name !== 'string' || !name) throw new MetadataError(`${what} without a Name attribute`);
  return name;
}

/**
 * Parse a CSDL (`$metadata`) XML document into an `EdmModel`.
 */
export function parseMetadata(xml: string): CsdlModel {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: '@_',
    isArray: (name) => ARRAY_TAGS.has(name),
  });

  let parsed: CsdlDocument;
  try {
    parsed = parser.parse(xml, true);
  } catch (error) {
    throw new MetadataError(
      `Invalid metadata document: ${error instanceof Error ? error.message : String(error)}`
    );
  }

  const edmx = parsed['edmx:Edmx'] ?? parsed.Edmx;
  const dataServices = edmx?.['edmx:DataServices'] ?? edmx?.DataServices;
  const schemas = dataServices?.Schema ?? [];
  if (schemas.length === 0) throw new MetadataError('No Schema element found in metadata document');

  // --------------------------------------------------------------------------
  // Phase 0: aliases and type kinds
  // --------------------------------------------------------------------------
  const aliases = new Map<string, string>();
  for (const s of schemas) {
    if (s['@_Alias']) aliases.set(s['@_Alias'], s['@_Namespace']);
  }

  const qualify = (rawName: string): string => {
    const dot = rawName.lastIndexOf('.');
    if (dot < 0) return rawName;
    const prefix = rawName.slice(0, dot);
    const namespace = aliases.get(prefix);
    return namespace ? `${namespace}${rawName.slice(dot)}` : rawName;
  };

  const kinds = new Map<string, 'entity' | 'complex' | 'enum'>();
  const typeDefinitions = new Map<string, string>();
  for (const s of schemas) {
    const ns = s['@_Namespace'];
    for (const et of s.EntityType ?? []) kinds.set(`${ns}.${nameOf(et, 'EntityType')}`, 'entity');
    for (const ct of s.ComplexType ?? []) kinds.set(`${ns}.${nameOf(ct, 'ComplexType')}`, 'complex');
    for (const en of s.EnumType ?? []) kinds.set(`${ns}.${nameOf(en, 'EnumType')}`, 'enum');
    for (const td of s.TypeDefinition ?? []) {
      typeDefinitions.set(`${ns}.${nameOf(td, 'TypeDefinition')}`, td['@_UnderlyingType']);
    }
  }

  const resolveType = (rawType: string, nullable: boolean): TypeReference => {
    const collection = rawType.match(/^Collection\((.*)\)$/);
    if (collection?.[1]) {
      return { kind: 'collection', element: resolveType(collection[1], nullable), nullable: false };
    }
    const name = qualify(rawType);
    const underlying = typeDefinitions.get(name);
    if (underlying) return resolveType(underlying, nullable);
    if (name.startsWith('Edm.')) {
      const primitive = name.slice(4);
      return isPrimitiveKind(primitive)
        ? { kind: 'primitive', primitive, nullable }
        : { kind: 'untyped', nullable };
    }
    const kind = kinds.get(name);
    if (!kind) throw new MetadataError(`Unknown type '${rawType}'`);
    return { kind, name, nullable };
  };

  const toProperty = (p: CsdlProperty): StructuralProperty => ({
    name: nameOf(p, 'Property'),
    type: resolveType(p['@_Type'], p['@_Nullable'] !== 'false'),
    defaultValue: p['@_DefaultValue'],
    concurrencyMode: p['@_ConcurrencyMode'] === 'Fixed' ? 'fixed' : 'none',
  });

  const toNavigation = (n: CsdlNavigationProperty): NavigationProperty => {
    const type = resolveType(n['@_Type'], n['@_Nullable'] !== 'false');
    const target = type.kind === 'collection' ? type.element : type;
    if (target.kind !== 'entity') {
      throw new MetadataError(`Navigation property '${n['@_Name']}' does not target an entity type`);
    }
    return {
      name: nameOf(n, 'NavigationProperty'),
      type,
      partner: n['@_Partner'],
      containsTarget: isTrue(n['@_ContainsTarget']),
      onDelete: ON_DELETE_ACTIONS[n.OnDelete?.['@_Action'] ?? 'None'] ?? 'none',
      referentialConstraints: (n.ReferentialConstraint ?? []).map((rc) => ({
        property: rc['@_Property'],
        referencedProperty: rc['@_ReferencedProperty'],
      })),
    };
  };

  const toParameter = (p: { '@_Name': string; '@_Type': string; '@_Nullable'?: string }): OperationParameter => ({
    name: nameOf(p, 'Parameter'),
    type: resolveType(p['@_Type'], p['@_Nullable'] !== 'false'),
  });

  const concurrencyProperties = (annotations: CsdlAnnotation[] | undefined): string[] | undefined => {
    const annotation = annotations?.find((a) => qualify(a['@_Term']).endsWith('.OptimisticConcurrency'));
    if (!annotation) return undefined;
    return (annotation.Collection?.PropertyPath ?? []).map(String);
  };

  // --------------------------------------------------------------------------
  // Phase 1: elements
  // --------------------------------------------------------------------------
  const elements: SchemaElement[] = [];
  const externalAnnotations = new Map<string, string[]>();

  for (const s of schemas) {
    const namespace = s['@_Namespace'];
    const named = (name: string) => ({ namespace, name, fullName: `${namespace}.${name}` });

    for (const et of s.EntityType ?? []) {
      const entityType: EntityType = {
        kind: 'entity',
        ...named(nameOf(et, 'EntityType')),
        baseType: et['@_BaseType'] ? qualify(et['@_BaseType']) : undefined,
        abstract: isTrue(et['@_Abstract']),
        openType: isTrue(et['@_OpenType']),
        key: (et.Key?.PropertyRef ?? []).map((ref) => nameOf(ref, 'PropertyRef')),
        properties: (et.Property ?? []).map(toProperty),
        navigationProperties: (et.NavigationProperty ?? []).map(toNavigation),
      };
      elements.push(entityType);
    }

    for (const ct of s.ComplexType ?? []) {
      const complexType: ComplexType = {
        kind: 'complex',
        ...named(nameOf(ct, 'ComplexType')),
        baseType: ct['@_BaseType'] ? qualify(ct['@_BaseType']) : undefined,
        abstract: isTrue(ct['@_Abstract']),
        openType: isTrue(ct['@_OpenType']),
        properties: (ct.Property ?? []).map(toProperty),
        navigationProperties: (ct.NavigationProperty ?? []).map(toNavigation),
      };
      elements.push(complexType);
    }

    for (const en of s.EnumType ?? []) {
      const members: Record<string, number> = {};
      let next = 0;
      for (const member of en.Member ?? []) {
        const value = member['@_Value'] !== undefined ? Number(member['@_Value']) : next;
        members[nameOf(member, 'Member')] = value;
        next = value + 1;
      }
      const underlying = (en['@_UnderlyingType'] ?? 'Edm.Int32').replace(/^Edm\./, '');
      const enumType: EnumType = {
        kind: 'enum',
        ...named(nameOf(en, 'EnumType')),
        isFlags: isTrue(en['@_IsFlags']),
        underlyingType: isPrimitiveKind(underlying) ? underlying : ('Int32' satisfies PrimitiveKind),
        members,
      };
      elements.push(enumType);
    }

    const operations: [CsdlActionOrFunction[] | undefined, 'action' | 'function'][] = [
      [s.Action, 'action'],
      [s.Function, 'function'],
    ];
    for (const [defs, kind] of operations) {
      for (const def of defs ?? []) {
        const operation: Operation = {
          kind,
          ...named(nameOf(def, kind === 'action' ? 'Action' : 'Function')),
          isBound: isTrue(def['@_IsBound']),
          parameters: (def.Parameter ?? []).map(toParameter),
          returnType: def.ReturnType
            ? resolveType(def.ReturnType['@_Type'], def.ReturnType['@_Nullable'] !== 'false')
            : undefined,
        };
        elements.push(operation);
      }
    }

    for (const block of s.Annotations ?? []) {
      const properties = concurrencyProperties(block.Annotation);
      if (properties) externalAnnotations.set(qualify(block['@_Target']), properties);
    }
  }

  // --------------------------------------------------------------------------
  // Phase 2: entity container
  // --------------------------------------------------------------------------
  for (const s of schemas) {
    const container = s.EntityContainer;
    if (!container) continue;
    const containerName = nameOf(container, 'EntityContainer');
    const fullName = `${s['@_Namespace']}.${containerName}`;

    const sets: EntitySet[] = (container.EntitySet ?? []).map((set) => {
      const name = nameOf(set, 'EntitySet');
      const bindings: Record<string, string> = {};
      for (const binding of set.NavigationPropertyBinding ?? []) {
        bindings[binding['@_Path']] = binding['@_Target'];
      }
      return {
        name,
        entityType: qualify(set['@_EntityType']),
        navigationPropertyBindings: bindings,
        optimisticConcurrency:
          concurrencyProperties(set.Annotation) ?? externalAnnotations.get(`${fullName}/${name}`),
      };
    });

    elements.push({
      kind: 'container',
      namespace: s['@_Namespace'],
      name: containerName,
      fullName,
      entitySets: sets,
    });
  }

  return new CsdlModel(
    elements,
    schemas.map((s) => s['@_Namespace'])
  );
}
