import { DeltaModel } from './delta-model.js';
import type { EdmModel, NavigationProperty, PrimitiveKind, StructuredType } from './edm.js';
import {
  entityKey,
  entitySets,
  findPartner,
  isStructuredType,
  navigationMultiplicity,
  navigationProperties,
  navigationTargetName,
  structuralProperties,
} from './edm.js';
import type { EntryData, LinkReference, ODataLink } from './entry.js';
import { isEntryData } from './entry.js';
import { FormatError, MissingNavigationTargetError, SchemaMismatchError } from './errors.js';
import type { SchemaCatalog } from './catalog.js';
import { describeValueType } from './type-map.js';

/** Content ids of entries already queued in the current batch, by identity. */
export interface ContentIdLookup {
  getContentId(entryData: object): number | undefined;
}

export type EncodingContext = {
  readonly model: EdmModel;
  readonly catalog: Pick<SchemaCatalog, 'namesAreEqual' | 'formatKeyAsUriLiteral'>;
  readonly contentIds?: ContentIdLookup;
};

function shortName(qualifiedName: string): string {
  return qualifiedName.slice(qualifiedName.lastIndexOf('.') + 1);
}

function lookupField(
  context: EncodingContext,
  data: EntryData,
  name: string
): [found: boolean, value: unknown] {
  if (Object.prototype.hasOwnProperty.call(data, name)) return [true, data[name]];
  const match = Object.keys(data).find((key) => context.catalog.namesAreEqual(name, key));
  return match === undefined ? [false, undefined] : [true, data[match]];
}

/** Partial updates encode against a delta model; link targets and partners come from the full one. */
function sourceModel(model: EdmModel): EdmModel {
  return model instanceof DeltaModel ? model.source : model;
}

function declaredPartner(
  model: EdmModel,
  ownerType: StructuredType,
  navigation: NavigationProperty
): NavigationProperty | undefined {
  const source = sourceModel(model);
  const declaredOwner = source.findDeclaredType(ownerType.fullName);
  if (!isStructuredType(declaredOwner)) return undefined;
  const declared = navigationProperties(source, declaredOwner).find((n) => n.name === navigation.name);
  return declared && findPartner(source, declared);
}

function resolveReference(
  context: EncodingContext,
  targetTypeName: string,
  linkData: EntryData
): LinkReference {
  const contentId = context.contentIds?.getContentId(linkData);
  if (contentId !== undefined) return { kind: 'pending', contentId };

  const model = sourceModel(context.model);
  const linkType = model.findDeclaredType(targetTypeName);
  if (linkType?.kind !== 'entity') {
    throw new SchemaMismatchError(`Entity type '${targetTypeName}' not found`);
  }

  const candidates = entitySets(model).filter((set) =>
    context.catalog.namesAreEqual(shortName(set.entityType), linkType.name)
  );
  const [linkSet] = candidates;
  if (!linkSet || candidates.length > 1) {
    throw new MissingNavigationTargetError(
      candidates.length === 0
        ? `No entity set exposes entity type '${linkType.fullName}'`
        : `Entity type '${linkType.fullName}' is exposed by several entity sets: ${candidates.map((s) => s.name).join(', ')}`
    );
  }

  const properties = structuralProperties(model, linkType);
  const keyFields: Record<string, unknown> = {};
  const keyKinds: Record<string, PrimitiveKind> = {};
  for (const keyName of entityKey(model, linkType)) {
    const [found, value] = lookupField(context, linkData, keyName);
    if (!found) {
      throw new SchemaMismatchError(`Link target of type '${linkType.fullName}' has no value for key '${keyName}'`);
    }
    keyFields[keyName] = value;
    const keyType = properties.find((p) => p.name === keyName)?.type;
    if (keyType?.kind === 'primitive') keyKinds[keyName] = keyType.primitive;
  }

  return {
    kind: 'resolved',
    entitySet: linkSet.name,
    key: context.catalog.formatKeyAsUriLiteral(keyFields, keyKinds),
  };
}

/**
 * Encode one navigation link from `ownerType` to the entity described by
 * `linkValue`. Entities queued earlier in the same batch are referenced by
 * content id; anything else by entity set and key.
 */
export function encodeLink(
  context: EncodingContext,
  ownerType: StructuredType,
  linkName: string,
  linkValue: unknown
): ODataLink {
  const navigation = navigationProperties(context.model, ownerType).find((n) =>
    context.catalog.namesAreEqual(n.name, linkName)
  );
  if (!navigation) {
    throw new SchemaMismatchError(`Navigation property '${linkName}' not found on type '${ownerType.fullName}'`);
  }
  if (!isEntryData(linkValue)) {
    throw new FormatError(
      `Link '${navigation.name}' expects entity data, got ${describeValueType(linkValue)}`
    );
  }

  const partner = declaredPartner(context.model, ownerType, navigation);
  const targetTypeName = navigationTargetName(navigation);

  return {
    name: navigation.name,
    isCollection: navigationMultiplicity(partner ?? navigation) === 'many',
    declaredCollection: navigation.type.kind === 'collection',
    targetTypeName,
    reference: resolveReference(context, targetTypeName, linkValue),
  };
}
