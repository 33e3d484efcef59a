// ============================================================================
// Encoded Entry Tree
// ============================================================================

export type EntryData = Record<string, unknown>;

export type ODataProperty = {
  readonly name: string;
  /** Declared type, e.g. `Edm.Int32` or `NS.Address`. */
  readonly typeName: string;
  /** A primitive, `ODataComplexValue`, `ODataCollectionValue`, null, or a passed-through value. */
  readonly value: unknown;
};

export class ODataComplexValue {
  constructor(
    readonly typeName: string,
    readonly properties: readonly ODataProperty[]
  ) {}
}

export class ODataCollectionValue {
  constructor(
    readonly typeName: string,
    readonly items: readonly unknown[]
  ) {}
}

export type LinkReference =
  | { readonly kind: 'resolved'; readonly entitySet: string; readonly key: string }
  | { readonly kind: 'pending'; readonly contentId: number };

export function linkReferenceUrl(reference: LinkReference): string {
  return reference.kind === 'pending'
    ? `$${reference.contentId}`
    : `${reference.entitySet}${reference.key}`;
}

export type ODataLink = {
  readonly name: string;
  /** Multiplicity seen from the partner end. */
  readonly isCollection: boolean;
  /** Whether the navigation property itself is collection-valued. */
  readonly declaredCollection: boolean;
  readonly targetTypeName: string;
  readonly reference: LinkReference;
};

export type ODataEntry = {
  readonly typeName: string;
  readonly properties: readonly ODataProperty[];
  readonly links: readonly ODataLink[];
};

export function isEntryData(value: unknown): value is EntryData {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
  const prototype: unknown = Object.getPrototypeOf(value);
  return prototype === Object.prototype || prototype === null;
}
