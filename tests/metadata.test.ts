import { test, expect } from 'vitest';
import {
  entityKey,
  entitySets,
  findPartner,
  navigationMultiplicity,
  navigationProperties,
  structuralProperties,
  typeReferenceName,
} from '../src/edm.js';
import { MetadataError } from '../src/errors.js';
import { parseMetadata } from '../src/metadata.js';
import { entityType, salesModel } from './test-metadata.js';

function schemaDocument(body: string): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<edmx:Edmx Version="4.0" xmlns:edmx="http://docs.oasis-open.org/odata/ns/edmx">
  <edmx:DataServices>
    <Schema Namespace="Test" xmlns="http://docs.oasis-open.org/odata/ns/edm">
      ${body}
    </Schema>
  </edmx:DataServices>
</edmx:Edmx>`;
}

// ============================================================================
// Types
// ============================================================================

test('parses entity types with keys and declared properties', () => {
  const customer = entityType('Sales.Customer');
  expect(customer.namespace).toBe('Sales');
  expect(customer.name).toBe('Customer');
  expect(customer.key).toEqual(['Id']);
  expect(customer.properties.map((p) => p.name)).toEqual(['Id', 'Name', 'Address', 'Tags']);
  expect(customer.properties[0]?.type).toEqual({ kind: 'primitive', primitive: 'Int32', nullable: false });
});

test('resolves the schema alias in type references', () => {
  const address = entityType('Sales.Customer').properties.find((p) => p.name === 'Address');
  expect(address?.type).toEqual({ kind: 'complex', name: 'Sales.Address', nullable: true });
});

test('resolves collection types', () => {
  const tags = entityType('Sales.Customer').properties.find((p) => p.name === 'Tags');
  expect(tags && typeReferenceName(tags.type)).toBe('Collection(Edm.String)');
});

test('resolves type definitions to their underlying primitive', () => {
  const total = entityType('Sales.Order').properties.find((p) => p.name === 'Total');
  expect(total?.type).toEqual({ kind: 'primitive', primitive: 'Decimal', nullable: true });
});

test('numbers enum members from the last explicit value', () => {
  const status = salesModel.findDeclaredType('Sales.OrderStatus');
  expect(status?.kind).toBe('enum');
  if (status?.kind !== 'enum') return;
  expect(status.members).toEqual({ Open: 0, Shipped: 5, Closed: 6 });
  expect(status.underlyingType).toBe('Int32');
});

test('inherits properties and key from the base type', () => {
  const ship = entityType('Sales.Ship');
  expect(ship.baseType).toBe('Sales.Vehicle');
  expect(structuralProperties(salesModel, ship).map((p) => p.name)).toEqual(['Id', 'Name', 'Tonnage']);
  expect(entityKey(salesModel, ship)).toEqual(['Id']);
  expect(salesModel.findDirectlyDerivedTypes('Sales.Vehicle').map((t) => t.fullName)).toEqual(['Sales.Ship']);
});

test('reads the abstract flag', () => {
  expect(entityType('Sales.Vehicle').abstract).toBe(true);
  expect(entityType('Sales.Ship').abstract).toBe(false);
});

// ============================================================================
// Navigation
// ============================================================================

test('links navigation partners in both directions', () => {
  const customer = entityType('Sales.Customer');
  const orders = navigationProperties(salesModel, customer).find((n) => n.name === 'Orders');
  expect(orders).toBeDefined();
  if (!orders) return;

  const partner = findPartner(salesModel, orders);
  expect(partner?.name).toBe('Customer');
  expect(navigationMultiplicity(orders)).toBe('many');
  expect(partner && navigationMultiplicity(partner)).toBe('zeroOrOne');
});

test('reads referential constraints and delete actions', () => {
  const customer = entityType('Sales.Order').navigationProperties.find((n) => n.name === 'Customer');
  expect(customer?.referentialConstraints).toEqual([{ property: 'CustomerId', referencedProperty: 'Id' }]);

  const badge = entityType('Sales.Employee').navigationProperties.find((n) => n.name === 'Badge');
  expect(badge?.onDelete).toBe('cascade');
  expect(badge && navigationMultiplicity(badge)).toBe('one');
});

test('navigation without a partner has none', () => {
  const notes = entityType('Sales.Customer').navigationProperties.find((n) => n.name === 'Notes');
  expect(notes && findPartner(salesModel, notes)).toBeUndefined();
});

// ============================================================================
// Container
// ============================================================================

test('parses entity sets with their bindings', () => {
  const sets = entitySets(salesModel);
  expect(sets.map((s) => s.name)).toEqual([
    'Customers',
    'Orders',
    'Employees',
    'Products',
    'Vehicles',
    'Notes',
    'ArchivedNotes',
    'Documents',
  ]);
  expect(sets[0]?.entityType).toBe('Sales.Customer');
  expect(sets[0]?.navigationPropertyBindings).toEqual({ Orders: 'Orders' });
});

test('reads optimistic concurrency annotations targeting an entity set', () => {
  const products = entitySets(salesModel).find((s) => s.name === 'Products');
  const orders = entitySets(salesModel).find((s) => s.name === 'Orders');
  expect(products?.optimisticConcurrency).toEqual(['Price']);
  expect(orders?.optimisticConcurrency).toBeUndefined();
});

test('reads inline optimistic concurrency annotations', () => {
  const model = parseMetadata(
    schemaDocument(`
      <EntityType Name="Item">
        <Key><PropertyRef Name="Id" /></Key>
        <Property Name="Id" Type="Edm.Int32" Nullable="false" />
        <Property Name="ETag" Type="Edm.String" />
      </EntityType>
      <EntityContainer Name="Default">
        <EntitySet Name="Items" EntityType="Test.Item">
          <Annotation Term="Org.OData.Core.V1.OptimisticConcurrency">
            <Collection><PropertyPath>ETag</PropertyPath></Collection>
          </Annotation>
        </EntitySet>
      </EntityContainer>`)
  );
  expect(entitySets(model)[0]?.optimisticConcurrency).toEqual(['ETag']);
});

test('reads the concurrency mode of properties', () => {
  const rowVersion = entityType('Sales.Order').properties.find((p) => p.name === 'RowVersion');
  expect(rowVersion?.concurrencyMode).toBe('fixed');
});

// ============================================================================
// Operations
// ============================================================================

test('indexes bound and unbound operations', () => {
  expect(salesModel.findBoundOperations('Sales.Order').map((o) => o.name)).toEqual(['Cancel']);
  const [topCustomers] = salesModel.findDeclaredOperations('Sales.TopCustomers');
  expect(topCustomers?.kind).toBe('function');
  expect(topCustomers?.isBound).toBe(false);
  expect(topCustomers?.returnType && typeReferenceName(topCustomers.returnType)).toBe(
    'Collection(Sales.Customer)'
  );
});

// ============================================================================
// Failures
// ============================================================================

test('rejects malformed XML', () => {
  expect(() => parseMetadata('<edmx:Edmx><Schema>')).toThrow(MetadataError);
});

test('rejects documents without a schema', () => {
  expect(() => parseMetadata('<root />')).toThrow('No Schema element found in metadata document');
});

test('rejects references to undeclared types', () => {
  expect(() =>
    parseMetadata(
      schemaDocument(`
        <EntityType Name="Item">
          <Property Name="Kind" Type="Test.Missing" />
        </EntityType>`)
    )
  ).toThrow("Unknown type 'Test.Missing'");
});
