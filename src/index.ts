// ============================================================================
// OData Entry Writer
// ============================================================================

export { RequestWriter } from './request-writer.js';
export { ODataBatchWriter } from './batch.js';
export type { BatchOperationMessage, BatchWriter, ODataBatchWriterOptions } from './batch.js';
export { MetadataCatalog } from './catalog.js';
export type { MetadataCatalogOptions, SchemaCatalog } from './catalog.js';
export { defineConfig, resolveWriterConfig } from './config.js';
export type { ResolvedWriterConfig, WriterConfig } from './config.js';
export { CsdlModel, parseMetadata } from './metadata.js';
export type {
  ComplexType,
  EdmModel,
  EntityContainer,
  EntitySet,
  EntityType,
  EnumType,
  Multiplicity,
  NavigationProperty,
  Operation,
  PrimitiveKind,
  SchemaElement,
  SchemaType,
  StructuralProperty,
  StructuredType,
  TypeReference,
} from './edm.js';
export {
  entityKey,
  entitySets,
  findPartner,
  isStructuredType,
  navigationMultiplicity,
  navigationProperties,
  structuralProperties,
  typeReferenceName,
} from './edm.js';
export { DeltaModel, restrictSchema } from './delta-model.js';
export { encodeEntry, encodeValue, isPartialUpdate } from './entry-encoder.js';
export type { EntryEncodingContext, WriteMethod } from './entry-encoder.js';
export { encodeLink } from './link-encoder.js';
export type { ContentIdLookup, EncodingContext } from './link-encoder.js';
export { ODataCollectionValue, ODataComplexValue, isEntryData, linkReferenceUrl } from './entry.js';
export type { EntryData, LinkReference, ODataEntry, ODataLink, ODataProperty } from './entry.js';
export { CONTENT_TYPES, serializeEntry, serializeReference, toJsonEntry } from './payload.js';
export type { PayloadFormat, PayloadOptions } from './payload.js';
export { convert, describeValueType, formatDuration, nativeTypesFor, resolveWireKind } from './type-map.js';
export type { NativeType } from './type-map.js';
export { formatKeyAsUriLiteral, formatUriLiteral } from './uri-literal.js';
export { createNameMatcher, namesAreEqual } from './names.js';
export type { NameMatcher, Pluralizer } from './names.js';
export { silentLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  ConfigurationError,
  FormatError,
  MetadataError,
  MissingNavigationTargetError,
  ODataWriterError,
  SchemaMismatchError,
} from './errors.js';
