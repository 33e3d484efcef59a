// ============================================================================
// Writer Errors
// ============================================================================

export class ODataWriterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A field, link, entity set or key has no counterpart in the metadata. */
export class SchemaMismatchError extends ODataWriterError {}

/** A value cannot be represented as the wire type declared for it. */
export class FormatError extends ODataWriterError {
  readonly valueType?: string;
  readonly targetType?: string;

  constructor(message: string, details?: { valueType: string; targetType: string }) {
    super(message);
    this.valueType = details?.valueType;
    this.targetType = details?.targetType;
  }

  static conversion(valueType: string, targetType: string): FormatError {
    return new FormatError(
      `Unable to convert value of type ${valueType} to OData type ${targetType}`,
      { valueType, targetType }
    );
  }
}

/** No single entity set exposes the target type of a navigation link. */
export class MissingNavigationTargetError extends ODataWriterError {}

export class ConfigurationError extends ODataWriterError {}

export class MetadataError extends ODataWriterError {}
