/**
 * Error taxonomy for Field Catalog
 *
 * Structural errors (cycles, duplicate ownership, type mismatches, malformed
 * orderings) are raised synchronously and leave the affected structure
 * unchanged. Derived value computation failures go through the configured
 * failure policy instead (see fields/field-value.ts).
 */

/**
 * Base class for every error raised by the catalog
 */
export abstract class CatalogError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * Illegal reparenting, or an invalidation that re-enters itself
 */
export class CycleError extends CatalogError {}

/**
 * A node cannot take the requested position in the tree (catalogs are roots)
 */
export class RootNodeError extends CatalogError {}

/**
 * Missing field, missing source slot or unresolvable path segment
 */
export class LookupError extends CatalogError {
  /** The key that could not be found */
  readonly key: string;

  constructor(message: string, key: string) {
    super(message);
    this.key = key;
  }
}

/**
 * Reading the current value of a field that holds no values
 */
export class EmptyFieldError extends LookupError {
  constructor(fieldName: string) {
    super(`Field ${fieldName} empty`, fieldName);
  }
}

/**
 * A value fails a field's type constraint
 */
export class TypeMismatchError extends CatalogError {
  /** Human-readable description of the expected type */
  readonly expected: string;

  constructor(message: string, expected: string) {
    super(message);
    this.expected = expected;
  }
}

/**
 * Re-adding a field name, or attaching an owned field/derived value elsewhere
 */
export class DuplicateOwnershipError extends CatalogError {}

/**
 * A field already holds a value from the same source
 */
export class DuplicateSourceError extends DuplicateOwnershipError {
  readonly sourceId: string;

  constructor(fieldName: string, sourceId: string) {
    super(`Value with source ${sourceId} already present in field ${fieldName}`);
    this.sourceId = sourceId;
  }
}

/**
 * A value's source does not match the slot it is written to
 */
export class SourceMismatchError extends CatalogError {}

/**
 * Some of a derived value's dependencies cannot be dereferenced
 */
export class UnresolvedDependencyError extends CatalogError {
  /** Positions of the dependency arguments that failed */
  readonly indices: readonly number[];
  /** Per-index reasons, in the same order as indices */
  readonly reasons: readonly string[];

  constructor(message: string, indices: readonly number[], reasons: readonly string[] = []) {
    super(message);
    this.indices = indices;
    this.reasons = reasons;
  }
}

/**
 * A child ordering that is not a permutation of the current children
 */
export class InvalidOrderError extends CatalogError {}

/**
 * A dependency path expression that does not follow the path grammar
 */
export class InvalidPathError extends CatalogError {
  readonly path: string;

  constructor(message: string, path: string) {
    super(`${message} in path "${path}"`);
    this.path = path;
  }
}

/**
 * Snapshot creation or restoration failed
 */
export class SnapshotError extends CatalogError {}

/**
 * Configuration values could not be parsed
 */
export class ConfigError extends CatalogError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join(', ')}`);
    this.issues = issues;
  }
}

/**
 * Problem retrieving external source-related (bibliographic) data
 */
export class SourceDataError extends CatalogError {}

/**
 * The bibliographic service answered, but has no record for the code
 */
export class RecordNotFoundError extends SourceDataError {
  readonly code: string;

  constructor(code: string) {
    super(`No bibliographic record found for ${code}`);
    this.code = code;
  }
}

/**
 * The bibliographic service could not be reached or answered with an error
 */
export class BibliographyTransportError extends SourceDataError {
  /** HTTP status, when the service answered */
  readonly status: number | undefined;

  constructor(message: string, status?: number) {
    super(message);
    this.status = status;
  }
}
