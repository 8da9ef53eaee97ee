/**
 * Provenance identities for Field Catalog
 *
 * A Source names where a value came from. Sources are interned: constructing a
 * Source from the same identifier string always returns the same instance for
 * as long as anything still references it. Once nothing does, the registry may
 * drop it and a later lookup interns a fresh instance.
 *
 * A source spec may carry a location after a slash:
 * - `"Smith 2009/arXiv:0901.0001"`: identifier `Smith 2009`, location locator
 *   to be resolved by the bibliography collaborator
 * - `"Smith 2009//2009ApJ...690.1234S"`: identifier `Smith 2009` with an
 *   already-resolved bibliographic code
 */

import { SourceDataError } from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';
import type { Logger } from '../logging/types.js';

/** Identifier of the reserved source that marks a field's default value */
export const DEFAULT_SOURCE_ID = '<default>';

/**
 * Result of splitting a source spec string
 */
export interface ParsedSourceSpec {
  readonly id: string;
  readonly location?: string;
  readonly code?: string;
}

/**
 * Split `"id"`, `"id/location"` or `"id//code"` into its parts
 */
export function parseSourceSpec(spec: string): ParsedSourceSpec {
  if (!spec.includes('/')) {
    return { id: spec.trim() };
  }

  const parts = spec.split('/');
  const last = parts[parts.length - 1]?.trim() ?? '';

  if (parts.length >= 3 && parts[parts.length - 2] === '') {
    const id = parts.slice(0, -2).join('/').trim();
    return last === '' ? { id } : { id, code: last };
  }

  const id = parts.slice(0, -1).join('/').trim();
  return last === '' ? { id } : { id, location: last };
}

export class Source {
  readonly id: string;
  private _location: string | undefined;
  private _code: string | undefined;

  /**
   * @internal Use {@link Source.of} or {@link SourceRegistry.intern}.
   */
  constructor(id: string) {
    this.id = id;
  }

  /**
   * Intern a source in the process-wide registry
   */
  static of(spec: string, location?: string): Source {
    return defaultSourceRegistry.intern(spec, location);
  }

  /**
   * The reserved source for default values
   */
  static get DEFAULT(): Source {
    return DEFAULT_SOURCE;
  }

  get isDefault(): boolean {
    return this === DEFAULT_SOURCE;
  }

  /** Free-form citation locator (arXiv id, DOI, URL or raw code) */
  get location(): string | undefined {
    return this._location;
  }

  /** Canonical bibliographic code, once resolved */
  get code(): string | undefined {
    return this._code;
  }

  /**
   * Replace the location. A different location clears any resolved code.
   */
  setLocation(location: string | undefined): void {
    const normalized = location === undefined || location.trim() === '' ? undefined : location.trim();
    if (normalized !== this._location) {
      this._location = normalized;
      this._code = undefined;
    }
  }

  /**
   * Record the canonical code the location resolved to
   */
  setCode(code: string | undefined): void {
    this._code = code === undefined || code.trim() === '' ? undefined : code.trim();
  }

  /**
   * Spec string that interns back to this source with its location data
   */
  toSpec(): string {
    if (this._code !== undefined) {
      return `${this.id}//${this._code}`;
    }
    if (this._location !== undefined) {
      return `${this.id}/${this._location}`;
    }
    return this.id;
  }

  toString(): string {
    const where = this._code ?? this._location;
    return where === undefined ? `Source ${this.id}` : `Source ${this.id} @${where}`;
  }
}

const DEFAULT_SOURCE = new Source(DEFAULT_SOURCE_ID);

/**
 * Interning table for sources, holding them weakly
 */
export class SourceRegistry {
  private readonly entries = new Map<string, WeakRef<Source>>();
  private readonly finalizer = new FinalizationRegistry<string>((id) => {
    const ref = this.entries.get(id);
    if (ref !== undefined && ref.deref() === undefined) {
      this.entries.delete(id);
    }
  });
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createSilentLogger();
  }

  /**
   * Return the unique source for the spec's identifier, creating it on first
   * use. Location data in the spec (or the explicit location) is applied to
   * the shared instance, overwriting a different one with a warning.
   */
  intern(spec: string, location?: string): Source {
    const parsed = parseSourceSpec(spec);
    if (parsed.id === '') {
      throw new SourceDataError(`Source spec "${spec}" has an empty identifier`);
    }
    if (parsed.id === DEFAULT_SOURCE_ID) {
      return DEFAULT_SOURCE;
    }

    let source = this.entries.get(parsed.id)?.deref();
    if (source === undefined) {
      source = new Source(parsed.id);
      this.entries.set(parsed.id, new WeakRef(source));
      this.finalizer.register(source, parsed.id);
    }

    const newLocation = location ?? parsed.location;
    if (newLocation !== undefined && newLocation !== source.location) {
      if (source.location !== undefined) {
        this.logger.warn('source_location_overwritten', {
          source: source.id,
          previous: source.location,
          next: newLocation,
        });
      }
      source.setLocation(newLocation);
    }

    if (parsed.code !== undefined && parsed.code !== source.code) {
      if (source.code !== undefined) {
        this.logger.warn('source_code_overwritten', {
          source: source.id,
          previous: source.code,
          next: parsed.code,
        });
      }
      source.setCode(parsed.code);
    }

    return source;
  }

  /**
   * Look up an interned source without creating it
   */
  get(id: string): Source | undefined {
    if (id === DEFAULT_SOURCE_ID) {
      return DEFAULT_SOURCE;
    }
    return this.entries.get(id)?.deref();
  }

  has(id: string): boolean {
    return this.get(id) !== undefined;
  }

  /**
   * Identifiers of sources that are still alive
   */
  ids(): string[] {
    return [...this.entries.entries()]
      .filter(([, ref]) => ref.deref() !== undefined)
      .map(([id]) => id);
  }
}

export const defaultSourceRegistry = new SourceRegistry();

/**
 * Accept a Source, a spec string or null (the default source)
 */
export function toSource(key: Source | string | null, registry: SourceRegistry = defaultSourceRegistry): Source {
  if (key === null) {
    return DEFAULT_SOURCE;
  }
  return typeof key === 'string' ? registry.intern(key) : key;
}
