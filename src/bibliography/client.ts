/**
 * Bibliographic metadata client
 *
 * Resolves citation locators to canonical bibliographic codes and fetches
 * the record behind a code from an ADS-style search API. Records are cached
 * in memory by code. A service that answers but has no record raises
 * RecordNotFoundError; an unreachable service, an error status or an
 * unreadable answer raises BibliographyTransportError.
 */

import { z } from 'zod';
import { DEFAULT_CONFIG, DEFAULT_LOGGER } from '../core/config.js';
import type { CatalogConfig } from '../core/config.js';
import { BibliographyTransportError, RecordNotFoundError, SourceDataError } from '../core/errors.js';
import type { Source } from '../core/identity/source.js';
import type { Logger } from '../core/logging/types.js';
import { locatorQuery, parseLocator } from './locator.js';

export interface BibliographicRecord {
  readonly code: string;
  readonly authors: readonly string[];
  readonly title: string;
  readonly abstract: string | undefined;
  /** Publication date as the service reports it (e.g. "2009-02-00") */
  readonly date: string | undefined;
  readonly links: {
    readonly abstract: string;
    readonly doi?: string;
  };
  readonly keywords: readonly string[];
}

/**
 * The subset of `fetch` the client uses
 */
export type FetchLike = (
  url: string,
  init: { readonly method: 'GET'; readonly headers: Record<string, string> }
) => Promise<{
  readonly ok: boolean;
  readonly status: number;
  readonly statusText: string;
  json(): Promise<unknown>;
}>;

export interface BibliographyClientOptions {
  readonly baseUrl?: string;
  readonly token?: string | undefined;
  readonly fetch?: FetchLike;
  /** Keep fetched records in memory (default: true) */
  readonly cache?: boolean;
  readonly logger?: Logger;
}

const RECORD_FIELDS = 'bibcode,author,title,abstract,pubdate,keyword,doi';

const searchDocSchema = z.object({
  bibcode: z.string().min(1),
  author: z.array(z.string()).default([]),
  title: z.array(z.string()).default([]),
  abstract: z.string().optional(),
  pubdate: z.string().optional(),
  keyword: z.array(z.string()).default([]),
  doi: z.array(z.string()).default([]),
});

const searchResponseSchema = z.object({
  response: z.object({
    numFound: z.number().int().nonnegative(),
    docs: z.array(searchDocSchema),
  }),
});

type SearchDoc = z.infer<typeof searchDocSchema>;

function toRecord(doc: SearchDoc): BibliographicRecord {
  const doi = doc.doi[0];
  return {
    code: doc.bibcode,
    authors: doc.author,
    title: doc.title[0] ?? '',
    abstract: doc.abstract,
    date: doc.pubdate,
    links: {
      abstract: `https://ui.adsabs.harvard.edu/abs/${encodeURIComponent(doc.bibcode)}/abstract`,
      ...(doi === undefined ? {} : { doi: `https://doi.org/${doi}` }),
    },
    keywords: doc.keyword,
  };
}

export class BibliographyClient {
  private readonly baseUrl: string;
  private readonly token: string | undefined;
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private cache: Map<string, BibliographicRecord> | undefined;

  constructor(options: BibliographyClientOptions = {}) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_CONFIG.bibliography.baseUrl).replace(/\/+$/, '');
    this.token = options.token;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.logger = (options.logger ?? DEFAULT_LOGGER).child({ component: 'bibliography' });
    this.cache = options.cache === false ? undefined : new Map();
  }

  get cacheEnabled(): boolean {
    return this.cache !== undefined;
  }

  /**
   * Turn a citation locator into a canonical bibliographic code
   */
  async resolveCode(locator: string): Promise<string> {
    const parsed = parseLocator(locator);
    if (parsed.kind === 'code') {
      const cached = this.cache?.get(parsed.code);
      if (cached !== undefined) {
        return cached.code;
      }
    }

    const record = await this.search(locatorQuery(parsed), locator);
    return record.code;
  }

  /**
   * Metadata for a bibliographic code
   */
  async fetchRecord(code: string): Promise<BibliographicRecord> {
    const cached = this.cache?.get(code);
    if (cached !== undefined) {
      this.logger.debug('bibliography_cache_hit', { code });
      return cached;
    }
    return this.search(locatorQuery({ kind: 'code', code }), code);
  }

  /**
   * Resolve a source's location and store the code on the source
   *
   * @throws SourceDataError when the source has neither code nor location
   */
  async resolveSource(source: Source): Promise<string> {
    if (source.code !== undefined) {
      return source.code;
    }
    const location = source.location;
    if (location === undefined) {
      throw new SourceDataError(`${source.toString()} has no location to resolve`);
    }
    const code = await this.resolveCode(location);
    source.setCode(code);
    return code;
  }

  /**
   * Drop one cached record, or all of them
   */
  clearCache(code?: string): void {
    if (code === undefined) {
      this.cache?.clear();
    } else {
      this.cache?.delete(code);
    }
  }

  /**
   * Turn the record cache on or off; turning it off discards its entries
   */
  setCacheEnabled(enabled: boolean): void {
    if (!enabled) {
      this.cache = undefined;
    } else if (this.cache === undefined) {
      this.cache = new Map();
    }
  }

  private async search(query: string, requested: string): Promise<BibliographicRecord> {
    const params = new URLSearchParams({ q: query, fl: RECORD_FIELDS, rows: '1' });
    const url = `${this.baseUrl}/search/query?${params.toString()}`;
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (this.token !== undefined) {
      headers['Authorization'] = `Bearer ${this.token}`;
    }

    this.logger.debug('bibliography_request', { query });

    let response: Awaited<ReturnType<FetchLike>>;
    try {
      response = await this.fetchImpl(url, { method: 'GET', headers });
    } catch (error) {
      throw new BibliographyTransportError(
        `Bibliographic service unreachable: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    if (!response.ok) {
      throw new BibliographyTransportError(
        `Bibliographic service answered ${response.status} ${response.statusText}`.trim(),
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new BibliographyTransportError(
        `Unreadable answer from bibliographic service: ${error instanceof Error ? error.message : String(error)}`,
        response.status
      );
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new BibliographyTransportError('Malformed answer from bibliographic service', response.status);
    }

    const doc = parsed.data.response.docs[0];
    if (parsed.data.response.numFound === 0 || doc === undefined) {
      throw new RecordNotFoundError(requested);
    }

    const record = toRecord(doc);
    this.cache?.set(record.code, record);
    return record;
  }
}

/**
 * Client configured from the bibliography section of a catalog configuration
 */
export function createBibliographyClient(
  config: CatalogConfig = DEFAULT_CONFIG,
  options: Omit<BibliographyClientOptions, 'baseUrl' | 'token' | 'cache'> = {}
): BibliographyClient {
  return new BibliographyClient({
    ...options,
    baseUrl: config.bibliography.baseUrl,
    token: config.bibliography.token,
    cache: config.bibliography.cache,
  });
}
