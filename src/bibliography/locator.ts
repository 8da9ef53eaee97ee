/**
 * Citation locators
 *
 * A source's location is a free-form citation string. It is classified as
 * an arXiv identifier, a DOI, a URL or (otherwise) a bibliographic code,
 * and turned into a query for the bibliographic service.
 */

import { SourceDataError } from '../core/errors.js';

export type Locator =
  | { readonly kind: 'arxiv'; readonly id: string }
  | { readonly kind: 'doi'; readonly id: string }
  | { readonly kind: 'url'; readonly url: string }
  | { readonly kind: 'code'; readonly code: string };

const DOI_PATTERN = /^10\.\d{4,9}\/\S+$/;
const ARXIV_URL = /arxiv\.org\/(?:abs|pdf)\/([^?#]+?)(?:v\d+)?(?:\.pdf)?(?:[?#].*)?$/i;
const DOI_URL = /doi\.org\/(10\.[^?#]+)/i;
const ADS_URL = /\/abs\/([^/?#]+)/i;

function stripPrefix(value: string, prefix: string): string {
  return value.toLowerCase().startsWith(prefix) ? value.slice(prefix.length).trim() : value;
}

/**
 * Classify a citation string
 *
 * @throws SourceDataError for an empty locator
 */
export function parseLocator(locator: string): Locator {
  const trimmed = locator.trim();
  const lower = trimmed.toLowerCase();

  if (trimmed === '') {
    throw new SourceDataError('Empty citation locator');
  }
  if (lower.startsWith('http://') || lower.startsWith('https://')) {
    return { kind: 'url', url: trimmed };
  }
  if (lower.startsWith('arxiv')) {
    return { kind: 'arxiv', id: stripPrefix(stripPrefix(trimmed, 'arxiv:'), 'arxiv') };
  }
  if (lower.startsWith('astro-ph')) {
    return { kind: 'arxiv', id: stripPrefix(trimmed, 'astro-ph:') };
  }
  if (lower.startsWith('doi')) {
    return { kind: 'doi', id: stripPrefix(stripPrefix(trimmed, 'doi:'), 'doi') };
  }
  if (DOI_PATTERN.test(trimmed)) {
    return { kind: 'doi', id: trimmed };
  }
  return { kind: 'code', code: trimmed };
}

function decodeSegment(segment: string, url: string): string {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) {
      throw new SourceDataError(`Malformed escape sequence in URL ${url}`);
    }
    throw error;
  }
}

function quote(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}

/**
 * Search query that finds the record a locator points at
 *
 * @throws SourceDataError for URLs that name no known record or carry a
 *   malformed escape sequence
 */
export function locatorQuery(locator: Locator): string {
  switch (locator.kind) {
    case 'arxiv':
      return `identifier:${quote(`arXiv:${locator.id}`)}`;
    case 'doi':
      return `doi:${quote(locator.id)}`;
    case 'code':
      return `bibcode:${quote(locator.code)}`;
    case 'url': {
      const arxiv = ARXIV_URL.exec(locator.url)?.[1];
      if (arxiv !== undefined) {
        return locatorQuery({ kind: 'arxiv', id: arxiv });
      }
      const doi = DOI_URL.exec(locator.url)?.[1];
      if (doi !== undefined) {
        return locatorQuery({ kind: 'doi', id: decodeSegment(doi, locator.url) });
      }
      const code = ADS_URL.exec(locator.url)?.[1];
      if (code !== undefined) {
        return locatorQuery({ kind: 'code', code: decodeSegment(code, locator.url) });
      }
      throw new SourceDataError(`Cannot find a bibliographic record for URL ${locator.url}`);
    }
  }
}
