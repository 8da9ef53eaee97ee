/**
 * Bibliographic enrichment for sources
 */

export { parseLocator, locatorQuery, type Locator } from './locator.js';
export {
  BibliographyClient,
  createBibliographyClient,
  type BibliographicRecord,
  type BibliographyClientOptions,
  type FetchLike,
} from './client.js';
