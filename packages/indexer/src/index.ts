/**
 * @relayarr/indexer
 * 
 * The search side:
 * - Category table and quality/size/title heuristics
 * - Result Synthesizer
 * - Retrieval references and Newznab XML rendering
 * - Search Service over the discovery and title-resolution collaborators
 * - Provider catalog, session and TMDB adapters
 */

export {
  CATEGORY_TABLE,
  categoryFor,
  releaseCategory,
  kindForCategories,
  parseCategories,
  type Category,
  type CategoryGroup,
} from './categories.js';

export { normalizeQuality, qualityRank } from './quality.js';
export { extractNfoSize, estimateSize, releaseSize, isSeasonPack } from './size.js';
export {
  buildReleaseTitle,
  normalizeLanguage,
  extractEdition,
  type ReleaseTitle,
} from './releaseTitle.js';

export { ResultSynthesizer } from './synthesizer.js';

export {
  referenceFor,
  encodeReference,
  decodeReference,
  referenceFromUrl,
  referenceFromNzb,
  type RetrievalReference,
} from './retrievalReference.js';

export {
  NewznabErrorCode,
  NEWZNAB_NAMESPACE,
  escapeXml,
  renderCaps,
  renderFeed,
  renderError,
  renderNzb,
  type Capabilities,
  type SearchMode,
  type Feed,
  type FeedItem,
} from './newznab.js';

export {
  SearchService,
  matchesEpisode,
  type SearchServiceOptions,
  type MovieQuery,
  type TvQuery,
  type MusicQuery,
} from './searchService.js';

export type {
  ContentDiscoveryClient,
  TitleResolver,
  TitleIdentifier,
  SessionSupplier,
  ProviderSession,
  CandidateVerifier,
} from './collaborators.js';

export { CatalogClient, rankLinks, type CatalogConfig } from './clients/catalog.js';
export { CookieSessionSupplier, parseSetCookies, type CookieSessionConfig } from './clients/cookieSession.js';
export { TmdbTitleResolver, type TmdbConfig } from './clients/tmdb.js';
