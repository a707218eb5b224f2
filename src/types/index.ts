/**
 * Barrel export for all shared types.
 */
export type { PaperRecord, PaperLink } from './paper.js';
export type { SearchSource, SearchRequest, SortCriterion, SortOrder } from './search-source.js';
export { DEFAULT_CONFIG } from './config.js';
export type { ReportConfig, LogLevel } from './config.js';
