export { extractAllowedArticles, filterLegalArticles, normalizeArticleReference } from './allow-list.js';
export type { CitationFilterResult } from './allow-list.js';
