/**
 * Citation Allow-List
 *
 * Anti-hallucination control for legal citations. A rule may only cite an
 * article that appears in the legal text retrieved for the session; anything
 * else is discarded and reported.
 *
 * Recognized forms (case insensitive): "Art. 165", "Art.165", "Art 165",
 * "ART. 165", "Artículo 165", "Articulo 165", "Arts. 5".
 */

import type { EngineLogger } from '@concursal/domain/logger';

const ARTICLE_SOURCE = String.raw`\b(?:art[íi]culos?|arts?)\.?\s*(\d+)`;

export interface CitationFilterResult {
  valid: string[];
  discarded: string[];
}

function normalizeNumber(digits: string): string {
  return String(parseInt(digits, 10));
}

/**
 * Normalized article numbers referenced anywhere in the legal context.
 */
export function extractAllowedArticles(legalContext: string): Set<string> {
  const allowed = new Set<string>();
  if (!legalContext) return allowed;

  for (const match of legalContext.matchAll(new RegExp(ARTICLE_SOURCE, 'giu'))) {
    allowed.add(normalizeNumber(match[1]));
  }
  return allowed;
}

/**
 * "Art. 165 TRLC" -> "165", "Artículo 005" -> "5", "165" -> "165".
 * Falls back to the first number in the text; null when there is none.
 */
export function normalizeArticleReference(reference: string): string | null {
  const article = new RegExp(ARTICLE_SOURCE, 'iu').exec(reference);
  if (article) return normalizeNumber(article[1]);

  const number = /\d+/.exec(reference);
  return number ? normalizeNumber(number[0]) : null;
}

/**
 * Splits citations into those backed by the allow-list and those that are
 * not. Valid citations keep their original text.
 */
export function filterLegalArticles(
  citations: readonly string[],
  allowed: ReadonlySet<string>,
  legalContext = '',
  logger: Pick<EngineLogger, 'warn'> = console
): CitationFilterResult {
  const result: CitationFilterResult = { valid: [], discarded: [] };

  for (const citation of citations) {
    const normalized = normalizeArticleReference(citation);
    if (normalized !== null && allowed.has(normalized)) {
      result.valid.push(citation);
      continue;
    }

    result.discarded.push(citation);
    logger.warn(
      legalContext
        ? `[Citations] Discarded article not present in legal context: ${citation}`
        : `[Citations] Discarded article, no legal context available: ${citation}`
    );
  }

  return result;
}
