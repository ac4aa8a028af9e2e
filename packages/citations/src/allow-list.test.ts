import { describe, it, expect, vi } from 'vitest';
import { extractAllowedArticles, filterLegalArticles, normalizeArticleReference } from './allow-list.js';

describe('citations:extract', () => {
  it('recognizes the usual spellings of an article reference', () => {
    const context = [
      'Según el Art. 5 del TRLC,',
      'el Art.165 y el ART 443,',
      'el Artículo 442 y el articulo 444,',
      'así como los arts. 135 y 007.',
    ].join(' ');

    expect([...extractAllowedArticles(context)].sort()).toEqual(['135', '165', '442', '443', '444', '5']);
  });

  it('ignores numbers that are not article references', () => {
    expect(extractAllowedArticles('Real Decreto Legislativo 1/2020, de 5 de mayo').size).toBe(0);
  });

  it('returns an empty set for empty context', () => {
    expect(extractAllowedArticles('').size).toBe(0);
  });
});

describe('citations:normalize', () => {
  it.each([
    ['Art. 165 TRLC', '165'],
    ['Artículo 005', '5'],
    ['art 443', '443'],
    ['165', '165'],
    ['apartado 2', '2'],
  ])('normalizes %s to %s', (reference, expected) => {
    expect(normalizeArticleReference(reference)).toBe(expected);
  });

  it('returns null when there is no number', () => {
    expect(normalizeArticleReference('Artículo sin número')).toBeNull();
  });
});

describe('citations:filter', () => {
  it('keeps allowed citations in their original form and logs each discard', () => {
    const logger = { warn: vi.fn() };
    const allowed = extractAllowedArticles('Art. 5 TRLC');

    const result = filterLegalArticles(['Art. 5', 'Art. 443', 'sin referencia'], allowed, 'Art. 5 TRLC', logger);

    expect(result).toEqual({ valid: ['Art. 5'], discarded: ['Art. 443', 'sin referencia'] });
    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenCalledWith('[Citations] Discarded article not present in legal context: Art. 443');
  });

  it('discards everything when there is no legal context', () => {
    const logger = { warn: vi.fn() };

    const result = filterLegalArticles(['Art. 5'], new Set(), '', logger);

    expect(result).toEqual({ valid: [], discarded: ['Art. 5'] });
    expect(logger.warn).toHaveBeenCalledWith('[Citations] Discarded article, no legal context available: Art. 5');
  });
});
