import type { MediaItem } from '@reelsift/shared';

import { normalizeTitle } from './titleNormalizer.js';

export const SIMILARITY_WEIGHTS = {
  title: 30,
  exactYear: 20,
  adjacentYear: 10,
  imdb: 40,
  tmdb: 40,
  runtime: 10,
} as const;

export const MAX_SIMILARITY_SCORE =
  SIMILARITY_WEIGHTS.title +
  SIMILARITY_WEIGHTS.exactYear +
  SIMILARITY_WEIGHTS.imdb +
  SIMILARITY_WEIGHTS.tmdb +
  SIMILARITY_WEIGHTS.runtime;

const RUNTIME_TOLERANCE_MINUTES = 5;

export interface SimilarityBreakdown {
  title: number;
  year: number;
  imdb: number;
  tmdb: number;
  runtime: number;
  total: number;
}

type SimilarityInput = Pick<MediaItem, 'name' | 'productionYear' | 'providerIds' | 'runtimeMinutes'>;

/**
 * Provider ids are keyed case-insensitively ("Imdb", "imdb" and "IMDB" are the same key).
 * Blank values are skipped, so a later spelling of the key can still supply the id.
 */
export const getProviderId = (
  providerIds: Record<string, string> | undefined,
  provider: string,
): string | undefined => {
  if (!providerIds) {
    return undefined;
  }

  const wanted = provider.toLowerCase();
  for (const [key, value] of Object.entries(providerIds)) {
    if (key.toLowerCase() === wanted && value.trim() !== '') {
      return value;
    }
  }

  return undefined;
};

const isPresent = (value: number | null | undefined): value is number =>
  typeof value === 'number' && Number.isFinite(value);

const providerMatches = (a: SimilarityInput, b: SimilarityInput, provider: string): boolean => {
  const first = getProviderId(a.providerIds, provider)?.trim();
  const second = getProviderId(b.providerIds, provider)?.trim();

  if (!first || !second) {
    return false;
  }

  return first.toLowerCase() === second.toLowerCase();
};

export const scoreBreakdown = (a: SimilarityInput, b: SimilarityInput): SimilarityBreakdown => {
  const breakdown: SimilarityBreakdown = { title: 0, year: 0, imdb: 0, tmdb: 0, runtime: 0, total: 0 };

  if (normalizeTitle(a.name) === normalizeTitle(b.name)) {
    breakdown.title = SIMILARITY_WEIGHTS.title;
  }

  if (isPresent(a.productionYear) && isPresent(b.productionYear)) {
    const yearDiff = Math.abs(a.productionYear - b.productionYear);
    if (yearDiff === 0) {
      breakdown.year = SIMILARITY_WEIGHTS.exactYear;
    } else if (yearDiff === 1) {
      breakdown.year = SIMILARITY_WEIGHTS.adjacentYear;
    }
  }

  if (providerMatches(a, b, 'Imdb')) {
    breakdown.imdb = SIMILARITY_WEIGHTS.imdb;
  }

  if (providerMatches(a, b, 'Tmdb')) {
    breakdown.tmdb = SIMILARITY_WEIGHTS.tmdb;
  }

  if (isPresent(a.runtimeMinutes) && isPresent(b.runtimeMinutes)) {
    if (Math.abs(a.runtimeMinutes - b.runtimeMinutes) <= RUNTIME_TOLERANCE_MINUTES) {
      breakdown.runtime = SIMILARITY_WEIGHTS.runtime;
    }
  }

  breakdown.total = breakdown.title + breakdown.year + breakdown.imdb + breakdown.tmdb + breakdown.runtime;

  return breakdown;
};

/**
 * Weighted match score between two catalog items (0..140). The raw sum is
 * compared against the library's similarity threshold without rescaling.
 */
export const calculateSimilarity = (a: SimilarityInput, b: SimilarityInput): number =>
  scoreBreakdown(a, b).total;

export default calculateSimilarity;
