/**
 * Maps Canvas term labels ("Spring 2025 Semester", "SPR 2025") to local terms.
 */

import type { GradebookStore } from '@/lib/gradebook/types';
import type { Season } from './types';

export type { Season } from './types';

export const IMPORTED_SCHOOL_NAME = 'Canvas Import';

const YEAR_PATTERN = /(19|20)\d{2}/;

/**
 * Checked in order: "spring" wins over "winter" in "Spring/Winter".
 */
const SEASON_KEYWORDS: ReadonlyArray<[Season, readonly string[]]> = [
  ['Spring', ['spring', 'spr']],
  ['Summer', ['summer', 'sum']],
  ['Fall', ['fall', 'autumn', 'fal']],
  ['Winter', ['winter', 'win']],
];

export interface ParsedTerm {
  season: Season;
  year: number;
}

/**
 * Extract season and year from a free-text term label.
 *
 * Missing years default to the current year, unrecognised seasons to Fall.
 *
 * @example parseTermLabel('Spring 2025 Semester') // { season: 'Spring', year: 2025 }
 */
export function parseTermLabel(
  label: string | null | undefined,
  now: Date = new Date()
): ParsedTerm {
  const fallback: ParsedTerm = { season: 'Fall', year: now.getFullYear() };
  if (!label?.trim()) {
    return fallback;
  }

  const yearMatch = YEAR_PATTERN.exec(label);
  const year = yearMatch ? Number(yearMatch[0]) : fallback.year;

  const lower = label.toLowerCase();
  for (const [season, keywords] of SEASON_KEYWORDS) {
    if (keywords.some((keyword) => lower.includes(keyword))) {
      return { season, year };
    }
  }

  return { season: 'Fall', year };
}

/**
 * Find the owner's term for (season, year), creating it when absent.
 *
 * A created term becomes the owner's only active term; the insert and the
 * deactivation of its siblings share one transaction.
 *
 * @returns The local term id
 */
export async function resolveOrCreateTerm(
  store: GradebookStore,
  ownerId: string,
  season: Season,
  year: number
): Promise<string> {
  const existing = await store.findTerm(ownerId, season, year);
  if (existing) {
    return existing.id;
  }

  return store.transaction(async (tx) => {
    const term = await tx.createTerm({
      ownerId,
      nickname: `${season} ${year}`,
      season,
      year,
      schoolName: IMPORTED_SCHOOL_NAME,
      active: true,
    });
    await tx.deactivateOtherTerms(ownerId, term.id);

    console.log(`[CanvasSync] Created term ${term.nickname} for ${ownerId}`);
    return term.id;
  });
}

/**
 * Memoises term lookups for the duration of one sync pass.
 */
export class TermResolver {
  private readonly cache = new Map<string, Promise<string>>();

  constructor(
    private readonly store: GradebookStore,
    private readonly ownerId: string
  ) {}

  /**
   * Resolve a Canvas term label to a local term id.
   */
  async resolve(label: string | null | undefined): Promise<string> {
    const { season, year } = parseTermLabel(label);
    const key = `${season}:${year}`;

    let pending = this.cache.get(key);
    if (!pending) {
      pending = resolveOrCreateTerm(this.store, this.ownerId, season, year);
      this.cache.set(key, pending);
      // A failed lookup is retried on the next call
      pending.catch(() => this.cache.delete(key));
    }
    return pending;
  }
}
