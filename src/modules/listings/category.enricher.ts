/**
 * Category Enricher
 * Sets a listing's primary category from the prefix of its booth id
 * (e.g. EBED001T -> EBED -> Embedded Systems), or from its legacy category
 * name, then adds keyword cross-listings and project skills
 */

import boothCategories from '../../config/booth-categories.json';
import categoryKeywords from '../../config/category-keywords.json';
import legacyCategories from '../../config/legacy-categories.json';
import { mergeDataset } from '../../lib/dataset/dataset.merger';
import { DatasetRepository } from '../../lib/dataset/dataset.repository';
import { Dataset, IncomingItem, ListingRecord } from '../../lib/dataset/dataset.types';
import { extractProjectSkills } from './project-skills';

export const BOOTH_CATEGORIES: Readonly<Record<string, string>> = boothCategories;
export const LEGACY_CATEGORY_NAMES: Readonly<Record<string, string>> = legacyCategories;
export const CATEGORY_KEYWORDS: Readonly<Record<string, readonly string[]>> = categoryKeywords.keywords;
/** One of these is enough for a cross-listing; otherwise two keywords must match */
export const STRONG_CATEGORY_KEYWORDS: Readonly<Record<string, readonly string[]>> = categoryKeywords.strongKeywords;

const FALLBACK_CATEGORY = 'Other';

export interface CategorizeSummary {
  total: number;
  /** Category set or changed from the booth prefix */
  categorized: number;
  /** Legacy category name replaced by the current one */
  renamed: number;
  unchanged: number;
  unknownPrefix: number;
  missingBooth: number;
  crossListed: number;
  /** Listings written back */
  updated: number;
}

export function extractBoothPrefix(booth: string | null | undefined): string | null {
  const match = booth ? /^[A-Za-z]+/.exec(booth.trim()) : null;
  return match ? match[0].toUpperCase() : null;
}

export function categoryForBooth(booth: string | null | undefined): string | null {
  const prefix = extractBoothPrefix(booth);
  return prefix !== null ? BOOTH_CATEGORIES[prefix] ?? null : null;
}

export function normalizeCategoryName(category: string | null | undefined): string | null {
  if (!category) {
    return null;
  }
  return LEGACY_CATEGORY_NAMES[category] ?? category;
}

/**
 * Categories other than `primary` whose keywords appear in the title or
 * abstract, sorted by name
 */
export function findCrossListings(listing: Pick<ListingRecord, 'title' | 'abstract'>, primary: string | null): string[] {
  const text = `${listing.title} ${listing.abstract ?? ''}`.toLowerCase();
  const crossListings: string[] = [];

  for (const [category, keywords] of Object.entries(CATEGORY_KEYWORDS)) {
    if (category === primary) continue;

    const matches = keywords.filter((keyword) => text.includes(keyword)).length;
    const strong = STRONG_CATEGORY_KEYWORDS[category] ?? [];
    if (matches >= 2 || (matches === 1 && strong.some((keyword) => text.includes(keyword)))) {
      crossListings.push(category);
    }
  }

  return crossListings.sort();
}

function sameValues(next: readonly string[], stored: readonly string[] | undefined): boolean {
  const current = stored ?? [];
  return next.length === current.length && next.every((value, index) => value === current[index]);
}

/**
 * Produce the category updates for every listing. Listings are only changed
 * through the merger, which owns enrichment rules.
 */
export function categorize(dataset: Dataset): { dataset: Dataset; summary: CategorizeSummary } {
  const summary: CategorizeSummary = {
    total: 0,
    categorized: 0,
    renamed: 0,
    unchanged: 0,
    unknownPrefix: 0,
    missingBooth: 0,
    crossListed: 0,
    updated: 0,
  };
  const updates: IncomingItem[] = [];

  for (const listing of dataset.listings.values()) {
    summary.total++;

    const boothCategory = categoryForBooth(listing.booth);
    if (!listing.booth) {
      summary.missingBooth++;
    } else if (boothCategory === null) {
      summary.unknownPrefix++;
    }

    const category = boothCategory ?? normalizeCategoryName(listing.category);
    if (category !== listing.category) {
      if (boothCategory !== null) {
        summary.categorized++;
      } else {
        summary.renamed++;
      }
    } else if (boothCategory !== null) {
      summary.unchanged++;
    }

    const categories = [category ?? FALLBACK_CATEGORY, ...findCrossListings(listing, category)];
    if (categories.length > 1) {
      summary.crossListed++;
    }
    const skills = extractProjectSkills(listing.title, listing.abstract, category);

    if (
      category !== listing.category ||
      !sameValues(categories, listing.categories) ||
      !sameValues(skills, listing.skills)
    ) {
      summary.updated++;
      updates.push({ kind: 'listing', record: { ...listing, category, categories, skills } });
    }
  }

  return { dataset: mergeDataset(dataset, updates), summary };
}

export class CategoryEnricher {
  constructor(private readonly repository: DatasetRepository) {}

  async run(): Promise<CategorizeSummary> {
    const stored = await this.repository.load();
    const { dataset, summary } = categorize(stored);

    if (summary.updated > 0) {
      await this.repository.saveListings(dataset);
    }

    console.log(
      `[CategoryEnricher] ${summary.categorized} categorized, ${summary.renamed} renamed, ` +
        `${summary.unchanged} unchanged, ${summary.unknownPrefix} unknown prefixes, ` +
        `${summary.missingBooth} without booth, ${summary.crossListed} cross-listed`
    );
    return summary;
  }
}
