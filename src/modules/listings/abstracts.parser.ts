/**
 * Abstracts Page Parser
 * Reads one project page of the public abstracts site
 */

import * as cheerio from 'cheerio';
import { env } from '../../config/env';
import { detectBlockPage } from '../../lib/scraping/block-page';
import { ScrapingErrorType, blockedPage, missingField } from '../../lib/scraping/errors';
import type { ListingRecord } from '../../lib/dataset/dataset.types';
import type { ListingPageParser, ListingParseResult } from '../../lib/extraction/extraction.types';

const CONTAINER_SELECTOR = 'div.container';
const MIN_ABSTRACT_LENGTH = 100;
const MIN_FALLBACK_TITLE_LENGTH = 10;
const MAX_AWARDS_TEXT_LENGTH = 500;

type LabelledField = 'awards' | 'studentName' | 'category' | 'year' | 'booth' | 'country';

/**
 * Map a `<strong>` label to the field it introduces. Order matters:
 * "Awards Won" is checked before the shorter labels.
 */
function fieldForLabel(label: string): LabelledField | null {
  if (label.includes('award')) return 'awards';
  if (label.includes('finalist') || label.includes('student')) return 'studentName';
  if (label.includes('category')) return 'category';
  if (label.includes('year')) return 'year';
  if (label.includes('booth')) return 'booth';
  if (label.includes('country') || label.includes('location')) return 'country';
  return null;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

function nonEmpty(text: string): string | null {
  return text.length > 0 ? text : null;
}

export function splitAwards(text: string): string[] {
  if (text.length === 0 || text.length >= MAX_AWARDS_TEXT_LENGTH) {
    return [];
  }
  return text
    .split(';')
    .map((award) => award.trim())
    .filter((award) => award.length > 0);
}

export class AbstractsPageParser implements ListingPageParser {
  name = 'abstracts';
  private readonly competitionName: string;

  constructor(competitionName: string = env.COMPETITION_NAME) {
    this.competitionName = competitionName;
  }

  parse(body: string, id: number, sourceUrl: string): ListingParseResult {
    const $ = cheerio.load(body);
    const blockReason = detectBlockPage($, { contentSelector: CONTAINER_SELECTOR });
    if (blockReason !== null) {
      return { ok: false, error: blockedPage(blockReason) };
    }

    const content = $(CONTAINER_SELECTOR).first();
    if (content.length === 0 || content.text().includes('Project not found')) {
      return { ok: false, error: { type: ScrapingErrorType.NO_LISTING, message: `No project with id ${id}` } };
    }

    const title = this.extractTitle($);
    if (!title) {
      return { ok: false, error: missingField('title') };
    }

    const fields = this.extractLabelledFields($);

    const record: ListingRecord = {
      id,
      year: nonEmpty(fields.year ?? ''),
      title,
      category: nonEmpty(fields.category ?? ''),
      awards: splitAwards(fields.awards ?? ''),
      abstractUrl: sourceUrl,
      booth: nonEmpty(fields.booth ?? ''),
      country: nonEmpty(fields.country ?? ''),
      studentName: nonEmpty(fields.studentName ?? ''),
      abstract: this.extractAbstract($),
    };

    return { ok: true, record };
  }

  private extractTitle($: cheerio.CheerioAPI): string | null {
    const content = $(CONTAINER_SELECTOR).first();
    const h2 = collapse(content.find('h2').first().text());
    if (h2) {
      return h2;
    }

    // site banners carry the competition name
    const banner = this.competitionName.toLowerCase();
    let fallback: string | null = null;
    content.find('h1, h2, h3').each((_, heading) => {
      const text = collapse($(heading).text());
      if (text.length > MIN_FALLBACK_TITLE_LENGTH && !(banner && text.toLowerCase().includes(banner))) {
        fallback = text;
        return false;
      }
      return undefined;
    });
    return fallback;
  }

  /**
   * `<strong>Label:</strong> value` pairs. The value is whatever follows the
   * label in its parent, up to the end of that line.
   */
  private extractLabelledFields($: cheerio.CheerioAPI): Partial<Record<LabelledField, string>> {
    const content = $(CONTAINER_SELECTOR).first();
    const fields: Partial<Record<LabelledField, string>> = {};

    content.find('strong').each((_, label) => {
      const labelText = $(label).text();
      const field = fieldForLabel(labelText.toLowerCase());
      if (field === null || fields[field] !== undefined) {
        return;
      }

      const parentText = $(label).parent().text();
      const start = parentText.indexOf(labelText);
      const rest = start >= 0 ? parentText.slice(start + labelText.length) : '';
      const value = rest.replace(/^\s*:/, '').split('\n')[0].trim();

      fields[field] = collapse(value);
    });

    return fields;
  }

  private extractAbstract($: cheerio.CheerioAPI): string | null {
    const content = $(CONTAINER_SELECTOR).first();
    let abstract: string | null = null;
    content.find('p').each((_, paragraph) => {
      if ($(paragraph).find('strong').length > 0) {
        return undefined;
      }
      const text = collapse($(paragraph).text());
      if (text.length >= MIN_ABSTRACT_LENGTH) {
        abstract = text;
        return false;
      }
      return undefined;
    });
    return abstract;
  }
}
