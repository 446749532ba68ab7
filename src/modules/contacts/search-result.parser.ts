/**
 * Search Engine Result Parser
 * Emails and profile links from a search result page
 */

import * as cheerio from 'cheerio';
import type { ContactCandidate } from '../../lib/dataset/dataset.types';
import { extractEmails, isAcceptableEmail, normalizeEmail } from '../../lib/extraction/email.utils';
import type { ContactTarget, SearchParseResult, SearchResultParser } from '../../lib/extraction/extraction.types';
import { blockedPage, detectBlockPage } from '../../lib/scraping';

const PROFILE_MARKER = 'linkedin.com/in/';
const RESULTS_SELECTOR = '#links, .results';

/**
 * Result links may point at the engine's redirect (`/l/?uddg=<target>`);
 * return the target in that case
 */
export function decodeResultLink(href: string): string {
  try {
    const url = new URL(href, 'https://duckduckgo.com');
    return url.searchParams.get('uddg') ?? url.toString();
  } catch {
    return href;
  }
}

export function extractProfileLinks(body: string): string[] {
  const $ = cheerio.load(body);
  const links: string[] = [];

  $('a[href]').each((_, anchor) => {
    const href = $(anchor).attr('href');
    if (!href) return;
    const target = decodeResultLink(href);
    if (target.includes(PROFILE_MARKER) && !links.includes(target)) {
      links.push(target);
    }
  });

  return links;
}

export class SearchEngineResultParser implements SearchResultParser {
  name = 'search-engine';

  parse(body: string, target: ContactTarget): SearchParseResult {
    const $ = cheerio.load(body);
    const blockReason = detectBlockPage($, { contentSelector: RESULTS_SELECTOR, checkTitle: true });
    if (blockReason !== null) {
      return { ok: false, error: blockedPage(blockReason) };
    }

    const text = $.root().text();
    const seen = new Set<string>();
    const candidates: ContactCandidate[] = [];

    for (const email of [...extractEmails(body), ...extractEmails(text)]) {
      const key = normalizeEmail(email);
      if (seen.has(key) || !isAcceptableEmail(email)) continue;
      seen.add(key);
      candidates.push({ ownerId: target.ownerId, name: target.name, email, sourceQuery: target.query });
    }

    // one email-less entry records the attempt itself
    const attempt: ContactCandidate = { ownerId: target.ownerId, name: target.name, sourceQuery: target.query };
    const [profile] = extractProfileLinks(body);
    if (profile !== undefined) {
      attempt.linkedinUrl = profile;
    }
    candidates.push(attempt);

    return { ok: true, candidates };
  }
}
