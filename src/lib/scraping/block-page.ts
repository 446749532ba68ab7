/**
 * Block Page Detection
 * Decides whether a 200 response is a challenge screen rather than content
 */

import type { CheerioAPI } from 'cheerio';
import { detectBlocking } from './errors';

const CHALLENGE_SELECTORS = [
  '.g-recaptcha',
  '.h-captcha',
  '#challenge-form',
  '#cf-challenge-running',
  'iframe[src*="captcha"]',
].join(', ');

export interface BlockPageOptions {
  /** Selector of the element a real page always has */
  contentSelector: string;
  /** Also match the `<title>` when the content is present */
  checkTitle?: boolean;
}

/**
 * Returns a block description or null. Text inside the content element is
 * never inspected.
 */
export function detectBlockPage($: CheerioAPI, options: BlockPageOptions): string | null {
  if ($(CHALLENGE_SELECTORS).length > 0) {
    return 'Challenge form on page';
  }

  const title = $('title').first().text();
  if ($(options.contentSelector).length > 0) {
    return options.checkTitle ? detectBlocking(title) : null;
  }

  return detectBlocking(`${title} ${$('body').text()}`);
}
