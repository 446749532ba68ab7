#!/usr/bin/env node
import { Command } from 'commander';
import { env } from '../config/env';
import { ListingCrawler } from '../modules/listings';
import { parseLimit, parseListingRange } from './args';
import { PROGRESS_FILES, createDependencies, parseProgram, reportSummary, runCommand } from './runner';

const program = new Command();

program
  .name('scrape-listings')
  .description('Scrape project listings from the abstracts site into projects.json')
  .argument('[start_id]', `first project id (default ${env.LISTING_START_ID})`)
  .argument('[end_id]', `last project id, inclusive (default ${env.LISTING_END_ID})`)
  .option('-l, --limit <n>', 'stop after this many projects')
  .option('-f, --force', 'revisit projects already marked done', false)
  .action(async (start: string | undefined, end: string | undefined, opts: { limit?: string; force: boolean }) => {
    await runCommand('scrape-listings', async () => {
      const range = parseListingRange(start, end, { startId: env.LISTING_START_ID, endId: env.LISTING_END_ID });
      const limit = parseLimit(opts.limit);

      const crawler = new ListingCrawler(createDependencies(PROGRESS_FILES.listings));
      const summary = await crawler.run({ ...range, limit, force: opts.force });
      reportSummary('scrape-listings', summary);
    });
  });

parseProgram(program);
