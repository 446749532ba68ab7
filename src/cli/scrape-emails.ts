#!/usr/bin/env node
import { Command } from 'commander';
import { ContactCrawler } from '../modules/contacts';
import { parseInteger, parseLimit } from './args';
import { PROGRESS_FILES, createDependencies, parseProgram, reportSummary, runCommand } from './runner';

const program = new Command();

program
  .name('scrape-emails')
  .description('Search for contact details of award-winning finalists')
  .argument('[limit]', 'stop after this many winners (default: all)')
  .option('-y, --min-year <year>', 'only winners from this year on')
  .option('-f, --force', 'search again for winners already marked done', false)
  .action(async (limitArg: string | undefined, opts: { minYear?: string; force: boolean }) => {
    await runCommand('scrape-emails', async () => {
      const limit = parseLimit(limitArg);
      const minYear = opts.minYear === undefined ? undefined : parseInteger(opts.minYear, 'min-year');

      const crawler = new ContactCrawler(createDependencies(PROGRESS_FILES.contacts));
      const summary = await crawler.run({ limit, minYear, force: opts.force });
      reportSummary('scrape-emails', summary);
    });
  });

parseProgram(program);
