#!/usr/bin/env node
import { Command } from 'commander';
import { env } from '../config/env';
import { DatasetRepository } from '../lib/dataset';
import { CategoryEnricher } from '../modules/listings';
import { parseProgram, runCommand } from './runner';

const program = new Command();

program
  .name('categorize')
  .description('Fill in project categories, cross-listings and skills in projects.json')
  .option('-d, --data-dir <dir>', 'directory holding projects.json', env.DATA_DIR)
  .action(async (opts: { dataDir: string }) => {
    await runCommand('categorize', async () => {
      await new CategoryEnricher(new DatasetRepository(opts.dataDir)).run();
    });
  });

parseProgram(program);
