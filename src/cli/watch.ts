#!/usr/bin/env node

import { Command } from 'commander';
import pg from 'pg';
import { getConfig } from '../config/index.js';
import {
  createNotifier,
  createRecordStore,
  createRunCoordinator,
  normalizeCandidate,
  renderImageCard,
  RunSummary,
} from '../enforcement/index.js';
import { createTransport } from '../publishing/index.js';
import { createIcoScraper } from '../sources/index.js';
import { Config, errorMessage } from '../types/index.js';
import { createChildLogger } from '../utils/logger.js';

const { Pool } = pg;
const logger = createChildLogger('watch-cli');

const program = new Command();

function scraperFor(config: Config, listUrl: string = config.source.listUrl) {
  return createIcoScraper(listUrl, {
    timeout: config.source.timeoutMs,
    retries: config.source.retries,
    retryDelay: config.source.retryDelayMs,
    userAgent: config.source.userAgent,
  });
}

function printSummary(summary: RunSummary): void {
  console.log('━'.repeat(60));
  console.log(`Run ${summary.runId}: ${summary.state}${summary.dryRun ? ' (dry run)' : ''}`);
  if (summary.error) {
    console.log(`  ❌ ${summary.error.kind} during ${summary.failedDuring}: ${summary.error.message}`);
  }
  console.log(`  Entries fetched: ${summary.fetched}`);
  console.log(`  Rejected: ${summary.rejected.length}`);
  console.log(`  New: ${summary.newKeys.length}`);
  console.log(`  Duplicates in listing: ${summary.duplicates}`);
  console.log(`  Stored: ${summary.stored} (${summary.inserted} inserted, ${summary.refreshed} refreshed)`);
  console.log(`  Announced: ${summary.sent}`);
  if (summary.skipped > 0) {
    console.log(`  Stored without announcing: ${summary.skipped}`);
  }
  if (summary.failed > 0) {
    console.log(`  ⚠️  Delivery gaps: ${summary.failed} stored but not announced (will not be retried)`);
  }
  console.log(`  Duration: ${summary.completedAt.getTime() - summary.startedAt.getTime()}ms`);
  console.log('━'.repeat(60));

  for (const { index, error } of summary.rejected) {
    console.log(`  ⏭️  entry #${index}: ${error.message}`);
  }
}

program
  .name('enforcement-watch')
  .description('Announce new regulator enforcement actions')
  .version('1.0.0');

/**
 * One pass of the pipeline
 */
program
  .command('run', { isDefault: true })
  .description('Fetch the enforcement list, store it and announce new entries')
  .option('--dry-run', 'Report what is new without storing or announcing', false)
  .option('--seed', 'Store the current listing without announcing it', false)
  .action(async (options: { dryRun: boolean; seed: boolean }) => {
    const config = getConfig();
    const pool = new Pool(config.postgres);

    try {
      const coordinator = createRunCoordinator({
        source: scraperFor(config),
        store: createRecordStore(pool),
        notifier: createNotifier(
          createTransport(config.publisher),
          config.publisher.imageCards ? renderImageCard : undefined
        ),
      });

      const summary = await coordinator.runOnce({
        dryRun: options.dryRun,
        announce: !options.seed,
      });
      printSummary(summary);

      if (summary.state === 'FAILED') {
        process.exitCode = 1;
      }
    } catch (error) {
      logger.error({ error }, 'Run aborted');
      console.error('Error:', errorMessage(error));
      process.exitCode = 1;
    } finally {
      await pool.end();
    }
  });

/**
 * Test scraping (without saving)
 */
program
  .command('test-scrape [url]')
  .description('Show what the scraper extracts from the list page (does not save or post)')
  .action(async (url: string | undefined) => {
    const config = getConfig();
    const listUrl = url ?? config.source.listUrl;

    try {
      console.log(`\n🔍 Test scraping ${listUrl}...\n`);
      const raws = await scraperFor(config, listUrl).fetchCandidates();

      console.log(`✓ ${raws.length} entries found`);
      console.log('━'.repeat(60));

      for (const raw of raws) {
        const result = normalizeCandidate(raw, 'test-scrape');
        if (result.ok) {
          const { fields } = result.record;
          console.log(`\n${fields.organization}`);
          console.log(`   Date: ${fields.date}`);
          console.log(`   Type: ${fields.actionType}`);
          if (fields.penaltyAmount !== undefined) {
            console.log(`   Penalty: £${fields.penaltyAmount.toLocaleString('en-GB')}`);
          }
          console.log(`   URL: ${fields.url}`);
          console.log(`   Key: ${result.record.identityKey.substring(0, 16)}...`);
        } else {
          console.log(`\n❌ ${String(raw.url ?? 'unknown url')}`);
          console.log(`   ${result.error.message}`);
        }
      }

      console.log('\n' + '━'.repeat(60));
    } catch (error) {
      console.error('Error:', errorMessage(error));
      process.exitCode = 1;
    }
  });

program.parseAsync().catch((error: unknown) => {
  console.error('Error:', errorMessage(error));
  process.exit(1);
});
