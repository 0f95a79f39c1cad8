#!/usr/bin/env tsx

/**
 * One-off crawl runner
 * Loads environment variables, crawls the listing and merges new articles into the data file
 *
 *   MAX_PAGES=3 npm run crawl
 */

// Load environment variables from .env.local or .env
import dotenv from 'dotenv';
import path from 'path';

const projectRoot = path.resolve(__dirname, '..');

dotenv.config({ path: path.join(projectRoot, '.env.local') });
dotenv.config({ path: path.join(projectRoot, '.env') });

import { OST_51CTO_SOURCE } from '../src/adapters/ost-51cto';
import { loadEnvironmentConfig } from '../src/config/environment';
import { ArticleStore } from '../src/crawler/article-store';
import { runCrawl } from '../src/crawler/run-crawl';
import { createJsdomSession } from '../src/session/jsdom-session';
import { logger } from '../src/utils/logger';

async function main(): Promise<number> {
  const config = loadEnvironmentConfig();
  logger.setLevel(config.logging.level);

  const store = new ArticleStore(path.resolve(projectRoot, config.storage.dataFile));
  const controller = new AbortController();

  // First Ctrl+C stops gracefully (the partial batch is saved), the second one exits
  process.once('SIGINT', () => {
    console.log('\n⚠️  Interrupted, saving progress...');
    controller.abort();
    process.once('SIGINT', () => process.exit(130));
  });

  console.log(`🚀 Starting crawl of ${OST_51CTO_SOURCE.name} (${OST_51CTO_SOURCE.listUrl})\n`);
  console.log('═'.repeat(80));

  const result = await runCrawl({
    settings: config,
    source: OST_51CTO_SOURCE,
    openSession: createJsdomSession({ userAgent: config.session.userAgent }),
    store,
    signal: controller.signal
  });

  console.log('\n' + '═'.repeat(80));
  console.log('📊 Final Results:');
  console.log(`   • Stop reason: ${result.stopReason}`);
  console.log(`   • Pages visited: ${result.pagesVisited}`);
  console.log(`   • New articles: ${result.articles.length}`);
  console.log(`   • Skipped articles: ${result.skipped.length}`);
  console.log(`   • Data file: ${store.filePath}`);

  if (result.skipped.length > 0) {
    console.log('\n⏭️  Skipped:');
    for (const failure of result.skipped) {
      console.log(`   • [${failure.kind}] ${failure.title} (${failure.url})`);
    }
  }

  if (result.error) {
    console.error('\n💥 CRAWL FAILED');
    console.error('Error:', result.error);
    return 1;
  }
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('\n💥 CRAWL FAILED');
    console.error('═'.repeat(80));
    console.error('Error:', error);
    process.exitCode = 1;
  });
