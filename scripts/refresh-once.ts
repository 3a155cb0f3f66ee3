/**
 * NewsPulse — Single Refresh Script
 *
 * Runs one refresh cycle against the configured sources and prints the
 * report plus the newest items. Useful for checking a new feed list.
 *
 * Usage:
 *   npm run refresh                          # Default sources
 *   npm run refresh -- --sources feeds.json  # Sources from a file
 *   npm run refresh -- --limit 20            # Items to print
 *   npm run refresh -- --json                # Machine-readable output
 */

import 'dotenv/config';
import { loadConfig } from '../src/config';
import { createNewsPulse } from '../src/app';
import { serializeItem } from '../src/feeds';
import { errorMessage, logger, setLogLevel } from '../src/lib/logger';

interface RefreshOptions {
  sourcesFile?: string;
  limit: number;
  json: boolean;
}

function parseArgs(defaultLimit: number): RefreshOptions {
  const args = process.argv.slice(2);
  const options: RefreshOptions = { limit: Math.min(defaultLimit, 10), json: false };

  for (let i = 0; i < args.length; i++) {
    if (args[i] === '--sources' && args[i + 1]) {
      options.sourcesFile = args[++i];
    } else if (args[i] === '--limit' && args[i + 1]) {
      const limit = parseInt(args[++i], 10);
      if (Number.isNaN(limit) || limit < 1) {
        throw new Error(`--limit must be a positive integer, got ${args[i]}`);
      }
      options.limit = limit;
    } else if (args[i] === '--json') {
      options.json = true;
    }
  }

  return options;
}

async function main(): Promise<void> {
  const config = loadConfig();
  setLogLevel(config.logLevel);

  const options = parseArgs(config.defaultQueryLimit);
  const pulse = await createNewsPulse({
    ...config,
    sourcesFile: options.sourcesFile ?? config.sourcesFile,
  });

  const report = await pulse.aggregator.refresh();
  const items = pulse.query.latest(options.limit);

  if (options.json) {
    console.log(JSON.stringify({ report, items: items.map(serializeItem) }, null, 2));
    return;
  }

  console.log(`\nRefresh finished in ${report.durationMs}ms`);
  console.log(
    `  fetched ${report.fetched}, inserted ${report.inserted}, updated ${report.updated}, evicted ${report.evicted}, stored ${report.storeSize}`
  );

  for (const source of report.sources) {
    const status = source.ok ? `${source.items} items` : `FAILED: ${source.error}`;
    console.log(`  ${source.source.padEnd(24)} ${status} (${source.durationMs}ms)`);
  }

  console.log(`\nNewest ${items.length}:`);
  for (const item of items) {
    console.log(`  ${item.published.toISOString()}  [${item.source}] ${item.title}`);
  }
}

main().catch((error: unknown) => {
  logger.error('Refresh failed', { error: errorMessage(error) });
  process.exit(1);
});
