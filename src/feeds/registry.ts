/**
 * NewsPulse — Source Registry
 *
 * Maps source names to feed endpoints. The default registry carries the
 * security-news outlets the aggregator was built around; a JSON file can
 * replace it at startup.
 */

import { readFile } from 'fs/promises';
import { FeedSourceListSchema, type FeedSourceConfig } from '../types';
import { ConfigError } from '../lib/errors';
import { logger } from '../lib/logger';

export const DEFAULT_SOURCES: readonly FeedSourceConfig[] = [
  { name: 'The Hacker News', url: 'https://thehackernews.com/rss' },
  { name: 'KrebsOnSecurity', url: 'https://krebsonsecurity.com/feed/' },
  { name: 'BleepingComputer', url: 'https://www.bleepingcomputer.com/feed/' },
  { name: 'Dark Reading', url: 'https://www.darkreading.com/rss.xml' },
  { name: 'SecurityWeek', url: 'https://feeds.securityweek.com/rss_securityweek' },
  { name: 'CSO Online', url: 'https://www.csoonline.com/index.rss' },
  { name: 'SC Media', url: 'https://prod.scmagazine.com/feed' },
  { name: 'Threatpost', url: 'https://threatpost.com/feed/' },
  { name: 'CyberScoop', url: 'https://www.cyberscoop.com/feed/' },
  { name: 'WeLiveSecurity', url: 'https://www.welivesecurity.com/feed/' },
  { name: 'SecurityOnline.info', url: 'https://securityonline.info/feed/' },
];

/**
 * Registry of feed sources, keyed by name. Insertion order is kept.
 */
export class SourceRegistry {
  private readonly sources = new Map<string, FeedSourceConfig>();

  constructor(initial: Iterable<FeedSourceConfig> = []) {
    for (const source of initial) {
      this.register(source);
    }
  }

  /**
   * Register a source. A later registration under the same name wins.
   */
  register(source: FeedSourceConfig): void {
    if (this.sources.has(source.name)) {
      logger.warn('Source re-registered, replacing endpoint', {
        name: source.name,
        url: source.url,
      });
    }
    this.sources.set(source.name, Object.freeze({ ...source }));
    logger.debug('Source registered', { name: source.name, url: source.url });
  }

  get(name: string): FeedSourceConfig | undefined {
    return this.sources.get(name);
  }

  list(): FeedSourceConfig[] {
    return Array.from(this.sources.values());
  }

  get size(): number {
    return this.sources.size;
  }
}

/**
 * Read a JSON array of `{ name, url }` entries.
 */
export async function loadSourcesFile(path: string): Promise<FeedSourceConfig[]> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigError(`Cannot read sources file ${path}`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (error) {
    throw new ConfigError(`Sources file ${path} is not valid JSON`, [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  const parsed = FeedSourceListSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(
      `Sources file ${path} is invalid`,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}

/**
 * Build the registry from a sources file when given, the defaults otherwise.
 */
export async function createSourceRegistry(sourcesFile?: string): Promise<SourceRegistry> {
  const sources = sourcesFile ? await loadSourcesFile(sourcesFile) : DEFAULT_SOURCES;
  const registry = new SourceRegistry(sources);

  logger.info('Source registry ready', {
    sources: registry.size,
    from: sourcesFile ?? 'defaults',
  });

  return registry;
}
