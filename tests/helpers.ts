/**
 * Shared builders for feed tests.
 */

import { createItem } from '../src/feeds/normalizer';
import type { Item } from '../src/types';

export function makeItem(
  identity: string,
  published: string,
  overrides: Partial<Omit<Item, 'identity' | 'published'>> = {}
): Item {
  return createItem({
    identity,
    source: overrides.source ?? 'Test Feed',
    title: overrides.title ?? `Title ${identity}`,
    link: overrides.link ?? `https://example.com/${identity}`,
    summary: overrides.summary ?? '',
    published: new Date(published),
  });
}

export function rssDocument(items: string[], title = 'Test Feed'): string {
  return `<?xml version="1.0" encoding="UTF-8"?>
<rss version="2.0">
<channel>
<title>${title}</title>
<link>https://example.com/</link>
<description>Fixture feed</description>
${items.join('\n')}
</channel>
</rss>`;
}

export function rssItem(fields: {
  title?: string;
  link?: string;
  guid?: string;
  pubDate?: string;
  description?: string;
}): string {
  const parts = [
    fields.title !== undefined ? `<title>${fields.title}</title>` : '',
    fields.link !== undefined ? `<link>${fields.link}</link>` : '',
    fields.guid !== undefined ? `<guid>${fields.guid}</guid>` : '',
    fields.pubDate !== undefined ? `<pubDate>${fields.pubDate}</pubDate>` : '',
    fields.description !== undefined ? `<description>${fields.description}</description>` : '',
  ];
  return `<item>${parts.join('')}</item>`;
}

export function atomDocument(entries: string[], title = 'Test Feed'): string {
  return `<?xml version="1.0" encoding="utf-8"?>
<feed xmlns="http://www.w3.org/2005/Atom">
<title>${title}</title>
<id>urn:uuid:test-feed</id>
<updated>2025-05-01T00:00:00Z</updated>
${entries.join('\n')}
</feed>`;
}

export function atomEntry(fields: {
  id: string;
  title?: string;
  link?: string;
  published?: string;
  updated?: string;
}): string {
  const parts = [
    `<id>${fields.id}</id>`,
    fields.title !== undefined ? `<title>${fields.title}</title>` : '',
    fields.link !== undefined ? `<link href="${fields.link}"/>` : '',
    fields.published !== undefined ? `<published>${fields.published}</published>` : '',
    fields.updated !== undefined ? `<updated>${fields.updated}</updated>` : '',
  ];
  return `<entry>${parts.join('')}</entry>`;
}

export function xmlResponse(body: string, status = 200): Response {
  return new Response(body, {
    status,
    headers: { 'Content-Type': 'application/rss+xml' },
  });
}
