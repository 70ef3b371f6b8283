import { processCandidate, type CanonicalItem, type CycleReport, type IdentityStore, type Notifier } from '@dropwatch/shared';
import type { FeedFetchResult } from './crawler.js';
import type { RawProduct } from './feed.js';

export interface CatalogCycleDeps {
  fetchFeed: () => Promise<FeedFetchResult>;
  normalize: (raw: RawProduct) => CanonicalItem;
  store: IdentityStore;
  notifier: Notifier;
}

export async function runCatalogCycle(deps: CatalogCycleDeps): Promise<CycleReport> {
  const feed = await deps.fetchFeed();
  if (feed.error) {
    console.error(`[${feed.statusCode}] API error: ${feed.error.message}`);
  }

  let newItems = 0;
  for (const raw of feed.products) {
    const item = deps.normalize(raw);
    const outcome = await processCandidate(item, deps);
    if (outcome === 'new') newItems += 1;
  }

  if (newItems > 0) {
    console.log(`[${feed.statusCode}] ${newItems} new items found`);
  } else {
    console.log(`[${feed.statusCode}] no new items found`);
  }

  return { fetchFailed: feed.error !== undefined };
}
