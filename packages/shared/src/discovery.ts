import type { CanonicalItem, IdentityStore, Notifier } from './types.js';

export type DiscoveryOutcome = 'new' | 'known' | 'error';

/** Records the item and notifies only when this call was the one that inserted it. */
export async function processCandidate(
  item: CanonicalItem,
  { store, notifier }: { store: IdentityStore; notifier: Notifier },
): Promise<DiscoveryOutcome> {
  const result = await store.insert(item);

  switch (result.status) {
    case 'inserted':
      await notifier.notify(item);
      return 'new';
    case 'already_exists':
      return 'known';
    case 'error':
      console.error(`Database error: ${result.error.message}`);
      return 'error';
  }
}
