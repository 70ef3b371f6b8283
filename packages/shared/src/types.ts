import type { StoreError } from './errors.js';

export interface Variant {
  /** Label as shown to users, e.g. a shoe size like "10.5" */
  label: string;
  /** Storage-safe form of the label */
  key: string;
  /** Action link (add-to-cart); empty when the source has none */
  link: string;
}

export interface CanonicalItem {
  id: string;
  url: string;
  title: string;
  price: string;
  imageUrl: string;
  variants: Variant[];
}

export type InsertResult =
  | { status: 'inserted' }
  | { status: 'already_exists' }
  | { status: 'error'; error: StoreError };

export interface IdentityStore {
  exists(id: string): Promise<boolean>;
  insert(item: CanonicalItem): Promise<InsertResult>;
}

export interface Notifier {
  notify(item: CanonicalItem): Promise<void>;
}

export interface CycleReport {
  /** The source could not be reached this cycle; counts towards backoff */
  fetchFailed: boolean;
}

export function emptyItem(id: string, url: string): CanonicalItem {
  return { id, url, title: '', price: '', imageUrl: '', variants: [] };
}
