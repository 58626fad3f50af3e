import type { ChainRequest, ChainResult, StoredResult } from '@/lib/types';
import { StoredResultSchema } from '@/lib/validation';

export const STORAGE_KEY = 'prompt-chain:last-result';

export type KeyValueStore = Pick<Storage, 'getItem' | 'setItem' | 'removeItem'>;

/** Returns the saved result, dropping a stored value that no longer parses. */
export function loadStoredResult(store: KeyValueStore): StoredResult | null {
  const raw = store.getItem(STORAGE_KEY);
  if (raw === null) return null;
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    store.removeItem(STORAGE_KEY);
    return null;
  }
  const parsed = StoredResultSchema.safeParse(json);
  if (!parsed.success) {
    store.removeItem(STORAGE_KEY);
    return null;
  }
  return parsed.data;
}

export function saveStoredResult(
  store: KeyValueStore,
  request: ChainRequest,
  result: ChainResult,
  savedAt: number = Date.now(),
): StoredResult {
  const entry: StoredResult = { request, result, savedAt };
  store.setItem(STORAGE_KEY, JSON.stringify(entry));
  return entry;
}

export function clearStoredResult(store: KeyValueStore) {
  store.removeItem(STORAGE_KEY);
}
