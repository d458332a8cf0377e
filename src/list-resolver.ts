import type { TrelloList } from './types.js';

/**
 * Pick the list a user meant by `ref` among a board's lists.
 *
 * `ref` matches a list by exact id or by name, case-insensitively and ignoring
 * surrounding whitespace. Lists are scanned in the order given, so when several
 * share a name the first one wins. Returns undefined when nothing matches.
 */
export function resolveList(lists: readonly TrelloList[], ref: string): TrelloList | undefined {
  const trimmed = ref.trim();
  const normalized = trimmed.toLowerCase();
  return lists.find(
    list => list.id === trimmed || (list.name ?? '').trim().toLowerCase() === normalized
  );
}
