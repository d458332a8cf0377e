import { InvalidArgumentError } from '../errors.js';
import { MAX_ACTIONS_LIMIT, type TrelloClient } from '../trello-client.js';
import type { TrelloCard } from '../types.js';

export const DEFAULT_ACTIONS_LIMIT = 100;

/**
 * Load a card with everything the markdown view needs.
 */
export async function fetchCard(
  client: TrelloClient,
  cardId: string,
  actionsLimit: number = DEFAULT_ACTIONS_LIMIT
): Promise<TrelloCard> {
  if (!Number.isInteger(actionsLimit) || actionsLimit < 1 || actionsLimit > MAX_ACTIONS_LIMIT) {
    throw new InvalidArgumentError(
      `Actions limit must be an integer between 1 and ${MAX_ACTIONS_LIMIT}, got ${actionsLimit}.`
    );
  }
  const id = cardId.trim();
  if (!id) {
    throw new InvalidArgumentError('A card id or short link is required.');
  }
  return client.getCard(id, actionsLimit);
}
