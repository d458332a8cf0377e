import { InvalidArgumentError, ListNotFoundError } from '../errors.js';
import { resolveList } from '../list-resolver.js';
import type { NewCardRequest, TrelloClient } from '../trello-client.js';
import type { CardFields, CreatedCard } from '../types.js';

/**
 * Create a card on `listRef` (a list id or name) of the given board.
 *
 * Makes one request for the board and its open lists, then one to create the card.
 * Nothing is posted when the list cannot be resolved.
 */
export async function createCard(
  client: TrelloClient,
  boardId: string,
  listRef: string,
  fields: CardFields
): Promise<CreatedCard> {
  const name = fields.name.trim();
  if (!name) {
    throw new InvalidArgumentError('Card name must not be empty.');
  }

  const board = await client.getBoardWithLists(boardId);
  const list = resolveList(board.lists ?? [], listRef);
  if (!list) {
    throw new ListNotFoundError(listRef, boardId);
  }

  const request: NewCardRequest = {
    idList: list.id,
    name,
    desc: fields.description,
    pos: fields.position,
  };
  if (fields.due) request.due = fields.due;
  if (fields.labelIds.length > 0) request.idLabels = fields.labelIds;
  if (fields.memberIds.length > 0) request.idMembers = fields.memberIds;
  if (fields.sourceUrl) request.urlSource = fields.sourceUrl;

  const card = await client.addCard(request);
  return { card, board, list };
}
