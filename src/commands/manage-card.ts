import { stat } from 'node:fs/promises';
import * as path from 'node:path';
import { AttachmentNotFoundError, InvalidArgumentError } from '../errors.js';
import type { TrelloClient } from '../trello-client.js';
import type { CardUpdate } from '../types.js';

async function isFile(attachment: string, resolved: string): Promise<boolean> {
  try {
    return (await stat(resolved)).isFile();
  } catch (error) {
    if (error instanceof Error && 'code' in error) {
      if (error.code === 'ENOENT' || error.code === 'ENOTDIR') {
        return false;
      }
    }
    throw new AttachmentNotFoundError(attachment, { cause: error });
  }
}

/**
 * Comment on, attach files to, and/or complete a card, in that order.
 *
 * Every attachment path is checked before the first request. Stops at the first
 * failed request and returns one line per completed step otherwise.
 */
export async function manageCard(
  client: TrelloClient,
  cardId: string,
  update: CardUpdate
): Promise<string[]> {
  const comment = update.comment?.trim();
  if (!comment && update.attachmentPaths.length === 0 && !update.complete) {
    throw new InvalidArgumentError(
      'Specify at least one action: --comment, --attachment, or --complete.'
    );
  }

  const attachments: string[] = [];
  for (const attachment of update.attachmentPaths) {
    const resolved = path.resolve(attachment);
    if (!(await isFile(attachment, resolved))) {
      throw new AttachmentNotFoundError(attachment);
    }
    attachments.push(resolved);
  }

  const performed: string[] = [];
  if (comment) {
    await client.addCommentToCard(cardId, comment);
    performed.push('Comment added.');
  }
  for (const attachment of attachments) {
    await client.attachFileToCard(cardId, attachment);
    performed.push(`Uploaded ${path.basename(attachment)}.`);
  }
  if (update.complete) {
    await client.markCardComplete(cardId);
    performed.push('Card marked complete.');
  }
  return performed;
}
