export type TrelloErrorCode =
  | 'MISSING_API_KEY'
  | 'CONFIG_INVALID'
  | 'INVALID_ARGUMENT'
  | 'CARD_NOT_FOUND'
  | 'BOARD_NOT_FOUND'
  | 'LIST_NOT_FOUND'
  | 'ATTACHMENT_NOT_FOUND'
  | 'AUTH_REJECTED'
  | 'NETWORK_ERROR'
  | 'API_ERROR';

/**
 * Base class for every failure the commands report to the user.
 * The message is printed as-is, so it always names the identifier involved.
 */
export class TrelloError extends Error {
  constructor(
    public readonly code: TrelloErrorCode,
    message: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class MissingApiKeyError extends TrelloError {
  constructor() {
    super(
      'MISSING_API_KEY',
      'TRELLO_API_KEY is not configured. Export it before running the command ' +
        '(find your key at https://trello.com/power-ups/admin).'
    );
  }
}

export class ConfigError extends TrelloError {
  constructor(message: string) {
    super('CONFIG_INVALID', message);
  }
}

export class InvalidArgumentError extends TrelloError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message);
  }
}

export class CardNotFoundError extends TrelloError {
  constructor(
    public readonly cardId: string,
    options?: { cause?: unknown }
  ) {
    super('CARD_NOT_FOUND', `Card "${cardId}" was not found or is not visible to this token.`, options);
  }
}

export class BoardNotFoundError extends TrelloError {
  constructor(
    public readonly boardId: string,
    options?: { cause?: unknown }
  ) {
    super(
      'BOARD_NOT_FOUND',
      `Board "${boardId}" was not found or is not visible to this token.`,
      options
    );
  }
}

export class ListNotFoundError extends TrelloError {
  constructor(
    public readonly listRef: string,
    public readonly boardId: string
  ) {
    super('LIST_NOT_FOUND', `Cannot find an open list "${listRef}" on board ${boardId}.`);
  }
}

export class AttachmentNotFoundError extends TrelloError {
  constructor(
    public readonly path: string,
    options?: { cause?: unknown }
  ) {
    super('ATTACHMENT_NOT_FOUND', `Attachment not found or not a file: ${path}`, options);
  }
}

export class AuthRejectedError extends TrelloError {
  constructor(
    public readonly status: number,
    target: string,
    hint: string,
    options?: { cause?: unknown }
  ) {
    super('AUTH_REJECTED', `Trello rejected the credentials (HTTP ${status}) for ${target}.${hint}`, options);
  }
}

export class TransientNetworkError extends TrelloError {
  constructor(target: string, reason: string, options?: { cause?: unknown }) {
    super('NETWORK_ERROR', `Unable to reach Trello for ${target}: ${reason}`, options);
  }
}

export class TrelloApiError extends TrelloError {
  constructor(
    public readonly status: number,
    target: string,
    detail: string,
    options?: { cause?: unknown }
  ) {
    super('API_ERROR', `Trello API Error: HTTP ${status} for ${target}: ${detail}`, options);
  }
}
