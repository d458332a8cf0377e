import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import FormData from 'form-data';
import { createReadStream } from 'node:fs';
import * as path from 'node:path';
import {
  authorizationInstructions,
  authorizationUrl,
  buildAuthorizationRequest,
} from './config.js';
import {
  AuthRejectedError,
  BoardNotFoundError,
  CardNotFoundError,
  TransientNetworkError,
  TrelloApiError,
  TrelloError,
} from './errors.js';
import { silentLogger, type Logger } from './logger.js';
import { guessMimeType } from './mime-types.js';
import type {
  CardPosition,
  TrelloAction,
  TrelloAttachment,
  TrelloBoard,
  TrelloCard,
  TrelloCredentials,
} from './types.js';

export const CARD_FIELDS = [
  'name',
  'desc',
  'due',
  'dueComplete',
  'shortUrl',
  'shortLink',
  'url',
  'dateLastActivity',
  'badges',
  'idBoard',
  'idList',
] as const;

export const ATTACHMENT_FIELDS = ['name', 'url', 'bytes', 'date', 'mimeType', 'isUpload'] as const;

export const MAX_ACTIONS_LIMIT = 1000;

type RequestTarget =
  | { kind: 'card'; id: string }
  | { kind: 'board'; id: string }
  | { kind: 'request'; id: string };

export interface TrelloClientOptions {
  timeoutMs?: number;
  logger?: Logger;
  /** Replaces the HTTP transport; used to run against an in-process fake. */
  adapter?: AxiosAdapter;
}

export interface NewCardRequest {
  idList: string;
  name: string;
  desc: string;
  pos: CardPosition;
  due?: string;
  idLabels?: string[];
  idMembers?: string[];
  urlSource?: string;
}

export class TrelloClient {
  private axiosInstance: AxiosInstance;
  private logger: Logger;

  constructor(
    private credentials: Readonly<TrelloCredentials>,
    options: TrelloClientOptions = {}
  ) {
    this.logger = options.logger ?? silentLogger;
    this.axiosInstance = axios.create({
      baseURL: credentials.apiBaseUrl,
      timeout: options.timeoutMs ?? 30_000,
      params: {
        key: credentials.apiKey,
        token: credentials.token,
      },
      ...(options.adapter && { adapter: options.adapter }),
    });

    this.axiosInstance.interceptors.request.use(config => {
      this.logger.debug({ method: config.method, path: config.url }, 'Trello request');
      return config;
    });
  }

  private async handleRequest<T>(target: RequestTarget, requestFn: () => Promise<T>): Promise<T> {
    try {
      return await requestFn();
    } catch (error) {
      throw this.translateError(target, error);
    }
  }

  private translateError(target: RequestTarget, error: unknown): Error {
    if (error instanceof TrelloError || !axios.isAxiosError(error)) {
      return error instanceof Error ? error : new Error(String(error));
    }

    const description = `${target.kind} ${target.id}`;
    const response = error.response;
    if (!response) {
      this.logger.debug({ target: description, code: error.code }, 'Trello unreachable');
      return new TransientNetworkError(description, error.code ?? error.message, { cause: error });
    }

    const detail = errorDetail(response.data) ?? error.message;
    this.logger.debug({ target: description, status: response.status, detail }, 'Trello error');

    if (response.status === 401 || response.status === 403) {
      const authUrl = authorizationUrl(
        buildAuthorizationRequest(this.credentials.apiKey, this.credentials.authScope)
      );
      return new AuthRejectedError(
        response.status,
        description,
        authorizationInstructions(authUrl),
        { cause: error }
      );
    }

    // Trello answers malformed ids with 400 "invalid id" rather than 404
    const missing =
      response.status === 404 || (response.status === 400 && /invalid id/i.test(detail));
    if (missing && target.kind === 'card') {
      return new CardNotFoundError(target.id, { cause: error });
    }
    if (missing && target.kind === 'board') {
      return new BoardNotFoundError(target.id, { cause: error });
    }

    return new TrelloApiError(response.status, description, detail || 'no details', {
      cause: error,
    });
  }

  /**
   * Fetch a card with its comments, attachments, labels and members.
   */
  async getCard(cardId: string, actionsLimit: number): Promise<TrelloCard> {
    return this.handleRequest({ kind: 'card', id: cardId }, async () => {
      const response = await this.axiosInstance.get<TrelloCard>(
        `/cards/${encodeURIComponent(cardId)}`,
        {
          params: {
            fields: CARD_FIELDS.join(','),
            actions: 'commentCard',
            actions_limit: actionsLimit,
            actions_fields: 'id,type,date,data,memberCreator',
            attachments: true,
            attachment_fields: ATTACHMENT_FIELDS.join(','),
            labels: 'all',
            label_fields: 'name,color',
            members: true,
            member_fields: 'fullName,username',
          },
        }
      );
      return response.data;
    });
  }

  /**
   * Get a board together with its open lists, in board order.
   */
  async getBoardWithLists(boardId: string): Promise<TrelloBoard> {
    return this.handleRequest({ kind: 'board', id: boardId }, async () => {
      const response = await this.axiosInstance.get<TrelloBoard>(
        `/boards/${encodeURIComponent(boardId)}`,
        {
          params: {
            fields: 'id,name,shortLink',
            lists: 'open',
            list_fields: 'id,name',
          },
        }
      );
      return response.data;
    });
  }

  async addCard(params: NewCardRequest): Promise<TrelloCard> {
    return this.handleRequest({ kind: 'request', id: 'POST /cards' }, async () => {
      const response = await this.axiosInstance.post<TrelloCard>('/cards', params);
      return response.data;
    });
  }

  async addCommentToCard(cardId: string, text: string): Promise<TrelloAction> {
    return this.handleRequest({ kind: 'card', id: cardId }, async () => {
      const response = await this.axiosInstance.post<TrelloAction>(
        `/cards/${encodeURIComponent(cardId)}/actions/comments`,
        { text }
      );
      return response.data;
    });
  }

  /**
   * Upload a local file as a card attachment.
   */
  async attachFileToCard(cardId: string, filePath: string): Promise<TrelloAttachment> {
    return this.handleRequest({ kind: 'card', id: cardId }, async () => {
      const fileName = path.basename(filePath);
      const mimeType = guessMimeType(fileName);

      const form = new FormData();
      form.append('file', createReadStream(filePath), {
        filename: fileName,
        contentType: mimeType,
      });
      form.append('name', fileName);
      form.append('mimeType', mimeType);

      const response = await this.axiosInstance.post<TrelloAttachment>(
        `/cards/${encodeURIComponent(cardId)}/attachments`,
        form,
        {
          headers: {
            ...form.getHeaders(),
          },
        }
      );
      return response.data;
    });
  }

  async markCardComplete(cardId: string): Promise<TrelloCard> {
    return this.handleRequest({ kind: 'card', id: cardId }, async () => {
      const response = await this.axiosInstance.put<TrelloCard>(
        `/cards/${encodeURIComponent(cardId)}`,
        { dueComplete: true }
      );
      return response.data;
    });
  }
}

/** Trello answers most failures in plain text and some in JSON with `message` or `error`. */
function errorDetail(data: unknown): string | undefined {
  if (typeof data === 'string') {
    return data.trim();
  }
  if (typeof data === 'object' && data !== null) {
    for (const field of ['message', 'error']) {
      const value: unknown = Reflect.get(data, field);
      if (typeof value === 'string' && value.trim()) {
        return value.trim();
      }
    }
  }
  return undefined;
}
