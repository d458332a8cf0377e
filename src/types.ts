export interface TrelloCredentials {
  apiKey: string;
  token: string;
  authScope: string;
  apiBaseUrl: string;
}

export interface AuthorizationRequest {
  key: string;
  scope: string;
  expiration: 'never';
  name: string;
  responseType: 'token';
}

export type CredentialResolution =
  | { status: 'ready'; credentials: Readonly<TrelloCredentials> }
  | {
      status: 'pending';
      authorization: AuthorizationRequest;
      authUrl: string;
      instructions: string;
    };

export interface TrelloLabel {
  id: string;
  name?: string | null;
  color?: string | null;
}

export interface TrelloMember {
  id: string;
  fullName?: string;
  username?: string;
}

export interface TrelloBadges {
  votes?: number;
  subscribed?: boolean;
  due?: string | null;
  dueComplete?: boolean;
  comments?: number;
  attachments?: number;
  checkItems?: number;
  checkItemsChecked?: number;
}

export interface TrelloAttachment {
  id: string;
  name?: string;
  url?: string;
  bytes?: number | null;
  date?: string;
  mimeType?: string | null;
  isUpload?: boolean;
}

export interface TrelloAction {
  id: string;
  type?: string;
  date?: string;
  data?: {
    text?: string;
    card?: { id: string; name?: string; shortLink?: string };
  };
  memberCreator?: TrelloMember;
}

export interface TrelloCard {
  id: string;
  name?: string;
  desc?: string;
  due?: string | null;
  dueComplete?: boolean;
  shortLink?: string;
  shortUrl?: string;
  url?: string;
  dateLastActivity?: string;
  idBoard?: string;
  idList?: string;
  badges?: TrelloBadges;
  labels?: TrelloLabel[];
  members?: TrelloMember[];
  attachments?: TrelloAttachment[];
  actions?: TrelloAction[];
}

export interface TrelloList {
  id: string;
  name: string;
  closed?: boolean;
  pos?: number;
}

export interface TrelloBoard {
  id: string;
  name: string;
  shortLink?: string;
  lists?: TrelloList[];
}

export type CardPosition = 'top' | 'bottom' | number;

export interface CardFields {
  name: string;
  description: string;
  due?: string;
  position: CardPosition;
  labelIds: string[];
  memberIds: string[];
  sourceUrl?: string;
}

export interface CreatedCard {
  card: TrelloCard;
  board: TrelloBoard;
  list: TrelloList;
}

export interface CardUpdate {
  comment?: string;
  attachmentPaths: string[];
  complete: boolean;
}

export type FetchFormat = 'markdown' | 'json';
export type CreateFormat = 'summary' | 'json';
export type OutputMode = FetchFormat | CreateFormat;
