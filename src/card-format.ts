import type {
  OutputMode,
  TrelloAction,
  TrelloAttachment,
  TrelloBadges,
  TrelloBoard,
  TrelloCard,
  TrelloLabel,
  TrelloList,
  TrelloMember,
} from './types.js';

export interface FormatOptions {
  /** Maximum number of comments rendered in markdown mode. */
  commentLimit?: number;
  board?: TrelloBoard;
  list?: TrelloList;
}

/**
 * Render a card payload for the terminal. Pure: the same input always yields the same text.
 */
export function formatCard(card: TrelloCard, mode: OutputMode, options: FormatOptions = {}): string {
  switch (mode) {
    case 'json':
      return JSON.stringify(card, null, 2);
    case 'summary':
      return formatCreatedSummary(card, options.board, options.list);
    case 'markdown':
      return formatCardAsMarkdown(card, options.commentLimit);
  }
}

export function formatDate(value: string | null | undefined): string {
  if (!value) return 'n/a';
  const parsed = new Date(value);
  return Number.isNaN(parsed.getTime()) ? value : parsed.toISOString();
}

export function formatFileSize(bytes: number): string {
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  if (bytes === 0) return '0 Bytes';
  const i = Math.min(Math.floor(Math.log(bytes) / Math.log(1024)), sizes.length - 1);
  return Math.round((bytes / Math.pow(1024, i)) * 100) / 100 + ' ' + sizes[i];
}

function formatLabels(labels: readonly TrelloLabel[]): string {
  const parts = labels.map(label => {
    const name = label.name || label.id;
    return label.color ? `${name} (${label.color})` : name;
  });
  return parts.length > 0 ? parts.join(', ') : 'none';
}

function memberName(member: TrelloMember | undefined): string {
  if (!member) return 'Unknown';
  return member.fullName || member.username || member.id || 'Unknown';
}

function formatMembers(members: readonly TrelloMember[]): string {
  const parts = members.map(member =>
    member.fullName && member.username
      ? `${member.fullName} (@${member.username})`
      : member.username
        ? `@${member.username}`
        : memberName(member)
  );
  return parts.length > 0 ? parts.join(', ') : 'none';
}

function summarizeBadges(badges: TrelloBadges | undefined): string {
  if (!badges) return '';
  const pieces: string[] = [];
  if (badges.subscribed) pieces.push('subscribed');
  if (badges.attachments) pieces.push(`${badges.attachments} attachments`);
  if (badges.comments) pieces.push(`${badges.comments} comments`);
  if (badges.checkItems) {
    pieces.push(`${badges.checkItemsChecked ?? 0}/${badges.checkItems} checklist items`);
  }
  if (badges.votes) pieces.push(`${badges.votes} votes`);
  return pieces.join(', ');
}

function formatAttachment(attachment: TrelloAttachment): string {
  const name = attachment.name || 'Attachment';
  const meta: string[] = [];
  if (typeof attachment.bytes === 'number' && Number.isFinite(attachment.bytes) && attachment.bytes >= 0) {
    meta.push(formatFileSize(attachment.bytes));
  }
  if (attachment.mimeType) meta.push(attachment.mimeType);
  if (attachment.isUpload) meta.push('uploaded');
  const metaText = meta.length > 0 ? ` (${meta.join(', ')})` : '';
  return attachment.url ? `- [${name}](${attachment.url})${metaText}` : `- ${name}${metaText}`;
}

function timestamp(action: TrelloAction): number {
  const time = action.date ? Date.parse(action.date) : NaN;
  return Number.isNaN(time) ? 0 : time;
}

/**
 * Comment actions with text, most recent first.
 */
export function recentComments(actions: readonly TrelloAction[]): TrelloAction[] {
  return actions
    .filter(action => (!action.type || action.type === 'commentCard') && action.data?.text)
    .sort((a, b) => timestamp(b) - timestamp(a));
}

function formatComment(action: TrelloAction): string {
  const text = (action.data?.text ?? '').trim().replace(/\n/g, '\n  ');
  return `- ${formatDate(action.date)} by ${memberName(action.memberCreator)}: ${text}`;
}

function formatCardAsMarkdown(card: TrelloCard, commentLimit?: number): string {
  const lines: string[] = [];

  // Title
  lines.push(`# ${card.name || '(unnamed card)'}`);
  const url = card.shortUrl || card.url;
  if (url) {
    lines.push(`[Open in Trello](${url})`);
  }
  lines.push('');

  // Metadata
  lines.push('## Metadata');
  lines.push(`- Short link: ${card.shortLink || 'n/a'}`);
  lines.push(`- Due: ${formatDate(card.due)}${card.due && card.dueComplete ? ' (complete)' : ''}`);
  lines.push(`- Members: ${formatMembers(card.members ?? [])}`);
  lines.push(`- Labels: ${formatLabels(card.labels ?? [])}`);
  const badges = summarizeBadges(card.badges);
  if (badges) {
    lines.push(`- Badges: ${badges}`);
  }
  if (card.dateLastActivity) {
    lines.push(`- Last activity: ${formatDate(card.dateLastActivity)}`);
  }
  lines.push('');

  lines.push('## Description');
  const description = card.desc?.trim();
  if (description) {
    // headings inside the description must not open a section of their own
    description.split(/\r?\n/).forEach(line => lines.push(line ? `> ${line}` : '>'));
  } else {
    lines.push('_No description._');
  }
  lines.push('');

  const attachments = card.attachments ?? [];
  lines.push('## Attachments');
  if (attachments.length > 0) {
    attachments.forEach(attachment => lines.push(formatAttachment(attachment)));
  } else {
    lines.push('_No attachments._');
  }
  lines.push('');

  const comments = recentComments(card.actions ?? []);
  const shown = commentLimit === undefined ? comments : comments.slice(0, commentLimit);
  lines.push('## Comments');
  if (shown.length === 0) {
    lines.push('_No comments._');
  } else {
    if (shown.length < comments.length) {
      lines.push(`_Showing the ${shown.length} most recent of ${comments.length} comments._`);
    }
    shown.forEach(comment => lines.push(formatComment(comment)));
  }

  return lines.join('\n');
}

function formatCreatedSummary(card: TrelloCard, board?: TrelloBoard, list?: TrelloList): string {
  const lines = ['Created Trello card:', `- Name: ${card.name ?? ''}`];
  if (board) {
    lines.push(`- Board: ${board.name}${board.shortLink ? ` (${board.shortLink})` : ''}`);
  }
  if (list) {
    lines.push(`- List: ${list.name}`);
  }
  lines.push(`- URL: ${card.shortUrl || card.url || 'n/a'}`);
  lines.push(`- ID: ${card.id}`);
  return lines.join('\n');
}
