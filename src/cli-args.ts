import { parseArgs, type ParseArgsConfig } from 'node:util';
import { z } from 'zod';
import { DEFAULT_ACTIONS_LIMIT } from './commands/fetch-card.js';
import { MAX_ACTIONS_LIMIT } from './trello-client.js';
import type { CardFields, CardUpdate, CreateFormat, FetchFormat } from './types.js';

export class UsageError extends Error {
  constructor(
    message: string,
    public readonly usage: string
  ) {
    super(message);
    this.name = 'UsageError';
  }
}

export const MAIN_USAGE = `trello-card: Trello cards as context for coding assistants

Usage:
  trello-card fetch <card-id> [options]     Print a card with comments and attachments
  trello-card create --board <id> --list <name-or-id> --name <title> [options]
  trello-card manage --card <id> [--comment <text>] [--attachment <path>]... [--complete]
  trello-card authorize                     Print the link that issues a TRELLO_TOKEN

Environment:
  TRELLO_API_KEY             API key (required)
  TRELLO_TOKEN               API token; when missing, an authorization link is printed
  TRELLO_AUTH_SCOPE          Scope requested by the authorization link (default: read,write)
  TRELLO_API_BASE_URL        API endpoint (default: https://api.trello.com/1)
  TRELLO_REQUEST_TIMEOUT_MS  Per-request timeout (default: 30000)
  LOG_LEVEL                  Diagnostics written to stderr (default: warn)

Run "trello-card <command> --help" for the options of a command.`;

export const FETCH_USAGE = `Usage: trello-card fetch <card-id> [options]

Options:
  --format <markdown|json>  Output format (default: markdown)
  --actions-limit <n>       Maximum number of comments to fetch, 1-${MAX_ACTIONS_LIMIT} (default: ${DEFAULT_ACTIONS_LIMIT})
  -h, --help                Show this help`;

export const CREATE_USAGE = `Usage: trello-card create --board <id> --list <name-or-id> --name <title> [options]

Options:
  --board <id>              Board short link or full id (required)
  --list <name-or-id>       List name (case-insensitive) or list id on the board (required)
  --name <title>            Title of the new card (required)
  --desc <text>             Card description
  --due <iso-date>          ISO 8601 due date/time
  --pos <top|bottom|n>      Card position (default: bottom)
  --label <id>              Label id to attach (repeatable)
  --member <id>             Member id to assign (repeatable)
  --url-source <url>        URL to attach to the card when creating it
  --format <summary|json>   Output format (default: summary)
  -h, --help                Show this help`;

export const MANAGE_USAGE = `Usage: trello-card manage --card <id> [options]

Options:
  --card <id>               Card short link or full id (required)
  --comment <text>          Text to add as a comment
  --attachment <path>       File to upload (repeatable)
  --complete                Mark the card complete
  -h, --help                Show this help`;

export const AUTHORIZE_USAGE = `Usage: trello-card authorize

Prints the authorization link for TRELLO_API_KEY. Open it, approve access,
then export the token Trello displays as TRELLO_TOKEN.`;

export type Invocation =
  | { command: 'help'; text: string }
  | { command: 'fetch'; cardId: string; format: FetchFormat; actionsLimit: number }
  | { command: 'create'; boardId: string; listRef: string; fields: CardFields; format: CreateFormat }
  | { command: 'manage'; cardId: string; update: CardUpdate }
  | { command: 'authorize' };

const isoDate = z
  .string()
  .trim()
  .refine(value => !Number.isNaN(Date.parse(value)), 'must be an ISO 8601 date or date-time');

const FetchArgsSchema = z.object({
  card: z
    .string({ required_error: 'a card id or short link is required' })
    .trim()
    .min(1, 'a card id or short link is required'),
  format: z.enum(['markdown', 'json']).default('markdown'),
  'actions-limit': z.coerce
    .number()
    .int()
    .min(1)
    .max(MAX_ACTIONS_LIMIT)
    .default(DEFAULT_ACTIONS_LIMIT),
});

const CreateArgsSchema = z.object({
  board: z.string({ required_error: 'is required' }).trim().min(1),
  list: z.string({ required_error: 'is required' }).trim().min(1),
  name: z.string({ required_error: 'is required' }).trim().min(1),
  desc: z.string().default(''),
  due: isoDate.optional(),
  pos: z
    .union([z.enum(['top', 'bottom']), z.coerce.number().positive().finite()])
    .default('bottom'),
  label: z.array(z.string().trim().min(1)).default([]),
  member: z.array(z.string().trim().min(1)).default([]),
  'url-source': z.string().trim().url().optional(),
  format: z.enum(['summary', 'json']).default('summary'),
});

const ManageArgsSchema = z.object({
  card: z.string({ required_error: 'is required' }).trim().min(1),
  comment: z.string().optional(),
  attachment: z.array(z.string().min(1)).default([]),
  complete: z.boolean().default(false),
});

const FETCH_OPTIONS = {
  format: { type: 'string' },
  'actions-limit': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} satisfies ParseArgsConfig['options'];

const CREATE_OPTIONS = {
  board: { type: 'string' },
  list: { type: 'string' },
  name: { type: 'string' },
  desc: { type: 'string' },
  due: { type: 'string' },
  pos: { type: 'string' },
  label: { type: 'string', multiple: true },
  member: { type: 'string', multiple: true },
  'url-source': { type: 'string' },
  format: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} satisfies ParseArgsConfig['options'];

const MANAGE_OPTIONS = {
  card: { type: 'string' },
  comment: { type: 'string' },
  attachment: { type: 'string', multiple: true },
  complete: { type: 'boolean' },
  help: { type: 'boolean', short: 'h' },
} satisfies ParseArgsConfig['options'];

const HELP_OPTIONS = {
  help: { type: 'boolean', short: 'h' },
} satisfies ParseArgsConfig['options'];

function parseOrThrow<T extends ParseArgsConfig>(config: T, usage: string) {
  try {
    return parseArgs(config);
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error), usage);
  }
}

function validate<T extends z.ZodTypeAny>(schema: T, input: unknown, usage: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    const problems = result.error.issues
      .map(issue => `${issue.path.length > 0 ? `${issue.path.join('.')}: ` : ''}${issue.message}`)
      .join('; ');
    throw new UsageError(`Invalid arguments: ${problems}`, usage);
  }
  return result.data;
}

function parseFetch(args: string[]): Invocation {
  const { values, positionals } = parseOrThrow(
    { args, options: FETCH_OPTIONS, allowPositionals: true, strict: true },
    FETCH_USAGE
  );
  if (values.help) return { command: 'help', text: FETCH_USAGE };
  if (positionals.length > 1) {
    throw new UsageError(`Expected one card id, got ${positionals.length}.`, FETCH_USAGE);
  }

  const parsed = validate(FetchArgsSchema, { ...values, card: positionals[0] }, FETCH_USAGE);
  return {
    command: 'fetch',
    cardId: parsed.card,
    format: parsed.format,
    actionsLimit: parsed['actions-limit'],
  };
}

function parseCreate(args: string[]): Invocation {
  const { values } = parseOrThrow({ args, options: CREATE_OPTIONS, strict: true }, CREATE_USAGE);
  if (values.help) return { command: 'help', text: CREATE_USAGE };

  const parsed = validate(CreateArgsSchema, { ...values }, CREATE_USAGE);
  return {
    command: 'create',
    boardId: parsed.board,
    listRef: parsed.list,
    format: parsed.format,
    fields: {
      name: parsed.name,
      description: parsed.desc,
      due: parsed.due,
      position: parsed.pos,
      labelIds: parsed.label,
      memberIds: parsed.member,
      sourceUrl: parsed['url-source'],
    },
  };
}

function parseManage(args: string[]): Invocation {
  const { values } = parseOrThrow({ args, options: MANAGE_OPTIONS, strict: true }, MANAGE_USAGE);
  if (values.help) return { command: 'help', text: MANAGE_USAGE };

  const parsed = validate(ManageArgsSchema, { ...values }, MANAGE_USAGE);
  if (!parsed.comment?.trim() && parsed.attachment.length === 0 && !parsed.complete) {
    throw new UsageError(
      'Specify at least one action: --comment, --attachment, or --complete.',
      MANAGE_USAGE
    );
  }
  return {
    command: 'manage',
    cardId: parsed.card,
    update: {
      comment: parsed.comment,
      attachmentPaths: parsed.attachment,
      complete: parsed.complete,
    },
  };
}

function parseAuthorize(args: string[]): Invocation {
  const { values } = parseOrThrow({ args, options: HELP_OPTIONS, strict: true }, AUTHORIZE_USAGE);
  if (values.help) return { command: 'help', text: AUTHORIZE_USAGE };
  return { command: 'authorize' };
}

/**
 * Turn raw arguments (without the node and script paths) into a validated invocation.
 */
export function parseInvocation(argv: readonly string[]): Invocation {
  const [command, ...rest] = argv;
  switch (command) {
    case 'fetch':
      return parseFetch(rest);
    case 'create':
      return parseCreate(rest);
    case 'manage':
      return parseManage(rest);
    case 'authorize':
      return parseAuthorize(rest);
    case 'help':
    case '--help':
    case '-h':
      return { command: 'help', text: MAIN_USAGE };
    case undefined:
      throw new UsageError('Missing command.', MAIN_USAGE);
    default:
      throw new UsageError(`Unknown command "${command}".`, MAIN_USAGE);
  }
}
