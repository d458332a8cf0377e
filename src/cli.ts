import type { AxiosAdapter } from 'axios';
import { formatCard } from './card-format.js';
import { parseInvocation, UsageError, type Invocation } from './cli-args.js';
import { createCard } from './commands/create-card.js';
import { fetchCard } from './commands/fetch-card.js';
import { manageCard } from './commands/manage-card.js';
import {
  authorizationUrl,
  buildAuthorizationRequest,
  loadConfig,
  resolveCredentials,
} from './config.js';
import { MissingApiKeyError, TrelloError } from './errors.js';
import { createLogger, type Logger } from './logger.js';
import { TrelloClient } from './trello-client.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;
export const EXIT_AUTH_PENDING = 3;

export interface CliContext {
  env: NodeJS.ProcessEnv;
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  logger?: Logger;
  adapter?: AxiosAdapter;
}

type ApiInvocation = Exclude<Invocation, { command: 'help' } | { command: 'authorize' }>;

async function execute(client: TrelloClient, invocation: ApiInvocation): Promise<string> {
  switch (invocation.command) {
    case 'fetch': {
      const card = await fetchCard(client, invocation.cardId, invocation.actionsLimit);
      return formatCard(card, invocation.format, { commentLimit: invocation.actionsLimit });
    }
    case 'create': {
      const { card, board, list } = await createCard(
        client,
        invocation.boardId,
        invocation.listRef,
        invocation.fields
      );
      return formatCard(card, invocation.format, { board, list });
    }
    case 'manage': {
      const performed = await manageCard(client, invocation.cardId, invocation.update);
      return performed.map(line => `- ${line}`).join('\n');
    }
  }
}

/**
 * Run one command and report the exit code; never calls process.exit.
 */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let logger = context.logger;
  try {
    const invocation = parseInvocation(argv);
    if (invocation.command === 'help') {
      context.stdout(`${invocation.text}\n`);
      return EXIT_OK;
    }

    const config = loadConfig(context.env);
    logger ??= createLogger({ level: config.logLevel });

    if (invocation.command === 'authorize') {
      if (!config.apiKey) {
        throw new MissingApiKeyError();
      }
      context.stdout(
        `${authorizationUrl(buildAuthorizationRequest(config.apiKey, config.authScope))}\n`
      );
      return EXIT_OK;
    }

    const resolution = resolveCredentials(config);
    if (resolution.status === 'pending') {
      logger.debug({ scope: resolution.authorization.scope }, 'Authorization pending');
      context.stderr(`${resolution.instructions}\n`);
      return EXIT_AUTH_PENDING;
    }

    const client = new TrelloClient(resolution.credentials, {
      timeoutMs: config.requestTimeoutMs,
      logger,
      adapter: context.adapter,
    });
    const output = await execute(client, invocation);
    context.stdout(`${output}\n`);
    return EXIT_OK;
  } catch (error) {
    if (error instanceof UsageError) {
      context.stderr(`${error.message}\n\n${error.usage}\n`);
      return EXIT_USAGE;
    }
    if (error instanceof TrelloError) {
      logger?.debug({ err: error, code: error.code }, 'Command failed');
      context.stderr(`${error.message}\n`);
      return EXIT_FAILURE;
    }
    throw error;
  }
}
