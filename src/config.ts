import { z } from 'zod';
import { ConfigError, MissingApiKeyError } from './errors.js';
import type { AuthorizationRequest, CredentialResolution } from './types.js';

export const DEFAULT_API_BASE_URL = 'https://api.trello.com/1';
export const DEFAULT_AUTH_SCOPE = 'read,write';
export const AUTHORIZATION_BASE_URL = 'https://trello.com/1/authorize';
export const AUTHORIZATION_APP_NAME = 'Trello Card Context';

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Blank variables are treated as unset
const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const EnvSchema = z.object({
  TRELLO_API_KEY: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRELLO_TOKEN: z.preprocess(blankToUndefined, z.string().trim().optional()),
  TRELLO_AUTH_SCOPE: z.preprocess(
    blankToUndefined,
    z.string().trim().default(DEFAULT_AUTH_SCOPE)
  ),
  TRELLO_API_BASE_URL: z.preprocess(
    blankToUndefined,
    z
      .string()
      .trim()
      .url()
      .default(DEFAULT_API_BASE_URL)
      .transform(url => url.replace(/\/+$/, ''))
  ),
  TRELLO_REQUEST_TIMEOUT_MS: z.preprocess(
    blankToUndefined,
    z.coerce.number().int().positive().default(30_000)
  ),
  LOG_LEVEL: z.preprocess(blankToUndefined, z.enum(LOG_LEVELS).default('warn')),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface AppConfig {
  apiKey?: string;
  token?: string;
  authScope: string;
  apiBaseUrl: string;
  requestTimeoutMs: number;
  logLevel: LogLevel;
}

/**
 * Read and validate the process environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map(issue => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    apiKey: vars.TRELLO_API_KEY,
    token: vars.TRELLO_TOKEN,
    authScope: vars.TRELLO_AUTH_SCOPE,
    apiBaseUrl: vars.TRELLO_API_BASE_URL,
    requestTimeoutMs: vars.TRELLO_REQUEST_TIMEOUT_MS,
    logLevel: vars.LOG_LEVEL,
  };
}

export function buildAuthorizationRequest(key: string, scope: string): AuthorizationRequest {
  return {
    key,
    scope,
    expiration: 'never',
    name: AUTHORIZATION_APP_NAME,
    responseType: 'token',
  };
}

export function authorizationUrl(request: AuthorizationRequest): string {
  const params = new URLSearchParams({
    key: request.key,
    scope: request.scope,
    expiration: request.expiration,
    name: request.name,
    response_type: request.responseType,
  });
  return `${AUTHORIZATION_BASE_URL}?${params.toString()}`;
}

/**
 * Sentence appended to messages that need the user to (re)authorize the key.
 */
export function authorizationInstructions(authUrl: string): string {
  return (
    ' To grant access, open the following link while signed in as a board member, ' +
    'approve the access request, and set TRELLO_TOKEN to the token Trello displays: ' +
    authUrl
  );
}

/**
 * Decide whether the configured credentials can be used as-is.
 *
 * Never touches the network. A key without a token yields a `pending` outcome
 * carrying the authorization link the user has to visit; callers must stop there.
 */
export function resolveCredentials(config: AppConfig): CredentialResolution {
  if (!config.apiKey) {
    throw new MissingApiKeyError();
  }

  if (!config.token) {
    const authorization = buildAuthorizationRequest(config.apiKey, config.authScope);
    const authUrl = authorizationUrl(authorization);
    return {
      status: 'pending',
      authorization,
      authUrl,
      instructions:
        'TRELLO_TOKEN is not configured. The command can build an authorization link ' +
        'so you can create one.' +
        authorizationInstructions(authUrl),
    };
  }

  return {
    status: 'ready',
    credentials: Object.freeze({
      apiKey: config.apiKey,
      token: config.token,
      authScope: config.authScope,
      apiBaseUrl: config.apiBaseUrl,
    }),
  };
}
