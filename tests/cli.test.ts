import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  EXIT_AUTH_PENDING,
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  runCli,
} from '../src/cli.js';
import { silentLogger } from '../src/logger.js';
import type { TrelloAction } from '../src/types.js';
import { FakeTrello } from './helpers/fake-trello.js';

const ENV = {
  TRELLO_API_KEY: 'test-key',
  TRELLO_TOKEN: 'test-token',
  TRELLO_API_BASE_URL: 'https://trello.test/1',
};

async function run(argv: string[], env: NodeJS.ProcessEnv, trello = new FakeTrello()) {
  let stdout = '';
  let stderr = '';
  const code = await runCli(argv, {
    env,
    stdout: text => {
      stdout += text;
    },
    stderr: text => {
      stderr += text;
    },
    logger: silentLogger,
    adapter: trello.adapter,
  });
  return { code, stdout, stderr, trello };
}

function comment(day: number): TrelloAction {
  return {
    id: `comment-${day}`,
    type: 'commentCard',
    date: `2026-01-0${day}T10:00:00.000Z`,
    data: { text: `Comment ${day}` },
    memberCreator: { id: 'm1', fullName: 'Ada Example', username: 'ada' },
  };
}

describe('credentials', () => {
  it('stops before any request when the API key is missing', async () => {
    const result = await run(['fetch', 'abc123'], { TRELLO_TOKEN: 'test-token' });

    expect(result.code).toBe(EXIT_FAILURE);
    expect(result.stderr).toContain('TRELLO_API_KEY is not configured');
    expect(result.stdout).toBe('');
    expect(result.trello.calls).toHaveLength(0);
  });

  it('prints the authorization link when the token is missing', async () => {
    const result = await run(['create', '--board', 'b', '--list', 'l', '--name', 'n'], {
      TRELLO_API_KEY: 'test-key',
      TRELLO_AUTH_SCOPE: 'read',
    });

    expect(result.code).toBe(EXIT_AUTH_PENDING);
    expect(result.stderr).toContain(
      'https://trello.com/1/authorize?key=test-key&scope=read&expiration=never'
    );
    expect(result.stdout).toBe('');
    expect(result.trello.calls).toHaveLength(0);
  });

  it('prints the authorization link on request', async () => {
    const result = await run(['authorize'], { TRELLO_API_KEY: 'test-key' });

    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toBe(
      'https://trello.com/1/authorize?key=test-key&scope=read%2Cwrite&expiration=never' +
        '&name=Trello+Card+Context&response_type=token\n'
    );
    expect(result.trello.calls).toHaveLength(0);
  });

  it('reports an invalid environment', async () => {
    const result = await run(['fetch', 'abc123'], { ...ENV, LOG_LEVEL: 'loud' });

    expect(result.code).toBe(EXIT_FAILURE);
    expect(result.stderr).toContain('LOG_LEVEL');
    expect(result.trello.calls).toHaveLength(0);
  });
});

describe('fetch', () => {
  it('prints the most recent comments up to the actions limit', async () => {
    const trello = new FakeTrello().on('GET', '/cards/abc123', {
      status: 200,
      data: {
        id: 'card-1',
        name: 'Investigate flaky test',
        shortLink: 'abc123',
        actions: [1, 2, 3, 4, 5].map(comment),
      },
    });

    const result = await run(['fetch', 'abc123', '--actions-limit', '2'], ENV, trello);

    expect(result.code).toBe(EXIT_OK);
    expect(trello.calls[0].params.actions_limit).toBe(2);
    const commentLines = result.stdout.split('\n').filter(line => line.startsWith('- 2026-'));
    expect(commentLines).toEqual([
      '- 2026-01-05T10:00:00.000Z by Ada Example: Comment 5',
      '- 2026-01-04T10:00:00.000Z by Ada Example: Comment 4',
    ]);
    expect(result.stdout.startsWith('# Investigate flaky test\n')).toBe(true);
  });

  it('prints the raw payload as JSON', async () => {
    const payload = { id: 'card-1', name: 'Card', labels: [{ id: 'l1', name: 'Bug', color: 'red' }] };
    const trello = new FakeTrello().on('GET', '/cards/abc123', { status: 200, data: payload });

    const result = await run(['fetch', 'abc123', '--format', 'json'], ENV, trello);

    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toBe(`${JSON.stringify(payload, null, 2)}\n`);
  });

  it('reports a missing card by id', async () => {
    const result = await run(['fetch', 'nope'], ENV);

    expect(result.code).toBe(EXIT_FAILURE);
    expect(result.stderr).toBe('Card "nope" was not found or is not visible to this token.\n');
  });

  it('rejects an out-of-range actions limit', async () => {
    const result = await run(['fetch', 'abc123', '--actions-limit', '0'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr).toContain('actions-limit');
    expect(result.trello.calls).toHaveLength(0);
  });

  it('requires a card id', async () => {
    const result = await run(['fetch'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr).toContain('a card id or short link is required');
  });
});

describe('create', () => {
  it('creates the card on the list named on the command line', async () => {
    const trello = new FakeTrello()
      .on('GET', '/boards/brd123', {
        status: 200,
        data: {
          id: 'board-1',
          name: 'Team Board',
          shortLink: 'brd123',
          lists: [
            { id: 'list-backlog', name: 'Backlog' },
            { id: 'list-todo', name: 'To Do' },
            { id: 'list-done', name: 'Done' },
          ],
        },
      })
      .on('POST', '/cards', {
        status: 200,
        data: {
          id: 'card-new',
          name: 'Write release notes',
          shortUrl: 'https://trello.com/c/new123',
        },
      });

    const result = await run(
      [
        'create',
        '--board',
        'brd123',
        '--list',
        'To Do',
        '--name',
        'Write release notes',
        '--label',
        'label-1',
        '--label',
        'label-2',
      ],
      ENV,
      trello
    );

    expect(result.code).toBe(EXIT_OK);
    expect(trello.callsTo('POST', '/cards')[0].body).toEqual({
      idList: 'list-todo',
      name: 'Write release notes',
      desc: '',
      pos: 'bottom',
      idLabels: ['label-1', 'label-2'],
    });
    expect(result.stdout).toBe(
      [
        'Created Trello card:',
        '- Name: Write release notes',
        '- Board: Team Board (brd123)',
        '- List: To Do',
        '- URL: https://trello.com/c/new123',
        '- ID: card-new',
        '',
      ].join('\n')
    );
  });

  it('reports an unknown list without creating anything', async () => {
    const trello = new FakeTrello().on('GET', '/boards/brd123', {
      status: 200,
      data: { id: 'board-1', name: 'Team Board', lists: [{ id: 'list-done', name: 'Done' }] },
    });

    const result = await run(
      ['create', '--board', 'brd123', '--list', 'To Do', '--name', 'Card'],
      ENV,
      trello
    );

    expect(result.code).toBe(EXIT_FAILURE);
    expect(result.stderr).toBe('Cannot find an open list "To Do" on board brd123.\n');
    expect(trello.callsTo('POST')).toHaveLength(0);
  });

  it('requires a board', async () => {
    const result = await run(['create', '--list', 'To Do', '--name', 'Card'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr).toContain('board: is required');
  });

  it('rejects a position that is neither top, bottom nor a number', async () => {
    const result = await run(
      ['create', '--board', 'b', '--list', 'l', '--name', 'n', '--pos', 'middle'],
      ENV
    );

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr).toContain('pos');
  });

  it('rejects a position too large to send', async () => {
    const result = await run(
      ['create', '--board', 'b', '--list', 'l', '--name', 'n', '--pos', '1e400'],
      ENV
    );

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr.startsWith('Invalid arguments: pos')).toBe(true);
    expect(result.trello.calls).toHaveLength(0);
  });

  it("reports Trello's reason when it rejects the new card", async () => {
    const trello = new FakeTrello()
      .on('GET', '/boards/brd123', {
        status: 200,
        data: { id: 'board-1', name: 'Team Board', lists: [{ id: 'list-todo', name: 'To Do' }] },
      })
      .on('POST', '/cards', { status: 400, data: { message: 'invalid value for idLabels' } });

    const result = await run(
      ['create', '--board', 'brd123', '--list', 'To Do', '--name', 'Card', '--label', 'bad'],
      ENV,
      trello
    );

    expect(result.code).toBe(EXIT_FAILURE);
    expect(result.stderr).toBe(
      'Trello API Error: HTTP 400 for request POST /cards: invalid value for idLabels\n'
    );
  });
});

describe('manage', () => {
  it('requires an action', async () => {
    const result = await run(['manage', '--card', 'abc123'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr).toContain('Specify at least one action');
  });

  it('lists what was done', async () => {
    const trello = new FakeTrello()
      .on('POST', '/cards/abc123/actions/comments', { status: 200, data: { id: 'action-1' } })
      .on('PUT', '/cards/abc123', { status: 200, data: { id: 'card-1' } });

    const result = await run(
      ['manage', '--card', 'abc123', '--comment', 'Done in #42', '--complete'],
      ENV,
      trello
    );

    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toBe('- Comment added.\n- Card marked complete.\n');
  });

  it('reports an attachment path below a regular file', async () => {
    const workDir = await mkdtemp(path.join(tmpdir(), 'trello-cli-'));
    try {
      const notes = path.join(workDir, 'notes.txt');
      await writeFile(notes, 'notes\n');
      const attachment = path.join(notes, 'child');

      const result = await run(['manage', '--card', 'abc123', '--attachment', attachment], ENV);

      expect(result.code).toBe(EXIT_FAILURE);
      expect(result.stderr).toBe(`Attachment not found or not a file: ${attachment}\n`);
      expect(result.trello.calls).toHaveLength(0);
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  });
});

describe('usage', () => {
  it('prints help', async () => {
    const result = await run(['--help'], {});

    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout.split('\n')[0]).toBe(
      'trello-card: Trello cards as context for coding assistants'
    );
    expect(result.stdout).toContain('trello-card fetch <card-id>');
  });

  it('prints command help without credentials', async () => {
    const result = await run(['fetch', '--help'], {});

    expect(result.code).toBe(EXIT_OK);
    expect(result.stdout).toContain('--actions-limit <n>');
  });

  it('rejects an unknown command', async () => {
    const result = await run(['delete', 'abc123'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.stderr.startsWith('Unknown command "delete".\n')).toBe(true);
  });

  it('rejects an unknown option', async () => {
    const result = await run(['fetch', 'abc123', '--verbose'], ENV);

    expect(result.code).toBe(EXIT_USAGE);
    expect(result.trello.calls).toHaveLength(0);
  });
});
