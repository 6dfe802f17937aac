import 'reflect-metadata';
import { INestApplication } from '@nestjs/common';
import { Test } from '@nestjs/testing';
import request from 'supertest';
import { HTTP_FETCH, SLEEP } from '../src/common/constants';
import { GitHubActivityModule } from '../src/github-activity.module';
import {
  RecordingSleep,
  ScriptedFetch,
  TEST_MODULE_OPTIONS,
  jsonResponse,
  scriptSignIn,
} from './utils';

const ALPHA = { full_name: 'octo-test/alpha', updated_at: '2026-10-05T00:00:00Z' };
const BETA = { full_name: 'octo-test/beta', updated_at: '2026-09-20T00:00:00Z' };

describe('GitHub activity (e2e)', () => {
  let app: INestApplication;
  let scripted: ScriptedFetch;
  let token: string;

  beforeEach(async () => {
    scripted = scriptSignIn(new ScriptedFetch());

    const moduleFixture = await Test.createTestingModule({
      imports: [GitHubActivityModule.forRoot(TEST_MODULE_OPTIONS)],
    })
      .overrideProvider(HTTP_FETCH)
      .useValue(scripted.fetch)
      .overrideProvider(SLEEP)
      .useValue(new RecordingSleep().sleep)
      .compile();

    app = moduleFixture.createNestApplication({ logger: false });
    await app.init();

    const response = await request(app.getHttpServer())
      .get('/auth/github/callback')
      .query({ code: 'test-code' })
      .expect(200);
    token = response.body.data.access_token;
  });

  afterEach(async () => {
    await app.close();
  });

  function get(path: string) {
    return request(app.getHttpServer())
      .get(path)
      .set('Authorization', `Bearer ${token}`);
  }

  it('should require a session token', async () => {
    const response = await request(app.getHttpServer())
      .get('/github/repos')
      .expect(401);

    expect(response.body).toEqual({
      success: false,
      status_code: 401,
      message: 'Access token required',
      code: 'invalid_token',
    });
  });

  describe('GET /github/repos', () => {
    it('should list repositories with the decrypted GitHub token', async () => {
      scripted.on('GET', '/user/repos', () => jsonResponse([ALPHA, BETA]));

      const response = await get('/github/repos')
        .query({ page: 2, per_page: 2 })
        .expect(200);

      expect(response.body).toEqual({
        success: true,
        status_code: 200,
        message: 'Repositories retrieved',
        data: [ALPHA, BETA],
      });

      const [call] = scripted.calls('GET', '/user/repos');
      expect(call.headers.get('authorization')).toBe('Bearer gho-test-token');
      expect(call.url.searchParams.get('sort')).toBe('updated');
      expect(call.url.searchParams.get('page')).toBe('2');
      expect(call.url.searchParams.get('per_page')).toBe('2');
    });

    it('should map a rejected GitHub token to 401', async () => {
      scripted.on('GET', '/user/repos', () =>
        jsonResponse({ message: 'Bad credentials' }, 401),
      );

      const response = await get('/github/repos').expect(401);

      expect(response.body).toEqual({
        success: false,
        status_code: 401,
        message: 'GitHub token is invalid or expired',
        code: 'invalid_credential',
      });
    });

    it('should map rate limiting to 429', async () => {
      scripted.on('GET', '/user/repos', () =>
        jsonResponse({ message: 'API rate limit exceeded for user' }, 403, {
          'x-ratelimit-reset': '1790000000',
        }),
      );

      const response = await get('/github/repos').expect(429);

      expect(response.body).toEqual({
        success: false,
        status_code: 429,
        message: 'GitHub API rate limit exceeded. Please try again later.',
        code: 'rate_limited',
      });
    });
  });

  describe('GET /github/pushes', () => {
    it("should read the signed-in user's public events by default", async () => {
      scripted.on('GET', '/users/octo-test/events/public', () =>
        jsonResponse([
          { id: '3', type: 'PushEvent', created_at: '2026-10-04T12:00:00Z' },
          { id: '2', type: 'WatchEvent', created_at: '2026-10-03T12:00:00Z' },
          { id: '1', type: 'PushEvent', created_at: '2026-09-01T12:00:00Z' },
        ]),
      );

      const response = await get('/github/pushes')
        .query({ since: '2026-10-01T00:00:00Z' })
        .expect(200);

      expect(response.body.message).toBe('Push events retrieved');
      expect(response.body.data).toEqual([
        { id: '3', type: 'PushEvent', created_at: '2026-10-04T12:00:00Z' },
      ]);
    });
  });

  describe('GET /github/pulls', () => {
    it('should query a single repository', async () => {
      scripted.on('GET', '/repos/octo-test/alpha/pulls', () =>
        jsonResponse([{ number: 7, updated_at: '2026-10-02T00:00:00Z' }]),
      );

      const response = await get('/github/pulls')
        .query({ repo: 'octo-test/alpha', state: 'open' })
        .expect(200);

      expect(response.body.data).toEqual([
        { number: 7, updated_at: '2026-10-02T00:00:00Z' },
      ]);
      const [call] = scripted.calls('GET', '/repos/octo-test/alpha/pulls');
      expect(call.url.searchParams.get('state')).toBe('open');
      expect(call.url.searchParams.get('per_page')).toBe('30');
      expect(scripted.calls('GET', '/user/repos')).toHaveLength(0);
    });
  });

  describe('GET /github/issues', () => {
    it('should merge issues across repositories and skip failing ones', async () => {
      scripted
        .on('GET', '/user/repos', () => jsonResponse([ALPHA, BETA]))
        .on('GET', '/repos/octo-test/alpha/issues', () =>
          jsonResponse([
            { number: 1, updated_at: '2026-10-01T00:00:00Z' },
            { number: 2, updated_at: '2026-10-04T00:00:00Z', pull_request: {} },
          ]),
        )
        .on('GET', '/repos/octo-test/beta/issues', () =>
          jsonResponse({ message: 'Server Error' }, 500),
        );

      const response = await get('/github/issues').expect(200);

      expect(response.body).toEqual({
        success: true,
        status_code: 200,
        message: 'Issues retrieved',
        data: [{ number: 1, updated_at: '2026-10-01T00:00:00Z' }],
      });
    });
  });

  describe('GET /github/commits', () => {
    it('should pass the time window and author upstream', async () => {
      scripted.on('GET', '/repos/octo-test/alpha/commits', () =>
        jsonResponse([
          { sha: 'abc123', commit: { author: { date: '2026-10-02T08:00:00Z' } } },
        ]),
      );

      const response = await get('/github/commits')
        .query({
          repo: 'octo-test/alpha',
          author: 'octo-test',
          since: '2026-10-01T00:00:00Z',
          until: '2026-10-03T00:00:00Z',
        })
        .expect(200);

      expect(response.body.data).toEqual([
        { sha: 'abc123', commit: { author: { date: '2026-10-02T08:00:00Z' } } },
      ]);
      const [call] = scripted.calls('GET', '/repos/octo-test/alpha/commits');
      expect(call.url.searchParams.get('since')).toBe('2026-10-01T00:00:00.000Z');
      expect(call.url.searchParams.get('until')).toBe('2026-10-03T00:00:00.000Z');
      expect(call.url.searchParams.get('author')).toBe('octo-test');
    });
  });

  describe('GET /github/activity', () => {
    it('should summarize activity across repositories', async () => {
      scripted
        .on('GET', '/user/repos', () => jsonResponse([ALPHA]))
        .on('GET', '/users/octo-test/events/public', () =>
          jsonResponse([
            { id: '9', type: 'PushEvent', created_at: '2026-10-04T12:00:00Z' },
          ]),
        )
        .on('GET', '/repos/octo-test/alpha/pulls', () =>
          jsonResponse([
            { number: 3, updated_at: '2026-10-03T00:00:00Z' },
            { number: 4, updated_at: '2026-10-04T00:00:00Z' },
          ]),
        )
        .on('GET', '/repos/octo-test/alpha/issues', () =>
          jsonResponse([{ number: 5, updated_at: '2026-10-02T00:00:00Z' }]),
        )
        .on('GET', '/repos/octo-test/alpha/commits', () => jsonResponse([]));

      const response = await get('/github/activity').expect(200);

      expect(response.body.message).toBe('User activity retrieved');
      expect(response.body.data).toEqual({
        repositories: 1,
        pushes: 1,
        pull_requests: 2,
        issues: 1,
        commits: 0,
        repositories_list: [
          { name: 'octo-test/alpha', updated_at: '2026-10-05T00:00:00Z' },
        ],
        recent_pushes: [
          { id: '9', type: 'PushEvent', created_at: '2026-10-04T12:00:00Z' },
        ],
        recent_prs: [
          { number: 4, updated_at: '2026-10-04T00:00:00Z' },
          { number: 3, updated_at: '2026-10-03T00:00:00Z' },
        ],
        recent_issues: [{ number: 5, updated_at: '2026-10-02T00:00:00Z' }],
        recent_commits: [],
      });
    });
  });

  describe('query validation', () => {
    it('should reject per_page above 100', async () => {
      const response = await get('/github/repos')
        .query({ per_page: 500 })
        .expect(422);

      expect(response.body.message).toBe('Validation failed');
      expect(Object.keys(response.body.errors)).toEqual(['per_page']);
    });

    it('should reject a repository that is not owner/name', async () => {
      const response = await get('/github/pulls')
        .query({ repo: 'alpha' })
        .expect(422);

      expect(response.body.errors).toEqual({ repo: ['Expected owner/name'] });
    });

    it.each(['../..', 'octo-test/..', './alpha'])(
      'should reject the path segment repository %s',
      async (repo) => {
        const response = await get('/github/commits').query({ repo }).expect(422);

        expect(response.body.errors).toEqual({ repo: ['Expected owner/name'] });
        expect(
          scripted.requests.filter((call) => call.url.pathname.startsWith('/repos/')),
        ).toEqual([]);
      },
    );

    it('should reject an unknown state', async () => {
      const response = await get('/github/issues')
        .query({ state: 'merged' })
        .expect(422);

      expect(Object.keys(response.body.errors)).toEqual(['state']);
    });
  });
});
