import { jsonResponse, ScriptedFetch } from '../../../tests/utils';
import { TokenCipherService } from '../../auth/services/token-cipher.service';
import { EncryptionError } from '../../common/errors/github-activity.errors';
import { ActivityAggregatorService } from './activity-aggregator.service';
import { GitHubApiClient } from './github-api.client';

function repo(fullName: string, updatedAt = '2024-01-10T00:00:00Z') {
  return { id: fullName.length, name: fullName.split('/')[1], full_name: fullName, updated_at: updatedAt };
}

function pull(number: number, updatedAt: string) {
  return { number, title: `PR ${number}`, updated_at: updatedAt };
}

function commit(sha: string, date: string) {
  return { sha, commit: { message: sha, author: { name: 'octo', date } } };
}

describe('ActivityAggregatorService', () => {
  let github: ScriptedFetch;
  let cipher: TokenCipherService;
  let encryptedToken: string;

  const createAggregator = (fanOutConcurrency = 5) =>
    new ActivityAggregatorService(
      new GitHubApiClient(
        github.fetch,
        {
          github: { apiBaseUrl: 'https://api.github.test' },
          timeouts: { dataMs: 30_000 },
          logging: false,
        },
      ),
      cipher,
      { aggregation: { fanOutConcurrency, maxRepositories: 100 }, logging: false },
    );

  beforeEach(() => {
    github = new ScriptedFetch();
    cipher = new TokenCipherService({
      encryption: { secret: 'test-secret' },
      logging: false,
    });
    encryptedToken = cipher.encrypt('gho_test');
  });

  it('should use the decrypted token and list repositories by recent update', async () => {
    github.on('GET', '/user/repos', () => jsonResponse([repo('octo/demo')]));

    const repositories = await createAggregator().getRepositories(encryptedToken, {
      since: new Date('2024-01-01T00:00:00Z'),
      page: 2,
      perPage: 10,
    });

    expect(repositories.map((r) => r.full_name)).toEqual(['octo/demo']);
    const [call] = github.calls('GET', '/user/repos');
    expect(call.headers.get('authorization')).toBe('Bearer gho_test');
    expect(Object.fromEntries(call.url.searchParams)).toEqual({
      sort: 'updated',
      direction: 'desc',
      since: '2024-01-01T00:00:00.000Z',
      page: '2',
      per_page: '10',
    });
  });

  it('should refuse a token that does not decrypt', async () => {
    await expect(
      createAggregator().getRepositories('00:11:22'),
    ).rejects.toBeInstanceOf(EncryptionError);
    expect(github.requests).toHaveLength(0);
  });

  describe('getPushes', () => {
    const events = [
      { id: '1', type: 'PushEvent', created_at: '2024-01-01T00:00:00Z' },
      { id: '2', type: 'PushEvent', created_at: '2024-01-02T12:00:00Z' },
      { id: '3', type: 'WatchEvent', created_at: '2024-01-02T13:00:00Z' },
      { id: '4', type: 'PushEvent', created_at: '2024-01-04T00:00:00Z' },
    ];

    it('should resolve the username and keep push events inside the window', async () => {
      github
        .on('GET', '/user', () => jsonResponse({ id: 42, login: 'octo-test' }))
        .on('GET', '/users/octo-test/events/public', () => jsonResponse(events));

      const pushes = await createAggregator().getPushes(encryptedToken, {
        since: new Date('2024-01-02T00:00:00Z'),
        until: new Date('2024-01-03T00:00:00Z'),
      });

      expect(pushes.map((event) => event.id)).toEqual(['2']);
    });

    it('should read repository events when a repo is given', async () => {
      github.on('GET', '/repos/octo/demo/events', () => jsonResponse(events));

      const pushes = await createAggregator().getPushes(encryptedToken, {
        repo: 'octo/demo',
      });

      expect(pushes.map((event) => event.id)).toEqual(['1', '2', '4']);
      expect(github.calls('GET', '/user')).toHaveLength(0);
    });
  });

  describe('fan-out across repositories', () => {
    beforeEach(() => {
      github.on('GET', '/user/repos', () =>
        jsonResponse([repo('octo/one'), repo('octo/two'), repo('octo/three')]),
      );
    });

    it('should drop a failing repository and sort the rest newest first', async () => {
      github
        .on('GET', '/repos/octo/one/pulls', () =>
          jsonResponse([pull(1, '2024-01-05T00:00:00Z'), pull(2, '2024-01-01T00:00:00Z')]),
        )
        .on('GET', '/repos/octo/two/pulls', () => jsonResponse({ message: 'boom' }, 500))
        .on('GET', '/repos/octo/three/pulls', () =>
          jsonResponse([
            pull(10, '2024-01-04T00:00:00Z'),
            pull(11, '2024-01-03T00:00:00Z'),
            pull(12, '2024-01-02T00:00:00Z'),
          ]),
        );

      const aggregator = createAggregator();
      const firstPage = await aggregator.getPullRequests(encryptedToken, { perPage: 2 });
      const secondPage = await aggregator.getPullRequests(encryptedToken, {
        page: 2,
        perPage: 2,
      });

      expect(firstPage.map((pr) => pr.number)).toEqual([1, 10]);
      expect(secondPage.map((pr) => pr.number)).toEqual([11, 12]);

      const threeCalls = github.calls('GET', '/repos/octo/three/pulls');
      expect(threeCalls[1].url.searchParams.get('per_page')).toBe('4');
      expect(threeCalls[1].url.searchParams.get('state')).toBe('all');
      expect(github.calls('GET', '/user/repos')[0].url.searchParams.get('per_page')).toBe(
        '100',
      );
    });

    it('should exclude pull requests from issues', async () => {
      github
        .on('GET', '/repos/octo/one/issues', () =>
          jsonResponse([
            { number: 1, updated_at: '2024-01-02T00:00:00Z' },
            { number: 2, updated_at: '2024-01-03T00:00:00Z', pull_request: { url: 'x' } },
          ]),
        )
        .on('GET', '/repos/octo/two/issues', () => jsonResponse([]))
        .on('GET', '/repos/octo/three/issues', () =>
          jsonResponse([{ number: 3, updated_at: '2024-01-04T00:00:00Z' }]),
        );

      const issues = await createAggregator().getIssues(encryptedToken, { state: 'open' });

      expect(issues.map((issue) => issue.number)).toEqual([3, 1]);
      expect(
        github.calls('GET', '/repos/octo/one/issues')[0].url.searchParams.get('state'),
      ).toBe('open');
    });

    it('should pass the commit window upstream and sort by author date', async () => {
      github
        .on('GET', '/repos/octo/one/commits', () =>
          jsonResponse([commit('a1', '2024-01-02T00:00:00Z')]),
        )
        .on('GET', '/repos/octo/two/commits', () =>
          jsonResponse([commit('b1', '2024-01-03T00:00:00Z')]),
        )
        .on('GET', '/repos/octo/three/commits', () => jsonResponse([], 409));

      const commits = await createAggregator().getCommits(encryptedToken, {
        since: new Date('2024-01-01T00:00:00Z'),
        until: new Date('2024-01-31T00:00:00Z'),
        author: 'octo-test',
      });

      expect(commits.map((c) => c.sha)).toEqual(['b1', 'a1']);
      const params = github.calls('GET', '/repos/octo/one/commits')[0].url.searchParams;
      expect(params.get('since')).toBe('2024-01-01T00:00:00.000Z');
      expect(params.get('until')).toBe('2024-01-31T00:00:00.000Z');
      expect(params.get('author')).toBe('octo-test');
    });

    it('should skip a repository whose commit request never reaches GitHub', async () => {
      github
        .on('GET', '/repos/octo/one/commits', () =>
          jsonResponse([
            commit('a1', '2024-01-02T00:00:00Z'),
            commit('a2', '2024-01-05T00:00:00Z'),
          ]),
        )
        .on('GET', '/repos/octo/two/commits', () => {
          throw new TypeError('fetch failed');
        })
        .on('GET', '/repos/octo/three/commits', () =>
          jsonResponse([commit('c1', '2024-01-04T00:00:00Z')]),
        );

      const commits = await createAggregator().getCommits(encryptedToken);

      expect(commits.map((c) => c.sha)).toEqual(['a2', 'c1', 'a1']);
      expect(github.calls('GET', '/repos/octo/two/commits')).toHaveLength(1);
    });

    it('should keep at most the configured number of repository calls in flight', async () => {
      let active = 0;
      let peak = 0;
      const slowEmpty = async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setImmediate(resolve));
        active--;
        return jsonResponse([]);
      };
      github
        .on('GET', '/repos/octo/one/pulls', slowEmpty)
        .on('GET', '/repos/octo/two/pulls', slowEmpty)
        .on('GET', '/repos/octo/three/pulls', slowEmpty);

      await createAggregator(2).getPullRequests(encryptedToken);

      expect(peak).toBe(2);
    });
  });

  it('should summarise activity with counts and recent items', async () => {
    github
      .on('GET', '/user/repos', () => jsonResponse([repo('octo-test/demo', '2024-01-09T00:00:00Z')]))
      .on('GET', '/user', () => jsonResponse({ login: 'octo-test' }))
      .on('GET', '/users/octo-test/events/public', () =>
        jsonResponse([
          { id: 'p1', type: 'PushEvent', created_at: '2024-01-05T00:00:00Z' },
          { id: 'w1', type: 'WatchEvent', created_at: '2024-01-05T00:00:00Z' },
        ]),
      )
      .on('GET', '/repos/octo-test/demo/pulls', () =>
        jsonResponse([pull(7, '2024-01-06T00:00:00Z')]),
      )
      .on('GET', '/repos/octo-test/demo/issues', () =>
        jsonResponse([
          { number: 8, updated_at: '2024-01-07T00:00:00Z' },
          { number: 7, updated_at: '2024-01-06T00:00:00Z', pull_request: {} },
        ]),
      )
      .on('GET', '/repos/octo-test/demo/commits', () =>
        jsonResponse([commit('c1', '2024-01-04T00:00:00Z'), commit('c2', '2024-01-08T00:00:00Z')]),
      );

    const summary = await createAggregator().getUserActivity(encryptedToken, {
      since: new Date('2024-01-01T00:00:00Z'),
    });

    expect(summary).toMatchObject({
      repositories: 1,
      pushes: 1,
      pullRequests: 1,
      issues: 1,
      commits: 2,
      repositoriesList: [{ name: 'octo-test/demo', updatedAt: '2024-01-09T00:00:00Z' }],
    });
    expect(summary.recentCommits.map((c) => c.sha)).toEqual(['c2', 'c1']);
    expect(summary.recentIssues.map((issue) => issue.number)).toEqual([8]);
    expect(github.calls('GET', '/user/repos')).toHaveLength(2);
    expect(github.calls('GET', '/repos/octo-test/demo/pulls')).toHaveLength(1);
  });
});
