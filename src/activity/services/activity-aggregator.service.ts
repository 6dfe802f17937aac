import { Inject, Injectable, Logger } from '@nestjs/common';
import { z } from 'zod';
import { TokenCipherService } from '../../auth/services/token-cipher.service';
import { GITHUB_ACTIVITY_OPTIONS } from '../../common/constants';
import {
  UpstreamError,
  describeError,
} from '../../common/errors/github-activity.errors';
import { settleWithConcurrency } from '../../common/utils/fan-out';
import { createLogger } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';
import type {
  ActivityQuery,
  ActivitySummary,
  CommitQuery,
  IssueQuery,
  PageOptions,
  PullRequestQuery,
  PushQuery,
  RepositoryQuery,
  TimeWindow,
} from '../interfaces/activity-query.interface';
import {
  commitSchema,
  eventSchema,
  GitHubCommit,
  GitHubEvent,
  GitHubIssue,
  GitHubPullRequest,
  GitHubRepository,
  issueSchema,
  pullRequestSchema,
  repositorySchema,
  userLoginSchema,
} from '../interfaces/github-resources';
import { GitHubApiClient, QueryParams } from './github-api.client';

export type ActivityAggregatorOptions = Pick<
  ResolvedGitHubActivityOptions,
  'aggregation' | 'logging'
>;

const DEFAULT_PAGE = 1;
const DEFAULT_PER_PAGE = 30;
const MAX_PER_PAGE = 100;
const SUMMARY_PER_PAGE = 100;
const RECENT_ITEMS = 10;

interface PageWindow {
  page: number;
  perPage: number;
}

/**
 * Reads a user's GitHub activity with their stored (encrypted) token.
 *
 * Queries scoped to one repository go straight to GitHub. Without a
 * repository, pull requests, issues and commits fan out over the user's
 * repositories with bounded concurrency; a repository that fails is logged
 * and skipped, and the merged result is sorted newest first before the
 * requested page is cut.
 */
@Injectable()
export class ActivityAggregatorService {
  private readonly logger: Logger;

  constructor(
    private readonly client: GitHubApiClient,
    private readonly cipher: TokenCipherService,
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    private readonly options: ActivityAggregatorOptions,
  ) {
    this.logger = createLogger(ActivityAggregatorService.name, options.logging);
  }

  async getRepositories(
    encryptedToken: string,
    query: RepositoryQuery = {},
  ): Promise<GitHubRepository[]> {
    return this.listRepositories(this.cipher.decrypt(encryptedToken), query);
  }

  async getPushes(encryptedToken: string, query: PushQuery = {}): Promise<GitHubEvent[]> {
    return this.listPushes(this.cipher.decrypt(encryptedToken), query);
  }

  async getPullRequests(
    encryptedToken: string,
    query: PullRequestQuery = {},
  ): Promise<GitHubPullRequest[]> {
    return this.listPullRequests(this.cipher.decrypt(encryptedToken), query);
  }

  async getIssues(encryptedToken: string, query: IssueQuery = {}): Promise<GitHubIssue[]> {
    return this.listIssues(this.cipher.decrypt(encryptedToken), query);
  }

  async getCommits(encryptedToken: string, query: CommitQuery = {}): Promise<GitHubCommit[]> {
    return this.listCommits(this.cipher.decrypt(encryptedToken), query);
  }

  /**
   * Counts plus the most recent items of each kind. The five queries run
   * independently; they are not a consistent snapshot.
   */
  async getUserActivity(
    encryptedToken: string,
    query: ActivityQuery = {},
  ): Promise<ActivitySummary> {
    const token = this.cipher.decrypt(encryptedToken);
    const window = { since: query.since, until: query.until };
    const fanOutRepositories = await this.listFanOutRepositories(token);

    const [repositories, pushes, pullRequests, issues, commits] = await Promise.all([
      this.listRepositories(token, { since: query.since, perPage: SUMMARY_PER_PAGE }),
      this.listPushes(token, { ...window, username: query.username, perPage: SUMMARY_PER_PAGE }),
      this.listPullRequests(
        token,
        { ...window, state: 'all', perPage: SUMMARY_PER_PAGE },
        fanOutRepositories,
      ),
      this.listIssues(
        token,
        { ...window, state: 'all', perPage: SUMMARY_PER_PAGE },
        fanOutRepositories,
      ),
      this.listCommits(token, { ...window, perPage: SUMMARY_PER_PAGE }, fanOutRepositories),
    ]);

    return {
      repositories: repositories.length,
      pushes: pushes.length,
      pullRequests: pullRequests.length,
      issues: issues.length,
      commits: commits.length,
      repositoriesList: repositories.slice(0, RECENT_ITEMS).map((repository) => ({
        name: repository.full_name,
        updatedAt: repository.updated_at,
      })),
      recentPushes: pushes.slice(0, RECENT_ITEMS),
      recentPullRequests: pullRequests.slice(0, RECENT_ITEMS),
      recentIssues: issues.slice(0, RECENT_ITEMS),
      recentCommits: commits.slice(0, RECENT_ITEMS),
    };
  }

  private async listRepositories(
    token: string,
    query: RepositoryQuery,
  ): Promise<GitHubRepository[]> {
    const { page, perPage } = resolveWindow(query);
    const body = await this.client.request(token, 'GET', '/user/repos', {
      sort: 'updated',
      direction: 'desc',
      since: query.since?.toISOString(),
      page,
      per_page: perPage,
    });
    return parseList(repositorySchema, body, '/user/repos');
  }

  private async listPushes(token: string, query: PushQuery): Promise<GitHubEvent[]> {
    const { page, perPage } = resolveWindow(query);

    let endpoint: string;
    if (query.repo) {
      endpoint = `/repos/${query.repo}/events`;
    } else {
      const username = query.username ?? (await this.resolveUsername(token));
      endpoint = `/users/${encodeURIComponent(username)}/events/public`;
    }

    const body = await this.client.request(token, 'GET', endpoint, {
      page,
      per_page: perPage,
    });
    return parseList(eventSchema, body, endpoint).filter(
      (event) =>
        event.type === 'PushEvent' && withinWindow(event.created_at, query),
    );
  }

  private async listPullRequests(
    token: string,
    query: PullRequestQuery,
    repositories?: GitHubRepository[],
  ): Promise<GitHubPullRequest[]> {
    const fetchForRepository = async (repo: string, perPage: number, page: number) => {
      const endpoint = `/repos/${repo}/pulls`;
      const body = await this.client.request(token, 'GET', endpoint, {
        state: query.state ?? 'all',
        sort: 'updated',
        direction: 'desc',
        page,
        per_page: perPage,
      });
      return parseList(pullRequestSchema, body, endpoint).filter((pr) =>
        withinWindow(pr.updated_at, query),
      );
    };

    return this.queryRepositories(
      token,
      query,
      'pull requests',
      fetchForRepository,
      (pr) => pr.updated_at,
      repositories,
    );
  }

  private async listIssues(
    token: string,
    query: IssueQuery,
    repositories?: GitHubRepository[],
  ): Promise<GitHubIssue[]> {
    const fetchForRepository = async (repo: string, perPage: number, page: number) => {
      const endpoint = `/repos/${repo}/issues`;
      const body = await this.client.request(token, 'GET', endpoint, {
        state: query.state ?? 'all',
        sort: 'updated',
        direction: 'desc',
        page,
        per_page: perPage,
      });
      // The issues endpoint also lists pull requests
      return parseList(issueSchema, body, endpoint).filter(
        (issue) =>
          issue.pull_request === undefined && withinWindow(issue.updated_at, query),
      );
    };

    return this.queryRepositories(
      token,
      query,
      'issues',
      fetchForRepository,
      (issue) => issue.updated_at,
      repositories,
    );
  }

  private async listCommits(
    token: string,
    query: CommitQuery,
    repositories?: GitHubRepository[],
  ): Promise<GitHubCommit[]> {
    const fetchForRepository = async (repo: string, perPage: number, page: number) => {
      const endpoint = `/repos/${repo}/commits`;
      const params: QueryParams = {
        since: query.since?.toISOString(),
        until: query.until?.toISOString(),
        author: query.author,
        page,
        per_page: perPage,
      };
      const body = await this.client.request(token, 'GET', endpoint, params);
      return parseList(commitSchema, body, endpoint);
    };

    return this.queryRepositories(
      token,
      query,
      'commits',
      fetchForRepository,
      (commit) => commit.commit.author?.date,
      repositories,
    );
  }

  /**
   * One repository: a single upstream page. All repositories: the first
   * `page * perPage` items of each, merged newest first, then windowed.
   */
  private async queryRepositories<T>(
    token: string,
    query: PageOptions & { repo?: string },
    resource: string,
    fetchForRepository: (repo: string, perPage: number, page: number) => Promise<T[]>,
    timestampOf: (item: T) => string | undefined,
    repositories?: GitHubRepository[],
  ): Promise<T[]> {
    const { page, perPage } = resolveWindow(query);

    if (query.repo) {
      return fetchForRepository(query.repo, perPage, page);
    }

    const targets = repositories ?? (await this.listFanOutRepositories(token));
    const perRepository = Math.min(MAX_PER_PAGE, page * perPage);

    const settled = await settleWithConcurrency(
      targets,
      this.options.aggregation.fanOutConcurrency,
      (repository) => fetchForRepository(repository.full_name, perRepository, 1),
    );

    const merged: T[] = [];
    settled.forEach((result, index) => {
      if (result.status === 'fulfilled') {
        merged.push(...result.value);
      } else {
        this.logger.warn(
          `Failed to fetch ${resource} for ${targets[index].full_name}: ${describeError(result.reason)}`,
        );
      }
    });

    merged.sort((a, b) => toMillis(timestampOf(b)) - toMillis(timestampOf(a)));
    const start = (page - 1) * perPage;
    return merged.slice(start, start + perPage);
  }

  private async listFanOutRepositories(token: string): Promise<GitHubRepository[]> {
    return this.listRepositories(token, {
      page: 1,
      perPage: Math.min(MAX_PER_PAGE, this.options.aggregation.maxRepositories),
    });
  }

  private async resolveUsername(token: string): Promise<string> {
    const body = await this.client.request(token, 'GET', '/user');
    const parsed = userLoginSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error('GitHub /user response has no login');
      throw new UpstreamError('Unexpected response from GitHub', 200);
    }
    return parsed.data.login;
  }
}

function resolveWindow(options: PageOptions): PageWindow {
  const page = Math.max(DEFAULT_PAGE, Math.floor(options.page ?? DEFAULT_PAGE));
  const perPage = Math.min(
    MAX_PER_PAGE,
    Math.max(1, Math.floor(options.perPage ?? DEFAULT_PER_PAGE)),
  );
  return { page, perPage };
}

function parseList<S extends z.ZodTypeAny>(
  schema: S,
  body: unknown,
  endpoint: string,
): Array<z.infer<S>> {
  const parsed = z.array(schema).safeParse(body);
  if (!parsed.success) {
    throw new UpstreamError(`Unexpected response from GitHub for ${endpoint}`, 200);
  }
  return parsed.data;
}

function withinWindow(timestamp: string, window: TimeWindow): boolean {
  const at = Date.parse(timestamp);
  if (window.since && at < window.since.getTime()) {
    return false;
  }
  if (window.until && at > window.until.getTime()) {
    return false;
  }
  return true;
}

function toMillis(timestamp: string | undefined): number {
  if (!timestamp) {
    return 0;
  }
  const value = Date.parse(timestamp);
  return Number.isNaN(value) ? 0 : value;
}
