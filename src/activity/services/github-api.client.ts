import { Inject, Injectable, Logger } from '@nestjs/common';
import { FetchFn, GITHUB_ACTIVITY_OPTIONS, HTTP_FETCH } from '../../common/constants';
import {
  InvalidCredentialError,
  RateLimitedError,
  UpstreamError,
  UpstreamUnavailableError,
  describeError,
} from '../../common/errors/github-activity.errors';
import { createLogger, LoggingOptions } from '../../common/utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

export type QueryParams = Record<string, string | number | boolean | undefined>;

export interface RequestOptions {
  timeoutMs?: number;
}

export interface GitHubApiClientOptions {
  github: Pick<ResolvedGitHubActivityOptions['github'], 'apiBaseUrl'>;
  /** `dataMs` applies when a call passes no timeout of its own. */
  timeouts: Pick<ResolvedGitHubActivityOptions['timeouts'], 'dataMs'>;
  logging?: LoggingOptions;
}

const PAGE_SIZE = 100;

/**
 * Thin authenticated client for the GitHub REST API. Every failure is
 * classified into one of the library errors; transport errors never escape
 * as-is.
 */
@Injectable()
export class GitHubApiClient {
  private readonly logger: Logger;

  constructor(
    @Inject(HTTP_FETCH) private readonly fetchFn: FetchFn,
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    private readonly options: GitHubApiClientOptions,
  ) {
    this.logger = createLogger(GitHubApiClient.name, options.logging);
  }

  /**
   * Perform one call. GET and DELETE send `params` as the query string,
   * other methods as a JSON body. Resolves to the parsed JSON (or `null` for
   * an empty body).
   */
  async request(
    token: string,
    method: HttpMethod,
    endpoint: string,
    params: QueryParams = {},
    options: RequestOptions = {},
  ): Promise<unknown> {
    const url = new URL(endpoint.replace(/^\/+/, ''), this.baseUrl());
    const headers: Record<string, string> = {
      Authorization: `Bearer ${token}`,
      Accept: 'application/vnd.github+json',
      'X-GitHub-Api-Version': '2022-11-28',
    };
    let body: string | undefined;

    if (method === 'GET' || method === 'DELETE') {
      for (const [key, value] of Object.entries(params)) {
        if (value !== undefined) {
          url.searchParams.set(key, String(value));
        }
      }
    } else {
      body = JSON.stringify(params);
      headers['Content-Type'] = 'application/json';
    }

    let response: Response;
    let text: string;
    try {
      response = await this.fetchFn(url.toString(), {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(
          options.timeoutMs ?? this.options.timeouts.dataMs,
        ),
      });
      text = await response.text();
    } catch (error) {
      this.logger.error(
        `GitHub request ${method} ${endpoint} failed: ${describeError(error)}`,
      );
      throw new UpstreamUnavailableError('Failed to connect to GitHub', {
        cause: error,
      });
    }

    if (!response.ok) {
      throw this.classifyFailure(response, text, method, endpoint);
    }

    if (text.length === 0) {
      return null;
    }
    try {
      return JSON.parse(text);
    } catch {
      this.logger.error(`GitHub returned non-JSON body for ${method} ${endpoint}`);
      throw new UpstreamError('Invalid response from GitHub', response.status);
    }
  }

  /**
   * Walk pages 1..maxPages at 100 items per page, stopping at the first
   * short page.
   */
  async fetchAllPages(
    token: string,
    endpoint: string,
    params: QueryParams = {},
    maxPages = 10,
    options: RequestOptions = {},
  ): Promise<unknown[]> {
    const items: unknown[] = [];

    for (let page = 1; page <= maxPages; page++) {
      const body = await this.request(
        token,
        'GET',
        endpoint,
        { ...params, page, per_page: PAGE_SIZE },
        options,
      );
      if (!Array.isArray(body)) {
        this.logger.error(`Expected a list from ${endpoint}, page ${page}`);
        throw new UpstreamError('Unexpected response from GitHub', 200);
      }

      items.push(...body);
      if (body.length < PAGE_SIZE) {
        break;
      }
    }

    return items;
  }

  private classifyFailure(
    response: Response,
    text: string,
    method: HttpMethod,
    endpoint: string,
  ): Error {
    const status = response.status;

    if (status === 403 && text.toLowerCase().includes('rate limit')) {
      const reset = Number(response.headers.get('x-ratelimit-reset'));
      const resetAt = Number.isFinite(reset) && reset > 0 ? new Date(reset * 1000) : undefined;
      this.logger.warn(
        `GitHub API rate limit exceeded${resetAt ? `, resets at ${resetAt.toISOString()}` : ''}`,
      );
      return new RateLimitedError(
        'GitHub API rate limit exceeded. Please try again later.',
        resetAt,
      );
    }

    if (status === 401) {
      this.logger.warn(`GitHub rejected the token for ${method} ${endpoint}`);
      return new InvalidCredentialError();
    }

    this.logger.error(`GitHub API error ${status} for ${method} ${endpoint}`);
    return new UpstreamError(`GitHub API error: ${status}`, status);
  }

  private baseUrl(): string {
    const base = this.options.github.apiBaseUrl;
    return base.endsWith('/') ? base : `${base}/`;
  }
}
