import type {
  GitHubCommit,
  GitHubEvent,
  GitHubIssue,
  GitHubPullRequest,
} from './github-resources';

export const ITEM_STATES = ['open', 'closed', 'all'] as const;
export type ItemState = (typeof ITEM_STATES)[number];

export interface TimeWindow {
  since?: Date;
  until?: Date;
}

export interface PageOptions {
  /** 1-based, defaults to 1. */
  page?: number;
  /** 1..100, defaults to 30. */
  perPage?: number;
}

export interface RepositoryQuery extends PageOptions {
  since?: Date;
}

export interface PushQuery extends TimeWindow, PageOptions {
  /** `owner/name`; without it the user's public event feed is read. */
  repo?: string;
  username?: string;
}

export interface PullRequestQuery extends TimeWindow, PageOptions {
  repo?: string;
  state?: ItemState;
}

export type IssueQuery = PullRequestQuery;

export interface CommitQuery extends TimeWindow, PageOptions {
  repo?: string;
  author?: string;
}

export interface ActivityQuery extends TimeWindow {
  username?: string;
}

export interface ActivitySummary {
  repositories: number;
  pushes: number;
  pullRequests: number;
  issues: number;
  commits: number;
  repositoriesList: Array<{ name: string; updatedAt: string }>;
  recentPushes: GitHubEvent[];
  recentPullRequests: GitHubPullRequest[];
  recentIssues: GitHubIssue[];
  recentCommits: GitHubCommit[];
}
