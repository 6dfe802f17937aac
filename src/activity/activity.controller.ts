import { Controller, Get, Query, Req, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import {
  AuthenticatedRequest,
  SessionAuthGuard,
} from '../auth/guards/session-auth.guard';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import { successResponse } from '../common/responses/success-response';
import { ITEM_STATES } from './interfaces/activity-query.interface';
import { ActivityAggregatorService } from './services/activity-aggregator.service';

const activityQuerySchema = z.object({
  since: z.coerce.date().optional(),
  until: z.coerce.date().optional(),
  repo: z
    .string()
    // Neither segment may be `.` or `..`
    .regex(/^(?!\.{1,2}\/)[\w.-]+\/(?!\.{1,2}$)[\w.-]+$/, 'Expected owner/name')
    .optional(),
  state: z.enum(ITEM_STATES).optional(),
  author: z.string().min(1).optional(),
  username: z.string().min(1).optional(),
  page: z.coerce.number().int().min(1).default(1),
  per_page: z.coerce.number().int().min(1).max(100).default(30),
});

type ActivityQueryParams = z.infer<typeof activityQuerySchema>;

const queryPipe = new ZodValidationPipe(activityQuerySchema);

@Controller('github')
@UseGuards(SessionAuthGuard)
export class ActivityController {
  constructor(private readonly aggregator: ActivityAggregatorService) {}

  @Get('repos')
  async repositories(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const data = await this.aggregator.getRepositories(
      request.user.encryptedAccessToken,
      { since: query.since, page: query.page, perPage: query.per_page },
    );
    return successResponse('Repositories retrieved', data);
  }

  @Get('pushes')
  async pushes(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const data = await this.aggregator.getPushes(request.user.encryptedAccessToken, {
      repo: query.repo,
      // The public event feed belongs to the signed-in user unless asked otherwise
      username: query.username ?? request.user.username,
      since: query.since,
      until: query.until,
      page: query.page,
      perPage: query.per_page,
    });
    return successResponse('Push events retrieved', data);
  }

  @Get('pulls')
  async pullRequests(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const data = await this.aggregator.getPullRequests(
      request.user.encryptedAccessToken,
      {
        repo: query.repo,
        state: query.state,
        since: query.since,
        until: query.until,
        page: query.page,
        perPage: query.per_page,
      },
    );
    return successResponse('Pull requests retrieved', data);
  }

  @Get('issues')
  async issues(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const data = await this.aggregator.getIssues(request.user.encryptedAccessToken, {
      repo: query.repo,
      state: query.state,
      since: query.since,
      until: query.until,
      page: query.page,
      perPage: query.per_page,
    });
    return successResponse('Issues retrieved', data);
  }

  @Get('commits')
  async commits(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const data = await this.aggregator.getCommits(request.user.encryptedAccessToken, {
      repo: query.repo,
      author: query.author,
      since: query.since,
      until: query.until,
      page: query.page,
      perPage: query.per_page,
    });
    return successResponse('Commits retrieved', data);
  }

  @Get('activity')
  async activity(
    @Req() request: AuthenticatedRequest,
    @Query(queryPipe) query: ActivityQueryParams,
  ) {
    const summary = await this.aggregator.getUserActivity(
      request.user.encryptedAccessToken,
      {
        since: query.since,
        until: query.until,
        username: query.username ?? request.user.username,
      },
    );
    return successResponse('User activity retrieved', {
      repositories: summary.repositories,
      pushes: summary.pushes,
      pull_requests: summary.pullRequests,
      issues: summary.issues,
      commits: summary.commits,
      repositories_list: summary.repositoriesList.map((repository) => ({
        name: repository.name,
        updated_at: repository.updatedAt,
      })),
      recent_pushes: summary.recentPushes,
      recent_prs: summary.recentPullRequests,
      recent_issues: summary.recentIssues,
      recent_commits: summary.recentCommits,
    });
  }
}
