import { z } from 'zod';

// Only the fields the aggregator reads are required; the rest passes through
// untouched to callers.

export const repositorySchema = z
  .object({
    id: z.number().optional(),
    name: z.string().optional(),
    full_name: z.string(),
    updated_at: z.string(),
  })
  .passthrough();

export const eventSchema = z
  .object({
    id: z.string().optional(),
    type: z.string().nullable(),
    created_at: z.string(),
  })
  .passthrough();

export const pullRequestSchema = z
  .object({
    number: z.number().optional(),
    updated_at: z.string(),
  })
  .passthrough();

export const issueSchema = z
  .object({
    number: z.number().optional(),
    updated_at: z.string(),
    pull_request: z.unknown().optional(),
  })
  .passthrough();

export const commitSchema = z
  .object({
    sha: z.string().optional(),
    commit: z
      .object({
        author: z.object({ date: z.string() }).passthrough().nullable(),
      })
      .passthrough(),
  })
  .passthrough();

export const userLoginSchema = z.object({ login: z.string() }).passthrough();

export type GitHubRepository = z.infer<typeof repositorySchema>;
export type GitHubEvent = z.infer<typeof eventSchema>;
export type GitHubPullRequest = z.infer<typeof pullRequestSchema>;
export type GitHubIssue = z.infer<typeof issueSchema>;
export type GitHubCommit = z.infer<typeof commitSchema>;
