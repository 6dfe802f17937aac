import { Body, Controller, Get, Patch, Req, UseGuards } from '@nestjs/common';
import { z } from 'zod';
import {
  AuthenticatedRequest,
  SessionAuthGuard,
} from '../auth/guards/session-auth.guard';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  SuccessResponse,
  successResponse,
} from '../common/responses/success-response';
import {
  CADENCES,
  TONES,
  UserAccount,
} from './interfaces/user-account.interface';
import { UserAccountService } from './services/user-account.service';

const preferencesSchema = z
  .object({
    cadence: z.enum(CADENCES).optional(),
    tone: z.enum(TONES).optional(),
    emojis: z.boolean().optional(),
    hashtags: z.boolean().optional(),
  })
  .strict()
  .refine((value) => Object.keys(value).length > 0, {
    message: 'At least one preference is required',
  });

export interface UserProfileResponse {
  id: string;
  github_id: number;
  username: string;
  email: string | null;
  name: string | null;
  avatar_url: string | null;
  public_repos: number | null;
  private_repos: number | null;
  followers: number | null;
  following: number | null;
  cadence: string;
  tone: string;
  emojis: boolean;
  hashtags: boolean;
  created_at: string;
  updated_at: string;
}

// Token fields never leave the service
function toProfileResponse(account: UserAccount): UserProfileResponse {
  return {
    id: account.id,
    github_id: account.githubId,
    username: account.username,
    email: account.email,
    name: account.name,
    avatar_url: account.avatarUrl,
    public_repos: account.publicRepos,
    private_repos: account.privateRepos,
    followers: account.followers,
    following: account.following,
    cadence: account.preferences.cadence,
    tone: account.preferences.tone,
    emojis: account.preferences.emojis,
    hashtags: account.preferences.hashtags,
    created_at: account.createdAt.toISOString(),
    updated_at: account.updatedAt.toISOString(),
  };
}

@Controller('users')
@UseGuards(SessionAuthGuard)
export class AccountController {
  constructor(private readonly accounts: UserAccountService) {}

  @Get('me')
  me(@Req() request: AuthenticatedRequest): SuccessResponse<UserProfileResponse> {
    return successResponse('User profile retrieved', toProfileResponse(request.user));
  }

  @Patch('me/preferences')
  async updatePreferences(
    @Req() request: AuthenticatedRequest,
    @Body(new ZodValidationPipe(preferencesSchema))
    body: z.infer<typeof preferencesSchema>,
  ): Promise<SuccessResponse<UserProfileResponse>> {
    const account = await this.accounts.updatePreferences(request.user.id, body);
    return successResponse('Preferences updated', toProfileResponse(account));
  }
}
