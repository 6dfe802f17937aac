import { Body, Controller, Get, HttpCode, HttpStatus, Post, Query } from '@nestjs/common';
import { z } from 'zod';
import { ZodValidationPipe } from '../common/pipes/zod-validation.pipe';
import {
  SuccessResponse,
  successResponse,
} from '../common/responses/success-response';
import type { SessionIssued } from './interfaces/oauth-common.interface';
import { OAuthFlowService } from './services/oauth-flow.service';

const loginQuerySchema = z.object({
  state: z.string().min(1).optional(),
});

const callbackQuerySchema = z.object({
  code: z.string().min(1),
  state: z.string().min(1).optional(),
});

const MAX_POLL_INTERVAL_SECONDS = 60;

const deviceVerifySchema = z.object({
  device_code: z.string().min(1),
  user_code: z.string().min(1),
  interval: z.number().int().positive().max(MAX_POLL_INTERVAL_SECONDS).optional(),
});

export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  user: {
    id: string;
    github_id: number;
    username: string;
    email: string | null;
  };
}

function toTokenResponse(session: SessionIssued): TokenResponse {
  return {
    access_token: session.accessToken,
    token_type: session.tokenType,
    expires_in: session.expiresIn,
    user: {
      id: session.user.id,
      github_id: session.user.githubId,
      username: session.user.username,
      email: session.user.email,
    },
  };
}

@Controller('auth/github')
export class GitHubAuthController {
  constructor(private readonly oauthFlow: OAuthFlowService) {}

  @Get('login')
  async login(
    @Query(new ZodValidationPipe(loginQuerySchema))
    query: z.infer<typeof loginQuerySchema>,
  ): Promise<SuccessResponse<{ auth_url: string; state: string }>> {
    const { authorizationUrl, state } =
      await this.oauthFlow.initiateAuthorizationFlow(query.state);
    return successResponse('GitHub OAuth URL generated', {
      auth_url: authorizationUrl,
      state,
    });
  }

  @Get('callback')
  async callback(
    @Query(new ZodValidationPipe(callbackQuerySchema))
    query: z.infer<typeof callbackQuerySchema>,
  ): Promise<SuccessResponse<TokenResponse>> {
    const session = await this.oauthFlow.completeAuthorizationFlow(query.code, query.state);
    return successResponse('Authentication successful', toTokenResponse(session));
  }

  @Post('device/initiate')
  @HttpCode(HttpStatus.OK)
  async initiateDevice() {
    const handle = await this.oauthFlow.initiateDeviceFlow();
    return successResponse('Device flow initiated', {
      device_code: handle.deviceCode,
      user_code: handle.userCode,
      verification_uri: handle.verificationUri,
      verification_uri_complete: handle.verificationUriComplete,
      expires_in: handle.expiresIn,
      interval: handle.interval,
      message: handle.message,
    });
  }

  @Post('device/verify')
  @HttpCode(HttpStatus.OK)
  async verifyDevice(
    @Body(new ZodValidationPipe(deviceVerifySchema))
    body: z.infer<typeof deviceVerifySchema>,
  ): Promise<SuccessResponse<TokenResponse>> {
    const session = await this.oauthFlow.completeDeviceFlow(
      body.device_code,
      body.user_code,
      body.interval,
    );
    return successResponse('Device verified and authenticated', toTokenResponse(session));
  }
}
