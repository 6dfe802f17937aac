import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Inject,
  Injectable,
  Logger,
  Optional,
} from '@nestjs/common';
import type { Request, Response } from 'express';
import { GITHUB_ACTIVITY_OPTIONS } from '../constants';
import { GitHubActivityError } from '../errors/github-activity.errors';
import { createLogger } from '../utils/logger.factory';
import type { ResolvedGitHubActivityOptions } from '../../interfaces/module-options.interface';
import type { ErrorResponse } from '../responses/success-response';

/**
 * Renders every error as `{ success: false, status_code, message, code? }`.
 * Anything that is not an HttpException becomes a 500 without details.
 */
@Catch()
@Injectable()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger: Logger;

  constructor(
    @Optional()
    @Inject(GITHUB_ACTIVITY_OPTIONS)
    options?: ResolvedGitHubActivityOptions,
  ) {
    this.logger = createLogger(ApiExceptionFilter.name, options?.logging);
  }

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const body = this.toErrorResponse(exception);
    if (body.status_code >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        `${request.method} ${request.path} failed: ${body.message}`,
        exception instanceof Error ? exception.stack : undefined,
      );
    }

    response.status(body.status_code).json(body);
  }

  private toErrorResponse(exception: unknown): ErrorResponse {
    if (!(exception instanceof HttpException)) {
      return {
        success: false,
        status_code: HttpStatus.INTERNAL_SERVER_ERROR,
        message: 'Internal server error',
      };
    }

    const body: ErrorResponse = {
      success: false,
      status_code: exception.getStatus(),
      message: exception.message,
    };
    if (exception instanceof GitHubActivityError) {
      body.code = exception.code;
    }

    const payload = exception.getResponse();
    if (typeof payload === 'object' && payload !== null) {
      if ('message' in payload) {
        const { message } = payload;
        if (typeof message === 'string') {
          body.message = message;
        } else if (Array.isArray(message)) {
          body.message = message.join(', ');
        }
      }
      if ('errors' in payload && isFieldErrors(payload.errors)) {
        body.errors = payload.errors;
      }
    }

    return body;
  }
}

function isFieldErrors(value: unknown): value is Record<string, string[] | undefined> {
  return (
    typeof value === 'object' &&
    value !== null &&
    Object.values(value).every(
      (entry) => entry === undefined || (Array.isArray(entry) && entry.every((e) => typeof e === 'string')),
    )
  );
}
