import { HttpStatus } from '@nestjs/common';

export interface SuccessResponse<T> {
  success: true;
  status_code: number;
  message: string;
  data: T;
}

export interface ErrorResponse {
  success: false;
  status_code: number;
  message: string;
  code?: string;
  errors?: Record<string, string[] | undefined>;
}

export function successResponse<T>(
  message: string,
  data: T,
  statusCode: number = HttpStatus.OK,
): SuccessResponse<T> {
  return { success: true, status_code: statusCode, message, data };
}
