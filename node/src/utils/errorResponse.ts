/**
 * Response envelopes shared by every endpoint.
 */
import type { ValidationIssue } from '@/utils/errors';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: ValidationIssue[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(message: string, errors?: ValidationIssue[], code?: string): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}
