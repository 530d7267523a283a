// Response envelopes for the HTTP surface
import type { ValidationIssue } from './errors';

export interface ErrorResponse {
  success: false;
  code: string;
  message: string;
  errors?: ValidationIssue[];
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(code: string, message: string, errors: ValidationIssue[] = []): ErrorResponse {
  return errors.length > 0 ? { success: false, code, message, errors } : { success: false, code, message };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return { success: true, data };
}
