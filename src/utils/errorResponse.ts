/**
 * Standardized error response format for the HTTP surface.
 */

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
}

export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>,
  code?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}
