import { NextResponse } from 'next/server';
import { isAppError } from '@/lib/errors';
import { isIsoDate } from '@/lib/utils/date';

/**
 * Standard error response type for API routes.
 */
export interface ErrorResponse {
  error: string;
}

/**
 * Handle errors in API routes with consistent logging and response format.
 *
 * @param error - The caught error
 * @param context - Context string for logging (e.g., 'AniList releases', 'Image proxy')
 * @param fallbackMessage - User-facing message when error is not an AppError
 * @returns NextResponse with appropriate status code and error message
 */
export function handleRouteError(
  error: unknown,
  context: string,
  fallbackMessage: string
): NextResponse<ErrorResponse> {
  console.error(`${context} error:`, error);

  if (isAppError(error)) {
    return NextResponse.json(
      { error: error.message },
      { status: error.statusCode }
    );
  }

  return NextResponse.json(
    { error: fallbackMessage },
    { status: 500 }
  );
}

/**
 * Parse and validate an ISO date query parameter.
 * Returns the date string or null if missing or invalid.
 */
export function parseIsoDateParam(value: string | null): string | null {
  const trimmed = value?.trim() ?? '';
  return isIsoDate(trimmed) ? trimmed : null;
}
