import { isDomainError } from '../../domain/auth/errors.js';
import { AirQualityApiError } from '../airQuality/airQualityClient.js';
import { createLogger } from '../logger.js';

export const UNEXPECTED_ERROR_MESSAGE = 'An unexpected error occurred, please try again';

const log = createLogger('console');

/**
 * User-facing text for an error raised by a console operation.
 * Driver messages and stacks never reach the terminal.
 */
export function describeError(error: unknown): string {
  if (isDomainError(error)) {
    // Domain messages are fixed texts; a wrapped driver error only lives on `cause`.
    return error.kind === 'SESSION_STATE'
      ? `Action not available: ${error.message}`
      : error.message;
  }

  if (error instanceof AirQualityApiError) {
    return `Could not fetch air quality data: ${error.message}`;
  }

  log.error('Unexpected error in console operation', { error });
  return UNEXPECTED_ERROR_MESSAGE;
}
