import { isAxiosError } from 'axios';
import { describeError, ModelTransportError } from '../../core/domain/errors/review.errors';

/**
 * Maps whatever the HTTP client threw into a ModelTransportError, keeping the
 * status or network code the retry policy needs.
 */
export function toTransportError(provider: string, error: unknown): unknown {
  if (!isAxiosError(error)) {
    return error;
  }

  const status = error.response?.status;
  const message = status !== undefined
    ? `${provider} answered with HTTP ${status}`
    : `${provider} request failed: ${describeError(error)}`;
  return new ModelTransportError(message, status, error.code);
}
