import axios from 'axios';

/**
 * Remote services the tool talks to.
 */
export type Provider = 'vk' | 'yandex' | 'google';

/**
 * A call to one of the remote providers failed: network error, non-success
 * status, an error envelope or a body of the wrong shape.
 */
export class UpstreamApiError extends Error {
  constructor(
    readonly provider: Provider,
    readonly endpoint: string,
    readonly status: number | undefined,
    detail: string,
  ) {
    super(`${provider} ${endpoint} failed${status !== undefined ? ` (${status})` : ''}: ${detail}`);
    this.name = 'UpstreamApiError';
  }
}

/**
 * The VK user lookup returned no user for the identifier.
 */
export class UserNotFoundError extends Error {
  constructor(readonly userId: string) {
    super(`VK user not found: ${userId}`);
    this.name = 'UserNotFoundError';
  }
}

/**
 * The local secrets file is missing or does not hold the expected values.
 */
export class SecretsFileError extends Error {
  constructor(readonly filePath: string, detail: string) {
    super(`Cannot load secrets from ${filePath}: ${detail}`);
    this.name = 'SecretsFileError';
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Reads the HTTP status off an axios or gaxios error, if the server answered at all.
 */
export function statusOf(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'response' in error) {
    const response = error.response;
    if (typeof response === 'object' && response !== null && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

/**
 * Converts an error into an UpstreamApiError with a descriptive message.
 * Handles axios errors carrying a provider error body.
 *
 * @param error - The original error object.
 * @param provider - Which remote service was called.
 * @param endpoint - A string describing what operation failed (e.g., 'photos.get').
 */
export function toUpstreamError(error: unknown, provider: Provider, endpoint: string): UpstreamApiError {
  if (error instanceof UpstreamApiError) {
    return error;
  }

  if (axios.isAxiosError<{ message?: string; description?: string }>(error)) {
    const message =
      error.response?.data?.message ||
      error.response?.data?.description ||
      error.response?.statusText ||
      error.message;
    return new UpstreamApiError(provider, endpoint, error.response?.status, message);
  }

  if (error instanceof Error) {
    return new UpstreamApiError(provider, endpoint, statusOf(error), error.message);
  }

  return new UpstreamApiError(provider, endpoint, undefined, String(error));
}
