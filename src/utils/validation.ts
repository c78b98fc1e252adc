import { z } from 'zod';
import { Provider, UpstreamApiError } from './errors.js';

/**
 * Validates a provider response body against a Zod schema and converts
 * validation errors to upstream API errors.
 *
 * @param body - The parsed response body
 * @param schema - The Zod schema to validate against
 * @param provider - Which remote service answered
 * @param endpoint - The endpoint that produced the body
 * @param status - HTTP status of the response, reported in the error
 * @returns The validated and typed body
 * @throws UpstreamApiError if validation fails
 *
 * @example
 * ```typescript
 * const photos = validateResponse(body.response, photosGetResponseSchema, 'vk', 'photos.get', 200);
 * ```
 */
export function validateResponse<T>(
  body: unknown,
  schema: z.ZodSchema<T>,
  provider: Provider,
  endpoint: string,
  status?: number,
): T {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issues = result.error.errors
      .map(e => `${e.path.join('.') || '(root)'}: ${e.message}`)
      .join(', ');

    throw new UpstreamApiError(provider, endpoint, status, `Malformed response: ${issues}`);
  }
  return result.data;
}
