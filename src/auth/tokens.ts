import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import logger from '../utils/logger.js';

/**
 * Schema of the persisted Google session token.
 */
export const tokenDataSchema = z.object({
  /** OAuth2 access token */
  access_token: z.string().min(1),
  /** OAuth2 refresh token */
  refresh_token: z.string().optional(),
  /** Expiration timestamp (in milliseconds) */
  expiry_date: z.number(),
  /** Space-separated scopes the token was granted */
  scope: z.string().optional(),
  token_type: z.string().optional(),
  /** Timestamp when the token was last retrieved or updated */
  retrievedAt: z.number().optional(),
});

export type TokenData = z.infer<typeof tokenDataSchema>;

/** Tokens expiring within this window are treated as expired */
export const EXPIRY_BUFFER_MS = 5 * 60 * 1000;

/**
 * Checks whether a stored token can still be used without refreshing.
 */
export function isTokenValid(tokens: TokenData, now: number = Date.now()): boolean {
  return tokens.expiry_date > now + EXPIRY_BUFFER_MS;
}

/**
 * Save the session token to a file, stamping retrievedAt.
 * Creates the parent directory if it doesn't exist.
 *
 * @param filePath - Where to write the token file.
 * @param tokens - The token data to save.
 * @throws Error if saving tokens fails.
 */
export async function saveTokens(filePath: string, tokens: TokenData): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const payload: TokenData = { ...tokens, retrievedAt: Date.now() };
  await fs.writeFile(filePath, JSON.stringify(payload, null, 2));
  // Set restrictive file permissions (owner read/write only)
  await fs.chmod(filePath, 0o600);
  logger.debug(`Saved Google session token to ${filePath}`);
}

/**
 * Load the session token from a file.
 *
 * @param filePath - Path of the token file.
 * @returns A Promise resolving to TokenData, or null if the file is missing or unusable.
 */
export async function loadTokens(filePath: string): Promise<TokenData | null> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      logger.debug(`No stored Google session token at ${filePath}`);
      return null;
    }
    throw error;
  }

  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    logger.warn(`Ignoring unreadable token file ${filePath}: ${error instanceof Error ? error.message : String(error)}`);
    return null;
  }

  const result = tokenDataSchema.safeParse(json);
  if (!result.success) {
    logger.warn(`Ignoring token file ${filePath} with unexpected contents`);
    return null;
  }
  return result.data;
}
