import fs from 'fs/promises';
import { z } from 'zod';
import { SecretsFileError } from './errors.js';

/**
 * Credentials read from the local secrets file.
 * Built once at startup and handed to the components that need them.
 */
export const secretsSchema = z.object({
  /** VK API access token */
  vkToken: z.string().min(1, 'VK token (line 1) is empty'),
  /** VK user whose photos are backed up */
  userId: z.string().min(1, 'VK user id (line 2) is empty'),
  /** Yandex.Disk OAuth token */
  yandexToken: z.string().min(1, 'Yandex.Disk token (line 3) is empty'),
});

export type Secrets = z.infer<typeof secretsSchema>;

/**
 * Parses the secrets file contents: VK token, VK user id and Yandex.Disk
 * token on the first three lines. Every value is trimmed, so a trailing
 * newline or carriage return never reaches an API call.
 */
export function parseSecrets(content: string, filePath: string): Secrets {
  const [vkToken = '', userId = '', yandexToken = ''] = content.split('\n').map(line => line.trim());

  const result = secretsSchema.safeParse({ vkToken, userId, yandexToken });
  if (!result.success) {
    throw new SecretsFileError(filePath, result.error.errors.map(e => e.message).join(', '));
  }
  return result.data;
}

/**
 * Reads the secrets file from disk.
 *
 * @param filePath - Path of the plaintext secrets file (api.txt).
 * @throws SecretsFileError if the file cannot be read or a value is missing.
 */
export async function loadSecrets(filePath: string): Promise<Secrets> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    throw new SecretsFileError(filePath, error instanceof Error ? error.message : String(error));
  }
  return parseSecrets(content, filePath);
}
