import fs from 'fs/promises';
import { OAuth2Client } from 'google-auth-library';
import { z } from 'zod';

/**
 * OAuth2 client management for the Google Drive API
 */

const clientSecretEntrySchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).optional(),
});

/**
 * Shape of the client secret file downloaded from the Google Cloud Console.
 * Desktop clients use the `installed` key, web clients `web`.
 */
const clientSecretFileSchema = z.union([
  z.object({ installed: clientSecretEntrySchema }),
  z.object({ web: clientSecretEntrySchema }),
]);

export interface ClientSecrets {
  clientId: string;
  clientSecret: string;
}

/**
 * Parses the client secret JSON document.
 *
 * @throws Error if the document is not a Google OAuth client secret.
 */
export function parseClientSecrets(content: string, filePath: string): ClientSecrets {
  let json: unknown;
  try {
    json = JSON.parse(content);
  } catch (error) {
    throw new Error(`Client secret file ${filePath} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }

  const result = clientSecretFileSchema.safeParse(json);
  if (!result.success) {
    throw new Error(`Client secret file ${filePath} has no 'installed' or 'web' client credentials`);
  }

  const entry = 'installed' in result.data ? result.data.installed : result.data.web;
  return { clientId: entry.client_id, clientSecret: entry.client_secret };
}

/**
 * Reads the client secret file from disk.
 *
 * @param filePath - Path of credentials.json.
 */
export async function loadClientSecrets(filePath: string): Promise<ClientSecrets> {
  const content = await fs.readFile(filePath, 'utf-8');
  return parseClientSecrets(content, filePath);
}

/**
 * Creates a new OAuth2 client for the given client credentials.
 *
 * @param secrets - Client id and secret.
 * @param redirectUri - Redirect URI used by the authorization flow, if any.
 * @returns A new OAuth2Client instance.
 */
export function createOAuthClient(secrets: ClientSecrets, redirectUri?: string): OAuth2Client {
  return new OAuth2Client({
    clientId: secrets.clientId,
    clientSecret: secrets.clientSecret,
    redirectUri,
  });
}
