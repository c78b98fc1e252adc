import { randomBytes } from 'crypto';
import { once } from 'events';
import { Server } from 'http';
import express from 'express';
import { Credentials } from 'google-auth-library';
import { ClientSecrets, createOAuthClient } from '../api/google/oauth.js';
import logger from '../utils/logger.js';
import { AuthCallbackResult, setupAuthCallbackRoute } from './routes.js';
import { TokenData } from './tokens.js';

/**
 * Authorizes the user interactively and returns fresh tokens.
 */
export type Authorizer = (secrets: ClientSecrets, scopes: string[]) => Promise<TokenData>;

/**
 * Converts google-auth-library credentials to the stored token shape.
 *
 * @throws Error if no access token was issued.
 */
export function toTokenData(credentials: Credentials, previous?: TokenData): TokenData {
  if (!credentials.access_token) {
    throw new Error('Google did not return an access token');
  }
  return {
    access_token: credentials.access_token,
    refresh_token: credentials.refresh_token ?? previous?.refresh_token,
    expiry_date: credentials.expiry_date ?? 0,
    scope: credentials.scope,
    token_type: credentials.token_type ?? undefined,
    retrievedAt: Date.now(),
  };
}

async function closeServer(server: Server): Promise<void> {
  await new Promise<void>((resolve, reject) => {
    server.close(error => (error ? reject(error) : resolve()));
  });
}

/**
 * Runs the installed-app authorization flow: starts a loopback server on a
 * free port, logs the consent URL for the operator, waits for Google to
 * redirect back with a code and exchanges it for tokens.
 *
 * @param secrets - OAuth client credentials from the client secret file.
 * @param scopes - Scopes to request.
 * @returns The issued tokens.
 */
export const runInstalledAppFlow: Authorizer = async (secrets, scopes) => {
  const app = express();
  const state = randomBytes(20).toString('hex');

  const callback = new Promise<AuthCallbackResult>(resolve => {
    setupAuthCallbackRoute(app, state, resolve);
  });

  const server = app.listen(0, '127.0.0.1');
  await once(server, 'listening');

  try {
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Loopback server has no port');
    }

    const oauth2Client = createOAuthClient(secrets, `http://localhost:${address.port}/`);
    const authUrl = oauth2Client.generateAuthUrl({
      access_type: 'offline',
      scope: scopes,
      state,
      // Force approval to get a refresh token every time
      prompt: 'consent',
    });

    logger.info(`Open this URL in a browser to authorize Google Drive access:\n${authUrl}`);

    const result = await callback;
    if (!result.ok) {
      throw new Error(`Google authorization was denied: ${result.error}`);
    }

    const { tokens } = await oauth2Client.getToken(result.code);
    logger.info('Google authorization completed');
    return toTokenData(tokens);
  } finally {
    await closeServer(server);
  }
};
