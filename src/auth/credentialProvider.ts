import { OAuth2Client } from 'google-auth-library';
import { ClientSecrets, createOAuthClient, loadClientSecrets } from '../api/google/oauth.js';
import logger from '../utils/logger.js';
import { Authorizer, runInstalledAppFlow, toTokenData } from './installedAppFlow.js';
import { isTokenValid, loadTokens, saveTokens, TokenData } from './tokens.js';

/**
 * Hands out an authorized Google session. The upload pipeline only sees this
 * interface, so the way the session is obtained can be swapped out.
 */
export interface CredentialProvider {
  obtainSession(): Promise<OAuth2Client>;
}

export interface InstalledAppCredentialProviderOptions {
  /** Path of the client secret file (credentials.json) */
  clientSecretsPath: string;
  /** Path of the cached session token (token.json) */
  tokenPath: string;
  /** OAuth scopes to request */
  scopes: string[];
  /** Interactive authorization step (default: loopback installed-app flow) */
  authorize?: Authorizer;
}

/**
 * Credential provider for desktop use: reuses the cached token while it is
 * valid, refreshes it when it has expired, and falls back to the interactive
 * installed-app flow. New tokens are written back to the cache.
 */
export class InstalledAppCredentialProvider implements CredentialProvider {
  private readonly authorize: Authorizer;

  constructor(private readonly options: InstalledAppCredentialProviderOptions) {
    this.authorize = options.authorize ?? runInstalledAppFlow;
  }

  async obtainSession(): Promise<OAuth2Client> {
    const secrets = await loadClientSecrets(this.options.clientSecretsPath);
    const oauth2Client = createOAuthClient(secrets);
    const stored = await loadTokens(this.options.tokenPath);

    if (stored && isTokenValid(stored)) {
      logger.debug('Reusing stored Google session token');
      oauth2Client.setCredentials(stored);
      return oauth2Client;
    }

    if (stored?.refresh_token) {
      const refreshed = await this.refresh(oauth2Client, stored);
      if (refreshed) {
        return oauth2Client;
      }
    }

    const tokens = await this.authorizeInteractively(secrets);
    oauth2Client.setCredentials(tokens);
    return oauth2Client;
  }

  /**
   * Refreshes an expired token. A rejected refresh (revoked grant, changed
   * client) is logged and answered with false so the caller can re-authorize.
   */
  private async refresh(oauth2Client: OAuth2Client, stored: TokenData): Promise<boolean> {
    logger.info('Refreshing expired Google session token');
    oauth2Client.setCredentials(stored);
    let tokens: TokenData;
    try {
      const { credentials } = await oauth2Client.refreshAccessToken();
      tokens = toTokenData(credentials, stored);
    } catch (error) {
      logger.warn(
        `Failed to refresh Google session token, re-authorizing: ${error instanceof Error ? error.message : String(error)}`
      );
      return false;
    }
    await saveTokens(this.options.tokenPath, tokens);
    oauth2Client.setCredentials(tokens);
    return true;
  }

  private async authorizeInteractively(secrets: ClientSecrets): Promise<TokenData> {
    const tokens = await this.authorize(secrets, this.options.scopes);
    await saveTokens(this.options.tokenPath, tokens);
    return tokens;
  }
}
