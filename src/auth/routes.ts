import express from 'express';
import logger from '../utils/logger.js';

/**
 * Result of the OAuth redirect: the authorization code, or why there is none.
 */
export type AuthCallbackResult =
  | { ok: true; code: string }
  | { ok: false; error: string };

/**
 * Sets up the OAuth redirect route on the loopback server used by the
 * installed-app flow. The route validates the state token, then hands the
 * authorization code (or the provider's error) to `onResult` exactly once.
 *
 * @param app - The Express application instance.
 * @param expectedState - The state value sent with the authorization URL.
 * @param onResult - Called with the outcome of the first valid redirect.
 */
export function setupAuthCallbackRoute(
  app: express.Express,
  expectedState: string,
  onResult: (result: AuthCallbackResult) => void,
): void {
  let settled = false;

  app.get('/', (req, res) => {
    const { code, state, error } = req.query;

    // Validate state token to prevent CSRF attacks
    if (typeof state !== 'string' || state !== expectedState) {
      logger.warn('Rejected OAuth redirect with an invalid state parameter');
      return res.status(400).send('Invalid state parameter');
    }

    if (settled) {
      return res.status(409).send('Authorization already completed');
    }

    if (typeof error === 'string') {
      settled = true;
      onResult({ ok: false, error });
      return res.status(400).send(`Authorization failed: ${error}`);
    }

    if (typeof code !== 'string' || code.length === 0) {
      logger.warn('No authorization code received');
      return res.status(400).send('No authorization code received');
    }

    settled = true;
    onResult({ ok: true, code });

    return res.send(`
      <html>
        <head>
          <title>Authorization Successful</title>
          <style>
            body { font-family: Arial, sans-serif; line-height: 1.6; max-width: 600px; margin: 0 auto; padding: 20px; }
            .success { background-color: #d4edda; border-color: #c3e6cb; color: #155724; padding: 15px; border-radius: 4px; }
          </style>
        </head>
        <body>
          <div class="success">
            <h1>Authorization Successful</h1>
            <p>The backup can now upload to Google Drive. You can close this window.</p>
          </div>
        </body>
      </html>
    `);
  });
}
