import assert from 'node:assert/strict';
import { beforeEach, describe, test } from 'node:test';
import express from 'express';
import request from 'supertest';
import { AuthCallbackResult, setupAuthCallbackRoute } from '../src/auth/routes.js';

/**
 * The loopback redirect route must only accept the state it issued and must
 * hand over exactly one result.
 */
describe('OAuth loopback callback', () => {
  let app: express.Express;
  let results: AuthCallbackResult[];

  beforeEach(() => {
    app = express();
    results = [];
    setupAuthCallbackRoute(app, 'state-123', result => results.push(result));
  });

  describe('CSRF Protection', () => {
    test('should reject a redirect without state', async () => {
      const response = await request(app).get('/').query({ code: 'auth-code' });

      assert.equal(response.status, 400);
      assert.equal(response.text, 'Invalid state parameter');
      assert.deepEqual(results, []);
    });

    test('should reject a redirect with a foreign state', async () => {
      const response = await request(app).get('/').query({ code: 'auth-code', state: 'state-999' });

      assert.equal(response.status, 400);
      assert.deepEqual(results, []);
    });
  });

  test('should ask for a code when none is sent', async () => {
    const response = await request(app).get('/').query({ state: 'state-123' });

    assert.equal(response.status, 400);
    assert.equal(response.text, 'No authorization code received');
    assert.deepEqual(results, []);
  });

  test('should hand over the authorization code once', async () => {
    const first = await request(app).get('/').query({ code: 'auth-code', state: 'state-123' });
    const second = await request(app).get('/').query({ code: 'other-code', state: 'state-123' });

    assert.equal(first.status, 200);
    assert.match(first.text, /Authorization Successful/);
    assert.equal(second.status, 409);
    assert.deepEqual(results, [{ ok: true, code: 'auth-code' }]);
  });

  test('should report a denied consent', async () => {
    const response = await request(app).get('/').query({ error: 'access_denied', state: 'state-123' });

    assert.equal(response.status, 400);
    assert.equal(response.text, 'Authorization failed: access_denied');
    assert.deepEqual(results, [{ ok: false, error: 'access_denied' }]);
  });
});
