import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { VkApiClient } from '../src/api/vk/client.js';
import { UpstreamApiError, UserNotFoundError } from '../src/utils/errors.js';
import { createFakeHttp, FakeReply, RecordedRequest } from './helpers/fakeHttp.js';

function createClient(responder: (request: RecordedRequest) => FakeReply) {
  const { http, requests } = createFakeHttp(responder);
  const client = new VkApiClient({ accessToken: 'test-token', http });
  return { client, requests };
}

describe('getUserLabel', () => {
  test('returns the display name keyed label and sends the common parameters', async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: { response: [{ id: 42, first_name: 'Anna', last_name: 'Smirnova' }] },
    }));

    const label = await client.getUserLabel('42');

    assert.deepEqual(label, { 'Anna Smirnova': 42 });
    assert.equal(requests.length, 1);
    assert.equal(requests[0].method, 'GET');
    assert.equal(requests[0].url, 'users.get');
    assert.deepEqual(requests[0].params, { access_token: 'test-token', v: '5.131', user_ids: '42' });
  });

  test('raises UserNotFoundError when the response list is empty', async () => {
    const { client } = createClient(() => ({ status: 200, data: { response: [] } }));

    await assert.rejects(client.getUserLabel('nobody'), (error: unknown) => {
      assert.ok(error instanceof UserNotFoundError);
      assert.equal(error.userId, 'nobody');
      assert.equal(error.message, 'VK user not found: nobody');
      return true;
    });
  });

  test('raises UserNotFoundError for the invalid user id error code', async () => {
    const { client } = createClient(() => ({
      status: 200,
      data: { error: { error_code: 113, error_msg: 'Invalid user id' } },
    }));

    await assert.rejects(client.getUserLabel('-1'), UserNotFoundError);
  });

  test('reports other VK errors as upstream failures', async () => {
    const { client } = createClient(() => ({
      status: 200,
      data: { error: { error_code: 5, error_msg: 'User authorization failed' } },
    }));

    await assert.rejects(client.getUserLabel('42'), (error: unknown) => {
      assert.ok(error instanceof UpstreamApiError);
      assert.ok(!(error instanceof UserNotFoundError));
      assert.equal(error.provider, 'vk');
      assert.equal(error.endpoint, 'users.get');
      assert.equal(error.status, 200);
      assert.equal(error.message, 'vk users.get failed (200): error 5: User authorization failed');
      return true;
    });
  });
});

describe('status', () => {
  test('getStatusText returns the text or an empty string', async () => {
    let body: unknown = { response: { text: 'Studying' } };
    const { client, requests } = createClient(() => ({ status: 200, data: body }));

    assert.equal(await client.getStatusText('42'), 'Studying');
    assert.equal(requests[0].url, 'status.get');
    assert.equal(requests[0].params.user_id, '42');

    body = { response: {} };
    assert.equal(await client.getStatusText('42'), '');
  });

  test('non-success HTTP status surfaces as an upstream failure with status and endpoint', async () => {
    const { client } = createClient(() => ({ status: 500 }));

    await assert.rejects(client.getStatusText('42'), (error: unknown) => {
      assert.ok(error instanceof UpstreamApiError);
      assert.equal(error.endpoint, 'status.get');
      assert.equal(error.status, 500);
      return true;
    });
  });

  test('setStatusText raises on a non-success status', async () => {
    const { client, requests } = createClient(() => ({ status: 403 }));

    await assert.rejects(client.setStatusText('42', 'New status'), UpstreamApiError);
    assert.equal(requests[0].url, 'status.set');
    assert.equal(requests[0].params.text, 'New status');
  });

  test('replaceInStatus rewrites every occurrence of the target', async () => {
    const { client, requests } = createClient(request =>
      request.url === 'status.get'
        ? { status: 200, data: { response: { text: 'Learning Spanish, loving Spanish' } } }
        : { status: 200, data: { response: 1 } },
    );

    const changed = await client.replaceInStatus('42', 'Spanish', 'Italian');

    assert.equal(changed, true);
    assert.deepEqual(
      requests.map(request => request.url),
      ['status.get', 'status.set'],
    );
    assert.equal(requests[1].params.text, 'Learning Italian, loving Italian');
  });

  test('replaceInStatus does not write when the target is absent', async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: { response: { text: 'Out of office' } },
    }));

    const changed = await client.replaceInStatus('42', 'Studying', 'Working');

    assert.equal(changed, false);
    assert.deepEqual(
      requests.map(request => request.url),
      ['status.get'],
    );
  });

  test('replaceInStatus rejects an empty target without calling VK', async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: { response: { text: 'Out of office' } },
    }));

    await assert.rejects(client.replaceInStatus('42', '', 'Working'), {
      message: 'Status replacement target must not be empty',
    });
    assert.equal(requests.length, 0);
  });
});

describe('listProfilePhotos', () => {
  const items = [
    {
      id: 1,
      date: 1_600_000_000,
      likes: { count: 10 },
      sizes: [
        { type: 's', url: 'https://example.com/1-s.jpg' },
        { type: 'z', url: 'https://example.com/1-z.jpg' },
      ],
    },
    {
      id: 2,
      date: 1_600_000_100,
      likes: { count: 4 },
      sizes: [{ type: 'x', url: 'https://example.com/2-x.jpg' }],
    },
    {
      id: 3,
      date: 1_600_000_200,
      likes: { count: 0 },
      sizes: [{ type: 'z', url: 'https://example.com/3-z.jpg' }],
    },
  ];

  test('requests extended photos with sizes and keeps the configured rendition', async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: { response: { count: 3, items } },
    }));

    const photos = await client.listProfilePhotos('42', 3, 'wall');

    assert.deepEqual(requests[0].params, {
      access_token: 'test-token',
      v: '5.131',
      owner_id: '42',
      album_id: 'wall',
      extended: 1,
      photo_sizes: 1,
      count: 3,
    });
    assert.deepEqual(photos, [
      { likes: 10, uploadedAt: 1_600_000_000, url: 'https://example.com/1-z.jpg' },
      { likes: 0, uploadedAt: 1_600_000_200, url: 'https://example.com/3-z.jpg' },
    ]);
  });

  test('defaults to five profile photos', async () => {
    const { client, requests } = createClient(() => ({
      status: 200,
      data: { response: { count: 0, items: [] } },
    }));

    assert.deepEqual(await client.listProfilePhotos('42'), []);
    assert.equal(requests[0].params.count, 5);
    assert.equal(requests[0].params.album_id, 'profile');
  });

  test('rejects a response without the items list', async () => {
    const { client } = createClient(() => ({ status: 200, data: { response: { count: 3 } } }));

    await assert.rejects(client.listProfilePhotos('42'), (error: unknown) => {
      assert.ok(error instanceof UpstreamApiError);
      assert.equal(error.endpoint, 'photos.get');
      assert.match(error.message, /Malformed response: items:/);
      return true;
    });
  });
});
