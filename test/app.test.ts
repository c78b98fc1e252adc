import assert from 'node:assert/strict';
import { describe, test } from 'node:test';
import { AppDependencies, BackupRunner, reportFailure, runApp } from '../src/app.js';
import type { ManifestEntry } from '../src/pipeline/manifest.js';
import { buildConfig } from '../src/utils/config.js';
import { UserNotFoundError } from '../src/utils/errors.js';
import logger from '../src/utils/logger.js';
import type { Secrets } from '../src/utils/secrets.js';

const secrets: Secrets = { vkToken: 'test-vk-token', userId: '1001', yandexToken: 'test-yandex-token' };

function createDependencies(options: { userFound?: boolean } = {}) {
  const calls: string[] = [];
  let status = 'Studying TypeScript';

  const runner = (name: string): BackupRunner => ({
    async run(ownerId: string, count?: number, albumId?: string): Promise<ManifestEntry[]> {
      calls.push(`${name}.run ${ownerId} ${count} ${albumId}`);
      return [];
    },
  });

  const deps: AppDependencies = {
    vk: {
      async getUserLabel(userId: string) {
        calls.push(`getUserLabel ${userId}`);
        if (options.userFound === false) {
          throw new UserNotFoundError(userId);
        }
        return { 'Anna Smirnova': 1001 };
      },
      async getStatusText() {
        calls.push('getStatusText');
        return status;
      },
      async replaceInStatus(userId: string, target: string, replacement: string) {
        calls.push(`replaceInStatus ${userId} ${target} ${replacement}`);
        status = status.replaceAll(target, replacement);
        return true;
      },
    },
    yandex: runner('yandex'),
    google: runner('google'),
  };

  return { deps, calls };
}

describe('runApp', () => {
  test('looks up the user, then runs Yandex and Google with their own plans', async () => {
    const { deps, calls } = createDependencies();

    await runApp(buildConfig({}), secrets, deps);

    assert.deepEqual(calls, [
      'getUserLabel 1001',
      'yandex.run 1001 5 profile',
      'google.run 1001 10 wall',
    ]);
  });

  test('runs only the configured targets in the configured order', async () => {
    const { deps, calls } = createDependencies();

    await runApp(buildConfig({ BACKUP_TARGETS: 'google,yandex', YANDEX_PHOTO_COUNT: '2' }), secrets, deps);

    assert.deepEqual(calls.slice(1), ['google.run 1001 10 wall', 'yandex.run 1001 2 profile']);
  });

  test('edits the status before the backup when a replacement is configured', async () => {
    const { deps, calls } = createDependencies();

    await runApp(
      buildConfig({ BACKUP_TARGETS: '', STATUS_REPLACE_FROM: 'Studying', STATUS_REPLACE_TO: 'Learning' }),
      secrets,
      deps,
    );

    assert.deepEqual(calls, [
      'getUserLabel 1001',
      'getStatusText',
      'replaceInStatus 1001 Studying Learning',
      'getStatusText',
    ]);
  });

  test('stops before any upload when the user does not exist', async () => {
    const { deps, calls } = createDependencies({ userFound: false });

    await assert.rejects(runApp(buildConfig({}), secrets, deps), UserNotFoundError);
    assert.deepEqual(calls, ['getUserLabel 1001']);
  });
});

describe('reportFailure', () => {
  test('logs the message as an error and the stack at debug level', t => {
    const error = t.mock.method(logger, 'error', () => logger);
    const debug = t.mock.method(logger, 'debug', () => logger);
    const failure = new TypeError('Cannot read properties of undefined');

    reportFailure(failure);

    assert.deepEqual(error.mock.calls[0].arguments, ['Backup failed: Cannot read properties of undefined']);
    assert.deepEqual(debug.mock.calls[0].arguments, [failure.stack]);
  });

  test('logs non-error values without a stack', t => {
    const error = t.mock.method(logger, 'error', () => logger);
    const debug = t.mock.method(logger, 'debug', () => logger);

    reportFailure('disk full');

    assert.deepEqual(error.mock.calls[0].arguments, ['Backup failed: disk full']);
    assert.equal(debug.mock.callCount(), 0);
  });
});
