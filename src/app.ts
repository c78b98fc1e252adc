import { createDownloadClient, downloadPhoto } from './api/download.js';
import { GoogleDriveClient } from './api/google/driveClient.js';
import { VkApiClient } from './api/vk/client.js';
import { YandexDiskClient } from './api/yandex/client.js';
import { InstalledAppCredentialProvider } from './auth/credentialProvider.js';
import { GoogleBackupPipeline } from './pipeline/googleBackup.js';
import type { ManifestEntry } from './pipeline/manifest.js';
import { YandexBackupPipeline } from './pipeline/yandexBackup.js';
import type { AppConfig } from './utils/config.js';
import logger from './utils/logger.js';
import type { Secrets } from './utils/secrets.js';

/**
 * A backup pipeline as the run plan sees it.
 */
export interface BackupRunner {
  run(ownerId: string, count?: number, albumId?: string): Promise<ManifestEntry[]>;
}

export interface AppDependencies {
  vk: Pick<VkApiClient, 'getUserLabel' | 'getStatusText' | 'replaceInStatus'>;
  yandex: BackupRunner;
  google: BackupRunner;
}

/**
 * Wires the real clients and pipelines from configuration and secrets.
 */
export function createDependencies(config: AppConfig, secrets: Secrets): AppDependencies {
  const vk = new VkApiClient({
    accessToken: secrets.vkToken,
    apiVersion: config.vk.apiVersion,
    photoSizeType: config.vk.photoSizeType,
    timeoutMs: config.http.timeoutMs,
  });

  const yandex = new YandexBackupPipeline(
    vk,
    new YandexDiskClient({ token: secrets.yandexToken, timeoutMs: config.http.timeoutMs }),
    {
      folder: config.yandex.folder,
      manifestPath: config.paths.yandexManifest,
      sizeType: config.vk.photoSizeType,
      duplicateRule: config.yandex.duplicateRule,
    },
  );

  const downloadHttp = createDownloadClient(config.http.timeoutMs);
  const google = new GoogleBackupPipeline(
    {
      source: vk,
      credentials: new InstalledAppCredentialProvider({
        clientSecretsPath: config.paths.googleClientSecrets,
        tokenPath: config.paths.googleToken,
        scopes: config.google.scopes,
      }),
      openDrive: session => new GoogleDriveClient(session),
      fetchPhoto: url => downloadPhoto(url, downloadHttp),
    },
    {
      folder: config.google.folder,
      manifestPath: config.paths.googleManifest,
      sizeType: config.vk.photoSizeType,
      duplicateRule: config.google.duplicateRule,
    },
  );

  return { vk, yandex, google };
}

/**
 * Runs the backup plan: show who is being backed up, optionally edit the
 * status, then run each configured target in order.
 */
export async function runApp(
  config: AppConfig,
  secrets: Secrets,
  deps: AppDependencies = createDependencies(config, secrets),
): Promise<void> {
  const label = await deps.vk.getUserLabel(secrets.userId);
  logger.info(`Backing up photos of ${JSON.stringify(label)}`);

  const replace = config.run.statusReplace;
  if (replace) {
    logger.info(`Status before: ${await deps.vk.getStatusText(secrets.userId)}`);
    await deps.vk.replaceInStatus(secrets.userId, replace.target, replace.replacement);
    logger.info(`Status after: ${await deps.vk.getStatusText(secrets.userId)}`);
  }

  for (const target of config.run.targets) {
    if (target === 'yandex') {
      await deps.yandex.run(secrets.userId, config.yandex.photoCount, config.yandex.albumId);
    } else {
      await deps.google.run(secrets.userId, config.google.photoCount, config.google.albumId);
    }
  }

  logger.info('Backup finished');
}

/**
 * Logs a failed run: the message at error level, the stack at debug level.
 */
export function reportFailure(error: unknown): void {
  logger.error(`Backup failed: ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    logger.debug(error.stack);
  }
}
