import type { PhotoSource } from '../api/vk/types.js';
import type { UrlUploadStorage } from '../api/yandex/client.js';
import logger from '../utils/logger.js';
import { ManifestEntry, writeManifest } from './manifest.js';
import { DuplicateRule, resolveFileNames } from './naming.js';
import { ProgressReporter } from './progress.js';

export interface YandexBackupOptions {
  /** Folder at the disk root that receives the photos */
  folder: string;
  /** Local manifest file */
  manifestPath: string;
  /** Size type tag recorded in the manifest */
  sizeType: string;
  duplicateRule: DuplicateRule;
}

/**
 * Copies VK photos to Yandex.Disk. Yandex.Disk downloads each photo from its
 * VK URL itself, so no bytes pass through this process.
 */
export class YandexBackupPipeline {
  constructor(
    private readonly source: PhotoSource,
    private readonly storage: UrlUploadStorage,
    private readonly options: YandexBackupOptions,
  ) {}

  /**
   * Runs the backup and writes the manifest.
   *
   * @param ownerId - VK user whose photos to copy.
   * @param count - Maximum number of photos. Default is 5.
   * @param albumId - VK album ('profile', 'wall', ...). Default is 'profile'.
   * @returns The manifest entries, in upload order.
   */
  async run(ownerId: string, count = 5, albumId = 'profile'): Promise<ManifestEntry[]> {
    const photos = await this.source.listProfilePhotos(ownerId, count, albumId);
    await this.storage.ensureFolder(this.options.folder);

    const manifest: ManifestEntry[] = [];
    const progress = new ProgressReporter('Yandex.Disk upload', photos.length);

    for (const { photo, fileName } of resolveFileNames(photos, this.options.duplicateRule)) {
      await this.storage.uploadFromUrl(`${this.options.folder}/${fileName}`, photo.url);
      manifest.push({ file_name: fileName, size: this.options.sizeType });
      progress.tick(fileName);
    }

    await writeManifest(this.options.manifestPath, manifest);
    logger.info(`Yandex.Disk: ${progress.completed} uploads started, manifest written to ${this.options.manifestPath}`);
    return manifest;
  }
}
