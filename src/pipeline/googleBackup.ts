import { OAuth2Client } from 'google-auth-library';
import type { DriveGateway } from '../api/google/driveClient.js';
import type { PhotoSource } from '../api/vk/types.js';
import type { CredentialProvider } from '../auth/credentialProvider.js';
import logger from '../utils/logger.js';
import { ManifestEntry, writeManifest } from './manifest.js';
import { DuplicateRule, resolveFileNames } from './naming.js';
import { ProgressReporter } from './progress.js';

/** Drive's alias for the root of My Drive */
export const DRIVE_ROOT = 'root';

export const PHOTO_MIME_TYPE = 'image/jpeg';

export interface GoogleBackupOptions {
  /** Folder at the root of My Drive that receives the photos */
  folder: string;
  /** Local manifest file */
  manifestPath: string;
  /** Size type tag recorded in the manifest */
  sizeType: string;
  duplicateRule: DuplicateRule;
}

export interface GoogleBackupDependencies {
  source: PhotoSource;
  credentials: CredentialProvider;
  /** Opens a Drive client for an authorized session */
  openDrive: (session: OAuth2Client) => DriveGateway;
  /** Downloads the bytes of a photo URL */
  fetchPhoto: (url: string) => Promise<Buffer>;
}

/**
 * Copies VK photos to Google Drive: each photo is downloaded here and
 * uploaded as a new Drive file.
 */
export class GoogleBackupPipeline {
  constructor(
    private readonly deps: GoogleBackupDependencies,
    private readonly options: GoogleBackupOptions,
  ) {}

  /**
   * Finds the backup folder at the Drive root, creating it if needed.
   *
   * @returns The folder id.
   */
  private async resolveFolder(drive: DriveGateway): Promise<string> {
    const existing = await drive.findFolder(this.options.folder, DRIVE_ROOT);
    if (existing) {
      logger.debug(`Using existing Drive folder '${this.options.folder}' (${existing})`);
      return existing;
    }
    const created = await drive.createFolder(this.options.folder);
    logger.info(`Created Drive folder '${this.options.folder}' (${created})`);
    return created;
  }

  /**
   * Runs the backup and writes the manifest.
   *
   * @param ownerId - VK user whose photos to copy.
   * @param count - Maximum number of photos. Default is 5.
   * @param albumId - VK album ('profile', 'wall', ...). Default is 'profile'.
   * @returns The manifest entries, in upload order.
   */
  async run(ownerId: string, count = 5, albumId = 'profile'): Promise<ManifestEntry[]> {
    const photos = await this.deps.source.listProfilePhotos(ownerId, count, albumId);
    const session = await this.deps.credentials.obtainSession();
    const drive = this.deps.openDrive(session);
    const folderId = await this.resolveFolder(drive);

    const manifest: ManifestEntry[] = [];
    const progress = new ProgressReporter('Google Drive upload', photos.length);

    for (const { photo, fileName } of resolveFileNames(photos, this.options.duplicateRule)) {
      const data = await this.deps.fetchPhoto(photo.url);
      await drive.uploadFile(fileName, folderId, PHOTO_MIME_TYPE, data);
      manifest.push({ file_name: fileName, size: this.options.sizeType });
      progress.tick(fileName);
    }

    await writeManifest(this.options.manifestPath, manifest);
    logger.info(`Google Drive: ${progress.completed} files uploaded, manifest written to ${this.options.manifestPath}`);
    return manifest;
  }
}
