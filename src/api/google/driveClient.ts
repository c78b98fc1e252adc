import { Readable } from 'stream';
import { OAuth2Client } from 'google-auth-library';
import { drive_v3, google } from 'googleapis';
import { toUpstreamError, UpstreamApiError } from '../../utils/errors.js';

export const FOLDER_MIME_TYPE = 'application/vnd.google-apps.folder';

/**
 * The Drive operations the Google pipeline relies on.
 */
export interface DriveGateway {
  /** Returns the id of a non-trashed folder with this name under `parentId`, or null. */
  findFolder(name: string, parentId: string): Promise<string | null>;
  /** Creates a folder at the root of My Drive and returns its id. */
  createFolder(name: string): Promise<string>;
  /** Uploads a new file under `parentId` and returns its id. */
  uploadFile(name: string, parentId: string, mimeType: string, data: Buffer): Promise<string>;
}

/**
 * Escapes a value for use inside a single-quoted Drive query string.
 */
export function escapeQueryValue(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/'/g, "\\'");
}

/**
 * Builds the Drive search query for a folder by name and parent.
 */
export function buildFolderQuery(name: string, parentId: string): string {
  return (
    `name='${escapeQueryValue(name)}' and mimeType='${FOLDER_MIME_TYPE}' ` +
    `and '${escapeQueryValue(parentId)}' in parents and trashed=false`
  );
}

/**
 * Google Drive v3 client backed by googleapis.
 *
 * @param auth - Authorized session from the credential provider.
 * @param drive - Drive API handle; built from `auth` when omitted.
 */
export class GoogleDriveClient implements DriveGateway {
  private readonly drive: drive_v3.Drive;

  constructor(auth: OAuth2Client, drive?: drive_v3.Drive) {
    this.drive = drive ?? google.drive({ version: 'v3', auth });
  }

  async findFolder(name: string, parentId: string): Promise<string | null> {
    try {
      const response = await this.drive.files.list({
        q: buildFolderQuery(name, parentId),
        fields: 'files(id)',
      });
      const [folder] = response.data.files ?? [];
      return folder?.id ?? null;
    } catch (error) {
      throw toUpstreamError(error, 'google', 'files.list');
    }
  }

  async createFolder(name: string): Promise<string> {
    let id: string | null | undefined;
    try {
      const response = await this.drive.files.create({
        requestBody: { name, mimeType: FOLDER_MIME_TYPE },
        fields: 'id',
      });
      id = response.data.id;
    } catch (error) {
      throw toUpstreamError(error, 'google', 'files.create');
    }
    if (!id) {
      throw new UpstreamApiError('google', 'files.create', undefined, 'No folder id in response');
    }
    return id;
  }

  async uploadFile(name: string, parentId: string, mimeType: string, data: Buffer): Promise<string> {
    let id: string | null | undefined;
    try {
      const response = await this.drive.files.create({
        requestBody: { name, parents: [parentId], mimeType },
        media: { mimeType, body: Readable.from(data) },
        fields: 'id',
      });
      id = response.data.id;
    } catch (error) {
      throw toUpstreamError(error, 'google', 'files.create');
    }
    if (!id) {
      throw new UpstreamApiError('google', 'files.create', undefined, `No file id in response for ${name}`);
    }
    return id;
  }
}
