import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { toUpstreamError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';

export const YANDEX_DISK_API_BASE_URL = 'https://cloud-api.yandex.net/v1/disk';

/**
 * Link to the asynchronous operation started by an upload-from-URL request.
 */
const operationLinkSchema = z.object({
  href: z.string(),
  method: z.string().optional(),
  templated: z.boolean().optional(),
});

export interface YandexDiskClientOptions {
  /** Yandex.Disk OAuth token */
  token: string;
  /** Timeout for requests in milliseconds, 0 disables it */
  timeoutMs?: number;
  /** Preconfigured axios instance, used instead of creating one */
  http?: AxiosInstance;
}

/**
 * Remote storage the Yandex pipeline uploads into.
 */
export interface UrlUploadStorage {
  ensureFolder(folderPath: string): Promise<boolean>;
  uploadFromUrl(filePath: string, sourceUrl: string): Promise<string | undefined>;
}

/**
 * Yandex.Disk REST API client.
 */
export class YandexDiskClient implements UrlUploadStorage {
  private readonly http: AxiosInstance;

  constructor(options: YandexDiskClientOptions) {
    this.http =
      options.http ??
      axios.create({
        baseURL: YANDEX_DISK_API_BASE_URL,
        timeout: options.timeoutMs ?? 0,
      });
    this.http.defaults.headers.common['Authorization'] = `OAuth ${options.token}`;
  }

  /**
   * Makes sure a folder exists at the given disk path, creating it when the
   * probe answers 404.
   *
   * @returns true if the folder was created by this call.
   */
  async ensureFolder(folderPath: string): Promise<boolean> {
    let status: number;
    try {
      const response = await this.http.get('/resources', {
        params: { path: folderPath },
        validateStatus: code => (code >= 200 && code < 300) || code === 404,
      });
      status = response.status;
    } catch (error) {
      throw toUpstreamError(error, 'yandex', 'resources.get');
    }

    if (status !== 404) {
      logger.debug(`Folder '${folderPath}' already exists on Yandex.Disk`);
      return false;
    }

    try {
      await this.http.put('/resources', null, { params: { path: folderPath } });
    } catch (error) {
      throw toUpstreamError(error, 'yandex', 'resources.put');
    }
    logger.info(`Created folder '${folderPath}' on Yandex.Disk`);
    return true;
  }

  /**
   * Asks Yandex.Disk to fetch a file from a URL into the given path.
   * Only acceptance of the request is checked; the fetch itself runs on the
   * provider side.
   *
   * @returns The status link of the started operation, when the provider returns one.
   */
  async uploadFromUrl(filePath: string, sourceUrl: string): Promise<string | undefined> {
    try {
      const response = await this.http.post<unknown>('/resources/upload', null, {
        params: {
          path: filePath,
          url: sourceUrl,
          disable_redirects: 'true',
        },
      });
      const link = operationLinkSchema.safeParse(response.data);
      return link.success ? link.data.href : undefined;
    } catch (error) {
      throw toUpstreamError(error, 'yandex', 'resources.upload');
    }
  }
}
