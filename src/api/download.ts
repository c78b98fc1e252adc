import axios, { AxiosInstance } from 'axios';
import { toUpstreamError } from '../utils/errors.js';

/**
 * Creates the axios instance used for photo downloads.
 *
 * @param timeoutMs - Request timeout in milliseconds, 0 disables it.
 */
export function createDownloadClient(timeoutMs: number): AxiosInstance {
  return axios.create({ timeout: timeoutMs });
}

/**
 * Downloads a photo and returns its raw bytes.
 *
 * @param url - The URL of the photo rendition.
 * @param http - axios instance carrying the request timeout.
 * @returns A Promise resolving to the image bytes.
 * @throws UpstreamApiError if the download fails or times out.
 */
export async function downloadPhoto(url: string, http: AxiosInstance): Promise<Buffer> {
  if (!url) {
    throw new Error('Invalid photo URL');
  }

  try {
    const response = await http.get<ArrayBuffer>(url, { responseType: 'arraybuffer' });
    return Buffer.from(response.data);
  } catch (error) {
    throw toUpstreamError(error, 'vk', 'photo download');
  }
}
