import axios, { AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { toUpstreamError, UpstreamApiError, UserNotFoundError } from '../../utils/errors.js';
import logger from '../../utils/logger.js';
import { validateResponse } from '../../utils/validation.js';
import { selectPhotos } from './photoSelector.js';
import {
  PhotoRecord,
  PhotoSource,
  photosGetResponseSchema,
  statusGetResponseSchema,
  statusSetResponseSchema,
  UserLabel,
  usersGetResponseSchema,
  VK_INVALID_USER_ID,
  vkEnvelopeSchema,
  VkUser,
} from './types.js';

export const VK_API_BASE_URL = 'https://api.vk.com/method/';

export interface VkApiClientOptions {
  /** VK API access token */
  accessToken: string;
  /** API version sent as `v` (default: '5.131') */
  apiVersion?: string;
  /** Size type tag of the rendition to select (default: 'z') */
  photoSizeType?: string;
  /** Timeout for requests in milliseconds, 0 disables it */
  timeoutMs?: number;
  /** Preconfigured axios instance, used instead of creating one */
  http?: AxiosInstance;
}

type QueryParams = Record<string, string | number>;

/**
 * VK answered with an error envelope.
 */
export class VkMethodError extends UpstreamApiError {
  constructor(method: string, status: number, readonly code: number, message: string) {
    super('vk', method, status, `error ${code}: ${message}`);
    this.name = 'VkMethodError';
  }
}

/**
 * Client for the VK API methods the backup needs.
 * Every request carries the access token and API version.
 */
export class VkApiClient implements PhotoSource {
  readonly photoSizeType: string;
  private readonly accessToken: string;
  private readonly apiVersion: string;
  private readonly http: AxiosInstance;

  constructor(options: VkApiClientOptions) {
    this.accessToken = options.accessToken;
    this.apiVersion = options.apiVersion ?? '5.131';
    this.photoSizeType = options.photoSizeType ?? 'z';
    this.http =
      options.http ??
      axios.create({
        baseURL: VK_API_BASE_URL,
        timeout: options.timeoutMs ?? 0,
      });
  }

  /**
   * Parameters shared by every request.
   */
  private commonParams(): QueryParams {
    return {
      access_token: this.accessToken,
      v: this.apiVersion,
    };
  }

  /**
   * Calls a VK method and validates the `response` member of the answer.
   *
   * @throws UpstreamApiError on transport errors, VK error envelopes and malformed bodies.
   */
  private async call<T>(method: string, params: QueryParams, schema: z.ZodSchema<T>): Promise<T> {
    let response: AxiosResponse<unknown>;
    try {
      response = await this.http.get<unknown>(method, {
        params: { ...this.commonParams(), ...params },
      });
    } catch (error) {
      throw toUpstreamError(error, 'vk', method);
    }

    const envelope = validateResponse(response.data, vkEnvelopeSchema, 'vk', method, response.status);
    if (envelope.error) {
      throw new VkMethodError(method, response.status, envelope.error.error_code, envelope.error.error_msg);
    }
    return validateResponse(envelope.response, schema, 'vk', method, response.status);
  }

  /**
   * Resolves a user identifier to a display-name-keyed label.
   *
   * @param userId - VK user id or screen name.
   * @returns `{ "First Last": id }`
   * @throws UserNotFoundError if VK knows no such user.
   */
  async getUserLabel(userId: string): Promise<UserLabel> {
    let users: VkUser[];
    try {
      users = await this.call('users.get', { user_ids: userId }, usersGetResponseSchema);
    } catch (error) {
      if (error instanceof VkMethodError && error.code === VK_INVALID_USER_ID) {
        throw new UserNotFoundError(userId);
      }
      throw error;
    }

    const [user] = users;
    if (!user) {
      throw new UserNotFoundError(userId);
    }
    return { [`${user.first_name} ${user.last_name}`]: user.id };
  }

  /**
   * Gets the user's current status text; empty when none is set.
   */
  async getStatusText(userId: string): Promise<string> {
    const status = await this.call('status.get', { user_id: userId }, statusGetResponseSchema);
    return status.text ?? '';
  }

  /**
   * Sets the status text of the user the token belongs to.
   */
  async setStatusText(userId: string, text: string): Promise<void> {
    await this.call('status.set', { user_id: userId, text }, statusSetResponseSchema);
    logger.debug(`Status of ${userId} updated`);
  }

  /**
   * Replaces every occurrence of `target` in the current status with `replacement`.
   *
   * @returns true if the status was rewritten, false if `target` was not in it.
   * @throws Error if `target` is empty.
   */
  async replaceInStatus(userId: string, target: string, replacement: string): Promise<boolean> {
    if (target === '') {
      throw new Error('Status replacement target must not be empty');
    }
    const status = await this.getStatusText(userId);
    if (!status.includes(target)) {
      logger.info(`Status does not contain "${target}", leaving it unchanged`);
      return false;
    }
    await this.setStatusText(userId, status.replaceAll(target, replacement));
    return true;
  }

  /**
   * Lists photos of an album with their like counts and renditions.
   *
   * @param ownerId - VK user id whose photos to list.
   * @param count - Maximum number of photos. Default is 5.
   * @param albumId - 'profile', 'wall', 'saved' or a numeric album id. Default is 'profile'.
   * @returns Photo records in response order; photos without the configured rendition are skipped.
   */
  async listProfilePhotos(ownerId: string, count = 5, albumId = 'profile'): Promise<PhotoRecord[]> {
    const result = await this.call(
      'photos.get',
      {
        owner_id: ownerId,
        album_id: albumId,
        extended: 1,
        photo_sizes: 1,
        count,
      },
      photosGetResponseSchema,
    );

    const photos = selectPhotos(result.items, this.photoSizeType);
    logger.info(`Found ${photos.length} of ${result.items.length} photos in album '${albumId}' with a '${this.photoSizeType}' rendition`);
    return photos;
  }
}
