import { z } from 'zod';

/**
 * Type definitions and response schemas for the VK API
 */

/**
 * Every VK method answers with either `response` or `error`, usually with HTTP 200.
 */
export const vkEnvelopeSchema = z.object({
  response: z.unknown().optional(),
  error: z
    .object({
      error_code: z.number(),
      error_msg: z.string(),
    })
    .optional(),
});

/** VK error code for an invalid user identifier */
export const VK_INVALID_USER_ID = 113;

/**
 * A user entry returned by `users.get`
 */
export const vkUserSchema = z.object({
  id: z.number(),
  first_name: z.string(),
  last_name: z.string(),
});

export const usersGetResponseSchema = z.array(vkUserSchema);

export const statusGetResponseSchema = z.object({
  text: z.string().optional(),
});

/** `status.set` answers with 1 on success */
export const statusSetResponseSchema = z.number();

/**
 * One rendition of a photo. `type` is the size tag ('s', 'm', 'x', 'y', 'z', 'w', ...).
 */
export const vkPhotoSizeSchema = z.object({
  type: z.string(),
  url: z.string(),
  width: z.number().optional(),
  height: z.number().optional(),
});

/**
 * A photo item returned by `photos.get` with `extended=1` and `photo_sizes=1`
 */
export const vkPhotoSchema = z.object({
  id: z.number(),
  owner_id: z.number().optional(),
  /** Upload time, unix seconds */
  date: z.number(),
  likes: z.object({
    count: z.number().int().nonnegative(),
  }),
  sizes: z.array(vkPhotoSizeSchema),
});

export const photosGetResponseSchema = z.object({
  count: z.number(),
  items: z.array(vkPhotoSchema),
});

export type VkUser = z.infer<typeof vkUserSchema>;
export type VkPhotoSize = z.infer<typeof vkPhotoSizeSchema>;
export type VkPhoto = z.infer<typeof vkPhotoSchema>;

/**
 * A photo selected for backup.
 */
export interface PhotoRecord {
  /** Number of likes on the photo */
  likes: number;
  /** Upload time, unix seconds */
  uploadedAt: number;
  /** URL of the selected rendition */
  url: string;
}

/**
 * `{ "First Last": id }`
 */
export type UserLabel = Record<string, number>;

/**
 * Anything that can list a user's photos; the upload pipelines depend on this
 * rather than on the concrete client.
 */
export interface PhotoSource {
  listProfilePhotos(ownerId: string, count?: number, albumId?: string): Promise<PhotoRecord[]>;
}
