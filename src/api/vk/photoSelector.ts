import logger from '../../utils/logger.js';
import { PhotoRecord, VkPhoto } from './types.js';

/**
 * Reduces raw `photos.get` items to photo records, keeping for each photo the
 * first rendition whose size type contains `sizeType`. Photos without such a
 * rendition are left out.
 *
 * @param items - Photo items from the VK API, in response order.
 * @param sizeType - Size type tag to look for (e.g. 'z').
 */
export function selectPhotos(items: VkPhoto[], sizeType: string): PhotoRecord[] {
  const photos: PhotoRecord[] = [];

  for (const item of items) {
    const size = item.sizes.find(candidate => candidate.type.includes(sizeType));
    if (!size) {
      logger.debug(`Photo ${item.id} has no '${sizeType}' rendition, skipping`);
      continue;
    }
    photos.push({
      likes: item.likes.count,
      uploadedAt: item.date,
      url: size.url,
    });
  }

  return photos;
}
