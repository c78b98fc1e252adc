import { z } from 'zod';
import type { PhotoRecord } from '../api/vk/types.js';

/**
 * How the resolver decides that a like count needs a timestamp suffix.
 * - `not-exactly-one`: suffix when the like count does not occur exactly once.
 * - `more-than-one`: suffix when the like count occurs more than once.
 *
 * Over a photo set every count occurs at least once, so both rules name the
 * same photos.
 */
export const duplicateRuleSchema = z.enum(['not-exactly-one', 'more-than-one']);
export type DuplicateRule = z.infer<typeof duplicateRuleSchema>;

export interface NamedPhoto {
  photo: PhotoRecord;
  fileName: string;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * Formats a unix timestamp (seconds) in local time as `YYYY-MM-DD_HH-MM-SS`.
 */
export function formatUploadTimestamp(unixSeconds: number): string {
  const date = new Date(unixSeconds * 1000);
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}` +
    `_${pad(date.getHours())}-${pad(date.getMinutes())}-${pad(date.getSeconds())}`
  );
}

/**
 * Counts how many photos share each like count.
 */
export function countLikes(photos: PhotoRecord[]): Map<number, number> {
  const frequency = new Map<number, number>();
  for (const { likes } of photos) {
    frequency.set(likes, (frequency.get(likes) ?? 0) + 1);
  }
  return frequency;
}

export function isDuplicate(frequency: number, rule: DuplicateRule): boolean {
  return rule === 'not-exactly-one' ? frequency !== 1 : frequency > 1;
}

/**
 * Picks a file name for every photo: `<likes>_likes.jpg`, or
 * `<likes>_likes__<upload time>.jpg` when the like count is duplicated under
 * `rule`. Photos sharing both likes and upload second get the same name.
 *
 * @returns Names in photo-set order.
 */
export function resolveFileNames(photos: PhotoRecord[], rule: DuplicateRule): NamedPhoto[] {
  const frequency = countLikes(photos);

  return photos.map(photo => {
    const count = frequency.get(photo.likes) ?? 0;
    const fileName = isDuplicate(count, rule)
      ? `${photo.likes}_likes__${formatUploadTimestamp(photo.uploadedAt)}.jpg`
      : `${photo.likes}_likes.jpg`;
    return { photo, fileName };
  });
}
