import fs from 'fs/promises';
import { z } from 'zod';

/**
 * One uploaded file in a backup run.
 */
export const manifestEntrySchema = z.object({
  file_name: z.string(),
  /** Size type tag of the uploaded rendition */
  size: z.string(),
});

export const manifestSchema = z.array(manifestEntrySchema);

export type ManifestEntry = z.infer<typeof manifestEntrySchema>;

/**
 * Writes the manifest as indented JSON, replacing any previous file.
 */
export async function writeManifest(filePath: string, entries: ManifestEntry[]): Promise<void> {
  await fs.writeFile(filePath, JSON.stringify(entries, null, 4), 'utf-8');
}

/**
 * Reads a manifest written by {@link writeManifest}.
 *
 * @throws Error if the file is not a manifest.
 */
export async function readManifest(filePath: string): Promise<ManifestEntry[]> {
  const content = await fs.readFile(filePath, 'utf-8');
  const result = manifestSchema.safeParse(JSON.parse(content));
  if (!result.success) {
    throw new Error(`${filePath} is not a backup manifest`);
  }
  return result.data;
}
