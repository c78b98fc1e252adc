import dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';
import { duplicateRuleSchema } from '../pipeline/naming.js';
import { ConfigError } from './errors.js';

// Load environment variables
dotenv.config();

export const backupTargetSchema = z.enum(['yandex', 'google']);
export type BackupTarget = z.infer<typeof backupTargetSchema>;

const positiveInt = z.coerce.number().int().positive();
const nonNegativeInt = z.coerce.number().int().nonnegative();

/**
 * Validates and sanitizes the token storage path to prevent path traversal attacks.
 * Ensures the path stays within the project directory.
 *
 * @param inputPath - The token storage path from environment or default
 * @returns Validated absolute path
 * @throws ConfigError if path escapes project directory
 */
export function validateTokenStoragePath(inputPath: string): string {
  const projectRoot = process.cwd();
  const resolvedPath = path.resolve(projectRoot, inputPath);
  const relativePath = path.relative(projectRoot, resolvedPath);

  if (relativePath.startsWith('..') || path.isAbsolute(relativePath)) {
    throw new ConfigError(
      `GOOGLE_TOKEN_PATH must be within the working directory.\n` +
      `Attempted path: ${inputPath}\n` +
      `Resolved to: ${resolvedPath}`
    );
  }

  return resolvedPath;
}

function parseSetting<T>(name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.errors.map(e => e.message).join(', ');
    throw new ConfigError(`Invalid value for ${name} (${String(value)}): ${issues}`);
  }
  return result.data;
}

function parseTargets(value: string): BackupTarget[] {
  const names = value
    .split(',')
    .map(name => name.trim())
    .filter(name => name.length > 0);
  return names.map(name => parseSetting('BACKUP_TARGETS', backupTargetSchema, name));
}

/**
 * Builds the application configuration from an environment map.
 * Values fall back to the defaults the tool has always used.
 *
 * @param env - Environment variables (defaults to `process.env`).
 * @throws ConfigError when a value cannot be parsed.
 */
export function buildConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    /**
     * Local files read and written by a run.
     */
    paths: {
      /** Plaintext file with the VK token, VK user id and Yandex.Disk token, one per line */
      secrets: env.SECRETS_PATH || 'api.txt',
      /** Google OAuth client secret downloaded from the Cloud Console */
      googleClientSecrets: env.GOOGLE_CLIENT_SECRETS_PATH || 'credentials.json',
      /** Cached Google session token (validated to prevent path traversal) */
      googleToken: validateTokenStoragePath(env.GOOGLE_TOKEN_PATH || 'token.json'),
      yandexManifest: env.YANDEX_MANIFEST_PATH || 'photo_info_ya_disk.json',
      googleManifest: env.GOOGLE_MANIFEST_PATH || 'photo_info_g_drive.json',
    },

    /**
     * VK API settings.
     */
    vk: {
      apiVersion: env.VK_API_VERSION || '5.131',
      /** Size type tag of the rendition to back up ('z' is the 1080px rendition) */
      photoSizeType: env.PHOTO_SIZE_TYPE || 'z',
    },

    /**
     * Yandex.Disk pipeline settings.
     */
    yandex: {
      folder: env.BACKUP_FOLDER || 'backup_photos',
      photoCount: parseSetting('YANDEX_PHOTO_COUNT', positiveInt, env.YANDEX_PHOTO_COUNT ?? '5'),
      albumId: env.YANDEX_ALBUM_ID || 'profile',
      duplicateRule: parseSetting(
        'YANDEX_DUPLICATE_RULE',
        duplicateRuleSchema,
        env.YANDEX_DUPLICATE_RULE || 'not-exactly-one'
      ),
    },

    /**
     * Google Drive pipeline settings.
     */
    google: {
      folder: env.BACKUP_FOLDER || 'backup_photos',
      photoCount: parseSetting('GOOGLE_PHOTO_COUNT', positiveInt, env.GOOGLE_PHOTO_COUNT ?? '10'),
      albumId: env.GOOGLE_ALBUM_ID || 'wall',
      duplicateRule: parseSetting(
        'GOOGLE_DUPLICATE_RULE',
        duplicateRuleSchema,
        env.GOOGLE_DUPLICATE_RULE || 'more-than-one'
      ),
      scopes: ['https://www.googleapis.com/auth/drive'],
    },

    /**
     * What a run does, in order.
     */
    run: {
      targets: parseTargets(env.BACKUP_TARGETS ?? 'yandex,google'),
      statusReplace: env.STATUS_REPLACE_FROM
        ? { target: env.STATUS_REPLACE_FROM, replacement: env.STATUS_REPLACE_TO ?? '' }
        : undefined,
    },

    http: {
      /** Timeout for outbound requests in milliseconds, 0 disables it */
      timeoutMs: parseSetting('HTTP_TIMEOUT_MS', nonNegativeInt, env.HTTP_TIMEOUT_MS ?? '30000'),
    },

    logger: {
      /** Minimum log level (default: 'info') */
      level: env.LOG_LEVEL || 'info',
      /** Directory for error.log and combined.log; file logging is off when unset */
      dir: env.LOG_DIR,
    },
  };
}

export type AppConfig = ReturnType<typeof buildConfig>;

/**
 * Global configuration object for the application.
 * Values are loaded from environment variables or use default fallbacks.
 */
export const config: AppConfig = buildConfig();

export default config;
