import path from 'path';
import { z } from 'zod';
import { DEFAULT_GROUP_MARKERS, isTokenNode } from '../../lib/design-tokens/types';
import type { SchemaVersion } from '../../lib/design-tokens/schema/version';

/** Client settings section, for `workspace/configuration` and `didChangeConfiguration`. */
export const SETTINGS_SECTION = 'dtcgLanguageServer';

export const SchemaVersionSettingSchema = z.enum(['draft', 'v2025_10']);

/** A token file: a bare path, or a path with per-file overrides. */
export const TokenFileEntrySchema = z.union([
  z.string().min(1),
  z.object({
    path: z.string().min(1),
    prefix: z.string().optional(),
    groupMarkers: z.array(z.string().min(1)).optional(),
    schemaVersion: SchemaVersionSettingSchema.optional(),
  }),
]);

export const ServerSettingsSchema = z.object({
  tokensFiles: z.array(TokenFileEntrySchema).default([]),
  /** CSS variable prefix for files that set none of their own. */
  prefix: z.string().optional(),
  groupMarkers: z.array(z.string().min(1)).default([...DEFAULT_GROUP_MARKERS]),
  schemaVersion: SchemaVersionSettingSchema.optional(),
  strict: z.boolean().default(false),
});

export type TokenFileEntry = z.infer<typeof TokenFileEntrySchema>;
export type ServerSettings = z.infer<typeof ServerSettingsSchema>;

export const DEFAULT_SETTINGS: ServerSettings = ServerSettingsSchema.parse({});

export interface SettingsResult {
  settings: ServerSettings;
  /** Set when the input was rejected and defaults were used instead. */
  error?: z.ZodError;
}

/**
 * Read settings from `initializationOptions` or a configuration payload.
 * Accepts the settings object itself or one wrapped in `dtcgLanguageServer`.
 */
export function parseSettings(raw: unknown): SettingsResult {
  const section = isTokenNode(raw) && SETTINGS_SECTION in raw ? raw[SETTINGS_SECTION] : raw;
  const result = ServerSettingsSchema.safeParse(section ?? {});
  if (!result.success) {
    return { settings: DEFAULT_SETTINGS, error: result.error };
  }
  return { settings: result.data };
}

// ---------------------------------------------------------------------------
// Token files
// ---------------------------------------------------------------------------

export interface TokenFileConfig {
  /** Absolute path. */
  path: string;
  prefix?: string;
  groupMarkers: string[];
  schemaVersion?: SchemaVersion;
}

/** Per-file settings with workspace defaults applied and paths made absolute. */
export function resolveTokenFiles(settings: ServerSettings, rootPath?: string): TokenFileConfig[] {
  const absolute = (filePath: string): string =>
    path.isAbsolute(filePath) || !rootPath ? path.resolve(filePath) : path.resolve(rootPath, filePath);

  return settings.tokensFiles.map((entry) => {
    if (typeof entry === 'string') {
      return {
        path: absolute(entry),
        prefix: settings.prefix,
        groupMarkers: settings.groupMarkers,
        schemaVersion: settings.schemaVersion,
      };
    }
    return {
      path: absolute(entry.path),
      prefix: entry.prefix ?? settings.prefix,
      groupMarkers: entry.groupMarkers?.length ? entry.groupMarkers : settings.groupMarkers,
      schemaVersion: entry.schemaVersion ?? settings.schemaVersion,
    };
  });
}
