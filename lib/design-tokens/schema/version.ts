/**
 * DTCG schema versions understood by the pipeline.
 *
 * Adding a version means adding a constant here, its URL below, and a
 * handler in the registry.
 */

import { InvalidSchemaError } from './errors';

export const SchemaVersion = {
  Unknown: 'unknown',
  Draft: 'draft',
  V2025_10: 'v2025_10',
} as const;

export type SchemaVersion = (typeof SchemaVersion)[keyof typeof SchemaVersion];

/** Declaration order; used wherever versions are listed. */
export const SCHEMA_VERSION_ORDER: readonly SchemaVersion[] = [
  SchemaVersion.Unknown,
  SchemaVersion.Draft,
  SchemaVersion.V2025_10,
];

const SCHEMA_URLS: Record<SchemaVersion, string> = {
  unknown: '',
  draft: 'https://www.designtokens.org/schemas/draft.json',
  v2025_10: 'https://www.designtokens.org/schemas/2025.10.json',
};

export function versionString(version: SchemaVersion): string {
  return version;
}

/** Canonical schema URL. `unknown` maps to the empty string. */
export function versionURL(version: SchemaVersion): string {
  return SCHEMA_URLS[version];
}

/** Exact match against the canonical URLs; undefined when nothing matches. */
export function lookupVersionURL(url: string): SchemaVersion | undefined {
  return SCHEMA_VERSION_ORDER.find((version) => version !== SchemaVersion.Unknown && SCHEMA_URLS[version] === url);
}

/** Like `lookupVersionURL`, but there is no default: unknown URLs throw. */
export function versionFromURL(url: string): SchemaVersion {
  const version = lookupVersionURL(url);
  if (version === undefined) {
    throw new InvalidSchemaError('', url, 'unrecognized schema URL');
  }
  return version;
}

export function versionFromString(value: string): SchemaVersion {
  for (const version of SCHEMA_VERSION_ORDER) {
    if (version !== SchemaVersion.Unknown && version === value) {
      return version;
    }
  }
  throw new InvalidSchemaError('', value, 'unrecognized schema version');
}

export function isSchemaVersion(value: unknown): value is SchemaVersion {
  return typeof value === 'string' && (SCHEMA_VERSION_ORDER as readonly string[]).includes(value);
}
