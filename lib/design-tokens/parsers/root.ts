import { SchemaVersion } from '../schema/version';

/**
 * Whether a key names its group's own token: `$root` under 2025.10 (the
 * configured markers never apply there), or one of the configured group
 * markers under draft, where `$root` is an ordinary key.
 */
export function isRootToken(name: string, version: SchemaVersion, groupMarkers: readonly string[]): boolean {
  switch (version) {
    case SchemaVersion.V2025_10:
      return name === '$root';
    case SchemaVersion.Draft:
      return groupMarkers.includes(name);
    case SchemaVersion.Unknown:
      return false;
  }
}

/**
 * A root token sits at its group's path, so `color.primary.$root` and
 * `color.primary._` both become `color-primary`.
 */
export function generateRootTokenPath(
  groupPath: readonly string[],
  _rootTokenName: string,
  _version: SchemaVersion,
): string[] {
  return [...groupPath];
}
