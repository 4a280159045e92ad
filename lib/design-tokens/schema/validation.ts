/**
 * Schema Consistency Validator
 *
 * Fails fast when a document mixes constructs from schema versions that
 * cannot coexist. Runs before any token is parsed.
 */

import { DEFAULT_GROUP_MARKERS, isTokenNode, type TokenNode } from '../types';
import {
  ConflictingRootTokensError,
  InvalidColorFormatError,
  InvalidSchemaError,
  MixedSchemaFeaturesError,
} from './errors';
import { parseDocumentRoot } from './document';
import { hasFeature, hasStringColorValues, hasStructuredColorObjects } from './features';
import { SchemaVersion, versionString } from './version';

const STRUCTURED_COLOR_FEATURE = 'structured color objects (2025.10+ only)';
const V2025_10_ONLY_KEYS = ['$ref', '$extends', 'resolutionOrder'] as const;

export function validateSchemaConsistency(content: string, version: SchemaVersion, filePath = ''): void {
  validateSchemaData(parseDocumentRoot(content, filePath), version, filePath);
}

export function validateSchemaData(data: TokenNode, version: SchemaVersion, filePath = ''): void {
  const conflicts: string[] = [];
  let colorFormatIssue = false;

  if (version === SchemaVersion.Draft) {
    if (hasStructuredColorObjects(data)) {
      conflicts.push(STRUCTURED_COLOR_FEATURE);
      colorFormatIssue = true;
    }
    for (const key of V2025_10_ONLY_KEYS) {
      if (hasFeature(data, key)) conflicts.push(`${key} (2025.10+ only)`);
    }
  }

  if (version === SchemaVersion.V2025_10 && hasStringColorValues(data)) {
    throw new InvalidColorFormatError(
      filePath,
      'color tokens',
      versionString(version),
      'string value',
      'structured object with colorSpace',
    );
  }

  validateRootTokens(data, version, filePath);

  if (conflicts.length === 1 && colorFormatIssue) {
    throw new InvalidColorFormatError(
      filePath,
      'color tokens',
      versionString(version),
      'structured object with colorSpace',
      'string value',
    );
  }
  if (conflicts.length > 0) {
    throw new MixedSchemaFeaturesError(filePath, versionString(version), conflicts);
  }
}

// ---------------------------------------------------------------------------
// Root token conflicts
// ---------------------------------------------------------------------------

/**
 * Checked against the built-in marker set, not the configured one: a 2025.10
 * file must not use any of them, whatever the draft configuration says.
 */
function validateRootTokens(data: TokenNode, version: SchemaVersion, filePath: string): void {
  checkGroups(data, '', version, filePath);
}

function checkGroups(node: TokenNode, currentPath: string, version: SchemaVersion, filePath: string): void {
  for (const [key, value] of Object.entries(node)) {
    if (key.startsWith('$') && key !== '$root') continue;
    if (!isTokenNode(value)) continue;

    const groupPath = currentPath ? `${currentPath}.${key}` : key;

    if (hasTokenChildren(value)) {
      const hasRoot = '$root' in value;
      const marker = DEFAULT_GROUP_MARKERS.find((m) => m in value);

      if (hasRoot && marker !== undefined) {
        throw new ConflictingRootTokensError(filePath, groupPath, '$root', marker);
      }
      if (version === SchemaVersion.V2025_10 && marker !== undefined) {
        throw new InvalidSchemaError(
          filePath,
          versionString(version),
          `group '${key}' uses draft-style marker '${marker}' instead of $root`,
        );
      }
    }

    checkGroups(value, groupPath, version, filePath);
  }
}

/** A group (not itself a token) with at least one child carrying `$value` or `$type`. */
function hasTokenChildren(node: TokenNode): boolean {
  if ('$value' in node || '$type' in node) return false;

  return Object.entries(node).some(
    ([key, child]) => !key.startsWith('$') && isTokenNode(child) && ('$value' in child || '$type' in child),
  );
}
