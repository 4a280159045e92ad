/**
 * Schema Version Detector
 *
 * Decides which DTCG schema a token document follows. Precedence:
 * explicit `$schema` > configured default > duck typing > draft.
 */

import type { TokenNode } from '../types';
import { parseDocumentRoot } from './document';
import { hasFeature, hasStructuredColorObjects } from './features';
import { validateSchemaData } from './validation';
import { lookupVersionURL, SchemaVersion } from './version';

export interface DetectionConfig {
  /** Used when the document has no recognizable `$schema`. `unknown` counts as unset. */
  defaultVersion?: SchemaVersion;
}

export interface DetectionResult {
  version: SchemaVersion;
  /** Validation failure for the detected version, if any. */
  error?: Error;
}

/** Features that only exist from 2025.10 on. */
const V2025_10_KEYS = ['$ref', '$extends', 'resolutionOrder'] as const;

export function detectVersion(content: string, config?: DetectionConfig): SchemaVersion {
  return detectVersionFromData(parseDocumentRoot(content), config);
}

/** Detection over an already decoded document (YAML sources land here). */
export function detectVersionFromData(data: TokenNode, config?: DetectionConfig): SchemaVersion {
  // An unrecognized $schema falls through to config and duck typing.
  const declared = typeof data.$schema === 'string' ? lookupVersionURL(data.$schema) : undefined;
  if (declared) {
    return declared;
  }

  if (config?.defaultVersion && config.defaultVersion !== SchemaVersion.Unknown) {
    return config.defaultVersion;
  }

  if (V2025_10_KEYS.some((key) => hasFeature(data, key)) || hasStructuredColorObjects(data)) {
    return SchemaVersion.V2025_10;
  }

  return SchemaVersion.Draft;
}

/**
 * Detect, then validate against the detected version. The version is
 * reported even when validation fails so callers can say what they tried.
 * Detection failures (bad JSON) still throw.
 */
export function detectVersionWithValidation(
  filePath: string,
  content: string,
  config?: DetectionConfig,
): DetectionResult {
  const data = parseDocumentRoot(content, filePath);

  const version = detectVersionFromData(data, config);
  try {
    validateSchemaData(data, version, filePath);
  } catch (error) {
    return { version, error: error instanceof Error ? error : new Error(String(error)) };
  }
  return { version };
}
