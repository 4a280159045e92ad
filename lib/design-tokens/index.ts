/**
 * DTCG token pipeline: public exports.
 */

// Types
export type {
  Token,
  TokenNode,
  GroupExtension,
  TokenProblem,
  ParsedTokenFile,
  KeyPosition,
} from './types';
export { DEFAULT_GROUP_MARKERS, cssVariableName, isTokenNode } from './types';

// Schema versions, detection and validation
export {
  SchemaVersion,
  SCHEMA_VERSION_ORDER,
  isSchemaVersion,
  lookupVersionURL,
  versionFromString,
  versionFromURL,
  versionString,
  versionURL,
} from './schema/version';
export { detectVersion, detectVersionFromData, detectVersionWithValidation } from './schema/detector';
export type { DetectionConfig, DetectionResult } from './schema/detector';
export { validateSchemaConsistency, validateSchemaData } from './schema/validation';
export { parseDocumentRoot } from './schema/document';

// Errors
export {
  DesignTokenError,
  DesignTokenErrorCode,
  SchemaDetectionError,
  InvalidSchemaError,
  MixedSchemaFeaturesError,
  ConflictingRootTokensError,
  InvalidColorFormatError,
  CircularReferenceError,
  UnresolvedReferenceError,
  TokenParseError,
  ColorParseError,
  isDesignTokenError,
  withFilePath,
} from './schema/errors';

// Handlers
export { SchemaFeature, DraftSchemaHandler, V2025_10SchemaHandler } from './schema/handler';
export type { SchemaHandler } from './schema/handler';
export { SchemaRegistry, defaultRegistry } from './schema/registry';

// Parsers
export { parseColorValue, StringColorValue, ObjectColorValue } from './parsers/color';
export type { ColorValue } from './parsers/color';
export {
  ReferenceType,
  extractReferences,
  extractReferencesFromValue,
  findReferenceAtPosition,
  convertJSONPointerToTokenPath,
  convertTokenPathToJSONPointer,
} from './parsers/references';
export type { Reference, ReferenceAtPosition } from './parsers/references';
export { isRootToken, generateRootTokenPath } from './parsers/root';
export { parseTokenTree, stringifyValue } from './parsers/token-tree';
export type { TokenTreeOptions } from './parsers/token-tree';
export { parseJSONTokens } from './parsers/json-parser';
export type { SourceParseOptions } from './parsers/json-parser';
export { parseYAMLTokens } from './parsers/yaml-parser';

// Resolution
export { DependencyGraph, buildDependencyGraph } from './resolver/graph';
export { resolveAliases, effectiveValue } from './resolver/aliases';
export { resolveGroupExtensions } from './resolver/extends';

// Loading and storage
export { loadTokenFile, loadTokenSet, resolveTokens, isYAMLFile } from './loader';
export type { TokenFileSource, LoadedTokenFile, LoadFailure, TokenSet } from './loader';
export { TokenManager } from './token-manager';
