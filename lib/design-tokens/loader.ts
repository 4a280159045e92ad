/**
 * Token file loading pipeline: decode -> detect -> validate -> parse, then
 * alias and `$extends` resolution over every loaded file at once.
 *
 * Nothing here touches the filesystem; callers pass file contents in.
 */

import { URI } from 'vscode-uri';
import { createModuleLogger } from '../observability/logger';
import { DEFAULT_GROUP_MARKERS, type ParsedTokenFile, type Token, type TokenNode } from './types';
import { parseDocumentRoot } from './schema/document';
import { detectVersionFromData } from './schema/detector';
import { validateSchemaData } from './schema/validation';
import { defaultRegistry, type SchemaRegistry } from './schema/registry';
import type { SchemaVersion } from './schema/version';
import { parseJSONTokens, type SourceParseOptions } from './parsers/json-parser';
import { decodeYAMLDocument, parseYAMLTokens } from './parsers/yaml-parser';
import { resolveAliases } from './resolver/aliases';
import { resolveGroupExtensions } from './resolver/extends';

const log = createModuleLogger('token-loader');

export interface TokenFileSource {
  filePath: string;
  content: string;
  /** Defaults to the `file://` URI of `filePath`. */
  definitionUri?: string;
  prefix?: string;
  groupMarkers?: readonly string[];
  /** Used when the file declares no recognizable `$schema`. */
  schemaVersion?: SchemaVersion;
  strict?: boolean;
}

export interface LoadedTokenFile extends ParsedTokenFile {
  filePath: string;
  version: SchemaVersion;
}

export interface LoadFailure {
  filePath: string;
  error: Error;
}

export interface TokenSet {
  files: LoadedTokenFile[];
  failures: LoadFailure[];
  /** Every token of every loaded file, inherited `$extends` copies included. */
  tokens: Token[];
  /** Set when alias or `$extends` resolution failed; tokens are then partly resolved. */
  resolutionError?: Error;
}

export function isYAMLFile(filePath: string): boolean {
  return /\.ya?ml$/i.test(filePath);
}

function decode(source: TokenFileSource): TokenNode {
  return isYAMLFile(source.filePath)
    ? decodeYAMLDocument(source.content, source.filePath).data
    : parseDocumentRoot(source.content, source.filePath);
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Load one file. Detection, validation and syntax errors throw; malformed
 * tokens are returned as problems (or thrown with `strict`).
 */
export function loadTokenFile(source: TokenFileSource, registry: SchemaRegistry = defaultRegistry): LoadedTokenFile {
  const { filePath, content } = source;
  const data = decode(source);
  const version = detectVersionFromData(data, { defaultVersion: source.schemaVersion });
  validateSchemaData(data, version, filePath);

  const handler = registry.get(version);
  const options: SourceParseOptions = {
    version,
    filePath,
    definitionUri: source.definitionUri ?? URI.file(filePath).toString(),
    prefix: source.prefix,
    groupMarkers: source.groupMarkers ?? DEFAULT_GROUP_MARKERS,
    strict: source.strict,
    validateNode: (node, tokenPath) => handler.validateTokenNode(node, tokenPath),
  };
  const parsed = isYAMLFile(filePath) ? parseYAMLTokens(content, options) : parseJSONTokens(content, options);

  log.debug(
    { filePath, version, tokens: parsed.tokens.length, problems: parsed.problems.length },
    'Parsed token file',
  );
  return { filePath, version, ...parsed };
}

/** Resolve aliases, then merge `$extends` groups. Returns the full token list. */
export function resolveTokens(files: readonly ParsedTokenFile[]): Token[] {
  const tokens = files.flatMap((file) => file.tokens);
  resolveAliases(tokens);
  return resolveGroupExtensions(
    tokens,
    files.flatMap((file) => file.extensions),
  );
}

/**
 * Load several files. A file that fails is reported in `failures` and does
 * not stop the others from loading.
 */
export function loadTokenSet(sources: readonly TokenFileSource[], registry: SchemaRegistry = defaultRegistry): TokenSet {
  const files: LoadedTokenFile[] = [];
  const failures: LoadFailure[] = [];

  for (const source of sources) {
    try {
      files.push(loadTokenFile(source, registry));
    } catch (error) {
      log.warn({ filePath: source.filePath, err: error }, 'Failed to load token file');
      failures.push({ filePath: source.filePath, error: toError(error) });
    }
  }

  try {
    return { files, failures, tokens: resolveTokens(files) };
  } catch (error) {
    log.warn({ err: error }, 'Failed to resolve token references');
    return { files, failures, tokens: files.flatMap((file) => file.tokens), resolutionError: toError(error) };
  }
}
