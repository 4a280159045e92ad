/**
 * Schema-Aware Token Tree Parser
 *
 * Flattens a decoded DTCG document into Token records. The walk is
 * depth-first in key order and knows about the version-specific constructs:
 * `$root` vs group markers, `$ref` values and group `$extends`.
 *
 * Source readers (json-parser, yaml-parser) decode text and supply key
 * positions through `locate`; this module never sees raw text.
 */

import {
  DEFAULT_GROUP_MARKERS,
  isTokenNode,
  type GroupExtension,
  type KeyPosition,
  type ParsedTokenFile,
  type Token,
  type TokenNode,
  type TokenProblem,
} from '../types';
import { TokenParseError, withFilePath } from '../schema/errors';
import { SchemaVersion } from '../schema/version';
import { parseColorValue } from './color';
import { CURLY_BRACE_REFERENCE, convertJSONPointerToTokenPath } from './references';
import { generateRootTokenPath, isRootToken } from './root';

export interface TokenTreeOptions {
  version: SchemaVersion;
  /** Draft group markers. Defaults to `_`, `@` and `DEFAULT`. */
  groupMarkers?: readonly string[];
  filePath?: string;
  definitionUri?: string;
  prefix?: string;
  /** Throw on the first malformed token instead of recording a problem. */
  strict?: boolean;
  /** Per-token hook, normally a schema handler's `validateTokenNode`. */
  validateNode?: (node: TokenNode, tokenPath: string) => void;
  /** Position of the key at `keyPath` (raw document keys, markers included). */
  locate?: (keyPath: readonly string[]) => KeyPosition | undefined;
}

const ORIGIN: KeyPosition = { line: 0, character: 0 };

// ---------------------------------------------------------------------------
// Value helpers
// ---------------------------------------------------------------------------

/** Display rendering of a raw value. */
export function stringifyValue(value: unknown): string {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (value === null || value === undefined) return '';
  return JSON.stringify(value);
}

/** A value that is nothing but a reference to another token. */
export function isAliasValue(value: unknown): boolean {
  if (typeof value === 'string') {
    const matches = Array.from(value.matchAll(CURLY_BRACE_REFERENCE));
    return matches.length === 1 && matches[0][0] === value.trim();
  }
  return isTokenNode(value) && typeof value.$ref === 'string';
}

function isTokenBearing(node: TokenNode, version: SchemaVersion): boolean {
  return '$value' in node || (version === SchemaVersion.V2025_10 && typeof node.$ref === 'string');
}

/** Group path named by a `$extends` value, or undefined when it cannot be read. */
export function parseExtendsTarget(value: unknown): string[] | undefined {
  let dotted: string | undefined;
  if (isTokenNode(value) && typeof value.$ref === 'string') {
    value = value.$ref;
  }
  if (typeof value === 'string') {
    const pointer = /^#\/(.+)$/.exec(value);
    const curly = /^\{(.+)\}$/.exec(value.trim());
    if (pointer) dotted = convertJSONPointerToTokenPath(pointer[1]);
    else if (curly) dotted = curly[1];
  }
  if (!dotted) return undefined;
  const segments = dotted.split('.');
  return segments.every(Boolean) ? segments : undefined;
}

// ---------------------------------------------------------------------------
// Parser
// ---------------------------------------------------------------------------

class TokenTreeWalker {
  readonly tokens: Token[] = [];
  readonly extensions: GroupExtension[] = [];
  readonly problems: TokenProblem[] = [];

  private readonly version: SchemaVersion;
  private readonly groupMarkers: readonly string[];
  private readonly filePath: string;

  constructor(private readonly options: TokenTreeOptions) {
    this.version = options.version;
    this.groupMarkers = options.groupMarkers ?? DEFAULT_GROUP_MARKERS;
    this.filePath = options.filePath ?? '';
  }

  walkGroup(node: TokenNode, path: string[], keyPath: string[], inheritedType?: string): void {
    const groupType = typeof node.$type === 'string' ? node.$type : inheritedType;

    if (path.length > 0 && this.version === SchemaVersion.V2025_10 && '$extends' in node) {
      this.recordExtension(node.$extends, path, keyPath);
    }

    this.walkChildren(node, path, keyPath, groupType);
  }

  private walkChildren(node: TokenNode, path: string[], keyPath: string[], groupType?: string): void {
    for (const [key, child] of Object.entries(node)) {
      if (key === '$schema' || !isTokenNode(child)) continue;

      const childKeyPath = [...keyPath, key];

      if (isRootToken(key, this.version, this.groupMarkers)) {
        const rootPath = generateRootTokenPath(path, key, this.version);
        if (rootPath.length > 0 && isTokenBearing(child, this.version)) {
          this.emitToken(child, rootPath, childKeyPath, groupType);
        }
        // Siblings of the marker's own value still hang off the parent group.
        this.walkChildren(child, rootPath, childKeyPath, groupType);
        continue;
      }

      // Draft has no $root semantics, so there it is an ordinary token name.
      if (key.startsWith('$') && !(key === '$root' && this.version === SchemaVersion.Draft)) continue;

      const childPath = [...path, key];
      if (isTokenBearing(child, this.version)) {
        this.emitToken(child, childPath, childKeyPath, groupType);
        if (this.hasRootMarkerChild(child)) {
          this.walkChildren(child, childPath, childKeyPath, typeof child.$type === 'string' ? child.$type : groupType);
        }
      } else {
        this.walkGroup(child, childPath, childKeyPath, groupType);
      }
    }
  }

  private hasRootMarkerChild(node: TokenNode): boolean {
    return Object.keys(node).some((key) => isRootToken(key, this.version, this.groupMarkers));
  }

  private emitToken(node: TokenNode, path: string[], keyPath: string[], inheritedType?: string): void {
    const name = path.join('-');
    const position = this.options.locate?.(keyPath) ?? ORIGIN;
    const rawValue = '$value' in node ? node.$value : { $ref: node.$ref };
    const type = typeof node.$type === 'string' ? node.$type : inheritedType;

    try {
      this.options.validateNode?.(node, name);
      if (type === 'color' && !isAliasValue(rawValue)) {
        parseColorValue(rawValue, this.version, path.join('.'));
      }
    } catch (error) {
      this.report(error, name, path, position);
      return;
    }

    const token: Token = {
      name,
      path,
      value: stringifyValue(rawValue),
      rawValue,
      isResolved: false,
      deprecated: false,
      schemaVersion: this.version,
      reference: `{${path.join('.')}}`,
      filePath: this.filePath,
      definitionUri: this.options.definitionUri ?? '',
      line: position.line,
      character: position.character,
    };

    if (type !== undefined) token.type = type;
    if (this.options.prefix) token.prefix = this.options.prefix;
    if (typeof node.$description === 'string') token.description = node.$description;
    if (typeof node.$deprecated === 'boolean') {
      token.deprecated = node.$deprecated;
    } else if (typeof node.$deprecated === 'string') {
      token.deprecated = true;
      token.deprecationMessage = node.$deprecated;
    }
    if (isTokenNode(node.$extensions)) token.extensions = node.$extensions;

    this.tokens.push(token);
  }

  private recordExtension(value: unknown, groupPath: string[], keyPath: string[]): void {
    const position = this.options.locate?.([...keyPath, '$extends']) ?? ORIGIN;
    const targetPath = parseExtendsTarget(value);
    if (!targetPath) {
      const error = new TokenParseError(
        this.filePath,
        `group '${groupPath.join('.')}' has an unreadable $extends value: ${stringifyValue(value)}`,
      );
      this.report(error, groupPath.join('-'), groupPath, position);
      return;
    }

    this.extensions.push({
      groupPath,
      targetPath,
      raw: stringifyValue(value),
      filePath: this.filePath,
      line: position.line,
      character: position.character,
    });
  }

  private report(error: unknown, tokenName: string, path: string[], position: KeyPosition): void {
    const labelled = withFilePath(error, this.filePath);
    const problem = labelled instanceof Error ? labelled : new Error(String(labelled));
    if (this.options.strict) throw problem;
    this.problems.push({ tokenName, path, error: problem, line: position.line, character: position.character });
  }
}

export function parseTokenTree(data: TokenNode, options: TokenTreeOptions): ParsedTokenFile {
  const walker = new TokenTreeWalker(options);
  walker.walkGroup(data, [], []);
  return { tokens: walker.tokens, extensions: walker.extensions, problems: walker.problems };
}
