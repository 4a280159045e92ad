/**
 * Core type definitions for the design token pipeline.
 */

import type { SchemaVersion } from './schema/version';

/** A parsed JSON/YAML object node. */
export type TokenNode = Record<string, unknown>;

export function isTokenNode(value: unknown): value is TokenNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ---------------------------------------------------------------------------
// Tokens
// ---------------------------------------------------------------------------

/** A single design token, flattened out of its file. */
export interface Token {
  /** Dash-joined path, e.g. `color-primary`. */
  name: string;
  /** Raw key segments from the document root. Root/group-marker keys are excluded. */
  path: string[];
  /** Display rendering of `rawValue`. */
  value: string;
  /** The `$value` exactly as decoded (or `{ $ref }` for pointer aliases). */
  rawValue: unknown;
  resolvedValue?: unknown;
  isResolved: boolean;
  type?: string;
  description?: string;
  deprecated: boolean;
  deprecationMessage?: string;
  extensions?: Record<string, unknown>;
  schemaVersion: SchemaVersion;
  /** CSS variable prefix configured for the source file. */
  prefix?: string;
  /** Curly-brace form, e.g. `{color.primary}`. */
  reference: string;
  filePath: string;
  definitionUri: string;
  /** Zero-based line of the token's own key. */
  line: number;
  /** Zero-based UTF-16 column of the token's own key. */
  character: number;
}

/** `$extends` on a group: the group inherits every token of the target group. */
export interface GroupExtension {
  groupPath: string[];
  targetPath: string[];
  /** The `$extends` value as written. */
  raw: string;
  filePath: string;
  line: number;
  character: number;
}

/** A token that could not be read, recorded instead of aborting the parse. */
export interface TokenProblem {
  tokenName: string;
  path: string[];
  error: Error;
  line: number;
  character: number;
}

export interface ParsedTokenFile {
  tokens: Token[];
  extensions: GroupExtension[];
  problems: TokenProblem[];
}

/** Zero-based source position of a key, in UTF-16 code units. */
export interface KeyPosition {
  line: number;
  character: number;
}

export const DEFAULT_GROUP_MARKERS: readonly string[] = ['_', '@', 'DEFAULT'];

/** CSS custom property name for a token, e.g. `--ds-color-primary`. */
export function cssVariableName(token: Pick<Token, 'name' | 'prefix'>): string {
  return token.prefix ? `--${token.prefix}-${token.name}` : `--${token.name}`;
}
