/**
 * Reference Extractor
 *
 * Two reference syntaxes exist: `{color.primary}` curly braces (all schema
 * versions) and `{ "$ref": "#/color/primary" }` JSON Pointers (2025.10).
 * Dot paths and slash paths are never converted implicitly; use the
 * explicit converters at the bottom of this module.
 */

import { isTokenNode } from '../types';
import { MixedSchemaFeaturesError } from '../schema/errors';
import { SchemaVersion, versionString } from '../schema/version';

export const ReferenceType = {
  CurlyBrace: 'curly-brace',
  JSONPointer: 'json-pointer',
} as const;

export type ReferenceType = (typeof ReferenceType)[keyof typeof ReferenceType];

export interface Reference {
  type: ReferenceType;
  /** Dot-separated for curly braces, slash-separated (without `#/`) for pointers. */
  path: string;
}

const SEGMENT = String.raw`[\p{L}\p{N}\p{S}_\-]+`;

/** `{a.b.c}`: segments of letters, numbers, symbols, `_` and `-`. */
export const CURLY_BRACE_REFERENCE = new RegExp(String.raw`\{(${SEGMENT}(?:\.${SEGMENT})*)\}`, 'gu');

/** `"$ref": "#/a/b"` in JSON, plus the quoted and unquoted YAML spellings. */
export const JSON_POINTER_REFERENCE = /["']?\$ref["']?\s*:\s*["'](#[^"']+)["']/g;

export function extractReferences(text: string, _version: SchemaVersion): Reference[] {
  return Array.from(text.matchAll(CURLY_BRACE_REFERENCE), (match) => ({
    type: ReferenceType.CurlyBrace,
    path: match[1],
  }));
}

export function extractReferencesFromValue(value: unknown, version: SchemaVersion): Reference[] {
  if (typeof value === 'string') {
    return extractReferences(value, version);
  }
  if (isTokenNode(value) && typeof value.$ref === 'string') {
    if (version === SchemaVersion.Draft) {
      throw new MixedSchemaFeaturesError('', versionString(version), ['$ref (2025.10+ only)']);
    }
    return [{ type: ReferenceType.JSONPointer, path: stripPointerPrefix(value.$ref) }];
  }
  return [];
}

/** Dot path of a reference, whatever its syntax. */
export function referenceTokenPath(reference: Reference): string {
  return reference.type === ReferenceType.JSONPointer
    ? convertJSONPointerToTokenPath(reference.path)
    : reference.path;
}

// ---------------------------------------------------------------------------
// Position lookup
// ---------------------------------------------------------------------------

export interface ReferenceAtPosition {
  /** Dash-joined token name, e.g. `color-primary`. */
  tokenName: string;
  reference: Reference;
  /** UTF-16 offsets on the line, spanning the whole match. */
  range: { start: number; end: number };
}

export function normalizeLineEndings(content: string): string {
  return content.replace(/\r\n?/g, '\n');
}

/**
 * Reference under the cursor in a token file. `character` is a UTF-16
 * offset; a cursor on either edge of the match counts as inside it.
 */
export function findReferenceAtPosition(content: string, line: number, character: number): ReferenceAtPosition | null {
  const lines = normalizeLineEndings(content).split('\n');
  if (line < 0 || line >= lines.length) return null;
  const text = lines[line];

  for (const match of text.matchAll(CURLY_BRACE_REFERENCE)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (character >= start && character <= end) {
      return {
        tokenName: match[1].replace(/\./g, '-'),
        reference: { type: ReferenceType.CurlyBrace, path: match[1] },
        range: { start, end },
      };
    }
  }

  for (const match of text.matchAll(JSON_POINTER_REFERENCE)) {
    const start = match.index ?? 0;
    const end = start + match[0].length;
    if (character >= start && character <= end) {
      const path = stripPointerPrefix(match[1]);
      return {
        tokenName: path.replace(/\//g, '-'),
        reference: { type: ReferenceType.JSONPointer, path },
        range: { start, end },
      };
    }
  }

  return null;
}

// ---------------------------------------------------------------------------
// Path conventions
// ---------------------------------------------------------------------------

function stripPointerPrefix(pointer: string): string {
  return pointer.startsWith('#/') ? pointer.slice(2) : pointer;
}

/** `color/brand/primary` -> `color.brand.primary` */
export function convertJSONPointerToTokenPath(jsonPointer: string): string {
  return jsonPointer.replace(/\//g, '.');
}

/** `color.brand.primary` -> `#/color/brand/primary` */
export function convertTokenPathToJSONPointer(tokenPath: string): string {
  return `#/${tokenPath.replace(/\./g, '/')}`;
}
