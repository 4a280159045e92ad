/**
 * Per-version hooks: token node validation, CSS color formatting and
 * feature flags. Built-in handlers for draft and 2025.10 live here; new
 * versions register their own with a SchemaRegistry.
 */

import { isTokenNode, type TokenNode } from '../types';
import { ObjectColorValue } from '../parsers/color';
import { InvalidSchemaError } from './errors';
import { SchemaVersion, versionString } from './version';

export const SchemaFeature = {
  CurlyBraceReferences: 'curly-brace-references',
  JSONPointer: 'json-pointer',
  Extends: 'extends',
  Root: 'root',
  ResolutionOrder: 'resolution-order',
} as const;

export type SchemaFeature = (typeof SchemaFeature)[keyof typeof SchemaFeature];

export interface SchemaHandler {
  readonly version: SchemaVersion;
  /** Throws when a token node is not valid for this version. */
  validateTokenNode(node: TokenNode, tokenPath?: string): void;
  /** CSS rendering of a raw color value, or '' when the value is not a color this version reads. */
  formatColorForCSS(value: unknown): string;
  supportsFeature(feature: string): boolean;
}

function validateMetadata(node: TokenNode, version: SchemaVersion, tokenPath: string): void {
  const fail = (reason: string): never => {
    throw new InvalidSchemaError('', versionString(version), `token '${tokenPath}' ${reason}`);
  };

  if ('$type' in node && typeof node.$type !== 'string') fail('has a non-string $type');
  if ('$description' in node && typeof node.$description !== 'string') fail('has a non-string $description');
  if ('$deprecated' in node && typeof node.$deprecated !== 'boolean' && typeof node.$deprecated !== 'string') {
    fail('has a $deprecated that is neither a boolean nor a message');
  }
  if ('$extensions' in node && !isTokenNode(node.$extensions)) fail('has a non-object $extensions');
}

// ---------------------------------------------------------------------------
// Built-in handlers
// ---------------------------------------------------------------------------

export class DraftSchemaHandler implements SchemaHandler {
  readonly version = SchemaVersion.Draft;

  validateTokenNode(node: TokenNode, tokenPath = ''): void {
    validateMetadata(node, this.version, tokenPath);
  }

  formatColorForCSS(value: unknown): string {
    return typeof value === 'string' ? value : '';
  }

  supportsFeature(feature: string): boolean {
    return feature === SchemaFeature.CurlyBraceReferences;
  }
}

const V2025_10_FEATURES: ReadonlySet<string> = new Set([
  SchemaFeature.CurlyBraceReferences,
  SchemaFeature.JSONPointer,
  SchemaFeature.Extends,
  SchemaFeature.Root,
]);

export class V2025_10SchemaHandler implements SchemaHandler {
  readonly version = SchemaVersion.V2025_10;

  validateTokenNode(node: TokenNode, tokenPath = ''): void {
    validateMetadata(node, this.version, tokenPath);
    if (typeof node.$ref === 'string' && !node.$ref.startsWith('#/')) {
      throw new InvalidSchemaError(
        '',
        versionString(this.version),
        `token '${tokenPath}' has a $ref that is not a local JSON Pointer: ${node.$ref}`,
      );
    }
  }

  formatColorForCSS(value: unknown): string {
    if (typeof value === 'string') return value;
    if (!isTokenNode(value)) return '';
    const { colorSpace, components, alpha, hex } = value;
    if (typeof colorSpace !== 'string' || !Array.isArray(components)) {
      return typeof hex === 'string' ? hex : '';
    }
    return new ObjectColorValue(
      colorSpace,
      components,
      typeof alpha === 'number' ? alpha : undefined,
      typeof hex === 'string' ? hex : undefined,
    ).toCSS();
  }

  supportsFeature(feature: string): boolean {
    return V2025_10_FEATURES.has(feature);
  }
}
