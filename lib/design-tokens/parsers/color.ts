/**
 * Color Value Model
 *
 * Draft colors are CSS strings; 2025.10 colors are structured objects with
 * a color space and components. Both render to a CSS color via `toCSS()`.
 */

import { isTokenNode } from '../types';
import { ColorParseError, InvalidColorFormatError, InvalidSchemaError } from '../schema/errors';
import { SchemaVersion, versionString } from '../schema/version';

export interface ColorValue {
  readonly schemaVersion: SchemaVersion;
  toCSS(): string;
  isValid(): boolean;
}

export class StringColorValue implements ColorValue {
  readonly schemaVersion = SchemaVersion.Draft;

  constructor(readonly value: string) {}

  toCSS(): string {
    return this.value;
  }

  isValid(): boolean {
    return this.value !== '';
  }
}

export class ObjectColorValue implements ColorValue {
  readonly schemaVersion = SchemaVersion.V2025_10;
  /** Numbers or the keyword `none`; anything else is kept as decoded. */
  readonly components: readonly unknown[];

  constructor(
    readonly colorSpace: string,
    components: readonly unknown[],
    readonly alpha?: number,
    readonly hex?: string,
  ) {
    this.components = Object.freeze([...components]);
  }

  toCSS(): string {
    if (this.hex) return this.hex;

    const components = this.components.map(formatComponent).join(' ');
    return `color(${this.colorSpace} ${components} / ${formatNumber(this.alpha ?? 1)})`;
  }

  isValid(): boolean {
    return this.colorSpace !== '' && this.components.length > 0;
  }
}

/** Four significant digits, no trailing zeros: 0.42 -> "0.42", 1.0 -> "1". */
function formatNumber(value: number): string {
  return String(Number(value.toPrecision(4)));
}

function formatComponent(component: unknown): string {
  return typeof component === 'number' ? formatNumber(component) : String(component);
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

/** What a color value looks like, for format errors. */
function describeColorShape(value: unknown): string {
  if (typeof value === 'string') return 'string value';
  if (isTokenNode(value)) return 'colorSpace' in value ? 'structured object with colorSpace' : 'object without colorSpace';
  if (Array.isArray(value)) return 'array';
  if (value === null) return 'null';
  return `${typeof value} value`;
}

/** `tokenPath` (dotted) labels the errors thrown for a malformed value. */
export function parseColorValue(value: unknown, version: SchemaVersion, tokenPath = ''): ColorValue {
  switch (version) {
    case SchemaVersion.Draft:
      if (typeof value !== 'string') {
        throw new InvalidColorFormatError('', tokenPath, versionString(version), describeColorShape(value), 'string value');
      }
      return new StringColorValue(value);

    case SchemaVersion.V2025_10: {
      if (!isTokenNode(value)) {
        throw new InvalidColorFormatError(
          '',
          tokenPath,
          versionString(version),
          describeColorShape(value),
          'structured object with colorSpace',
        );
      }
      const { colorSpace, components, alpha, hex } = value;
      if (typeof colorSpace !== 'string') {
        throw new ColorParseError('', tokenPath, 'missing or invalid colorSpace field in color object');
      }
      if (components === undefined) {
        throw new ColorParseError('', tokenPath, 'missing components field in color object');
      }
      if (!Array.isArray(components)) {
        throw new ColorParseError('', tokenPath, 'components must be an array');
      }
      return new ObjectColorValue(
        colorSpace,
        components,
        typeof alpha === 'number' ? alpha : undefined,
        typeof hex === 'string' ? hex : undefined,
      );
    }

    case SchemaVersion.Unknown:
      throw new InvalidSchemaError('', versionString(version), 'unknown schema version for color value');
  }
}

export function isObjectColorValue(color: ColorValue): color is ObjectColorValue {
  return color instanceof ObjectColorValue;
}
