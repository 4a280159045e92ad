/**
 * Error taxonomy for the token pipeline.
 *
 * Every error carries a stable `code` so callers can classify failures
 * with `isDesignTokenError(err, code)` instead of matching on messages,
 * plus the file path (empty when not yet known) and a short suggestion.
 */

export const DesignTokenErrorCode = {
  SchemaDetectionFailed: 'SCHEMA_DETECTION_FAILED',
  InvalidSchema: 'INVALID_SCHEMA',
  MixedSchemaFeatures: 'MIXED_SCHEMA_FEATURES',
  ConflictingRootTokens: 'CONFLICTING_ROOT_TOKENS',
  InvalidColorFormat: 'INVALID_COLOR_FORMAT',
  CircularReference: 'CIRCULAR_REFERENCE',
  UnresolvedReference: 'UNRESOLVED_REFERENCE',
  TokenParseFailed: 'TOKEN_PARSE_FAILED',
  ColorParseFailed: 'COLOR_PARSE_FAILED',
} as const;

export type DesignTokenErrorCode = (typeof DesignTokenErrorCode)[keyof typeof DesignTokenErrorCode];

export abstract class DesignTokenError extends Error {
  abstract readonly code: DesignTokenErrorCode;

  constructor(
    message: string,
    public readonly filePath: string,
    public readonly suggestion: string,
    options?: { cause?: unknown },
  ) {
    super(suggestion ? `${message}\nSuggestion: ${suggestion}` : message, options);
    this.name = new.target.name;
  }

  /** Copy of this error labelled with a file path. */
  abstract withFilePath(filePath: string): DesignTokenError;
}

export function isDesignTokenError(error: unknown, code?: DesignTokenErrorCode): error is DesignTokenError {
  if (!(error instanceof DesignTokenError)) return false;
  return code === undefined || error.code === code;
}

/**
 * Attach a file path to an error raised before the path was known.
 * Errors outside the taxonomy, and errors that already name a file, pass through.
 */
export function withFilePath(error: unknown, filePath: string): unknown {
  if (error instanceof DesignTokenError && !error.filePath && filePath) {
    return error.withFilePath(filePath);
  }
  return error;
}

function describeFile(filePath: string): string {
  return filePath || '<unknown file>';
}

// ---------------------------------------------------------------------------
// Schema detection / identification
// ---------------------------------------------------------------------------

export class SchemaDetectionError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.SchemaDetectionFailed;

  constructor(
    filePath: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(
      `failed to detect schema version for ${describeFile(filePath)}: ${reason}`,
      filePath,
      'Add explicit $schema field to the file',
      options,
    );
  }

  withFilePath(filePath: string): SchemaDetectionError {
    return new SchemaDetectionError(filePath, this.reason, { cause: this.cause });
  }
}

export class InvalidSchemaError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.InvalidSchema;

  constructor(
    filePath: string,
    public readonly schemaVersion: string,
    public readonly reason: string,
  ) {
    super(
      `invalid schema ${schemaVersion} in ${describeFile(filePath)}: ${reason}`,
      filePath,
      'Use a $schema URL from designtokens.org, and $root instead of group markers in 2025.10 files',
    );
  }

  withFilePath(filePath: string): InvalidSchemaError {
    return new InvalidSchemaError(filePath, this.schemaVersion, this.reason);
  }
}

// ---------------------------------------------------------------------------
// Feature conflicts
// ---------------------------------------------------------------------------

export class MixedSchemaFeaturesError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.MixedSchemaFeatures;

  constructor(
    filePath: string,
    public readonly declaredSchema: string,
    public readonly conflictingFeatures: readonly string[],
  ) {
    super(
      `file ${describeFile(filePath)} declares schema '${declaredSchema}' but contains features from other schema versions: ${conflictingFeatures.join(', ')}`,
      filePath,
      'Remove incompatible features or update $schema field',
    );
  }

  withFilePath(filePath: string): MixedSchemaFeaturesError {
    return new MixedSchemaFeaturesError(filePath, this.declaredSchema, this.conflictingFeatures);
  }
}

export class ConflictingRootTokensError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.ConflictingRootTokens;

  constructor(
    filePath: string,
    public readonly groupPath: string,
    public readonly rootTokenName: string,
    public readonly markerName: string,
  ) {
    super(
      `file ${describeFile(filePath)} has conflicting root tokens in group '${groupPath}': both '${rootTokenName}' and '${markerName}' found`,
      filePath,
      'Use only $root for 2025.10+ schemas, or only groupMarkers for draft schemas',
    );
  }

  withFilePath(filePath: string): ConflictingRootTokensError {
    return new ConflictingRootTokensError(filePath, this.groupPath, this.rootTokenName, this.markerName);
  }
}

export class InvalidColorFormatError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.InvalidColorFormat;

  constructor(
    filePath: string,
    public readonly tokenPath: string,
    public readonly schemaVersion: string,
    public readonly foundFormat: string,
    public readonly expectedFormat: string,
  ) {
    super(
      `invalid color format for token '${tokenPath}' in ${describeFile(filePath)}: schema '${schemaVersion}' expects ${expectedFormat}, but found ${foundFormat}`,
      filePath,
      'Convert color value to match schema version, or update $schema field',
    );
  }

  withFilePath(filePath: string): InvalidColorFormatError {
    return new InvalidColorFormatError(
      filePath,
      this.tokenPath,
      this.schemaVersion,
      this.foundFormat,
      this.expectedFormat,
    );
  }
}

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

export class CircularReferenceError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.CircularReference;

  constructor(
    filePath: string,
    public readonly referenceChain: readonly string[],
  ) {
    super(
      `circular reference detected in ${describeFile(filePath)}: ${referenceChain.join(' → ')}`,
      filePath,
      'Break the circular dependency chain',
    );
  }

  withFilePath(filePath: string): CircularReferenceError {
    return new CircularReferenceError(filePath, this.referenceChain);
  }
}

export class UnresolvedReferenceError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.UnresolvedReference;

  constructor(
    filePath: string,
    public readonly tokenName: string,
    public readonly reference: string,
  ) {
    super(
      `token '${tokenName}' in ${describeFile(filePath)} references '${reference}', which does not exist`,
      filePath,
      'Check the reference path for typos, or load the file that defines it',
    );
  }

  withFilePath(filePath: string): UnresolvedReferenceError {
    return new UnresolvedReferenceError(filePath, this.tokenName, this.reference);
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

export class TokenParseError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.TokenParseFailed;

  constructor(
    filePath: string,
    public readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`failed to parse ${describeFile(filePath)}: ${reason}`, filePath, 'Fix the syntax error in the token file', options);
  }

  withFilePath(filePath: string): TokenParseError {
    return new TokenParseError(filePath, this.reason, { cause: this.cause });
  }
}

export class ColorParseError extends DesignTokenError {
  readonly code = DesignTokenErrorCode.ColorParseFailed;

  constructor(
    filePath: string,
    public readonly tokenPath: string,
    public readonly reason: string,
  ) {
    super(
      `failed to parse color${tokenPath ? ` for token '${tokenPath}'` : ''}${filePath ? ` in ${filePath}` : ''}: ${reason}`,
      filePath,
      'Structured colors need a colorSpace string and a components array',
    );
  }

  withFilePath(filePath: string): ColorParseError {
    return new ColorParseError(filePath, this.tokenPath, this.reason);
  }
}
