import { parse, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isTokenNode, type TokenNode } from '../types';
import { SchemaDetectionError } from './errors';

/**
 * Parse JSON (comments and trailing commas tolerated) into an object root.
 * Throws SchemaDetectionError on syntax errors or a non-object root.
 */
export function parseDocumentRoot(content: string, filePath = ''): TokenNode {
  const errors: ParseError[] = [];
  const data: unknown = parse(content, errors, { allowTrailingComma: true, disallowComments: false });

  if (errors.length > 0) {
    const first = errors[0];
    throw new SchemaDetectionError(
      filePath,
      `invalid JSON: ${printParseErrorCode(first.error)} at offset ${first.offset}`,
    );
  }
  if (!isTokenNode(data)) {
    throw new SchemaDetectionError(filePath, 'invalid JSON: document root must be an object');
  }
  return data;
}
