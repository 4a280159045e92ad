/**
 * JSON/JSONC token file reader. Decodes with jsonc-parser and keeps the
 * syntax tree around so every token can point back at its own key.
 */

import { findNodeAtLocation, getNodeValue, parseTree, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { isTokenNode, type KeyPosition, type ParsedTokenFile } from '../types';
import { TokenParseError } from '../schema/errors';
import { parseTokenTree, type TokenTreeOptions } from './token-tree';

export type SourceParseOptions = Omit<TokenTreeOptions, 'locate'>;

export function parseJSONTokens(content: string, options: SourceParseOptions): ParsedTokenFile {
  const filePath = options.filePath ?? '';
  const document = TextDocument.create(options.definitionUri ?? '', 'json', 0, content);
  const errors: ParseError[] = [];
  const root = parseTree(content, errors, { allowTrailingComma: true, disallowComments: false });

  if (errors.length > 0 || !root) {
    const first = errors.at(0);
    const where = first ? document.positionAt(first.offset) : { line: 0, character: 0 };
    const reason = first ? printParseErrorCode(first.error) : 'empty document';
    throw new TokenParseError(filePath, `${reason} at line ${where.line + 1}, column ${where.character + 1}`);
  }

  const data: unknown = getNodeValue(root);
  if (!isTokenNode(data)) {
    throw new TokenParseError(filePath, 'document root must be an object');
  }

  const locate = (keyPath: readonly string[]): KeyPosition | undefined => {
    const key = findNodeAtLocation(root, [...keyPath])?.parent?.children?.[0];
    if (!key) return undefined;
    // Skip the opening quote so the position lands on the key text.
    return document.positionAt(key.offset + 1);
  };

  return parseTokenTree(data, { ...options, locate });
}
