/**
 * YAML token file reader. Same contract as the JSON reader; positions come
 * from the key nodes of the YAML document.
 */

import { isMap, isScalar, parseDocument, type Document } from 'yaml';
import { TextDocument } from 'vscode-languageserver-textdocument';
import { isTokenNode, type KeyPosition, type ParsedTokenFile, type TokenNode } from '../types';
import { TokenParseError } from '../schema/errors';
import type { SourceParseOptions } from './json-parser';
import { parseTokenTree } from './token-tree';

/** Decode a YAML token document. Syntax errors and non-mapping roots throw TokenParseError. */
export function decodeYAMLDocument(content: string, filePath = ''): { document: Document; data: TokenNode } {
  const document = parseDocument(content);
  const [first] = document.errors;
  if (first) {
    throw new TokenParseError(filePath, first.message, { cause: first });
  }

  const data: unknown = document.toJS();
  if (!isTokenNode(data)) {
    throw new TokenParseError(filePath, 'document root must be a mapping');
  }
  return { document, data };
}

function keyOffset(document: Document, keyPath: readonly string[]): number | undefined {
  let node: unknown = document.contents;
  let offset: number | undefined;

  for (const segment of keyPath) {
    if (!isMap(node)) return undefined;
    const pair = node.items.find((item) => isScalar(item.key) && String(item.key.value) === segment);
    if (!pair || !isScalar(pair.key)) return undefined;
    offset = pair.key.range?.[0];
    node = pair.value;
  }
  return offset;
}

export function parseYAMLTokens(content: string, options: SourceParseOptions): ParsedTokenFile {
  const { document, data } = decodeYAMLDocument(content, options.filePath);
  const text = TextDocument.create(options.definitionUri ?? '', 'yaml', 0, content);

  const locate = (keyPath: readonly string[]): KeyPosition | undefined => {
    const offset = keyOffset(document, keyPath);
    if (offset === undefined) return undefined;
    const quoted = content[offset] === '"' || content[offset] === "'";
    return text.positionAt(quoted ? offset + 1 : offset);
  };

  return parseTokenTree(data, { ...options, locate });
}
