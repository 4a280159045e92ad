/**
 * What the cursor points at: a reference in a token file, or a `var()`
 * call anywhere else.
 */

import { Range, type Position } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Token } from '../../../lib/design-tokens/types';
import { findReferenceAtPosition, normalizeLineEndings } from '../../../lib/design-tokens/parsers/references';
import { referenceTokenName } from '../../../lib/design-tokens/resolver/graph';
import { findVarCallAt } from '../../../lib/css/var-calls';
import { uriToPath, type TokenWorkspace } from '../workspace';

export interface TokenTarget {
  /** As written: a CSS variable (`--color-primary`) or a token name (`color-primary`). */
  name: string;
  range: Range;
  token?: Token;
}

export function isTokenDocument(workspace: TokenWorkspace, document: TextDocument): boolean {
  return workspace.isTokenFile(uriToPath(document.uri));
}

export function findTokenTarget(
  workspace: TokenWorkspace,
  document: TextDocument,
  position: Position,
): TokenTarget | undefined {
  const text = document.getText();

  if (isTokenDocument(workspace, document)) {
    const found = findReferenceAtPosition(text, position.line, position.character);
    if (!found) return undefined;

    const version = workspace.tokens.getSchemaVersionForFile(uriToPath(document.uri));
    const name = referenceTokenName(found.reference, version);
    return {
      name,
      range: Range.create(position.line, found.range.start, position.line, found.range.end),
      token: workspace.getToken(name),
    };
  }

  const call = findVarCallAt(text, document.offsetAt(position));
  if (!call) return undefined;
  return {
    name: call.name,
    range: Range.create(document.positionAt(call.nameStart), document.positionAt(call.nameEnd)),
    token: workspace.getToken(call.name),
  };
}

/** Token whose key sits on the cursor's line in a token file. */
export function findTokenDefinedAt(
  workspace: TokenWorkspace,
  document: TextDocument,
  position: Position,
): Token | undefined {
  if (!isTokenDocument(workspace, document)) return undefined;
  return workspace.tokens.getBySourceFile(uriToPath(document.uri)).find((token) => token.line === position.line);
}

export function documentLines(document: TextDocument): string[] {
  return normalizeLineEndings(document.getText()).split('\n');
}

/** Range of a key starting at `character`: up to its closing quote, or the colon of a bare YAML key. */
export function keyRange(lines: readonly string[], line: number, character: number): Range {
  const rest = (lines[line] ?? '').slice(character);
  const length = /^[^"':]*/.exec(rest)?.[0].trimEnd().length ?? 0;
  return Range.create(line, character, line, character + length);
}
