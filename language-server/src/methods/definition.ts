import { Location, Range, type Position } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Token } from '../../../lib/design-tokens/types';
import type { TokenWorkspace } from '../workspace';
import { findTokenTarget } from './target';

/** Zero-width location at the start of the token's key. */
export function tokenLocation(token: Token): Location {
  return Location.create(token.definitionUri, Range.create(token.line, token.character, token.line, token.character));
}

export function definition(workspace: TokenWorkspace, document: TextDocument, position: Position): Location | null {
  const token = findTokenTarget(workspace, document, position)?.token;
  return token ? tokenLocation(token) : null;
}
