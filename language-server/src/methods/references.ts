/**
 * Find references: tokens that alias the target (from the dependency
 * graph) and `var()` calls naming it in open documents.
 */

import { Range, type Location, type Position } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { Token } from '../../../lib/design-tokens/types';
import { buildDependencyGraph } from '../../../lib/design-tokens/resolver/graph';
import { findVarCalls } from '../../../lib/css/var-calls';
import type { TokenWorkspace } from '../workspace';
import { tokenLocation } from './definition';
import { findTokenDefinedAt, findTokenTarget, isTokenDocument } from './target';

export interface ReferenceOptions {
  includeDeclaration: boolean;
  /** Documents to scan for `var()` calls, usually every open one. */
  documents: readonly TextDocument[];
}

function locationKey(location: Location): string {
  const { line, character } = location.range.start;
  return `${location.uri}:${line}:${character}`;
}

export function references(
  workspace: TokenWorkspace,
  document: TextDocument,
  position: Position,
  options: ReferenceOptions,
): Location[] {
  const target: Token | undefined =
    findTokenTarget(workspace, document, position)?.token ?? findTokenDefinedAt(workspace, document, position);
  if (!target) return [];

  const locations = new Map<string, Location>();
  const add = (location: Location): void => {
    locations.set(locationKey(location), location);
  };

  if (options.includeDeclaration) add(tokenLocation(target));

  const tokens = workspace.tokens.getAll();
  const dependents = new Set(buildDependencyGraph(tokens).getDependents(target.name));
  for (const token of tokens) {
    if (dependents.has(token.name)) add(tokenLocation(token));
  }

  for (const doc of options.documents) {
    if (isTokenDocument(workspace, doc)) continue;
    for (const call of findVarCalls(doc.getText())) {
      if (workspace.getToken(call.name) !== target) continue;
      add({ uri: doc.uri, range: Range.create(doc.positionAt(call.nameStart), doc.positionAt(call.nameEnd)) });
    }
  }

  return [...locations.values()];
}
