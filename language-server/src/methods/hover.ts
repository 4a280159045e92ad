import { MarkupKind, type Hover, type Position } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import type { TokenWorkspace } from '../workspace';
import { tokenHoverMarkdown, unknownTokenMarkdown } from '../format';
import { findTokenTarget } from './target';

export function hover(workspace: TokenWorkspace, document: TextDocument, position: Position): Hover | null {
  const target = findTokenTarget(workspace, document, position);
  if (!target) return null;

  return {
    contents: {
      kind: MarkupKind.Markdown,
      value: target.token ? tokenHoverMarkdown(target.token, workspace.registry) : unknownTokenMarkdown(target.name),
    },
    range: target.range,
  };
}
