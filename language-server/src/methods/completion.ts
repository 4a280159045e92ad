import {
  CompletionItemKind,
  CompletionItemTag,
  MarkupKind,
  Range,
  TextEdit,
  type CompletionItem,
  type Position,
} from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { cssVariableName } from '../../../lib/design-tokens/types';
import { varCompletionContext } from '../../../lib/css/var-calls';
import type { TokenWorkspace } from '../workspace';
import { tokenCSSValue, tokenHoverMarkdown } from '../format';
import { isTokenDocument } from './target';

/** CSS variable names for every loaded token, offered inside an open `var(`. */
export function completion(workspace: TokenWorkspace, document: TextDocument, position: Position): CompletionItem[] {
  if (isTokenDocument(workspace, document)) return [];

  const context = varCompletionContext(document.getText(), document.offsetAt(position));
  if (!context) return [];
  const replace = Range.create(document.positionAt(context.start), position);

  const items = new Map<string, CompletionItem>();
  for (const token of workspace.tokens.getAll()) {
    const label = cssVariableName(token);
    if (!label.startsWith(context.partial)) continue;

    items.set(label, {
      label,
      kind: token.type === 'color' ? CompletionItemKind.Color : CompletionItemKind.Variable,
      detail: tokenCSSValue(token, workspace.registry),
      documentation: { kind: MarkupKind.Markdown, value: tokenHoverMarkdown(token, workspace.registry) },
      textEdit: TextEdit.replace(replace, label),
      ...(token.deprecated ? { tags: [CompletionItemTag.Deprecated] } : {}),
    });
  }

  return [...items.values()].sort((a, b) => (a.label < b.label ? -1 : a.label > b.label ? 1 : 0));
}
