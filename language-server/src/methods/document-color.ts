/**
 * Color swatches for color tokens: on `var()` calls in stylesheets and on
 * the token keys of token files.
 */

import { Range, TextEdit, type Color, type ColorInformation, type ColorPresentation } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { cssVariableName, type Token } from '../../../lib/design-tokens/types';
import { effectiveValue } from '../../../lib/design-tokens/resolver/aliases';
import { colorPresentations, sameColor, toRgbaColor, type RgbaColor } from '../../../lib/color/convert';
import { findVarCalls } from '../../../lib/css/var-calls';
import { createModuleLogger } from '../../../lib/observability/logger';
import { uriToPath, type TokenWorkspace } from '../workspace';
import { documentLines, isTokenDocument, keyRange } from './target';

const log = createModuleLogger('document-color');

function tokenColor(token: Token): RgbaColor | undefined {
  if (token.type !== 'color') return undefined;
  const color = toRgbaColor(effectiveValue(token));
  if (!color) log.debug({ token: token.name }, 'Color token value is not a readable color');
  return color;
}

function tokenFileColors(workspace: TokenWorkspace, document: TextDocument): ColorInformation[] {
  const lines = documentLines(document);
  const seen = new Set<string>();
  const colors: ColorInformation[] = [];

  for (const token of workspace.tokens.getBySourceFile(uriToPath(document.uri))) {
    const key = `${token.line}:${token.character}`;
    if (seen.has(key)) continue;
    seen.add(key);

    const color = tokenColor(token);
    if (!color) continue;
    colors.push({ range: keyRange(lines, token.line, token.character), color });
  }
  return colors;
}

export function documentColors(workspace: TokenWorkspace, document: TextDocument): ColorInformation[] {
  if (isTokenDocument(workspace, document)) return tokenFileColors(workspace, document);

  const colors: ColorInformation[] = [];
  for (const call of findVarCalls(document.getText())) {
    const token = workspace.getToken(call.name);
    const color = token && tokenColor(token);
    if (!color) continue;
    colors.push({ range: Range.create(document.positionAt(call.start), document.positionAt(call.end)), color });
  }
  return colors;
}

/**
 * For a `var()` swatch: every color token with the picked color, then the
 * picked color as hex, `rgb()` and `hsl()`. Token file swatches get none,
 * since their range is the token key.
 */
export function colorPresentation(
  workspace: TokenWorkspace,
  document: TextDocument,
  color: Color,
  range: Range,
): ColorPresentation[] {
  if (isTokenDocument(workspace, document)) return [];

  const presentations = new Map<string, ColorPresentation>();
  for (const token of workspace.tokens.getAll()) {
    const value = tokenColor(token);
    if (!value || !sameColor(value, color)) continue;

    const label = `var(${cssVariableName(token)})`;
    presentations.set(label, { label, textEdit: TextEdit.replace(range, label) });
  }
  for (const label of colorPresentations(color)) {
    presentations.set(label, { label, textEdit: TextEdit.replace(range, label) });
  }
  return [...presentations.values()];
}
