/**
 * Diagnostics
 *
 * Token files: load failures, skipped tokens and resolution errors that
 * belong to the file. Stylesheets: deprecated tokens and `var()` fallbacks
 * that disagree with the token's value.
 */

import { Diagnostic, DiagnosticSeverity, DiagnosticTag, Range } from 'vscode-languageserver';
import type { TextDocument } from 'vscode-languageserver-textdocument';
import { cssVariableName, type Token } from '../../../lib/design-tokens/types';
import {
  CircularReferenceError,
  UnresolvedReferenceError,
  isDesignTokenError,
} from '../../../lib/design-tokens/schema/errors';
import type { LoadedTokenFile } from '../../../lib/design-tokens/loader';
import { findVarCalls, type VarCall } from '../../../lib/css/var-calls';
import { uriToPath, type TokenWorkspace } from '../workspace';
import { tokenCSSValue } from '../format';
import { tokenLocation } from './definition';
import { documentLines, isTokenDocument, keyRange } from './target';

export const DIAGNOSTIC_SOURCE = 'dtcg';

function errorDiagnostic(range: Range, error: Error): Diagnostic {
  const diagnostic = Diagnostic.create(range, error.message, DiagnosticSeverity.Error, undefined, DIAGNOSTIC_SOURCE);
  if (isDesignTokenError(error)) diagnostic.code = error.code;
  return diagnostic;
}

// ---------------------------------------------------------------------------
// Token files
// ---------------------------------------------------------------------------

/** Token, then `$extends` group, named by a resolution error. */
function locateName(
  name: string,
  tokens: readonly Token[],
  file: LoadedTokenFile | undefined,
): { line: number; character: number } | undefined {
  const tokenName = name.replace(/\./g, '-');
  const token = tokens.find((candidate) => candidate.name === tokenName);
  if (token) return token;
  return file?.extensions.find((extension) => extension.groupPath.join('.') === name);
}

function resolutionErrorName(error: Error): string | undefined {
  if (error instanceof UnresolvedReferenceError) return error.tokenName;
  if (error instanceof CircularReferenceError) return error.referenceChain[0];
  return undefined;
}

function tokenFileDiagnostics(workspace: TokenWorkspace, document: TextDocument): Diagnostic[] {
  const filePath = uriToPath(document.uri);
  const set = workspace.getTokenSet();
  const lines = documentLines(document);
  const diagnostics: Diagnostic[] = [];

  for (const failure of set.failures) {
    if (failure.filePath === filePath) diagnostics.push(errorDiagnostic(Range.create(0, 0, 0, 0), failure.error));
  }

  const file = set.files.find((candidate) => candidate.filePath === filePath);
  for (const problem of file?.problems ?? []) {
    diagnostics.push(errorDiagnostic(keyRange(lines, problem.line, problem.character), problem.error));
  }

  const error = set.resolutionError;
  if (error && isDesignTokenError(error) && error.filePath === filePath) {
    const name = resolutionErrorName(error);
    const at = name === undefined ? undefined : locateName(name, workspace.tokens.getBySourceFile(filePath), file);
    diagnostics.push(errorDiagnostic(at ? keyRange(lines, at.line, at.character) : Range.create(0, 0, 0, 0), error));
  }

  return diagnostics;
}

// ---------------------------------------------------------------------------
// Stylesheets
// ---------------------------------------------------------------------------

/** Whitespace-insensitive, case-insensitive comparison of CSS values. */
export function isSameCSSValue(a: string, b: string): boolean {
  const normalize = (value: string): string => value.replace(/\s+/g, '').toLowerCase();
  return normalize(a) === normalize(b);
}

export interface DiagnosticOptions {
  /** Client accepts `relatedInformation`; deprecations then point at the token's definition. */
  relatedInformation?: boolean;
}

function varCallDiagnostics(
  workspace: TokenWorkspace,
  document: TextDocument,
  call: VarCall,
  options: DiagnosticOptions,
): Diagnostic[] {
  const token = workspace.getToken(call.name);
  if (!token) return [];

  const range = Range.create(document.positionAt(call.start), document.positionAt(call.end));
  const diagnostics: Diagnostic[] = [];

  if (token.deprecated) {
    const message = token.deprecationMessage
      ? `${call.name} is deprecated: ${token.deprecationMessage}`
      : `${call.name} is deprecated`;
    const diagnostic: Diagnostic = {
      range,
      message,
      severity: DiagnosticSeverity.Information,
      source: DIAGNOSTIC_SOURCE,
      tags: [DiagnosticTag.Deprecated],
    };
    if (options.relatedInformation) {
      diagnostic.relatedInformation = [
        { location: tokenLocation(token), message: `Token ${cssVariableName(token)} defined here` },
      ];
    }
    diagnostics.push(diagnostic);
  }

  if (call.fallback !== undefined) {
    const expected = tokenCSSValue(token, workspace.registry);
    if (!isSameCSSValue(call.fallback, expected)) {
      diagnostics.push(
        Diagnostic.create(
          range,
          `Token fallback does not match expected value: ${expected}`,
          DiagnosticSeverity.Error,
          undefined,
          DIAGNOSTIC_SOURCE,
        ),
      );
    }
  }

  return diagnostics;
}

export function computeDiagnostics(
  workspace: TokenWorkspace,
  document: TextDocument,
  options: DiagnosticOptions = {},
): Diagnostic[] {
  if (isTokenDocument(workspace, document)) return tokenFileDiagnostics(workspace, document);
  return findVarCalls(document.getText()).flatMap((call) => varCallDiagnostics(workspace, document, call, options));
}
