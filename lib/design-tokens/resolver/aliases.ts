/**
 * Alias resolution: fills `resolvedValue` / `isResolved` on every token.
 *
 * A value that is exactly one reference takes the target's resolved value
 * as is (structured colors stay objects). A string with references
 * embedded in it gets each one replaced by the target's value as text.
 */

import type { Token } from '../types';
import { CircularReferenceError, UnresolvedReferenceError } from '../schema/errors';
import {
  CURLY_BRACE_REFERENCE,
  ReferenceType,
  extractReferencesFromValue,
  type Reference,
} from '../parsers/references';
import { isAliasValue, stringifyValue } from '../parsers/token-tree';
import { referenceTokenName } from './graph';

function describeReference(reference: Reference): string {
  return reference.type === ReferenceType.JSONPointer ? `#/${reference.path}` : `{${reference.path}}`;
}

/**
 * Resolve every token in place. Tokens already marked resolved are reused.
 * Throws CircularReferenceError or UnresolvedReferenceError, leaving the
 * tokens resolved so far as they are.
 */
export function resolveAliases(tokens: readonly Token[]): void {
  const byName = new Map<string, Token>();
  for (const token of tokens) byName.set(token.name, token);

  const stack: string[] = [];

  const resolveReference = (owner: Token, reference: Reference): unknown => {
    const target = byName.get(referenceTokenName(reference, owner.schemaVersion));
    if (!target) {
      throw new UnresolvedReferenceError(owner.filePath, owner.name, describeReference(reference));
    }
    return resolve(target);
  };

  const resolve = (token: Token): unknown => {
    if (token.isResolved) return token.resolvedValue;

    const index = stack.indexOf(token.name);
    if (index !== -1) {
      throw new CircularReferenceError(token.filePath, [...stack.slice(index), token.name]);
    }

    stack.push(token.name);
    const references = extractReferencesFromValue(token.rawValue, token.schemaVersion);
    let resolved: unknown = token.rawValue;

    if (references.length > 0 && isAliasValue(token.rawValue)) {
      resolved = resolveReference(token, references[0]);
    } else if (references.length > 0 && typeof token.rawValue === 'string') {
      resolved = token.rawValue.replace(CURLY_BRACE_REFERENCE, (_match, path: string) =>
        stringifyValue(resolveReference(token, { type: ReferenceType.CurlyBrace, path })),
      );
    }
    stack.pop();

    token.resolvedValue = resolved;
    token.isResolved = true;
    return resolved;
  };

  for (const token of tokens) resolve(token);
}

/** Resolved value, falling back to the raw value for tokens not resolved yet. */
export function effectiveValue(token: Token): unknown {
  return token.isResolved ? token.resolvedValue : token.rawValue;
}
