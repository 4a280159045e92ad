/**
 * `var(--name)` scanning for CSS-like documents (CSS, SCSS, Less, and
 * style blocks embedded in HTML/JS). Offsets are UTF-16 string indices.
 */

export interface VarCall {
  /** Custom property name including the leading `--`. */
  name: string;
  /** Fallback text after the comma, trimmed; undefined without one. */
  fallback?: string;
  /** Span of the whole `var(...)` call. */
  start: number;
  end: number;
  /** Span of the property name. */
  nameStart: number;
  nameEnd: number;
}

const VAR_CALL = /var\(\s*(--[^\s,()]+)\s*(?:,([^)]*))?\)/g;

/** Opened but not yet closed `var(` right before the cursor. */
const OPEN_VAR_CALL = /var\(\s*(-{1,2}[^\s,()]*)?$/;

export function findVarCalls(text: string): VarCall[] {
  return Array.from(text.matchAll(VAR_CALL), (match) => {
    const start = match.index ?? 0;
    const nameStart = start + match[0].indexOf(match[1]);
    const fallback = match[2]?.trim();
    return {
      name: match[1],
      ...(fallback ? { fallback } : {}),
      start,
      end: start + match[0].length,
      nameStart,
      nameEnd: nameStart + match[1].length,
    };
  });
}

/** The call whose span contains `offset` (end inclusive). */
export function findVarCallAt(text: string, offset: number): VarCall | undefined {
  return findVarCalls(text).find((call) => offset >= call.start && offset <= call.end);
}

export interface VarCompletionContext {
  /** What has been typed of the property name so far (may be empty). */
  partial: string;
  /** Offset where the typed name starts. */
  start: number;
}

/** Whether the cursor sits where a custom property name is expected inside `var(`. */
export function varCompletionContext(text: string, offset: number): VarCompletionContext | undefined {
  const lineStart = text.lastIndexOf('\n', offset - 1) + 1;
  const before = text.slice(lineStart, offset);
  const match = OPEN_VAR_CALL.exec(before);
  if (!match) return undefined;

  const partial = match[1] ?? '';
  return { partial, start: offset - partial.length };
}
