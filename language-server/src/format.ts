import { cssVariableName, type Token } from '../../lib/design-tokens/types';
import { effectiveValue } from '../../lib/design-tokens/resolver/aliases';
import { stringifyValue } from '../../lib/design-tokens/parsers/token-tree';
import { defaultRegistry, type SchemaRegistry } from '../../lib/design-tokens/schema/registry';

/** Resolved value as CSS text. Structured colors render through their version's handler. */
export function tokenCSSValue(token: Token, registry: SchemaRegistry = defaultRegistry): string {
  const value = effectiveValue(token);
  if (token.type === 'color' && registry.has(token.schemaVersion)) {
    const css = registry.get(token.schemaVersion).formatColorForCSS(value);
    if (css) return css;
  }
  return stringifyValue(value);
}

export function tokenHoverMarkdown(token: Token, registry: SchemaRegistry = defaultRegistry): string {
  const sections = [`**${cssVariableName(token)}**`];

  if (token.deprecated) {
    sections.push(token.deprecationMessage ? `~~DEPRECATED~~: ${token.deprecationMessage}` : '~~DEPRECATED~~');
  }
  if (token.description) sections.push(token.description);

  const details = [`Value: \`${tokenCSSValue(token, registry)}\``];
  if (token.type) details.push(`Type: \`${token.type}\``);
  sections.push(details.join('  \n'));

  return sections.join('\n\n');
}

export function unknownTokenMarkdown(name: string): string {
  return `Unknown token: \`${name}\`\n\nThis token is not defined in any loaded token files.`;
}
