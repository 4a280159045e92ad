import { describe, it, expect } from 'vitest';
import { effectiveValue, resolveAliases } from '../aliases';
import { parseTokenTree } from '../../parsers/token-tree';
import { SchemaVersion } from '../../schema/version';
import { CircularReferenceError, UnresolvedReferenceError } from '../../schema/errors';
import type { Token, TokenNode } from '../../types';

function draftTokens(data: TokenNode, filePath = ''): Token[] {
  return parseTokenTree(data, { version: SchemaVersion.Draft, filePath }).tokens;
}

function byName(tokens: readonly Token[], name: string): Token | undefined {
  return tokens.find((token) => token.name === name);
}

describe('resolveAliases', () => {
  it('follows alias chains', () => {
    const tokens = draftTokens({ a: { $value: '{b}' }, b: { $value: '{c}' }, c: { $value: '8px' } });
    resolveAliases(tokens);

    expect(tokens.map((t) => [t.name, t.resolvedValue, t.isResolved])).toEqual([
      ['a', '8px', true],
      ['b', '8px', true],
      ['c', '8px', true],
    ]);
    expect(byName(tokens, 'a')?.rawValue).toBe('{b}');
  });

  it('interpolates references embedded in strings', () => {
    const tokens = draftTokens({
      space: { base: { $value: 4 }, lg: { $value: 'calc({space.base}px * {space.factor})' }, factor: { $value: 2 } },
    });
    resolveAliases(tokens);
    expect(byName(tokens, 'space-lg')?.resolvedValue).toBe('calc(4px * 2)');
  });

  it('keeps non-string values of whole-value aliases', () => {
    const tokens = draftTokens({ weight: { $value: 700 }, bold: { $value: '{weight}' } });
    resolveAliases(tokens);
    expect(byName(tokens, 'bold')?.resolvedValue).toBe(700);
  });

  it('resolves pointer aliases and $root references to structured colors', () => {
    const blue = { colorSpace: 'srgb', components: [0, 0, 1] };
    const { tokens } = parseTokenTree(
      {
        color: {
          primary: { $root: { $type: 'color', $value: blue } },
          link: { $ref: '#/color/primary/$root' },
          focus: { $type: 'color', $value: '{color.primary.$root}' },
        },
      },
      { version: SchemaVersion.V2025_10 },
    );
    resolveAliases(tokens);

    expect(byName(tokens, 'color-link')?.resolvedValue).toEqual(blue);
    expect(byName(tokens, 'color-focus')?.resolvedValue).toEqual(blue);
  });

  it('resolves across files', () => {
    const tokens = [
      ...draftTokens({ brand: { $value: '#3b82f6' } }, '/base.json'),
      ...draftTokens({ button: { $value: '{brand}' } }, '/components.json'),
    ];
    resolveAliases(tokens);
    expect(byName(tokens, 'button')?.resolvedValue).toBe('#3b82f6');
  });

  it('reuses tokens that are already resolved', () => {
    const tokens = draftTokens({ a: { $value: '{b}' }, b: { $value: 'raw' } });
    const b = byName(tokens, 'b');
    if (b) {
      b.resolvedValue = 'cached';
      b.isResolved = true;
    }
    resolveAliases(tokens);
    expect(byName(tokens, 'a')?.resolvedValue).toBe('cached');
  });

  it('reports the whole cycle', () => {
    const tokens = draftTokens({ a: { $value: '{b}' }, b: { $value: '{c}' }, c: { $value: '{a}' } }, '/loop.json');

    let caught: unknown;
    try {
      resolveAliases(tokens);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(CircularReferenceError);
    expect(caught).toMatchObject({ filePath: '/loop.json', referenceChain: ['a', 'b', 'c', 'a'] });
  });

  it('names the token and the missing reference', () => {
    const tokens = draftTokens({ a: { $value: '{missing.token}' } }, '/a.json');
    expect(() => resolveAliases(tokens)).toThrow(UnresolvedReferenceError);
    expect(() => resolveAliases(tokens)).toThrow("token 'a' in /a.json references '{missing.token}', which does not exist");
  });

  it('renders missing pointers as pointers', () => {
    const { tokens } = parseTokenTree({ a: { $ref: '#/missing' } }, { version: SchemaVersion.V2025_10 });
    expect(() => resolveAliases(tokens)).toThrow("references '#/missing'");
  });
});

describe('effectiveValue', () => {
  it('falls back to the raw value until resolved', () => {
    const [token] = draftTokens({ a: { $value: '{b}' } });
    expect(effectiveValue(token)).toBe('{b}');
    token.resolvedValue = '1px';
    token.isResolved = true;
    expect(effectiveValue(token)).toBe('1px');
  });
});
