import { describe, it, expect, vi } from 'vitest';
import { isAliasValue, parseExtendsTarget, parseTokenTree, stringifyValue } from '../token-tree';
import { SchemaVersion } from '../../schema/version';
import { InvalidColorFormatError, TokenParseError } from '../../schema/errors';

const blue = { colorSpace: 'srgb', components: [0, 0, 1] };
const lightBlue = { colorSpace: 'srgb', components: [0.8, 0.8, 1] };

describe('parseTokenTree (draft)', () => {
  it('flattens nested groups and inherits group $type', () => {
    const { tokens, problems } = parseTokenTree(
      {
        color: {
          $type: 'color',
          primary: { $value: '#ff0000', $description: 'Brand red' },
          accent: { $value: '{color.primary}', $deprecated: 'use color.primary' },
        },
        spacing: { sm: { $value: '4px', $type: 'dimension' } },
      },
      { version: SchemaVersion.Draft },
    );

    expect(problems).toEqual([]);
    expect(tokens.map((t) => t.name)).toEqual(['color-primary', 'color-accent', 'spacing-sm']);

    const [primary, accent, spacing] = tokens;
    expect(primary).toMatchObject({
      path: ['color', 'primary'],
      value: '#ff0000',
      rawValue: '#ff0000',
      type: 'color',
      description: 'Brand red',
      deprecated: false,
      isResolved: false,
      reference: '{color.primary}',
      schemaVersion: SchemaVersion.Draft,
      line: 0,
      character: 0,
    });
    expect(accent).toMatchObject({ deprecated: true, deprecationMessage: 'use color.primary', type: 'color' });
    expect(spacing.type).toBe('dimension');
  });

  it('places group marker tokens at the group path', () => {
    const { tokens } = parseTokenTree(
      {
        color: {
          primary: {
            _: { $value: '#0000ff', $type: 'color' },
            light: { $value: '#ccccff', $type: 'color' },
          },
        },
      },
      { version: SchemaVersion.Draft },
    );

    expect(tokens.map((t) => [t.name, t.path])).toEqual([
      ['color-primary', ['color', 'primary']],
      ['color-primary-light', ['color', 'primary', 'light']],
    ]);
  });

  it('honors custom group markers', () => {
    const { tokens } = parseTokenTree(
      { size: { base: { $value: '16px' }, _: { $value: '8px' } } },
      { version: SchemaVersion.Draft, groupMarkers: ['base'] },
    );
    expect(tokens.map((t) => t.name)).toEqual(['size', 'size-_']);
  });

  it('treats $root as an ordinary name', () => {
    const { tokens } = parseTokenTree({ color: { $root: { $value: '#000000' } } }, { version: SchemaVersion.Draft });
    expect(tokens.map((t) => t.name)).toEqual(['color-$root']);
  });

  it('ignores $extends', () => {
    const { extensions } = parseTokenTree(
      { base: { a: { $value: 1 } }, theme: { $extends: '{base}' } },
      { version: SchemaVersion.Draft },
    );
    expect(extensions).toEqual([]);
  });

  it('records malformed color tokens as problems', () => {
    const { tokens, problems } = parseTokenTree(
      { bad: { $type: 'color', $value: blue }, good: { $value: '2px' } },
      { version: SchemaVersion.Draft, filePath: 'tokens.json' },
    );

    expect(tokens.map((t) => t.name)).toEqual(['good']);
    expect(problems).toHaveLength(1);
    expect(problems[0]).toMatchObject({ tokenName: 'bad', path: ['bad'], line: 0, character: 0 });
    expect(problems[0].error).toBeInstanceOf(InvalidColorFormatError);
    expect(problems[0].error).toMatchObject({ filePath: 'tokens.json' });
  });

  it('labels color problems with the token path', () => {
    const { problems } = parseTokenTree(
      { brand: { size: { $type: 'color', $value: 12 } } },
      { version: SchemaVersion.Draft, filePath: '/t.json' },
    );

    expect(problems).toHaveLength(1);
    expect(problems[0].error.message.split('\n')[0]).toBe(
      "invalid color format for token 'brand.size' in /t.json: schema 'draft' expects string value, but found number value",
    );
  });

  it('throws the first problem in strict mode', () => {
    expect(() =>
      parseTokenTree({ bad: { $type: 'color', $value: blue } }, { version: SchemaVersion.Draft, strict: true }),
    ).toThrow(InvalidColorFormatError);
  });
});

describe('parseTokenTree (2025.10)', () => {
  const document = {
    $schema: 'https://www.designtokens.org/schemas/2025.10.json',
    color: {
      primary: {
        $root: { $type: 'color', $value: blue },
        light: { $type: 'color', $value: lightBlue },
      },
      link: { $ref: '#/color/primary/$root' },
    },
  };

  it('places $root tokens at the group path', () => {
    const { tokens } = parseTokenTree(document, { version: SchemaVersion.V2025_10 });
    expect(tokens.map((t) => t.name)).toEqual(['color-primary', 'color-primary-light', 'color-link']);
    expect(tokens[0]).toMatchObject({ path: ['color', 'primary'], rawValue: blue, type: 'color' });
  });

  it('reads $ref tokens as pointer aliases', () => {
    const link = parseTokenTree(document, { version: SchemaVersion.V2025_10 }).tokens[2];
    expect(link.rawValue).toEqual({ $ref: '#/color/primary/$root' });
    expect(link.value).toBe('{"$ref":"#/color/primary/$root"}');
    expect(link.type).toBeUndefined();
  });

  it('treats draft markers as ordinary names', () => {
    const { tokens } = parseTokenTree({ color: { _: { $value: 1 } } }, { version: SchemaVersion.V2025_10 });
    expect(tokens.map((t) => t.name)).toEqual(['color-_']);
  });

  it('records group $extends in each accepted spelling', () => {
    const { extensions } = parseTokenTree(
      {
        base: { a: { $value: 1 } },
        pointer: { $extends: '#/base' },
        curly: { $extends: '{base}' },
        object: { $extends: { $ref: '#/base' } },
      },
      { version: SchemaVersion.V2025_10, filePath: 'theme.json' },
    );

    expect(extensions).toEqual([
      { groupPath: ['pointer'], targetPath: ['base'], raw: '#/base', filePath: 'theme.json', line: 0, character: 0 },
      { groupPath: ['curly'], targetPath: ['base'], raw: '{base}', filePath: 'theme.json', line: 0, character: 0 },
      {
        groupPath: ['object'],
        targetPath: ['base'],
        raw: '{"$ref":"#/base"}',
        filePath: 'theme.json',
        line: 0,
        character: 0,
      },
    ]);
  });

  it('reports an unreadable $extends', () => {
    const { extensions, problems } = parseTokenTree(
      { theme: { $extends: 42 } },
      { version: SchemaVersion.V2025_10, filePath: 'theme.json' },
    );
    expect(extensions).toEqual([]);
    expect(problems[0].tokenName).toBe('theme');
    expect(problems[0].error).toBeInstanceOf(TokenParseError);
    expect(problems[0].error.message.split('\n')[0]).toBe(
      "failed to parse theme.json: group 'theme' has an unreadable $extends value: 42",
    );
  });

  it('rejects string colors', () => {
    const { problems } = parseTokenTree(
      { red: { $type: 'color', $value: '#ff0000' } },
      { version: SchemaVersion.V2025_10 },
    );
    expect(problems[0].error).toBeInstanceOf(InvalidColorFormatError);
  });
});

describe('parseTokenTree options', () => {
  it('passes each token node to validateNode', () => {
    const validateNode = vi.fn();
    const node = { $value: '4px' };
    parseTokenTree({ size: { sm: node } }, { version: SchemaVersion.Draft, validateNode });
    expect(validateNode).toHaveBeenCalledWith(node, 'size-sm');
  });

  it('stamps prefix, source and position on tokens', () => {
    const locate = vi.fn((keyPath: readonly string[]) => ({ line: keyPath.length, character: 4 }));
    const { tokens } = parseTokenTree(
      { size: { sm: { $value: '4px' } } },
      { version: SchemaVersion.Draft, prefix: 'ds', filePath: '/t.json', definitionUri: 'file:///t.json', locate },
    );

    expect(locate).toHaveBeenCalledWith(['size', 'sm']);
    expect(tokens[0]).toMatchObject({
      prefix: 'ds',
      filePath: '/t.json',
      definitionUri: 'file:///t.json',
      line: 2,
      character: 4,
    });
  });
});

describe('value helpers', () => {
  it('stringifies raw values', () => {
    expect(stringifyValue('4px')).toBe('4px');
    expect(stringifyValue(400)).toBe('400');
    expect(stringifyValue(true)).toBe('true');
    expect(stringifyValue(null)).toBe('');
    expect(stringifyValue(['a', 'b'])).toBe('["a","b"]');
  });

  it('recognizes whole-value aliases', () => {
    expect(isAliasValue('{color.primary}')).toBe(true);
    expect(isAliasValue(' {color.primary} ')).toBe(true);
    expect(isAliasValue('{a} {b}')).toBe(false);
    expect(isAliasValue('calc({a} * 2)')).toBe(false);
    expect(isAliasValue({ $ref: '#/a' })).toBe(true);
    expect(isAliasValue({ colorSpace: 'srgb' })).toBe(false);
  });

  it('parses $extends targets', () => {
    expect(parseExtendsTarget('#/theme/base')).toEqual(['theme', 'base']);
    expect(parseExtendsTarget('{theme.base}')).toEqual(['theme', 'base']);
    expect(parseExtendsTarget({ $ref: '#/theme' })).toEqual(['theme']);
    expect(parseExtendsTarget('#/')).toBeUndefined();
    expect(parseExtendsTarget('#/a//b')).toBeUndefined();
    expect(parseExtendsTarget('theme')).toBeUndefined();
    expect(parseExtendsTarget(7)).toBeUndefined();
  });
});
