import { describe, it, expect } from 'vitest';
import { decodeYAMLDocument, parseYAMLTokens } from '../yaml-parser';
import { SchemaVersion } from '../../schema/version';
import { TokenParseError } from '../../schema/errors';

const options = { version: SchemaVersion.Draft, filePath: '/work/tokens.yaml' };

describe('parseYAMLTokens', () => {
  const content = [
    'color:',
    '  $type: color',
    '  primary:',
    '    $value: "#ff0000"',
    '  "quoted":',
    '    $value: "#00ff00"',
    'spacing:',
    '  sm:',
    '    $value: 4px',
    '',
  ].join('\n');

  it('flattens tokens and inherits group types', () => {
    const { tokens } = parseYAMLTokens(content, options);
    expect(tokens.map((t) => [t.name, t.value, t.type])).toEqual([
      ['color-primary', '#ff0000', 'color'],
      ['color-quoted', '#00ff00', 'color'],
      ['spacing-sm', '4px', undefined],
    ]);
  });

  it('points tokens at their keys, past any opening quote', () => {
    const { tokens } = parseYAMLTokens(content, options);
    expect(tokens.map((t) => [t.line, t.character])).toEqual([
      [2, 2],
      [4, 3],
      [7, 2],
    ]);
  });

  it('reads 2025.10 documents', () => {
    const yaml = [
      'color:',
      '  brand:',
      '    $root:',
      '      $type: color',
      '      $value: { colorSpace: srgb, components: [1, 0, 0] }',
      '  link:',
      '    $ref: "#/color/brand/$root"',
    ].join('\n');

    const { tokens, problems } = parseYAMLTokens(yaml, { ...options, version: SchemaVersion.V2025_10 });
    expect(problems).toEqual([]);
    expect(tokens.map((t) => [t.name, t.line, t.character])).toEqual([
      ['color-brand', 2, 4],
      ['color-link', 5, 2],
    ]);
    expect(tokens[0].rawValue).toEqual({ colorSpace: 'srgb', components: [1, 0, 0] });
  });
});

describe('decodeYAMLDocument', () => {
  it('throws TokenParseError on syntax errors', () => {
    expect(() => decodeYAMLDocument('a: [1, 2', 'bad.yaml')).toThrow(TokenParseError);
    expect(() => decodeYAMLDocument('a: [1, 2', 'bad.yaml')).toThrow(/^failed to parse bad\.yaml: /);
  });

  it('rejects a root that is not a mapping', () => {
    expect(() => decodeYAMLDocument('- a\n- b', 'list.yaml')).toThrow('document root must be a mapping');
    expect(() => decodeYAMLDocument('', 'empty.yaml')).toThrow('document root must be a mapping');
  });
});
