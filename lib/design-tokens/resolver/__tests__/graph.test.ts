import { describe, it, expect } from 'vitest';
import { DependencyGraph, buildDependencyGraph, referenceTokenName } from '../graph';
import { ReferenceType } from '../../parsers/references';
import { parseTokenTree } from '../../parsers/token-tree';
import { SchemaVersion } from '../../schema/version';
import { CircularReferenceError } from '../../schema/errors';

describe('referenceTokenName', () => {
  it('joins reference paths with dashes', () => {
    expect(referenceTokenName({ type: ReferenceType.CurlyBrace, path: 'color.primary' }, SchemaVersion.Draft)).toBe(
      'color-primary',
    );
    expect(referenceTokenName({ type: ReferenceType.JSONPointer, path: 'color/primary' }, SchemaVersion.V2025_10)).toBe(
      'color-primary',
    );
  });

  it('drops $root segments under 2025.10 only', () => {
    const reference = { type: ReferenceType.CurlyBrace, path: 'color.primary.$root' };
    expect(referenceTokenName(reference, SchemaVersion.V2025_10)).toBe('color-primary');
    expect(referenceTokenName(reference, SchemaVersion.Draft)).toBe('color-primary-$root');
  });
});

describe('DependencyGraph', () => {
  it('tracks dependencies and dependents', () => {
    const graph = new DependencyGraph();
    graph.addNode('a', ['b', 'c']);
    graph.addNode('d', ['b']);

    expect(graph.getDependencies('a')).toEqual(['b', 'c']);
    expect(graph.getDependents('b')).toEqual(['a', 'd']);
    expect(graph.getDependents('a')).toEqual([]);
    expect(graph.hasNode('c')).toBe(true);
    expect(graph.hasNode('z')).toBe(false);
  });

  it('sorts dependencies before dependents', () => {
    const graph = new DependencyGraph();
    graph.addNode('a', ['b']);
    graph.addNode('b', ['c']);
    graph.addNode('e');

    expect(graph.hasCycle()).toBe(false);
    expect(graph.topologicalSort()).toEqual(['c', 'b', 'a', 'e']);
  });

  it('reports the cycle it finds', () => {
    const graph = new DependencyGraph();
    graph.addNode('a', ['b']);
    graph.addNode('b', ['c']);
    graph.addNode('c', ['a']);

    expect(graph.hasCycle()).toBe(true);
    expect(graph.findCycle()).toEqual(['a', 'b', 'c', 'a']);
  });

  it('detects self references', () => {
    const graph = new DependencyGraph();
    graph.addNode('a', ['a']);
    expect(graph.findCycle()).toEqual(['a', 'a']);
  });

  it('refuses to sort a cyclic graph', () => {
    const graph = new DependencyGraph();
    graph.addNode('a', ['b']);
    graph.addNode('b', ['a']);

    expect(() => graph.topologicalSort('tokens.json')).toThrow(CircularReferenceError);
    expect(() => graph.topologicalSort('tokens.json')).toThrow('circular reference detected in tokens.json: a → b → a');
  });
});

describe('buildDependencyGraph', () => {
  it('adds an edge for every reference of every token', () => {
    const { tokens } = parseTokenTree(
      {
        space: {
          base: { $value: '4px' },
          lg: { $value: 'calc({space.base} * 4)' },
          gap: { $value: '{space.lg}' },
        },
      },
      { version: SchemaVersion.Draft },
    );

    const graph = buildDependencyGraph(tokens);
    expect(graph.getDependencies('space-gap')).toEqual(['space-lg']);
    expect(graph.getDependents('space-base')).toEqual(['space-lg']);
    expect(graph.topologicalSort()).toEqual(['space-base', 'space-lg', 'space-gap']);
  });
});
