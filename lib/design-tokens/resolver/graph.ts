/**
 * Dependency graph over token names (aliases) or group paths ($extends).
 * Built fresh for every resolution pass; nothing here is shared.
 */

import type { Token } from '../types';
import { CircularReferenceError } from '../schema/errors';
import { SchemaVersion } from '../schema/version';
import { extractReferencesFromValue, referenceTokenPath, type Reference } from '../parsers/references';

/**
 * Token name a reference points at. `$root` segments name the group's own
 * token under 2025.10, so `{color.primary.$root}` is `color-primary`.
 */
export function referenceTokenName(reference: Reference, version: SchemaVersion): string {
  let segments = referenceTokenPath(reference).split('.');
  if (version === SchemaVersion.V2025_10) {
    segments = segments.filter((segment) => segment !== '$root');
  }
  return segments.join('-');
}

export class DependencyGraph {
  private readonly dependencies = new Map<string, string[]>();
  private readonly dependents = new Map<string, string[]>();
  private readonly nodes = new Set<string>();

  /** Adds `node`, and an edge to each of `dependsOn`. */
  addNode(node: string, dependsOn: readonly string[] = []): void {
    this.nodes.add(node);
    for (const dependency of dependsOn) {
      this.nodes.add(dependency);
      this.dependencies.set(node, [...(this.dependencies.get(node) ?? []), dependency]);
      this.dependents.set(dependency, [...(this.dependents.get(dependency) ?? []), node]);
    }
  }

  getDependencies(node: string): string[] {
    return this.dependencies.get(node) ?? [];
  }

  getDependents(node: string): string[] {
    return this.dependents.get(node) ?? [];
  }

  hasNode(node: string): boolean {
    return this.nodes.has(node);
  }

  hasCycle(): boolean {
    return this.findCycle() !== null;
  }

  /** First cycle found, as `[a, b, ..., a]`, or null. */
  findCycle(): string[] | null {
    const visited = new Set<string>();
    const stack: string[] = [];

    const visit = (node: string): string[] | null => {
      const index = stack.indexOf(node);
      if (index !== -1) return [...stack.slice(index), node];
      if (visited.has(node)) return null;

      visited.add(node);
      stack.push(node);
      for (const dependency of this.getDependencies(node)) {
        const cycle = visit(dependency);
        if (cycle) return cycle;
      }
      stack.pop();
      return null;
    };

    for (const node of this.nodes) {
      const cycle = visit(node);
      if (cycle) return cycle;
    }
    return null;
  }

  /** Dependencies before dependents. Throws CircularReferenceError on a cycle. */
  topologicalSort(filePath = ''): string[] {
    const cycle = this.findCycle();
    if (cycle) throw new CircularReferenceError(filePath, cycle);

    const visited = new Set<string>();
    const order: string[] = [];
    const visit = (node: string): void => {
      visited.add(node);
      for (const dependency of this.getDependencies(node)) {
        if (!visited.has(dependency)) visit(dependency);
      }
      order.push(node);
    };

    for (const node of this.nodes) {
      if (!visited.has(node)) visit(node);
    }
    return order;
  }
}

export function buildDependencyGraph(tokens: readonly Token[]): DependencyGraph {
  const graph = new DependencyGraph();
  for (const token of tokens) {
    const references = extractReferencesFromValue(token.rawValue, token.schemaVersion);
    graph.addNode(
      token.name,
      references.map((reference) => referenceTokenName(reference, token.schemaVersion)),
    );
  }
  return graph;
}
