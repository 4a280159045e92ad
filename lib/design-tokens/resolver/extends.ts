/**
 * Group `$extends` inheritance. Runs after alias resolution: inherited
 * tokens are copies of already resolved tokens.
 */

import type { GroupExtension, Token } from '../types';
import { CircularReferenceError, UnresolvedReferenceError } from '../schema/errors';
import { DependencyGraph } from './graph';

function isUnder(token: Token, groupPath: readonly string[]): boolean {
  return groupPath.length <= token.path.length && groupPath.every((segment, i) => token.path[i] === segment);
}

/**
 * Returns the tokens plus one copy of every target-group token that the
 * extending group does not define itself. Targets are merged before the
 * groups that extend them, so chains inherit transitively.
 * Throws CircularReferenceError for `$extends` cycles.
 */
export function resolveGroupExtensions(tokens: readonly Token[], extensions: readonly GroupExtension[]): Token[] {
  const result = [...tokens];
  if (extensions.length === 0) return result;

  const byGroup = new Map<string, GroupExtension>();
  const graph = new DependencyGraph();
  for (const extension of extensions) {
    const group = extension.groupPath.join('.');
    byGroup.set(group, extension);
    graph.addNode(group, [extension.targetPath.join('.')]);
  }

  // Label a cycle with the file of the group it starts from.
  const cycle = graph.findCycle();
  if (cycle) throw new CircularReferenceError(byGroup.get(cycle[0])?.filePath ?? '', cycle);

  for (const group of graph.topologicalSort()) {
    const extension = byGroup.get(group);
    if (!extension) continue;

    const { groupPath, targetPath } = extension;
    const inherited = result.filter((token) => isUnder(token, targetPath));
    if (inherited.length === 0) {
      throw new UnresolvedReferenceError(extension.filePath, group, extension.raw);
    }

    const own = new Set(
      result.filter((token) => isUnder(token, groupPath)).map((token) => token.path.slice(groupPath.length).join('-')),
    );

    for (const source of inherited) {
      const relativePath = source.path.slice(targetPath.length);
      if (own.has(relativePath.join('-'))) continue;

      const path = [...groupPath, ...relativePath];
      result.push({ ...source, name: path.join('-'), path, reference: `{${path.join('.')}}` });
    }
  }

  return result;
}
