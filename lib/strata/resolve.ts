// resolve.ts
//
// Path resolution across stacked scopes.
//
// Within one scope the spec is matched depth-first: `*` fans out over every
// child in `childKeys` order, while a literal segment follows the exact child
// and then, independently, a child literally keyed `*` (a catch-all entry
// such as `server.*.timeout`). Both branches may contribute results.
//
// When a scope's pass leaves the limit unmet and the scope inherits from
// another tree, the search continues there. A lookup that started on an
// interior node is re-anchored first: the node's own path is prepended so
// the parent scope is searched from its root with the absolute path.
//
// Results from the nearest scope come first; results are never re-sorted
// across scopes.

import { WILDCARD } from "./key-spec.ts";
import type { Node } from "./node.ts";

/**
 * All nodes matching `segments`, nearest scope first. `limit > 0` stops the
 * search as soon as that many nodes were found; `0` means no limit. An empty
 * spec resolves to the starting node itself.
 */
export function resolveNodes(
  node: Node | undefined,
  segments: readonly string[],
  limit = 0,
): Node[] {
  const result: Node[] = [];
  if (!node) return result;
  if (segments.length === 0) return [node];

  const full = () => limit > 0 && result.length >= limit;

  const visit = (current: Node, spec: readonly string[], index: number) => {
    const last = index + 1 === spec.length;
    const follow = (next: Node) => {
      if (full()) return;
      if (last) result.push(next);
      else visit(next, spec, index + 1);
    };

    const segment = spec[index];
    if (segment === WILDCARD) {
      for (const child of current.childNodes) {
        if (full()) return;
        follow(child);
      }
      return;
    }

    const exact = current.child(segment);
    if (exact) follow(exact);
    const catchAll = current.child(WILDCARD);
    if (catchAll) follow(catchAll);
  };

  let scopeNode = node;
  let spec = segments;
  for (;;) {
    visit(scopeNode, spec, 0);
    if (full()) break;

    const inherited = scopeNode.getRoot().scopeParent;
    if (!inherited) break;

    if (!scopeNode.isRoot) spec = [...scopeNode.path(), ...spec];
    scopeNode = inherited;
  }

  return result;
}

/** The first node matching `segments`, or `undefined` when none does. */
export function findFirst(
  node: Node | undefined,
  segments: readonly string[],
): Node | undefined {
  return resolveNodes(node, segments, 1)[0];
}
