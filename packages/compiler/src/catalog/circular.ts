/**
 * Cycle detection over event kind inheritance and binding requirements
 */

/**
 * Find a cycle using depth-first search. Returns the path that closes
 * the cycle, or null when the graph is acyclic.
 */
export const findCycle = (
  edges: ReadonlyMap<string, readonly string[]>
): readonly string[] | null => {
  const visited = new Set<string>();
  const stack = new Set<string>();

  const visit = (node: string, path: readonly string[]): string[] | null => {
    if (stack.has(node)) {
      return [...path.slice(path.indexOf(node)), node];
    }

    if (visited.has(node)) {
      return null;
    }

    visited.add(node);
    stack.add(node);

    for (const next of edges.get(node) ?? []) {
      const cycle = visit(next, [...path, node]);
      if (cycle) {
        return cycle;
      }
    }

    stack.delete(node);
    return null;
  };

  for (const [node] of edges) {
    const cycle = visit(node, []);
    if (cycle) {
      return cycle;
    }
  }

  return null;
};

export const formatCycle = (cycle: readonly string[]): string =>
  cycle.join(" → ");
