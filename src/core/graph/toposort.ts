/**
 * Topological ordering of modules by their dependencies (Kahn's algorithm).
 *
 * Dependencies outside the input set are ignored. Among modules that are
 * ready at the same time, the one listed first in the input wins, so the
 * input order (discovery order) is the tiebreaker.
 *
 * Cycles do not abort ordering: when no module is ready, the cycle among the
 * remaining modules is recorded and the earliest-listed remaining module is
 * released with its unmet dependencies ignored.
 */

export interface ToposortItem {
  id: string;
  dependencies: readonly string[];
}

export interface ToposortResult {
  order: string[];
  /** Each cycle lists its members and ends with a repeat of the first. */
  cycles: string[][];
}

export function toposort(items: readonly ToposortItem[]): ToposortResult {
  const knownIds = new Set(items.map((item) => item.id));
  const position = new Map(items.map((item, index) => [item.id, index]));
  const successors = new Map<string, string[]>();
  const inDegree = new Map<string, number>();

  for (const item of items) {
    successors.set(item.id, []);
    inDegree.set(item.id, 0);
  }
  for (const item of items) {
    for (const dependency of new Set(item.dependencies)) {
      if (!knownIds.has(dependency) || dependency === item.id) continue;
      successors.get(dependency)?.push(item.id);
      inDegree.set(item.id, (inDegree.get(item.id) ?? 0) + 1);
    }
  }

  const order: string[] = [];
  const cycles: string[][] = [];
  const emitted = new Set<string>();
  const ready = new Set<string>(items.filter((item) => inDegree.get(item.id) === 0).map((item) => item.id));

  const takeEarliest = (candidates: Iterable<string>): string | undefined => {
    let best: string | undefined;
    for (const id of candidates) {
      if (best === undefined || (position.get(id) ?? 0) < (position.get(best) ?? 0)) best = id;
    }
    return best;
  };

  while (order.length < items.length) {
    let next = takeEarliest(ready);
    if (next === undefined) {
      const cycle = findCycle(items, knownIds, emitted);
      if (cycle) cycles.push(cycle);
      next = takeEarliest(items.map((item) => item.id).filter((id) => !emitted.has(id)));
      if (next === undefined) break;
    }

    ready.delete(next);
    emitted.add(next);
    order.push(next);
    for (const successor of successors.get(next) ?? []) {
      if (emitted.has(successor)) continue;
      const degree = (inDegree.get(successor) ?? 0) - 1;
      inDegree.set(successor, degree);
      if (degree <= 0) ready.add(successor);
    }
  }

  return { order, cycles };
}

/**
 * Finds one cycle among the modules not yet emitted, by DFS in input order.
 * Returns it as an ID path ending with a repeat of the first ID.
 */
export function findCycle(
  items: readonly ToposortItem[],
  knownIds: ReadonlySet<string>,
  emitted: ReadonlySet<string> = new Set()
): string[] | null {
  const remaining = items.filter((item) => !emitted.has(item.id));
  const dependencies = new Map<string, string[]>();
  for (const item of remaining) {
    dependencies.set(
      item.id,
      item.dependencies.filter((dependency) => knownIds.has(dependency) && !emitted.has(dependency))
    );
  }

  const visiting = new Set<string>();
  const visited = new Set<string>();
  const path: string[] = [];

  for (const item of remaining) {
    const cycle = dfs(item.id, dependencies, visiting, visited, path);
    if (cycle) return cycle;
  }
  return null;
}

function dfs(
  node: string,
  dependencies: Map<string, string[]>,
  visiting: Set<string>,
  visited: Set<string>,
  path: string[]
): string[] | null {
  if (visited.has(node)) return null;
  if (visiting.has(node)) {
    return [...path.slice(path.indexOf(node)), node];
  }

  visiting.add(node);
  path.push(node);
  for (const dependency of dependencies.get(node) ?? []) {
    const cycle = dfs(dependency, dependencies, visiting, visited, path);
    if (cycle) return cycle;
  }
  path.pop();
  visiting.delete(node);
  visited.add(node);
  return null;
}

/** True when `from` depending on `to` would close a cycle in `adjacency`. */
export function wouldCreateCycle(
  adjacency: ReadonlyMap<string, readonly string[]>,
  from: string,
  to: string
): boolean {
  if (from === to) return true;
  const stack = [to];
  const seen = new Set<string>();
  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined) break;
    if (current === from) return true;
    if (seen.has(current)) continue;
    seen.add(current);
    stack.push(...(adjacency.get(current) ?? []));
  }
  return false;
}
