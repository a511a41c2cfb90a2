import type { EntityDefinition } from "../catalog/types.js";
import { identityKey } from "../catalog/types.js";
import { CycleError } from "../errors.js";
import { type DependencyGraph, parentKeyOf } from "./graph.js";

/**
 * Ordered topological layers. Every parent of an entity in `levels[i]` sits in
 * an earlier level or pre-exists in the tracker.
 */
export interface RunPlan {
  readonly levels: readonly (readonly EntityDefinition[])[];
}

/** Total number of entities scheduled by {@link plan}. */
export function planSize(plan: RunPlan): number {
  return plan.levels.reduce((total, level) => total + level.length, 0);
}

/**
 * Layered Kahn traversal: each pass peels the nodes whose in-graph parent is
 * already placed. Ties inside a level follow catalog order so identical input
 * always yields identical levels.
 */
export function planRun(graph: DependencyGraph): RunPlan {
  const indegree = new Map<string, number>();
  for (const [key, definition] of graph.byKey) {
    const parentKey = parentKeyOf(definition);
    indegree.set(key, parentKey !== null && graph.byKey.has(parentKey) ? 1 : 0);
  }

  const byCatalogOrder = (left: string, right: string): number =>
    (graph.order.get(left) ?? 0) - (graph.order.get(right) ?? 0);

  let ready = Array.from(indegree.entries())
    .filter(([, value]) => value === 0)
    .map(([key]) => key)
    .sort(byCatalogOrder);

  const levels: EntityDefinition[][] = [];
  let placed = 0;

  while (ready.length > 0) {
    const level: EntityDefinition[] = [];
    const next: string[] = [];
    for (const key of ready) {
      const definition = graph.byKey.get(key);
      if (!definition) {
        continue;
      }
      level.push(definition);
      placed += 1;
      for (const child of graph.children.get(key) ?? []) {
        const remaining = (indegree.get(child) ?? 0) - 1;
        indegree.set(child, remaining);
        if (remaining === 0) {
          next.push(child);
        }
      }
    }
    levels.push(level);
    ready = next.sort(byCatalogOrder);
  }

  // Unreachable after buildDependencyGraph, kept so the planner never returns a partial plan.
  if (placed !== graph.byKey.size) {
    const stuck = Array.from(indegree.entries())
      .filter(([, value]) => value > 0)
      .map(([key]) => key);
    throw new CycleError(stuck);
  }

  return { levels };
}

/** Flat list of `type:project:name` keys, level by level. Handy for logs and tests. */
export function describePlan(plan: RunPlan): string[][] {
  return plan.levels.map((level) => level.map((definition) => identityKey(definition)));
}
