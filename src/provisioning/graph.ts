import { type EntityDefinition, identityKey } from "../catalog/types.js";
import { CycleError, DanglingParentError, DuplicateIdentityError } from "../errors.js";

/**
 * Immutable dependency graph built from the catalog. Nodes keep catalog order;
 * `children` stores parent to child edges by identity key.
 */
export interface DependencyGraph {
  readonly nodes: readonly EntityDefinition[];
  readonly byKey: ReadonlyMap<string, EntityDefinition>;
  /** Catalog position of every node, used to break ties deterministically. */
  readonly order: ReadonlyMap<string, number>;
  readonly children: ReadonlyMap<string, readonly string[]>;
  readonly preExisting: ReadonlyMap<string, string | null>;
}

/** Identity key of the parent of {@link definition}, or `null` for roots. */
export function parentKeyOf(definition: EntityDefinition): string | null {
  return definition.parent ? identityKey(definition.parent) : null;
}

/**
 * Builds the dependency graph and validates its structure before anything is
 * sent to the tracker.
 *
 * @throws DuplicateIdentityError when two definitions share a logical identity.
 * @throws DanglingParentError when a parent is neither in the catalog nor pre-existing.
 * @throws CycleError when following parents from a node revisits a node.
 */
export function buildDependencyGraph(
  entities: readonly EntityDefinition[],
  preExisting: ReadonlyMap<string, string | null> = new Map(),
): DependencyGraph {
  const byKey = new Map<string, EntityDefinition>();
  const order = new Map<string, number>();
  entities.forEach((definition, index) => {
    const key = identityKey(definition);
    if (byKey.has(key)) {
      throw new DuplicateIdentityError(key);
    }
    byKey.set(key, definition);
    order.set(key, index);
  });

  const children = new Map<string, string[]>();
  for (const key of byKey.keys()) {
    children.set(key, []);
  }

  for (const [key, definition] of byKey) {
    const parentKey = parentKeyOf(definition);
    if (parentKey === null) {
      continue;
    }
    const siblings = children.get(parentKey);
    if (siblings) {
      siblings.push(key);
    } else if (!preExisting.has(parentKey)) {
      throw new DanglingParentError(key, parentKey);
    }
  }

  assertAcyclic(byKey);

  return { nodes: [...entities], byKey, order, children, preExisting };
}

/**
 * Walks the parent chain of every node. Each node has at most one parent, so a
 * chain that revisits a node is a cycle. Nodes proven to reach a root are
 * memoised, which keeps the walk linear.
 */
function assertAcyclic(byKey: ReadonlyMap<string, EntityDefinition>): void {
  const rooted = new Set<string>();

  for (const start of byKey.keys()) {
    const chain: string[] = [];
    const onChain = new Set<string>();
    let current: string | null = start;

    while (current !== null && byKey.has(current) && !rooted.has(current)) {
      if (onChain.has(current)) {
        const cycleStart = chain.indexOf(current);
        throw new CycleError([...chain.slice(cycleStart), current]);
      }
      onChain.add(current);
      chain.push(current);
      const definition = byKey.get(current);
      current = definition ? parentKeyOf(definition) : null;
    }

    for (const key of chain) {
      rooted.add(key);
    }
  }
}
