import pLimit from "p-limit";

import { CycleError, PartialTeardownError, describeError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { TrackerClient, TrackerRef } from "../tracker/types.js";
import { type EntityOutcome, type RunReport, failedOutcome } from "./report.js";

/** One discovered entity along with the children the tracker reported for it. */
export interface DiscoveredNode {
  readonly ref: TrackerRef;
  readonly children: readonly TrackerRef[];
}

/** Live structure found under the target projects, in discovery order. */
export interface Discovery {
  readonly roots: readonly TrackerRef[];
  readonly nodes: ReadonlyMap<string, DiscoveredNode>;
}

export interface TeardownNode extends DiscoveredNode {
  /** Longest path from the owning project. */
  readonly depth: number;
}

/** Levels to delete, deepest first. */
export interface TeardownPlan {
  readonly levels: readonly (readonly TeardownNode[])[];
}

export interface TeardownDependencies {
  readonly tracker: TrackerClient;
  readonly logger: StructuredLogger;
  readonly concurrency: number;
  readonly dryRun?: boolean;
}

export interface TeardownOptions {
  /** Also delete the project containers (`--teardown-all`). */
  readonly includeProjects: boolean;
}

export interface TeardownReport extends RunReport {
  readonly phase: "teardown";
  readonly plan: TeardownPlan;
}

export function refKey(ref: TrackerRef): string {
  return `${ref.type}:${ref.id}`;
}

/**
 * Walks the tracker breadth first from each existing project. Projects that do
 * not exist are skipped; a project whose subtree cannot be listed is reported
 * through {@link onProjectFailure} and left out of the discovery.
 */
export async function discoverStructure(
  tracker: TrackerClient,
  projectKeys: readonly string[],
  options: {
    concurrency: number;
    logger: StructuredLogger;
    onProjectFailure: (projectKey: string, error: unknown) => void;
  },
): Promise<Discovery> {
  const limit = pLimit(Math.max(1, options.concurrency));
  const roots: TrackerRef[] = [];
  const nodes = new Map<string, DiscoveredNode>();

  for (const projectKey of projectKeys) {
    try {
      const project = await tracker.findEntity("project", projectKey, projectKey, null);
      if (!project) {
        options.logger.info("teardown_project_absent", { project: projectKey });
        continue;
      }

      const projectNodes = new Map<string, DiscoveredNode>();
      const root: TrackerRef = { type: "project", id: project.id };
      const seen = new Set<string>([refKey(root)]);
      let frontier: TrackerRef[] = [root];
      while (frontier.length > 0) {
        const listed = await Promise.all(
          frontier.map((ref) => limit(async () => ({ ref, children: await tracker.listChildren(ref.type, ref.id) }))),
        );
        const next: TrackerRef[] = [];
        for (const node of listed) {
          projectNodes.set(refKey(node.ref), node);
          for (const child of node.children) {
            const key = refKey(child);
            if (!seen.has(key) && !nodes.has(key)) {
              seen.add(key);
              next.push(child);
            }
          }
        }
        frontier = next;
      }

      roots.push(root);
      for (const [key, node] of projectNodes) {
        nodes.set(key, node);
      }
      options.logger.info("teardown_discovered", { project: projectKey, entities: projectNodes.size - 1 });
    } catch (error) {
      options.onProjectFailure(projectKey, error);
    }
  }

  return { roots, nodes };
}

/**
 * Orders the discovered structure for deletion. Each entity is placed at the
 * longest path from its project so that an entity reachable along several
 * routes (a constraint is listed under its project and under the issue it
 * blocks) is deleted after everything below it. Levels are returned deepest
 * first; projects are dropped unless {@link TeardownOptions.includeProjects}.
 *
 * @throws CycleError when the live structure loops back on itself.
 */
export function planTeardown(discovery: Discovery, options: TeardownOptions): TeardownPlan {
  const indegree = new Map<string, number>();
  for (const key of discovery.nodes.keys()) {
    indegree.set(key, 0);
  }
  for (const node of discovery.nodes.values()) {
    for (const child of node.children) {
      const key = refKey(child);
      if (indegree.has(key)) {
        indegree.set(key, (indegree.get(key) ?? 0) + 1);
      }
    }
  }

  const depth = new Map<string, number>();
  const ready: string[] = [];
  for (const [key, value] of indegree) {
    if (value === 0) {
      depth.set(key, 0);
      ready.push(key);
    }
  }

  let placed = 0;
  while (ready.length > 0) {
    const key = ready.shift();
    const node = key === undefined ? undefined : discovery.nodes.get(key);
    if (key === undefined || !node) {
      continue;
    }
    placed += 1;
    const nodeDepth = depth.get(key) ?? 0;
    for (const child of node.children) {
      const childKey = refKey(child);
      if (!indegree.has(childKey)) {
        continue;
      }
      depth.set(childKey, Math.max(depth.get(childKey) ?? 0, nodeDepth + 1));
      const remaining = (indegree.get(childKey) ?? 0) - 1;
      indegree.set(childKey, remaining);
      if (remaining === 0) {
        ready.push(childKey);
      }
    }
  }

  if (placed !== discovery.nodes.size) {
    const stuck = Array.from(indegree.entries())
      .filter(([, value]) => value > 0)
      .map(([key]) => key);
    throw new CycleError(stuck);
  }

  const byDepth = new Map<number, TeardownNode[]>();
  for (const [key, node] of discovery.nodes) {
    if (node.ref.type === "project" && !options.includeProjects) {
      continue;
    }
    const nodeDepth = depth.get(key) ?? 0;
    const bucket = byDepth.get(nodeDepth) ?? [];
    bucket.push({ ...node, depth: nodeDepth });
    byDepth.set(nodeDepth, bucket);
  }

  const levels = Array.from(byDepth.keys())
    .sort((left, right) => right - left)
    .map((level) => byDepth.get(level) ?? []);
  return { levels };
}

/**
 * Discovers the live structure under {@link projectKeys} and deletes it leaves
 * first. An entity is deleted only once every child discovered under it has
 * been deleted in this run; otherwise it is kept and reported with
 * {@link PartialTeardownError}, which in turn keeps its ancestors.
 */
export async function runTeardown(
  projectKeys: readonly string[],
  deps: TeardownDependencies,
  options: TeardownOptions,
): Promise<TeardownReport> {
  const { tracker, logger } = deps;
  const outcomes: EntityOutcome[] = [];

  const discovery = await discoverStructure(tracker, projectKeys, {
    concurrency: deps.concurrency,
    logger,
    onProjectFailure: (projectKey, error) => {
      logger.error("teardown_discovery_failed", { project: projectKey, error: describeError(error) });
      outcomes.push(failedOutcome("project", `project:${projectKey}`, error, projectKey));
    },
  });

  const plan = planTeardown(discovery, options);
  const deleted = new Set<string>();
  const limit = pLimit(Math.max(1, deps.concurrency));

  async function remove(node: TeardownNode): Promise<EntityOutcome> {
    const key = refKey(node.ref);
    const remaining = node.children.filter((child) => !deleted.has(refKey(child)));
    if (remaining.length > 0) {
      const error = new PartialTeardownError(node.ref.id, remaining.map((child) => child.id));
      logger.warn("entity_delete_blocked", { entity: key, remaining: remaining.map(refKey) });
      return failedOutcome(node.ref.type, key, error, node.ref.id);
    }
    try {
      await tracker.deleteEntity(node.ref.type, node.ref.id);
      deleted.add(key);
      logger.info("entity_deleted", { entity: key, dry_run: deps.dryRun ?? false });
      return { type: node.ref.type, label: key, status: "deleted", trackerId: node.ref.id };
    } catch (error) {
      logger.error("entity_delete_failed", { entity: key, error: describeError(error) });
      return failedOutcome(node.ref.type, key, error, node.ref.id);
    }
  }

  for (const [index, level] of plan.levels.entries()) {
    logger.info("teardown_level_started", { level: index, entities: level.length });
    const results = await Promise.all(level.map((node) => limit(() => remove(node))));
    outcomes.push(...results);
  }

  return { phase: "teardown", dryRun: deps.dryRun ?? false, outcomes, plan };
}
