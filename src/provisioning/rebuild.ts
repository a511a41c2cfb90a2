import type { Catalog } from "../catalog/builder.js";
import type { StructuredLogger } from "../logger.js";
import type { TrackerClient } from "../tracker/types.js";
import { buildDependencyGraph } from "./graph.js";
import { planRun } from "./planner.js";
import { type SetupReport, runSetup } from "./setup.js";
import { type TeardownReport, runTeardown } from "./teardown.js";

export interface RebuildDependencies {
  readonly tracker: TrackerClient;
  readonly logger: StructuredLogger;
  readonly concurrency: number;
  readonly screenFieldIds?: readonly string[];
  /** Asks the operator to proceed; resolves `true` to continue. */
  readonly confirm: () => Promise<boolean>;
}

export interface RebuildOptions {
  /** Catalog covering every setup phase. */
  readonly catalog: Catalog;
  /** Projects whose issues are removed first. */
  readonly projectKeys: readonly string[];
  /** Skips {@link RebuildDependencies.confirm}. */
  readonly force: boolean;
  readonly dryRun: boolean;
}

export type RebuildResult =
  | { readonly aborted: true }
  | { readonly aborted: false; readonly teardown: TeardownReport; readonly setup: SetupReport };

/**
 * Removes the provisioned issues, then provisions every phase again. The
 * catalog is validated before the confirmation prompt so a broken catalog never
 * leaves the tracker emptied. Setup only starts once every teardown deletion
 * has settled.
 */
export async function runRebuild(deps: RebuildDependencies, options: RebuildOptions): Promise<RebuildResult> {
  const graph = buildDependencyGraph(options.catalog.entities, options.catalog.preExisting);
  const plan = planRun(graph);

  if (!options.force && !options.dryRun) {
    const confirmed = await deps.confirm();
    if (!confirmed) {
      deps.logger.warn("rebuild_aborted", { reason: "confirmation_declined" });
      return { aborted: true };
    }
  }

  deps.logger.info("rebuild_phase_started", { phase: "teardown" });
  const teardown = await runTeardown(
    options.projectKeys,
    { tracker: deps.tracker, logger: deps.logger, concurrency: deps.concurrency, dryRun: options.dryRun },
    { includeProjects: false },
  );

  deps.logger.info("rebuild_phase_started", { phase: "setup" });
  const setup = await runSetup(plan, graph, {
    tracker: deps.tracker,
    logger: deps.logger,
    concurrency: deps.concurrency,
    dryRun: options.dryRun,
    ...(deps.screenFieldIds === undefined ? {} : { screenFieldIds: deps.screenFieldIds }),
  });

  return { aborted: false, teardown, setup };
}
