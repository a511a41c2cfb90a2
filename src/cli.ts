import { realpathSync } from "node:fs";
import process from "node:process";
import { createInterface } from "node:readline/promises";
import { fileURLToPath } from "node:url";
import { config as loadDotenv } from "dotenv";

import { ComponentMappingBridge, createPool } from "./bridge/componentMapping.js";
import { type Catalog, type ComponentMapping, type FeatureRef, buildCatalog, catalogFeatures } from "./catalog/builder.js";
import { type CatalogData, loadCatalogData } from "./catalog/data.js";
import { SETUP_PHASES, type SetupPhase, identityKey } from "./catalog/types.js";
import type { EnvSource } from "./config/env.js";
import { type Settings, describeSettings, loadSettings } from "./config/settings.js";
import { ProvisioningError, describeError, isPreflightError } from "./errors.js";
import { type LogStream, StructuredLogger } from "./logger.js";
import { buildDependencyGraph } from "./provisioning/graph.js";
import { planRun } from "./provisioning/planner.js";
import { runRebuild } from "./provisioning/rebuild.js";
import { type RunReport, formatSummaryTable, hasFailures } from "./provisioning/report.js";
import { runSetup } from "./provisioning/setup.js";
import { runTeardown } from "./provisioning/teardown.js";
import { DryRunTracker, type SimulatedMutation } from "./tracker/dryRun.js";
import { JiraTrackerClient } from "./tracker/jiraClient.js";
import { RetryingTracker } from "./tracker/retrying.js";
import type { TrackerClient } from "./tracker/types.js";

export const EXIT_OK = 0;
export const EXIT_FAILURES = 1;
export const EXIT_USAGE = 2;

export type CliAction =
  | { readonly kind: "setup"; readonly phases: readonly SetupPhase[] }
  | { readonly kind: "teardown"; readonly includeProjects: boolean }
  | { readonly kind: "rebuild" }
  | { readonly kind: "test-connection" }
  | { readonly kind: "show-config" }
  | { readonly kind: "help" };

export interface CliOptions {
  readonly action: CliAction | null;
  readonly force: boolean;
  readonly dryRun: boolean;
  readonly verbose: boolean;
  readonly format: "text" | "json";
  readonly concurrency?: number;
}

/** Raised for malformed command lines; always exits with {@link EXIT_USAGE}. */
export class UsageError extends ProvisioningError {
  constructor(message: string) {
    super(message, "E-PROVISION-USAGE");
    this.name = "UsageError";
  }
}

/** Live tracker connection handed to the CLI; replaced by a fake in tests. */
export interface TrackerHandle {
  readonly client: TrackerClient;
  testConnection(): Promise<{ name: string; displayName?: string | undefined }>;
  close(): Promise<void>;
}

/** Source of component mappings, backed by the mapping database by default. */
export interface MappingSource {
  fetchMappings(features: readonly FeatureRef[]): Promise<ComponentMapping[]>;
  close(): Promise<void>;
}

export interface CliRuntime {
  readonly env: EnvSource;
  readonly stdout: LogStream;
  /** Receives log lines, prompts and error messages. */
  readonly stderr: LogStream;
  readonly prompt?: (question: string) => Promise<string>;
  readonly openTracker?: (settings: Settings, logger: StructuredLogger) => TrackerHandle;
  readonly openMappingSource?: (settings: Settings, logger: StructuredLogger) => MappingSource;
  readonly loadCatalog?: () => Promise<CatalogData>;
}

const PHASE_FLAGS: Record<string, SetupPhase> = {
  "--issue-types": "issue-types",
  "--fields": "fields",
  "--projects": "projects",
  "--versions": "versions",
  "--hierarchy": "hierarchy",
  "--constraints": "constraints",
  "--feature-versions": "feature-versions",
  "--component-mapping": "component-mapping",
};

/** Word the operator has to type before each destructive action. */
const CONFIRMATION_WORDS = {
  teardown: "yes",
  "teardown-all": "DELETE",
  rebuild: "yes",
} as const;

function parseArgs(argv: readonly string[]): CliOptions {
  const phases = new Set<SetupPhase>();
  const exclusive: string[] = [];
  let action: CliAction | null = null;
  let force = false;
  let dryRun = false;
  let verbose = false;
  let format: "text" | "json" = "text";
  let concurrency: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const token = argv[i];
    const phase = token === undefined ? undefined : PHASE_FLAGS[token];
    if (phase) {
      phases.add(phase);
      continue;
    }
    switch (token) {
      case "--all":
        SETUP_PHASES.forEach((candidate) => phases.add(candidate));
        break;
      case "--teardown":
        exclusive.push(token);
        action = { kind: "teardown", includeProjects: false };
        break;
      case "--teardown-all":
        exclusive.push(token);
        action = { kind: "teardown", includeProjects: true };
        break;
      case "--rebuild":
        exclusive.push(token);
        action = { kind: "rebuild" };
        break;
      case "--test-connection":
        exclusive.push(token);
        action = { kind: "test-connection" };
        break;
      case "--show-config":
        exclusive.push(token);
        action = { kind: "show-config" };
        break;
      case "-h":
      case "--help":
        return { action: { kind: "help" }, force, dryRun, verbose, format };
      case "-f":
      case "--force":
        force = true;
        break;
      case "--dry-run":
        dryRun = true;
        break;
      case "--verbose":
        verbose = true;
        break;
      case "--format": {
        const value = argv[++i];
        if (value !== "json" && value !== "text") {
          throw new UsageError("--format must be 'json' or 'text'");
        }
        format = value;
        break;
      }
      case "--concurrency": {
        const value = argv[++i];
        const parsed = value !== undefined && /^\d+$/.test(value) ? Number.parseInt(value, 10) : Number.NaN;
        if (!Number.isInteger(parsed) || parsed < 1 || parsed > 32) {
          throw new UsageError("--concurrency expects an integer between 1 and 32");
        }
        concurrency = parsed;
        break;
      }
      default:
        throw new UsageError(`Unknown argument '${token}'`);
    }
  }

  if (exclusive.length > 1) {
    throw new UsageError(`${exclusive.join(" and ")} cannot be combined`);
  }
  if (exclusive.length === 1 && phases.size > 0) {
    throw new UsageError(`${exclusive[0]} cannot be combined with phase flags`);
  }
  if (phases.size > 0) {
    action = { kind: "setup", phases: SETUP_PHASES.filter((candidate) => phases.has(candidate)) };
  }

  return {
    action,
    force,
    dryRun,
    verbose,
    format,
    ...(concurrency === undefined ? {} : { concurrency }),
  };
}

function usage(): string {
  return [
    "Usage: governance-provision [phases...] | --teardown | --teardown-all | --rebuild [options]",
    "",
    "Phases (combine freely, run in dependency order):",
    "  --issue-types  --fields  --projects  --versions  --hierarchy",
    "  --constraints  --feature-versions  --component-mapping",
    "  --all                 every phase",
    "",
    "Actions:",
    "  --teardown            delete provisioned issues (asks for 'yes')",
    "  --teardown-all        delete issues and projects (asks for 'DELETE')",
    "  --rebuild             teardown then full setup (asks for 'yes')",
    "  --test-connection     check tracker credentials",
    "  --show-config         print the effective configuration",
    "",
    "Options:",
    "  -f, --force           skip confirmation",
    "  --dry-run             simulate, no mutation reaches the tracker",
    "  --verbose             debug logging",
    "  --format text|json   summary format",
    "  --concurrency N       worker pool size",
    "  -h, --help",
    "",
  ].join("\n");
}

function defaultOpenTracker(settings: Settings, logger: StructuredLogger): TrackerHandle {
  const client = new JiraTrackerClient({ settings: settings.tracker, logger });
  return {
    client,
    testConnection: () => client.testConnection(),
    close: () => client.close(),
  };
}

function defaultOpenMappingSource(settings: Settings, logger: StructuredLogger): MappingSource {
  const pool = createPool(settings.database);
  const bridge = new ComponentMappingBridge(pool, logger);
  return {
    fetchMappings: (features) => bridge.fetchMappings(features),
    close: () => pool.end(),
  };
}

async function defaultPrompt(question: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
}

function describeMutation(mutation: SimulatedMutation): string {
  switch (mutation.kind) {
    case "create":
      return `create ${mutation.type} "${mutation.qualifyingName}" in ${mutation.projectKey}${
        mutation.parentId === null ? "" : ` under ${mutation.parentId}`
      } -> ${mutation.syntheticId}`;
    case "delete":
      return `delete ${mutation.type} ${mutation.id}`;
    case "attach-field":
      return `attach field ${mutation.fieldId} to ${mutation.projectKey} screens`;
  }
}

/**
 * Puts simulated mutations in plan order. Workers of one level finish in any
 * order, but report outcomes follow the plan, so each mutation takes the
 * position of the outcome it produced. Screen attachments follow their project.
 */
function orderPlannedActions(mutations: readonly SimulatedMutation[], reports: readonly RunReport[]): SimulatedMutation[] {
  const positions = new Map<string, number>();
  let position = 0;
  for (const report of reports) {
    for (const outcome of report.outcomes) {
      position += 1;
      if (outcome.trackerId !== null && (outcome.status === "created" || outcome.status === "deleted")) {
        positions.set(`${outcome.status}:${outcome.trackerId}`, position);
      }
      if (report.phase === "setup" && outcome.type === "project") {
        positions.set(`attach:${outcome.label}`, position + 0.5);
      }
    }
  }

  const rankOf = (mutation: SimulatedMutation): number => {
    switch (mutation.kind) {
      case "create":
        return positions.get(`created:${mutation.syntheticId}`) ?? Number.POSITIVE_INFINITY;
      case "delete":
        return positions.get(`deleted:${mutation.id}`) ?? Number.POSITIVE_INFINITY;
      case "attach-field": {
        const project = identityKey({ type: "project", qualifyingName: mutation.projectKey, projectKey: mutation.projectKey });
        return positions.get(`attach:${project}`) ?? Number.POSITIVE_INFINITY;
      }
    }
  };

  return mutations
    .map((mutation, index) => ({ mutation, index, rank: rankOf(mutation) }))
    .sort((left, right) => (left.rank === right.rank ? left.index - right.index : left.rank - right.rank))
    .map((entry) => entry.mutation);
}

function renderReports(
  reports: readonly RunReport[],
  plannedActions: readonly SimulatedMutation[] | null,
  format: "text" | "json",
): string {
  if (format === "json") {
    return `${JSON.stringify(
      {
        reports: reports.map((report) => ({ phase: report.phase, dryRun: report.dryRun, outcomes: report.outcomes })),
        ...(plannedActions === null ? {} : { plannedActions }),
      },
      null,
      2,
    )}\n`;
  }

  const lines: string[] = [];
  for (const report of reports) {
    lines.push(`# ${report.phase}${report.dryRun ? " (dry run)" : ""}`);
    lines.push(...formatSummaryTable(report.outcomes));
    lines.push("");
  }
  if (plannedActions !== null) {
    lines.push("planned actions:");
    if (plannedActions.length === 0) {
      lines.push("  (none)");
    }
    plannedActions.forEach((mutation, index) => {
      lines.push(`  ${index + 1}. ${describeMutation(mutation)}`);
    });
    lines.push("");
  }
  return lines.join("\n");
}

/**
 * Runs one invocation and resolves with the process exit code. Every side
 * channel (environment, streams, tracker, database, prompt) comes from
 * {@link runtime} so the whole flow can be exercised in process.
 */
export async function runCli(argv: readonly string[], runtime: CliRuntime): Promise<number> {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    runtime.stderr.write(`error: ${describeError(error).message}\n\n${usage()}`);
    return EXIT_USAGE;
  }

  const action = options.action;
  if (action === null) {
    runtime.stderr.write(usage());
    return EXIT_USAGE;
  }
  if (action.kind === "help") {
    runtime.stdout.write(usage());
    return EXIT_OK;
  }

  let settings: Settings;
  try {
    settings = loadSettings(runtime.env);
  } catch (error) {
    runtime.stderr.write(`error: ${describeError(error).message}\n`);
    return EXIT_USAGE;
  }

  if (action.kind === "show-config") {
    runtime.stdout.write(`${JSON.stringify(describeSettings(settings), null, 2)}\n`);
    return EXIT_OK;
  }

  const logger = new StructuredLogger({
    minLevel: options.verbose ? "debug" : settings.logging.level,
    stream: runtime.stderr,
    logFile: settings.logging.file,
    redactSecrets: settings.logging.redactTokens,
    redactionEnabled: settings.logging.redactionEnabled,
  });
  const handle = (runtime.openTracker ?? defaultOpenTracker)(settings, logger);

  try {
    if (action.kind === "test-connection") {
      try {
        const user = await handle.testConnection();
        runtime.stdout.write(`connected to ${settings.tracker.baseUrl} as ${user.displayName ?? user.name}\n`);
        return EXIT_OK;
      } catch (error) {
        logger.error("tracker_connection_failed", { error: describeError(error) });
        runtime.stderr.write(`error: ${describeError(error).message}\n`);
        return EXIT_USAGE;
      }
    }

    return await execute(action, options, settings, logger, handle, runtime);
  } finally {
    await handle.close();
    await logger.flush();
  }
}

async function execute(
  action: Extract<CliAction, { kind: "setup" | "teardown" | "rebuild" }>,
  options: CliOptions,
  settings: Settings,
  logger: StructuredLogger,
  handle: TrackerHandle,
  runtime: CliRuntime,
): Promise<number> {
  const concurrency = options.concurrency ?? settings.concurrency;
  const retrying = new RetryingTracker(handle.client, { policy: settings.retry, logger });
  const dryRunTracker = options.dryRun ? new DryRunTracker(retrying, logger) : null;
  const tracker: TrackerClient = dryRunTracker ?? retrying;
  const prompt = runtime.prompt ?? defaultPrompt;

  const confirm = async (word: string, subject: string): Promise<boolean> => {
    if (options.force || options.dryRun) {
      return true;
    }
    const answer = await prompt(`${subject} Type '${word}' to continue: `);
    return answer.trim() === word;
  };

  // Everything up to the first tracker mutation is pre-flight: a failure here exits with 2.
  let data: CatalogData;
  let catalog: Catalog | null = null;
  try {
    data = await (runtime.loadCatalog ?? (() => loadCatalogData()))();
    if (action.kind !== "teardown") {
      const phases: readonly SetupPhase[] = action.kind === "setup" ? action.phases : SETUP_PHASES;
      const mappings = phases.includes("component-mapping")
        ? await fetchMappings(data, settings, logger, runtime)
        : [];
      catalog = buildCatalog(data, phases, mappings);
      if (action.kind === "setup") {
        // Validated here so a broken catalog aborts before any tracker call.
        planRun(buildDependencyGraph(catalog.entities, catalog.preExisting));
      }
    }
  } catch (error) {
    logger.error("preflight_failed", { error: describeError(error) });
    runtime.stderr.write(`error: ${describeError(error).message}\n`);
    return EXIT_USAGE;
  }

  const projectKeys = data.projects.map((project) => project.key);
  const reports: RunReport[] = [];

  try {
    if (action.kind === "setup" && catalog) {
      const graph = buildDependencyGraph(catalog.entities, catalog.preExisting);
      reports.push(
        await runSetup(planRun(graph), graph, {
          tracker,
          logger,
          concurrency,
          dryRun: options.dryRun,
          screenFieldIds: settings.tracker.screenFieldIds,
        }),
      );
    } else if (action.kind === "teardown") {
      const word = action.includeProjects ? CONFIRMATION_WORDS["teardown-all"] : CONFIRMATION_WORDS.teardown;
      const subject = action.includeProjects
        ? `This deletes every governance issue AND the projects ${projectKeys.join(", ")}.`
        : `This deletes every governance issue in ${projectKeys.join(", ")}.`;
      if (!(await confirm(word, subject))) {
        logger.warn("teardown_aborted", { reason: "confirmation_declined" });
        runtime.stdout.write("aborted\n");
        return EXIT_OK;
      }
      reports.push(
        await runTeardown(projectKeys, { tracker, logger, concurrency, dryRun: options.dryRun }, {
          includeProjects: action.includeProjects,
        }),
      );
    } else if (action.kind === "rebuild" && catalog) {
      const rebuildCatalog = catalog;
      const result = await runRebuild(
        {
          tracker,
          logger,
          concurrency,
          screenFieldIds: settings.tracker.screenFieldIds,
          confirm: () =>
            confirm(CONFIRMATION_WORDS.rebuild, `This deletes and recreates every governance issue in ${projectKeys.join(", ")}.`),
        },
        { catalog: rebuildCatalog, projectKeys, force: options.force, dryRun: options.dryRun },
      );
      if (result.aborted) {
        runtime.stdout.write("aborted\n");
        return EXIT_OK;
      }
      reports.push(result.teardown, result.setup);
    }
  } catch (error) {
    if (isPreflightError(error)) {
      logger.error("preflight_failed", { error: describeError(error) });
      runtime.stderr.write(`error: ${describeError(error).message}\n`);
      return EXIT_USAGE;
    }
    throw error;
  }

  const plannedActions = dryRunTracker ? orderPlannedActions(dryRunTracker.mutations, reports) : null;
  runtime.stdout.write(renderReports(reports, plannedActions, options.format));
  return hasFailures(reports) ? EXIT_FAILURES : EXIT_OK;
}

async function fetchMappings(
  data: CatalogData,
  settings: Settings,
  logger: StructuredLogger,
  runtime: CliRuntime,
): Promise<ComponentMapping[]> {
  const source = (runtime.openMappingSource ?? defaultOpenMappingSource)(settings, logger);
  try {
    return await source.fetchMappings(catalogFeatures(data));
  } finally {
    await source.close();
  }
}

const isCliEntryPoint = (() => {
  const executedFromCli = process.argv[1];
  if (!executedFromCli) {
    return false;
  }

  const thisModulePath = fileURLToPath(import.meta.url);
  try {
    // npm links the bin through a symlink.
    return thisModulePath === realpathSync(executedFromCli);
  } catch {
    return thisModulePath === executedFromCli;
  }
})();

if (isCliEntryPoint) {
  loadDotenv();
  runCli(process.argv.slice(2), { env: process.env, stdout: process.stdout, stderr: process.stderr })
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error(error instanceof Error ? error.message : error);
      process.exitCode = EXIT_FAILURES;
    });
}

/** Internal helpers exposed to the test-suite only. */
export const __testing = {
  parseArgs,
  usage,
  renderReports,
  describeMutation,
  orderPlannedActions,
};
