import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { join } from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { CatalogError } from "../errors.js";

const nonEmpty = z.string().trim().min(1);

const projectSchema = z.strictObject({
  key: z.string().regex(/^[A-Z][A-Z0-9]{1,9}$/, "project keys are 2-10 upper-case characters"),
  name: nonEmpty,
  description: z.string().default(""),
  projectTypeKey: z.enum(["software", "business"]).default("software"),
  lead: nonEmpty.optional(),
});

const featureSchema = z.strictObject({ summary: nonEmpty, description: z.string().default("") });

const outcomeSchema = z.strictObject({
  summary: nonEmpty,
  description: z.string().default(""),
  features: z.array(featureSchema).default([]),
});

const epicSchema = z.strictObject({
  summary: nonEmpty,
  description: z.string().default(""),
  outcomes: z.array(outcomeSchema).default([]),
});

const objectiveSchema = z.strictObject({
  project: nonEmpty,
  summary: nonEmpty,
  description: z.string().default(""),
  epics: z.array(epicSchema).default([]),
});

const constraintSchema = z.strictObject({
  summary: nonEmpty,
  description: z.string().default(""),
  guild: nonEmpty,
  riskMateriality: z.enum(["Low", "Medium", "High", "Critical"]),
  mitigationPlan: z.string().default(""),
  status: z.enum(["Identified", "In Progress", "Ready for Review", "Closed"]).default("Identified"),
  blocks: z.strictObject({
    project: nonEmpty,
    type: z.enum(["business_outcome", "feature"]),
    summary: nonEmpty,
  }),
});

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "dates use YYYY-MM-DD");

const versionSchema = z.strictObject({
  name: nonEmpty,
  released: z.boolean(),
  description: z.string().default(""),
  startDate: isoDate.optional(),
  releaseDate: isoDate.optional(),
});

const issueTypeSchema = z.strictObject({
  name: nonEmpty,
  description: z.string().default(""),
  kind: z.enum(["standard", "subtask"]).default("standard"),
  createIfMissing: z.boolean().default(false),
});

const customFieldSchema = z
  .strictObject({
    name: nonEmpty,
    description: z.string().default(""),
    kind: z.enum(["select", "textarea", "textfield"]),
    options: z.array(nonEmpty).default([]),
  })
  .refine((field) => field.kind === "select" || field.options.length === 0, {
    message: "only select fields carry options",
    path: ["options"],
  })
  .refine((field) => field.kind !== "select" || field.options.length > 0, {
    message: "select fields need at least one option",
    path: ["options"],
  });

export type IssueTypeData = z.infer<typeof issueTypeSchema>;
export type CustomFieldData = z.infer<typeof customFieldSchema>;
export type ProjectData = z.infer<typeof projectSchema>;
export type ObjectiveData = z.infer<typeof objectiveSchema>;
export type ConstraintData = z.infer<typeof constraintSchema>;
export type VersionData = z.infer<typeof versionSchema>;

/** Validated content of the static catalog files. */
export interface CatalogData {
  readonly issueTypes: readonly IssueTypeData[];
  readonly fields: readonly CustomFieldData[];
  readonly projects: readonly ProjectData[];
  readonly hierarchy: readonly ObjectiveData[];
  readonly constraints: readonly ConstraintData[];
  readonly versions: readonly VersionData[];
}

const CATALOG_FILES = {
  issueTypes: { file: "issueTypes.json", schema: z.array(issueTypeSchema) },
  fields: { file: "fields.json", schema: z.array(customFieldSchema) },
  projects: { file: "projects.json", schema: z.array(projectSchema).min(1) },
  hierarchy: { file: "hierarchy.json", schema: z.array(objectiveSchema) },
  constraints: { file: "constraints.json", schema: z.array(constraintSchema) },
  versions: { file: "versions.json", schema: z.array(versionSchema) },
} as const;

/**
 * Locates the `data/` directory shipped with the package. Sources live in
 * `src/catalog/` while compiled output lives in `dist/src/catalog/`, so both
 * depths are tried.
 */
export function resolveDefaultDataDirectory(): string {
  const candidates = ["../../data", "../../../data"].map((relative) =>
    fileURLToPath(new URL(relative, import.meta.url)),
  );
  return candidates.find((candidate) => existsSync(join(candidate, CATALOG_FILES.projects.file))) ?? candidates[0];
}

async function readJsonFile(path: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, "utf8");
  } catch (error) {
    throw new CatalogError(`unable to read catalog file ${path}`, { path }, { cause: error });
  }
  try {
    return JSON.parse(raw);
  } catch (error) {
    throw new CatalogError(`catalog file ${path} is not valid JSON`, { path }, { cause: error });
  }
}

function parseCatalogFile<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`);
    throw new CatalogError(`catalog file ${path} is invalid: ${issues.join("; ")}`, { path, issues });
  }
  return parsed.data;
}

/** Loads and validates every catalog file under {@link directory}. */
export async function loadCatalogData(directory: string = resolveDefaultDataDirectory()): Promise<CatalogData> {
  const path = (file: string) => join(directory, file);
  const [issueTypes, fields, projects, hierarchy, constraints, versions] = await Promise.all([
    readJsonFile(path(CATALOG_FILES.issueTypes.file)),
    readJsonFile(path(CATALOG_FILES.fields.file)),
    readJsonFile(path(CATALOG_FILES.projects.file)),
    readJsonFile(path(CATALOG_FILES.hierarchy.file)),
    readJsonFile(path(CATALOG_FILES.constraints.file)),
    readJsonFile(path(CATALOG_FILES.versions.file)),
  ]);

  return parseCatalogData({ issueTypes, fields, projects, hierarchy, constraints, versions }, directory);
}

/**
 * Validates already-parsed catalog payloads (used by tests and
 * {@link loadCatalogData}). Omitted issue types and fields read as empty.
 */
export function parseCatalogData(
  raw: {
    issueTypes?: unknown;
    fields?: unknown;
    projects: unknown;
    hierarchy: unknown;
    constraints: unknown;
    versions: unknown;
  },
  origin = "<memory>",
): CatalogData {
  const data: CatalogData = {
    issueTypes: parseCatalogFile(
      join(origin, CATALOG_FILES.issueTypes.file),
      CATALOG_FILES.issueTypes.schema,
      raw.issueTypes ?? [],
    ),
    fields: parseCatalogFile(join(origin, CATALOG_FILES.fields.file), CATALOG_FILES.fields.schema, raw.fields ?? []),
    projects: parseCatalogFile(join(origin, CATALOG_FILES.projects.file), CATALOG_FILES.projects.schema, raw.projects),
    hierarchy: parseCatalogFile(join(origin, CATALOG_FILES.hierarchy.file), CATALOG_FILES.hierarchy.schema, raw.hierarchy),
    constraints: parseCatalogFile(
      join(origin, CATALOG_FILES.constraints.file),
      CATALOG_FILES.constraints.schema,
      raw.constraints,
    ),
    versions: parseCatalogFile(join(origin, CATALOG_FILES.versions.file), CATALOG_FILES.versions.schema, raw.versions),
  };

  const knownProjects = new Set(data.projects.map((project) => project.key));
  for (const objective of data.hierarchy) {
    if (!knownProjects.has(objective.project)) {
      throw new CatalogError(`objective "${objective.summary}" targets unknown project ${objective.project}`, {
        project: objective.project,
      });
    }
  }
  return data;
}
