import type { CatalogData } from "./data.js";
import {
  type EntityDefinition,
  GLOBAL_SCOPE,
  type EntityType,
  type LogicalIdentity,
  PHASE_ENTITY_TYPES,
  type SetupPhase,
  identityKey,
} from "./types.js";

/** Component to feature association supplied by the mapping bridge. */
export interface ComponentMapping {
  readonly componentName: string;
  readonly componentId: string;
  readonly identifier: string;
  readonly projectKey: string;
  readonly featureQualifyingName: string;
}

/** Feature reference handed to the mapping bridge for round-robin assignment. */
export interface FeatureRef {
  readonly projectKey: string;
  readonly qualifyingName: string;
}

/**
 * Output of {@link buildCatalog}: the definitions to provision and the
 * identities the run relies on without creating them. Pre-existing entries map
 * to a fallback tracker identifier (the key, for projects) or `null` when the
 * entity has to be found in the tracker.
 */
export interface Catalog {
  readonly entities: readonly EntityDefinition[];
  readonly preExisting: ReadonlyMap<string, string | null>;
}

const projectIdentity = (projectKey: string): LogicalIdentity => ({
  type: "project",
  qualifyingName: projectKey,
  projectKey,
});

/** Lists the features of the hierarchy in catalog order. */
export function catalogFeatures(data: CatalogData): FeatureRef[] {
  const features: FeatureRef[] = [];
  for (const objective of data.hierarchy) {
    for (const epic of objective.epics) {
      for (const outcome of epic.outcomes) {
        for (const feature of outcome.features) {
          features.push({ projectKey: objective.project, qualifyingName: feature.summary });
        }
      }
    }
  }
  return features;
}

/**
 * Expands the static catalog into every definition it describes, in a stable
 * order: issue types, custom fields, projects, versions, hierarchy (depth
 * first per objective), constraints, feature versions and component mappings.
 */
export function expandCatalog(data: CatalogData, mappings: readonly ComponentMapping[] = []): EntityDefinition[] {
  const definitions: EntityDefinition[] = [];

  for (const issueType of data.issueTypes) {
    definitions.push({
      type: "issue_type",
      qualifyingName: issueType.name,
      projectKey: GLOBAL_SCOPE,
      parent: null,
      attributes: {
        description: issueType.description || `${issueType.name} issue type`,
        kind: issueType.kind,
        createIfMissing: issueType.createIfMissing,
      },
    });
  }

  for (const field of data.fields) {
    definitions.push({
      type: "custom_field",
      qualifyingName: field.name,
      projectKey: GLOBAL_SCOPE,
      parent: null,
      attributes: { description: field.description, kind: field.kind, options: field.options },
    });
  }

  for (const project of data.projects) {
    definitions.push({
      type: "project",
      qualifyingName: project.key,
      projectKey: project.key,
      parent: null,
      attributes: {
        name: project.name,
        description: project.description,
        projectTypeKey: project.projectTypeKey,
        ...(project.lead === undefined ? {} : { lead: project.lead }),
      },
    });
  }

  for (const project of data.projects) {
    for (const version of data.versions) {
      definitions.push({
        type: "version",
        qualifyingName: version.name,
        projectKey: project.key,
        parent: projectIdentity(project.key),
        attributes: {
          description: version.description,
          released: version.released,
          ...(version.startDate === undefined ? {} : { startDate: version.startDate }),
          ...(version.releaseDate === undefined ? {} : { releaseDate: version.releaseDate }),
        },
      });
    }
  }

  for (const objective of data.hierarchy) {
    const projectKey = objective.project;
    const objectiveIdentity: LogicalIdentity = {
      type: "strategic_objective",
      qualifyingName: objective.summary,
      projectKey,
    };
    definitions.push({
      ...objectiveIdentity,
      type: "strategic_objective",
      parent: projectIdentity(projectKey),
      attributes: { description: objective.description },
    });
    for (const epic of objective.epics) {
      const epicIdentity: LogicalIdentity = { type: "portfolio_epic", qualifyingName: epic.summary, projectKey };
      definitions.push({
        ...epicIdentity,
        type: "portfolio_epic",
        parent: objectiveIdentity,
        attributes: { description: epic.description },
      });
      for (const outcome of epic.outcomes) {
        const outcomeIdentity: LogicalIdentity = {
          type: "business_outcome",
          qualifyingName: outcome.summary,
          projectKey,
        };
        definitions.push({
          ...outcomeIdentity,
          type: "business_outcome",
          parent: epicIdentity,
          attributes: { description: outcome.description },
        });
        for (const feature of outcome.features) {
          definitions.push({
            type: "feature",
            qualifyingName: feature.summary,
            projectKey,
            parent: outcomeIdentity,
            attributes: { description: feature.description },
          });
        }
      }
    }
  }

  // Constraints live in the project of the issue they block.
  for (const constraint of data.constraints) {
    definitions.push({
      type: "constraint",
      qualifyingName: constraint.summary,
      projectKey: constraint.blocks.project,
      parent: {
        type: constraint.blocks.type,
        qualifyingName: constraint.blocks.summary,
        projectKey: constraint.blocks.project,
      },
      attributes: {
        description: constraint.description,
        guild: constraint.guild,
        riskMateriality: constraint.riskMateriality,
        mitigationPlan: constraint.mitigationPlan,
        status: constraint.status,
      },
    });
  }

  // Unreleased versions are handed out round robin to each project's features.
  const unreleased = data.versions.filter((version) => !version.released).map((version) => version.name);
  if (unreleased.length > 0) {
    const perProjectIndex = new Map<string, number>();
    for (const feature of catalogFeatures(data)) {
      const index = perProjectIndex.get(feature.projectKey) ?? 0;
      perProjectIndex.set(feature.projectKey, index + 1);
      definitions.push({
        type: "feature_version",
        qualifyingName: feature.qualifyingName,
        projectKey: feature.projectKey,
        parent: { type: "feature", qualifyingName: feature.qualifyingName, projectKey: feature.projectKey },
        attributes: { version: unreleased[index % unreleased.length] },
      });
    }
  }

  for (const mapping of mappings) {
    definitions.push({
      type: "component_mapping",
      qualifyingName: mapping.componentName,
      projectKey: mapping.projectKey,
      parent: { type: "feature", qualifyingName: mapping.featureQualifyingName, projectKey: mapping.projectKey },
      attributes: {
        componentName: mapping.componentName,
        componentId: mapping.componentId,
        identifier: mapping.identifier,
      },
    });
  }

  return definitions;
}

/**
 * Restricts the expanded catalog to the selected {@link phases}. Definitions of
 * the other phases become pre-existing entries so the graph builder accepts
 * references to them.
 */
export function buildCatalog(
  data: CatalogData,
  phases: readonly SetupPhase[],
  mappings: readonly ComponentMapping[] = [],
): Catalog {
  const selectedTypes = new Set<EntityType>(phases.flatMap((phase) => PHASE_ENTITY_TYPES[phase]));
  const entities: EntityDefinition[] = [];
  const preExisting = new Map<string, string | null>();

  for (const definition of expandCatalog(data, mappings)) {
    if (selectedTypes.has(definition.type)) {
      entities.push(definition);
    } else {
      preExisting.set(identityKey(definition), definition.type === "project" ? definition.projectKey : null);
    }
  }

  return { entities, preExisting };
}
