/** Every kind of entity the provisioner knows how to create and delete. */
export const ENTITY_TYPES = [
  "issue_type",
  "custom_field",
  "project",
  "strategic_objective",
  "portfolio_epic",
  "business_outcome",
  "feature",
  "constraint",
  "version",
  "feature_version",
  "component_mapping",
] as const;

export type EntityType = (typeof ENTITY_TYPES)[number];

/** Entity types backed by tracker issues (the scope of `--teardown`). */
export const ISSUE_ENTITY_TYPES = [
  "strategic_objective",
  "portfolio_epic",
  "business_outcome",
  "feature",
  "constraint",
] as const satisfies readonly EntityType[];

export type IssueEntityType = (typeof ISSUE_ENTITY_TYPES)[number];

/** Tracker issue type names for each issue-backed entity type. */
export const ISSUE_TYPE_NAMES: Record<IssueEntityType, string> = {
  strategic_objective: "Strategic Objective",
  portfolio_epic: "Portfolio Epic",
  business_outcome: "Business Outcome",
  feature: "Feature",
  constraint: "Constraint",
};

export function isIssueEntityType(type: EntityType): type is IssueEntityType {
  return ISSUE_ENTITY_TYPES.some((candidate) => candidate === type);
}

/**
 * Scope standing in for the project key of instance-wide entities (issue types
 * and custom fields), which belong to no project.
 */
export const GLOBAL_SCOPE = "GLOBAL";

/**
 * Identity of an entity independent of the identifier the tracker assigns.
 * Two runs never create two tracker entities sharing the same identity.
 */
export interface LogicalIdentity {
  readonly type: EntityType;
  readonly qualifyingName: string;
  readonly projectKey: string;
}

/** Canonical string form of a {@link LogicalIdentity}, used as map key. */
export function identityKey(identity: LogicalIdentity): string {
  return `${identity.type}:${identity.projectKey}:${identity.qualifyingName}`;
}

export type ConstraintStatus = "Identified" | "In Progress" | "Ready for Review" | "Closed";

export interface IssueTypeAttributes {
  readonly description: string;
  readonly kind: "standard" | "subtask";
  /** Types an administrator has to configure (hierarchy levels) are only verified. */
  readonly createIfMissing: boolean;
}

export type CustomFieldKind = "select" | "textarea" | "textfield";

export interface CustomFieldAttributes {
  readonly description: string;
  readonly kind: CustomFieldKind;
  readonly options: readonly string[];
}

export interface ProjectAttributes {
  readonly name: string;
  readonly description: string;
  readonly projectTypeKey: "software" | "business";
  readonly lead?: string;
}

export interface IssueAttributes {
  readonly description: string;
}

export interface ConstraintAttributes extends IssueAttributes {
  readonly guild: string;
  readonly riskMateriality: string;
  readonly mitigationPlan: string;
  readonly status: ConstraintStatus;
}

export interface VersionAttributes {
  readonly description: string;
  readonly released: boolean;
  readonly startDate?: string;
  readonly releaseDate?: string;
}

export interface FeatureVersionAttributes {
  readonly version: string;
}

export interface ComponentMappingAttributes {
  readonly componentName: string;
  readonly componentId: string;
  readonly identifier: string;
}

/** Attribute payload carried by each entity type. */
export interface AttributesByType {
  issue_type: IssueTypeAttributes;
  custom_field: CustomFieldAttributes;
  project: ProjectAttributes;
  strategic_objective: IssueAttributes;
  portfolio_epic: IssueAttributes;
  business_outcome: IssueAttributes;
  feature: IssueAttributes;
  constraint: ConstraintAttributes;
  version: VersionAttributes;
  feature_version: FeatureVersionAttributes;
  component_mapping: ComponentMappingAttributes;
}

/**
 * Static description of one entity to provision. `parent` names the parent by
 * logical identity; tracker keys are only known once the parent exists.
 */
export type EntityDefinition = {
  readonly [T in EntityType]: {
    readonly type: T;
    readonly qualifyingName: string;
    readonly projectKey: string;
    readonly parent: LogicalIdentity | null;
    readonly attributes: AttributesByType[T];
  };
}[EntityType];

export type EntityAttributes = EntityDefinition["attributes"];

/** Extracts the logical identity of a definition. */
export function identityOf(definition: EntityDefinition): LogicalIdentity {
  return {
    type: definition.type,
    qualifyingName: definition.qualifyingName,
    projectKey: definition.projectKey,
  };
}

/** Setup phases selectable from the command line, in execution order. */
export const SETUP_PHASES = [
  "issue-types",
  "fields",
  "projects",
  "versions",
  "hierarchy",
  "constraints",
  "feature-versions",
  "component-mapping",
] as const;

export type SetupPhase = (typeof SETUP_PHASES)[number];

/** Entity types produced by each phase. */
export const PHASE_ENTITY_TYPES: Record<SetupPhase, readonly EntityType[]> = {
  "issue-types": ["issue_type"],
  fields: ["custom_field"],
  projects: ["project"],
  versions: ["version"],
  hierarchy: ["strategic_objective", "portfolio_epic", "business_outcome", "feature"],
  constraints: ["constraint"],
  "feature-versions": ["feature_version"],
  "component-mapping": ["component_mapping"],
};
