import { Agent, type Dispatcher, type RequestInit, type Response, fetch as undiciFetch } from "undici";
import { z } from "zod";

import {
  type EntityAttributes,
  type EntityType,
  ISSUE_ENTITY_TYPES,
  ISSUE_TYPE_NAMES,
  type IssueEntityType,
  isIssueEntityType,
} from "../catalog/types.js";
import type { TrackerSettings } from "../config/settings.js";
import { RateLimitError, TransportError, ValidationError } from "../errors.js";
import type { StructuredLogger } from "../logger.js";
import type { FoundEntity, TrackerClient, TrackerId, TrackerRef } from "./types.js";

/** REST paths of the Jira Data Center API v2. */
const API = {
  project: "/rest/api/2/project",
  issue: "/rest/api/2/issue",
  issueLink: "/rest/api/2/issueLink",
  field: "/rest/api/2/field",
  issueType: "/rest/api/2/issuetype",
  version: "/rest/api/2/version",
  component: "/rest/api/2/component",
  search: "/rest/api/2/search",
  screens: "/rest/api/2/screens",
  myself: "/rest/api/2/myself",
} as const;

/** Link type joining a constraint (outward) to the issue it blocks (inward). */
const BLOCKS_LINK = { name: "Blocks", inward: "is blocked by" } as const;

/** Transitions walked from the initial "Identified" status of a constraint. */
const CONSTRAINT_TRANSITIONS: Record<string, readonly string[]> = {
  Identified: [],
  "In Progress": ["Start Work"],
  "Ready for Review": ["Start Work", "Submit for Review"],
  Closed: ["Start Work", "Submit for Review", "Approve & Close"],
};

/** Tracker field names of the constraint attributes. */
const CONSTRAINT_FIELD_NAMES = {
  guild: "Guild",
  riskMateriality: "Risk Materiality",
  mitigationPlan: "Mitigation Plan",
} as const;

/** Custom field type and searcher keys for each catalog field kind. */
const CUSTOM_FIELD_TYPES = {
  select: {
    type: "com.atlassian.jira.plugin.system.customfieldtypes:select",
    searcherKey: "com.atlassian.jira.plugin.system.customfieldtypes:multiselectsearcher",
  },
  textarea: {
    type: "com.atlassian.jira.plugin.system.customfieldtypes:textarea",
    searcherKey: "com.atlassian.jira.plugin.system.customfieldtypes:textsearcher",
  },
  textfield: {
    type: "com.atlassian.jira.plugin.system.customfieldtypes:textfield",
    searcherKey: "com.atlassian.jira.plugin.system.customfieldtypes:textsearcher",
  },
} as const;

const issueTypeAttributesSchema = z.object({
  description: z.string(),
  kind: z.enum(["standard", "subtask"]),
  createIfMissing: z.boolean(),
});
const customFieldAttributesSchema = z.object({
  description: z.string(),
  kind: z.enum(["select", "textarea", "textfield"]),
  options: z.array(z.string()),
});
const projectAttributesSchema = z.object({
  name: z.string(),
  description: z.string(),
  projectTypeKey: z.enum(["software", "business"]),
  lead: z.string().optional(),
});
const issueAttributesSchema = z.object({ description: z.string() });
const constraintAttributesSchema = issueAttributesSchema.extend({
  guild: z.string(),
  riskMateriality: z.string(),
  mitigationPlan: z.string(),
  status: z.enum(["Identified", "In Progress", "Ready for Review", "Closed"]),
});
const versionAttributesSchema = z.object({
  description: z.string(),
  released: z.boolean(),
  startDate: z.string().optional(),
  releaseDate: z.string().optional(),
});
const featureVersionAttributesSchema = z.object({ version: z.string().min(1) });
const componentMappingAttributesSchema = z.object({
  componentName: z.string().min(1),
  componentId: z.string(),
  identifier: z.string(),
});

const namedSchema = z.object({ name: z.string() }).passthrough();
const issueLinkSchema = z
  .object({
    type: namedSchema,
    inwardIssue: z.object({ key: z.string() }).passthrough().optional(),
    outwardIssue: z.object({ key: z.string() }).passthrough().optional(),
  })
  .passthrough();
const issueSchema = z.object({
  key: z.string(),
  fields: z
    .object({
      summary: z.string().optional(),
      issuetype: namedSchema.optional(),
      issuelinks: z.array(issueLinkSchema).optional(),
      fixVersions: z.array(namedSchema).optional(),
      components: z.array(namedSchema).optional(),
    })
    .passthrough(),
});
const searchResponseSchema = z.object({
  startAt: z.number().default(0),
  total: z.number().default(0),
  issues: z.array(issueSchema).default([]),
});
const projectSchema = z.object({ key: z.string() }).passthrough();
const issueTypeSchema = z.object({ id: z.union([z.string(), z.number()]), name: z.string() }).passthrough();
const versionSchema = z.object({ id: z.union([z.string(), z.number()]), name: z.string() }).passthrough();
const fieldSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    custom: z.boolean().optional(),
    schema: z.object({ type: z.string().optional(), custom: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();
const screenSchema = z.object({ id: z.union([z.string(), z.number()]), name: z.string().default("") }).passthrough();
const screensResponseSchema = z.union([
  z.array(screenSchema),
  z.object({ values: z.array(screenSchema).default([]) }).transform((payload) => payload.values),
]);
const transitionsSchema = z.object({
  transitions: z.array(z.object({ id: z.string(), name: z.string() }).passthrough()).default([]),
});
const myselfSchema = z
  .object({ name: z.string(), displayName: z.string().optional(), emailAddress: z.string().optional() })
  .passthrough();

type JiraIssue = z.infer<typeof issueSchema>;
type JiraField = z.infer<typeof fieldSchema>;

/** Fetch signature accepted by the client; undici's `fetch` by default. */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface JiraTrackerClientOptions {
  readonly settings: TrackerSettings;
  readonly logger: StructuredLogger;
  readonly fetchImpl?: FetchLike;
  /** Connection pool; built from {@link TrackerSettings.verifyTls} when omitted. */
  readonly dispatcher?: Dispatcher;
}

interface RequestOptions {
  readonly query?: Record<string, string>;
  readonly body?: unknown;
  /** Non-2xx statuses handed back to the caller instead of being thrown. */
  readonly accept?: readonly number[];
}

interface UnfinishedConstraint {
  readonly key: TrackerId;
  linked: boolean;
  transitionsDone: number;
}

interface JiraResponse {
  readonly status: number;
  readonly body: unknown;
  readonly text: string;
}

/** Identity of the logged-in user, as returned by `testConnection`. */
export type JiraUser = z.infer<typeof myselfSchema>;

/**
 * {@link TrackerClient} backed by the Jira Data Center REST API. The client
 * authenticates with a personal access token and maps HTTP failures onto the
 * provisioning error taxonomy: 429 becomes {@link RateLimitError}, 5xx and
 * network failures become {@link TransportError}, other 4xx answers become
 * {@link ValidationError}.
 */
export class JiraTrackerClient implements TrackerClient {
  private readonly settings: TrackerSettings;
  private readonly logger: StructuredLogger;
  private readonly fetchImpl: FetchLike;
  private readonly dispatcher: Dispatcher;
  private readonly ownsDispatcher: boolean;
  private fieldsPromise: Promise<JiraField[]> | null = null;
  /** Constraints whose issue exists but whose link or workflow steps have not completed. */
  private readonly unfinishedConstraints = new Map<string, UnfinishedConstraint>();

  constructor(options: JiraTrackerClientOptions) {
    this.settings = options.settings;
    this.logger = options.logger;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => undiciFetch(input, init));
    this.ownsDispatcher = options.dispatcher === undefined;
    this.dispatcher =
      options.dispatcher ?? new Agent({ connect: { rejectUnauthorized: options.settings.verifyTls } });
  }

  /** Releases pooled connections opened by this client. */
  async close(): Promise<void> {
    if (this.ownsDispatcher) {
      await this.dispatcher.close();
    }
  }

  async testConnection(): Promise<JiraUser> {
    const response = await this.send("GET", API.myself);
    return parsePayload(myselfSchema, response.body, "myself");
  }

  async findEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
  ): Promise<FoundEntity | null> {
    switch (type) {
      case "issue_type": {
        const issueType = (await this.listIssueTypes()).find((candidate) => candidate.name === qualifyingName);
        return issueType ? { id: String(issueType.id), parentId: null } : null;
      }
      case "custom_field": {
        const field = await this.findCustomField(qualifyingName);
        return field ? { id: field.id, parentId: null } : null;
      }
      case "project": {
        const response = await this.send("GET", `${API.project}/${encodeURIComponent(qualifyingName)}`, {
          accept: [404],
        });
        if (response.status === 404) {
          return null;
        }
        return { id: parsePayload(projectSchema, response.body, "project").key, parentId: null };
      }
      case "version": {
        const version = (await this.listVersions(projectKey)).find((candidate) => candidate.name === qualifyingName);
        return version ? { id: String(version.id), parentId: projectKey } : null;
      }
      case "feature_version": {
        const featureKey = parentId ?? (await this.findIssue("feature", qualifyingName, projectKey))?.key;
        if (!featureKey) {
          return null;
        }
        const issue = await this.getIssue(featureKey, ["fixVersions"]);
        const assigned = issue?.fields.fixVersions?.[0];
        return assigned ? { id: `${featureKey}:fixVersion:${assigned.name}`, parentId: featureKey } : null;
      }
      case "component_mapping": {
        if (parentId === null) {
          return null;
        }
        const issue = await this.getIssue(parentId, ["components"]);
        const attached = issue?.fields.components?.some((component) => component.name === qualifyingName) ?? false;
        return attached ? { id: `${parentId}:component:${qualifyingName}`, parentId } : null;
      }
      default: {
        const issue = await this.findIssue(type, qualifyingName, projectKey);
        return issue ? { id: issue.key, parentId: this.parentOf(type, issue, projectKey) } : null;
      }
    }
  }

  async createEntity(
    type: EntityType,
    qualifyingName: string,
    projectKey: string,
    parentId: TrackerId | null,
    attributes: EntityAttributes,
  ): Promise<TrackerId> {
    switch (type) {
      case "issue_type": {
        const issueType = parseAttributes(issueTypeAttributesSchema, attributes, type);
        if (!issueType.createIfMissing) {
          throw new ValidationError(`issue type "${qualifyingName}" is missing and has to be configured by an administrator`, {
            issueType: qualifyingName,
          });
        }
        const response = await this.send("POST", API.issueType, {
          body: { name: qualifyingName, description: issueType.description, type: issueType.kind },
        });
        return String(parsePayload(issueTypeSchema, response.body, "issue type").id);
      }
      case "custom_field":
        return this.createCustomField(qualifyingName, parseAttributes(customFieldAttributesSchema, attributes, type));
      case "project": {
        const project = parseAttributes(projectAttributesSchema, attributes, type);
        await this.send("POST", API.project, {
          body: {
            key: qualifyingName,
            name: project.name,
            projectTypeKey: project.projectTypeKey,
            lead: project.lead ?? this.settings.username,
            description: project.description,
          },
        });
        return qualifyingName;
      }
      case "version": {
        const version = parseAttributes(versionAttributesSchema, attributes, type);
        const response = await this.send("POST", API.version, {
          body: {
            project: projectKey,
            name: qualifyingName,
            description: version.description,
            released: version.released,
            ...(version.startDate === undefined ? {} : { startDate: version.startDate }),
            ...(version.releaseDate === undefined ? {} : { releaseDate: version.releaseDate }),
          },
        });
        return String(parsePayload(versionSchema, response.body, "version").id);
      }
      case "feature_version": {
        const { version } = parseAttributes(featureVersionAttributesSchema, attributes, type);
        const featureKey = requireParent(type, qualifyingName, parentId);
        await this.send("PUT", `${API.issue}/${featureKey}`, {
          body: { update: { fixVersions: [{ add: { name: version } }] } },
        });
        return `${featureKey}:fixVersion:${version}`;
      }
      case "component_mapping": {
        const mapping = parseAttributes(componentMappingAttributesSchema, attributes, type);
        const featureKey = requireParent(type, qualifyingName, parentId);
        await this.ensureComponent(projectKey, mapping.componentName, `Application ${mapping.identifier} (${mapping.componentId})`);
        await this.send("PUT", `${API.issue}/${featureKey}`, {
          body: { update: { components: [{ add: { name: mapping.componentName } }] } },
        });
        return `${featureKey}:component:${mapping.componentName}`;
      }
      default:
        return this.createIssue(type, qualifyingName, projectKey, parentId, attributes);
    }
  }

  async deleteEntity(type: EntityType, id: TrackerId): Promise<void> {
    switch (type) {
      case "issue_type":
      case "custom_field":
        throw new ValidationError(`${type} ${id} is instance configuration and is never deleted`, { type, id });
      case "project":
        await this.send("DELETE", `${API.project}/${encodeURIComponent(id)}`, { accept: [404] });
        return;
      case "version":
        await this.send("DELETE", `${API.version}/${encodeURIComponent(id)}`, { accept: [404] });
        return;
      case "feature_version": {
        const [featureKey, , version] = splitCompositeId(id);
        await this.send("PUT", `${API.issue}/${featureKey}`, {
          body: { update: { fixVersions: [{ remove: { name: version } }] } },
        });
        return;
      }
      case "component_mapping": {
        const [featureKey, , component] = splitCompositeId(id);
        await this.send("PUT", `${API.issue}/${featureKey}`, {
          body: { update: { components: [{ remove: { name: component } }] } },
        });
        return;
      }
      default:
        await this.send("DELETE", `${API.issue}/${encodeURIComponent(id)}`, { accept: [404] });
    }
  }

  async listChildren(type: EntityType, id: TrackerId): Promise<TrackerRef[]> {
    const issueTypes = ISSUE_ENTITY_TYPES.map((issueType) => `"${ISSUE_TYPE_NAMES[issueType]}"`).join(", ");
    const parentLink = parentLinkClause(this.settings.parentLinkField);
    let jql: string;
    if (type === "project") {
      jql = `project = "${escapeJqlString(id)}" AND issuetype in (${issueTypes}) AND ${parentLink} is EMPTY ORDER BY key ASC`;
    } else if (isIssueEntityType(type)) {
      const key = escapeJqlString(id);
      jql =
        `(${parentLink} = "${key}" OR issue in linkedIssues("${key}", "${BLOCKS_LINK.inward}")) ` +
        `AND issuetype in (${issueTypes}) ORDER BY key ASC`;
    } else {
      return [];
    }

    const issues = await this.searchAll(jql, ["issuetype"]);
    const refs: TrackerRef[] = [];
    for (const issue of issues) {
      const childType = entityTypeForIssueType(issue.fields.issuetype?.name);
      if (childType) {
        refs.push({ type: childType, id: issue.key });
      } else {
        this.logger.debug("tracker_child_skipped", { parent: id, child: issue.key, issuetype: issue.fields.issuetype?.name });
      }
    }
    return refs;
  }

  /**
   * Adds {@link fieldId} to the first tab of every screen whose name starts
   * with `<projectKey>:`. A field already present counts as success.
   */
  async attachFieldToScreens(fieldId: string, projectKey: string): Promise<void> {
    const response = await this.send("GET", API.screens);
    const screens = parsePayload(screensResponseSchema, response.body, "screens").filter((screen) =>
      screen.name.startsWith(`${projectKey}:`),
    );
    if (screens.length === 0) {
      this.logger.warn("tracker_no_project_screens", { project: projectKey, field: fieldId });
      return;
    }

    const failures: string[] = [];
    for (const screen of screens) {
      const tabsResponse = await this.send("GET", `${API.screens}/${screen.id}/tabs`);
      const tabs = parsePayload(z.array(z.object({ id: z.union([z.string(), z.number()]) }).passthrough()), tabsResponse.body, "screen tabs");
      const firstTab = tabs[0];
      if (!firstTab) {
        failures.push(`${screen.name}: no tabs`);
        continue;
      }
      const added = await this.send("POST", `${API.screens}/${screen.id}/tabs/${firstTab.id}/fields`, {
        body: { fieldId },
        accept: [400],
      });
      if (added.status === 400 && !added.text.toLowerCase().includes("already")) {
        failures.push(`${screen.name}: ${summariseErrorBody(added.body, added.text)}`);
      }
    }

    if (failures.length > 0) {
      throw new ValidationError(`unable to attach ${fieldId} to ${failures.length} screen(s) of ${projectKey}`, {
        field: fieldId,
        project: projectKey,
        failures,
      });
    }
  }

  private async createIssue(
    type: IssueEntityType,
    summary: string,
    projectKey: string,
    parentId: TrackerId | null,
    attributes: EntityAttributes,
  ): Promise<TrackerId> {
    if (type === "constraint") {
      return this.createConstraint(summary, projectKey, parentId, attributes);
    }
    const fields: Record<string, unknown> = {
      project: { key: projectKey },
      issuetype: { name: ISSUE_TYPE_NAMES[type] },
      summary,
      description: parseAttributes(issueAttributesSchema, attributes, type).description,
    };
    // Objectives hang off their project, which is not an issue link.
    if (type !== "strategic_objective" && parentId !== null) {
      fields[this.settings.parentLinkField] = parentId;
    }
    return this.postIssue(fields);
  }

  /**
   * Creates a constraint, links it to the issue it blocks and walks its
   * workflow. Each step is recorded against the assigned key, so a call
   * repeated after a failed link or transition resumes on the same issue.
   */
  private async createConstraint(
    summary: string,
    projectKey: string,
    parentId: TrackerId | null,
    attributes: EntityAttributes,
  ): Promise<TrackerId> {
    const constraint = parseAttributes(constraintAttributesSchema, attributes, "constraint");
    const blocked = requireParent("constraint", summary, parentId);
    const progressKey = `${projectKey}:${summary}`;

    let progress = this.unfinishedConstraints.get(progressKey);
    if (progress) {
      this.logger.info("tracker_constraint_resumed", {
        issue: progress.key,
        linked: progress.linked,
        transitions_done: progress.transitionsDone,
      });
    } else {
      const fields: Record<string, unknown> = {
        project: { key: projectKey },
        issuetype: { name: ISSUE_TYPE_NAMES.constraint },
        summary,
        description: constraint.description,
      };
      const customValues: readonly (readonly [string, string])[] = [
        [CONSTRAINT_FIELD_NAMES.guild, constraint.guild],
        [CONSTRAINT_FIELD_NAMES.riskMateriality, constraint.riskMateriality],
        [CONSTRAINT_FIELD_NAMES.mitigationPlan, constraint.mitigationPlan],
      ];
      for (const [fieldName, value] of customValues) {
        const field = await this.findCustomField(fieldName);
        if (!field) {
          this.logger.warn("tracker_custom_field_missing", { field: fieldName, issuetype: ISSUE_TYPE_NAMES.constraint });
          continue;
        }
        fields[field.id] = isSelectField(field) ? { value } : value;
      }
      progress = { key: await this.postIssue(fields), linked: false, transitionsDone: 0 };
      this.unfinishedConstraints.set(progressKey, progress);
    }

    if (!progress.linked) {
      await this.send("POST", API.issueLink, {
        body: { type: { name: BLOCKS_LINK.name }, inwardIssue: { key: blocked }, outwardIssue: { key: progress.key } },
      });
      progress.linked = true;
    }

    const path = CONSTRAINT_TRANSITIONS[constraint.status] ?? [];
    for (const transitionName of path.slice(progress.transitionsDone)) {
      if (!(await this.applyTransition(progress.key, transitionName))) {
        break;
      }
      progress.transitionsDone += 1;
    }

    this.unfinishedConstraints.delete(progressKey);
    return progress.key;
  }

  private async postIssue(fields: Record<string, unknown>): Promise<TrackerId> {
    const response = await this.send("POST", API.issue, { body: { fields } });
    return parsePayload(z.object({ key: z.string() }).passthrough(), response.body, "created issue").key;
  }

  /** Fires the named transition; `false` when the workflow does not offer it. */
  private async applyTransition(issueKey: string, transitionName: string): Promise<boolean> {
    const response = await this.send("GET", `${API.issue}/${issueKey}/transitions`);
    const { transitions } = parsePayload(transitionsSchema, response.body, "transitions");
    const transition = transitions.find((candidate) => candidate.name === transitionName);
    if (!transition) {
      this.logger.warn("tracker_transition_missing", { issue: issueKey, transition: transitionName });
      return false;
    }
    await this.send("POST", `${API.issue}/${issueKey}/transitions`, { body: { transition: { id: transition.id } } });
    return true;
  }

  /**
   * Creates a custom field and forgets the memoised field listing so later
   * lookups see it. The REST API takes no select options; they are logged for
   * the administrator to add to the field context.
   */
  private async createCustomField(name: string, field: z.infer<typeof customFieldAttributesSchema>): Promise<TrackerId> {
    const { type, searcherKey } = CUSTOM_FIELD_TYPES[field.kind];
    const response = await this.send("POST", API.field, {
      body: { name, description: field.description, type, searcherKey },
    });
    this.fieldsPromise = null;
    const id = parsePayload(z.object({ id: z.string() }).passthrough(), response.body, "created field").id;
    if (field.options.length > 0) {
      this.logger.warn("tracker_field_options_pending", { field: id, name, options: field.options });
    }
    return id;
  }

  private async listIssueTypes(): Promise<z.infer<typeof issueTypeSchema>[]> {
    const response = await this.send("GET", API.issueType);
    return parsePayload(z.array(issueTypeSchema), response.body, "issue types");
  }

  private async ensureComponent(projectKey: string, name: string, description: string): Promise<void> {
    const response = await this.send("GET", `${API.project}/${encodeURIComponent(projectKey)}/components`);
    const components = parsePayload(z.array(namedSchema), response.body, "components");
    if (components.some((component) => component.name === name)) {
      return;
    }
    await this.send("POST", API.component, { body: { project: projectKey, name, description } });
  }

  private async listVersions(projectKey: string): Promise<z.infer<typeof versionSchema>[]> {
    const response = await this.send("GET", `${API.project}/${encodeURIComponent(projectKey)}/versions`, {
      accept: [404],
    });
    if (response.status === 404) {
      return [];
    }
    return parsePayload(z.array(versionSchema), response.body, "versions");
  }

  private async getIssue(issueKey: string, fields: readonly string[]): Promise<JiraIssue | null> {
    const response = await this.send("GET", `${API.issue}/${encodeURIComponent(issueKey)}`, {
      query: { fields: fields.join(",") },
      accept: [404],
    });
    if (response.status === 404) {
      return null;
    }
    return parsePayload(issueSchema, response.body, "issue");
  }

  /** Text search narrowed by project and type, then filtered to an exact summary match. */
  private async findIssue(type: IssueEntityType, summary: string, projectKey: string): Promise<JiraIssue | null> {
    const jql =
      `project = "${escapeJqlString(projectKey)}" AND issuetype = "${ISSUE_TYPE_NAMES[type]}" ` +
      `AND summary ~ "${escapeJqlString(toTextSearchPhrase(summary))}" ORDER BY key ASC`;
    const issues = await this.searchAll(jql, ["summary", "issuetype", "issuelinks", this.settings.parentLinkField]);
    return issues.find((issue) => issue.fields.summary === summary) ?? null;
  }

  private async searchAll(jql: string, fields: readonly string[]): Promise<JiraIssue[]> {
    const collected: JiraIssue[] = [];
    for (;;) {
      const response = await this.send("POST", API.search, {
        body: { jql, fields, startAt: collected.length, maxResults: this.settings.pageSize },
      });
      const page = parsePayload(searchResponseSchema, response.body, "search");
      collected.push(...page.issues);
      if (page.issues.length === 0 || collected.length >= page.total) {
        return collected;
      }
    }
  }

  private async findCustomField(name: string): Promise<JiraField | undefined> {
    if (!this.fieldsPromise) {
      this.fieldsPromise = this.send("GET", API.field).then((response) =>
        parsePayload(z.array(fieldSchema), response.body, "fields"),
      );
    }
    let fields: JiraField[];
    try {
      fields = await this.fieldsPromise;
    } catch (error) {
      // A failed listing must not poison later lookups.
      this.fieldsPromise = null;
      throw error;
    }
    return fields.find((field) => field.custom === true && field.name === name);
  }

  private parentOf(type: IssueEntityType, issue: JiraIssue, projectKey: string): TrackerId | null {
    if (type === "strategic_objective") {
      return projectKey;
    }
    if (type === "constraint") {
      const link = issue.fields.issuelinks?.find((candidate) => candidate.type.name === BLOCKS_LINK.name && candidate.outwardIssue);
      return link?.outwardIssue?.key ?? null;
    }
    return readParentLink(issue.fields[this.settings.parentLinkField]);
  }

  private async send(method: string, path: string, options: RequestOptions = {}): Promise<JiraResponse> {
    const url = new URL(`${this.settings.baseUrl}${path}`);
    if (options.query) {
      url.search = new URLSearchParams(options.query).toString();
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.settings.timeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        method,
        headers: {
          Authorization: `Bearer ${this.settings.token}`,
          Accept: "application/json",
          ...(options.body === undefined ? {} : { "Content-Type": "application/json" }),
        },
        ...(options.body === undefined ? {} : { body: JSON.stringify(options.body) }),
        signal: controller.signal,
        dispatcher: this.dispatcher,
      });
    } catch (error) {
      const timedOut = error instanceof Error && error.name === "AbortError";
      throw new TransportError(
        timedOut ? `${method} ${path} timed out after ${this.settings.timeoutMs}ms` : `${method} ${path} failed`,
        { cause: error },
      );
    } finally {
      clearTimeout(timeout);
    }

    const text = await response.text();
    const body = parseJsonBody(text);
    this.logger.debug("tracker_request", { method, path, status: response.status });

    if (response.ok || options.accept?.includes(response.status)) {
      return { status: response.status, body, text };
    }
    if (response.status === 429) {
      throw new RateLimitError(`${method} ${path} was rate limited`, parseRetryAfter(response.headers.get("retry-after")));
    }
    if (response.status >= 500) {
      throw new TransportError(`${method} ${path} failed with HTTP ${response.status}`, { status: response.status });
    }
    throw new ValidationError(
      `${method} ${path} rejected with HTTP ${response.status}: ${summariseErrorBody(body, text)}`,
      { method, path, body },
      response.status,
    );
  }
}

function parseAttributes<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, attributes: EntityAttributes, type: EntityType): T {
  const parsed = schema.safeParse(attributes);
  if (!parsed.success) {
    throw new ValidationError(`attributes do not describe a ${type}`, { type, issues: parsed.error.issues });
  }
  return parsed.data;
}

function parsePayload<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, payload: unknown, context: string): T {
  const parsed = schema.safeParse(payload);
  if (!parsed.success) {
    throw new ValidationError(`unexpected ${context} payload from the tracker`, { issues: parsed.error.issues });
  }
  return parsed.data;
}

function requireParent(type: EntityType, qualifyingName: string, parentId: TrackerId | null): TrackerId {
  if (parentId === null) {
    throw new ValidationError(`${type} "${qualifyingName}" needs a resolved parent`, { type, qualifyingName });
  }
  return parentId;
}

/** Splits `<issueKey>:<kind>:<name>` identifiers minted for assignments. */
function splitCompositeId(id: TrackerId): [string, string, string] {
  const first = id.indexOf(":");
  const second = first < 0 ? -1 : id.indexOf(":", first + 1);
  if (first < 0 || second < 0) {
    throw new ValidationError(`malformed assignment identifier ${id}`, { id });
  }
  return [id.slice(0, first), id.slice(first + 1, second), id.slice(second + 1)];
}

export function entityTypeForIssueType(name: string | undefined): IssueEntityType | undefined {
  return ISSUE_ENTITY_TYPES.find((type) => ISSUE_TYPE_NAMES[type] === name);
}

/** JQL reference for a custom field id: `customfield_10108` becomes `cf[10108]`. */
export function parentLinkClause(fieldId: string): string {
  const match = /^customfield_(\d+)$/.exec(fieldId);
  return match ? `cf[${match[1]}]` : `"${fieldId}"`;
}

export function escapeJqlString(value: string): string {
  return value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');
}

/** Drops the text-search operators so `summary ~` matches on words only. */
export function toTextSearchPhrase(summary: string): string {
  return summary
    .replace(/[+\-&|!(){}[\]^~*?:\\/"]/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function isSelectField(field: JiraField): boolean {
  return field.schema?.type === "option" || (field.schema?.custom?.includes(":select") ?? false);
}

function readParentLink(value: unknown): TrackerId | null {
  if (typeof value === "string" && value.length > 0) {
    return value;
  }
  const parsed = z.object({ key: z.string() }).passthrough().safeParse(value);
  return parsed.success ? parsed.data.key : null;
}

function parseJsonBody(text: string): unknown {
  if (text.length === 0) {
    return null;
  }
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** Accepts both delta-seconds and HTTP-date forms of `Retry-After`. */
export function parseRetryAfter(header: string | null, now: () => number = Date.now): number | null {
  if (!header) {
    return null;
  }
  const trimmed = header.trim();
  if (/^\d+$/.test(trimmed)) {
    return Number.parseInt(trimmed, 10) * 1000;
  }
  const date = Date.parse(trimmed);
  return Number.isNaN(date) ? null : Math.max(0, date - now());
}

const errorBodySchema = z
  .object({
    errorMessages: z.array(z.string()).default([]),
    errors: z.record(z.string()).default({}),
  })
  .passthrough();

function summariseErrorBody(body: unknown, text: string): string {
  const parsed = errorBodySchema.safeParse(body);
  if (parsed.success) {
    const messages = [...parsed.data.errorMessages, ...Object.entries(parsed.data.errors).map(([key, value]) => `${key}: ${value}`)];
    if (messages.length > 0) {
      return messages.join("; ");
    }
  }
  return text.slice(0, 200) || "empty response";
}
