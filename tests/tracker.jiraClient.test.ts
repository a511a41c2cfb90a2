import { describe, it } from "mocha";
import { expect } from "chai";
import sinon from "sinon";
import { Headers, type RequestInit, Response } from "undici";

import type { TrackerSettings } from "../src/config/settings.js";
import { RateLimitError, TransportError, ValidationError } from "../src/errors.js";
import {
  type FetchLike,
  JiraTrackerClient,
  escapeJqlString,
  parentLinkClause,
  parseRetryAfter,
  toTextSearchPhrase,
} from "../src/tracker/jiraClient.js";
import { RetryingTracker } from "../src/tracker/retrying.js";

import { createCapturingLogger } from "./lib/logging.js";

const constraintAttributes = {
  description: "Patch window",
  guild: "Security",
  riskMateriality: "High",
  mitigationPlan: "Rotate keys",
  status: "Ready for Review",
} as const;

const settings: TrackerSettings = {
  baseUrl: "https://tracker.test",
  username: "svc-provisioner",
  token: "test-secret",
  verifyTls: true,
  timeoutMs: 1000,
  parentLinkField: "customfield_10108",
  screenFieldIds: [],
  pageSize: 2,
};

interface RecordedRequest {
  readonly method: string;
  readonly path: string;
  readonly search: string;
  readonly body: unknown;
  readonly authorization: string | null;
}

type Handler = (request: RecordedRequest) => Response;

function json(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json", ...headers } });
}

function empty(status: number): Response {
  return new Response(null, { status });
}

function readBody(init: RequestInit): unknown {
  if (typeof init.body !== "string") {
    return undefined;
  }
  const parsed: unknown = JSON.parse(init.body);
  return parsed;
}

/** Client wired to a scripted fetch that records every request. */
function createClient(handler: Handler) {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (input, init) => {
    const url = new URL(input);
    const request: RecordedRequest = {
      method: init.method ?? "GET",
      path: url.pathname,
      search: url.search,
      body: readBody(init),
      authorization: new Headers(init.headers).get("authorization"),
    };
    requests.push(request);
    return handler(request);
  };
  const capture = createCapturingLogger();
  const client = new JiraTrackerClient({ settings, logger: capture.logger, fetchImpl });
  return { client, requests, ...capture };
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  expect.fail("the call should have been rejected");
  return null;
}

describe("JiraTrackerClient", () => {
  describe("findEntity", () => {
    it("looks projects up by key and treats 404 as absent", async () => {
      const { client, requests } = createClient((request) =>
        request.path.endsWith("/ALPHA") ? json(200, { key: "ALPHA", name: "Alpha" }) : json(404, { errorMessages: [] }),
      );

      expect(await client.findEntity("project", "ALPHA", "ALPHA", null)).to.deep.equal({ id: "ALPHA", parentId: null });
      expect(await client.findEntity("project", "ZULU", "ZULU", null)).to.equal(null);
      expect(requests.map((request) => request.path)).to.deep.equal([
        "/rest/api/2/project/ALPHA",
        "/rest/api/2/project/ZULU",
      ]);
      expect(requests[0]?.authorization).to.equal("Bearer test-secret");
      await client.close();
    });

    it("pages through search results and keeps only the exact summary", async () => {
      const pages = [
        {
          startAt: 0,
          total: 3,
          issues: [
            { key: "ALPHA-1", fields: { summary: "Feature A1a (retired)", issuetype: { name: "Feature" } } },
            { key: "ALPHA-2", fields: { summary: "Another feature", issuetype: { name: "Feature" } } },
          ],
        },
        {
          startAt: 2,
          total: 3,
          issues: [
            {
              key: "ALPHA-7",
              fields: { summary: "Feature A1a", issuetype: { name: "Feature" }, customfield_10108: "ALPHA-6" },
            },
          ],
        },
      ];
      let page = 0;
      const { client, requests } = createClient(() => json(200, pages[page++]));

      const found = await client.findEntity("feature", "Feature A1a", "ALPHA", "ALPHA-6");

      expect(found).to.deep.equal({ id: "ALPHA-7", parentId: "ALPHA-6" });
      expect(requests.map((request) => request.body)).to.deep.equal([
        {
          jql: 'project = "ALPHA" AND issuetype = "Feature" AND summary ~ "Feature A1a" ORDER BY key ASC',
          fields: ["summary", "issuetype", "issuelinks", "customfield_10108"],
          startAt: 0,
          maxResults: 2,
        },
        {
          jql: 'project = "ALPHA" AND issuetype = "Feature" AND summary ~ "Feature A1a" ORDER BY key ASC',
          fields: ["summary", "issuetype", "issuelinks", "customfield_10108"],
          startAt: 2,
          maxResults: 2,
        },
      ]);
      await client.close();
    });

    it("reads the blocked issue of a constraint from its links", async () => {
      const { client } = createClient(() =>
        json(200, {
          startAt: 0,
          total: 1,
          issues: [
            {
              key: "ALPHA-8",
              fields: {
                summary: "Constraint One",
                issuetype: { name: "Constraint" },
                issuelinks: [{ type: { name: "Blocks" }, outwardIssue: { key: "ALPHA-7" } }],
              },
            },
          ],
        }),
      );

      expect(await client.findEntity("constraint", "Constraint One", "ALPHA", null)).to.deep.equal({
        id: "ALPHA-8",
        parentId: "ALPHA-7",
      });
      await client.close();
    });

    it("reports the project as the parent of a strategic objective", async () => {
      const { client } = createClient(() =>
        json(200, {
          startAt: 0,
          total: 1,
          issues: [{ key: "ALPHA-3", fields: { summary: "Objective One", issuetype: { name: "Strategic Objective" } } }],
        }),
      );

      expect(await client.findEntity("strategic_objective", "Objective One", "ALPHA", "ALPHA")).to.deep.equal({
        id: "ALPHA-3",
        parentId: "ALPHA",
      });
      await client.close();
    });

    it("reports an issue without a parent link as unparented", async () => {
      const { client } = createClient(() =>
        json(200, {
          startAt: 0,
          total: 1,
          issues: [{ key: "ALPHA-4", fields: { summary: "Epic A", issuetype: { name: "Portfolio Epic" } } }],
        }),
      );

      expect(await client.findEntity("portfolio_epic", "Epic A", "ALPHA", "ALPHA-3")).to.deep.equal({
        id: "ALPHA-4",
        parentId: null,
      });
      await client.close();
    });

    it("looks issue types up by name", async () => {
      const { client, requests } = createClient(() =>
        json(200, [
          { id: "10001", name: "Strategic Objective" },
          { id: 10002, name: "Feature" },
        ]),
      );

      expect(await client.findEntity("issue_type", "Feature", "GLOBAL", null)).to.deep.equal({ id: "10002", parentId: null });
      expect(await client.findEntity("issue_type", "Constraint", "GLOBAL", null)).to.equal(null);
      expect(requests.map((request) => `${request.method} ${request.path}`)).to.deep.equal([
        "GET /rest/api/2/issuetype",
        "GET /rest/api/2/issuetype",
      ]);
      await client.close();
    });

    it("reports a feature version once the feature carries a fix version", async () => {
      const { client, requests } = createClient(() =>
        json(200, { key: "ALPHA-7", fields: { fixVersions: [{ name: "v2.0.0" }] } }),
      );

      expect(await client.findEntity("feature_version", "Feature A1a", "ALPHA", "ALPHA-7")).to.deep.equal({
        id: "ALPHA-7:fixVersion:v2.0.0",
        parentId: "ALPHA-7",
      });
      expect(requests[0]?.search).to.equal("?fields=fixVersions");
      await client.close();
    });
  });

  describe("createEntity", () => {
    it("creates a constraint, links it to the blocked issue and walks its workflow", async () => {
      const { client, requests, entries } = createClient((request) => {
        if (request.path === "/rest/api/2/field") {
          return json(200, [
            { id: "summary", name: "Summary", custom: false },
            { id: "customfield_20001", name: "Guild", custom: true, schema: { type: "option" } },
            {
              id: "customfield_20002",
              name: "Risk Materiality",
              custom: true,
              schema: { type: "string", custom: "com.atlassian.jira.plugin.system.customfieldtypes:select" },
            },
          ]);
        }
        if (request.path === "/rest/api/2/issue") {
          return json(201, { id: "10008", key: "ALPHA-8" });
        }
        if (request.path === "/rest/api/2/issueLink") {
          return empty(201);
        }
        if (request.method === "GET") {
          return json(200, { transitions: [{ id: "11", name: "Start Work" }] });
        }
        return empty(204);
      });

      const key = await client.createEntity("constraint", "Constraint One", "ALPHA", "ALPHA-7", {
        description: "Patch window",
        guild: "Security",
        riskMateriality: "High",
        mitigationPlan: "Rotate keys",
        status: "In Progress",
      });

      expect(key).to.equal("ALPHA-8");
      expect(requests.map((request) => `${request.method} ${request.path}`)).to.deep.equal([
        "GET /rest/api/2/field",
        "POST /rest/api/2/issue",
        "POST /rest/api/2/issueLink",
        "GET /rest/api/2/issue/ALPHA-8/transitions",
        "POST /rest/api/2/issue/ALPHA-8/transitions",
      ]);
      expect(requests[1]?.body).to.deep.equal({
        fields: {
          project: { key: "ALPHA" },
          issuetype: { name: "Constraint" },
          summary: "Constraint One",
          description: "Patch window",
          customfield_20001: { value: "Security" },
          customfield_20002: { value: "High" },
        },
      });
      expect(requests[2]?.body).to.deep.equal({
        type: { name: "Blocks" },
        inwardIssue: { key: "ALPHA-7" },
        outwardIssue: { key: "ALPHA-8" },
      });
      expect(requests[4]?.body).to.deep.equal({ transition: { id: "11" } });
      const missing = entries.find((entry) => entry.message === "tracker_custom_field_missing");
      expect(missing?.payload).to.deep.equal({ field: "Mitigation Plan", issuetype: "Constraint" });
      await client.close();
    });

    it("resumes a constraint on its assigned key when the link call is retried", async () => {
      let linkCalls = 0;
      const { client, requests, logger, entries } = createClient((request) => {
        if (request.path === "/rest/api/2/field") {
          return json(200, []);
        }
        if (request.path === "/rest/api/2/issue") {
          return json(201, { key: "ALPHA-8" });
        }
        if (request.path === "/rest/api/2/issueLink") {
          linkCalls += 1;
          return linkCalls === 1 ? empty(503) : empty(201);
        }
        if (request.method === "GET") {
          return json(200, {
            transitions: [
              { id: "11", name: "Start Work" },
              { id: "21", name: "Submit for Review" },
            ],
          });
        }
        return empty(204);
      });
      const sleep = sinon.stub<[number], Promise<unknown>>().resolves();
      const tracker = new RetryingTracker(client, {
        policy: { attempts: 3, baseDelayMs: 10, maxDelayMs: 100 },
        logger,
        sleep,
        random: () => 0,
      });

      const key = await tracker.createEntity("constraint", "Constraint One", "ALPHA", "ALPHA-7", constraintAttributes);

      expect(key).to.equal("ALPHA-8");
      expect(requests.map((request) => `${request.method} ${request.path}`)).to.deep.equal([
        "GET /rest/api/2/field",
        "POST /rest/api/2/issue",
        "POST /rest/api/2/issueLink",
        "POST /rest/api/2/issueLink",
        "GET /rest/api/2/issue/ALPHA-8/transitions",
        "POST /rest/api/2/issue/ALPHA-8/transitions",
        "GET /rest/api/2/issue/ALPHA-8/transitions",
        "POST /rest/api/2/issue/ALPHA-8/transitions",
      ]);
      expect(sleep.args).to.deep.equal([[10]]);
      const resumed = entries.find((entry) => entry.message === "tracker_constraint_resumed");
      expect(resumed?.payload).to.deep.equal({ issue: "ALPHA-8", linked: false, transitions_done: 0 });
      await client.close();
    });

    it("resumes a constraint after the last completed transition", async () => {
      let transitionPosts = 0;
      const { client, requests, logger } = createClient((request) => {
        if (request.path === "/rest/api/2/field") {
          return json(200, []);
        }
        if (request.path === "/rest/api/2/issue") {
          return json(201, { key: "ALPHA-8" });
        }
        if (request.path === "/rest/api/2/issueLink") {
          return empty(201);
        }
        if (request.method === "GET") {
          return json(200, {
            transitions: [
              { id: "11", name: "Start Work" },
              { id: "21", name: "Submit for Review" },
            ],
          });
        }
        transitionPosts += 1;
        return transitionPosts === 2 ? empty(502) : empty(204);
      });
      const sleep = sinon.stub<[number], Promise<unknown>>().resolves();
      const tracker = new RetryingTracker(client, {
        policy: { attempts: 2, baseDelayMs: 0, maxDelayMs: 0 },
        logger,
        sleep,
      });

      expect(
        await tracker.createEntity("constraint", "Constraint One", "ALPHA", "ALPHA-7", constraintAttributes),
      ).to.equal("ALPHA-8");
      const posts = requests.filter((request) => request.method === "POST");
      expect(posts.map((request) => request.path)).to.deep.equal([
        "/rest/api/2/issue",
        "/rest/api/2/issueLink",
        "/rest/api/2/issue/ALPHA-8/transitions",
        "/rest/api/2/issue/ALPHA-8/transitions",
        "/rest/api/2/issue/ALPHA-8/transitions",
      ]);
      expect(posts.slice(2).map((request) => request.body)).to.deep.equal([
        { transition: { id: "11" } },
        { transition: { id: "21" } },
        { transition: { id: "21" } },
      ]);
      await client.close();
    });

    it("creates a fresh constraint once the previous one completed", async () => {
      let nextKey = 8;
      const { client, requests } = createClient((request) => {
        if (request.path === "/rest/api/2/field") {
          return json(200, []);
        }
        if (request.path === "/rest/api/2/issue") {
          return json(201, { key: `ALPHA-${nextKey++}` });
        }
        return empty(201);
      });
      const identified = { ...constraintAttributes, status: "Identified" } as const;

      expect(await client.createEntity("constraint", "Constraint One", "ALPHA", "ALPHA-7", identified)).to.equal("ALPHA-8");
      expect(await client.createEntity("constraint", "Constraint One", "ALPHA", "ALPHA-7", identified)).to.equal("ALPHA-9");
      expect(requests.filter((request) => request.path === "/rest/api/2/issue")).to.have.length(2);
      await client.close();
    });

    it("refuses a constraint without a blocked issue before creating anything", async () => {
      const { client, requests } = createClient(() => json(201, { key: "ALPHA-8" }));

      const error = await rejection(client.createEntity("constraint", "Constraint One", "ALPHA", null, constraintAttributes));

      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", 'constraint "Constraint One" needs a resolved parent');
      expect(requests).to.have.length(0);
      await client.close();
    });

    it("creates strategic objectives without a parent link", async () => {
      const { client, requests } = createClient(() => json(201, { key: "ALPHA-3" }));

      await client.createEntity("strategic_objective", "Objective One", "ALPHA", "ALPHA", { description: "Grow" });

      expect(requests[0]?.body).to.deep.equal({
        fields: {
          project: { key: "ALPHA" },
          issuetype: { name: "Strategic Objective" },
          summary: "Objective One",
          description: "Grow",
        },
      });
      await client.close();
    });

    it("creates a missing managed issue type", async () => {
      const { client, requests } = createClient(() => json(201, { id: "10100", name: "Constraint" }));

      const id = await client.createEntity("issue_type", "Constraint", "GLOBAL", null, {
        description: "Governance constraint that blocks deployment until resolved",
        kind: "standard",
        createIfMissing: true,
      });

      expect(id).to.equal("10100");
      expect(requests.map((request) => [request.method, request.path, request.body])).to.deep.equal([
        [
          "POST",
          "/rest/api/2/issuetype",
          { name: "Constraint", description: "Governance constraint that blocks deployment until resolved", type: "standard" },
        ],
      ]);
      await client.close();
    });

    it("reports a missing hierarchy issue type instead of creating it", async () => {
      const { client, requests } = createClient(() => json(201, { id: "10101" }));

      const error = await rejection(
        client.createEntity("issue_type", "Story", "GLOBAL", null, {
          description: "Team-level work item",
          kind: "standard",
          createIfMissing: false,
        }),
      );

      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property(
        "message",
        'issue type "Story" is missing and has to be configured by an administrator',
      );
      expect(requests).to.have.length(0);
      await client.close();
    });

    it("creates a select field, logs its options and refreshes the field listing", async () => {
      let created = false;
      const { client, requests, entries } = createClient((request) => {
        if (request.method === "POST") {
          created = true;
          return json(201, { id: "customfield_20001", name: "Guild" });
        }
        return json(200, created ? [{ id: "customfield_20001", name: "Guild", custom: true }] : []);
      });

      expect(await client.findEntity("custom_field", "Guild", "GLOBAL", null)).to.equal(null);
      const id = await client.createEntity("custom_field", "Guild", "GLOBAL", null, {
        description: "The responsible guild for this constraint",
        kind: "select",
        options: ["Security", "Data"],
      });
      expect(await client.findEntity("custom_field", "Guild", "GLOBAL", null)).to.deep.equal({
        id: "customfield_20001",
        parentId: null,
      });

      expect(id).to.equal("customfield_20001");
      expect(requests.map((request) => `${request.method} ${request.path}`)).to.deep.equal([
        "GET /rest/api/2/field",
        "POST /rest/api/2/field",
        "GET /rest/api/2/field",
      ]);
      expect(requests[1]?.body).to.deep.equal({
        name: "Guild",
        description: "The responsible guild for this constraint",
        type: "com.atlassian.jira.plugin.system.customfieldtypes:select",
        searcherKey: "com.atlassian.jira.plugin.system.customfieldtypes:multiselectsearcher",
      });
      const pending = entries.find((entry) => entry.message === "tracker_field_options_pending");
      expect(pending?.payload).to.deep.equal({ field: "customfield_20001", name: "Guild", options: ["Security", "Data"] });
      await client.close();
    });

    it("sets the parent link on hierarchy issues", async () => {
      const { client, requests } = createClient(() => json(201, { key: "ALPHA-4" }));

      await client.createEntity("portfolio_epic", "Epic A", "ALPHA", "ALPHA-3", { description: "First epic" });

      expect(requests[0]?.body).to.deep.equal({
        fields: {
          project: { key: "ALPHA" },
          issuetype: { name: "Portfolio Epic" },
          summary: "Epic A",
          description: "First epic",
          customfield_10108: "ALPHA-3",
        },
      });
      await client.close();
    });

    it("creates projects led by the configured user unless a lead is given", async () => {
      const { client, requests } = createClient(() => json(201, { id: 10000, key: "ALPHA" }));

      expect(
        await client.createEntity("project", "ALPHA", "ALPHA", null, {
          name: "Alpha",
          description: "Alpha programme",
          projectTypeKey: "software",
        }),
      ).to.equal("ALPHA");
      expect(requests[0]?.body).to.deep.equal({
        key: "ALPHA",
        name: "Alpha",
        projectTypeKey: "software",
        lead: "svc-provisioner",
        description: "Alpha programme",
      });
      await client.close();
    });

    it("adds and removes fix versions through issue updates", async () => {
      const { client, requests } = createClient(() => empty(204));

      const id = await client.createEntity("feature_version", "Feature A1a", "ALPHA", "ALPHA-7", { version: "v2.0.0" });
      await client.deleteEntity("feature_version", id);

      expect(id).to.equal("ALPHA-7:fixVersion:v2.0.0");
      expect(requests.map((request) => [request.method, request.path, request.body])).to.deep.equal([
        ["PUT", "/rest/api/2/issue/ALPHA-7", { update: { fixVersions: [{ add: { name: "v2.0.0" } }] } }],
        ["PUT", "/rest/api/2/issue/ALPHA-7", { update: { fixVersions: [{ remove: { name: "v2.0.0" } }] } }],
      ]);
      await client.close();
    });

    it("never deletes instance configuration", async () => {
      const { client, requests } = createClient(() => empty(204));

      const error = await rejection(client.deleteEntity("issue_type", "10100"));

      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", "issue_type 10100 is instance configuration and is never deleted");
      expect(requests).to.have.length(0);
      await client.close();
    });

    it("refuses attributes that do not match the entity type", async () => {
      const { client, requests } = createClient(() => json(201, { key: "ALPHA-1" }));

      const error = await rejection(client.createEntity("version", "v1.0.0", "ALPHA", "ALPHA", { description: "" }));

      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", "attributes do not describe a version");
      expect(requests).to.have.length(0);
      await client.close();
    });
  });

  describe("error mapping", () => {
    it("turns 429 into a rate limit error carrying Retry-After", async () => {
      const { client } = createClient(() => json(429, {}, { "retry-after": "7" }));
      const error = await rejection(client.testConnection());
      expect(error).to.be.instanceOf(RateLimitError);
      expect(error).to.have.property("retryAfterMs", 7000);
      await client.close();
    });

    it("turns 5xx answers into transport errors", async () => {
      const { client } = createClient(() => empty(503));
      const error = await rejection(client.testConnection());
      expect(error).to.be.instanceOf(TransportError);
      expect(error).to.have.property("status", 503);
      expect(error).to.have.property("message", "GET /rest/api/2/myself failed with HTTP 503");
      await client.close();
    });

    it("turns other 4xx answers into validation errors with the tracker's messages", async () => {
      const { client } = createClient(() => json(400, { errorMessages: ["Summary is required"], errors: {} }));
      const error = await rejection(client.createEntity("feature", "", "ALPHA", null, { description: "" }));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("status", 400);
      expect(error).to.have.property("message", "POST /rest/api/2/issue rejected with HTTP 400: Summary is required");
      await client.close();
    });

    it("wraps network failures as transport errors", async () => {
      const capture = createCapturingLogger();
      const client = new JiraTrackerClient({
        settings,
        logger: capture.logger,
        fetchImpl: async () => {
          throw new Error("ECONNREFUSED");
        },
      });
      const error = await rejection(client.testConnection());
      expect(error).to.be.instanceOf(TransportError);
      expect(error).to.have.property("message", "GET /rest/api/2/myself failed");
      await client.close();
    });
  });

  describe("listChildren", () => {
    it("lists the top-level governance issues of a project", async () => {
      const { client, requests } = createClient(() =>
        json(200, {
          startAt: 0,
          total: 2,
          issues: [
            { key: "ALPHA-3", fields: { issuetype: { name: "Strategic Objective" } } },
            { key: "ALPHA-12", fields: { issuetype: { name: "Story" } } },
          ],
        }),
      );

      expect(await client.listChildren("project", "ALPHA")).to.deep.equal([{ type: "strategic_objective", id: "ALPHA-3" }]);
      expect(requests[0]?.body).to.have.property(
        "jql",
        'project = "ALPHA" AND issuetype in ("Strategic Objective", "Portfolio Epic", "Business Outcome", "Feature", "Constraint") AND cf[10108] is EMPTY ORDER BY key ASC',
      );
      await client.close();
    });

    it("lists linked children and blocking constraints of an issue", async () => {
      const { client, requests } = createClient(() =>
        json(200, {
          startAt: 0,
          total: 1,
          issues: [{ key: "ALPHA-8", fields: { issuetype: { name: "Constraint" } } }],
        }),
      );

      expect(await client.listChildren("feature", "ALPHA-7")).to.deep.equal([{ type: "constraint", id: "ALPHA-8" }]);
      expect(requests[0]?.body).to.have.property(
        "jql",
        '(cf[10108] = "ALPHA-7" OR issue in linkedIssues("ALPHA-7", "is blocked by")) AND issuetype in ("Strategic Objective", "Portfolio Epic", "Business Outcome", "Feature", "Constraint") ORDER BY key ASC',
      );
      await client.close();
    });

    it("returns no children for versions without calling the tracker", async () => {
      const { client, requests } = createClient(() => empty(500));
      expect(await client.listChildren("version", "10001")).to.deep.equal([]);
      expect(requests).to.have.length(0);
      await client.close();
    });
  });

  describe("attachFieldToScreens", () => {
    it("adds the field to the first tab of each project screen and tolerates duplicates", async () => {
      const { client, requests } = createClient((request) => {
        if (request.path === "/rest/api/2/screens") {
          return json(200, {
            values: [
              { id: 1, name: "ALPHA: Default Screen" },
              { id: 2, name: "BETA: Default Screen" },
              { id: 3, name: "ALPHA: Edit Screen" },
            ],
          });
        }
        if (request.path.endsWith("/tabs")) {
          return json(200, [{ id: request.path.includes("/1/") ? 10 : 30, name: "Field Tab" }]);
        }
        if (request.path.includes("/3/")) {
          return json(400, { errorMessages: ["Field customfield_1 already exists on the screen."] });
        }
        return json(200, { id: "customfield_1" });
      });

      await client.attachFieldToScreens("customfield_1", "ALPHA");

      expect(requests.map((request) => `${request.method} ${request.path}`)).to.deep.equal([
        "GET /rest/api/2/screens",
        "GET /rest/api/2/screens/1/tabs",
        "POST /rest/api/2/screens/1/tabs/10/fields",
        "GET /rest/api/2/screens/3/tabs",
        "POST /rest/api/2/screens/3/tabs/30/fields",
      ]);
      expect(requests[2]?.body).to.deep.equal({ fieldId: "customfield_1" });
      await client.close();
    });

    it("fails when a screen rejects the field for another reason", async () => {
      const { client } = createClient((request) => {
        if (request.path === "/rest/api/2/screens") {
          return json(200, [{ id: 1, name: "ALPHA: Default Screen" }]);
        }
        if (request.path.endsWith("/tabs")) {
          return json(200, [{ id: 10 }]);
        }
        return json(400, { errorMessages: ["Field does not exist"] });
      });

      const error = await rejection(client.attachFieldToScreens("customfield_9", "ALPHA"));
      expect(error).to.be.instanceOf(ValidationError);
      expect(error).to.have.property("message", "unable to attach customfield_9 to 1 screen(s) of ALPHA");
      await client.close();
    });
  });
});

describe("JQL helpers", () => {
  it("maps custom field ids to their JQL reference", () => {
    expect(parentLinkClause("customfield_10108")).to.equal("cf[10108]");
  });

  it("escapes quotes and backslashes", () => {
    expect(escapeJqlString('say "hi" \\ bye')).to.equal('say \\"hi\\" \\\\ bye');
  });

  it("strips text-search operators from summaries", () => {
    expect(toTextSearchPhrase('Policy checks: "as" pipeline-stage!')).to.equal("Policy checks as pipeline stage");
  });

  it("parses both forms of Retry-After", () => {
    const now = () => Date.parse("2026-01-01T00:00:00Z");
    expect(parseRetryAfter("120", now)).to.equal(120_000);
    expect(parseRetryAfter("Thu, 01 Jan 2026 00:00:30 GMT", now)).to.equal(30_000);
    expect(parseRetryAfter(null, now)).to.equal(null);
    expect(parseRetryAfter("soon", now)).to.equal(null);
  });
});
