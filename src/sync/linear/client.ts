import type { z } from "zod";
import type { SourceItem, SourceKind, SourceReader } from "@/sync/types";
import type { LinearCredentials } from "@/sync/types/api";
import { SourceFetchError, errorMessage } from "@/sync/errors";
import { createChildLogger } from "@/sync/logger";
import { graphqlEnvelopeSchema, issuesPageSchema, projectsPageSchema } from "./types";
import { mapIssue, mapProject } from "./mappers";

const log = createChildLogger("linear-client");

const DEFAULT_ENDPOINT = "https://api.linear.app/graphql";
const PAGE_LIMIT = 100;

export type FetchFn = typeof fetch;

export interface LinearClientOptions {
  issueLimit?: number;
  projectLimit?: number;
  fetchFn?: FetchFn;
}

const ISSUES_QUERY = `
  query Issues($first: Int!, $after: String) {
    issues(first: $first, after: $after) {
      nodes {
        id
        identifier
        title
        description
        url
        dueDate
        state { name }
        project { name }
      }
      pageInfo { hasNextPage endCursor }
    }
  }
`;

const PROJECTS_QUERY = `
  query Projects($first: Int!, $after: String) {
    projects(first: $first, after: $after) {
      nodes {
        id
        name
        description
        url
        startDate
        targetDate
        state
      }
      pageInfo { hasNextPage endCursor }
    }
  }
`;

export class LinearClient implements SourceReader {
  private endpoint: string;
  private apiKey: string;
  private issueLimit: number;
  private projectLimit: number;
  private fetchFn: FetchFn;

  constructor(credentials: LinearCredentials, options: LinearClientOptions = {}) {
    this.apiKey = credentials.apiKey;
    this.endpoint = credentials.endpoint ?? DEFAULT_ENDPOINT;
    this.issueLimit = options.issueLimit ?? 200;
    this.projectLimit = options.projectLimit ?? 100;
    this.fetchFn = options.fetchFn ?? globalThis.fetch.bind(globalThis);
  }

  /** Fetch every requested kind. Any failure aborts: a partial source would skew the run. */
  async fetchItems(kinds: readonly SourceKind[]): Promise<SourceItem[]> {
    const items: SourceItem[] = [];
    if (kinds.includes("issue")) {
      items.push(...(await this.getIssues()));
    }
    if (kinds.includes("project")) {
      items.push(...(await this.getProjects()));
    }
    return items;
  }

  async getIssues(): Promise<SourceItem[]> {
    const nodes = await this.fetchAllPages("issues", this.issueLimit, async (variables) => {
      const page = await this.query(ISSUES_QUERY, variables, issuesPageSchema);
      return page.issues;
    });
    log.info("Linear issues fetched", { count: nodes.length });
    return nodes.map(mapIssue);
  }

  async getProjects(): Promise<SourceItem[]> {
    const nodes = await this.fetchAllPages("projects", this.projectLimit, async (variables) => {
      const page = await this.query(PROJECTS_QUERY, variables, projectsPageSchema);
      return page.projects;
    });
    log.info("Linear projects fetched", { count: nodes.length });
    return nodes.map(mapProject);
  }

  /** Follow cursors until the connection is exhausted or `limit` nodes are collected. */
  private async fetchAllPages<T>(
    connection: string,
    limit: number,
    fetchPage: (variables: { first: number; after?: string }) => Promise<{
      nodes: T[];
      pageInfo: { hasNextPage: boolean; endCursor?: string | null };
    }>,
  ): Promise<T[]> {
    const all: T[] = [];
    let after: string | undefined;

    while (all.length < limit) {
      const first = Math.min(PAGE_LIMIT, limit - all.length);
      const page = await fetchPage(after ? { first, after } : { first });
      all.push(...page.nodes);

      if (!page.pageInfo.hasNextPage || !page.pageInfo.endCursor) break;
      after = page.pageInfo.endCursor;
      log.debug("Fetching next Linear page", { connection, after });
    }

    return all.slice(0, limit);
  }

  /** POST one GraphQL query and validate `data` against `schema`. */
  private async query<T>(
    query: string,
    variables: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<T> {
    let response: Response;
    try {
      response = await this.fetchFn(this.endpoint, {
        method: "POST",
        headers: {
          Authorization: this.apiKey,
          "Content-Type": "application/json",
        },
        body: JSON.stringify({ query, variables }),
      });
    } catch (error) {
      throw new SourceFetchError(`Linear API unreachable: ${errorMessage(error)}`, error);
    }

    if (!response.ok) {
      const body = await response.text();
      log.error("Linear API request failed", { status: response.status, body });
      throw new SourceFetchError(`Linear API error: ${response.status} ${response.statusText}`);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new SourceFetchError("Linear API returned invalid JSON", error);
    }

    const envelope = graphqlEnvelopeSchema.safeParse(json);
    if (!envelope.success) {
      throw new SourceFetchError("Linear API returned an unexpected payload", envelope.error);
    }
    if (envelope.data.errors && envelope.data.errors.length > 0) {
      const messages = envelope.data.errors.map((e) => e.message);
      log.error("Linear GraphQL errors", { errors: messages });
      throw new SourceFetchError(`Linear GraphQL returned errors: ${messages.join("; ")}`);
    }

    const parsed = schema.safeParse(envelope.data.data);
    if (!parsed.success) {
      throw new SourceFetchError("Linear API returned malformed data", parsed.error);
    }
    return parsed.data;
  }
}
