import { openAsBlob } from "node:fs";
import { basename } from "node:path";
import { z } from "zod";
import { PublishError } from "../errors.js";
import { formatIssues } from "../config.js";
import { retryTransient, withRetry, type RetryConfig } from "../retry.js";
import type { FetchLike } from "../grafana/session.js";

export type ConfluenceOptions = {
  baseUrl: string;
  login: string;
  password: string;
  retry: RetryConfig;
  timeoutMs?: number;
  fetch?: FetchLike;
};

export type WikiPage = {
  id: string;
  title: string;
  body: string;
  version: number;
};

const pageSchema = z.object({
  id: z.string(),
  title: z.string(),
  body: z.object({
    storage: z.object({ value: z.string() })
  }),
  version: z.object({ number: z.number().int() })
});

const attachmentListSchema = z.object({
  results: z.array(z.object({ id: z.string(), title: z.string() }).passthrough())
});

export class ConfluenceClient {
  private readonly baseUrl: string;
  private readonly authorization: string;
  private readonly retry: RetryConfig;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ConfluenceOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.authorization = `Basic ${Buffer.from(`${options.login}:${options.password}`).toString("base64")}`;
    this.retry = retryTransient(options.retry);
    this.timeoutMs = options.timeoutMs ?? 60_000;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async getPage(pageId: string): Promise<WikiPage> {
    const raw = await withRetry(
      () => this.requestJson("GET", `/rest/api/content/${pageId}?expand=body.storage,version`),
      this.retry
    );
    const page = parseResponse(pageSchema, raw, `page ${pageId}`);
    return {
      id: page.id,
      title: page.title,
      body: page.body.storage.value,
      version: page.version.number
    };
  }

  async updatePage(page: WikiPage, body: string): Promise<void> {
    await this.requestJson("PUT", `/rest/api/content/${page.id}`, {
      id: page.id,
      type: "page",
      title: page.title,
      version: { number: page.version + 1 },
      body: { storage: { value: body, representation: "storage" } }
    });
  }

  /** Uploads a file, replacing an attachment of the same name. */
  async attachFile(pageId: string, filePath: string, contentType: string): Promise<void> {
    const name = basename(filePath);
    const existing = parseResponse(
      attachmentListSchema,
      await withRetry(
        () =>
          this.requestJson(
            "GET",
            `/rest/api/content/${pageId}/child/attachment?filename=${encodeURIComponent(name)}`
          ),
        this.retry
      ),
      `attachments of ${name}`
    );
    const current = existing.results.find((item) => item.title === name);
    const path = current
      ? `/rest/api/content/${pageId}/child/attachment/${current.id}/data`
      : `/rest/api/content/${pageId}/child/attachment`;

    const form = new FormData();
    form.append("file", await openAsBlob(filePath, { type: contentType }), name);
    form.append("minorEdit", "true");
    await this.request("POST", path, form);
  }

  private async requestJson(method: string, path: string, body?: unknown): Promise<unknown> {
    const response = await this.request(
      method,
      path,
      body === undefined ? undefined : JSON.stringify(body),
      body === undefined ? undefined : "application/json"
    );
    return response.json();
  }

  private async request(
    method: string,
    path: string,
    body?: string | FormData,
    contentType?: string
  ) {
    const headers: Record<string, string> = {
      authorization: this.authorization,
      accept: "application/json",
      "x-atlassian-token": "no-check"
    };
    if (contentType) {
      headers["content-type"] = contentType;
    }
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers,
        body,
        signal: AbortSignal.timeout(this.timeoutMs)
      });
    } catch (error) {
      throw new PublishError(`${method} ${path} failed.`, { path }, { cause: error });
    }
    if (!response.ok) {
      const text = await response.text();
      throw new PublishError(`${method} ${path} returned ${response.status}.`, {
        path,
        status: response.status,
        body: text.slice(0, 500)
      });
    }
    return response;
  }
}

function parseResponse<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, raw: unknown, what: string): T {
  const result = schema.safeParse(raw);
  if (!result.success) {
    throw new PublishError(`Unexpected wiki response for ${what}.`, {
      issues: formatIssues(result.error)
    });
  }
  return result.data;
}
