import { AuthError } from "../errors.js";
import type { DashboardConfig } from "../dashboards.js";
import type { ContextLogger } from "../logger.js";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export type QueryValue = string | number | boolean | readonly string[] | undefined;
export type QueryParams = Record<string, QueryValue>;

export type SessionCookie = {
  name: string;
  value: string;
};

export type WikiCredentials = {
  login: string;
  password: string;
};

/**
 * HTTP session against one Grafana host. Authentication mutates it once,
 * before any worker starts; afterwards it is only read.
 */
export class GrafanaSession {
  readonly host: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;
  private readonly headers = new Map<string, string>();
  private readonly cookies = new Map<string, string>();
  private sealed = false;

  constructor(host: string, options: { timeoutMs: number; fetch?: FetchLike }) {
    this.host = host.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
  }

  async authenticate(
    config: DashboardConfig,
    wiki: WikiCredentials,
    log: ContextLogger
  ): Promise<void> {
    if (!config.auth) {
      log.info("grafana.auth.disabled");
      return;
    }

    let user: string;
    let password: string;
    if (config.domain) {
      if (!wiki.login || !wiki.password) {
        throw new AuthError("Domain authentication needs the wiki login and password.", {
          dashboard: config.name
        });
      }
      user = wiki.login.split("@")[0];
      password = wiki.password;
    } else if (config.login && config.password) {
      user = config.login;
      password = config.password;
    } else if (config.token) {
      this.headers.set("authorization", `Bearer ${config.token}`);
      log.info("grafana.auth.token");
      return;
    } else {
      throw new AuthError("No valid authentication method provided.", {
        dashboard: config.name
      });
    }

    let response: Response;
    try {
      response = await this.send(this.url("/login"), {
        method: "POST",
        headers: { "content-type": "application/json" },
        body: JSON.stringify({ user, password })
      });
    } catch (error) {
      throw new AuthError("Login request to Grafana failed.", { host: this.host }, { cause: error });
    }
    if (response.status !== 200) {
      throw new AuthError("Failed to authenticate with Grafana.", {
        host: this.host,
        status: response.status
      });
    }
    log.info("grafana.auth.done", { cookies: this.cookies.size });
  }

  url(pathOrUrl: string, params?: QueryParams) {
    const base = /^https?:\/\//.test(pathOrUrl) ? pathOrUrl : `${this.host}${pathOrUrl}`;
    if (!params) return base;
    const query = encodeQuery(params);
    if (!query) return base;
    return `${base}${base.includes("?") ? "&" : "?"}${query}`;
  }

  async get(pathOrUrl: string, params?: QueryParams, timeoutMs?: number) {
    return this.send(this.url(pathOrUrl, params), { method: "GET" }, timeoutMs);
  }

  async post(path: string, body: unknown) {
    return this.send(this.url(path), {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(body)
    });
  }

  /** Stops recording cookies; called once the workers are about to start. */
  seal() {
    this.sealed = true;
  }

  cookieList(): SessionCookie[] {
    return Array.from(this.cookies, ([name, value]) => ({ name, value }));
  }

  /** Headers a browser context needs in addition to the cookies. */
  extraHeaders(): Record<string, string> {
    return Object.fromEntries(this.headers);
  }

  private async send(url: string, init: RequestInit, timeoutMs = this.timeoutMs) {
    const headers = new Headers(init.headers);
    for (const [name, value] of this.headers) {
      headers.set(name, value);
    }
    if (this.cookies.size > 0) {
      headers.set(
        "cookie",
        this.cookieList()
          .map((cookie) => `${cookie.name}=${cookie.value}`)
          .join("; ")
      );
    }
    const response = await this.fetchImpl(url, {
      ...init,
      headers,
      redirect: "follow",
      signal: AbortSignal.timeout(timeoutMs)
    });
    this.storeCookies(response);
    return response;
  }

  private storeCookies(response: Response) {
    if (this.sealed) return;
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(";")[0];
      const separator = pair.indexOf("=");
      if (separator <= 0) continue;
      this.cookies.set(pair.slice(0, separator).trim(), pair.slice(separator + 1).trim());
    }
  }
}

export function encodeQuery(params: QueryParams) {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value === undefined) continue;
    if (typeof value === "object") {
      for (const item of value) search.append(key, item);
    } else {
      search.append(key, String(value));
    }
  }
  return search.toString();
}
