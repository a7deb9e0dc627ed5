import { chromium, type Browser, type BrowserContext, type Page, type Request } from "playwright";
import type { DashboardConfig } from "../dashboards.js";
import type { GrafanaSession } from "../grafana/session.js";
import type { ContextLogger } from "../logger.js";
import type { TrafficEntry, TrafficLog } from "./readiness.js";

/** One worker's browser. Never shared between workers. */
export interface BrowserHandle {
  readonly traffic: TrafficLog;
  navigate(url: string): Promise<void>;
  /** Address of the loaded document, after any redirects. */
  currentUrl(): string;
  screenshot(path: string): Promise<void>;
  close(): Promise<void>;
}

export type BrowserLauncher = (workerId: number) => Promise<BrowserHandle>;

class PageTraffic implements TrafficLog {
  private readonly requests = new Map<Request, TrafficEntry>();

  constructor(page: Page) {
    page.on("request", (request) => {
      this.requests.set(request, { url: request.url(), status: null });
    });
    page.on("response", (response) => {
      const entry = this.requests.get(response.request());
      if (entry) entry.status = response.status();
    });
  }

  entries(): readonly TrafficEntry[] {
    return Array.from(this.requests.values());
  }

  clear() {
    this.requests.clear();
  }
}

class PlaywrightBrowser implements BrowserHandle {
  readonly traffic: TrafficLog;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page
  ) {
    this.traffic = new PageTraffic(page);
  }

  async navigate(url: string) {
    await this.page.goto(url, { waitUntil: "load" });
  }

  currentUrl() {
    return this.page.url();
  }

  async screenshot(path: string) {
    await this.page.screenshot({ path, type: "png" });
  }

  async close() {
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
  }
}

/**
 * Launches headless Chromium with the session's cookies and headers copied
 * into a fresh context.
 */
export function createPlaywrightLauncher(
  config: DashboardConfig,
  session: GrafanaSession,
  log: ContextLogger
): BrowserLauncher {
  return async (workerId) => {
    const browser = await chromium.launch({
      headless: true,
      args: ["--disable-gpu"]
    });
    try {
      const context = await browser.newContext({
        viewport: { width: config.width, height: config.height },
        ignoreHTTPSErrors: config.ignoreHttpsErrors,
        extraHTTPHeaders: session.extraHeaders()
      });
      const cookies = session.cookieList();
      if (cookies.length > 0) {
        await context.addCookies(
          cookies.map((cookie) => ({ ...cookie, url: session.host }))
        );
      }
      const page = await context.newPage();
      page.setDefaultNavigationTimeout(config.timeout * 1000);
      log.debug("browser.launch.done", { workerId, cookies: cookies.length });
      return new PlaywrightBrowser(browser, context, page);
    } catch (error) {
      await browser.close();
      throw error;
    }
  };
}
