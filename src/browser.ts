import { chromium, errors, firefox, type Browser, type BrowserContext, type Page } from "playwright-core";
import type { AppConfig } from "./config.js";
import { BrowserSessionError, errorMessage } from "./errors.js";
import { scopedLogger } from "./logger.js";

const log = scopedLogger("browser");

export type TabId = string;

/** `timeout` still leaves a partially loaded page worth capturing. */
export type NavigationOutcome = "ok" | "timeout" | "insecure-certificate" | "failed";

export interface TabInfo {
  id: TabId;
  label?: string;
  url: string;
}

/**
 * The browser capability the scheduler drives. Every per-tab call may reject;
 * callers treat that as a problem with that one target.
 */
export interface BrowserSession {
  openTab(): Promise<TabId>;
  navigate(tab: TabId, url: string): Promise<NavigationOutcome>;
  readTitle(tab: TabId): Promise<string>;
  readDocumentText(tab: TabId): Promise<string>;
  screenshot(tab: TabId): Promise<Buffer>;
  currentLocation(tab: TabId): Promise<string>;
  closeTab(tab: TabId): Promise<void>;
  setTabLabel(tab: TabId, label: string): Promise<void>;
  listTabs(): Promise<TabInfo[]>;
  shutdown(): Promise<void>;
}

export type SessionFactory = (config: AppConfig) => Promise<BrowserSession>;

const CERTIFICATE_ERROR = /ERR_CERT|SEC_ERROR|SSL_ERROR|certificate/i;

interface Tab {
  page: Page;
  label?: string;
}

export class PlaywrightSession implements BrowserSession {
  private readonly tabs = new Map<TabId, Tab>();
  private nextId = 1;

  private constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
  ) {}

  static async launch(config: AppConfig): Promise<PlaywrightSession> {
    const engine = config.BROWSER === "firefox" ? firefox : chromium;
    let browser: Browser;
    try {
      browser = await engine.launch({ headless: config.PLAYWRIGHT_HEADLESS });
    } catch (err) {
      throw new BrowserSessionError(`Failed to launch ${config.BROWSER}`, { cause: errorMessage(err) });
    }

    try {
      const context = await browser.newContext({
        viewport: { width: config.VIEWPORT_WIDTH, height: config.VIEWPORT_HEIGHT },
      });
      context.setDefaultNavigationTimeout(config.PAGE_LOAD_TIMEOUT_SECONDS * 1000);
      context.setDefaultTimeout(config.SCRIPT_TIMEOUT_SECONDS * 1000);
      log.info({ browser: config.BROWSER, headless: config.PLAYWRIGHT_HEADLESS }, "Browser session started");
      return new PlaywrightSession(browser, context);
    } catch (err) {
      await browser.close().catch((closeErr: unknown) => {
        log.warn({ err: errorMessage(closeErr) }, "Failed to close browser after setup error");
      });
      throw new BrowserSessionError("Failed to set up browser context", { cause: errorMessage(err) });
    }
  }

  private page(tab: TabId): Page {
    const entry = this.tabs.get(tab);
    if (!entry) throw new Error(`No such tab: ${tab}`);
    return entry.page;
  }

  async openTab(): Promise<TabId> {
    const page = await this.context.newPage();
    const id = `tab-${this.nextId++}`;
    this.tabs.set(id, { page });
    return id;
  }

  async navigate(tab: TabId, url: string): Promise<NavigationOutcome> {
    try {
      await this.page(tab).goto(url, { waitUntil: "load" });
      return "ok";
    } catch (err) {
      if (err instanceof errors.TimeoutError) {
        log.info({ url }, "Navigation timed out, capturing what loaded");
        return "timeout";
      }
      const message = errorMessage(err);
      if (CERTIFICATE_ERROR.test(message)) {
        log.warn({ url, err: message }, "Insecure certificate");
        return "insecure-certificate";
      }
      log.warn({ url, err: message }, "Navigation failed");
      return "failed";
    }
  }

  async readTitle(tab: TabId): Promise<string> {
    return this.page(tab).title();
  }

  async readDocumentText(tab: TabId): Promise<string> {
    return this.page(tab).content();
  }

  async screenshot(tab: TabId): Promise<Buffer> {
    return this.page(tab).screenshot({ type: "png" });
  }

  async currentLocation(tab: TabId): Promise<string> {
    return this.page(tab).url();
  }

  async closeTab(tab: TabId): Promise<void> {
    await this.page(tab).close();
    this.tabs.delete(tab);
  }

  async setTabLabel(tab: TabId, label: string): Promise<void> {
    const entry = this.tabs.get(tab);
    if (!entry) throw new Error(`No such tab: ${tab}`);
    entry.label = label;
  }

  async listTabs(): Promise<TabInfo[]> {
    return [...this.tabs].map(([id, { page, label }]) => ({ id, label, url: page.url() }));
  }

  async shutdown(): Promise<void> {
    try {
      await this.context.close();
      await this.browser.close();
    } catch (err) {
      throw new BrowserSessionError("Failed to shut down browser session", { cause: errorMessage(err) });
    }
    this.tabs.clear();
    log.info("Browser session closed");
  }
}

export const launchPlaywrightSession: SessionFactory = (config) => PlaywrightSession.launch(config);
