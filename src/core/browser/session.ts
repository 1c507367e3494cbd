/**
 * Browser session used by the crawler
 */

import type { Browser, Page } from "playwright";
import { AppConfig } from "../config/app-config";
import { NavigationError } from "../errors/index";
import { Logger } from "../utils/logger";
import { launchBrowser } from "./launcher";
import { optimizePage } from "./optimization";

/** An element found in the rendered page */
export interface SessionElement {
  getAttribute(name: string): Promise<string | null>;
}

/** The capabilities the crawler needs from a browser */
export interface BrowserSession {
  /** @throws NavigationError when the page cannot be reached or rendered */
  navigate(url: string): Promise<void>;
  /** Markup of the currently rendered document */
  currentSource(): Promise<string>;
  /** The first element matching `selector`, or null */
  findSingle(selector: string): Promise<SessionElement | null>;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;

export interface PlaywrightSessionOptions {
  navTimeoutMs?: number;
  blockResources?: boolean;
}

/** BrowserSession backed by one Playwright page */
export class PlaywrightSession implements BrowserSession {
  private constructor(
    private readonly browser: Browser,
    private readonly page: Page,
    private readonly navTimeoutMs: number,
  ) {}

  static async open(
    options: PlaywrightSessionOptions = {},
  ): Promise<PlaywrightSession> {
    const browser = await launchBrowser();
    try {
      const page = await browser.newPage();
      if (options.blockResources ?? AppConfig.BLOCK_RESOURCES) {
        await optimizePage(page);
      }
      return new PlaywrightSession(
        browser,
        page,
        options.navTimeoutMs ?? AppConfig.NAV_TIMEOUT_MS,
      );
    } catch (e) {
      await browser.close();
      throw e;
    }
  }

  async navigate(url: string): Promise<void> {
    try {
      await this.page.goto(url, {
        waitUntil: "domcontentloaded",
        timeout: this.navTimeoutMs,
      });
    } catch (e) {
      throw new NavigationError(`Failed to navigate to ${url}`, url, e);
    }
  }

  async currentSource(): Promise<string> {
    try {
      return await this.page.content();
    } catch (e) {
      throw new NavigationError(
        `Failed to read page source of ${this.page.url()}`,
        this.page.url(),
        e,
      );
    }
  }

  async findSingle(selector: string): Promise<SessionElement | null> {
    return await this.page.$(selector);
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}

/**
 * Opens a session, hands it to `fn` and closes it on every exit path
 */
export async function withBrowserSession<T>(
  open: SessionFactory,
  fn: (session: BrowserSession) => Promise<T>,
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
    } catch (e) {
      Logger.error("Failed to close browser session", e);
    }
  }
}
