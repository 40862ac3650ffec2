import type { Browser, Page } from "playwright";
import { chromium } from "playwright";

/**
 * Something that can load a page. Rejects when the page can't be loaded.
 */
export interface PageVisitor {
  visit: (url: string) => Promise<void>;
  close: () => Promise<void>;
}

export interface BrowserVisitorOptions {
  headless: boolean;
  /** Navigation timeout in ms; 0 disables it */
  timeoutMs: number;
}

const CHROMIUM_ARGS = ["--no-sandbox", "--disable-dev-shm-usage"];

// ============================================
// Browser automation - not unit testable
// ============================================
/* v8 ignore start */

/**
 * Page visitor backed by one Chromium page that is reused for every visit.
 */
export class BrowserVisitor implements PageVisitor {
  private constructor(
    readonly browser: Browser,
    private readonly page: Page,
    private readonly timeoutMs: number
  ) {}

  /**
   * Launches Chromium and opens the page used for all visits.
   */
  static async launch(options: BrowserVisitorOptions): Promise<BrowserVisitor> {
    const browser = await chromium.launch({
      headless: options.headless,
      args: CHROMIUM_ARGS,
    });

    try {
      const context = await browser.newContext();
      const page = await context.newPage();
      return new BrowserVisitor(browser, page, options.timeoutMs);
    } catch (error) {
      await browser.close();
      throw error;
    }
  }

  async visit(url: string): Promise<void> {
    await this.page.goto(url, { timeout: this.timeoutMs, waitUntil: "load" });
  }

  async close(): Promise<void> {
    await this.browser.close();
  }
}
/* v8 ignore stop */
