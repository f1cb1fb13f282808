import { chromium, type Browser } from "playwright-core";
import type { ScreenshotCapturer } from "./types.js";

const VIEWPORT = { width: 1280, height: 800 };
const SETTLE_MS = 2000;

export interface BrowserScreenshotOptions {
  headless: boolean;
  timeoutMs: number;
  executablePath?: string;
}

/** First-fold homepage capture; the browser is launched lazily and reused across sites. */
export class BrowserScreenshotCapturer implements ScreenshotCapturer {
  private browser: Browser | null = null;

  constructor(private readonly options: BrowserScreenshotOptions) {}

  async init(): Promise<Browser> {
    if (!this.browser) {
      this.browser = await chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
      });
    }
    return this.browser;
  }

  async capture(url: string, outputPath: string): Promise<void> {
    const browser = await this.init();
    const context = await browser.newContext({ viewport: VIEWPORT });
    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: "domcontentloaded", timeout: this.options.timeoutMs });
      await page.waitForTimeout(SETTLE_MS);
      await page.screenshot({ path: outputPath });
    } finally {
      await context.close();
    }
  }

  async close(): Promise<void> {
    if (this.browser) {
      await this.browser.close();
      this.browser = null;
    }
  }
}
