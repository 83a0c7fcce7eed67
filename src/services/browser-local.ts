/**
 * Local Browser Service - Launches Chromium through puppeteer-core
 * One browser process and one isolated context per scenario run
 */
import puppeteer, { type Browser, type BrowserContext } from "puppeteer-core";
import { getLogger } from "@logtape/logtape";
import { existsSync } from "fs";
import type { AutomationPage, BrowserOpener, ScenarioBrowser } from "../types/browser";

const logger = getLogger(["bridge-smoke", "browser"]);

export function getExecutablePath(): string {
  const envPath = process.env.CHROME_EXECUTABLE_PATH;
  if (!envPath) {
    throw new Error(
      "Missing required environment variable: CHROME_EXECUTABLE_PATH (path to a Chromium or Chrome binary)"
    );
  }
  if (!existsSync(envPath)) {
    throw new Error(`CHROME_EXECUTABLE_PATH does not exist: ${envPath}`);
  }
  return envPath;
}

export interface LocalBrowserOptions {
  headless: boolean;
  actionTimeoutMs: number;
  executablePath?: string;
}

const LAUNCH_ARGS = [
  "--no-sandbox",
  "--disable-setuid-sandbox",
  "--no-first-run",
  "--no-default-browser-check",
  "--disable-background-timer-throttling",
  "--disable-renderer-backgrounding",
  "--disable-backgrounding-occluded-windows",
  "--noerrdialogs",
];

export class LocalBrowserSession implements ScenarioBrowser {
  constructor(
    readonly browser: Browser,
    readonly context: BrowserContext,
    private readonly actionTimeoutMs: number
  ) {}

  async newPage(): Promise<AutomationPage> {
    const page = await this.context.newPage();
    page.setDefaultTimeout(this.actionTimeoutMs);
    return page;
  }

  async close(): Promise<void> {
    if (!this.browser.connected) return;
    await this.browser.close();
  }
}

/**
 * Launch Chromium and open a fresh isolated context
 */
export async function launchLocalBrowser(options: LocalBrowserOptions): Promise<LocalBrowserSession> {
  const executablePath = options.executablePath ?? getExecutablePath();

  logger.info("Launching Chromium (headless={headless}) from {executablePath}", {
    headless: options.headless,
    executablePath,
  });

  const browser = await puppeteer.launch({
    executablePath,
    headless: options.headless,
    args: LAUNCH_ARGS,
    defaultViewport: { width: 1280, height: 900 },
  });

  try {
    const context = await browser.createBrowserContext();
    return new LocalBrowserSession(browser, context, options.actionTimeoutMs);
  } catch (error) {
    await browser.close();
    throw error;
  }
}

export function localBrowserOpener(options: LocalBrowserOptions): BrowserOpener {
  return () => launchLocalBrowser(options);
}

/**
 * Run `fn` with a browser session that is closed on every exit path.
 * A close failure is logged and never replaces the callback's own outcome.
 */
export async function withBrowserSession<T>(
  open: BrowserOpener,
  fn: (session: ScenarioBrowser) => Promise<T>
): Promise<T> {
  const session = await open();
  try {
    return await fn(session);
  } finally {
    try {
      await session.close();
      logger.debug("Browser closed");
    } catch (error) {
      logger.warn("Failed to close browser: {error}", {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
}
