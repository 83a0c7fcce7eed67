/**
 * In-process stand-ins for a puppeteer page and browser.
 * Every call lands in a shared log so tests can assert ordering across pages.
 */

import { TimeoutError, type ClickOptions, type GoToOptions, type KeyInput, type WaitForSelectorOptions } from "puppeteer-core";
import type { AutomationPage, ScenarioBrowser } from "../types/browser";

export interface PageCall {
  page: string;
  method: "goto" | "waitForSelector" | "$" | "click" | "type" | "press" | "bringToFront";
  arg?: string;
  value?: string;
  timeout?: number;
  hidden?: boolean;
}

export class FakePage implements AutomationPage {
  currentUrl = "about:blank";
  defaultTimeout = 0;
  /** Selectors that resolve immediately; everything else times out */
  readonly present = new Set<string>();
  readonly failOn = new Map<string, Error>();
  private readonly clickEffects = new Map<string, () => void>();
  private readonly gotoEffects: Array<(url: string) => void> = [];

  readonly keyboard = {
    press: async (key: KeyInput): Promise<void> => {
      this.log.push({ page: this.name, method: "press", arg: key });
    },
  };

  constructor(
    readonly name: string,
    readonly log: PageCall[] = []
  ) {}

  withSelectors(...selectors: string[]): this {
    for (const selector of selectors) this.present.add(selector);
    return this;
  }

  onClick(selector: string, effect: () => void): this {
    this.clickEffects.set(selector, effect);
    return this;
  }

  onGoto(effect: (url: string) => void): this {
    this.gotoEffects.push(effect);
    return this;
  }

  calls(method?: PageCall["method"]): PageCall[] {
    return this.log.filter((c) => c.page === this.name && (!method || c.method === method));
  }

  url(): string {
    return this.currentUrl;
  }

  async goto(url: string, options?: GoToOptions): Promise<null> {
    this.log.push({ page: this.name, method: "goto", arg: url, timeout: options?.timeout });
    this.throwIfFailing(url);
    this.currentUrl = url;
    for (const effect of this.gotoEffects) effect(url);
    return null;
  }

  async waitForSelector(selector: string, options?: WaitForSelectorOptions): Promise<object | null> {
    this.log.push({
      page: this.name,
      method: "waitForSelector",
      arg: selector,
      timeout: options?.timeout,
      hidden: options?.hidden,
    });
    this.throwIfFailing(selector);
    if (options?.hidden) {
      if (this.present.has(selector)) {
        throw new TimeoutError(`Waiting for selector \`${selector}\` to be hidden failed`);
      }
      return null;
    }
    const alternatives = selector.split(",").map((s) => s.trim());
    if (!this.present.has(selector) && !alternatives.some((s) => this.present.has(s))) {
      throw new TimeoutError(`Waiting for selector \`${selector}\` failed`);
    }
    return {};
  }

  async $(selector: string): Promise<object | null> {
    this.log.push({ page: this.name, method: "$", arg: selector });
    return this.present.has(selector) ? {} : null;
  }

  async click(selector: string, options?: Readonly<ClickOptions>): Promise<void> {
    this.log.push({ page: this.name, method: "click", arg: selector, value: options?.count?.toString() });
    this.throwIfFailing(selector);
    this.clickEffects.get(selector)?.();
  }

  async type(selector: string, text: string): Promise<void> {
    this.log.push({ page: this.name, method: "type", arg: selector, value: text });
    this.throwIfFailing(selector);
  }

  async bringToFront(): Promise<void> {
    this.log.push({ page: this.name, method: "bringToFront" });
  }

  setDefaultTimeout(timeout: number): void {
    this.defaultTimeout = timeout;
  }

  private throwIfFailing(key: string) {
    const error = this.failOn.get(key);
    if (error) throw error;
  }
}

export class FakeBrowser implements ScenarioBrowser {
  closeCount = 0;
  closeError: Error | null = null;
  readonly opened: FakePage[] = [];

  constructor(private readonly pages: FakePage[] = []) {}

  async newPage(): Promise<AutomationPage> {
    const page = this.pages[this.opened.length] ?? new FakePage(`page-${this.opened.length}`);
    this.opened.push(page);
    return page;
  }

  async close(): Promise<void> {
    this.closeCount++;
    if (this.closeError) throw this.closeError;
  }
}
