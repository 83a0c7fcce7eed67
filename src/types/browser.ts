import type { ClickOptions, GoToOptions, Keyboard, WaitForSelectorOptions } from "puppeteer-core";

/**
 * The slice of a puppeteer Page the scenario drives.
 * A real Page satisfies it; tests hand in a recording fake.
 */
export interface AutomationPage {
  url(): string;
  goto(url: string, options?: GoToOptions): Promise<unknown>;
  waitForSelector(selector: string, options?: WaitForSelectorOptions): Promise<unknown>;
  $(selector: string): Promise<unknown>;
  click(selector: string, options?: Readonly<ClickOptions>): Promise<void>;
  type(selector: string, text: string): Promise<void>;
  bringToFront(): Promise<void>;
  setDefaultTimeout(timeout: number): void;
  keyboard: Pick<Keyboard, "press">;
}

export interface ScenarioBrowser {
  /** Opens a page in the session's isolated context */
  newPage(): Promise<AutomationPage>;
  close(): Promise<void>;
}

export type BrowserOpener = () => Promise<ScenarioBrowser>;
