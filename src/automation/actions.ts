/**
 * Shared page actions: wait, then act
 */

import type { AutomationPage } from "../types/browser";

/**
 * Replace the contents of an input with `text`.
 * Triple-click selects whatever is already there so typing overwrites it.
 */
export async function fillField(page: AutomationPage, selector: string, text: string): Promise<void> {
  await page.waitForSelector(selector, { visible: true });
  await page.click(selector, { count: 3 });
  await page.keyboard.press("Backspace");
  await page.type(selector, text);
}

export async function clickWhenReady(page: AutomationPage, selector: string): Promise<void> {
  await page.waitForSelector(selector, { visible: true });
  await page.click(selector);
}
