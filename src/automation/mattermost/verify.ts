import type { AutomationPage } from "../../types/browser";
import { withText } from "../../utils/selectors";

export function messageSelector(text: string): string {
  return withText("div", text);
}

/**
 * Focus the Mattermost tab and block until `text` is rendered anywhere on it
 */
export async function waitForMessage(page: AutomationPage, text: string, timeoutMs: number): Promise<void> {
  await page.bringToFront();
  await page.waitForSelector(messageSelector(text), { timeout: timeoutMs });
}
