/**
 * Element account registration against a custom homeserver
 */

import type { AutomationPage } from "../../types/browser";
import type { ClientAccount, ScenarioConfig } from "../../types/scenario";
import { clickWhenReady, fillField } from "../actions";
import { REGISTER } from "./selectors";

export async function openClient(page: AutomationPage, config: ScenarioConfig): Promise<void> {
  await page.goto(config.clientUrl, {
    waitUntil: "domcontentloaded",
    timeout: config.navigationTimeoutMs,
  });
}

/**
 * Point the registration form at `homeserverUrl` instead of Element's default server
 */
export async function selectHomeserver(page: AutomationPage, homeserverUrl: string): Promise<void> {
  await clickWhenReady(page, REGISTER.EDIT_HOMESERVER);
  await fillField(page, REGISTER.HOMESERVER, homeserverUrl);
  await clickWhenReady(page, REGISTER.CONTINUE);
}

export async function registerClientAccount(
  page: AutomationPage,
  config: ScenarioConfig,
  account: ClientAccount
): Promise<void> {
  await openClient(page, config);
  await clickWhenReady(page, REGISTER.CREATE_ACCOUNT);
  await selectHomeserver(page, config.homeserverUrl);

  await fillField(page, REGISTER.USERNAME, account.username);
  await fillField(page, REGISTER.PASSWORD, account.password);
  await fillField(page, REGISTER.PASSWORD_CONFIRM, account.password);
  await clickWhenReady(page, REGISTER.SUBMIT);
}
