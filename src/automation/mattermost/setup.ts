/**
 * Mattermost admin console bootstrap
 *
 * The console is probed once after load. A first-run console gets the admin
 * account and a team; an initialized one is signed into. Anything else is fatal.
 */

import { getLogger } from "@logtape/logtape";
import type { AutomationPage } from "../../types/browser";
import type { AdminAccount, AdminConsoleState, ScenarioConfig, TeamInfo } from "../../types/scenario";
import { anyOf } from "../../utils/selectors";
import { clickWhenReady, fillField } from "../actions";
import { CREATE_TEAM, FIRST_RUN_URL_PATTERN, LOGIN, SIGNUP } from "./selectors";

const logger = getLogger(["bridge-smoke", "mattermost"]);

export class AdminConsoleStateError extends Error {
  constructor(readonly url: string) {
    super(`Mattermost at ${url} shows neither the first-run signup nor the login form`);
    this.name = "AdminConsoleStateError";
  }
}

export async function openAdminConsole(page: AutomationPage, config: ScenarioConfig): Promise<void> {
  await page.goto(config.adminUrl, {
    waitUntil: "domcontentloaded",
    timeout: config.navigationTimeoutMs,
  });
}

/**
 * Wait for either entry form, then classify the console
 */
export async function detectAdminConsoleState(
  page: AutomationPage,
  timeoutMs: number
): Promise<AdminConsoleState> {
  await page.waitForSelector(anyOf(SIGNUP.FORM, LOGIN.LOGIN_ID), { timeout: timeoutMs });

  if (page.url().includes(FIRST_RUN_URL_PATTERN)) {
    return "first_run";
  }
  if (await page.$(LOGIN.LOGIN_ID)) {
    return "initialized";
  }
  return "unknown";
}

export async function createAdminAccount(page: AutomationPage, admin: AdminAccount): Promise<void> {
  await fillField(page, SIGNUP.EMAIL, admin.email);
  await fillField(page, SIGNUP.USERNAME, admin.username);
  await fillField(page, SIGNUP.PASSWORD, admin.password);
  await clickWhenReady(page, SIGNUP.SUBMIT);
}

/**
 * Walk the create-team wizard: display name, URL slug, finish
 */
export async function createTeam(page: AutomationPage, team: TeamInfo): Promise<void> {
  await clickWhenReady(page, CREATE_TEAM.LINK);
  await fillField(page, CREATE_TEAM.NAME, team.displayName);
  await clickWhenReady(page, CREATE_TEAM.NEXT);
  await fillField(page, CREATE_TEAM.URL, team.slug);
  await clickWhenReady(page, CREATE_TEAM.NEXT);
  await clickWhenReady(page, CREATE_TEAM.FINISH);
}

export async function signInAdmin(page: AutomationPage, admin: AdminAccount): Promise<void> {
  await fillField(page, LOGIN.LOGIN_ID, admin.username);
  await fillField(page, LOGIN.PASSWORD, admin.password);
  await clickWhenReady(page, LOGIN.SUBMIT);
  await page.waitForSelector(LOGIN.LOGIN_ID, { hidden: true });
}

/**
 * Bring the console to a signed-in admin session, whatever state it starts in
 */
export async function prepareAdminConsole(
  page: AutomationPage,
  config: ScenarioConfig
): Promise<AdminConsoleState> {
  await openAdminConsole(page, config);
  const state = await detectAdminConsoleState(page, config.navigationTimeoutMs);
  logger.debug("Mattermost console state: {state}", { state });

  switch (state) {
    case "first_run":
      await createAdminAccount(page, config.admin);
      await createTeam(page, config.team);
      break;
    case "initialized":
      await signInAdmin(page, config.admin);
      break;
    default:
      throw new AdminConsoleStateError(page.url());
  }

  return state;
}
