/**
 * Bridge Smoke Scenario Runner
 * Drives Mattermost and Element in one browser context and checks that a
 * message sent from Element shows up in Mattermost
 */

import { TimeoutError } from "puppeteer-core";
import { getLogger } from "@logtape/logtape";
import { localBrowserOpener, withBrowserSession } from "../../services/browser-local";
import { logGlobal, logStep } from "../../utils/logger";
import { generateClientUsername } from "../../utils/generators";
import type { BrowserOpener, ScenarioBrowser } from "../../types/browser";
import type { ScenarioConfig, ScenarioRun, ScenarioStep } from "../../types/scenario";
import { prepareAdminConsole } from "../mattermost/setup";
import { waitForMessage } from "../mattermost/verify";
import { registerClientAccount } from "../element/register";
import { openChat, resolveChatTarget, sendMessage } from "../element/chat";
import { completeStep, createRun, markRunFailed, markRunPassed, startStep, updateRun } from "./run";

const logger = getLogger(["bridge-smoke", "scenario"]);

/**
 * A step failed; `cause` holds the driver's original error
 */
export class ScenarioStepError extends Error {
  constructor(
    readonly step: ScenarioStep,
    readonly cause: unknown
  ) {
    super(
      cause instanceof TimeoutError
        ? `${step} timed out: ${cause.message}`
        : `${step} failed: ${cause instanceof Error ? cause.message : String(cause)}`
    );
    this.name = "ScenarioStepError";
  }
}

export interface ScenarioDependencies {
  openBrowser?: BrowserOpener;
  now?: () => number;
  onRunUpdate?: (run: ScenarioRun) => void;
}

/**
 * Run the scenario once. Never throws for a scenario failure: the returned
 * run is `passed` or `failed`, and the browser is closed either way.
 */
export async function runScenario(
  config: ScenarioConfig,
  deps: ScenarioDependencies = {}
): Promise<ScenarioRun> {
  const now = deps.now ?? Date.now;
  const openBrowser =
    deps.openBrowser ??
    localBrowserOpener({ headless: config.headless, actionTimeoutMs: config.actionTimeoutMs });

  let run = createRun(new Date(now()));
  const publish = (next: ScenarioRun) => {
    run = next;
    deps.onRunUpdate?.(run);
  };

  const step = async <T>(name: ScenarioStep, action: () => Promise<T>, describe?: (result: T) => string) => {
    publish(startStep(run, name, new Date(now())));
    let result: T;
    try {
      result = await action();
    } catch (error) {
      throw new ScenarioStepError(name, error);
    }
    const detail = describe?.(result);
    if (detail) logStep(name, detail);
    publish(completeStep(run, name, detail, new Date(now())));
    return result;
  };

  const scenario = async (browser: ScenarioBrowser) => {
    logGlobal("Setting up Mattermost...");
    const adminPage = await browser.newPage();
    await step(
      "admin_setup",
      () => prepareAdminConsole(adminPage, config),
      (state) => (state === "first_run" ? "Created admin account and team" : "Signed in as admin")
    );

    logGlobal("Setting up Element...");
    const clientPage = await browser.newPage();
    const username = generateClientUsername(now(), config.usernameTag);
    publish(updateRun(run, { clientUsername: username }, new Date(now())));
    await step(
      "client_setup",
      () => registerClientAccount(clientPage, config, { username, password: config.clientPassword }),
      () => `Registered ${username} on ${config.homeserverUrl}`
    );

    logGlobal("Starting chat with Mattermost user...");
    const target = resolveChatTarget(config);
    publish(updateRun(run, { target }, new Date(now())));
    await step(
      "message_send",
      async () => {
        await openChat(clientPage, config, target);
        await sendMessage(clientPage, config.messageText);
      },
      () => `Sent "${config.messageText}" to ${target.identity} (${target.strategy})`
    );

    logGlobal("Verifying in Mattermost...");
    await step("verify", () => waitForMessage(adminPage, config.messageText, config.timeoutMs));
    logGlobal("SUCCESS: Message received in Mattermost!");
  };

  try {
    await withBrowserSession(openBrowser, scenario);
    publish(markRunPassed(run, new Date(now())));
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    logGlobal(`FAILED: ${message}`, "error");
    logger.debug("Scenario failure detail: {error}", { error });
    publish(markRunFailed(run, message, new Date(now())));
  }

  return run;
}
