/**
 * Chat target resolution and message sending from Element
 *
 * direct_message: DM the bridge's ghost user for a Mattermost account.
 * relay_channel: join the bridged room named by targetIdentity.
 */

import type { AutomationPage } from "../../types/browser";
import type { ChatTarget, ScenarioConfig } from "../../types/scenario";
import { clickWhenReady, fillField } from "../actions";
import { CHAT } from "./selectors";

export function ghostUserId(config: ScenarioConfig): string {
  return `@${config.ghostPrefix}${config.admin.username.toLowerCase()}:${config.serverName}`;
}

export function resolveChatTarget(config: ScenarioConfig): ChatTarget {
  if (config.targetIdentity) {
    return { strategy: config.targetStrategy, identity: config.targetIdentity };
  }
  switch (config.targetStrategy) {
    case "relay_channel":
      throw new Error("relay_channel needs an explicit targetIdentity naming the bridged room");
    case "direct_message":
      return { strategy: "direct_message", identity: ghostUserId(config) };
  }
}

export function roomUrl(clientUrl: string, alias: string): string {
  return `${clientUrl.replace(/\/+$/, "")}/#/room/${encodeURIComponent(alias)}`;
}

export async function startDirectChat(page: AutomationPage, userId: string): Promise<void> {
  await clickWhenReady(page, CHAT.START_CHAT);
  await fillField(page, CHAT.INVITE_INPUT, userId);
  await clickWhenReady(page, CHAT.GO);
}

export async function joinRoom(page: AutomationPage, config: ScenarioConfig, alias: string): Promise<void> {
  await page.goto(roomUrl(config.clientUrl, alias), {
    waitUntil: "domcontentloaded",
    timeout: config.navigationTimeoutMs,
  });
  await clickWhenReady(page, CHAT.JOIN_ROOM);
}

export async function openChat(page: AutomationPage, config: ScenarioConfig, target: ChatTarget): Promise<void> {
  switch (target.strategy) {
    case "direct_message":
      await startDirectChat(page, target.identity);
      break;
    case "relay_channel":
      await joinRoom(page, config, target.identity);
      break;
  }
}

export async function sendMessage(page: AutomationPage, text: string): Promise<void> {
  await clickWhenReady(page, CHAT.COMPOSER);
  await page.type(CHAT.COMPOSER, text);
  await page.keyboard.press("Enter");
}
