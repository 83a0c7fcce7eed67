import { describe, it, expect } from "vitest";
import { FakePage } from "../../testing/fake-page";
import { testConfig } from "../../testing/fixtures";
import type { TargetStrategy } from "../../types/scenario";
import { openChat, resolveChatTarget, roomUrl, sendMessage } from "./chat";
import { CHAT } from "./selectors";

describe("resolveChatTarget", () => {
  it("derives the direct_message target from the bridge namespace", () => {
    expect(resolveChatTarget(testConfig())).toEqual({
      strategy: "direct_message",
      identity: "@mattermost_sysadmin:bridge.test",
    });
  });

  it("refuses to invent a relay_channel room alias", () => {
    expect(() => resolveChatTarget(testConfig({ targetStrategy: "relay_channel" }))).toThrow(
      "relay_channel needs an explicit targetIdentity naming the bridged room"
    );
  });

  it.each<[TargetStrategy, string]>([
    ["direct_message", "@mattermost_alice:example.org"],
    ["relay_channel", "#_mattermost_town-square:example.org"],
  ])("uses an explicit %s identity as given", (strategy, identity) => {
    expect(resolveChatTarget(testConfig({ targetStrategy: strategy, targetIdentity: identity }))).toEqual({
      strategy,
      identity,
    });
  });

  it("lowercases the ghost localpart", () => {
    const config = testConfig();
    config.admin.username = "SysAdmin";

    expect(resolveChatTarget(config).identity).toBe("@mattermost_sysadmin:bridge.test");
  });

  it("follows a changed namespace prefix", () => {
    expect(resolveChatTarget(testConfig({ ghostPrefix: "mm_" })).identity).toBe("@mm_sysadmin:bridge.test");
  });
});

describe("roomUrl", () => {
  it("encodes the alias into Element's room route", () => {
    expect(roomUrl("http://element.test:8080/", "#ops:example.org")).toBe(
      "http://element.test:8080/#/room/%23ops%3Aexample.org"
    );
  });
});

describe("openChat", () => {
  it("starts a direct chat through the dialog", async () => {
    const page = new FakePage("element").withSelectors(CHAT.START_CHAT, CHAT.INVITE_INPUT, CHAT.GO);

    await openChat(page, testConfig(), { strategy: "direct_message", identity: "@mattermost_sysadmin:bridge.test" });

    expect(page.calls("type")).toEqual([
      { page: "element", method: "type", arg: CHAT.INVITE_INPUT, value: "@mattermost_sysadmin:bridge.test" },
    ]);
    expect(page.calls("click").at(-1)?.arg).toBe(CHAT.GO);
    expect(page.calls("goto")).toEqual([]);
  });

  it("joins the portal room for the relay strategy", async () => {
    const page = new FakePage("element").withSelectors(CHAT.JOIN_ROOM);

    await openChat(page, testConfig(), { strategy: "relay_channel", identity: "#ops:example.org" });

    expect(page.calls("goto")).toEqual([
      {
        page: "element",
        method: "goto",
        arg: "http://element.test:8080/#/room/%23ops%3Aexample.org",
        timeout: 60000,
      },
    ]);
    expect(page.calls("click").map((c) => c.arg)).toEqual([CHAT.JOIN_ROOM]);
  });
});

describe("sendMessage", () => {
  it("types into the composer and presses Enter", async () => {
    const page = new FakePage("element").withSelectors(CHAT.COMPOSER);

    await sendMessage(page, "Hello from Matrix!");

    expect(page.calls().filter((c) => c.method !== "waitForSelector")).toEqual([
      { page: "element", method: "click", arg: CHAT.COMPOSER, value: undefined },
      { page: "element", method: "type", arg: CHAT.COMPOSER, value: "Hello from Matrix!" },
      { page: "element", method: "press", arg: "Enter" },
    ]);
  });
});
