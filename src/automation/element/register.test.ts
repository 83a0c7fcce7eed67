import { describe, it, expect } from "vitest";
import { FakePage } from "../../testing/fake-page";
import { testConfig } from "../../testing/fixtures";
import { registerClientAccount } from "./register";
import { REGISTER } from "./selectors";

function registrationPage(): FakePage {
  return new FakePage("element").withSelectors(...Object.values(REGISTER));
}

describe("registerClientAccount", () => {
  it("registers on the configured homeserver", async () => {
    const page = registrationPage();

    await registerClientAccount(page, testConfig(), { username: "user_1700000000", password: "test-password" });

    expect(page.calls("goto")[0]?.arg).toBe("http://element.test:8080");
    expect(page.calls("goto")[0]?.timeout).toBe(60000);
    expect(page.calls("type").map((c) => [c.arg, c.value])).toEqual([
      [REGISTER.HOMESERVER, "http://synapse.test:8008"],
      [REGISTER.USERNAME, "user_1700000000"],
      [REGISTER.PASSWORD, "test-password"],
      [REGISTER.PASSWORD_CONFIRM, "test-password"],
    ]);
  });

  it("clicks through the form in order", async () => {
    const page = registrationPage();

    await registerClientAccount(page, testConfig(), { username: "user_1", password: "test-password" });

    const buttons = page.calls("click").map((c) => c.arg).filter((s) => !s?.startsWith("input"));
    expect(buttons).toEqual([REGISTER.CREATE_ACCOUNT, REGISTER.EDIT_HOMESERVER, REGISTER.CONTINUE, REGISTER.SUBMIT]);
  });

  it("clears the prefilled homeserver before typing", async () => {
    const page = registrationPage();

    await registerClientAccount(page, testConfig(), { username: "user_1", password: "test-password" });

    const calls = page.calls();
    const typeIndex = calls.findIndex((c) => c.method === "type" && c.arg === REGISTER.HOMESERVER);
    expect(calls.slice(typeIndex - 2, typeIndex)).toEqual([
      { page: "element", method: "click", arg: REGISTER.HOMESERVER, value: "3" },
      { page: "element", method: "press", arg: "Backspace" },
    ]);
  });
});
