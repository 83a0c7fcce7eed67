import type { ScenarioConfig } from "../types/scenario";

export function testConfig(overrides: Partial<ScenarioConfig> = {}): ScenarioConfig {
  return {
    adminUrl: "http://mm.test:8065",
    clientUrl: "http://element.test:8080",
    homeserverUrl: "http://synapse.test:8008",
    serverName: "bridge.test",
    targetStrategy: "direct_message",
    ghostPrefix: "mattermost_",
    messageText: "Hello from Matrix!",
    timeoutMs: 30000,
    navigationTimeoutMs: 60000,
    actionTimeoutMs: 30000,
    admin: { email: "admin@example.com", username: "sysadmin", password: "test-secret" },
    team: { displayName: "Test Team", slug: "test-team" },
    clientPassword: "test-password",
    headless: true,
    ...overrides,
  };
}
