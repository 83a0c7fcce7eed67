/**
 * Centralized configuration for the bridge smoke scenario
 *
 * Environment variables can override defaults.
 * Create a .env file or export these before running.
 */

import type { ScenarioConfig, TargetStrategy } from "./types/scenario";
import { TARGET_STRATEGIES } from "./types/scenario";

const env = process.env;

function envNumber(name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === "") return fallback;
  return Number(raw);
}

// Endpoints (docker-compose defaults)
export const URLS = {
  MATTERMOST: env.MATTERMOST_URL || "http://localhost:8065",
  ELEMENT: env.ELEMENT_URL || "http://localhost:8080",
  SYNAPSE: env.SYNAPSE_URL || "http://localhost:8008",
} as const;

export const MATRIX_SERVER_NAME = env.MATRIX_SERVER_NAME || "localhost";

// Appservice namespace owned by the bridge (@mattermost_.*, #mattermost_.*)
export const GHOST_PREFIX = env.GHOST_PREFIX || "mattermost_";

// Timeouts (in milliseconds)
export const TIMEOUTS = {
  NAVIGATION: envNumber("NAVIGATION_TIMEOUT_MS", 60000),
  ACTION: envNumber("ACTION_TIMEOUT_MS", 30000),
  VERIFY: envNumber("VERIFY_TIMEOUT_MS", 30000),
} as const;

export const MATTERMOST_ADMIN = {
  EMAIL: env.MM_ADMIN_EMAIL || "admin@example.com",
  USERNAME: env.MM_ADMIN_USERNAME || "sysadmin",
  PASSWORD: env.MM_ADMIN_PASSWORD || "Sys@dmin123",
} as const;

export const MATTERMOST_TEAM = {
  NAME: env.MM_TEAM_NAME || "Test Team",
  SLUG: env.MM_TEAM_SLUG || "test-team",
} as const;

export const MATRIX_USER_PASSWORD = env.MATRIX_USER_PASSWORD || "password123";

export const SMOKE_MESSAGE = env.SMOKE_MESSAGE || "Hello from Matrix!";

// Browser settings
export const HEADLESS = env.HEADLESS !== "false" && env.HEADLESS !== "0";

// Logging
export const LOG_LEVEL = env.LOG_LEVEL || "info";

/**
 * Raised before any browser starts when the resolved config is unusable
 */
export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
  }
}

export function isTargetStrategy(value: string): value is TargetStrategy {
  return TARGET_STRATEGIES.some((s) => s === value);
}

/**
 * Scenario options before validation; the strategy is still the raw string
 * from the environment or command line
 */
export type ScenarioInput = Omit<ScenarioConfig, "targetStrategy"> & { targetStrategy: string };

/**
 * Defaults for every scenario option, taken from the environment
 */
export function defaultScenarioConfig(): ScenarioInput {
  return {
    adminUrl: URLS.MATTERMOST,
    clientUrl: URLS.ELEMENT,
    homeserverUrl: URLS.SYNAPSE,
    serverName: MATRIX_SERVER_NAME,
    targetStrategy: env.TARGET_STRATEGY || "direct_message",
    targetIdentity: env.TARGET_IDENTITY || undefined,
    ghostPrefix: GHOST_PREFIX,
    messageText: SMOKE_MESSAGE,
    timeoutMs: TIMEOUTS.VERIFY,
    navigationTimeoutMs: TIMEOUTS.NAVIGATION,
    actionTimeoutMs: TIMEOUTS.ACTION,
    admin: {
      email: MATTERMOST_ADMIN.EMAIL,
      username: MATTERMOST_ADMIN.USERNAME,
      password: MATTERMOST_ADMIN.PASSWORD,
    },
    team: {
      displayName: MATTERMOST_TEAM.NAME,
      slug: MATTERMOST_TEAM.SLUG,
    },
    clientPassword: MATRIX_USER_PASSWORD,
    headless: HEADLESS,
  };
}

export type ScenarioOverrides = Partial<Omit<ScenarioInput, "admin" | "team">> & {
  admin?: Partial<ScenarioConfig["admin"]>;
  team?: Partial<ScenarioConfig["team"]>;
};

function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === "http:" || url.protocol === "https:";
  } catch {
    return false;
  }
}

/**
 * Merge overrides over the environment defaults and validate the result
 */
export function resolveScenarioConfig(
  overrides: ScenarioOverrides = {},
  base: ScenarioInput = defaultScenarioConfig()
): ScenarioConfig {
  const config: ScenarioInput = {
    ...base,
    ...overrides,
    admin: { ...base.admin, ...overrides.admin },
    team: { ...base.team, ...overrides.team },
  };

  const problems: string[] = [];

  for (const key of ["adminUrl", "clientUrl", "homeserverUrl"] as const) {
    if (!isHttpUrl(config[key])) {
      problems.push(`${key} must be an http(s) URL, got "${config[key]}"`);
    }
  }

  for (const key of ["timeoutMs", "navigationTimeoutMs", "actionTimeoutMs"] as const) {
    const value = config[key];
    if (!Number.isInteger(value) || value <= 0) {
      problems.push(`${key} must be a positive integer, got ${value}`);
    }
  }

  const strategy = config.targetStrategy;
  if (!isTargetStrategy(strategy)) {
    problems.push(`targetStrategy must be one of ${TARGET_STRATEGIES.join(", ")}, got "${strategy}"`);
  } else if (config.targetIdentity === undefined) {
    // Portal room aliases are not derivable from the config
    if (strategy === "relay_channel") {
      problems.push("targetIdentity is required for relay_channel, e.g. #_mattermost_<channel>:<server>");
    }
  } else {
    const sigil = strategy === "relay_channel" ? "#" : "@";
    if (!config.targetIdentity.startsWith(sigil) || !config.targetIdentity.includes(":")) {
      problems.push(
        `targetIdentity for ${strategy} must look like ${sigil}name:server, got "${config.targetIdentity}"`
      );
    }
  }

  if (!config.messageText.trim()) {
    problems.push("messageText must not be empty");
  }

  if (!config.serverName) {
    problems.push("serverName must not be empty");
  }

  if (problems.length > 0 || !isTargetStrategy(strategy)) {
    throw new ConfigError(problems);
  }

  return { ...config, targetStrategy: strategy };
}
