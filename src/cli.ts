/**
 * Command-line parsing for the smoke runner
 */

import { isTargetStrategy, type ScenarioOverrides } from "./config";

export const USAGE = `
Mattermost <-> Matrix Bridge Smoke Test

Usage:
  bridge-smoke [options]
  npm start -- [options]

Options:
  --admin-url <url>          Mattermost web app (default: $MATTERMOST_URL or http://localhost:8065)
  --client-url <url>         Element web client (default: $ELEMENT_URL or http://localhost:8080)
  --homeserver-url <url>     Synapse the client registers on (default: $SYNAPSE_URL or http://localhost:8008)
  --server-name <name>       Matrix server name used in derived identities (default: localhost)
  --target-strategy <name>   direct_message or relay_channel (default: direct_message)
  --target <identity>        Explicit @user:server or #alias:server to message (required for relay_channel)
  --timeout <ms>             How long to wait for the message in Mattermost (default: 30000)
  --message <text>           Message to send (default: "Hello from Matrix!")
  --tag <suffix>             Appended to the generated Matrix username
  --headed                   Show the browser window
  --report <file>            Write the run record as JSON
  --help, -h                 Show this help

Environment:
  CHROME_EXECUTABLE_PATH     Chromium or Chrome binary to drive (required)
  LOG_LEVEL                  debug, info, warning, error (default: info)

Examples:
  bridge-smoke
  bridge-smoke --target-strategy relay_channel --target '#_mattermost_town-square:localhost' --report output/smoke.json
  bridge-smoke --target @mattermost_alice:example.org --timeout 60000
`;

export type CliCommand =
  | { kind: "help" }
  | { kind: "run"; overrides: ScenarioOverrides; reportPath?: string }
  | { kind: "error"; message: string };

const VALUE_FLAGS = [
  "--admin-url",
  "--client-url",
  "--homeserver-url",
  "--server-name",
  "--target-strategy",
  "--target",
  "--timeout",
  "--message",
  "--tag",
  "--report",
] as const;

type ValueFlag = (typeof VALUE_FLAGS)[number];

function isValueFlag(arg: string): arg is ValueFlag {
  return VALUE_FLAGS.some((flag) => flag === arg);
}

export function parseCliArgs(args: string[]): CliCommand {
  if (args.includes("--help") || args.includes("-h")) {
    return { kind: "help" };
  }

  const values = new Map<ValueFlag, string>();
  const overrides: ScenarioOverrides = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? "";
    if (arg === "--headed") {
      overrides.headless = false;
      continue;
    }
    if (!isValueFlag(arg)) {
      return { kind: "error", message: `Unknown argument "${arg}"` };
    }
    const value = args[i + 1];
    if (value === undefined || value.startsWith("--")) {
      return { kind: "error", message: `Missing value for ${arg}` };
    }
    values.set(arg, value);
    i++;
  }

  const adminUrl = values.get("--admin-url");
  if (adminUrl) overrides.adminUrl = adminUrl;
  const clientUrl = values.get("--client-url");
  if (clientUrl) overrides.clientUrl = clientUrl;
  const homeserverUrl = values.get("--homeserver-url");
  if (homeserverUrl) overrides.homeserverUrl = homeserverUrl;
  const serverName = values.get("--server-name");
  if (serverName) overrides.serverName = serverName;
  const target = values.get("--target");
  if (target) overrides.targetIdentity = target;
  const message = values.get("--message");
  if (message) overrides.messageText = message;
  const tag = values.get("--tag");
  if (tag) overrides.usernameTag = tag;

  const strategy = values.get("--target-strategy");
  if (strategy !== undefined) {
    if (!isTargetStrategy(strategy)) {
      return {
        kind: "error",
        message: `Invalid target strategy "${strategy}". Must be "direct_message" or "relay_channel"`,
      };
    }
    overrides.targetStrategy = strategy;
  }

  const timeout = values.get("--timeout");
  if (timeout !== undefined) {
    const timeoutMs = Number(timeout);
    if (!Number.isInteger(timeoutMs) || timeoutMs < 1) {
      return { kind: "error", message: `Timeout must be a positive number of milliseconds, got "${timeout}"` };
    }
    overrides.timeoutMs = timeoutMs;
  }

  return { kind: "run", overrides, reportPath: values.get("--report") };
}
