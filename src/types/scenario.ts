/**
 * Bridge Smoke Scenario Types
 */

export type TargetStrategy = "direct_message" | "relay_channel";

export const TARGET_STRATEGIES: readonly TargetStrategy[] = ["direct_message", "relay_channel"];

export interface AdminAccount {
  email: string;
  username: string;
  password: string;
}

export interface TeamInfo {
  displayName: string;
  slug: string;
}

export interface ClientAccount {
  username: string;
  password: string;
}

export interface ScenarioConfig {
  adminUrl: string;
  clientUrl: string;
  homeserverUrl: string;
  serverName: string;
  targetStrategy: TargetStrategy;
  /** Explicit chat target; required for relay_channel, derived from the admin for direct_message */
  targetIdentity?: string;
  ghostPrefix: string;
  messageText: string;
  /** Verification wait */
  timeoutMs: number;
  navigationTimeoutMs: number;
  actionTimeoutMs: number;
  admin: AdminAccount;
  team: TeamInfo;
  clientPassword: string;
  usernameTag?: string;
  headless: boolean;
}

export type ScenarioStep = "admin_setup" | "client_setup" | "message_send" | "verify";

export const SCENARIO_STEPS: readonly ScenarioStep[] = [
  "admin_setup",
  "client_setup",
  "message_send",
  "verify",
];

export type ScenarioPhase = "pending" | ScenarioStep | "passed" | "failed";

export interface StepRecord {
  step: ScenarioStep;
  status: "running" | "completed" | "error";
  startedAt: Date;
  finishedAt?: Date;
  detail?: string;
  error?: string;
}

export interface ScenarioRun {
  id: string;
  phase: ScenarioPhase;
  steps: StepRecord[];
  clientUsername?: string;
  target?: ChatTarget;
  error?: string;
  startedAt: Date;
  updatedAt: Date;
}

export type AdminConsoleState = "first_run" | "initialized" | "unknown";

export interface ChatTarget {
  strategy: TargetStrategy;
  identity: string;
}
