#!/usr/bin/env tsx

/**
 * Mattermost <-> Matrix Bridge Smoke Test CLI
 * Registers a Matrix user in Element, messages Mattermost, and waits for delivery
 */

import { ConfigError, LOG_LEVEL, resolveScenarioConfig } from "../src/config";
import { parseCliArgs, USAGE } from "../src/cli";
import { runScenario } from "../src/automation/scenario/runner";
import { exportRunReport } from "../src/automation/scenario/report";
import { configureLogging } from "../src/utils/logger";
import type { ScenarioConfig } from "../src/types/scenario";

async function main(): Promise<number> {
  const command = parseCliArgs(process.argv.slice(2));

  if (command.kind === "help") {
    console.log(USAGE);
    return 0;
  }
  if (command.kind === "error") {
    console.error(`Error: ${command.message}`);
    console.log(USAGE);
    return 1;
  }

  await configureLogging(LOG_LEVEL);

  let config: ScenarioConfig;
  try {
    config = resolveScenarioConfig(command.overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(error.message);
      return 1;
    }
    throw error;
  }

  console.log(`\n🚀 Bridge Smoke Test`);
  console.log(`   Mattermost: ${config.adminUrl}`);
  console.log(`   Element: ${config.clientUrl} → ${config.homeserverUrl}`);
  console.log(`   Target strategy: ${config.targetStrategy}`);
  console.log(`   Verify timeout: ${config.timeoutMs}ms\n`);

  const startTime = Date.now();
  const run = await runScenario(config);
  const duration = ((Date.now() - startTime) / 1000).toFixed(1);

  if (command.reportPath) {
    await exportRunReport(run, command.reportPath);
    console.log(`📝 Report: ${command.reportPath}`);
  }

  console.log(`\n📊 Summary:`);
  for (const record of run.steps) {
    const mark = record.status === "completed" ? "✓" : "✗";
    console.log(`   ${mark} ${record.step}${record.detail ? `: ${record.detail}` : ""}`);
  }
  if (run.phase === "passed") {
    console.log(`\n✅ Passed in ${duration}s`);
    return 0;
  }
  console.log(`\n❌ Failed after ${duration}s: ${run.error ?? "unknown error"}`);
  return 1;
}

main().then(
  (code) => process.exit(code),
  (error) => {
    console.error(`\n❌ Smoke test crashed:`, error);
    process.exit(1);
  }
);
