/**
 * Logging utilities for scenario progress
 */

import { configure, getConsoleSink, type LogLevel } from "@logtape/logtape";
import type { ScenarioStep } from "../types/scenario";

type Level = "info" | "warn" | "error";

function timestamp(): string {
  return new Date().toISOString().split("T")[1]?.slice(0, 8) ?? "";
}

function write(line: string, level: Level) {
  switch (level) {
    case "error":
      console.error(line);
      break;
    case "warn":
      console.warn(line);
      break;
    default:
      console.log(line);
  }
}

export function logGlobal(message: string, level: Level = "info") {
  write(`${timestamp()} [SMOKE] ${message}`, level);
}

export function logStep(step: ScenarioStep, message: string, level: Level = "info") {
  write(`${timestamp()} [${step}] ${message}`, level);
}

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warning", "error", "fatal"];

export function toLogLevel(value: string): LogLevel {
  if (value === "warn") return "warning";
  return LOG_LEVELS.find((level) => level === value) ?? "info";
}

/**
 * Route library loggers to the console. Call once from an entry point.
 */
export async function configureLogging(level: string): Promise<void> {
  await configure({
    sinks: { console: getConsoleSink() },
    filters: {},
    loggers: [
      { category: ["logtape", "meta"], lowestLevel: "warning", sinks: ["console"] },
      { category: ["bridge-smoke"], lowestLevel: toLogLevel(level), sinks: ["console"] },
    ],
  });
}
