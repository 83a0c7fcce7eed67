/**
 * Scenario run record and its phase transitions
 *
 * pending → admin_setup → client_setup → message_send → verify → passed
 * Any non-terminal phase may move to failed.
 */

import { generateUUID } from "../../utils/generators";
import type { ScenarioPhase, ScenarioRun, ScenarioStep, StepRecord } from "../../types/scenario";
import { SCENARIO_STEPS } from "../../types/scenario";

export class ScenarioStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ScenarioStateError";
  }
}

export function createRun(now: Date = new Date()): ScenarioRun {
  return {
    id: generateUUID(),
    phase: "pending",
    steps: [],
    startedAt: now,
    updatedAt: now,
  };
}

export function isTerminal(phase: ScenarioPhase): boolean {
  return phase === "passed" || phase === "failed";
}

function findStep(run: ScenarioRun, step: ScenarioStep): StepRecord | undefined {
  return run.steps.find((s) => s.step === step);
}

/**
 * The step allowed to start next, if any
 */
export function nextStep(run: ScenarioRun): ScenarioStep | undefined {
  if (run.phase === "pending") return SCENARIO_STEPS[0];
  if (isTerminal(run.phase)) return undefined;

  const index = SCENARIO_STEPS.findIndex((s) => s === run.phase);
  const current = SCENARIO_STEPS[index];
  if (!current || findStep(run, current)?.status !== "completed") return undefined;
  return SCENARIO_STEPS[index + 1];
}

export function startStep(run: ScenarioRun, step: ScenarioStep, now: Date = new Date()): ScenarioRun {
  if (nextStep(run) !== step) {
    throw new ScenarioStateError(`Cannot start ${step} while run is in ${run.phase}`);
  }
  return {
    ...run,
    phase: step,
    steps: [...run.steps, { step, status: "running", startedAt: now }],
    updatedAt: now,
  };
}

export function completeStep(
  run: ScenarioRun,
  step: ScenarioStep,
  detail?: string,
  now: Date = new Date()
): ScenarioRun {
  if (run.phase !== step || findStep(run, step)?.status !== "running") {
    throw new ScenarioStateError(`Cannot complete ${step} while run is in ${run.phase}`);
  }
  return {
    ...run,
    steps: run.steps.map((s): StepRecord =>
      s.step === step ? { ...s, status: "completed", finishedAt: now, detail } : s
    ),
    updatedAt: now,
  };
}

export function markRunPassed(run: ScenarioRun, now: Date = new Date()): ScenarioRun {
  if (run.phase !== "verify" || findStep(run, "verify")?.status !== "completed") {
    throw new ScenarioStateError(`Cannot pass run while it is in ${run.phase}`);
  }
  return { ...run, phase: "passed", updatedAt: now };
}

export function markRunFailed(run: ScenarioRun, error: string, now: Date = new Date()): ScenarioRun {
  if (isTerminal(run.phase)) {
    throw new ScenarioStateError(`Cannot fail run that already ${run.phase}`);
  }
  return {
    ...run,
    phase: "failed",
    error,
    steps: run.steps.map((s): StepRecord =>
      s.status === "running" ? { ...s, status: "error", finishedAt: now, error } : s
    ),
    updatedAt: now,
  };
}

export function updateRun(
  run: ScenarioRun,
  updates: Partial<Pick<ScenarioRun, "clientUsername" | "target">>,
  now: Date = new Date()
): ScenarioRun {
  return { ...run, ...updates, updatedAt: now };
}
