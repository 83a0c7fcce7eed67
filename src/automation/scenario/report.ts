import { mkdir, writeFile } from "fs/promises";
import { dirname } from "path";
import type { ScenarioRun } from "../../types/scenario";

export function serializeRun(run: ScenarioRun): string {
  return JSON.stringify(run, null, 2);
}

/**
 * Write the run record as JSON, creating the parent directory
 */
export async function exportRunReport(run: ScenarioRun, filePath: string): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, serializeRun(run) + "\n");
}
