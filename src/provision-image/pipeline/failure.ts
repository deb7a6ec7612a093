import type { ProvisionFailureStep } from "../../shared/cli-errors";
import type { ProvisionPlan } from "../types";

const BASE_IMAGE_FAILURES = [
  /failed to resolve source metadata/i,
  /pull access denied/i,
  /manifest unknown/i,
  /not found: manifest/i,
  /no match for platform in manifest/i,
];

// BuildKit reports missing COPY sources as `"/code": not found`.
const COPY_SOURCE_MISSING = /failed to (?:compute cache key|calculate checksum)[^\n]*not found/i;

function runCommandOf(instruction: string): string | null {
  return instruction.startsWith("RUN ") ? instruction.slice("RUN ".length) : null;
}

/**
 * Maps a failed container build log onto the provisioning step whose
 * instruction broke. Returns "build" when the log names none of them.
 */
export function attributeBuildFailure(output: string, plan: ProvisionPlan): ProvisionFailureStep {
  if (BASE_IMAGE_FAILURES.some((pattern) => pattern.test(output))) {
    return "select-base-image";
  }

  for (const step of plan.steps) {
    for (const instruction of step.instructions) {
      const command = runCommandOf(instruction);
      if (command && output.includes(`process "/bin/sh -c ${command}" did not complete`)) {
        return step.id;
      }
    }
  }

  if (COPY_SOURCE_MISSING.test(output)) {
    return "stage-source";
  }

  return "build";
}

export function tailLines(output: string, count: number): string[] {
  return output
    .split(/\r?\n/)
    .map((line) => line.trimEnd())
    .filter((line) => line.length > 0)
    .slice(-count);
}
