import fs from "node:fs";
import path from "node:path";

import { ProvisionError } from "../../shared/cli-errors";
import { createTempDir } from "../../shared/fs";
import { CONTEXT_MANIFEST_NAME, CONTEXT_SOURCE_DIR } from "../config";
import { renderDockerfile } from "../dockerfile/render";
import { formatManifest } from "../manifest/parse";
import type { ProvisionPlan } from "../types";

export interface StagedBuildContext {
  contextDir: string;
  dockerfilePath: string;
  manifestPath: string;
  sourceDir: string;
}

export function stageBuildContext(plan: ProvisionPlan, tempPrefix = "provision-image-"): StagedBuildContext {
  const contextDir = createTempDir(tempPrefix);
  const dockerfilePath = path.join(contextDir, "Dockerfile");
  const manifestPath = path.join(contextDir, CONTEXT_MANIFEST_NAME);
  const sourceDir = path.join(contextDir, CONTEXT_SOURCE_DIR);

  try {
    fs.writeFileSync(dockerfilePath, renderDockerfile(plan));
    fs.writeFileSync(manifestPath, formatManifest(plan.manifest));
    fs.cpSync(plan.sourcePath, sourceDir, { recursive: true, verbatimSymlinks: true });
  } catch (error) {
    fs.rmSync(contextDir, { recursive: true, force: true });
    throw new ProvisionError("stage-source", `Failed to stage build context from ${plan.sourcePath}.`, [
      error instanceof Error ? error.message : String(error),
      "Check that the source directory is readable.",
    ]);
  }

  return { contextDir, dockerfilePath, manifestPath, sourceDir };
}
