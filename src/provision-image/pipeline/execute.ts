import fs from "node:fs";

import { CliUsageError, ProvisionError } from "../../shared/cli-errors";
import { assertDirectoryExists, assertFileExists, removePaths } from "../../shared/fs";
import { logEvent } from "../../shared/logger";
import { CommandStartError, spawnCommand, type CommandResult, type CommandRunner } from "../../shared/process";
import { resolveProvisionEnvConfig } from "../config";
import { stageBuildContext } from "../context/stage";
import { findUnpinnedEntries, formatManifestEntry, parseManifest } from "../manifest/parse";
import { formatImageReference } from "../registry/image-reference";
import type { ImageVerification, ProvisionOptions, ProvisionPlan, ProvisionResult } from "../types";
import { verifyImage } from "../verify/inspect";
import { attributeBuildFailure, tailLines } from "./failure";
import { buildProvisionPlan } from "./plan";

export interface ProvisionDeps {
  runner: CommandRunner;
  dockerBinary: string;
}

function defaultDeps(): ProvisionDeps {
  return {
    runner: spawnCommand,
    dockerBinary: resolveProvisionEnvConfig().dockerBinary,
  };
}

/**
 * Validates every input before anything touches the container tool: the
 * manifest must parse and the source tree must exist.
 */
export function preparePlan(options: ProvisionOptions): ProvisionPlan {
  assertFileExists(options.manifestPath, "Dependency manifest");
  assertDirectoryExists(options.sourcePath, "Application source directory");

  const manifest = parseManifest(fs.readFileSync(options.manifestPath, "utf8"), options.manifestPath);
  const plan = buildProvisionPlan(options, manifest);

  const unpinned = findUnpinnedEntries(manifest);
  if (unpinned.length > 0) {
    logEvent({
      level: "warn",
      op: "provision.preflight",
      message: "manifest has unpinned entries; installs may drift between builds",
      unpinned: unpinned.map(formatManifestEntry),
    });
  }

  logEvent({
    level: "info",
    op: "provision.preflight",
    baseImage: formatImageReference(plan.baseImage),
    packages: manifest.length,
    workdir: plan.workdir,
    user: plan.user,
  });

  return plan;
}

async function ensureDockerAvailable(deps: ProvisionDeps): Promise<void> {
  let result: CommandResult;
  try {
    result = await deps.runner(deps.dockerBinary, ["version", "--format", "{{.Server.Version}}"]);
  } catch (error) {
    if (!(error instanceof CommandStartError)) {
      throw error;
    }
    result = { code: 127, stdout: "", stderr: error.message };
  }

  if (result.code !== 0) {
    throw new CliUsageError(`Container tool '${deps.dockerBinary}' is not available.`, [
      `Command check failed: ${deps.dockerBinary} version`,
      result.stderr.trim() || result.stdout.trim() || "Command not found.",
      "Install Docker (or set PROVISION_DOCKER to a compatible CLI) and retry.",
    ]);
  }
}

function buildArgs(plan: ProvisionPlan, contextDir: string, dockerfilePath: string): string[] {
  const args = ["build", "--file", dockerfilePath, "--tag", plan.tag, "--progress=plain"];
  if (plan.platform) {
    args.push("--platform", plan.platform);
  }
  args.push(contextDir);
  return args;
}

async function removeTag(deps: ProvisionDeps, tag: string): Promise<void> {
  let result: CommandResult;
  try {
    result = await deps.runner(deps.dockerBinary, ["image", "rm", "--force", tag]);
  } catch (error) {
    if (!(error instanceof CommandStartError)) {
      throw error;
    }
    result = { code: 127, stdout: "", stderr: error.message };
  }

  if (result.code !== 0) {
    logEvent({
      level: "warn",
      op: "provision.cleanup",
      message: "failed to remove image tag",
      tag,
      stderr: result.stderr.trim(),
    });
  }
}

export async function executeProvision(
  options: ProvisionOptions,
  deps: ProvisionDeps = defaultDeps(),
): Promise<ProvisionResult> {
  const plan = preparePlan(options);
  await ensureDockerAvailable(deps);

  const staged = stageBuildContext(plan);
  logEvent({ level: "debug", op: "provision.stage", contextDir: staged.contextDir });

  try {
    logEvent({ level: "info", op: "provision.build", tag: plan.tag, steps: plan.steps.map((step) => step.id) });
    const build = await deps.runner(deps.dockerBinary, buildArgs(plan, staged.contextDir, staged.dockerfilePath), {
      env: { ...process.env, DOCKER_BUILDKIT: "1" },
      stream: true,
    });

    if (build.code !== 0) {
      const output = `${build.stdout}\n${build.stderr}`;
      const step = attributeBuildFailure(output, plan);
      throw new ProvisionError(step, `Image build failed with status ${build.code}.`, [
        ...tailLines(output, 5),
        "The build stops at the first failing step; no image was tagged.",
      ]);
    }

    let verification: ImageVerification | null = null;
    if (options.verify) {
      try {
        verification = await verifyImage(deps.runner, deps.dockerBinary, plan);
      } catch (error) {
        await removeTag(deps, plan.tag);
        throw error;
      }
      logEvent({
        level: "info",
        op: "provision.verify",
        tag: plan.tag,
        uid: verification.uid,
        installedPackages: verification.installedPackages.length,
      });
    }

    return {
      command: "provision-image",
      tag: plan.tag,
      baseImage: formatImageReference(plan.baseImage),
      platform: plan.platform,
      manifest: plan.manifest.map(formatManifestEntry),
      unpinned: findUnpinnedEntries(plan.manifest).map(formatManifestEntry),
      workdir: plan.workdir,
      user: plan.user,
      env: plan.env.map((pair) => `${pair.key}=${pair.value}`),
      steps: plan.steps.map((step) => step.id),
      verification,
    };
  } finally {
    const leftovers = removePaths([staged.contextDir]);
    if (leftovers.length > 0) {
      logEvent({ level: "warn", op: "provision.cleanup", message: "failed to remove build context", paths: leftovers });
    }
  }
}
