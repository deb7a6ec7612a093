import { ProvisionError } from "../../shared/cli-errors";
import type { CommandRunner } from "../../shared/process";
import { normalizePackageName } from "../manifest/parse";
import type { ImageVerification, InstalledPackage, ProvisionPlan } from "../types";

interface ImageConfig {
  user: string;
  workdir: string;
  env: string[];
}

const PRIVILEGED_IDENTITIES = new Set(["", "root", "0", "0:0", "root:root"]);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function verificationFailure(message: string, hints: string[]): ProvisionError {
  return new ProvisionError("verify-image", message, hints);
}

export function parseImageConfig(stdout: string): ImageConfig {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw verificationFailure("Image inspect output is not valid JSON.", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!isRecord(parsed)) {
    throw verificationFailure("Image inspect output has no config object.", []);
  }

  const env = Array.isArray(parsed.Env) ? parsed.Env.filter((item): item is string => typeof item === "string") : [];

  return {
    user: typeof parsed.User === "string" ? parsed.User : "",
    workdir: typeof parsed.WorkingDir === "string" ? parsed.WorkingDir : "",
    env,
  };
}

export function parsePipList(stdout: string): InstalledPackage[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw verificationFailure("pip list output is not valid JSON.", [
      error instanceof Error ? error.message : String(error),
    ]);
  }

  if (!Array.isArray(parsed)) {
    throw verificationFailure("pip list output is not a JSON array.", []);
  }

  const packages: InstalledPackage[] = [];
  for (const item of parsed) {
    if (isRecord(item) && typeof item.name === "string" && typeof item.version === "string") {
      packages.push({
        name: item.name,
        normalizedName: normalizePackageName(item.name),
        version: item.version,
      });
    }
  }

  packages.sort((a, b) => {
    if (a.normalizedName === b.normalizedName) {
      return 0;
    }
    return a.normalizedName < b.normalizedName ? -1 : 1;
  });
  return packages;
}

export function checkImageConfig(config: ImageConfig, plan: ProvisionPlan): void {
  if (PRIVILEGED_IDENTITIES.has(config.user)) {
    throw verificationFailure(`Image default user is privileged ('${config.user || "root"}').`, [
      "The image must end with a USER instruction naming the created account.",
    ]);
  }

  if (config.user !== plan.user) {
    throw verificationFailure(`Image default user is '${config.user}', expected '${plan.user}'.`, []);
  }

  if (config.workdir !== plan.workdir) {
    throw verificationFailure(`Image working directory is '${config.workdir}', expected '${plan.workdir}'.`, []);
  }

  for (const pair of plan.env) {
    const expected = `${pair.key}=${pair.value}`;
    if (!config.env.includes(expected)) {
      throw verificationFailure(`Image environment is missing ${expected}.`, []);
    }
  }
}

export function checkInstalledPackages(installed: InstalledPackage[], plan: ProvisionPlan): void {
  const names = new Set(installed.map((pkg) => pkg.normalizedName));
  // Entries guarded by an environment marker may legitimately be skipped.
  const missing = plan.manifest
    .filter((entry) => entry.marker === undefined && !names.has(entry.normalizedName))
    .map((entry) => entry.name);

  if (missing.length > 0) {
    throw verificationFailure(`Manifest packages are missing from the image: ${missing.join(", ")}.`, [
      "Check the pip install output above.",
    ]);
  }
}

async function runInImage(
  runner: CommandRunner,
  docker: string,
  tag: string,
  entrypoint: string,
  args: string[],
): Promise<string> {
  const result = await runner(docker, ["run", "--rm", "--entrypoint", entrypoint, tag, ...args]);
  if (result.code !== 0) {
    throw verificationFailure(`'${entrypoint} ${args.join(" ")}' failed inside ${tag}.`, [
      result.stderr.trim() || `Command exited with status ${result.code}.`,
    ]);
  }
  return result.stdout;
}

export async function verifyImage(
  runner: CommandRunner,
  docker: string,
  plan: ProvisionPlan,
): Promise<ImageVerification> {
  const inspect = await runner(docker, ["image", "inspect", "--format", "{{json .Config}}", plan.tag]);
  if (inspect.code !== 0) {
    throw verificationFailure(`Could not inspect image ${plan.tag}.`, [
      inspect.stderr.trim() || `Command exited with status ${inspect.code}.`,
    ]);
  }

  const config = parseImageConfig(inspect.stdout);
  checkImageConfig(config, plan);

  const uidText = (await runInImage(runner, docker, plan.tag, "id", ["-u"])).trim();
  const uid = Number(uidText);
  if (!/^\d+$/.test(uidText) || uid === 0) {
    throw verificationFailure(`Processes in ${plan.tag} run with uid '${uidText}'.`, [
      "The default identity must not be the administrative account.",
    ]);
  }

  const installedPackages = parsePipList(
    await runInImage(runner, docker, plan.tag, "python", ["-m", "pip", "list", "--format=json"]),
  );
  checkInstalledPackages(installedPackages, plan);

  return {
    user: config.user,
    uid,
    workdir: config.workdir,
    env: config.env,
    installedPackages,
  };
}
