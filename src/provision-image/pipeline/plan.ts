import path from "node:path";

import { CliUsageError } from "../../shared/cli-errors";
import { CONTEXT_MANIFEST_NAME, CONTEXT_SOURCE_DIR, IMAGE_MANIFEST_PATH, UNBUFFERED_ENV } from "../config";
import { renderDockerfile, renderEnvInstruction } from "../dockerfile/render";
import { findUnpinnedEntries, formatManifestEntry, type ManifestEntry } from "../manifest/parse";
import {
  formatImageReference,
  isPinnedReference,
  parseImageReference,
  type ParsedImageReference,
} from "../registry/image-reference";
import type {
  EnvPair,
  ProvisionDryRunPlan,
  ProvisionOptions,
  ProvisionPlan,
  ProvisionStep,
  UserFlavor,
} from "../types";

const USER_PATTERN = /^[a-z_][a-z0-9_-]{0,31}$/;
const ENV_KEY_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*$/;
const CONTROL_CHARACTERS = /[\u0000-\u001f\u007f]/;
const PRIVILEGED_USERS = new Set(["root", "toor"]);

export function validateUser(user: string): string {
  if (/^\d+(:\d+)?$/.test(user)) {
    throw new CliUsageError(`Numeric user '${user}' is not supported.`, [
      "Pass an account name; the provisioner creates it with a non-zero uid.",
    ]);
  }

  if (PRIVILEGED_USERS.has(user)) {
    throw new CliUsageError(`Refusing to run the image as privileged account '${user}'.`, [
      "Choose an unprivileged account name such as 'user' or 'app'.",
    ]);
  }

  if (!USER_PATTERN.test(user)) {
    throw new CliUsageError(`Invalid user name '${user}'.`, [
      "Use lowercase letters, digits, '_' or '-', starting with a letter or '_' (max 32 characters).",
    ]);
  }

  return user;
}

export function validateWorkdir(workdir: string): string {
  if (!workdir.startsWith("/")) {
    throw new CliUsageError(`Working directory must be absolute: ${workdir}`, [
      "Example: --workdir /code",
    ]);
  }

  if (workdir.split("/").some((segment) => segment === "..")) {
    throw new CliUsageError(`Working directory must not contain '..': ${workdir}`, [
      "Pass a normalized absolute path.",
    ]);
  }

  if (/\s/.test(workdir)) {
    throw new CliUsageError(`Working directory must not contain whitespace: ${workdir}`);
  }

  const normalized = path.posix.normalize(workdir);
  if (normalized === "/") {
    throw new CliUsageError("Working directory cannot be the filesystem root.", [
      "Use a dedicated directory such as /code.",
    ]);
  }

  return normalized.endsWith("/") ? normalized.slice(0, -1) : normalized;
}

export function parseEnvPairs(values: string[]): EnvPair[] {
  const pairs: EnvPair[] = [{ ...UNBUFFERED_ENV }];
  const seen = new Set<string>([UNBUFFERED_ENV.key]);

  for (const value of values) {
    const idx = value.indexOf("=");
    if (idx <= 0) {
      throw new CliUsageError(`Invalid --env '${value}'.`, ["Environment variables must be in KEY=VALUE format."]);
    }

    const key = value.slice(0, idx);
    if (!ENV_KEY_PATTERN.test(key)) {
      throw new CliUsageError(`Invalid environment variable name '${key}'.`, [
        "Names may contain letters, digits and '_', and must not start with a digit.",
      ]);
    }

    if (seen.has(key)) {
      throw new CliUsageError(`Environment variable '${key}' is set more than once.`, [
        `${UNBUFFERED_ENV.key} is always set to ${UNBUFFERED_ENV.value}.`,
      ]);
    }

    if (CONTROL_CHARACTERS.test(value)) {
      throw new CliUsageError(`Environment variable '${key}' contains control characters.`, [
        "Pass a single-line value without tabs or other control characters.",
      ]);
    }

    seen.add(key);
    pairs.push({ key, value: value.slice(idx + 1) });
  }

  return pairs;
}

export function detectUserFlavor(image: ParsedImageReference): UserFlavor {
  const haystack = `${image.repository}:${image.tag ?? ""}`.toLowerCase();
  return haystack.includes("alpine") || haystack.includes("busybox") ? "busybox" : "debian";
}

export function userCreationCommand(user: string, flavor: UserFlavor): string {
  if (flavor === "busybox") {
    return `adduser -D ${user}`;
  }
  return `adduser --disabled-password --gecos "" ${user}`;
}

function buildSteps(
  baseImage: ParsedImageReference,
  env: EnvPair[],
  workdir: string,
  user: string,
  flavor: UserFlavor,
): ProvisionStep[] {
  return [
    {
      id: "select-base-image",
      description: "Select the pinned base runtime image and set process-wide environment.",
      instructions: [`FROM ${formatImageReference(baseImage)}`, renderEnvInstruction(env)],
    },
    {
      id: "install-dependencies",
      description: "Install every manifest dependency; any failure aborts the build.",
      instructions: [
        `COPY ${CONTEXT_MANIFEST_NAME} ${IMAGE_MANIFEST_PATH}`,
        `RUN pip install -r ${IMAGE_MANIFEST_PATH}`,
      ],
    },
    {
      id: "stage-source",
      description: `Create ${workdir} and copy the source tree into it verbatim.`,
      instructions: [`RUN mkdir -p ${workdir}`, `WORKDIR ${workdir}`, `COPY ${CONTEXT_SOURCE_DIR}/ ${workdir}`],
    },
    {
      id: "drop-privileges",
      description: `Create unprivileged account '${user}' and make it the default user.`,
      instructions: [`RUN ${userCreationCommand(user, flavor)}`, `USER ${user}`],
    },
  ];
}

export function buildProvisionPlan(options: ProvisionOptions, manifest: ManifestEntry[]): ProvisionPlan {
  const baseImage = parseImageReference(options.baseImage);
  if (!options.allowFloatingBase && !isPinnedReference(baseImage)) {
    throw new CliUsageError(`Base image '${options.baseImage}' is not pinned.`, [
      "Add a version tag or digest, e.g. python:3.7-alpine.",
      "Pass --allow-floating-base to build from a moving tag anyway.",
    ]);
  }

  if (options.requirePinned) {
    const unpinned = findUnpinnedEntries(manifest);
    if (unpinned.length > 0) {
      throw new CliUsageError(
        `${unpinned.length} manifest ${unpinned.length === 1 ? "entry is" : "entries are"} not pinned.`,
        [
          ...unpinned.map((entry) => `line ${entry.line}: ${formatManifestEntry(entry)}`),
          "Pin each package with ==, or drop --require-pinned.",
        ],
      );
    }
  }

  const user = validateUser(options.user);
  const workdir = validateWorkdir(options.workdir);
  const env = parseEnvPairs(options.env);
  const userFlavor = options.userFlavor ?? detectUserFlavor(baseImage);

  return {
    baseImage,
    manifest,
    sourcePath: options.sourcePath,
    workdir,
    user,
    userFlavor,
    env,
    tag: options.tag,
    platform: options.platform,
    steps: buildSteps(baseImage, env, workdir, user, userFlavor),
  };
}

export function buildProvisionDryRunPlan(plan: ProvisionPlan): ProvisionDryRunPlan {
  return {
    command: "provision-image",
    dryRun: true,
    tag: plan.tag,
    baseImage: formatImageReference(plan.baseImage),
    platform: plan.platform,
    manifest: plan.manifest.map(formatManifestEntry),
    unpinned: findUnpinnedEntries(plan.manifest).map(formatManifestEntry),
    steps: plan.steps.map((step) => ({
      id: step.id,
      description: step.description,
      instructions: [...step.instructions],
    })),
    dockerfile: renderDockerfile(plan),
  };
}
