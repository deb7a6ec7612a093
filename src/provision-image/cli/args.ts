import path from "node:path";

import { CliHelpRequested, CliUsageError } from "../../shared/cli-errors";
import { DEFAULT_USER, DEFAULT_WORKDIR, resolveProvisionEnvConfig } from "../config";
import type { ProvisionOptions, SupportedPlatform, UserFlavor } from "../types";

type RawArgs = {
  manifest?: string;
  source?: string;
  tag?: string;
  baseImage?: string;
  workdir?: string;
  user?: string;
  platform?: string;
  userFlavor?: string;
  env: string[];
  allowFloatingBase: boolean;
  requirePinned: boolean;
  verify: boolean;
  dryRun: boolean;
};

type SingleValueKey = "manifest" | "source" | "tag" | "baseImage" | "workdir" | "user" | "platform" | "userFlavor";

const SINGLE_VALUE_FLAGS: Record<string, SingleValueKey> = {
  "--manifest": "manifest",
  "--source": "source",
  "--tag": "tag",
  "--base-image": "baseImage",
  "--workdir": "workdir",
  "--user": "user",
  "--platform": "platform",
  "--user-flavor": "userFlavor",
};

const BOOLEAN_FLAGS = ["--allow-floating-base", "--require-pinned", "--no-verify", "--dry-run"] as const;
type BooleanFlag = (typeof BOOLEAN_FLAGS)[number];

function isBooleanFlag(flag: string): flag is BooleanFlag {
  return BOOLEAN_FLAGS.some((candidate) => candidate === flag);
}

function splitLongOption(token: string): { flag: string; inlineValue: string | undefined } {
  if (!token.startsWith("--")) {
    return { flag: token, inlineValue: undefined };
  }

  const equalsIndex = token.indexOf("=");
  if (equalsIndex === -1) {
    return { flag: token, inlineValue: undefined };
  }

  return {
    flag: token.slice(0, equalsIndex),
    inlineValue: token.slice(equalsIndex + 1),
  };
}

function readValue(
  argv: string[],
  index: number,
  flag: string,
  inlineValue: string | undefined
): { value: string; nextIndex: number } {
  if (inlineValue !== undefined) {
    if (inlineValue.trim().length === 0) {
      throw new CliUsageError(`${flag} cannot be empty.`, [`Provide a non-empty value for ${flag}.`]);
    }

    return { value: inlineValue, nextIndex: index };
  }

  const value = argv[index + 1];
  if (!value || value.startsWith("--")) {
    throw new CliUsageError(`${flag} requires a value.`, [`Example: ${flag} <value>`]);
  }

  return { value, nextIndex: index + 1 };
}

function setOnce(raw: RawArgs, key: SingleValueKey, value: string, flag: string): void {
  const existing = raw[key];
  if (existing !== undefined) {
    throw new CliUsageError(`${flag} was provided more than once.`, [
      `Pass ${flag} only once. Received '${existing}' and '${value}'.`,
    ]);
  }

  raw[key] = value;
}

function setFlag(raw: RawArgs, flag: BooleanFlag): void {
  switch (flag) {
    case "--allow-floating-base":
      raw.allowFloatingBase = true;
      break;
    case "--require-pinned":
      raw.requirePinned = true;
      break;
    case "--no-verify":
      raw.verify = false;
      break;
    case "--dry-run":
      raw.dryRun = true;
      break;
  }
}

export function normalizePlatform(platform: string | undefined): SupportedPlatform | undefined {
  if (!platform) {
    return undefined;
  }

  const normalized = platform.trim().toLowerCase();
  if (normalized === "linux/amd64" || normalized === "linux/arm64") {
    return normalized;
  }

  throw new CliUsageError(`Unsupported platform '${platform}'.`, [
    "Supported values are: linux/amd64, linux/arm64.",
  ]);
}

export function normalizeUserFlavor(flavor: string | undefined): UserFlavor | undefined {
  if (!flavor) {
    return undefined;
  }

  const normalized = flavor.trim().toLowerCase();
  if (normalized === "busybox" || normalized === "debian") {
    return normalized;
  }

  throw new CliUsageError(`Unsupported user flavor '${flavor}'.`, [
    "Supported values are: busybox (adduser -D), debian (adduser --disabled-password).",
  ]);
}

export function parseProvisionArgs(argv: string[], env: NodeJS.ProcessEnv = process.env): ProvisionOptions {
  const raw: RawArgs = {
    env: [],
    allowFloatingBase: false,
    requirePinned: false,
    verify: true,
    dryRun: false,
  };

  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    const { flag, inlineValue } = splitLongOption(token);

    if (flag === "--help" || flag === "-h") {
      throw new CliHelpRequested();
    }

    if (isBooleanFlag(flag)) {
      if (inlineValue !== undefined) {
        throw new CliUsageError(`${flag} does not accept a value.`, [
          `Use ${flag} as a standalone flag.`,
        ]);
      }
      setFlag(raw, flag);
      continue;
    }

    if (flag === "--env") {
      const result = readValue(argv, i, flag, inlineValue);
      raw.env.push(result.value);
      i = result.nextIndex;
      continue;
    }

    const key = Object.prototype.hasOwnProperty.call(SINGLE_VALUE_FLAGS, flag) ? SINGLE_VALUE_FLAGS[flag] : undefined;
    if (key) {
      const result = readValue(argv, i, flag, inlineValue);
      setOnce(raw, key, result.value, flag);
      i = result.nextIndex;
      continue;
    }

    if (token.startsWith("-")) {
      throw new CliUsageError(`Unknown option '${token}'.`, [
        "Run provision-image --help to see supported options.",
      ]);
    }

    throw new CliUsageError(`Unexpected positional argument '${token}'.`, [
      "Use only named options.",
    ]);
  }

  if (!raw.manifest) {
    throw new CliUsageError("Missing required --manifest option.", [
      "Point to your dependency manifest (e.g. --manifest ./requirements.txt).",
    ]);
  }

  if (!raw.source) {
    throw new CliUsageError("Missing required --source option.", [
      "Set the application source directory (e.g. --source ./code).",
    ]);
  }

  if (!raw.tag) {
    throw new CliUsageError("Missing required --tag option.", [
      "Name the image to produce (e.g. --tag recipe-api:dev).",
    ]);
  }

  return {
    manifestPath: path.resolve(raw.manifest),
    sourcePath: path.resolve(raw.source),
    tag: raw.tag,
    baseImage: raw.baseImage ?? resolveProvisionEnvConfig(env).defaultBaseImage,
    workdir: raw.workdir ?? DEFAULT_WORKDIR,
    user: raw.user ?? DEFAULT_USER,
    env: raw.env,
    platform: normalizePlatform(raw.platform),
    userFlavor: normalizeUserFlavor(raw.userFlavor),
    allowFloatingBase: raw.allowFloatingBase,
    requirePinned: raw.requirePinned,
    verify: raw.verify,
    dryRun: raw.dryRun,
  };
}
