import path from "node:path";
import { describe, expect, it } from "vitest";

import { parseProvisionArgs } from "../src/provision-image/cli/args";
import { CliHelpRequested } from "../src/shared/cli-errors";

const REQUIRED = ["--manifest", "./requirements.txt", "--source", "./code", "--tag", "recipe-api:dev"];

describe("parseProvisionArgs", () => {
  it("parses required options with defaults", () => {
    const parsed = parseProvisionArgs(REQUIRED, {});

    expect(parsed.manifestPath).toBe(path.resolve("./requirements.txt"));
    expect(parsed.sourcePath).toBe(path.resolve("./code"));
    expect(parsed.tag).toBe("recipe-api:dev");
    expect(parsed.baseImage).toBe("python:3.7-alpine");
    expect(parsed.workdir).toBe("/code");
    expect(parsed.user).toBe("user");
    expect(parsed.env).toEqual([]);
    expect(parsed.platform).toBeUndefined();
    expect(parsed.verify).toBe(true);
    expect(parsed.dryRun).toBe(false);
    expect(parsed.allowFloatingBase).toBe(false);
    expect(parsed.requirePinned).toBe(false);
  });

  it("takes the default base image from the environment", () => {
    const parsed = parseProvisionArgs(REQUIRED, { PROVISION_BASE_IMAGE: "python:3.11-slim" });
    expect(parsed.baseImage).toBe("python:3.11-slim");
  });

  it("supports inline values, repeatable env and boolean flags", () => {
    const parsed = parseProvisionArgs(
      [
        ...REQUIRED,
        "--base-image=python:3.11-slim",
        "--user",
        "app",
        "--workdir=/srv/app",
        "--env",
        "DJANGO_SETTINGS_MODULE=recipe.settings",
        "--env=LANG=C.UTF-8",
        "--platform",
        "LINUX/ARM64",
        "--no-verify",
        "--require-pinned",
        "--allow-floating-base",
        "--dry-run",
      ],
      {},
    );

    expect(parsed.baseImage).toBe("python:3.11-slim");
    expect(parsed.user).toBe("app");
    expect(parsed.workdir).toBe("/srv/app");
    expect(parsed.env).toEqual(["DJANGO_SETTINGS_MODULE=recipe.settings", "LANG=C.UTF-8"]);
    expect(parsed.platform).toBe("linux/arm64");
    expect(parsed.verify).toBe(false);
    expect(parsed.requirePinned).toBe(true);
    expect(parsed.allowFloatingBase).toBe(true);
    expect(parsed.dryRun).toBe(true);
  });

  it("requires --manifest", () => {
    expect(() => parseProvisionArgs(["--source", ".", "--tag", "x:1"], {})).toThrow(
      /Missing required --manifest option\./,
    );
  });

  it("requires --tag", () => {
    expect(() => parseProvisionArgs(["--manifest", "r.txt", "--source", "."], {})).toThrow(
      /Missing required --tag option\./,
    );
  });

  it("rejects a repeated single-valued option", () => {
    expect(() => parseProvisionArgs([...REQUIRED, "--tag", "other:1"], {})).toThrow(
      "--tag was provided more than once.",
    );
  });

  it("rejects a value on a boolean flag", () => {
    expect(() => parseProvisionArgs([...REQUIRED, "--dry-run=yes"], {})).toThrow(
      "--dry-run does not accept a value.",
    );
  });

  it("rejects a missing option value", () => {
    expect(() => parseProvisionArgs(["--manifest", "--source", "."], {})).toThrow("--manifest requires a value.");
  });

  it("parses the user flavor override", () => {
    expect(parseProvisionArgs([...REQUIRED, "--user-flavor", "BusyBox"], {}).userFlavor).toBe("busybox");
    expect(parseProvisionArgs(REQUIRED, {}).userFlavor).toBeUndefined();
    expect(() => parseProvisionArgs([...REQUIRED, "--user-flavor=rhel"], {})).toThrow("Unsupported user flavor 'rhel'.");
  });

  it("rejects unsupported platforms", () => {
    expect(() => parseProvisionArgs([...REQUIRED, "--platform", "windows/amd64"], {})).toThrow(
      "Unsupported platform 'windows/amd64'.",
    );
  });

  it("rejects unknown options and positional arguments", () => {
    expect(() => parseProvisionArgs([...REQUIRED, "--pull"], {})).toThrow("Unknown option '--pull'.");
    expect(() => parseProvisionArgs([...REQUIRED, "extra"], {})).toThrow("Unexpected positional argument 'extra'.");
  });

  it("signals help", () => {
    expect(() => parseProvisionArgs(["-h"], {})).toThrow(CliHelpRequested);
  });
});
