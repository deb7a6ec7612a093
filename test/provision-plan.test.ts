import { describe, expect, it } from "vitest";

import { renderDockerfile } from "../src/provision-image/dockerfile/render";
import { parseManifest } from "../src/provision-image/manifest/parse";
import {
  buildProvisionDryRunPlan,
  buildProvisionPlan,
  detectUserFlavor,
  parseEnvPairs,
  validateUser,
  validateWorkdir,
} from "../src/provision-image/pipeline/plan";
import { parseImageReference } from "../src/provision-image/registry/image-reference";
import type { ProvisionOptions } from "../src/provision-image/types";

function options(overrides: Partial<ProvisionOptions> = {}): ProvisionOptions {
  return {
    manifestPath: "/build/requirements.txt",
    sourcePath: "/build/code",
    tag: "recipe-api:dev",
    baseImage: "python:3.7-alpine",
    workdir: "/code",
    user: "user",
    env: [],
    allowFloatingBase: false,
    requirePinned: false,
    verify: true,
    dryRun: false,
    ...overrides,
  };
}

const FLASK = parseManifest("flask==1.1.1\n", "requirements.txt");

describe("buildProvisionPlan", () => {
  it("orders the four provisioning steps", () => {
    const plan = buildProvisionPlan(options(), FLASK);

    expect(plan.steps.map((step) => step.id)).toEqual([
      "select-base-image",
      "install-dependencies",
      "stage-source",
      "drop-privileges",
    ]);
    expect(plan.userFlavor).toBe("busybox");
    expect(plan.env).toEqual([{ key: "PYTHONUNBUFFERED", value: "1" }]);
  });

  it("renders the provisioning Dockerfile", () => {
    const dockerfile = renderDockerfile(buildProvisionPlan(options(), FLASK));

    expect(dockerfile).toBe(
      [
        "FROM python:3.7-alpine",
        "ENV PYTHONUNBUFFERED=1",
        "",
        "COPY requirements.txt /requirements.txt",
        "RUN pip install -r /requirements.txt",
        "",
        "RUN mkdir -p /code",
        "WORKDIR /code",
        "COPY code/ /code",
        "",
        "RUN adduser -D user",
        "USER user",
        "",
      ].join("\n"),
    );
  });

  it("renders the same Dockerfile for the same inputs", () => {
    const first = renderDockerfile(buildProvisionPlan(options(), FLASK));
    const second = renderDockerfile(buildProvisionPlan(options(), parseManifest("flask==1.1.1\n", "requirements.txt")));
    expect(second).toBe(first);
  });

  it("copies the source before dropping privileges", () => {
    const lines = renderDockerfile(buildProvisionPlan(options(), FLASK)).split("\n");
    expect(lines.indexOf("COPY code/ /code")).toBeLessThan(lines.indexOf("RUN adduser -D user"));
    expect(lines.indexOf("RUN pip install -r /requirements.txt")).toBeLessThan(lines.indexOf("RUN mkdir -p /code"));
    expect(lines.filter((line) => line.length > 0).at(-1)).toBe("USER user");
  });

  it("uses debian account creation and quotes env values", () => {
    const plan = buildProvisionPlan(
      options({ baseImage: "python:3.11-slim", user: "app", env: ["GREETING=hello world"] }),
      FLASK,
    );

    expect(plan.steps[0].instructions[1]).toBe('ENV PYTHONUNBUFFERED=1 GREETING="hello world"');
    expect(plan.steps[3].instructions).toEqual(['RUN adduser --disabled-password --gecos "" app', "USER app"]);
  });

  it("escapes dollar signs, backslashes and quotes in env values", () => {
    const plan = buildProvisionPlan(
      options({ env: ["PASS=a$HOME", "WINPATH=C:\\tmp", 'QUOTE=say "hi"'] }),
      FLASK,
    );

    expect(plan.steps[0].instructions[1]).toBe(
      'ENV PYTHONUNBUFFERED=1 PASS="a\\$HOME" WINPATH="C:\\\\tmp" QUOTE="say \\"hi\\""',
    );
    expect(plan.env[1]).toEqual({ key: "PASS", value: "a$HOME" });
  });

  it("takes the user flavor override for digest-only bases", () => {
    const digestOnly = `python@sha256:${"ab".repeat(32)}`;

    expect(buildProvisionPlan(options({ baseImage: digestOnly }), FLASK).userFlavor).toBe("debian");

    const plan = buildProvisionPlan(options({ baseImage: digestOnly, userFlavor: "busybox" }), FLASK);
    expect(plan.userFlavor).toBe("busybox");
    expect(plan.steps[3].instructions).toEqual(["RUN adduser -D user", "USER user"]);
  });

  it("rejects an unpinned base image unless allowed", () => {
    expect(() => buildProvisionPlan(options({ baseImage: "python" }), FLASK)).toThrow(
      "Base image 'python' is not pinned.",
    );
    expect(buildProvisionPlan(options({ baseImage: "python", allowFloatingBase: true }), FLASK).baseImage.reference).toBe(
      "latest",
    );
  });

  it("rejects unpinned manifest entries under requirePinned", () => {
    const manifest = parseManifest("flask==1.1.1\nrequests>=2\n", "requirements.txt");
    expect(() => buildProvisionPlan(options({ requirePinned: true }), manifest)).toThrow(
      "1 manifest entry is not pinned.",
    );
  });

  it("builds a dry-run plan with the Dockerfile", () => {
    const manifest = parseManifest("flask==1.1.1\nrequests\n", "requirements.txt");
    const dryRun = buildProvisionDryRunPlan(buildProvisionPlan(options(), manifest));

    expect(dryRun.command).toBe("provision-image");
    expect(dryRun.baseImage).toBe("python:3.7-alpine");
    expect(dryRun.manifest).toEqual(["flask==1.1.1", "requests"]);
    expect(dryRun.unpinned).toEqual(["requests"]);
    expect(dryRun.steps[2].instructions).toEqual(["RUN mkdir -p /code", "WORKDIR /code", "COPY code/ /code"]);
    expect(dryRun.dockerfile.startsWith("FROM python:3.7-alpine\n")).toBe(true);
  });
});

describe("plan validation", () => {
  it("never accepts the administrative account", () => {
    expect(() => validateUser("root")).toThrow("Refusing to run the image as privileged account 'root'.");
    expect(() => validateUser("0")).toThrow("Numeric user '0' is not supported.");
    expect(() => validateUser("0:0")).toThrow("Numeric user '0:0' is not supported.");
  });

  it("checks account name syntax", () => {
    expect(validateUser("app_user-1")).toBe("app_user-1");
    expect(() => validateUser("App")).toThrow("Invalid user name 'App'.");
    expect(() => validateUser("a".repeat(33))).toThrow(/Invalid user name/);
  });

  it("normalizes and checks working directories", () => {
    expect(validateWorkdir("/code/")).toBe("/code");
    expect(validateWorkdir("/srv//app")).toBe("/srv/app");
    expect(() => validateWorkdir("code")).toThrow("Working directory must be absolute: code");
    expect(() => validateWorkdir("/srv/../etc")).toThrow("Working directory must not contain '..': /srv/../etc");
    expect(() => validateWorkdir("/")).toThrow("Working directory cannot be the filesystem root.");
  });

  it("always starts env with PYTHONUNBUFFERED", () => {
    expect(parseEnvPairs(["A=1", "B="])).toEqual([
      { key: "PYTHONUNBUFFERED", value: "1" },
      { key: "A", value: "1" },
      { key: "B", value: "" },
    ]);
    expect(() => parseEnvPairs(["PYTHONUNBUFFERED=0"])).toThrow(
      "Environment variable 'PYTHONUNBUFFERED' is set more than once.",
    );
    expect(() => parseEnvPairs(["1BAD=x"])).toThrow("Invalid environment variable name '1BAD'.");
    expect(() => parseEnvPairs(["NOVALUE"])).toThrow("Invalid --env 'NOVALUE'.");
    expect(() => parseEnvPairs(["MULTI=x\ny"])).toThrow("Environment variable 'MULTI' contains control characters.");
  });

  it("detects the user flavor from the base image", () => {
    expect(detectUserFlavor(parseImageReference("python:3.7-alpine"))).toBe("busybox");
    expect(detectUserFlavor(parseImageReference("alpine:3.19"))).toBe("busybox");
    expect(detectUserFlavor(parseImageReference("python:3.11-slim"))).toBe("debian");
  });
});
