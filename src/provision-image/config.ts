export const DEFAULT_BASE_IMAGE = "python:3.7-alpine";
export const DEFAULT_WORKDIR = "/code";
export const DEFAULT_USER = "user";
export const UNBUFFERED_ENV = { key: "PYTHONUNBUFFERED", value: "1" } as const;

// Build context layout.
export const CONTEXT_MANIFEST_NAME = "requirements.txt";
export const CONTEXT_SOURCE_DIR = "code";
export const IMAGE_MANIFEST_PATH = "/requirements.txt";

export interface ProvisionEnvConfig {
  dockerBinary: string;
  defaultBaseImage: string;
}

export function resolveProvisionEnvConfig(env: NodeJS.ProcessEnv = process.env): ProvisionEnvConfig {
  return {
    dockerBinary: env.PROVISION_DOCKER?.trim() || "docker",
    defaultBaseImage: env.PROVISION_BASE_IMAGE?.trim() || DEFAULT_BASE_IMAGE,
  };
}
