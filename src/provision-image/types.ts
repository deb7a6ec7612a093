import type { ManifestEntry } from "./manifest/parse";
import type { ParsedImageReference } from "./registry/image-reference";

export type SupportedPlatform = "linux/amd64" | "linux/arm64";

export type ProvisionStepId = "select-base-image" | "install-dependencies" | "stage-source" | "drop-privileges";

// Which account-creation command the base image ships.
export type UserFlavor = "busybox" | "debian";

export interface ProvisionOptions {
  manifestPath: string;
  sourcePath: string;
  tag: string;
  baseImage: string;
  workdir: string;
  user: string;
  env: string[];
  platform?: SupportedPlatform;
  // Overrides the flavor guessed from the base image name.
  userFlavor?: UserFlavor;
  allowFloatingBase: boolean;
  requirePinned: boolean;
  verify: boolean;
  dryRun: boolean;
}

export interface EnvPair {
  key: string;
  value: string;
}

export interface ProvisionStep {
  id: ProvisionStepId;
  description: string;
  instructions: string[];
}

export interface ProvisionPlan {
  baseImage: ParsedImageReference;
  manifest: ManifestEntry[];
  sourcePath: string;
  workdir: string;
  user: string;
  userFlavor: UserFlavor;
  env: EnvPair[];
  tag: string;
  platform?: SupportedPlatform;
  steps: ProvisionStep[];
}

export interface InstalledPackage {
  name: string;
  normalizedName: string;
  version: string;
}

export interface ImageVerification {
  user: string;
  uid: number;
  workdir: string;
  env: string[];
  installedPackages: InstalledPackage[];
}

export interface ProvisionDryRunPlan {
  command: "provision-image";
  dryRun: true;
  tag: string;
  baseImage: string;
  platform?: SupportedPlatform;
  manifest: string[];
  unpinned: string[];
  steps: Array<{
    id: ProvisionStepId;
    description: string;
    instructions: string[];
  }>;
  dockerfile: string;
}

export interface ProvisionResult {
  command: "provision-image";
  tag: string;
  baseImage: string;
  platform?: SupportedPlatform;
  manifest: string[];
  unpinned: string[];
  workdir: string;
  user: string;
  env: string[];
  steps: ProvisionStepId[];
  verification: ImageVerification | null;
}
