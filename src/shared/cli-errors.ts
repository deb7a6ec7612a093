export class CliUsageError extends Error {
  constructor(
    message: string,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "CliUsageError";
  }
}

export class CliHelpRequested extends Error {
  constructor() {
    super("help requested");
    this.name = "CliHelpRequested";
  }
}

export type ProvisionFailureStep =
  | "preflight"
  | "select-base-image"
  | "install-dependencies"
  | "stage-source"
  | "drop-privileges"
  | "build"
  | "verify-image";

/**
 * Fatal build failure. The provisioning sequence stops at `step` and no
 * image is left tagged.
 */
export class ProvisionError extends Error {
  constructor(
    public readonly step: ProvisionFailureStep,
    message: string,
    public readonly hints: string[] = []
  ) {
    super(message);
    this.name = "ProvisionError";
  }
}
