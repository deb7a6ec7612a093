export function provisionImageUsage(): string {
  return [
    "Usage:",
    "  provision-image --manifest PATH --source PATH --tag NAME [options]",
    "",
    "Options:",
    "  --manifest PATH        Dependency manifest, one package per line (required)",
    "  --source PATH          Application source directory (required)",
    "  --tag NAME             Image tag to produce (required)",
    "  --base-image REF       Base runtime image (default: python:3.7-alpine)",
    "  --workdir PATH         Working directory inside the image (default: /code)",
    "  --user NAME            Unprivileged account to create (default: user)",
    "  --user-flavor NAME     Account creation style: busybox | debian (default: from base image name)",
    "  --env KEY=VALUE        Extra environment variable (repeatable)",
    "  --platform PLATFORM    Target platform (linux/amd64 or linux/arm64)",
    "  --allow-floating-base  Accept a base image without a pinned tag or digest",
    "  --require-pinned       Fail when a manifest entry is not pinned with ==",
    "  --no-verify            Skip post-build image verification",
    "  --dry-run              Print the provisioning plan and Dockerfile, then exit",
    "  --help, -h             Show this help",
    "",
    "Environment:",
    "  PROVISION_DOCKER       Container CLI binary (default: docker)",
    "  PROVISION_BASE_IMAGE   Default for --base-image",
    "  PROVISION_LOG_LEVEL    debug | info | warn | error (default: info)",
    "",
    "Examples:",
    "  provision-image --manifest ./requirements.txt --source ./code --tag recipe-api:dev",
    "  provision-image --manifest ./requirements.txt --source ./code --tag recipe-api:dev --require-pinned --dry-run",
  ].join("\n");
}
