import { CliUsageError } from "../../shared/cli-errors";

export interface ParsedImageReference {
  original: string;
  registry: string;
  repository: string;
  reference: string;
  tag?: string;
  digest?: string;
}

const DEFAULT_REGISTRY = "docker.io";
const DEFAULT_TAG = "latest";
const DIGEST_PATTERN = /^sha256:[a-f0-9]{64}$/;

export function parseImageReference(input: string): ParsedImageReference {
  const trimmed = input.trim();
  if (!trimmed) {
    throw new CliUsageError("--base-image cannot be empty.", [
      "Pass a valid image reference such as python:3.7-alpine or ghcr.io/org/runtime:1.2.3.",
    ]);
  }

  if (trimmed.includes("://")) {
    throw new CliUsageError(`Invalid image reference '${input}'.`, [
      "Do not include a URL scheme.",
      "Use format: [registry/]repo[:tag] or [registry/]repo@sha256:<digest>.",
    ]);
  }

  let digest: string | undefined;
  let nameWithOptionalTag = trimmed;

  const atIndex = trimmed.lastIndexOf("@");
  if (atIndex >= 0) {
    digest = trimmed.slice(atIndex + 1).toLowerCase();
    nameWithOptionalTag = trimmed.slice(0, atIndex);

    if (!DIGEST_PATTERN.test(digest)) {
      throw new CliUsageError(`Invalid image reference '${input}'.`, [
        "Image digest after '@' must be sha256:<64 hex characters>.",
      ]);
    }
  }

  if (!nameWithOptionalTag) {
    throw new CliUsageError(`Invalid image reference '${input}'.`, [
      "Missing repository name.",
    ]);
  }

  const slashIndex = nameWithOptionalTag.indexOf("/");
  const firstSegment = slashIndex === -1 ? nameWithOptionalTag : nameWithOptionalTag.slice(0, slashIndex);

  let registry = DEFAULT_REGISTRY;
  let repositoryWithTag = nameWithOptionalTag;

  // A registry prefix needs a slash after it: ghcr.io/org/app, localhost:5000/app.
  if (slashIndex !== -1 && isRegistrySegment(firstSegment)) {
    registry = firstSegment;
    repositoryWithTag = nameWithOptionalTag.slice(firstSegment.length + 1);
  }

  if (!repositoryWithTag) {
    throw new CliUsageError(`Invalid image reference '${input}'.`, [
      "Missing repository path after registry.",
    ]);
  }

  let tag: string | undefined;
  const lastColon = repositoryWithTag.lastIndexOf(":");
  if (lastColon >= 0) {
    const lastSlash = repositoryWithTag.lastIndexOf("/");
    if (lastColon > lastSlash) {
      tag = repositoryWithTag.slice(lastColon + 1);
      repositoryWithTag = repositoryWithTag.slice(0, lastColon);

      if (!tag) {
        throw new CliUsageError(`Invalid image reference '${input}'.`, [
          "Tag cannot be empty.",
        ]);
      }
    }
  }

  if (!repositoryWithTag) {
    throw new CliUsageError(`Invalid image reference '${input}'.`, [
      "Repository cannot be empty.",
    ]);
  }

  let repository = repositoryWithTag;
  if (registry === DEFAULT_REGISTRY && !repository.includes("/")) {
    repository = `library/${repository}`;
  }

  return {
    original: trimmed,
    registry,
    repository,
    reference: digest ?? tag ?? DEFAULT_TAG,
    tag,
    digest,
  };
}

function isRegistrySegment(segment: string): boolean {
  return segment.includes(".") || segment.includes(":") || segment === "localhost";
}

export function isPinnedReference(parsed: ParsedImageReference): boolean {
  if (parsed.digest) {
    return true;
  }

  return parsed.tag !== undefined && parsed.tag !== DEFAULT_TAG;
}

/**
 * Reference as written in a FROM line. Docker Hub short names are kept short
 * so the rendered Dockerfile reads like a hand-written one.
 */
export function formatImageReference(parsed: ParsedImageReference): string {
  let name = parsed.repository;
  if (parsed.registry !== DEFAULT_REGISTRY) {
    name = `${parsed.registry}/${name}`;
  } else if (name.startsWith("library/")) {
    name = name.slice("library/".length);
  }

  if (parsed.tag) {
    name += `:${parsed.tag}`;
  }
  if (parsed.digest) {
    name += `@${parsed.digest}`;
  }
  return name;
}
