import { CliUsageError } from "../../shared/cli-errors";

export type SpecifierOperator = "===" | "==" | "!=" | "~=" | "<=" | ">=" | "<" | ">";

export interface VersionSpecifier {
  operator: SpecifierOperator;
  version: string;
}

export interface ManifestEntry {
  line: number;
  raw: string;
  name: string;
  normalizedName: string;
  extras: string[];
  specifiers: VersionSpecifier[];
  marker?: string;
}

const NAME_PATTERN = /^([A-Za-z0-9](?:[A-Za-z0-9._-]*[A-Za-z0-9])?)\s*/;
const EXTRAS_PATTERN = /^\[([^\]]*)\]\s*/;
// Longest operators first so "===" is not read as "==" followed by "=".
const SPECIFIER_PATTERN = /^(===|==|!=|~=|<=|>=|<|>)\s*([A-Za-z0-9.*+!_-]+)$/;

const OPERATORS: readonly SpecifierOperator[] = ["===", "==", "!=", "~=", "<=", ">=", "<", ">"];

function isSpecifierOperator(value: string): value is SpecifierOperator {
  return OPERATORS.some((operator) => operator === value);
}

export function normalizePackageName(name: string): string {
  return name.toLowerCase().replace(/[-_.]+/g, "-");
}

type LogicalLine = {
  line: number;
  text: string;
};

const COMMENT_PATTERN = /(^|\s)#/;

function stripComment(text: string): string {
  const match = COMMENT_PATTERN.exec(text);
  return match ? text.slice(0, match.index) : text;
}

function joinContinuations(text: string): LogicalLine[] {
  const physical = text.split(/\r?\n/);
  const logical: LogicalLine[] = [];

  let pending: LogicalLine | null = null;
  for (let i = 0; i < physical.length; i += 1) {
    const current = physical[i];
    // A line carrying a comment ends the logical line, even when it ends in "\".
    const continues = !COMMENT_PATTERN.test(current) && current.endsWith("\\");
    const body = continues ? current.slice(0, -1) : current;

    if (pending) {
      pending.text += body;
    } else {
      pending = { line: i + 1, text: body };
    }

    if (!continues) {
      logical.push(pending);
      pending = null;
    }
  }

  if (pending) {
    logical.push(pending);
  }

  return logical;
}

function fail(manifestPath: string, line: number, message: string, hints: string[]): never {
  throw new CliUsageError(`${manifestPath}:${line}: ${message}`, hints);
}

function parseEntry(manifestPath: string, line: number, raw: string): ManifestEntry {
  let rest = raw;
  let marker: string | undefined;

  const semicolon = rest.indexOf(";");
  if (semicolon !== -1) {
    marker = rest.slice(semicolon + 1).trim();
    rest = rest.slice(0, semicolon).trim();
    if (!marker) {
      fail(manifestPath, line, "Empty environment marker after ';'.", [
        "Remove the ';' or add a marker such as python_version >= \"3.7\".",
      ]);
    }
  }

  const nameMatch = NAME_PATTERN.exec(rest);
  if (!nameMatch) {
    fail(manifestPath, line, `Invalid package specifier '${raw}'.`, [
      "Each line must start with a package name, e.g. flask==1.1.1.",
    ]);
  }
  const name = nameMatch[1];
  rest = rest.slice(nameMatch[0].length);

  let extras: string[] = [];
  const extrasMatch = EXTRAS_PATTERN.exec(rest);
  if (extrasMatch) {
    extras = extrasMatch[1]
      .split(",")
      .map((extra) => extra.trim())
      .filter((extra) => extra.length > 0);
    rest = rest.slice(extrasMatch[0].length);
  }

  if (rest.startsWith("@")) {
    fail(manifestPath, line, `Direct URL reference for '${name}' is not supported.`, [
      "Declare the package by name and version instead of a URL.",
    ]);
  }

  const specifiers: VersionSpecifier[] = [];
  if (rest.length > 0) {
    for (const clause of rest.split(",")) {
      const specMatch = SPECIFIER_PATTERN.exec(clause.trim());
      const operator = specMatch ? specMatch[1] : "";
      if (!specMatch || !isSpecifierOperator(operator)) {
        fail(manifestPath, line, `Invalid version constraint '${clause.trim()}' for '${name}'.`, [
          "Use operators ==, ===, !=, ~=, <=, >=, < or >, e.g. flask>=1.1,<2.",
        ]);
      }
      specifiers.push({ operator, version: specMatch[2] });
    }
  }

  return {
    line,
    raw,
    name,
    normalizedName: normalizePackageName(name),
    extras,
    specifiers,
    marker,
  };
}

/**
 * Parses a flat dependency manifest (requirements.txt syntax, one specifier
 * per line). Options such as -r or --index-url are not accepted.
 */
export function parseManifest(text: string, manifestPath: string): ManifestEntry[] {
  const entries: ManifestEntry[] = [];
  const seen = new Map<string, number>();

  for (const { line, text: lineText } of joinContinuations(text)) {
    const raw = stripComment(lineText).trim();
    if (!raw) {
      continue;
    }

    if (raw.startsWith("-")) {
      fail(manifestPath, line, `Unsupported manifest option '${raw.split(/\s+/)[0]}'.`, [
        "The manifest must list one package specifier per line.",
        "Inline the packages of included files instead of using -r, -c or -e.",
      ]);
    }

    const entry = parseEntry(manifestPath, line, raw);
    const previousLine = seen.get(entry.normalizedName);
    if (previousLine !== undefined) {
      fail(manifestPath, line, `Package '${entry.name}' is already declared on line ${previousLine}.`, [
        "Declare each package once and merge its version constraints.",
      ]);
    }

    seen.set(entry.normalizedName, line);
    entries.push(entry);
  }

  return entries;
}

export function formatManifestEntry(entry: ManifestEntry): string {
  let text = entry.name;
  if (entry.extras.length > 0) {
    text += `[${entry.extras.join(",")}]`;
  }
  text += entry.specifiers.map((spec) => `${spec.operator}${spec.version}`).join(",");
  if (entry.marker) {
    text += `; ${entry.marker}`;
  }
  return text;
}

export function formatManifest(entries: ManifestEntry[]): string {
  return entries.map((entry) => `${formatManifestEntry(entry)}\n`).join("");
}

export function isPinnedEntry(entry: ManifestEntry): boolean {
  if (entry.specifiers.length !== 1) {
    return false;
  }

  const [spec] = entry.specifiers;
  return (spec.operator === "==" || spec.operator === "===") && !spec.version.includes("*");
}

export function findUnpinnedEntries(entries: ManifestEntry[]): ManifestEntry[] {
  return entries.filter((entry) => !isPinnedEntry(entry));
}
