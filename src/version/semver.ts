import { FormatError, InvalidBumpLevelError } from "../errors.js";

export const BUMP_LEVELS = ["major", "minor", "patch"] as const;

export type BumpLevel = (typeof BUMP_LEVELS)[number];

export type Ordering = "less" | "equal" | "greater";

const NUMERIC = /^(0|[1-9]\d*)$/;
const PRERELEASE_ID = /^(0|[1-9]\d*|\d*[A-Za-z-][0-9A-Za-z-]*)$/;
const BUILD_ID = /^[0-9A-Za-z-]+$/;

/**
 * Immutable SemVer 2.0.0 value.
 *
 * `toString()` reproduces the parsed text exactly, including prerelease and
 * build identifiers.
 */
export class Version {
  private constructor(
    readonly major: number,
    readonly minor: number,
    readonly patch: number,
    readonly prerelease: readonly string[],
    readonly build: readonly string[],
  ) {}

  static parse(text: string): Version {
    if (typeof text !== "string" || text.length === 0) throw new FormatError(String(text), "empty");

    let rest = text;
    let build: string[] = [];
    const plus = rest.indexOf("+");
    if (plus !== -1) {
      build = rest.slice(plus + 1).split(".");
      rest = rest.slice(0, plus);
      if (build.some((id) => !BUILD_ID.test(id))) throw new FormatError(text, "invalid build metadata");
    }

    let prerelease: string[] = [];
    const dash = rest.indexOf("-");
    if (dash !== -1) {
      prerelease = rest.slice(dash + 1).split(".");
      rest = rest.slice(0, dash);
      if (prerelease.some((id) => !PRERELEASE_ID.test(id))) throw new FormatError(text, "invalid prerelease");
    }

    const core = rest.split(".");
    if (core.length !== 3 || core.some((part) => !NUMERIC.test(part))) {
      throw new FormatError(text);
    }
    const [major, minor, patch] = core.map(Number);
    if (![major, minor, patch].every(Number.isSafeInteger)) {
      throw new FormatError(text, "version number out of range");
    }

    return new Version(major, minor, patch, prerelease, build);
  }

  /** Like `parse`, but returns null instead of throwing. */
  static tryParse(text: string): Version | null {
    try {
      return Version.parse(text);
    } catch (e) {
      if (e instanceof FormatError) return null;
      throw e;
    }
  }

  /** SemVer precedence; build metadata is ignored. */
  static compare(a: Version, b: Version): Ordering {
    const core = compareNumbers(a.major, b.major) || compareNumbers(a.minor, b.minor) || compareNumbers(a.patch, b.patch);
    if (core !== 0) return toOrdering(core);

    // A version without prerelease has higher precedence.
    if (a.prerelease.length === 0 && b.prerelease.length === 0) return "equal";
    if (a.prerelease.length === 0) return "greater";
    if (b.prerelease.length === 0) return "less";

    const len = Math.min(a.prerelease.length, b.prerelease.length);
    for (let i = 0; i < len; i++) {
      const c = compareIdentifiers(a.prerelease[i], b.prerelease[i]);
      if (c !== 0) return toOrdering(c);
    }
    return toOrdering(compareNumbers(a.prerelease.length, b.prerelease.length));
  }

  compareTo(other: Version): Ordering {
    return Version.compare(this, other);
  }

  equals(other: Version): boolean {
    return Version.compare(this, other) === "equal";
  }

  /** Returns a new version; prerelease and build metadata are dropped. */
  bump(level: BumpLevel = "patch"): Version {
    switch (level) {
      case "major":
        return new Version(this.major + 1, 0, 0, [], []);
      case "minor":
        return new Version(this.major, this.minor + 1, 0, [], []);
      case "patch":
        return new Version(this.major, this.minor, this.patch + 1, [], []);
    }
  }

  toString(): string {
    let out = `${this.major}.${this.minor}.${this.patch}`;
    if (this.prerelease.length > 0) out += `-${this.prerelease.join(".")}`;
    if (this.build.length > 0) out += `+${this.build.join(".")}`;
    return out;
  }

  toJSON(): string {
    return this.toString();
  }
}

export function isBumpLevel(value: string): value is BumpLevel {
  return (BUMP_LEVELS as readonly string[]).includes(value);
}

export function parseBumpLevel(value: string | undefined): BumpLevel {
  if (value === undefined) return "patch";
  if (!isBumpLevel(value)) throw new InvalidBumpLevelError(value);
  return value;
}

function compareNumbers(a: number, b: number): number {
  return a === b ? 0 : a < b ? -1 : 1;
}

/** Numeric identifiers compare numerically and sort below alphanumeric ones. */
function compareIdentifiers(a: string, b: string): number {
  const aNum = NUMERIC.test(a);
  const bNum = NUMERIC.test(b);
  if (aNum && bNum) {
    // no leading zeros, so a longer numeral is a larger number
    return compareNumbers(a.length, b.length) || (a === b ? 0 : a < b ? -1 : 1);
  }
  if (aNum) return -1;
  if (bNum) return 1;
  return a === b ? 0 : a < b ? -1 : 1;
}

function toOrdering(n: number): Ordering {
  return n < 0 ? "less" : n > 0 ? "greater" : "equal";
}
