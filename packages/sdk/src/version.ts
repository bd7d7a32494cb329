/**
 * Version ordering and range membership for pack versions
 *
 * Pack versions are semantic versions that may carry leading zeros in their
 * numeric components (`01.02.03` equals `1.2.3`). Zeros are stripped before
 * delegating precedence to `semver`. Build metadata never affects ordering.
 *
 * Range expressions:
 * - `""`        any version
 * - `min`       version >= min
 * - `:max`      version <= max
 * - `min:max`   min <= version <= max
 * - `min:_`     version >= min (`_` is the unbounded upper sentinel)
 */

import { compare, parse as parseSemver, type SemVer } from "semver";

/**
 * Pack version grammar (leading zeros tolerated, optional pre-release and build metadata)
 */
export const VERSION_PATTERN =
  "(?:\\d+)\\.(?:\\d+)\\.(?:\\d+)" +
  "(?:-(?:(?:\\d+|\\d*[a-zA-Z-][0-9a-zA-Z-]*)(?:\\.(?:\\d+|\\d*[a-zA-Z-][0-9a-zA-Z-]*))*))?" +
  "(?:\\+(?:[0-9a-zA-Z-]+(?:\\.[0-9a-zA-Z-]+)*))?";

const VERSION_REGEX = new RegExp(`^${VERSION_PATTERN}$`);

/**
 * Unbounded upper limit of a version range
 */
export const UNBOUNDED = "_";

const LEADING_ZEROS = /\.0*(\d+)/g;

/**
 * Strip leading zeros from every numeric dot-separated component
 * @example stripLeadingZeros("01.002.3") === "1.2.3"
 */
export function stripLeadingZeros(version: string): string {
  let stripped = version.replace(LEADING_ZEROS, ".$1").replace(/^0+/, "");
  if (stripped.startsWith(".")) {
    // restore the only zero
    stripped = `0${stripped}`;
  }
  return stripped;
}

function parse(version: string): SemVer | null {
  const [bare] = version.split(":");
  return parseSemver(stripLeadingZeros(bare ?? ""));
}

/**
 * Check a string against the pack version grammar
 */
export function isValidVersion(version: string): boolean {
  return VERSION_REGEX.test(version);
}

/**
 * Compare two versions by semantic-version precedence
 *
 * Anything after a `:` is ignored, so range strings compare by their lower bound.
 * An invalid version orders before every valid one; two invalid versions are equal.
 */
export function compareVersions(a: string, b: string): -1 | 0 | 1 {
  const left = parse(a);
  const right = parse(b);

  if (left === null || right === null) {
    if (left === right) return 0;
    return left === null ? -1 : 1;
  }

  return compare(left, right);
}

/**
 * Major component without leading zeros, or "" for an invalid version
 */
export function major(version: string): string {
  const parsed = parse(version);
  return parsed === null ? "" : String(parsed.major);
}

/**
 * "major.minor" without leading zeros, or "" for an invalid version
 */
export function majorMinor(version: string): string {
  const parsed = parse(version);
  return parsed === null ? "" : `${parsed.major}.${parsed.minor}`;
}

/**
 * Whether the version carries `+meta` build metadata
 */
export function hasMeta(version: string): boolean {
  return version.includes("+");
}

/**
 * Drop `+meta` build metadata
 */
export function stripMeta(version: string): string {
  const plus = version.indexOf("+");
  return plus === -1 ? version : version.slice(0, plus);
}

/**
 * Compare a version against a range expression
 * @returns 0 when inside the range, -1 when below the lower bound, 1 when above the upper bound
 */
export function compareRange(version: string, range: string): -1 | 0 | 1 {
  const bare = stripMeta(version);
  const separator = range.indexOf(":");
  const low = separator === -1 ? range : range.slice(0, separator);
  const high = separator === -1 ? "" : range.slice(separator + 1);

  if (high !== "" && high !== UNBOUNDED && compareVersions(bare, stripMeta(high)) > 0) {
    return 1;
  }
  if (low !== "" && compareVersions(bare, stripMeta(low)) < 0) {
    return -1;
  }
  return 0;
}

/**
 * Versions sorted newest first
 */
export function sortVersionsDescending(versions: readonly string[]): string[] {
  return [...versions].sort((a, b) => compareVersions(b, a));
}

/**
 * Human-readable range: `x.y.z:_` becomes `>=x.y.z`, anything else is returned as is
 */
export function formatVersionRange(range: string): string {
  const [low, high] = range.split(":");
  if (high === UNBOUNDED) {
    return `>=${low ?? ""}`;
  }
  return range;
}

/**
 * Raw requirement tuple as exposed by a descriptor: [name, vendor, range]
 */
export type RequirementTuple = readonly [name: string, vendor: string, range: string];

/**
 * Render a requirement tuple as a `Vendor::Name@…` pack ID
 * @example formatRequirement(["CMSIS", "ARM", "5.6.0:_"]) === "ARM::CMSIS@>=5.6.0"
 */
export function formatRequirement([name, vendor, range]: RequirementTuple): string {
  const id = `${vendor}::${name}`;
  if (range === "latest") {
    return `${id}@latest`;
  }

  const [low = "", high = ""] = range.split(":");
  if (high === UNBOUNDED) {
    return `${id}@>=${low}`;
  }
  if (high === "" || low === high) {
    return `${id}@${low}`;
  }
  return `${id}@${low}:${high}`;
}
