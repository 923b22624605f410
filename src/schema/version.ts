import { CompatibilityResult, VersionPolicy } from './types';

interface SchemaVersion {
  major: number;
  minor: number;
  patch: number;
}

const VERSION_PATTERN = /^(\d+)\.(\d+)(?:\.(\d+))?$/;

/**
 * Parse a `major.minor[.patch]` version string; undefined when malformed
 */
export function parseSchemaVersion(version: string): SchemaVersion | undefined {
  const match = VERSION_PATTERN.exec(version.trim());
  if (!match) {
    return undefined;
  }
  return {
    major: Number(match[1]),
    minor: Number(match[2]),
    patch: match[3] === undefined ? 0 : Number(match[3])
  };
}

/**
 * Compare the version a consumer expects with the one a registry declares.
 *
 * `exact` accepts only identical strings. `same-major` accepts a matching major,
 * except that below 1.0 the minor has to match as well.
 */
export function checkVersionCompatibility(
  expected: string,
  actual: string,
  policy: VersionPolicy = 'exact'
): CompatibilityResult {
  const result = { expected, actual, policy };
  const expectedVersion = parseSchemaVersion(expected);
  const actualVersion = parseSchemaVersion(actual);

  if (!expectedVersion || !actualVersion) {
    return { ...result, compatible: false, reason: `malformed version '${expectedVersion ? actual : expected}'` };
  }

  if (policy === 'exact') {
    return expected.trim() === actual.trim()
      ? { ...result, compatible: true }
      : { ...result, compatible: false, reason: 'versions differ' };
  }

  if (expectedVersion.major !== actualVersion.major) {
    return { ...result, compatible: false, reason: 'major versions differ' };
  }
  if (expectedVersion.major === 0 && expectedVersion.minor !== actualVersion.minor) {
    return { ...result, compatible: false, reason: 'minor versions differ below 1.0' };
  }
  return { ...result, compatible: true };
}
