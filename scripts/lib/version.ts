export interface Version {
  raw: string;
  normalized: string;
  // Digit strings: identifiers may exceed Number.MAX_SAFE_INTEGER.
  major: string;
  minor: string;
  patch: string;
  prerelease: string[];
  build: string[];
}

const NUMERIC_IDENTIFIER = /^(?:0|[1-9]\d*)$/;

const VERSION_PATTERN =
  /^v?(0|[1-9]\d*)\.(0|[1-9]\d*)\.(0|[1-9]\d*)(?:-([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?(?:\+([0-9A-Za-z-]+(?:\.[0-9A-Za-z-]+)*))?$/;

export function parseVersion(value: string): Version | null {
  const raw = value.trim();
  const match = raw.match(VERSION_PATTERN);
  if (!match) {
    return null;
  }

  const prerelease = match[4] ? match[4].split('.') : [];
  // Leading zeroes are not allowed in numeric pre-release identifiers.
  if (prerelease.some((part) => /^\d+$/.test(part) && !NUMERIC_IDENTIFIER.test(part))) {
    return null;
  }

  return {
    raw,
    normalized: raw.startsWith('v') ? raw.slice(1) : raw,
    major: match[1],
    minor: match[2],
    patch: match[3],
    prerelease,
    build: match[5] ? match[5].split('.') : []
  };
}

export function compareCodeUnits(left: string, right: string): number {
  if (left === right) {
    return 0;
  }
  return left < right ? -1 : 1;
}

function compareNumeric(left: string, right: string): number {
  // Build metadata may carry leading zeroes; they do not change the value.
  const leftDigits = left.replace(/^0+(?=\d)/, '');
  const rightDigits = right.replace(/^0+(?=\d)/, '');
  return Math.sign(leftDigits.length - rightDigits.length) || compareCodeUnits(leftDigits, rightDigits);
}

function compareIdentifier(left: string, right: string): number {
  const leftNumeric = /^\d+$/.test(left);
  const rightNumeric = /^\d+$/.test(right);

  if (leftNumeric && rightNumeric) {
    return compareNumeric(left, right);
  }
  if (leftNumeric) {
    return -1;
  }
  if (rightNumeric) {
    return 1;
  }
  return compareCodeUnits(left, right);
}

function compareIdentifierLists(left: string[], right: string[]): number {
  const shared = Math.min(left.length, right.length);
  for (let index = 0; index < shared; index += 1) {
    const result = compareIdentifier(left[index], right[index]);
    if (result !== 0) {
      return result;
    }
  }
  return Math.sign(left.length - right.length);
}

export function compareVersions(left: Version, right: Version): number {
  const core =
    compareNumeric(left.major, right.major) ||
    compareNumeric(left.minor, right.minor) ||
    compareNumeric(left.patch, right.patch);
  if (core !== 0) {
    return core;
  }

  if (left.prerelease.length === 0 || right.prerelease.length === 0) {
    // A version without pre-release identifiers ranks above one that has them.
    return Math.sign(right.prerelease.length - left.prerelease.length);
  }

  return compareIdentifierLists(left.prerelease, right.prerelease);
}

// A version without build metadata ranks lowest.
export function compareBuilds(left: Version, right: Version): number {
  return compareIdentifierLists(left.build, right.build);
}
