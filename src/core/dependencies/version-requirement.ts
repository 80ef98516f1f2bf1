/**
 * @fileoverview Cargo version requirements
 *
 * Parses requirement strings such as `"1.0"`, `">=1.2, <2"` or `"1.*"` into
 * comparator lists, deduplicates them and renders them back in canonical
 * form. A bare version is a caret requirement and renders with `^`.
 */

import * as semver from 'semver';

import { REQUIREMENT_SEPARATOR } from '../../constants/index.js';
import { VersionRequirementError } from '../../utils/errors.js';

/** `*` marks a wildcard comparator such as `1.*` or `1.2.*` */
export type ComparatorOp = '=' | '>' | '>=' | '<' | '<=' | '~' | '^' | '*';

export interface Comparator {
  op: ComparatorOp;
  major: bigint;
  minor?: bigint;
  patch?: bigint;
  prerelease: string[];
}

export interface VersionRequirement {
  /** Empty for the match-everything requirement `*` */
  comparators: Comparator[];
}

const TERM_PATTERN =
  /^(>=|<=|>|<|=|~|\^)?\s*([^.\s+-]+)(?:\.([^.\s+-]+))?(?:\.([^.\s+-]+))?(?:-([^+\s]+))?(?:\+(\S+))?$/;

const WILDCARDS = new Set(['*', 'x', 'X']);

const MAX_COMPONENT = 2n ** 64n - 1n;

function parseNumber(input: string, part: string, requirement: string): bigint {
  if (!/^\d+$/.test(input)) {
    throw new VersionRequirementError(requirement, `unexpected character in ${part} version number: "${input}"`);
  }
  if (input.length > 1 && input.startsWith('0')) {
    throw new VersionRequirementError(requirement, `invalid leading zero in ${part} version number`);
  }
  const value = BigInt(input);
  if (value > MAX_COMPONENT) {
    throw new VersionRequirementError(requirement, `value of ${part} version number exceeds the supported range`);
  }
  return value;
}

/**
 * Parse one comparator. Returns `null` for the lone `*` term.
 */
function parseComparator(term: string, requirement: string): Comparator | null {
  const match = TERM_PATTERN.exec(term);
  if (!match) {
    throw new VersionRequirementError(requirement, `unexpected input "${term}"`);
  }

  const [, explicitOp, majorText, minorText, patchText, preText, buildText] = match;

  if (buildText !== undefined) {
    throw new VersionRequirementError(requirement, 'build metadata is not allowed in a requirement');
  }

  if (WILDCARDS.has(majorText)) {
    if (explicitOp || minorText !== undefined) {
      throw new VersionRequirementError(requirement, `unexpected wildcard in "${term}"`);
    }
    return null;
  }

  const major = parseNumber(majorText, 'major', requirement);
  let op: ComparatorOp = explicitOp ? toOp(explicitOp) : '^';
  let minor: bigint | undefined;
  let patch: bigint | undefined;

  if (minorText !== undefined) {
    if (WILDCARDS.has(minorText)) {
      if (patchText !== undefined && !WILDCARDS.has(patchText)) {
        throw new VersionRequirementError(requirement, `unexpected character after wildcard in "${term}"`);
      }
      if (!explicitOp) op = '*';
    } else {
      minor = parseNumber(minorText, 'minor', requirement);
      if (patchText !== undefined) {
        if (WILDCARDS.has(patchText)) {
          if (!explicitOp) op = '*';
        } else {
          patch = parseNumber(patchText, 'patch', requirement);
        }
      }
    }
  }

  const prerelease = preText === undefined ? [] : preText.split('.');
  if (prerelease.length > 0) {
    if (patch === undefined) {
      throw new VersionRequirementError(requirement, `pre-release requires a full version in "${term}"`);
    }
    // semver caps components at 2^53, so only the identifiers are checked here
    if (!semver.valid(`0.0.0-${preText}`)) {
      throw new VersionRequirementError(requirement, `invalid pre-release identifier "${preText}"`);
    }
  }

  return { op, major, minor, patch, prerelease };
}

function toOp(text: string): ComparatorOp {
  switch (text) {
    case '=':
    case '>':
    case '>=':
    case '<':
    case '<=':
    case '~':
    case '^':
      return text;
    default:
      return '^';
  }
}

/**
 * Parse a requirement string into its comparators.
 */
export function parseVersionRequirement(requirement: string): VersionRequirement {
  if (requirement.trim().length === 0) {
    throw new VersionRequirementError(requirement, 'empty string, expected a version requirement');
  }

  const terms = requirement.split(',').map(term => term.trim());
  const comparators: Comparator[] = [];
  let sawStar = false;

  for (const term of terms) {
    if (term.length === 0) {
      throw new VersionRequirementError(requirement, 'unexpected end of input while parsing a comparator');
    }
    const comparator = parseComparator(term, requirement);
    if (comparator === null) {
      sawStar = true;
    } else {
      comparators.push(comparator);
    }
  }

  if (sawStar && terms.length > 1) {
    throw new VersionRequirementError(requirement, 'wildcard requirement (*) must be the only comparator');
  }

  return { comparators };
}

export function formatComparator(comparator: Comparator): string {
  const { op, major, minor, patch, prerelease } = comparator;
  let out = op === '*' ? `${major}` : `${op}${major}`;

  if (minor === undefined) {
    if (op === '*') out += '.*';
    return out;
  }

  out += `.${minor}`;
  if (patch === undefined) {
    if (op === '*') out += '.*';
    return out;
  }

  out += `.${patch}`;
  if (prerelease.length > 0) {
    out += `-${prerelease.join('.')}`;
  }
  return out;
}

export function formatVersionRequirement(requirement: VersionRequirement): string {
  if (requirement.comparators.length === 0) {
    return '*';
  }
  return requirement.comparators.map(formatComparator).join(REQUIREMENT_SEPARATOR);
}

/**
 * Drop comparators equal to an earlier one. The first occurrence keeps its
 * position, so the output is stable for a given input.
 */
export function dedupeComparators(requirement: VersionRequirement): VersionRequirement {
  const seen = new Set<string>();
  const comparators: Comparator[] = [];

  for (const comparator of requirement.comparators) {
    const key = formatComparator(comparator);
    if (seen.has(key)) continue;
    seen.add(key);
    comparators.push(comparator);
  }

  return { comparators };
}

/**
 * Parse, dedupe and re-render a requirement string.
 *
 * @example
 * simplifyVersionRequirement('1.0, >=1.2, 1.0') // => '^1.0, >=1.2'
 */
export function simplifyVersionRequirement(requirement: string): string {
  return formatVersionRequirement(dedupeComparators(parseVersionRequirement(requirement)));
}
