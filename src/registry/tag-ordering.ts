/**
 * Ordering over chain tags.
 *
 * Finite numbers compare numerically. Everything else is read as a dotted version:
 * `1.10` is newer than `1.9`, a missing segment counts as zero (`2` equals
 * `2.0`) and an optional leading `v` is ignored. A suffix after the first `-`
 * marks a pre-release that sorts before the plain release (`2.0-rc1` < `2.0`).
 * Non-numeric segments compare by code point after all numeric ones.
 */

import type { Tag } from './type-node.js';

/**
 * Comparator over tags: negative when `a` is older, zero when equal,
 * positive when newer.
 */
export type TagComparator = (a: Tag, b: Tag) => number;

interface ParsedVersion {
  release: string[];
  preRelease: string[] | null;
}

const NUMERIC_SEGMENT = /^\d+$/;

function parseVersion(tag: Tag): ParsedVersion {
  let text = String(tag).trim();
  if (/^[vV]\d/.test(text)) {
    text = text.slice(1);
  }
  const dash = text.indexOf('-');
  const release = dash === -1 ? text : text.slice(0, dash);
  const preRelease = dash === -1 ? null : text.slice(dash + 1);
  return {
    release: release.split('.'),
    preRelease: preRelease === null ? null : preRelease.split('.'),
  };
}

function sign(value: number): number {
  return value < 0 ? -1 : value > 0 ? 1 : 0;
}

/**
 * Exact comparison of two digit strings of any length.
 */
function compareDigits(a: string, b: string): number {
  const left = a.replace(/^0+/, '');
  const right = b.replace(/^0+/, '');
  if (left.length !== right.length) {
    return left.length < right.length ? -1 : 1;
  }
  return left < right ? -1 : left > right ? 1 : 0;
}

function compareSegment(a: string, b: string): number {
  const aNumeric = NUMERIC_SEGMENT.test(a);
  const bNumeric = NUMERIC_SEGMENT.test(b);
  if (aNumeric && bNumeric) {
    return compareDigits(a, b);
  }
  if (aNumeric !== bNumeric) {
    return aNumeric ? -1 : 1;
  }
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Compare segment lists. With a null padding the shorter list sorts first
 * once the shared prefix is equal.
 */
function compareSegments(a: string[], b: string[], padding: string | null): number {
  const length = Math.max(a.length, b.length);
  for (let i = 0; i < length; i++) {
    const left = a[i] ?? padding;
    const right = b[i] ?? padding;
    if (left === null || right === null) {
      return left === null ? -1 : 1;
    }
    const result = compareSegment(left, right);
    if (result !== 0) {
      return result;
    }
  }
  return 0;
}

/**
 * Default comparator for chain tags.
 *
 * @example
 * ```typescript
 * compareTags('1.5', '1.1');    // 1
 * compareTags('1.9', '1.10');   // -1
 * compareTags('2', '2.0');      // 0
 * compareTags('2.0-rc1', '2.0'); // -1
 * ```
 */
export const compareTags: TagComparator = (a, b) => {
  // NaN and the infinities go through the text path, so NaN never equals a number
  if (
    typeof a === 'number' &&
    typeof b === 'number' &&
    Number.isFinite(a) &&
    Number.isFinite(b)
  ) {
    return sign(a - b);
  }

  const left = parseVersion(a);
  const right = parseVersion(b);

  const release = compareSegments(left.release, right.release, '0');
  if (release !== 0) {
    return release;
  }

  if (left.preRelease === null || right.preRelease === null) {
    if (left.preRelease === right.preRelease) {
      return 0;
    }
    return left.preRelease === null ? 1 : -1;
  }
  return compareSegments(left.preRelease, right.preRelease, null);
};

/**
 * Why a tag cannot be registered or looked up, or null when it is usable.
 */
export function invalidTagReason(tag: Tag): string | null {
  if (typeof tag === 'string' && tag.trim() === '') {
    return 'Tag must be a non-empty string';
  }
  if (typeof tag === 'number' && !Number.isFinite(tag)) {
    return `Tag must be a finite number, got ${tag}`;
  }
  return null;
}
