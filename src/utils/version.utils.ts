import * as semver from 'semver';
import { getLogger } from './logger.utils';

export interface VersionDiff {
    majorDiff: number;
    minorDiff: number;
    patchDiff: number;
}

export const UNPARSEABLE = Symbol('unparseable-version');
export type Unparseable = typeof UNPARSEABLE;

const LEADING_DIGITS = /^\d+/;
const DAY_MS = 24 * 60 * 60 * 1000;

/**
 * Splits a dotted release string into integer segments. Each segment keeps
 * its leading digits ("3rc1" reads as 3); a segment without any leading
 * digit makes the whole string unparseable.
 * @returns the segments, padded to at least major.minor.patch
 */
export function parseVersion(version: string): number[] | Unparseable {
    const trimmed = version.trim();
    if (trimmed === '') return UNPARSEABLE;

    const segments: number[] = [];
    for (const segment of trimmed.split('.')) {
        const match = LEADING_DIGITS.exec(segment);
        if (!match) return UNPARSEABLE;
        segments.push(parseInt(match[0], 10));
    }

    while (segments.length < 3) {
        segments.push(0);
    }
    return segments;
}

/**
 * Distance from a to b, each component as b - a
 */
export function compare(a: string, b: string): VersionDiff | Unparseable {
    const logger = getLogger().child('Version');

    const from = parseVersion(a);
    const to = parseVersion(b);
    if (from === UNPARSEABLE || to === UNPARSEABLE) {
        logger.debug('Unparseable version in comparison', { a, b });
        return UNPARSEABLE;
    }

    return {
        majorDiff: to[0] - from[0],
        minorDiff: to[1] - from[1],
        patchDiff: to[2] - from[2],
    };
}

/**
 * True for identical strings, or parseable strings naming the same release
 * once trailing zero segments are accounted for ("1.0" and "1.0.0")
 */
export function isSameVersion(a: string, b: string): boolean {
    if (a.trim() === b.trim()) return true;

    const left = parseVersion(a);
    const right = parseVersion(b);
    if (left === UNPARSEABLE || right === UNPARSEABLE) return false;

    const length = Math.max(left.length, right.length);
    for (let i = 0; i < length; i++) {
        if ((left[i] ?? 0) !== (right[i] ?? 0)) return false;
    }
    return true;
}

/**
 * Elapsed milliseconds between a timestamp and now
 */
export function elapsedSince(timestamp: Date, now: Date): number {
    return now.getTime() - timestamp.getTime();
}

export function elapsedDays(timestamp: Date, now: Date): number {
    return Math.floor(elapsedSince(timestamp, now) / DAY_MS);
}

/**
 * Whether candidate is a newer release than current, ordering both with
 * semver after coercion. Uncoercible strings never count as newer.
 */
export function isNewerVersion(candidate: string, current: string): boolean {
    const logger = getLogger().child('Version');

    const next = semver.coerce(candidate);
    const prev = semver.coerce(current);
    if (!next || !prev) {
        logger.warn('Could not coerce versions for ordering', { candidate, current });
        return false;
    }

    return semver.gt(next, prev);
}
