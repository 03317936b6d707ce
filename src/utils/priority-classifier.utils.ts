import { PriorityLevel, PriorityReason, type PriorityThresholds, type PriorityVerdict } from '@I/priority.interfaces';
import type { DependencyEdge } from '@I/compatibility.interfaces';
import { UNPARSEABLE, compare, elapsedDays, isSameVersion } from './version.utils';
import { getLogger } from './logger.utils';

export const DEFAULT_PRIORITY_THRESHOLDS: PriorityThresholds = {
    staleAfterDays: 183,
    allowedMinorDiff: 3,
};

/**
 * Computes the update priority of one dependency edge.
 *
 * Equal installed and latest versions short-circuit to UP_TO_DATE. Otherwise
 * each rule is evaluated on its own and any trigger makes the verdict HIGH;
 * the order below only fixes the order of the reasons.
 */
export function classify(edge: DependencyEdge, now: Date, thresholds: PriorityThresholds = DEFAULT_PRIORITY_THRESHOLDS): PriorityVerdict {
    const logger = getLogger().child('PriorityClassifier');

    if (isSameVersion(edge.installedVersion, edge.latestVersion)) {
        logger.trace('Dependency is up to date', { dependency: edge.dependsOn, version: edge.installedVersion });
        return { edge, priority: PriorityLevel.UP_TO_DATE, reasons: [] };
    }

    const diff = compare(edge.installedVersion, edge.latestVersion);
    if (diff === UNPARSEABLE) {
        logger.warn('Cannot determine priority for unparseable version', {
            dependency: edge.dependsOn,
            installed: edge.installedVersion,
            latest: edge.latestVersion,
        });
        return { edge, priority: PriorityLevel.LOW, reasons: [PriorityReason.UNPARSEABLE_VERSION] };
    }

    const reasons: PriorityReason[] = [];

    if (diff.majorDiff >= 1) {
        reasons.push(PriorityReason.MAJOR_RELEASE_AVAILABLE);
    }

    if (edge.latestVersionTimestamp && elapsedDays(edge.latestVersionTimestamp, now) > thresholds.staleAfterDays) {
        reasons.push(PriorityReason.STALE_OVER_SIX_MONTHS);
    }

    if (diff.majorDiff === 0 && diff.minorDiff >= thresholds.allowedMinorDiff) {
        reasons.push(PriorityReason.MINOR_VERSIONS_BEHIND);
    }

    if (reasons.length > 0) {
        logger.debug('High priority update', { dependency: edge.dependsOn, reasons });
        return { edge, priority: PriorityLevel.HIGH, reasons };
    }

    return { edge, priority: PriorityLevel.LOW, reasons: [PriorityReason.MINOR_UPDATE_AVAILABLE] };
}

/**
 * Human-readable explanation of a single reason
 */
export function describeReason(reason: PriorityReason, dependency: string): string {
    switch (reason) {
        case PriorityReason.MAJOR_RELEASE_AVAILABLE:
            return `${dependency} is 1 or more major versions behind the latest version`;
        case PriorityReason.STALE_OVER_SIX_MONTHS:
            return `it has been over 6 months since the latest version for ${dependency} was released`;
        case PriorityReason.MINOR_VERSIONS_BEHIND:
            return `${dependency} is 3 or more minor versions behind the latest version`;
        case PriorityReason.UNPARSEABLE_VERSION:
            return `the priority for ${dependency} cannot be determined from its version strings`;
        case PriorityReason.MINOR_UPDATE_AVAILABLE:
            return `${dependency} is not up to date with the latest version`;
    }
}
