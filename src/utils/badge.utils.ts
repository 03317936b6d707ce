import { CompatibilityStatus, type PackageCompatibilitySummary } from '@I/compatibility.interfaces';
import { PriorityLevel, type PriorityVerdict } from '@I/priority.interfaces';
import type { BadgeResult, BadgeStatus, CompatibilityBadgeResult, PackageBadgeResults } from '@I/badge.interfaces';
import type { CompatibilityResultStore } from '@I/store.interfaces';
import { aggregatePackage } from './compatibility-aggregator.utils';
import type { DependencyHighlighter } from './dependency-highlighter.utils';
import { isConflicting } from './store.utils';
import { renderTemplate } from './template.utils';
import { getLogger } from './logger.utils';

export const GITHUB_HEAD_NAME = 'github head';

export const STATUS_COLOR_MAPPING: Record<BadgeStatus, string> = {
    SUCCESS: 'green',
    UNKNOWN: 'purple',
    CHECK_WARNING: 'red',
    CONFLICT: 'red',
    CALCULATING: 'blue',
    UP_TO_DATE: 'green',
    LOW_PRIORITY: 'yellow',
    HIGH_PRIORITY: 'red',
};

const COLOR_HEX: Record<string, string> = {
    green: '#4c1',
    purple: '#8a2be2',
    red: '#e05d44',
    blue: '#007ec6',
    yellow: '#dfb317',
};

// Approximate Verdana 11px advance
const CHAR_WIDTH = 7;
const TEXT_PADDING = 10;

const textWidth = (text: string): number => text.length * CHAR_WIDTH + TEXT_PADDING;

/**
 * Left-hand label for a package; GitHub URLs read as "github head"
 */
export function badgeLabel(packageName: string, badgeName?: string): string {
    const name = badgeName ?? packageName;
    return name.includes('github.com') ? GITHUB_HEAD_NAME : name;
}

/**
 * Renders a flat two-part badge as SVG
 */
export function renderBadge(left: string, status: BadgeStatus): string {
    const right = status.replace(/_/g, ' ');
    const leftWidth = textWidth(left);
    const rightWidth = textWidth(right);
    const color = COLOR_HEX[STATUS_COLOR_MAPPING[status]];

    return renderTemplate('badge.svg', {
        left,
        right,
        color,
        leftWidth,
        rightWidth,
        totalWidth: leftWidth + rightWidth,
        leftCenter: leftWidth / 2,
        rightCenter: leftWidth + rightWidth / 2,
    });
}

export function toBadgeStatus(status: CompatibilityStatus): BadgeStatus {
    switch (status) {
        case CompatibilityStatus.SUCCESS:
            return 'SUCCESS';
        case CompatibilityStatus.CHECK_WARNING:
            return 'CHECK_WARNING';
        case CompatibilityStatus.CONFLICT:
            return 'CONFLICT';
        case CompatibilityStatus.UNKNOWN:
            return 'UNKNOWN';
    }
}

/**
 * Self-compatibility badge entry from a package summary. A package the store
 * has never seen is still being calculated.
 */
export function selfBadgeResult(summary: PackageCompatibilitySummary | undefined): BadgeResult {
    if (!summary || !summary.selfFound) {
        return { status: 'CALCULATING', details: null };
    }
    return { status: toBadgeStatus(summary.selfStatus), details: summary.selfDetails };
}

/**
 * Portfolio badge entry: the package paired with every other tracked package
 */
export function portfolioBadgeResult(summary: PackageCompatibilitySummary | undefined): BadgeResult {
    if (!summary) {
        return { status: 'CALCULATING', details: null };
    }

    const conflicting = summary.pairs.filter((pair) => pair.found && isConflicting(pair.status));
    if (conflicting.length > 0) {
        return {
            status: 'CHECK_WARNING',
            details: conflicting.map((pair) => `${pair.otherPackage}: ${pair.details ?? 'incompatible'}`).join('\n'),
        };
    }
    if (summary.pairs.some((pair) => !pair.found)) {
        return { status: 'CALCULATING', details: null };
    }
    if (summary.pairs.some((pair) => pair.status !== CompatibilityStatus.SUCCESS)) {
        return { status: 'UNKNOWN', details: null };
    }
    return { status: 'SUCCESS', details: null };
}

/**
 * Dependency badge entry from the package's verdicts
 */
export function dependencyBadgeResult(verdicts: PriorityVerdict[]): BadgeResult {
    const high = verdicts.filter((v) => v.priority === PriorityLevel.HIGH);
    const low = verdicts.filter((v) => v.priority === PriorityLevel.LOW);
    const describe = (items: PriorityVerdict[]) => items.map((v) => `${v.edge.dependsOn} ${v.edge.installedVersion} -> ${v.edge.latestVersion}`).join('\n');

    if (high.length > 0) {
        return { status: 'HIGH_PRIORITY', details: describe(high) };
    }
    if (low.length > 0) {
        return { status: 'LOW_PRIORITY', details: describe(low) };
    }
    return { status: 'UP_TO_DATE', details: null };
}

/**
 * Status shown on a compatibility badge: py3, or py2 when py3 succeeded and
 * the package still supports Python 2
 */
export function compatibilityBadgeStatus(result: CompatibilityBadgeResult, packageName: string, py2Unsupported: readonly string[] = []): BadgeStatus {
    const status = result.py3.status;
    if (status === 'SUCCESS' && !py2Unsupported.includes(packageName)) {
        return result.py2.status;
    }
    return status;
}

/**
 * Overall badge status across the self, portfolio and dependency checks
 */
export function overallBadgeStatus(results: PackageBadgeResults): BadgeStatus {
    const statuses = [results.self.py3.status, results.portfolio.py3.status, results.dependency.status];

    if (results.self.py3.status === 'SUCCESS' && results.portfolio.py3.status === 'SUCCESS' && results.dependency.status === 'UP_TO_DATE') {
        return 'SUCCESS';
    }
    if (statuses.includes('CALCULATING')) {
        return 'CALCULATING';
    }
    if (statuses.includes('UNKNOWN')) {
        return 'UNKNOWN';
    }
    return 'CHECK_WARNING';
}

export interface BadgeContext {
    store: CompatibilityResultStore;
    highlighter: DependencyHighlighter;
    /** Tracked packages the portfolio badge pairs against */
    portfolio: readonly string[];
    now?: Date;
}

/**
 * Gathers every badge entry for one package from the store
 */
export async function collectBadgeResults(packageName: string, context: BadgeContext): Promise<PackageBadgeResults> {
    const logger = getLogger().child('Badge');
    const [py2, py3] = await Promise.all(
        (['2', '3'] as const).map((pythonVersion) => aggregatePackage(packageName, context.portfolio, pythonVersion, context.store)),
    );

    let dependency: BadgeResult;
    try {
        dependency = dependencyBadgeResult(await context.highlighter.classifyDependencies(packageName, context.now ?? new Date()));
    } catch (error) {
        logger.warn('Dependency badge falls back to UNKNOWN', {
            package: packageName,
            error: error instanceof Error ? error.message : String(error),
        });
        dependency = { status: 'UNKNOWN', details: error instanceof Error ? error.message : String(error) };
    }

    return {
        self: { py2: selfBadgeResult(py2), py3: selfBadgeResult(py3) },
        portfolio: { py2: portfolioBadgeResult(py2), py3: portfolioBadgeResult(py3) },
        dependency,
    };
}
