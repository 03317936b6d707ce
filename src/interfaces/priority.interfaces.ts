import type { DependencyEdge } from './compatibility.interfaces';

export enum PriorityLevel {
    UP_TO_DATE = 'UP_TO_DATE',
    LOW = 'LOW',
    HIGH = 'HIGH',
}

export enum PriorityReason {
    MAJOR_RELEASE_AVAILABLE = 'major-release-available',
    STALE_OVER_SIX_MONTHS = 'stale-over-6-months',
    MINOR_VERSIONS_BEHIND = '3-or-more-minor-behind',
    MINOR_UPDATE_AVAILABLE = 'minor-update-available',
    UNPARSEABLE_VERSION = 'unparseable-version',
}

export interface PriorityVerdict {
    edge: DependencyEdge;
    priority: PriorityLevel;
    reasons: PriorityReason[];
}

export interface PriorityThresholds {
    /** Days after the latest release before any lag is escalated */
    staleAfterDays: number;
    /** Minor releases behind (same major) before escalation */
    allowedMinorDiff: number;
}
