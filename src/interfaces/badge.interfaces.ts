import type { PythonVersion } from './compatibility.interfaces';

export type BadgeStatus =
    | 'SUCCESS'
    | 'UNKNOWN'
    | 'CHECK_WARNING'
    | 'CONFLICT'
    | 'CALCULATING'
    | 'UP_TO_DATE'
    | 'LOW_PRIORITY'
    | 'HIGH_PRIORITY';

export enum BadgeKind {
    SELF = 'self',
    PORTFOLIO = 'portfolio',
    DEPENDENCY = 'dependency',
    OVERALL = 'overall',
}

export interface BadgeResult {
    status: BadgeStatus;
    details: string | null;
}

export type CompatibilityBadgeResult = Record<`py${PythonVersion}`, BadgeResult>;

export interface PackageBadgeResults {
    self: CompatibilityBadgeResult;
    portfolio: CompatibilityBadgeResult;
    dependency: BadgeResult;
}

export interface DashboardCell {
    status: string;
    cssClass: string;
    details: string;
}

export interface DashboardRow {
    packageName: string;
    cells: Array<DashboardCell | null>;
}

export interface DashboardStatistics {
    totalPackages: number;
    withConflicts: number;
    needingUpdate: number;
    healthy: number;
}

export interface DashboardModel {
    pythonVersion: PythonVersion;
    generatedAt: string;
    packages: string[];
    rows: DashboardRow[];
    statistics: DashboardStatistics;
    outdated: Array<{ packageName: string; dependencies: Array<{ name: string; priority: string; installed: string; latest: string }> }>;
}
