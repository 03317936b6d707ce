export type PythonVersion = '2' | '3';

export const PYTHON_VERSIONS: readonly PythonVersion[] = ['2', '3'];

export enum CompatibilityStatus {
    SUCCESS = 'SUCCESS',
    CHECK_WARNING = 'CHECK_WARNING',
    CONFLICT = 'CONFLICT',
    UNKNOWN = 'UNKNOWN',
}

/**
 * Status of a package once its self and pairwise results are folded together
 */
export enum SummaryStatus {
    SUCCESS = 'SUCCESS',
    UNKNOWN = 'UNKNOWN',
    CONFLICT = 'CONFLICT',
}

/**
 * A single package, or a pair stored as [lower, higher]
 */
export type PackageSet = readonly [string] | readonly [string, string];

export interface CompatibilityResult {
    packages: PackageSet;
    pythonVersion: PythonVersion;
    status: CompatibilityStatus;
    details: string | null;
    timestamp: Date;
}

export interface PackageVersion {
    name: string;
    version: string | null;
    releaseTimestamp: Date | null;
}

export interface DependencyEdge {
    package: PackageVersion;
    dependsOn: string;
    installedVersion: string;
    installedVersionTimestamp: Date | null;
    latestVersion: string;
    /** null when the registry lookup failed */
    latestVersionTimestamp: Date | null;
    isLatest: boolean;
    checkedAt: Date;
}

export interface PairDetail {
    otherPackage: string;
    /** UNKNOWN when the store has no row for the pair */
    status: CompatibilityStatus;
    details: string | null;
    found: boolean;
}

export interface PackageCompatibilitySummary {
    package: string;
    pythonVersion: PythonVersion;
    status: SummaryStatus;
    selfStatus: CompatibilityStatus;
    selfDetails: string | null;
    selfFound: boolean;
    pairs: PairDetail[];
}
