import { CompatibilityStatus, type CompatibilityResult, type DependencyEdge, type PackageSet, type PackageVersion } from '@I/compatibility.interfaces';
import type { CheckedCompatibilityResult, CompatibilityResultStore } from '@I/store.interfaces';
import { InvalidPackageSetError } from '@E/InvalidPackageSetError';
import { isNewerVersion } from './version.utils';

/**
 * Orders a pair of install names as [lower, higher] so (A, B) and (B, A)
 * share one row
 */
export function canonicalPair(packageA: string, packageB: string): readonly [string, string] {
    return packageA <= packageB ? [packageA, packageB] : [packageB, packageA];
}

/**
 * Normalises the package list of a result, sorting pairs into canonical order
 */
export function toPackageSet(packages: readonly string[]): PackageSet {
    if (packages.length === 1) {
        return [packages[0]];
    }
    if (packages.length === 2) {
        return canonicalPair(packages[0], packages[1]);
    }
    throw new InvalidPackageSetError(`A compatibility result must have 1 or 2 packages, got ${packages.length}`);
}

export function isPairResult(result: CompatibilityResult): boolean {
    return result.packages.length === 2;
}

/**
 * CHECK_WARNING is what the checker reports when the combined install has
 * broken requirements, so it folds the same way as CONFLICT
 */
export function isConflicting(status: CompatibilityStatus): boolean {
    return status === CompatibilityStatus.CONFLICT || status === CompatibilityStatus.CHECK_WARNING;
}

/**
 * Reads a stored status column, mapping anything unrecognised to UNKNOWN
 */
export function parseStatus(value: string | null | undefined): CompatibilityStatus {
    return Object.values(CompatibilityStatus).find((status) => status === value) ?? CompatibilityStatus.UNKNOWN;
}

/**
 * Install name without extras, as it appears in dependency listings
 * ("apache-beam[gcp]" lists itself as "apache-beam")
 */
export function baseInstallName(installName: string): string {
    return installName.split('[')[0];
}

/**
 * Version of the package itself among its own dependency edges
 */
export function ownInstalledVersion(installName: string, edges: readonly DependencyEdge[]): DependencyEdge | undefined {
    const name = baseInstallName(installName);
    return edges.find((edge) => edge.dependsOn === name);
}

/**
 * Fills in each edge's PackageVersion from the package's own edge, when the
 * snapshot lists one
 */
export function withPackageVersion(installName: string, edges: DependencyEdge[]): DependencyEdge[] {
    const own = ownInstalledVersion(installName, edges);
    const pkg: PackageVersion = {
        name: installName,
        version: own?.installedVersion ?? null,
        releaseTimestamp: own?.installedVersionTimestamp ?? null,
    };
    return edges.map((edge) => ({ ...edge, package: pkg }));
}

/**
 * Writes a batch of checker results through the store's upserts.
 *
 * Dependency snapshots are not kept per Python version: when several
 * single-package results carry one, the snapshot whose own installed version
 * is newest is saved.
 */
export async function saveResultsThrough(store: CompatibilityResultStore, results: readonly CheckedCompatibilityResult[]): Promise<void> {
    const bad = results.find((result) => result.packages.length !== 1 && result.packages.length !== 2);
    if (bad) {
        throw new InvalidPackageSetError(`A compatibility result must have 1 or 2 packages, got ${bad.packages.length}`);
    }

    const snapshots = new Map<string, DependencyEdge[]>();

    for (const result of results) {
        const normalized: CompatibilityResult = {
            packages: toPackageSet(result.packages),
            pythonVersion: result.pythonVersion,
            status: result.status,
            details: result.details,
            timestamp: result.timestamp,
        };

        if (isPairResult(normalized)) {
            await store.putPairwiseStatus(normalized);
            continue;
        }

        await store.putSelfStatus(normalized);

        const edges = result.dependencyEdges;
        if (!edges || edges.length === 0) continue;

        const installName = normalized.packages[0];
        const current = snapshots.get(installName);
        if (!current) {
            snapshots.set(installName, edges);
            continue;
        }

        const currentVersion = ownInstalledVersion(installName, current)?.installedVersion;
        const candidateVersion = ownInstalledVersion(installName, edges)?.installedVersion;
        if (currentVersion && candidateVersion && isNewerVersion(candidateVersion, currentVersion)) {
            snapshots.set(installName, edges);
        }
    }

    for (const installName of [...snapshots.keys()].sort()) {
        const edges = [...(snapshots.get(installName) ?? [])].sort((a, b) => a.dependsOn.localeCompare(b.dependsOn));
        await store.putDependencyEdges(installName, edges);
    }
}
