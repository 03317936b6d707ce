import type { CompatibilityResult, DependencyEdge, PythonVersion } from './compatibility.interfaces';

/**
 * A checker result as produced by the compatibility server, optionally
 * carrying the dependency snapshot of a single-package check
 */
export interface CheckedCompatibilityResult extends CompatibilityResult {
    dependencyEdges?: DependencyEdge[];
}

/**
 * Row store for self, pairwise and dependency release records.
 *
 * Writes are upserts: the last write for a key wins, and writing the same
 * values again is not observable.
 */
export interface CompatibilityResultStore {
    getSelfStatus(packageName: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined>;
    /** Order of the two names does not matter */
    getPairwiseStatus(packageA: string, packageB: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined>;
    getDependencyEdges(packageName: string): Promise<DependencyEdge[]>;
    putSelfStatus(result: CompatibilityResult): Promise<void>;
    putPairwiseStatus(result: CompatibilityResult): Promise<void>;
    putDependencyEdges(packageName: string, edges: DependencyEdge[]): Promise<void>;
    getPackages(): Promise<string[]>;
    saveCompatibilityResults(results: CheckedCompatibilityResult[]): Promise<void>;
}
