import type { CompatibilityResult, DependencyEdge, PythonVersion } from '@I/compatibility.interfaces';
import type { CheckedCompatibilityResult, CompatibilityResultStore } from '@I/store.interfaces';
import { canonicalPair, saveResultsThrough, toPackageSet, withPackageVersion } from '@U/store.utils';
import { getLogger, type ChildLogger } from '@U/logger.utils';
import { InvalidPackageSetError } from '@E/InvalidPackageSetError';

const keyOf = (...parts: string[]): string => parts.join('\u0000');

/**
 * Process-local store keyed the same way as the SQL tables
 */
export class InMemoryCompatibilityStore implements CompatibilityResultStore {
    private readonly selfRows = new Map<string, CompatibilityResult>();
    private readonly pairRows = new Map<string, CompatibilityResult>();
    private readonly dependencyRows = new Map<string, Map<string, DependencyEdge>>();
    private readonly logger: ChildLogger;

    constructor() {
        this.logger = getLogger().child('InMemoryStore');
    }

    async getSelfStatus(packageName: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        const row = this.selfRows.get(keyOf(packageName, pythonVersion));
        return row ? { ...row } : undefined;
    }

    async getPairwiseStatus(packageA: string, packageB: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        const [lower, higher] = canonicalPair(packageA, packageB);
        const row = this.pairRows.get(keyOf(lower, higher, pythonVersion));
        return row ? { ...row } : undefined;
    }

    async getDependencyEdges(packageName: string): Promise<DependencyEdge[]> {
        const rows = this.dependencyRows.get(packageName);
        if (!rows) return [];
        const edges = [...rows.values()].sort((a, b) => a.dependsOn.localeCompare(b.dependsOn));
        return withPackageVersion(packageName, edges);
    }

    async putSelfStatus(result: CompatibilityResult): Promise<void> {
        if (result.packages.length !== 1) {
            throw new InvalidPackageSetError(`Self status needs exactly 1 package, got ${result.packages.length}`);
        }
        const [name] = result.packages;
        this.selfRows.set(keyOf(name, result.pythonVersion), { ...result, packages: [name] });
        this.logger.trace('Self status stored', { package: name, pythonVersion: result.pythonVersion, status: result.status });
    }

    async putPairwiseStatus(result: CompatibilityResult): Promise<void> {
        if (result.packages.length !== 2) {
            throw new InvalidPackageSetError(`Pairwise status needs exactly 2 packages, got ${result.packages.length}`);
        }
        const packages = toPackageSet(result.packages);
        this.pairRows.set(keyOf(...packages, result.pythonVersion), { ...result, packages });
        this.logger.trace('Pairwise status stored', { packages, pythonVersion: result.pythonVersion, status: result.status });
    }

    async putDependencyEdges(packageName: string, edges: DependencyEdge[]): Promise<void> {
        const rows = this.dependencyRows.get(packageName) ?? new Map<string, DependencyEdge>();
        for (const edge of edges) {
            rows.set(edge.dependsOn, { ...edge });
        }
        this.dependencyRows.set(packageName, rows);
        this.logger.trace('Dependency edges stored', { package: packageName, count: edges.length });
    }

    async getPackages(): Promise<string[]> {
        const names = new Set<string>();
        for (const row of this.selfRows.values()) {
            names.add(row.packages[0]);
        }
        return [...names].sort();
    }

    async saveCompatibilityResults(results: CheckedCompatibilityResult[]): Promise<void> {
        await saveResultsThrough(this, results);
    }
}
