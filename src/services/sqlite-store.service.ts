import Database from 'better-sqlite3';
import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type { CompatibilityResult, DependencyEdge, PythonVersion } from '@I/compatibility.interfaces';
import type { CheckedCompatibilityResult, CompatibilityResultStore } from '@I/store.interfaces';
import { canonicalPair, parseStatus, saveResultsThrough, toPackageSet, withPackageVersion } from '@U/store.utils';
import { getLogger, type ChildLogger } from '@U/logger.utils';
import { InvalidPackageSetError } from '@E/InvalidPackageSetError';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const SCHEMA_PATH = path.join(__dirname, '../../sql/create_table.sql');

interface SelfRow {
    install_name: string;
    status: string;
    py_version: string;
    timestamp: string | null;
    details: string | null;
}

interface PairRow {
    install_name_lower: string;
    install_name_higher: string;
    status: string;
    py_version: string;
    timestamp: string | null;
    details: string | null;
}

interface ReleaseTimeRow {
    install_name: string;
    dep_name: string;
    installed_version: string;
    installed_version_time: string | null;
    latest_version: string;
    latest_version_time: string | null;
    is_latest: number;
    timestamp: string | null;
}

const toDate = (value: string | null): Date | null => {
    if (!value) return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
};

const toIso = (value: Date | null): string | null => (value ? value.toISOString() : null);

export function readSchema(): string {
    return fs.readFileSync(SCHEMA_PATH, 'utf-8');
}

/**
 * Compatibility store backed by a SQLite file holding the three status tables
 */
export class SqliteCompatibilityStore implements CompatibilityResultStore {
    private readonly db: Database.Database;
    private readonly logger: ChildLogger;

    /**
     * @param databasePath file path, or ":memory:" for a throwaway database
     */
    constructor(databasePath: string) {
        this.logger = getLogger().child('SqliteStore');

        try {
            this.db = new Database(databasePath);
            this.db.exec(readSchema());
            this.logger.debug('Compatibility database initialized', { databasePath });
        } catch (error) {
            this.logger.error('Failed to initialize compatibility database', {
                databasePath,
                error: error instanceof Error ? error.message : String(error),
            });
            throw error;
        }
    }

    close(): void {
        this.db.close();
    }

    async getSelfStatus(packageName: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        const row = this.db
            .prepare<[string, string], SelfRow>('SELECT * FROM self_compatibility_status WHERE install_name = ? AND py_version = ?')
            .get(packageName, pythonVersion);
        if (!row) return undefined;

        return {
            packages: [row.install_name],
            pythonVersion,
            status: parseStatus(row.status),
            details: row.details,
            timestamp: toDate(row.timestamp) ?? new Date(0),
        };
    }

    async getPairwiseStatus(packageA: string, packageB: string, pythonVersion: PythonVersion): Promise<CompatibilityResult | undefined> {
        const [lower, higher] = canonicalPair(packageA, packageB);
        const row = this.db
            .prepare<[string, string, string], PairRow>(
                'SELECT * FROM pairwise_compatibility_status WHERE install_name_lower = ? AND install_name_higher = ? AND py_version = ?',
            )
            .get(lower, higher, pythonVersion);
        if (!row) return undefined;

        return {
            packages: [row.install_name_lower, row.install_name_higher],
            pythonVersion,
            status: parseStatus(row.status),
            details: row.details,
            timestamp: toDate(row.timestamp) ?? new Date(0),
        };
    }

    async getDependencyEdges(packageName: string): Promise<DependencyEdge[]> {
        const rows = this.db
            .prepare<[string], ReleaseTimeRow>('SELECT * FROM release_time_for_dependencies WHERE install_name = ? ORDER BY dep_name')
            .all(packageName);

        const edges: DependencyEdge[] = rows.map((row) => ({
            package: { name: row.install_name, version: null, releaseTimestamp: null },
            dependsOn: row.dep_name,
            installedVersion: row.installed_version,
            installedVersionTimestamp: toDate(row.installed_version_time),
            latestVersion: row.latest_version,
            latestVersionTimestamp: toDate(row.latest_version_time),
            isLatest: row.is_latest === 1,
            checkedAt: toDate(row.timestamp) ?? new Date(0),
        }));

        return withPackageVersion(packageName, edges);
    }

    async putSelfStatus(result: CompatibilityResult): Promise<void> {
        if (result.packages.length !== 1) {
            throw new InvalidPackageSetError(`Self status needs exactly 1 package, got ${result.packages.length}`);
        }
        this.db
            .prepare('REPLACE INTO self_compatibility_status VALUES (?, ?, ?, ?, ?)')
            .run(result.packages[0], result.status, result.pythonVersion, result.timestamp.toISOString(), result.details);
    }

    async putPairwiseStatus(result: CompatibilityResult): Promise<void> {
        if (result.packages.length !== 2) {
            throw new InvalidPackageSetError(`Pairwise status needs exactly 2 packages, got ${result.packages.length}`);
        }
        const [lower, higher] = toPackageSet(result.packages);
        this.db
            .prepare('REPLACE INTO pairwise_compatibility_status VALUES (?, ?, ?, ?, ?, ?)')
            .run(lower, higher, result.status, result.pythonVersion, result.timestamp.toISOString(), result.details);
    }

    async putDependencyEdges(packageName: string, edges: DependencyEdge[]): Promise<void> {
        const insert = this.db.prepare('REPLACE INTO release_time_for_dependencies VALUES (?, ?, ?, ?, ?, ?, ?, ?)');
        const insertAll = this.db.transaction((batch: DependencyEdge[]) => {
            for (const edge of batch) {
                insert.run(
                    packageName,
                    edge.dependsOn,
                    edge.installedVersion,
                    toIso(edge.installedVersionTimestamp),
                    edge.latestVersion,
                    toIso(edge.latestVersionTimestamp),
                    edge.isLatest ? 1 : 0,
                    edge.checkedAt.toISOString(),
                );
            }
        });

        insertAll(edges);
        this.logger.debug('Dependency release rows saved', { package: packageName, count: edges.length });
    }

    async getPackages(): Promise<string[]> {
        const rows = this.db
            .prepare<[], { install_name: string }>('SELECT DISTINCT install_name FROM self_compatibility_status ORDER BY install_name')
            .all();
        return rows.map((row) => row.install_name);
    }

    async saveCompatibilityResults(results: CheckedCompatibilityResult[]): Promise<void> {
        await saveResultsThrough(this, results);
        this.logger.info('Compatibility results saved', { count: results.length });
    }
}
