import { z } from 'zod';
import type { FetchFn } from '@I/checker.interfaces';
import type { DependencyHighlighter } from './dependency-highlighter.utils';
import { mapWithConcurrency } from './concurrency.utils';
import { getLogger, type ChildLogger } from './logger.utils';

export const DEPRECATED_STATUS = 'Development Status :: 7 - Inactive';

const DEVELOPMENT_STATUS_PREFIX = 'Development Status ::';

const RegistryPackageSchema = z.object({
    info: z.object({
        classifiers: z.array(z.string()).nullable().default([]),
    }),
});

export interface DeprecatedDepFinderOptions {
    highlighter: DependencyHighlighter;
    /** Base of the registry JSON API, e.g. https://pypi.org/pypi */
    registryUrl: string;
    fetchFn?: FetchFn;
    maxWorkers?: number;
    timeout?: number;
}

export interface DeprecatedDepsReport {
    packageName: string;
    deprecated: string[];
    /** Dependencies whose registry entry could not be read */
    unchecked: string[];
    error?: string;
}

interface StatusLookup {
    dependency: string;
    status: string | null;
    failed: boolean;
}

/**
 * Finds dependencies whose registry entry marks them inactive
 */
export class DeprecatedDepFinder {
    private readonly highlighter: DependencyHighlighter;
    private readonly registryUrl: string;
    private readonly fetchFn: FetchFn;
    private readonly maxWorkers: number;
    private readonly timeout: number;
    private readonly logger: ChildLogger;

    constructor(options: DeprecatedDepFinderOptions) {
        this.highlighter = options.highlighter;
        this.registryUrl = options.registryUrl.replace(/\/+$/, '');
        this.fetchFn = options.fetchFn ?? fetch;
        this.maxWorkers = options.maxWorkers ?? 10;
        this.timeout = options.timeout ?? 30000;
        this.logger = getLogger().child('DeprecatedDepFinder');
    }

    /**
     * The package's "Development Status" classifier, or null when it has none
     */
    async getDevelopmentStatus(packageName: string): Promise<string | null> {
        const url = `${this.registryUrl}/${encodeURIComponent(packageName)}/json`;
        this.logger.debug('Fetching registry entry', { package: packageName });

        const response = await this.fetchFn(url, { signal: AbortSignal.timeout(this.timeout) });
        if (!response.ok) {
            throw new Error(`Registry responded with HTTP ${response.status} for ${packageName}`);
        }

        const parsed = RegistryPackageSchema.safeParse(await response.json());
        if (!parsed.success) {
            throw new Error(`Registry returned an unexpected entry for ${packageName}`);
        }

        const status = (parsed.data.info.classifiers ?? []).find((classifier) => classifier.startsWith(DEVELOPMENT_STATUS_PREFIX));
        if (!status) {
            this.logger.debug('No development status available', { package: packageName });
        }
        return status ?? null;
    }

    async getDeprecatedDeps(packageName: string): Promise<DeprecatedDepsReport> {
        const edges = await this.highlighter.getDependencyEdges(packageName);
        const dependencies = [...new Set(edges.map((edge) => edge.dependsOn))].sort();

        const statuses = await mapWithConcurrency(dependencies, this.maxWorkers, async (dependency): Promise<StatusLookup> => {
            try {
                return { dependency, status: await this.getDevelopmentStatus(dependency), failed: false };
            } catch (error) {
                this.logger.warn('Registry lookup failed', {
                    package: packageName,
                    dependency,
                    error: error instanceof Error ? error.message : String(error),
                });
                return { dependency, status: null, failed: true };
            }
        });

        const report: DeprecatedDepsReport = {
            packageName,
            deprecated: statuses.filter((entry) => entry.status === DEPRECATED_STATUS).map((entry) => entry.dependency),
            unchecked: statuses.filter((entry) => entry.failed).map((entry) => entry.dependency),
        };

        this.logger.info('Deprecated dependencies checked', {
            package: packageName,
            dependencies: dependencies.length,
            deprecated: report.deprecated.length,
            unchecked: report.unchecked.length,
        });

        return report;
    }

    /**
     * One report per package. A package whose dependency info cannot be read
     * is reported with its error instead of failing the whole run.
     */
    async getDeprecatedDepsForAll(packages: string[]): Promise<DeprecatedDepsReport[]> {
        return Promise.all(
            packages.map(async (packageName) => {
                try {
                    return await this.getDeprecatedDeps(packageName);
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    this.logger.error('Failed to find deprecated dependencies', { package: packageName, error: message });
                    return { packageName, deprecated: [], unchecked: [], error: message };
                }
            }),
        );
    }
}
