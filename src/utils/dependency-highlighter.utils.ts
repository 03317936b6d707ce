import { PriorityLevel, type PriorityThresholds, type PriorityVerdict } from '@I/priority.interfaces';
import type { DependencyEdge, PythonVersion } from '@I/compatibility.interfaces';
import type { CompatibilityResultStore } from '@I/store.interfaces';
import { CheckerUnavailableError } from '@E/CheckerUnavailableError';
import { PackageNotSupportedError } from '@E/PackageNotSupportedError';
import type { CompatibilityCheckerService } from '@S/compatibility-checker.service';
import { toDependencyEdges } from '@S/compatibility-checker.service';
import { DEFAULT_PRIORITY_THRESHOLDS, classify, describeReason } from './priority-classifier.utils';
import { elapsedDays } from './version.utils';
import { withPackageVersion } from './store.utils';
import { renderTemplate } from './template.utils';
import { getLogger, type ChildLogger } from './logger.utils';

export interface DependencyHighlighterOptions {
    store: CompatibilityResultStore;
    /** Used when the store holds no dependency rows for a package */
    checker?: CompatibilityCheckerService;
    pythonVersion?: PythonVersion;
    ignoredDependencies?: string[];
    thresholds?: PriorityThresholds;
}

export interface OutdatedReport {
    packageName: string;
    verdicts: PriorityVerdict[];
    error?: string;
}

/**
 * Classifies every dependency of the tracked packages
 */
export class DependencyHighlighter {
    private readonly store: CompatibilityResultStore;
    private readonly checker?: CompatibilityCheckerService;
    private readonly pythonVersion: PythonVersion;
    private readonly ignored: Set<string>;
    private readonly thresholds: PriorityThresholds;
    private readonly logger: ChildLogger;

    constructor(options: DependencyHighlighterOptions) {
        this.store = options.store;
        this.checker = options.checker;
        this.pythonVersion = options.pythonVersion ?? '3';
        this.ignored = new Set(options.ignoredDependencies ?? []);
        this.thresholds = options.thresholds ?? DEFAULT_PRIORITY_THRESHOLDS;
        this.logger = getLogger().child('DependencyHighlighter');
    }

    /**
     * Dependency edges from the store, or from the checker server when the
     * store has none
     */
    async getDependencyEdges(packageName: string): Promise<DependencyEdge[]> {
        const stored = await this.store.getDependencyEdges(packageName);
        if (stored.length > 0) {
            return stored;
        }

        if (!this.checker) {
            this.logger.debug('No stored dependency rows and no checker configured', { package: packageName });
            return [];
        }

        this.logger.debug('Fetching dependency info from checker server', { package: packageName });
        const { response, failed } = await this.checker.check({ packages: [packageName], pythonVersion: this.pythonVersion });
        if (failed) {
            throw new CheckerUnavailableError(packageName, response.description ?? 'no response');
        }
        if (!response.dependency_info) {
            this.logger.warn('Checker server returned no dependency info', { package: packageName, description: response.description });
            throw new PackageNotSupportedError(packageName);
        }

        return withPackageVersion(packageName, toDependencyEdges(packageName, response.dependency_info, new Date()));
    }

    /**
     * One verdict per dependency, sorted by dependency name. Ignored
     * dependencies are left out.
     */
    async classifyDependencies(packageName: string, now: Date = new Date()): Promise<PriorityVerdict[]> {
        const edges = await this.getDependencyEdges(packageName);

        const verdicts = edges
            .filter((edge) => !this.ignored.has(edge.dependsOn))
            .sort((a, b) => a.dependsOn.localeCompare(b.dependsOn))
            .map((edge) => classify(edge, now, this.thresholds));

        this.logger.info('Dependencies classified', {
            package: packageName,
            total: verdicts.length,
            high: verdicts.filter((v) => v.priority === PriorityLevel.HIGH).length,
            low: verdicts.filter((v) => v.priority === PriorityLevel.LOW).length,
        });

        return verdicts;
    }

    /**
     * Verdicts needing action for each package. A package whose dependency
     * info cannot be read is reported with its error instead of failing the
     * whole run.
     */
    async getOutdatedDependencies(packages: string[], now: Date = new Date()): Promise<OutdatedReport[]> {
        return Promise.all(
            packages.map(async (packageName) => {
                try {
                    const verdicts = await this.classifyDependencies(packageName, now);
                    return { packageName, verdicts: verdicts.filter((v) => v.priority !== PriorityLevel.UP_TO_DATE) };
                } catch (error) {
                    const message = error instanceof Error ? error.message : String(error);
                    this.logger.error('Failed to classify dependencies', { package: packageName, error: message });
                    return { packageName, verdicts: [], error: message };
                }
            }),
        );
    }
}

/**
 * Plain-text report block for one verdict
 */
export function formatVerdict(verdict: PriorityVerdict, now: Date): string {
    const { edge } = verdict;
    return renderTemplate('outdated-dependency', {
        name: edge.dependsOn,
        parent: edge.package.name,
        priority: verdict.priority,
        installed: edge.installedVersion,
        latest: edge.latestVersion,
        sinceLatest: edge.latestVersionTimestamp ? `${elapsedDays(edge.latestVersionTimestamp, now)} days` : 'unknown',
        reasons: verdict.reasons.map((reason) => describeReason(reason, edge.dependsOn)),
    });
}
