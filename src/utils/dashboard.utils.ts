import { CompatibilityStatus, SummaryStatus, type PackageCompatibilitySummary, type PythonVersion } from '@I/compatibility.interfaces';
import type { DashboardCell, DashboardModel, DashboardRow } from '@I/badge.interfaces';
import type { CompatibilityResultStore } from '@I/store.interfaces';
import { aggregate } from './compatibility-aggregator.utils';
import type { DependencyHighlighter } from './dependency-highlighter.utils';
import { renderTemplate } from './template.utils';
import { getLogger } from './logger.utils';

export interface DashboardContext {
    store: CompatibilityResultStore;
    highlighter: DependencyHighlighter;
    now?: Date;
}

function cell(kind: 'self' | 'pairwise', status: CompatibilityStatus, found: boolean, details: string | null): DashboardCell {
    const label = found ? status : 'UNKNOWN';
    return {
        status: label,
        cssClass: `${kind}-${label.toLowerCase().replace(/_/g, '-')}`,
        details: details ?? (found ? '' : 'No result recorded'),
    };
}

/**
 * Lower-triangular grid: the diagonal holds self results, the cells below it
 * the pairwise results
 */
export function buildGrid(packages: readonly string[], summaries: Map<string, PackageCompatibilitySummary>): DashboardRow[] {
    return packages.map((rowPackage, i) => {
        const summary = summaries.get(rowPackage);
        const cells = packages.map((columnPackage, j) => {
            if (j > i) return null;
            if (j === i) {
                return cell('self', summary?.selfStatus ?? CompatibilityStatus.UNKNOWN, summary?.selfFound ?? false, summary?.selfDetails ?? null);
            }
            const pair = summary?.pairs.find((p) => p.otherPackage === columnPackage);
            return cell('pairwise', pair?.status ?? CompatibilityStatus.UNKNOWN, pair?.found ?? false, pair?.details ?? null);
        });
        return { packageName: rowPackage, cells };
    });
}

/**
 * Collects everything the dashboard page shows
 */
export async function buildDashboardModel(packages: readonly string[], pythonVersion: PythonVersion, context: DashboardContext): Promise<DashboardModel> {
    const logger = getLogger().child('Dashboard');
    const now = context.now ?? new Date();
    const names = [...new Set(packages)].sort();

    const [summaries, reports] = await Promise.all([aggregate(names, pythonVersion, context.store), context.highlighter.getOutdatedDependencies(names, now)]);

    const conflicted = new Set(names.filter((name) => summaries.get(name)?.status === SummaryStatus.CONFLICT));
    const outdated = new Set(reports.filter((report) => report.verdicts.length > 0).map((report) => report.packageName));
    const unhealthy = new Set([...conflicted, ...outdated]);

    logger.info('Dashboard model built', { packages: names.length, conflicted: conflicted.size, outdated: outdated.size });

    return {
        pythonVersion,
        generatedAt: now.toISOString(),
        packages: names,
        rows: buildGrid(names, summaries),
        statistics: {
            totalPackages: names.length,
            withConflicts: conflicted.size,
            needingUpdate: outdated.size,
            healthy: names.length - unhealthy.size,
        },
        outdated: reports
            .filter((report) => report.verdicts.length > 0)
            .map((report) => ({
                packageName: report.packageName,
                dependencies: report.verdicts.map((verdict) => ({
                    name: verdict.edge.dependsOn,
                    priority: verdict.priority,
                    installed: verdict.edge.installedVersion,
                    latest: verdict.edge.latestVersion,
                })),
            })),
    };
}

export function renderDashboard(model: DashboardModel): string {
    return renderTemplate('dashboard.html', model);
}
