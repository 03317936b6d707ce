import {
    CompatibilityStatus,
    SummaryStatus,
    type CompatibilityResult,
    type PackageCompatibilitySummary,
    type PairDetail,
    type PythonVersion,
} from '@I/compatibility.interfaces';
import type { CompatibilityResultStore } from '@I/store.interfaces';
import { getLogger, type ChildLogger } from './logger.utils';
import { canonicalPair, isConflicting } from './store.utils';

type Lookup = CompatibilityResult | undefined;

const pairKey = (a: string, b: string): string => canonicalPair(a, b).join('\u0000');

/**
 * Runs a store read, logging and swallowing a failure as "absent"
 */
async function readOrAbsent(read: () => Promise<Lookup>, logger: ChildLogger, key: Record<string, unknown>): Promise<Lookup> {
    try {
        return await read();
    } catch (error) {
        logger.warn('Store read failed, treating row as absent', {
            ...key,
            error: error instanceof Error ? error.message : String(error),
        });
        return undefined;
    }
}

/**
 * Folds self and pair statuses with CONFLICT > UNKNOWN > SUCCESS. An absent
 * row is never read as SUCCESS.
 */
export function combineStatuses(results: Lookup[]): SummaryStatus {
    let status = SummaryStatus.SUCCESS;

    for (const result of results) {
        if (result && isConflicting(result.status)) {
            return SummaryStatus.CONFLICT;
        }
        if (!result || result.status !== CompatibilityStatus.SUCCESS) {
            status = SummaryStatus.UNKNOWN;
        }
    }

    return status;
}

function summarise(
    name: string,
    pythonVersion: PythonVersion,
    self: Lookup,
    others: readonly string[],
    pairWith: (other: string) => Lookup,
): PackageCompatibilitySummary {
    const related: Lookup[] = [self];
    const details: PairDetail[] = [];

    for (const other of others) {
        const pair = pairWith(other);
        related.push(pair);
        details.push({
            otherPackage: other,
            status: pair?.status ?? CompatibilityStatus.UNKNOWN,
            details: pair?.details ?? null,
            found: pair !== undefined,
        });
    }

    return {
        package: name,
        pythonVersion,
        status: combineStatuses(related),
        selfStatus: self?.status ?? CompatibilityStatus.UNKNOWN,
        selfDetails: self?.details ?? null,
        selfFound: self !== undefined,
        pairs: details,
    };
}

/**
 * Builds a compatibility summary for each package in the set.
 *
 * Issues one self read per package and one read per unordered pair, all
 * concurrently. Each failed read counts as an absent row so partial data
 * yields a partial result. Nothing is written back to the store.
 */
export async function aggregate(
    packages: readonly string[],
    pythonVersion: PythonVersion,
    store: CompatibilityResultStore,
): Promise<Map<string, PackageCompatibilitySummary>> {
    const logger = getLogger().child('CompatibilityAggregator');
    const names = [...new Set(packages)];

    const pairs: Array<readonly [string, string]> = [];
    for (let i = 0; i < names.length; i++) {
        for (let j = i + 1; j < names.length; j++) {
            pairs.push(canonicalPair(names[i], names[j]));
        }
    }

    logger.debug('Aggregating compatibility', { packageCount: names.length, pairCount: pairs.length, pythonVersion });

    const [selfResults, pairResults] = await Promise.all([
        Promise.all(names.map((name) => readOrAbsent(() => store.getSelfStatus(name, pythonVersion), logger, { package: name, pythonVersion }))),
        Promise.all(pairs.map(([a, b]) => readOrAbsent(() => store.getPairwiseStatus(a, b, pythonVersion), logger, { packages: [a, b], pythonVersion }))),
    ]);

    const selfByName = new Map<string, Lookup>();
    names.forEach((name, index) => selfByName.set(name, selfResults[index]));

    const pairByKey = new Map<string, Lookup>();
    pairs.forEach(([a, b], index) => pairByKey.set(pairKey(a, b), pairResults[index]));

    const summaries = new Map<string, PackageCompatibilitySummary>();
    for (const name of names) {
        const others = names.filter((other) => other !== name).sort();
        summaries.set(name, summarise(name, pythonVersion, selfByName.get(name), others, (other) => pairByKey.get(pairKey(name, other))));
    }

    logger.info('Compatibility aggregated', {
        pythonVersion,
        packages: names.length,
        conflicts: [...summaries.values()].filter((s) => s.status === SummaryStatus.CONFLICT).length,
        unknown: [...summaries.values()].filter((s) => s.status === SummaryStatus.UNKNOWN).length,
    });

    return summaries;
}

/**
 * Summary of one package against the rest of a portfolio, equal to its entry
 * in `aggregate`. Reads only the package's own row and the pairs it is in.
 */
export async function aggregatePackage(
    packageName: string,
    portfolio: readonly string[],
    pythonVersion: PythonVersion,
    store: CompatibilityResultStore,
): Promise<PackageCompatibilitySummary> {
    const logger = getLogger().child('CompatibilityAggregator');
    const others = [...new Set(portfolio)].filter((other) => other !== packageName).sort();

    const [self, pairResults] = await Promise.all([
        readOrAbsent(() => store.getSelfStatus(packageName, pythonVersion), logger, { package: packageName, pythonVersion }),
        Promise.all(
            others.map((other) => {
                const [a, b] = canonicalPair(packageName, other);
                return readOrAbsent(() => store.getPairwiseStatus(a, b, pythonVersion), logger, { packages: [a, b], pythonVersion });
            }),
        ),
    ]);

    const pairByOther = new Map<string, Lookup>();
    others.forEach((other, index) => pairByOther.set(other, pairResults[index]));

    return summarise(packageName, pythonVersion, self, others, (other) => pairByOther.get(other));
}
