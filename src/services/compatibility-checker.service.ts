import { z } from 'zod';
import type { DependencyEdge, PythonVersion } from '@I/compatibility.interfaces';
import type { CheckOutcome, CheckRequest, DependencyInfoEntry, FetchFn } from '@I/checker.interfaces';
import type { CheckedCompatibilityResult } from '@I/store.interfaces';
import { getLogger, type ChildLogger } from '@U/logger.utils';
import { mapWithConcurrency, unorderedPairs } from '@U/concurrency.utils';
import { parseStatus, toPackageSet } from '@U/store.utils';

export const PACKAGE_NOT_IN_WHITELIST = 'Request contains third party github head packages.';

const DependencyInfoEntrySchema = z.object({
    installed_version: z.string(),
    installed_version_time: z.string().nullable().default(null),
    latest_version: z.string(),
    latest_version_time: z.string().nullable().default(null),
    is_latest: z.boolean().default(false),
    current_time: z.string().nullable().default(null),
});

export const CheckerResponseSchema = z.object({
    result: z.enum(['SUCCESS', 'CHECK_WARNING', 'CONFLICT', 'UNKNOWN']),
    packages: z.array(z.string()),
    description: z.string().nullable().optional(),
    requirements: z.string().nullable().optional(),
    dependency_info: z.record(DependencyInfoEntrySchema).nullable().optional(),
});

export const CheckerConfigSchema = z.object({
    serverUrl: z.string().url(),
    timeout: z.number().positive().default(30000),
    maxWorkers: z.number().int().positive().default(20),
});

export type CheckerConfig = z.infer<typeof CheckerConfigSchema>;

export interface CollectedResults {
    results: CheckedCompatibilityResult[];
    failures: CheckOutcome[];
}

/**
 * Parses newline-delimited "name==version" pairs
 */
export function parseRequirements(requirements: string | null | undefined): Record<string, string> {
    const parsed: Record<string, string> = {};
    for (const line of (requirements ?? '').split('\n')) {
        const trimmed = line.trim();
        const separator = trimmed.indexOf('==');
        if (separator <= 0) continue;
        parsed[trimmed.slice(0, separator).trim()] = trimmed.slice(separator + 2).trim();
    }
    return parsed;
}

function parseTimestamp(value: string | null): Date | null {
    if (!value) return null;
    const date = new Date(value);
    return Number.isNaN(date.getTime()) ? null : date;
}

/**
 * Converts the server's dependency_info map into dependency edges
 */
export function toDependencyEdges(installName: string, dependencyInfo: Record<string, DependencyInfoEntry>, checkedAt: Date): DependencyEdge[] {
    return Object.entries(dependencyInfo)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([dependsOn, info]) => ({
            package: { name: installName, version: null, releaseTimestamp: null },
            dependsOn,
            installedVersion: info.installed_version,
            installedVersionTimestamp: parseTimestamp(info.installed_version_time),
            latestVersion: info.latest_version,
            latestVersionTimestamp: parseTimestamp(info.latest_version_time),
            isLatest: info.is_latest,
            checkedAt: parseTimestamp(info.current_time) ?? checkedAt,
        }));
}

/**
 * Client for the remote compatibility checker server.
 *
 * Failures never surface as CONFLICT: timeouts, transport errors and bad
 * responses all come back as UNKNOWN results with a description, marked
 * as failed.
 */
export class CompatibilityCheckerService {
    private readonly config: CheckerConfig;
    private readonly fetchFn: FetchFn;
    private readonly logger: ChildLogger;

    constructor(config: Partial<CheckerConfig> & Pick<CheckerConfig, 'serverUrl'>, fetchFn: FetchFn = fetch) {
        this.config = CheckerConfigSchema.parse(config);
        this.fetchFn = fetchFn;
        this.logger = getLogger().child('CompatibilityChecker');
    }

    private failure(request: CheckRequest, description: string): CheckOutcome {
        return { request, response: { result: 'UNKNOWN', packages: request.packages, description }, failed: true };
    }

    /**
     * Asks the server to check a single package or a pair. A failed outcome
     * must not replace a stored result.
     */
    async check(request: CheckRequest): Promise<CheckOutcome> {
        const { packages, pythonVersion } = request;
        const url = new URL(this.config.serverUrl);
        url.searchParams.append('python-version', pythonVersion);
        for (const pkg of packages) {
            url.searchParams.append('package', pkg);
        }

        this.logger.debug('Sending compatibility check', { packages, pythonVersion });

        let content: string;
        try {
            const response = await this.fetchFn(url.toString(), { signal: AbortSignal.timeout(this.config.timeout) });
            content = await response.text();
            if (!response.ok) {
                this.logger.warn('Checker server returned an error status', { packages, pythonVersion, status: response.status });
                return this.failure(request, `Checker server responded with HTTP ${response.status}`);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn('Checker request failed', { packages, pythonVersion, error: message });
            return this.failure(request, `Checker request failed: ${message}`);
        }

        if (content.trim() === PACKAGE_NOT_IN_WHITELIST) {
            return { request, response: { result: 'UNKNOWN', packages, description: PACKAGE_NOT_IN_WHITELIST }, failed: false };
        }

        let body: unknown;
        try {
            body = JSON.parse(content);
        } catch (error) {
            this.logger.warn('Checker response is not JSON', { packages, error: error instanceof Error ? error.message : String(error) });
            return this.failure(request, 'Checker server returned a malformed response');
        }

        const parsed = CheckerResponseSchema.safeParse(body);
        if (!parsed.success) {
            this.logger.warn('Checker response has an unexpected shape', { packages, issues: parsed.error.issues.length });
            return this.failure(request, 'Checker server returned an unexpected response');
        }

        this.logger.trace('Compatibility check completed', { packages, pythonVersion, result: parsed.data.result });
        return { request, response: parsed.data, failed: false };
    }

    /**
     * Runs every request with at most maxWorkers in flight
     */
    async checkAll(requests: CheckRequest[]): Promise<CheckOutcome[]> {
        this.logger.info('Running compatibility checks', { count: requests.length, maxWorkers: this.config.maxWorkers });
        return mapWithConcurrency(requests, this.config.maxWorkers, (request) => this.check(request));
    }

    /**
     * Checks every package on its own and every unordered pair, for each
     * Python version, and converts the answered ones into storable results.
     * Requests the server failed to answer come back under `failures`.
     */
    async collectResults(packages: string[], pythonVersions: PythonVersion[], now: Date = new Date()): Promise<CollectedResults> {
        const requests: CheckRequest[] = [];
        for (const pythonVersion of pythonVersions) {
            requests.push(...packages.map((pkg) => ({ packages: [pkg], pythonVersion })));
            requests.push(...unorderedPairs(packages).map((pair) => ({ packages: [...pair], pythonVersion })));
        }

        const outcomes = await this.checkAll(requests);
        const failures = outcomes.filter((outcome) => outcome.failed);
        if (failures.length > 0) {
            this.logger.warn('Checker failed to answer some requests', { failed: failures.length, total: outcomes.length });
        }

        return {
            results: outcomes.filter((outcome) => !outcome.failed).map((outcome) => toCheckedResult(outcome, now)),
            failures,
        };
    }
}

/**
 * Converts a server response into a result the store can save. The packages
 * of the request are used, so an UNKNOWN response still lands on its key.
 */
export function toCheckedResult(outcome: Pick<CheckOutcome, 'request' | 'response'>, now: Date): CheckedCompatibilityResult {
    const { request, response } = outcome;
    const packages = toPackageSet(request.packages);
    const result: CheckedCompatibilityResult = {
        packages,
        pythonVersion: request.pythonVersion,
        status: parseStatus(response.result),
        details: response.description ?? null,
        timestamp: now,
    };

    if (packages.length === 1 && response.dependency_info) {
        result.dependencyEdges = toDependencyEdges(packages[0], response.dependency_info, now);
    }

    return result;
}
