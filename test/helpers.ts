import {
    CompatibilityStatus,
    type CompatibilityResult,
    type DependencyEdge,
    type PackageSet,
    type PythonVersion,
} from '@I/compatibility.interfaces';

export const DAY_MS = 24 * 60 * 60 * 1000;

export const NOW = new Date('2024-06-01T00:00:00.000Z');

export const daysBefore = (days: number, from: Date = NOW): Date => new Date(from.getTime() - days * DAY_MS);

export function result(
    packages: PackageSet,
    status: CompatibilityStatus,
    pythonVersion: PythonVersion = '3',
    details: string | null = null,
): CompatibilityResult {
    return { packages, pythonVersion, status, details, timestamp: NOW };
}

export function edge(
    dependsOn: string,
    installedVersion: string,
    latestVersion: string,
    latestVersionTimestamp: Date | null = daysBefore(30),
    packageName = 'my-package',
): DependencyEdge {
    return {
        package: { name: packageName, version: null, releaseTimestamp: null },
        dependsOn,
        installedVersion,
        installedVersionTimestamp: daysBefore(400),
        latestVersion,
        latestVersionTimestamp,
        isLatest: installedVersion === latestVersion,
        checkedAt: NOW,
    };
}

/**
 * fetch stand-in answering from a handler keyed on the request's query
 */
export function stubFetch(handler: (packages: string[], pythonVersion: string | null, url: URL) => Response | Promise<Response>) {
    const calls: URL[] = [];
    const fetchFn = async (input: string): Promise<Response> => {
        const url = new URL(input);
        calls.push(url);
        return handler(url.searchParams.getAll('package'), url.searchParams.get('python-version'), url);
    };
    return { fetchFn, calls };
}

export const jsonResponse = (body: unknown, status = 200): Response =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
