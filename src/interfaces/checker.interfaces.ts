import type { PythonVersion } from './compatibility.interfaces';

export type CheckerResultValue = 'SUCCESS' | 'CHECK_WARNING' | 'CONFLICT' | 'UNKNOWN';

export interface DependencyInfoEntry {
    installed_version: string;
    installed_version_time: string | null;
    latest_version: string;
    latest_version_time: string | null;
    is_latest: boolean;
    current_time: string | null;
}

/**
 * JSON body returned by the compatibility checker server
 */
export interface CheckerResponse {
    result: CheckerResultValue;
    packages: string[];
    description?: string | null;
    requirements?: string | null;
    dependency_info?: Record<string, DependencyInfoEntry> | null;
}

export interface CheckRequest {
    packages: string[];
    pythonVersion: PythonVersion;
}

export interface CheckOutcome {
    request: CheckRequest;
    response: CheckerResponse;
    /** The server gave no verdict: transport error, timeout, HTTP error or a body it could not have meant */
    failed: boolean;
}

export type FetchFn = (input: string, init?: RequestInit) => Promise<Response>;
