import type { CompatibilityResultStore } from '@I/store.interfaces';
import type { FetchFn } from '@I/checker.interfaces';
import type { AppConfig } from '@U/config.utils';
import { DependencyHighlighter } from '@U/dependency-highlighter.utils';
import { DeprecatedDepFinder } from '@U/deprecated-dep-finder.utils';
import { getLogger } from '@U/logger.utils';
import { CompatibilityCheckerService } from '@S/compatibility-checker.service';
import { SqliteCompatibilityStore } from '@S/sqlite-store.service';

/**
 * Handles shared by every tool and resource. Built once at startup and passed
 * in explicitly.
 */
export interface ServerContext {
    config: AppConfig;
    store: CompatibilityResultStore;
    checker: CompatibilityCheckerService;
    highlighter: DependencyHighlighter;
    deprecatedDepFinder: DeprecatedDepFinder;
}

export interface ServerContextOverrides {
    store?: CompatibilityResultStore;
    fetchFn?: FetchFn;
}

export function createServerContext(config: AppConfig, overrides: ServerContextOverrides = {}): ServerContext {
    const logger = getLogger().child('context');

    const store = overrides.store ?? new SqliteCompatibilityStore(config.databasePath);
    const checker = new CompatibilityCheckerService(
        { serverUrl: config.serverUrl, timeout: config.requestTimeout, maxWorkers: config.maxWorkers },
        overrides.fetchFn,
    );
    const highlighter = new DependencyHighlighter({
        store,
        checker,
        ignoredDependencies: config.ignoredDependencies,
    });
    const deprecatedDepFinder = new DeprecatedDepFinder({
        highlighter,
        registryUrl: config.registryUrl,
        fetchFn: overrides.fetchFn,
        maxWorkers: config.maxWorkers,
        timeout: config.requestTimeout,
    });

    logger.debug('Server context created', {
        serverUrl: config.serverUrl,
        registryUrl: config.registryUrl,
        databasePath: overrides.store ? 'injected' : config.databasePath,
        trackedPackages: config.packages.length,
    });

    return { config, store, checker, highlighter, deprecatedDepFinder };
}

/**
 * Packages to work on: the explicit list, else the configured portfolio, else
 * whatever the store has self results for
 */
export async function resolvePackages(context: ServerContext, packages?: string[]): Promise<string[]> {
    if (packages && packages.length > 0) return packages;
    if (context.config.packages.length > 0) return context.config.packages;
    return context.store.getPackages();
}
